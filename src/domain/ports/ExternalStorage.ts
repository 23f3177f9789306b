import type { Readable } from 'node:stream';
import type { StorageConf } from '../model/GenerationRequest.js';

/** Result of a ranged read: the stream and the total size of the file. */
export interface RangedRead {
  readonly stream: Readable;
  readonly size: number;
}

/**
 * Port shared by every external storage provider.
 *
 * Providers that cannot honour an operation reject its promise; none of the
 * operations throws synchronously.
 */
export interface ExternalStorage {
  /** Provider-tagged configuration this storage was opened with. */
  conf(): StorageConf;
  readFile(basename: string): Promise<Readable>;
  readFileAt(basename: string, offset: number): Promise<RangedRead>;
  writeFile(basename: string, content: Readable | string | Buffer): Promise<void>;
  listFiles(pattern: string): Promise<readonly string[]>;
  delete(basename: string): Promise<void>;
  size(basename: string): Promise<number>;
  close(): Promise<void>;
}
