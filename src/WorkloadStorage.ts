import type { Readable } from 'node:stream';
import type { GenerationRequest, StorageConf } from './domain/model/GenerationRequest.js';
import type { ExternalStorage, RangedRead } from './domain/ports/ExternalStorage.js';
import type { GeneratorLookup } from './domain/ports/GeneratorLookup.js';
import type { EventType, EventPayload, OperationRejectedEvent } from './domain/events/DomainEvents.js';
import type { ResolvedGenerator } from './application/usecases/BindGenerator.js';
import type { UnsupportedOperation } from './domain/model/WorkloadStorageError.js';
import { WorkloadStorageError } from './domain/model/WorkloadStorageError.js';
import { parseWorkloadConfig } from './domain/services/ConfigParser.js';
import { BindGenerator } from './application/usecases/BindGenerator.js';
import { EventBus } from './application/EventBus.js';
import { CsvRowStream } from './infrastructure/streams/CsvRowStream.js';
import { createDefaultRegistry } from './infrastructure/registry/GeneratorRegistry.js';

export interface WorkloadStorageConfig {
  /** Where generators are looked up. Default: the built-in registry. */
  readonly registry?: GeneratorLookup;
  /** Rows materialized per stream chunk. Default: `100`. */
  readonly batchSize?: number;
  /** Bus receiving this storage's events. Default: a private bus. */
  readonly eventBus?: EventBus;
}

const UNSUPPORTED_MESSAGES: Record<UnsupportedOperation, string> = {
  write: 'workload storage does not support writes',
  list: 'workload storage does not support listing files',
  delete: 'workload storage does not support deletes',
  size: 'workload storage does not support sizing',
};

/**
 * Read-only external storage whose single file is the CSV rendering of a
 * generator table.
 *
 * The generator is resolved and version-checked when the storage is
 * constructed; every `readFile('')` then opens a fresh, lazily generated
 * stream over the configured row range.
 */
export class WorkloadStorage implements ExternalStorage {
  private readonly request: GenerationRequest;
  private readonly binding: ResolvedGenerator;
  private readonly eventBus: EventBus;
  private readonly batchSize: number;

  constructor(request: GenerationRequest, config: WorkloadStorageConfig = {}) {
    const batchSize = config.batchSize ?? 100;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error(`WorkloadStorage: batchSize must be a positive integer, got ${String(batchSize)}`);
    }

    this.request = request;
    this.batchSize = batchSize;
    this.eventBus = config.eventBus ?? new EventBus();
    this.binding = new BindGenerator(config.registry ?? createDefaultRegistry()).execute(request);

    this.eventBus.emit({
      type: 'storage:opened',
      generator: this.binding.meta.name,
      version: this.binding.meta.version,
      table: this.binding.table.name,
      timestamp: Date.now(),
    });
  }

  /** Parse a workload URI and bind it in one step. */
  static fromUri(uri: string | URL, config?: WorkloadStorageConfig): WorkloadStorage {
    return new WorkloadStorage(parseWorkloadConfig(uri), config);
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Column names of the bound table, in row order. */
  get columns(): readonly string[] {
    return this.binding.table.columns;
  }

  conf(): StorageConf {
    return { provider: 'workload', workloadConfig: this.request };
  }

  /** Open the configured row range as an async iterable of CSV chunks. */
  openRowStream(): CsvRowStream {
    return new CsvRowStream(this.binding, this.request.rowRangeBegin, this.request.rowRangeEnd, {
      batchSize: this.batchSize,
      eventBus: this.eventBus,
    });
  }

  async readFile(basename: string): Promise<Readable> {
    if (basename !== '') {
      throw this.rejected(
        'read',
        new WorkloadStorageError('UNEXPECTED_BASENAME', 'basenames are not supported by workload storage', {
          basename,
        }),
      );
    }
    return this.openRowStream().toReadable();
  }

  async readFileAt(_basename: string, _offset: number): Promise<RangedRead> {
    throw this.rejected(
      'readAt',
      new WorkloadStorageError('NOT_IMPLEMENTED', 'workload storage does not support reading at an offset', {
        operation: 'readFileAt',
      }),
    );
  }

  async writeFile(_basename: string, _content: Readable | string | Buffer): Promise<void> {
    throw this.unsupported('write');
  }

  async listFiles(_pattern: string): Promise<readonly string[]> {
    throw this.unsupported('list');
  }

  async delete(_basename: string): Promise<void> {
    throw this.unsupported('delete');
  }

  async size(_basename: string): Promise<number> {
    throw this.unsupported('size');
  }

  async close(): Promise<void> {
    // Nothing is held open between reads.
  }

  private unsupported(operation: UnsupportedOperation): WorkloadStorageError<'OPERATION_NOT_SUPPORTED'> {
    return this.rejected(
      operation,
      new WorkloadStorageError('OPERATION_NOT_SUPPORTED', UNSUPPORTED_MESSAGES[operation], { operation }),
    );
  }

  private rejected<E extends WorkloadStorageError>(operation: OperationRejectedEvent['operation'], error: E): E {
    this.eventBus.emit({ type: 'operation:rejected', operation, code: error.code, timestamp: Date.now() });
    return error;
  }
}
