import { Readable } from 'node:stream';
import type { ResolvedGenerator } from '../../application/usecases/BindGenerator.js';
import type { EventBus } from '../../application/EventBus.js';
import type { Row } from '../../domain/ports/Generator.js';
import type { DomainEvent } from '../../domain/events/DomainEvents.js';
import { UNBOUNDED_ROW_END } from '../../domain/model/GenerationRequest.js';
import { CsvRowEncoder } from '../encoding/CsvRowEncoder.js';

export interface CsvRowStreamOptions {
  /** Rows materialized per chunk. Default: `100`. */
  readonly batchSize?: number;
  readonly encoder?: CsvRowEncoder;
  /** Receives `read:*` events for this stream. */
  readonly eventBus?: EventBus;
}

/**
 * Single-pass stream of CSV records for a half-open row range of a bound table.
 *
 * Rows are generated lazily, `batchSize` at a time, only when the consumer
 * pulls the next chunk. A range end of `0` reads to the end of the table, or
 * forever when the table is unbounded.
 */
export class CsvRowStream implements AsyncIterable<string> {
  private readonly resolved: ResolvedGenerator;
  private readonly start: number;
  private readonly end: number | undefined;
  private readonly batchSize: number;
  private readonly encoder: CsvRowEncoder;
  private readonly eventBus: EventBus | undefined;
  private consumed = false;

  constructor(resolved: ResolvedGenerator, rowRangeBegin: number, rowRangeEnd: number, options?: CsvRowStreamOptions) {
    const batchSize = options?.batchSize ?? 100;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error(`CsvRowStream: batchSize must be a positive integer, got ${String(batchSize)}`);
    }

    const rowCount = resolved.table.rowCount;
    const requestedEnd = rowRangeEnd === UNBOUNDED_ROW_END ? rowCount : rowRangeEnd;

    this.resolved = resolved;
    this.end = requestedEnd !== undefined && rowCount !== undefined ? Math.min(requestedEnd, rowCount) : requestedEnd;
    this.start = this.end !== undefined ? Math.min(rowRangeBegin, this.end) : rowRangeBegin;
    this.batchSize = batchSize;
    this.encoder = options?.encoder ?? new CsvRowEncoder();
    this.eventBus = options?.eventBus;
  }

  /** Half-open range of row indices this stream produces. `end` is `undefined` when unbounded. */
  get range(): { readonly start: number; readonly end: number | undefined } {
    return { start: this.start, end: this.end };
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return this.generate();
  }

  /** Expose the records as a Node.js byte stream. Destroying it stops row generation. */
  toReadable(): Readable {
    return Readable.from(this, { objectMode: false });
  }

  private async *generate(): AsyncGenerator<string> {
    if (this.consumed) {
      throw new Error('CsvRowStream: stream has already been consumed. Open a new stream to read the rows again.');
    }
    this.consumed = true;

    const { table, meta } = this.resolved;
    this.emit({
      type: 'read:started',
      generator: meta.name,
      table: table.name,
      rowStart: this.start,
      rowEnd: this.end,
      timestamp: Date.now(),
    });

    let rowCount = 0;
    let byteCount = 0;
    let completed = false;

    try {
      for (let cursor = this.start; this.end === undefined || cursor < this.end; ) {
        const batchEnd = this.end === undefined ? cursor + this.batchSize : Math.min(cursor + this.batchSize, this.end);
        const rows: Row[] = [];
        for (let index = cursor; index < batchEnd; index++) {
          rows.push(table.row(index));
        }
        cursor = batchEnd;

        const chunk = this.encoder.encode(rows);
        rowCount += rows.length;
        byteCount += Buffer.byteLength(chunk);
        yield chunk;
      }
      completed = true;
    } finally {
      this.emit(
        completed
          ? { type: 'read:completed', generator: meta.name, table: table.name, rowCount, byteCount, timestamp: Date.now() }
          : { type: 'read:aborted', generator: meta.name, table: table.name, rowCount, timestamp: Date.now() },
      );
    }
  }

  private emit(event: DomainEvent): void {
    this.eventBus?.emit(event);
  }
}
