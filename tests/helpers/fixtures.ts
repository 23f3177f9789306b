import { Writable } from 'node:stream';
import type { Generator, GeneratorMeta, Row, Table } from '../../src/domain/ports/Generator.js';
import type { ResolvedGenerator } from '../../src/application/usecases/BindGenerator.js';
import { createGenerationRequest } from '../../src/domain/model/GenerationRequest.js';
import { CommanderFlagSet } from '../../src/infrastructure/flags/CommanderFlagSet.js';

export function createTable(name: string, rowCount: number | undefined, row?: (index: number) => Row): Table {
  return {
    name,
    columns: ['id', 'label'],
    rowCount,
    row: row ?? ((index) => [index, `r${String(index)}`]),
  };
}

/** Generator without the flag capability. */
export function createPlainMeta(name: string, version: string, tables: readonly Table[]): GeneratorMeta {
  const meta: GeneratorMeta = {
    name,
    version,
    description: `${name} test generator`,
    create: (): Generator => ({ meta, tables: () => tables }),
  };
  return meta;
}

type WidgetFlags = { widgets: number; color: string };

/** Flag-configurable generator whose `widgets` table has `--widgets` rows. */
export function createWidgetMeta(version = '2.0.0'): GeneratorMeta {
  const meta: GeneratorMeta = {
    name: 'widgets',
    version,
    description: 'widgets test generator',
    create: (): Generator => {
      const flags = new CommanderFlagSet<WidgetFlags>('widgets')
        .integer('widgets', 'Number of widgets.', 3)
        .string('color', 'Widget color.', 'red');
      return {
        meta,
        flags,
        tables: () => {
          const { widgets, color } = flags.values();
          return [createTable('widgets', widgets, (index) => [index, `${color}-${String(index)}`])];
        },
      };
    },
  };
  return meta;
}

export function resolveTable(table: Table): ResolvedGenerator {
  const meta = createPlainMeta('fake', '1', [table]);
  return {
    request: createGenerationRequest({
      format: 'csv',
      generatorName: 'fake',
      generatorVersion: '1',
      tableName: table.name,
      rowRangeBegin: 0,
      rowRangeEnd: 0,
      extraFlags: [],
    }),
    meta,
    generator: meta.create(),
    table,
  };
}

export async function collectChunks(iterable: AsyncIterable<string | Buffer>): Promise<string[]> {
  const chunks: string[] = [];
  for await (const chunk of iterable) {
    chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
  }
  return chunks;
}

export async function collectText(iterable: AsyncIterable<string | Buffer>): Promise<string> {
  return (await collectChunks(iterable)).join('');
}

/** Writable that keeps everything written to it. */
export function createCollector(): { readonly stream: Writable; text(): string } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      callback();
    },
  });
  return { stream, text: () => Buffer.concat(chunks).toString('utf-8') };
}
