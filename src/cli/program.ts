import type { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { Command, InvalidArgumentError } from 'commander';
import type { GeneratorLookup } from '../domain/ports/GeneratorLookup.js';
import { WorkloadStorage } from '../WorkloadStorage.js';
import { createDefaultRegistry } from '../infrastructure/registry/GeneratorRegistry.js';

export interface ProgramOptions {
  readonly stdout: Writable;
  readonly registry?: GeneratorLookup;
}

interface ReadOptions {
  batchSize: number;
}

export function parseBatchSize(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || parsed < 1) {
    throw new InvalidArgumentError('Batch size must be a positive integer.');
  }
  return parsed;
}

/** Build the `workload-storage` command line program. */
export function createProgram(options: ProgramOptions): Command {
  const registry = options.registry ?? createDefaultRegistry();
  const program = new Command();

  program
    .name('workload-storage')
    .description('Stream deterministic synthetic table data as CSV')
    .version('0.1.0');

  program
    .command('read')
    .description('Write the CSV rows a workload URI describes to stdout')
    .argument('<uri>', 'workload:///<format>/<generator>/<table>?version=<v>[&row-start=<n>][&row-end=<m>][&<flag>=<value>]')
    .option('-b, --batch-size <n>', 'Rows generated per chunk', parseBatchSize, 100)
    .action(async (uri: string, readOptions: ReadOptions) => {
      const storage = WorkloadStorage.fromUri(uri, { registry, batchSize: readOptions.batchSize });
      try {
        await pipeline(await storage.readFile(''), options.stdout, { end: false });
      } finally {
        await storage.close();
      }
    });

  program
    .command('generators')
    .description('List the registered generators')
    .action(() => {
      for (const meta of registry.list()) {
        options.stdout.write(`${meta.name}\t${meta.version}\t${meta.description}\n`);
      }
    });

  return program;
}
