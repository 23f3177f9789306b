import type { GenerationRequest } from '../../domain/model/GenerationRequest.js';
import type { Generator, GeneratorMeta, Table } from '../../domain/ports/Generator.js';
import type { GeneratorLookup } from '../../domain/ports/GeneratorLookup.js';
import { isFlagConfigurable } from '../../domain/ports/Generator.js';
import { WorkloadStorageError } from '../../domain/model/WorkloadStorageError.js';

/** A configured generator bound to one table. Never mutated after binding. */
export interface ResolvedGenerator {
  readonly request: GenerationRequest;
  readonly meta: GeneratorMeta;
  readonly generator: Generator;
  readonly table: Table;
}

/**
 * Use case: resolve the generator a request names and bind it to its table.
 *
 * The version check runs before the generator is constructed so that no
 * instance of a different version ever produces data for the request.
 */
export class BindGenerator {
  constructor(private readonly lookup: GeneratorLookup) {}

  execute(request: GenerationRequest): ResolvedGenerator {
    const meta = this.lookup.get(request.generatorName);
    if (!meta) {
      throw new WorkloadStorageError('UNKNOWN_GENERATOR', `unknown generator: ${request.generatorName}`, {
        generator: request.generatorName,
      });
    }

    if (meta.version !== request.generatorVersion) {
      throw new WorkloadStorageError(
        'VERSION_MISMATCH',
        `expected ${meta.name} version "${request.generatorVersion}" but got "${meta.version}"`,
        { generator: meta.name, expected: request.generatorVersion, actual: meta.version },
      );
    }

    const generator = meta.create();
    if (isFlagConfigurable(generator)) {
      try {
        generator.flags.parse(request.extraFlags);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new WorkloadStorageError(
          'INVALID_FLAGS',
          `parsing parameters ${request.extraFlags.join(' ')}: ${reason}`,
          { generator: meta.name, flags: request.extraFlags },
          { cause: error },
        );
      }
    }

    const table = generator.tables().find((t) => t.name === request.tableName);
    if (!table) {
      throw new WorkloadStorageError(
        'UNKNOWN_TABLE',
        `unknown table ${request.tableName} for generator ${meta.name}`,
        { generator: meta.name, table: request.tableName },
      );
    }

    return Object.freeze({ request, meta, generator, table });
  }
}
