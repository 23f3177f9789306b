import type { GeneratorMeta } from '../../domain/ports/Generator.js';
import type { GeneratorLookup } from '../../domain/ports/GeneratorLookup.js';
import { bankGenerator } from '../generators/BankGenerator.js';
import { sequenceGenerator } from '../generators/SequenceGenerator.js';

/** In-memory registry of generators, keyed by name. */
export class GeneratorRegistry implements GeneratorLookup {
  private readonly generators = new Map<string, GeneratorMeta>();

  register(meta: GeneratorMeta): this {
    if (this.generators.has(meta.name)) {
      throw new Error(`GeneratorRegistry: generator "${meta.name}" is already registered`);
    }
    this.generators.set(meta.name, meta);
    return this;
  }

  get(name: string): GeneratorMeta | undefined {
    return this.generators.get(name);
  }

  /** All registered generators, sorted by name. */
  list(): readonly GeneratorMeta[] {
    return [...this.generators.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}

/** Registry holding the built-in generators. */
export function createDefaultRegistry(): GeneratorRegistry {
  return new GeneratorRegistry().register(bankGenerator).register(sequenceGenerator);
}
