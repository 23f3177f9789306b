import type { GeneratorMeta } from './Generator.js';

/** Name-based lookup of registered generators. */
export interface GeneratorLookup {
  get(name: string): GeneratorMeta | undefined;
  list(): readonly GeneratorMeta[];
}
