import type { Generator, GeneratorMeta, Table } from '../../domain/ports/Generator.js';

const numbers: Table = {
  name: 'numbers',
  columns: ['n', 'square', 'parity'],
  rowCount: undefined,
  row: (index) => [index, BigInt(index) * BigInt(index), index % 2 === 0 ? 'even' : 'odd'],
};

class SequenceGenerator implements Generator {
  readonly meta: GeneratorMeta = sequenceGenerator;

  tables(): readonly Table[] {
    return [numbers];
  }
}

/** Unbounded table of natural numbers. Takes no flags. */
export const sequenceGenerator: GeneratorMeta = {
  name: 'sequence',
  version: '1.0.0',
  description: 'Unbounded sequence of integers with their squares',
  create: () => new SequenceGenerator(),
};
