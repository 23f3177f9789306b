import { describe, it, expect } from 'vitest';
import { bankGenerator, MAX_INITIAL_BALANCE } from '../../../src/infrastructure/generators/BankGenerator.js';
import { sequenceGenerator } from '../../../src/infrastructure/generators/SequenceGenerator.js';
import { isFlagConfigurable } from '../../../src/domain/ports/Generator.js';
import type { Generator, Table } from '../../../src/domain/ports/Generator.js';

function accounts(generator: Generator): Table {
  const table = generator.tables().find((t) => t.name === 'accounts');
  if (!table) throw new Error('accounts table missing');
  return table;
}

function configuredBank(flags: string[]): Generator {
  const generator = bankGenerator.create();
  if (!isFlagConfigurable(generator)) throw new Error('bank should accept flags');
  generator.flags.parse(flags);
  return generator;
}

describe('bank generator', () => {
  it('should accept flags', () => {
    expect(isFlagConfigurable(bankGenerator.create())).toBe(true);
  });

  it('should expose an accounts table with default size', () => {
    const table = accounts(bankGenerator.create());

    expect(table.columns).toEqual(['id', 'balance', 'payload']);
    expect(table.rowCount).toBe(1000);
  });

  it('should size the table from --rows', () => {
    expect(accounts(configuredBank(['--rows=25'])).rowCount).toBe(25);
  });

  it('should produce the same row for the same index across instances', () => {
    const first = accounts(bankGenerator.create());
    const second = accounts(bankGenerator.create());

    for (const index of [0, 1, 17, 999]) {
      expect(first.row(index)).toEqual(second.row(index));
    }
  });

  it('should produce the same row regardless of generation order', () => {
    const table = accounts(bankGenerator.create());
    const forward = [0, 1, 2, 3].map((index) => table.row(index));
    const backward = [3, 2, 1, 0].map((index) => table.row(index)).reverse();

    expect(forward).toEqual(backward);
  });

  it('should derive rows from the id, balance range and payload size', () => {
    const table = accounts(configuredBank(['--payload-bytes=12']));
    const [id, balance, payload] = table.row(42);

    expect(id).toBe(42);
    expect(typeof balance).toBe('number');
    expect(balance).toBeGreaterThanOrEqual(0);
    expect(balance).toBeLessThanOrEqual(MAX_INITIAL_BALANCE);
    expect(payload).toMatch(/^[A-Za-z0-9]{12}$/);
  });

  it('should change rows with the seed', () => {
    const seeded = accounts(configuredBank(['--seed=2'])).row(5);
    const defaults = accounts(bankGenerator.create()).row(5);

    expect(seeded[0]).toBe(5);
    expect(seeded[2]).not.toBe(defaults[2]);
  });
});

describe('sequence generator', () => {
  it('should not accept flags', () => {
    expect(isFlagConfigurable(sequenceGenerator.create())).toBe(false);
  });

  it('should expose an unbounded numbers table', () => {
    const [table] = sequenceGenerator.create().tables();

    expect(table?.name).toBe('numbers');
    expect(table?.rowCount).toBeUndefined();
    expect(table?.row(3)).toEqual([3, 9n, 'odd']);
    expect(table?.row(10)).toEqual([10, 100n, 'even']);
  });
});
