import type { Generator, GeneratorMeta, Table } from '../../domain/ports/Generator.js';
import { CommanderFlagSet } from '../flags/CommanderFlagSet.js';
import { createRowRng, randomInt, randomString } from './rng.js';

type BankFlags = {
  rows: number;
  seed: number;
  payloadBytes: number;
};

/** Largest balance, in cents, an account starts with. */
export const MAX_INITIAL_BALANCE = 100_000;

class BankGenerator implements Generator {
  readonly meta: GeneratorMeta = bankGenerator;
  readonly flags = new CommanderFlagSet<BankFlags>('bank')
    .integer('rows', 'Initial number of accounts in the accounts table.', 1000)
    .integer('seed', 'Seed for the per-row random generators.', 1)
    .integer('payload-bytes', 'Size of the payload column in each account.', 100);

  tables(): readonly Table[] {
    const { rows, seed, payloadBytes } = this.flags.values();

    return [
      {
        name: 'accounts',
        columns: ['id', 'balance', 'payload'],
        rowCount: rows,
        row: (index) => {
          const rng = createRowRng(seed, index);
          return [index, randomInt(rng, 0, MAX_INITIAL_BALANCE), randomString(rng, payloadBytes)];
        },
      },
    ];
  }
}

/** Accounts with random starting balances. Configurable through `--rows`, `--seed` and `--payload-bytes`. */
export const bankGenerator: GeneratorMeta = {
  name: 'bank',
  version: '1.0.0',
  description: 'Bank accounts with seeded random balances and payloads',
  create: () => new BankGenerator(),
};
