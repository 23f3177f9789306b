import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { createProgram, parseBatchSize } from '../../../src/cli/program.js';
import { GeneratorRegistry } from '../../../src/infrastructure/registry/GeneratorRegistry.js';
import { createCollector, createPlainMeta, createTable } from '../../helpers/fixtures.js';

describe('workload-storage CLI', () => {
  describe('read', () => {
    it('should write the CSV rows to stdout', async () => {
      const out = createCollector();

      await createProgram({ stdout: out.stream }).parseAsync(
        ['read', 'workload:///csv/sequence/numbers?version=1.0.0&row-start=2&row-end=5'],
        { from: 'user' },
      );

      expect(out.text()).toBe('2,4,even\n3,9,odd\n4,16,even\n');
    });

    it('should accept a batch size', async () => {
      const out = createCollector();

      await createProgram({ stdout: out.stream }).parseAsync(
        ['read', '--batch-size', '2', '/csv/sequence/numbers?version=1.0.0&row-end=3'],
        { from: 'user' },
      );

      expect(out.text()).toBe('0,0,even\n1,1,odd\n2,4,even\n');
    });

    it('should reject with the storage error', async () => {
      const out = createCollector();

      await expect(
        createProgram({ stdout: out.stream }).parseAsync(['read', '/csv/sequence/numbers?version=2'], {
          from: 'user',
        }),
      ).rejects.toMatchObject({ code: 'VERSION_MISMATCH' });
      expect(out.text()).toBe('');
    });
  });

  describe('generators', () => {
    it('should list the built-in generators', async () => {
      const out = createCollector();

      await createProgram({ stdout: out.stream }).parseAsync(['generators'], { from: 'user' });

      expect(out.text()).toBe(
        'bank\t1.0.0\tBank accounts with seeded random balances and payloads\n' +
          'sequence\t1.0.0\tUnbounded sequence of integers with their squares\n',
      );
    });

    it('should list a custom registry', async () => {
      const out = createCollector();
      const registry = new GeneratorRegistry().register(createPlainMeta('tiny', '0.1', [createTable('items', 1)]));

      await createProgram({ stdout: out.stream, registry }).parseAsync(['generators'], { from: 'user' });

      expect(out.text()).toBe('tiny\t0.1\ttiny test generator\n');
    });
  });

  describe('parseBatchSize()', () => {
    it('should parse positive integers', () => {
      expect(parseBatchSize('25')).toBe(25);
    });

    it.each(['0', '-3', 'many', '2.5'])('should reject %j', (value) => {
      expect(() => parseBatchSize(value)).toThrow(InvalidArgumentError);
    });
  });
});
