import { describe, it, expect } from 'vitest';
import { GeneratorRegistry, createDefaultRegistry } from '../../../src/infrastructure/registry/GeneratorRegistry.js';
import { createPlainMeta, createTable } from '../../helpers/fixtures.js';

describe('GeneratorRegistry', () => {
  it('should look up generators by name', () => {
    const meta = createPlainMeta('alpha', '1', [createTable('t', 1)]);
    const registry = new GeneratorRegistry().register(meta);

    expect(registry.get('alpha')).toBe(meta);
    expect(registry.get('Alpha')).toBeUndefined();
    expect(registry.get('beta')).toBeUndefined();
  });

  it('should list generators sorted by name', () => {
    const registry = new GeneratorRegistry()
      .register(createPlainMeta('zeta', '1', []))
      .register(createPlainMeta('alpha', '1', []))
      .register(createPlainMeta('mu', '1', []));

    expect(registry.list().map((meta) => meta.name)).toEqual(['alpha', 'mu', 'zeta']);
  });

  it('should reject duplicate names', () => {
    const registry = new GeneratorRegistry().register(createPlainMeta('alpha', '1', []));

    expect(() => registry.register(createPlainMeta('alpha', '2', []))).toThrow(
      'GeneratorRegistry: generator "alpha" is already registered',
    );
  });

  it('should ship the built-in generators', () => {
    const registry = createDefaultRegistry();

    expect(registry.list().map((meta) => [meta.name, meta.version])).toEqual([
      ['bank', '1.0.0'],
      ['sequence', '1.0.0'],
    ]);
  });
});
