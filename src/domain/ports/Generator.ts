/** A single generated value. `null` renders as `NULL` in CSV output. */
export type Datum = string | number | bigint | boolean | null;

/** One generated record, in column order. */
export type Row = readonly Datum[];

/**
 * A named dataset exposed by a generator.
 *
 * `row()` must be a pure function of the index once the owning generator has
 * been configured: the same index always yields the same row, and calls may
 * happen in any order from any number of concurrent streams.
 */
export interface Table {
  readonly name: string;
  readonly columns: readonly string[];
  /** Total number of rows, or `undefined` when the table is unbounded. */
  readonly rowCount: number | undefined;
  row(index: number): Row;
}

/** Parses generator flags against the generator's own flag schema. */
export interface FlagParser {
  /** Apply `--key=value` flags. Throws when a flag is unknown or its value is rejected. */
  parse(args: readonly string[]): void;
}

/** Registry-facing description of a generator. */
export interface GeneratorMeta {
  readonly name: string;
  /** Canonical version. Different versions may produce different rows. */
  readonly version: string;
  readonly description: string;
  /** Construct a fresh, unconfigured generator instance. */
  create(): Generator;
}

/** A live generator instance owning zero or more tables. */
export interface Generator {
  readonly meta: GeneratorMeta;
  tables(): readonly Table[];
  /** Present only on generators that accept configuration flags. */
  readonly flags?: FlagParser;
}

/** A generator that exposes a flag schema. */
export type FlagConfigurableGenerator = Generator & { readonly flags: FlagParser };

/** Capability query: does this generator accept configuration flags? */
export function isFlagConfigurable(generator: Generator): generator is FlagConfigurableGenerator {
  return generator.flags !== undefined;
}
