/** Output formats a workload file can be rendered in. */
export type WorkloadFormat = 'csv';

/** Fully validated, versioned request for a slice of generated table data. */
export interface GenerationRequest {
  readonly format: WorkloadFormat;
  readonly generatorName: string;
  /** Exact version string the generator must report. Never normalized. */
  readonly generatorVersion: string;
  readonly tableName: string;
  /** First row index to produce. */
  readonly rowRangeBegin: number;
  /** Exclusive end of the row range. `0` means the range is unbounded. */
  readonly rowRangeEnd: number;
  /** Generator flags in `--key=value` form. Order is only stable within a key. */
  readonly extraFlags: readonly string[];
}

/** Provider-tagged configuration reported back by a storage adapter. */
export interface StorageConf {
  readonly provider: 'workload';
  readonly workloadConfig: GenerationRequest;
}

/** Sentinel for an open-ended row range. */
export const UNBOUNDED_ROW_END = 0;

export function createGenerationRequest(fields: GenerationRequest): GenerationRequest {
  return Object.freeze({ ...fields, extraFlags: Object.freeze([...fields.extraFlags]) });
}
