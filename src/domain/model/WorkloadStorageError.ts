/** Machine-readable codes for every failure the workload storage can report. */
export type WorkloadStorageErrorCode =
  | 'MALFORMED_PATH'
  | 'MISSING_VERSION'
  | 'BAD_ROW_BOUND'
  | 'UNSUPPORTED_FORMAT'
  | 'UNKNOWN_GENERATOR'
  | 'VERSION_MISMATCH'
  | 'INVALID_FLAGS'
  | 'UNKNOWN_TABLE'
  | 'NOT_IMPLEMENTED'
  | 'OPERATION_NOT_SUPPORTED'
  | 'UNEXPECTED_BASENAME';

/** Phase in which an error was raised. */
export type ErrorCategory = 'CONFIGURATION' | 'BINDING' | 'OPERATION';

/** Storage operations that a read-only workload file rejects. */
export type UnsupportedOperation = 'write' | 'list' | 'delete' | 'size';

/** Structured data attached to each error code. */
export interface ErrorDetailsByCode {
  readonly MALFORMED_PATH: { readonly path: string };
  readonly MISSING_VERSION: { readonly uri: string };
  readonly BAD_ROW_BOUND: { readonly parameter: 'row-start' | 'row-end'; readonly value: string };
  readonly UNSUPPORTED_FORMAT: { readonly format: string };
  readonly UNKNOWN_GENERATOR: { readonly generator: string };
  readonly VERSION_MISMATCH: { readonly generator: string; readonly expected: string; readonly actual: string };
  readonly INVALID_FLAGS: { readonly generator: string; readonly flags: readonly string[] };
  readonly UNKNOWN_TABLE: { readonly generator: string; readonly table: string };
  readonly NOT_IMPLEMENTED: { readonly operation: string };
  readonly OPERATION_NOT_SUPPORTED: { readonly operation: UnsupportedOperation };
  readonly UNEXPECTED_BASENAME: { readonly basename: string };
}

const CATEGORY_BY_CODE = {
  MALFORMED_PATH: 'CONFIGURATION',
  MISSING_VERSION: 'CONFIGURATION',
  BAD_ROW_BOUND: 'CONFIGURATION',
  UNSUPPORTED_FORMAT: 'CONFIGURATION',
  UNKNOWN_GENERATOR: 'BINDING',
  VERSION_MISMATCH: 'BINDING',
  INVALID_FLAGS: 'BINDING',
  UNKNOWN_TABLE: 'BINDING',
  NOT_IMPLEMENTED: 'OPERATION',
  OPERATION_NOT_SUPPORTED: 'OPERATION',
  UNEXPECTED_BASENAME: 'OPERATION',
} as const satisfies Record<WorkloadStorageErrorCode, ErrorCategory>;

/**
 * Failure raised while parsing, binding or operating on a workload storage.
 *
 * Every failure is a deterministic function of the request, so none is
 * transient: retrying without changing the request yields the same error.
 */
export class WorkloadStorageError<C extends WorkloadStorageErrorCode = WorkloadStorageErrorCode> extends Error {
  readonly code: C;
  readonly category: ErrorCategory;
  readonly details: ErrorDetailsByCode[C];

  constructor(code: C, message: string, details: ErrorDetailsByCode[C], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkloadStorageError';
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
    this.details = details;
  }
}

/** Type guard for {@link WorkloadStorageError}, optionally narrowed to one code. */
export function isWorkloadStorageError<C extends WorkloadStorageErrorCode = WorkloadStorageErrorCode>(
  error: unknown,
  code?: C,
): error is WorkloadStorageError<C> {
  return error instanceof WorkloadStorageError && (code === undefined || error.code === code);
}
