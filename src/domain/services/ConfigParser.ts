import type { GenerationRequest, WorkloadFormat } from '../model/GenerationRequest.js';
import { createGenerationRequest } from '../model/GenerationRequest.js';
import { WorkloadStorageError } from '../model/WorkloadStorageError.js';

/** Base that bare `/format/generator/table?...` descriptors are resolved against. */
export const WORKLOAD_URI_BASE = 'workload:///';

const SUPPORTED_FORMATS: readonly WorkloadFormat[] = ['csv'];
const RESERVED_PARAMS = new Set(['version', 'row-start', 'row-end']);
const SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:/;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTER = /[\x00-\x1f\x7f]/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Parse a workload descriptor into a validated generation request.
 *
 * Accepts `workload:///<format>/<generator>/<table>?version=<v>[&row-start=<n>][&row-end=<m>][&<flag>=<value>...]`
 * or the same without scheme. Any query key other than `version`, `row-start`
 * and `row-end` becomes a `--key=value` generator flag.
 */
export function parseWorkloadConfig(uri: string | URL): GenerationRequest {
  const url = toUrl(uri);
  const [rawFormat, generatorName, tableName] = splitPath(rawPath(uri));

  const params = url.searchParams;
  const version = params.get('version');
  if (version === null) {
    throw new WorkloadStorageError('MISSING_VERSION', 'parameter version is required', { uri: url.href });
  }

  const rowRangeBegin = parseRowBound(params, 'row-start');
  const rowRangeEnd = parseRowBound(params, 'row-end');
  if (rowRangeEnd !== 0 && rowRangeEnd < rowRangeBegin) {
    throw new WorkloadStorageError(
      'BAD_ROW_BOUND',
      `row-end ${String(rowRangeEnd)} is before row-start ${String(rowRangeBegin)}`,
      { parameter: 'row-end', value: String(rowRangeEnd) },
    );
  }

  return createGenerationRequest({
    format: parseFormat(rawFormat),
    generatorName,
    generatorVersion: version,
    tableName,
    rowRangeBegin,
    rowRangeEnd,
    extraFlags: collectFlags(params),
  });
}

/** Build the canonical descriptor for a request. Parsing it yields the same request. */
export function formatWorkloadUri(request: GenerationRequest): string {
  const params = new URLSearchParams();
  params.append('version', request.generatorVersion);
  params.append('row-start', String(request.rowRangeBegin));
  params.append('row-end', String(request.rowRangeEnd));
  for (const flag of request.extraFlags) {
    const [key, value] = splitFlag(flag);
    params.append(key, value);
  }

  const path = [request.format, request.generatorName, request.tableName].map(encodeURIComponent).join('/');
  return `${WORKLOAD_URI_BASE}${path}?${params.toString()}`;
}

function toUrl(uri: string | URL): URL {
  if (uri instanceof URL) return uri;
  if (CONTROL_CHARACTER.test(uri)) {
    const message = `invalid control character in workload URI: ${JSON.stringify(uri)}`;
    throw new WorkloadStorageError('MALFORMED_PATH', message, { path: uri });
  }
  try {
    return new URL(uri, WORKLOAD_URI_BASE);
  } catch (error) {
    throw new WorkloadStorageError('MALFORMED_PATH', `invalid workload URI: ${uri}`, { path: uri }, { cause: error });
  }
}

/**
 * The path exactly as written: after the scheme and authority, before the
 * query or fragment, with `.` and `..` segments left in place.
 */
function rawPath(uri: string | URL): string {
  const text = uri instanceof URL ? uri.href : uri;
  const queryStart = text.search(/[?#]/);
  let path = (queryStart === -1 ? text : text.slice(0, queryStart)).replace(SCHEME_PATTERN, '');
  if (path.startsWith('//')) {
    const slash = path.indexOf('/', 2);
    path = slash === -1 ? '' : path.slice(slash);
  }
  return path;
}

function splitPath(path: string): [string, string, string] {
  const segments = decodePath(path).replace(/^\/+|\/+$/g, '').split('/');

  const [format, generator, table] = segments;
  if (segments.length !== 3 || !format || !generator || !table) {
    throw new WorkloadStorageError(
      'MALFORMED_PATH',
      `path must be of the form /<format>/<generator>/<table>: ${path}`,
      { path },
    );
  }

  return [format, generator, table];
}

function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch (error) {
    throw new WorkloadStorageError(
      'MALFORMED_PATH',
      `path is not valid percent-encoding: ${path}`,
      { path },
      { cause: error },
    );
  }
}

function parseFormat(format: string): WorkloadFormat {
  const lower = format.toLowerCase();
  const match = SUPPORTED_FORMATS.find((supported) => supported === lower);
  if (!match) {
    throw new WorkloadStorageError('UNSUPPORTED_FORMAT', `unsupported format: ${format}`, { format });
  }
  return match;
}

function parseRowBound(params: URLSearchParams, parameter: 'row-start' | 'row-end'): number {
  const raw = params.get(parameter);
  // An empty value counts as absent.
  if (raw === null || raw.length === 0) return 0;

  const fail = (reason: string): WorkloadStorageError<'BAD_ROW_BOUND'> =>
    new WorkloadStorageError('BAD_ROW_BOUND', `${parameter} ${reason}: "${raw}"`, { parameter, value: raw });

  if (!INTEGER_PATTERN.test(raw)) throw fail('must be a base-10 integer');

  const value = BigInt(raw);
  if (value < INT64_MIN || value > INT64_MAX) throw fail('is out of the 64-bit integer range');
  if (value < 0n) throw fail('must not be negative');
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw fail('exceeds the largest addressable row');

  return Number(value);
}

function collectFlags(params: URLSearchParams): string[] {
  const keys: string[] = [];
  for (const key of params.keys()) {
    if (!RESERVED_PARAMS.has(key) && !keys.includes(key)) {
      keys.push(key);
    }
  }

  return keys.flatMap((key) => params.getAll(key).map((value) => `--${key}=${value}`));
}

function splitFlag(flag: string): [string, string] {
  const body = flag.startsWith('--') ? flag.slice(2) : flag;
  const eq = body.indexOf('=');
  return eq === -1 ? [body, ''] : [body.slice(0, eq), body.slice(eq + 1)];
}
