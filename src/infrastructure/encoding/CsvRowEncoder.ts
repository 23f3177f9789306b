import Papa from 'papaparse';
import type { Datum, Row } from '../../domain/ports/Generator.js';

export interface CsvRowEncoderOptions {
  /** Field delimiter. Default: `','`. */
  readonly delimiter?: string;
  /** Text written for `null` values. Default: `'NULL'`. */
  readonly nullString?: string;
}

/** Encodes generated rows as CSV records, each terminated by `\n`. No header line is written. */
export class CsvRowEncoder {
  private readonly delimiter: string;
  private readonly nullString: string;

  constructor(options?: CsvRowEncoderOptions) {
    this.delimiter = options?.delimiter ?? ',';
    this.nullString = options?.nullString ?? 'NULL';
  }

  encode(rows: readonly Row[]): string {
    if (rows.length === 0) return '';

    const data = rows.map((row) => row.map((datum) => this.toField(datum)));
    const body = Papa.unparse(data, {
      delimiter: this.delimiter,
      newline: '\n',
      quoteChar: '"',
      header: false,
    });

    return `${body}\n`;
  }

  private toField(datum: Datum): string {
    if (datum === null) return this.nullString;
    return typeof datum === 'string' ? datum : String(datum);
  }
}
