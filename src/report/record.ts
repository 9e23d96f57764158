/**
 * Report record model: one row of the report, plus line parsing and formatting
 */

import { SENTINEL } from '../constants';
import { ReportCoercionError, ReportSchemaError } from '../errors';
import { Flag } from './flag';
import { columnIndex, type ReportSchema } from './schema';

export type ReportValue = string | number | Flag;

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Immutable report row. Values are stored in schema column order.
 */
export class ReportRecord {
  constructor(
    readonly schema: ReportSchema,
    private readonly fields: readonly ReportValue[]
  ) {
    if (fields.length !== schema.columns.length) {
      throw new ReportSchemaError(
        `Expected ${schema.columns.length} columns but got ${fields.length}`,
        { context: { expected: schema.columns.length, actual: fields.length } }
      );
    }
  }

  get(column: string): ReportValue {
    return this.fields[columnIndex(this.schema, column)];
  }

  /** Numeric value of a column, or undefined when it holds the sentinel */
  numeric(column: string): number | undefined {
    const value = this.get(column);
    return typeof value === 'number' ? value : undefined;
  }

  get refName(): string {
    return String(this.get(this.schema.keys.refName));
  }

  get contigName(): string {
    return String(this.get(this.schema.keys.contigName));
  }

  get flag(): Flag {
    const value = this.get(this.schema.keys.flag);
    if (!(value instanceof Flag)) {
      throw new ReportSchemaError(`Column "${this.schema.keys.flag}" does not hold a flag`);
    }
    return value;
  }

  get pcIdent(): number | undefined {
    return this.numeric(this.schema.keys.pcIdent);
  }

  get refBaseAssembled(): number | undefined {
    return this.numeric(this.schema.keys.refBaseAssembled);
  }

  get hasKnownVar(): string {
    return String(this.get(this.schema.keys.hasKnownVar));
  }

  /**
   * Copy of this record with every variant column set to the sentinel
   */
  demote(): ReportRecord {
    const fields = this.schema.columns.map((column, i) =>
      this.schema.variantColumns.has(column) ? SENTINEL : this.fields[i]
    );
    return new ReportRecord(this.schema, fields);
  }

  /** Field values rendered as strings, in column order */
  values(): string[] {
    return this.schema.columns.map((column, i) => formatValue(this.schema, column, this.fields[i]));
  }

  toObject(): Record<string, string> {
    const values = this.values();
    return Object.fromEntries(this.schema.columns.map((column, i) => [column, values[i]]));
  }
}

function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * String form of a single field, as written to both outputs
 */
export function formatValue(schema: ReportSchema, column: string, value: ReportValue): string {
  if (typeof value === 'number' && schema.floatColumns.has(column)) {
    return formatFloat(value);
  }
  return String(value);
}

function coerceInt(column: string, value: string): number | typeof SENTINEL {
  if (value === SENTINEL) return SENTINEL;
  if (!INT_PATTERN.test(value) || !Number.isSafeInteger(Number(value))) {
    throw new ReportCoercionError(column, value, 'integer');
  }
  return Number(value);
}

function coerceFloat(column: string, value: string): number | typeof SENTINEL {
  if (value === SENTINEL) return SENTINEL;
  if (!FLOAT_PATTERN.test(value)) {
    throw new ReportCoercionError(column, value, 'float');
  }
  return Number(value);
}

function parseFlag(column: string, value: string): Flag {
  if (!INT_PATTERN.test(value)) {
    throw new ReportCoercionError(column, value, 'integer');
  }
  try {
    return new Flag(Number(value));
  } catch {
    throw new ReportCoercionError(column, value, 'integer');
  }
}

/**
 * Parse one tab-separated report line (without line ending) into a record
 */
export function parseReportLine(line: string, schema: ReportSchema, lineNumber?: number): ReportRecord {
  const data = line.split('\t');

  if (data.length !== schema.columns.length) {
    const where = lineNumber !== undefined ? ` at line ${lineNumber}` : '';
    throw new ReportSchemaError(
      `Error reading report file. Expected ${schema.columns.length} columns but got ${data.length} columns${where}:\n${line}`,
      { lineNumber, context: { expected: schema.columns.length, actual: data.length } }
    );
  }

  try {
    const fields = schema.columns.map((column, i): ReportValue => {
      const raw = data[i];
      if (column === schema.keys.flag) return parseFlag(column, raw);
      if (schema.intColumns.has(column)) return coerceInt(column, raw);
      if (schema.floatColumns.has(column)) return coerceFloat(column, raw);
      return raw;
    });
    return new ReportRecord(schema, fields);
  } catch (error) {
    if (error instanceof ReportCoercionError && lineNumber !== undefined) {
      throw error.atLine(lineNumber);
    }
    throw error;
  }
}

export function formatReportLine(record: ReportRecord): string {
  return record.values().join('\t');
}
