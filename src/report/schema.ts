/**
 * Report column schema
 *
 * One immutable object describes the column layout shared by the line parser,
 * the filters and both serializers.
 */

import { ConfigError, ReportSchemaError } from '../errors';

export interface ReportSchemaKeys {
  refName: string;
  contigName: string;
  flag: string;
  pcIdent: string;
  refBaseAssembled: string;
  hasKnownVar: string;
}

export interface ReportSchemaDefinition {
  columns: readonly string[];
  intColumns: readonly string[];
  floatColumns: readonly string[];
  /** Columns overwritten with the sentinel when a record is demoted */
  variantColumns: readonly string[];
  keys?: Partial<ReportSchemaKeys>;
}

export interface ReportSchema {
  readonly columns: readonly string[];
  readonly intColumns: ReadonlySet<string>;
  readonly floatColumns: ReadonlySet<string>;
  readonly variantColumns: ReadonlySet<string>;
  readonly keys: Readonly<ReportSchemaKeys>;
  /** Header line, without trailing newline */
  readonly header: string;
  readonly indexOf: ReadonlyMap<string, number>;
}

const DEFAULT_KEYS: ReportSchemaKeys = {
  refName: 'ref_name',
  contigName: 'ctg',
  flag: 'flag',
  pcIdent: 'pc_ident',
  refBaseAssembled: 'ref_base_assembled',
  hasKnownVar: 'has_known_var',
};

export function defineReportSchema(definition: ReportSchemaDefinition): ReportSchema {
  const indexOf = new Map<string, number>();
  definition.columns.forEach((column, i) => {
    if (indexOf.has(column)) {
      throw new ConfigError(`Duplicate report column: ${column}`, { column });
    }
    indexOf.set(column, i);
  });

  const keys: ReportSchemaKeys = { ...DEFAULT_KEYS, ...definition.keys };
  const named = [
    ...definition.intColumns,
    ...definition.floatColumns,
    ...definition.variantColumns,
    ...Object.values(keys),
  ];
  const missing = named.filter(column => !indexOf.has(column));
  if (missing.length > 0) {
    throw new ConfigError(`Schema names columns that are not in the column list: ${missing.join(', ')}`, {
      missing,
    });
  }

  for (const numeric of [keys.pcIdent, keys.refBaseAssembled]) {
    if (!definition.intColumns.includes(numeric) && !definition.floatColumns.includes(numeric)) {
      throw new ConfigError(`Schema key column "${numeric}" must be an integer or float column`, { column: numeric });
    }
  }

  return Object.freeze({
    columns: Object.freeze([...definition.columns]),
    intColumns: new Set(definition.intColumns),
    floatColumns: new Set(definition.floatColumns),
    variantColumns: new Set(definition.variantColumns),
    keys: Object.freeze(keys),
    header: '#' + definition.columns.join('\t'),
    indexOf,
  });
}

/**
 * Position of a column in the schema; unknown names are a schema error
 */
export function columnIndex(schema: ReportSchema, column: string): number {
  const index = schema.indexOf.get(column);
  if (index === undefined) {
    throw new ReportSchemaError(`Unknown report column: ${column}`, { context: { column } });
  }
  return index;
}

// ============ Default Report Layout ============

export const REPORT_COLUMNS = [
  'ref_name',
  'ref_type',
  'flag',
  'reads',
  'cluster',
  'ref_len',
  'ref_base_assembled',
  'pc_ident',
  'ctg',
  'ctg_len',
  'ctg_cov',
  'known_var',
  'var_type',
  'var_seq_type',
  'known_var_change',
  'has_known_var',
  'ref_ctg_change',
  'ref_ctg_effect',
  'ref_start',
  'ref_end',
  'ref_nt',
  'ctg_start',
  'ctg_end',
  'ctg_nt',
  'smtls_total_depth',
  'smtls_alt_nt',
  'smtls_alt_depth',
  'var_description',
  'free_text',
] as const;

export const REPORT_INT_COLUMNS = [
  'reads',
  'ref_len',
  'ref_base_assembled',
  'ctg_len',
  'ref_start',
  'ref_end',
  'ctg_start',
  'ctg_end',
] as const;

export const REPORT_FLOAT_COLUMNS = ['pc_ident', 'ctg_cov'] as const;

export const REPORT_VARIANT_COLUMNS = [
  'known_var',
  'var_type',
  'var_seq_type',
  'known_var_change',
  'has_known_var',
  'ref_ctg_change',
  'ref_ctg_effect',
  'ref_start',
  'ref_end',
  'ref_nt',
  'ctg_start',
  'ctg_end',
  'ctg_nt',
  'smtls_total_depth',
  'smtls_alt_nt',
  'smtls_alt_depth',
  'var_description',
] as const;

export const REPORT_SCHEMA: ReportSchema = defineReportSchema({
  columns: REPORT_COLUMNS,
  intColumns: REPORT_INT_COLUMNS,
  floatColumns: REPORT_FLOAT_COLUMNS,
  variantColumns: REPORT_VARIANT_COLUMNS,
});
