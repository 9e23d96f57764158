/**
 * Configuration constants
 */

// Marks a value as absent/inapplicable (skips numeric coercion, written on demotion)
export const SENTINEL = '.' as const;

// Default essential thresholds
export const DEFAULT_MIN_PC_IDENT = 90;
export const DEFAULT_MIN_REF_BASE_ASSEMBLED = 1;

// Records whose flag has any of these bits fail the essential filters
export const DEFAULT_EXCLUDE_FLAGS = ['assembly_fail', 'ref_seq_choose_fail'] as const;

// Non-essential filter: require has_known_var == "1"
export const DEFAULT_REQUIRE_KNOWN_VARIANT = true;

// Sheet name used in the spreadsheet export
export const REPORT_SHEET_NAME = 'report';

// Output file extensions appended to the output prefix
export const XLS_EXTENSION = '.xls';
export const TSV_EXTENSION = '.tsv';
