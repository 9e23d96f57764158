/**
 * Shared report rows for tests
 */

import { REPORT_COLUMNS, REPORT_SCHEMA } from './report';

export const BASE_ROW: Record<string, string> = {
  ref_name: 'ref1',
  ref_type: 'non_coding',
  flag: '27',
  reads: '10',
  cluster: 'cluster1',
  ref_len: '1000',
  ref_base_assembled: '900',
  pc_ident: '99.5',
  ctg: 'ctg1',
  ctg_len: '1100',
  ctg_cov: '20.3',
  known_var: '1',
  var_type: 'SNP',
  var_seq_type: 'n',
  known_var_change: 'A42T',
  has_known_var: '1',
  ref_ctg_change: 'A42T',
  ref_ctg_effect: 'SNP',
  ref_start: '42',
  ref_end: '42',
  ref_nt: 'A',
  ctg_start: '52',
  ctg_end: '52',
  ctg_nt: 'T',
  smtls_total_depth: '20',
  smtls_alt_nt: 'T',
  smtls_alt_depth: '18',
  var_description: 'test_variant',
  free_text: 'note',
};

/** A tab-separated default-schema line with some columns replaced */
export function reportLine(overrides: Record<string, string> = {}): string {
  const row = { ...BASE_ROW, ...overrides };
  return REPORT_COLUMNS.map(column => row[column]).join('\t');
}

export function reportText(rows: Record<string, string>[]): string {
  return [REPORT_SCHEMA.header, ...rows.map(reportLine)].join('\n') + '\n';
}
