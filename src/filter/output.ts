/**
 * Report serializers: TSV text and spreadsheet workbook
 *
 * Both walk the collection by reference name then contig name (lexicographic)
 * and write records in stored order.
 */

import { writeFileSync } from 'fs';
import * as XLSX from 'xlsx';
import { REPORT_SHEET_NAME } from '../constants';
import { formatReportLine, REPORT_SCHEMA, type ReportCollection, type ReportSchema } from '../report';

export function formatReportTsv(collection: ReportCollection, schema: ReportSchema = REPORT_SCHEMA): string {
  const lines = [schema.header, ...collection.records().map(formatReportLine)];
  return lines.join('\n') + '\n';
}

export function writeReportTsv(
  collection: ReportCollection,
  outputPath: string,
  schema: ReportSchema = REPORT_SCHEMA
): void {
  writeFileSync(outputPath, formatReportTsv(collection, schema));
  console.log(`Exported to ${outputPath}`);
}

/**
 * One sheet: header row of column names, then one row of strings per record
 */
export function buildReportWorkbook(
  collection: ReportCollection,
  schema: ReportSchema = REPORT_SCHEMA
): XLSX.WorkBook {
  const rows: string[][] = [[...schema.columns], ...collection.records().map(r => r.values())];
  const worksheet = XLSX.utils.aoa_to_sheet(rows);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, REPORT_SHEET_NAME);
  return workbook;
}

export function writeReportXls(
  collection: ReportCollection,
  outputPath: string,
  schema: ReportSchema = REPORT_SCHEMA
): void {
  const workbook = buildReportWorkbook(collection, schema);
  // OOXML workbook under the .xls name; WTF throws on any format limit
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx', WTF: true });
  writeFileSync(outputPath, data);
  console.log(`Exported to ${outputPath}`);
}
