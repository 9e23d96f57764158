/**
 * Report loading: header-tagged tab-separated text into a ReportCollection
 */

import { readFileSync } from 'fs';
import { gunzipSync } from 'zlib';
import { ReportSchemaError } from '../errors';
import { ReportCollection } from './collection';
import { parseReportLine } from './record';
import { REPORT_SCHEMA, type ReportSchema } from './schema';

function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
  // a trailing newline terminates the last line rather than starting a new one
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Parse a whole report. Any schema or coercion error aborts the load.
 */
export function parseReport(text: string, schema: ReportSchema = REPORT_SCHEMA): ReportCollection {
  const lines = splitLines(text);
  const collection = new ReportCollection();

  if (lines.length === 0) {
    return collection;
  }

  const [header, ...body] = lines;
  if (header !== schema.header) {
    throw new ReportSchemaError(
      `Error reading report file. Expected first line of file is\n${schema.header}\nbut got:\n${header}`,
      { lineNumber: 1, context: { expected: schema.header, actual: header } }
    );
  }

  body.forEach((line, i) => {
    collection.add(parseReportLine(line, schema, i + 2));
  });

  return collection;
}

export function readReportText(path: string): string {
  const raw = readFileSync(path);
  return (path.endsWith('.gz') ? gunzipSync(raw) : raw).toString('utf8');
}

/**
 * Load a report file (plain or gzip-compressed)
 */
export function loadReport(path: string, schema: ReportSchema = REPORT_SCHEMA): ReportCollection {
  const collection = parseReport(readReportText(path), schema);
  console.log(
    `[Load] ${collection.recordCount} records in ${collection.groupCount} groups across ${collection.refCount} references from ${path}`
  );
  return collection;
}
