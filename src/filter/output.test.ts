import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import * as XLSX from 'xlsx';
import { buildReportWorkbook, formatReportTsv, writeReportTsv, writeReportXls } from './output';
import { parseReport, parseReportLine, REPORT_SCHEMA, ReportCollection } from '../report';
import { reportLine, reportText } from '../testFixtures';

function sample(): ReportCollection {
  return parseReport(
    reportText([
      { ref_name: 'refB', ctg: 'ctg1', free_text: 'b1' },
      { ref_name: 'refA', ctg: 'ctg2', free_text: 'a2' },
      { ref_name: 'refA', ctg: 'ctg1', free_text: 'a1', pc_ident: '100' },
    ])
  );
}

describe('formatReportTsv', () => {
  it('should write the header then rows ordered by reference and contig', () => {
    const tsv = formatReportTsv(sample());

    expect(tsv).toBe(
      [
        REPORT_SCHEMA.header,
        reportLine({ ref_name: 'refA', ctg: 'ctg1', free_text: 'a1', pc_ident: '100.0' }),
        reportLine({ ref_name: 'refA', ctg: 'ctg2', free_text: 'a2' }),
        reportLine({ ref_name: 'refB', ctg: 'ctg1', free_text: 'b1' }),
      ].join('\n') + '\n'
    );
  });

  it('should write only the header for an empty collection', () => {
    expect(formatReportTsv(new ReportCollection())).toBe(REPORT_SCHEMA.header + '\n');
  });
});

describe('buildReportWorkbook', () => {
  it('should hold one sheet with the header row and string rows', () => {
    const workbook = buildReportWorkbook(sample());

    expect(workbook.SheetNames).toEqual(['report']);
    const rows = XLSX.utils.sheet_to_json<string[]>(workbook.Sheets.report, { header: 1 });
    expect(rows).toHaveLength(4);
    expect(rows[0]).toEqual([...REPORT_SCHEMA.columns]);
    expect(rows[1][0]).toBe('refA');
    expect(rows[1][7]).toBe('100.0');
    expect(rows[1][2]).toBe('27');
    expect(rows[3][28]).toBe('b1');
  });
});

describe('report writers', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'report-output-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should write the TSV file', () => {
    const path = join(dir, 'out.tsv');

    writeReportTsv(sample(), path);

    expect(readFileSync(path, 'utf8')).toBe(formatReportTsv(sample()));
    expect(console.log).toHaveBeenCalledWith(`Exported to ${path}`);
  });

  it('should write an XLS workbook that reads back with the same cells', () => {
    const path = join(dir, 'out.xls');

    writeReportXls(sample(), path);

    const workbook = XLSX.read(readFileSync(path), { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['report']);
    const rows = XLSX.utils.sheet_to_json<string[]>(workbook.Sheets.report, { header: 1 });
    expect(rows[0][0]).toBe('ref_name');
    expect(rows[2][28]).toBe('a2');
    expect(rows[1][7]).toBe('100.0');
  });

  it('should keep every row of a report larger than the legacy XLS row limit', () => {
    const count = 70_000;
    const records = Array.from({ length: count }, (_, i) =>
      parseReportLine(reportLine({ ctg: `ctg${String(i).padStart(6, '0')}`, free_text: `row${i}` }), REPORT_SCHEMA)
    );
    const collection = ReportCollection.fromRecords(records);
    const path = join(dir, 'large.xls');

    writeReportXls(collection, path);

    const workbook = XLSX.read(readFileSync(path), { type: 'buffer' });
    const rows = XLSX.utils.sheet_to_json<string[]>(workbook.Sheets.report, { header: 1 });
    expect(rows).toHaveLength(count + 1);
    expect(rows[1][28]).toBe('row0');
    expect(rows[count][28]).toBe(`row${count - 1}`);
  }, 120_000);
});
