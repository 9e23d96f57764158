import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { gzipSync } from 'zlib';
import { loadReport, parseReport } from './load';
import { REPORT_SCHEMA } from './schema';
import { ReportCoercionError, ReportSchemaError } from '../errors';
import { reportLine, reportText } from '../testFixtures';

describe('parseReport', () => {
  it('should group every data line', () => {
    const collection = parseReport(
      reportText([{ ctg: 'ctg1' }, { ctg: 'ctg2' }, { ref_name: 'ref2', ctg: 'ctg1' }])
    );

    expect(collection.refNames()).toEqual(['ref1', 'ref2']);
    expect(collection.contigNames('ref1')).toEqual(['ctg1', 'ctg2']);
    expect(collection.recordCount).toBe(3);
  });

  it('should accept CRLF line endings and a missing final newline', () => {
    const text = [REPORT_SCHEMA.header, reportLine(), reportLine({ ctg: 'ctg2' })].join('\r\n');

    expect(parseReport(text).recordCount).toBe(2);
  });

  it('should return an empty collection for empty input', () => {
    expect(parseReport('').refCount).toBe(0);
  });

  it('should reject a header that does not match the schema', () => {
    const text = '#ref_name\tctg\n' + reportLine() + '\n';

    expect(() => parseReport(text)).toThrow(ReportSchemaError);
    expect(() => parseReport(text)).toThrow(
      `Error reading report file. Expected first line of file is\n${REPORT_SCHEMA.header}\nbut got:\n#ref_name\tctg`
    );
  });

  it('should report the line number of a short data line', () => {
    const text = [REPORT_SCHEMA.header, reportLine(), 'ref1\tctg1\t27'].join('\n');

    try {
      parseReport(text);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ReportSchemaError);
      expect(error).toHaveProperty('lineNumber', 3);
    }
  });

  it('should abort on a coercion error', () => {
    const text = reportText([{}, { ref_len: 'long' }]);

    expect(() => parseReport(text)).toThrow(ReportCoercionError);
    expect(() => parseReport(text)).toThrow('at line 3');
  });
});

describe('loadReport', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'report-load-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should read a plain text report', () => {
    const path = join(dir, 'report.tsv');
    writeFileSync(path, reportText([{}, { ctg: 'ctg2' }]));

    const collection = loadReport(path);

    expect(collection.groupCount).toBe(2);
    expect(console.log).toHaveBeenCalledWith(`[Load] 2 records in 2 groups across 1 references from ${path}`);
  });

  it('should read a gzip-compressed report', () => {
    const path = join(dir, 'report.tsv.gz');
    writeFileSync(path, gzipSync(reportText([{}, {}])));

    expect(loadReport(path).getGroup('ref1', 'ctg1')).toHaveLength(2);
  });
});
