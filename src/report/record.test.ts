import { describe, it, expect } from 'vitest';
import { formatReportLine, parseReportLine } from './record';
import { Flag } from './flag';
import { REPORT_SCHEMA } from './schema';
import { ReportCoercionError, ReportSchemaError } from '../errors';
import { reportLine } from '../testFixtures';

describe('parseReportLine', () => {
  it('should coerce numeric columns and decode the flag', () => {
    const record = parseReportLine(reportLine(), REPORT_SCHEMA);

    expect(record.refName).toBe('ref1');
    expect(record.contigName).toBe('ctg1');
    expect(record.pcIdent).toBe(99.5);
    expect(record.refBaseAssembled).toBe(900);
    expect(record.get('reads')).toBe(10);
    expect(record.get('ctg_cov')).toBe(20.3);
    expect(record.hasKnownVar).toBe('1');
    expect(record.flag).toBeInstanceOf(Flag);
    expect(record.flag.value).toBe(27);
  });

  it('should keep the sentinel in numeric columns', () => {
    const record = parseReportLine(reportLine({ ref_start: '.', pc_ident: '.' }), REPORT_SCHEMA);

    expect(record.get('ref_start')).toBe('.');
    expect(record.numeric('ref_start')).toBeUndefined();
    expect(record.pcIdent).toBeUndefined();
  });

  it('should reject a line with the wrong number of columns', () => {
    expect(() => parseReportLine('ref1\tctg1', REPORT_SCHEMA, 7)).toThrow(ReportSchemaError);
    expect(() => parseReportLine('ref1\tctg1', REPORT_SCHEMA, 7)).toThrow(
      'Expected 29 columns but got 2 columns at line 7'
    );
  });

  it('should reject non-numeric values in integer columns', () => {
    const parse = () => parseReportLine(reportLine({ reads: 'ten' }), REPORT_SCHEMA, 3);

    expect(parse).toThrow(ReportCoercionError);
    expect(parse).toThrow('Column "reads" expects an integer or "." but got "ten" at line 3');
  });

  it('should reject integers too large to hold exactly', () => {
    const parse = () => parseReportLine(reportLine({ reads: '12345678901234567890' }), REPORT_SCHEMA);

    expect(parse).toThrow(ReportCoercionError);
    expect(parse).toThrow('Column "reads" expects an integer or "." but got "12345678901234567890"');
    expect(parseReportLine(reportLine({ reads: '9007199254740991' }), REPORT_SCHEMA).get('reads')).toBe(
      9007199254740991
    );
  });

  it('should reject non-numeric values in float columns', () => {
    expect(() => parseReportLine(reportLine({ pc_ident: '9O.1' }), REPORT_SCHEMA)).toThrow(
      'Column "pc_ident" expects a float or "." but got "9O.1"'
    );
  });

  it('should reject a sentinel flag', () => {
    expect(() => parseReportLine(reportLine({ flag: '.' }), REPORT_SCHEMA)).toThrow(ReportCoercionError);
  });
});

describe('formatReportLine', () => {
  it('should write back the parsed line unchanged', () => {
    const line = reportLine();

    expect(formatReportLine(parseReportLine(line, REPORT_SCHEMA))).toBe(line);
  });

  it('should print whole floats with one decimal place', () => {
    const record = parseReportLine(reportLine({ pc_ident: '100', ctg_cov: '5.0' }), REPORT_SCHEMA);

    expect(record.values()[7]).toBe('100.0');
    expect(record.toObject().ctg_cov).toBe('5.0');
  });
});

describe('ReportRecord.demote', () => {
  it('should blank every variant column and leave the rest', () => {
    const record = parseReportLine(reportLine({ has_known_var: '0' }), REPORT_SCHEMA);
    const demoted = record.demote();
    const fields = demoted.toObject();

    expect(fields.known_var).toBe('.');
    expect(fields.has_known_var).toBe('.');
    expect(fields.ref_start).toBe('.');
    expect(fields.var_description).toBe('.');
    expect(fields.ref_name).toBe('ref1');
    expect(fields.pc_ident).toBe('99.5');
    expect(fields.free_text).toBe('note');
    expect(record.get('known_var')).toBe('1');
  });

  it('should raise a schema error for unknown columns', () => {
    const record = parseReportLine(reportLine(), REPORT_SCHEMA);

    expect(() => record.get('gene')).toThrow(ReportSchemaError);
  });
});
