/**
 * Load, filter and export a report
 */

import { TSV_EXTENSION, XLS_EXTENSION } from '../constants';
import {
  DEFAULT_ESSENTIAL_CONFIG,
  DEFAULT_NON_ESSENTIAL_CONFIG,
  type EssentialFilterConfig,
  type NonEssentialFilterConfig,
} from '../config';
import { loadReport, REPORT_SCHEMA, type ReportSchema } from '../report';
import { printPipelineStats } from './pipeline';
import { filterReport, type GroupOutcome } from './select';
import { writeReportTsv, writeReportXls } from './output';

export interface RunReportFilterOptions {
  infile: string;
  outprefix: string;
  essential?: EssentialFilterConfig;
  nonEssential?: NonEssentialFilterConfig;
  schema?: ReportSchema;
  verbose?: boolean;
}

export interface RunReportFilterSummary {
  input: { records: number; groups: number; refs: number };
  output: { records: number; groups: number; refs: number };
  outcomes: Record<GroupOutcome, number>;
  xlsPath: string;
  tsvPath: string;
}

export function runReportFilter(options: RunReportFilterOptions): RunReportFilterSummary {
  const schema = options.schema ?? REPORT_SCHEMA;
  const essential = options.essential ?? DEFAULT_ESSENTIAL_CONFIG;
  const nonEssential = options.nonEssential ?? DEFAULT_NON_ESSENTIAL_CONFIG;

  const report = loadReport(options.infile, schema);
  const result = filterReport(report, essential, nonEssential);
  const filtered = result.collection;

  if (options.verbose) {
    printPipelineStats(result.essentialStats, 'Essential');
    printPipelineStats(result.nonEssentialStats, 'Non-essential');
    for (const [refName, contigName] of result.removedGroups) {
      console.log(`[Select] Removed group ${refName} / ${contigName}`);
    }
  }

  const { passed, demoted, removed } = result.outcomes;
  console.log(
    `[Select] ${report.groupCount} groups: ${passed} passed, ${demoted} demoted, ${removed} removed ` +
    `(${filtered.recordCount}/${report.recordCount} records kept)`
  );

  const xlsPath = options.outprefix + XLS_EXTENSION;
  const tsvPath = options.outprefix + TSV_EXTENSION;
  writeReportXls(filtered, xlsPath, schema);
  writeReportTsv(filtered, tsvPath, schema);

  return {
    input: { records: report.recordCount, groups: report.groupCount, refs: report.refCount },
    output: { records: filtered.recordCount, groups: filtered.groupCount, refs: filtered.refCount },
    outcomes: result.outcomes,
    xlsPath,
    tsvPath,
  };
}
