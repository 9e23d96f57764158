/**
 * Per-group record selection
 *
 * Within each (reference, contig) group records are split into:
 *   pass           - passes essential and non-essential filters
 *   essentialOnly  - passes essential filters only
 *   fail           - fails an essential filter
 *
 * A group keeps its pass records. With none, the first essentialOnly record
 * (file order) is kept with its variant columns blanked. With neither, the
 * group is dropped.
 */

import {
  DEFAULT_ESSENTIAL_CONFIG,
  DEFAULT_NON_ESSENTIAL_CONFIG,
  type EssentialFilterConfig,
  type NonEssentialFilterConfig,
} from '../config';
import { ReportCollection, type ReportRecord } from '../report';
import {
  buildEssentialFilters,
  buildNonEssentialFilters,
  mergeFilterStats,
  runPipeline,
  type FilterStats,
  type GroupOutcome,
  type GroupPartition,
  type RecordFilter,
} from './pipeline';

export type { GroupOutcome, GroupPartition };

export interface GroupSelection extends GroupPartition {
  records: ReportRecord[];
  outcome: GroupOutcome;
}

export function partitionGroup(
  records: readonly ReportRecord[],
  essentialFilters: RecordFilter[],
  nonEssentialFilters: RecordFilter[]
): GroupPartition {
  const essential = runPipeline(records, essentialFilters);
  const nonEssential = runPipeline(essential.output, nonEssentialFilters);

  // runPipeline collects removals filter by filter; restore file order
  const failed = new Set(essential.removed);
  const notKnown = new Set(nonEssential.removed);

  return {
    pass: nonEssential.output,
    essentialOnly: essential.output.filter(r => notKnown.has(r)),
    fail: records.filter(r => failed.has(r)),
    essentialStats: essential.stats,
    nonEssentialStats: nonEssential.stats,
  };
}

export function selectGroup(
  records: readonly ReportRecord[],
  essentialFilters: RecordFilter[],
  nonEssentialFilters: RecordFilter[]
): GroupSelection {
  const partition = partitionGroup(records, essentialFilters, nonEssentialFilters);

  if (records.length === 0) {
    return { ...partition, records: [], outcome: 'empty' };
  }
  if (partition.pass.length > 0) {
    return { ...partition, records: partition.pass, outcome: 'passed' };
  }
  if (partition.essentialOnly.length > 0) {
    return { ...partition, records: [partition.essentialOnly[0].demote()], outcome: 'demoted' };
  }
  return { ...partition, records: [], outcome: 'removed' };
}

export interface FilterReportResult {
  collection: ReportCollection;
  outcomes: Record<GroupOutcome, number>;
  essentialStats: FilterStats[];
  nonEssentialStats: FilterStats[];
  /** Groups pruned because no record survived, as [refName, contigName] */
  removedGroups: Array<[string, string]>;
}

/**
 * Filter every group of a report. The input collection is left untouched.
 */
export function filterReport(
  collection: ReportCollection,
  essential: EssentialFilterConfig = DEFAULT_ESSENTIAL_CONFIG,
  nonEssential: NonEssentialFilterConfig = DEFAULT_NON_ESSENTIAL_CONFIG
): FilterReportResult {
  const essentialFilters = buildEssentialFilters(essential);
  const nonEssentialFilters = buildNonEssentialFilters(nonEssential);

  const filtered = new ReportCollection();
  const outcomes: Record<GroupOutcome, number> = { passed: 0, demoted: 0, removed: 0, empty: 0 };
  let essentialStats: FilterStats[] = [];
  let nonEssentialStats: FilterStats[] = [];

  for (const group of collection.groups()) {
    const selection = selectGroup(group.records, essentialFilters, nonEssentialFilters);
    filtered.setGroup(group.refName, group.contigName, selection.records);
    outcomes[selection.outcome]++;
    essentialStats = mergeFilterStats(essentialStats, selection.essentialStats);
    nonEssentialStats = mergeFilterStats(nonEssentialStats, selection.nonEssentialStats);
  }

  const removedGroups = filtered.prune();

  return { collection: filtered, outcomes, essentialStats, nonEssentialStats, removedGroups };
}
