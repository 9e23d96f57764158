/**
 * Pipeline types for report filtering
 *
 * Record filters run over the rows of one (reference, contig) group at a time.
 * Essential and non-essential filters share the same shape; select.ts
 * combines their results into a GroupOutcome.
 */

import type { ReportRecord } from '../../report';

/**
 * Rows a filter kept and removed, each in input order
 */
export interface FilterResult<T> {
  kept: T[];
  removed: T[];
}

export interface Filter<T> {
  /** Identifier used in stats and logs, e.g. 'min-pc-ident' */
  name: string;
  /** Threshold summary, e.g. 'Keep records with percent identity >= 90' */
  description: string;
  apply(items: readonly T[]): FilterResult<T>;
}

/** Every report filter works on parsed rows */
export type RecordFilter = Filter<ReportRecord>;

/**
 * Per-filter counts, summed over groups by mergeFilterStats
 */
export interface FilterStats {
  name: string;
  description: string;
  inputCount: number;
  keptCount: number;
  removedCount: number;
}

export interface PipelineResult<T> {
  output: T[];
  removed: T[];
  stats: FilterStats[];
}

/**
 * What happened to a group:
 *   passed  - kept every row passing both filter sets
 *   demoted - kept one essential-only row with variant columns blanked
 *   removed - no row passed the essential filters
 *   empty   - the group had no rows to begin with
 */
export type GroupOutcome = 'passed' | 'demoted' | 'removed' | 'empty';

/**
 * Rows of one group split by the two filter sets, each in file order
 */
export interface GroupPartition {
  pass: ReportRecord[];
  essentialOnly: ReportRecord[];
  fail: ReportRecord[];
  essentialStats: FilterStats[];
  nonEssentialStats: FilterStats[];
}
