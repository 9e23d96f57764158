/**
 * Pipeline/Filter Pattern - Central Registry
 *
 * Essential filters decide whether a record is valid at all.
 * Non-essential filters decide whether a valid record is kept outright or
 * only considered as a demoted stand-in for its group.
 */

import type { EssentialFilterConfig, NonEssentialFilterConfig } from '../../config';
import type { Filter, FilterStats, PipelineResult, RecordFilter } from './types';

import { ExcludeFlagsFilter } from './filters/exclude-flags';
import { MinPcIdentFilter } from './filters/min-pc-ident';
import { MinRefBaseAssembledFilter } from './filters/min-ref-base-assembled';
import { KnownVariantFilter } from './filters/known-variant';

// Re-export types and filters
export type { Filter, FilterResult, FilterStats, PipelineResult, RecordFilter, GroupOutcome, GroupPartition } from './types';
export { ExcludeFlagsFilter, MinPcIdentFilter, MinRefBaseAssembledFilter, KnownVariantFilter };

/**
 * ========================================
 * ESSENTIAL FILTERS
 * ========================================
 * A record must pass every one of these
 */
export function buildEssentialFilters(config: EssentialFilterConfig): RecordFilter[] {
  return [
    new ExcludeFlagsFilter(config.excludeFlags),
    new MinPcIdentFilter(config.minPcIdent),
    new MinRefBaseAssembledFilter(config.minRefBaseAssembled),
  ];
}

/**
 * ========================================
 * NON-ESSENTIAL FILTERS
 * ========================================
 * Empty when the known-variant requirement is switched off
 */
export function buildNonEssentialFilters(config: NonEssentialFilterConfig): RecordFilter[] {
  return config.requireKnownVariant ? [new KnownVariantFilter()] : [];
}

/**
 * Run items through a filter pipeline
 */
export function runPipeline<T>(items: readonly T[], filters: Filter<T>[]): PipelineResult<T> {
  const stats: FilterStats[] = [];
  let current: T[] = [...items];
  const allRemoved: T[] = [];

  for (const filter of filters) {
    const result = filter.apply(current);

    stats.push({
      name: filter.name,
      description: filter.description,
      inputCount: current.length,
      keptCount: result.kept.length,
      removedCount: result.removed.length,
    });

    allRemoved.push(...result.removed);
    current = result.kept;
  }

  return { output: current, removed: allRemoved, stats };
}

/**
 * Sum per-filter stats from several runs of the same pipeline
 */
export function mergeFilterStats(total: FilterStats[], next: FilterStats[]): FilterStats[] {
  const merged = total.map(s => ({ ...s }));

  for (const s of next) {
    const existing = merged.find(m => m.name === s.name);
    if (existing) {
      existing.inputCount += s.inputCount;
      existing.keptCount += s.keptCount;
      existing.removedCount += s.removedCount;
    } else {
      merged.push({ ...s });
    }
  }

  return merged;
}

/**
 * Print a summary of pipeline stats
 */
export function printPipelineStats(stats: FilterStats[], label?: string): void {
  if (stats.length === 0) return;

  const prefix = label ? `[${label}] ` : '';
  for (const s of stats) {
    console.log(`${prefix}[${s.name}] Kept ${s.keptCount}/${s.inputCount} (filtered ${s.removedCount}) - ${s.description}`);
  }
}

/**
 * Get a summary of the configured filters for documentation/debugging
 */
export function getFilterRegistry(
  essential: EssentialFilterConfig,
  nonEssential: NonEssentialFilterConfig
): {
  pipeline: string;
  filters: { name: string; description: string }[];
}[] {
  return [
    {
      pipeline: 'ESSENTIAL_FILTERS',
      filters: buildEssentialFilters(essential).map(f => ({ name: f.name, description: f.description })),
    },
    {
      pipeline: 'NON_ESSENTIAL_FILTERS',
      filters: buildNonEssentialFilters(nonEssential).map(f => ({ name: f.name, description: f.description })),
    },
  ];
}
