/**
 * Filter: Drop records whose flag has any excluded bit set
 */

import type { FlagName, ReportRecord } from '../../../report';
import type { Filter, FilterResult } from '../types';

export class ExcludeFlagsFilter implements Filter<ReportRecord> {
  name = 'exclude-flags';
  description: string;

  constructor(private excludeFlags: readonly FlagName[]) {
    this.description = excludeFlags.length > 0
      ? `Keep records with none of the flags: ${excludeFlags.join(', ')}`
      : 'Keep records regardless of flag (no flags excluded)';
  }

  apply(records: readonly ReportRecord[]): FilterResult<ReportRecord> {
    const kept: ReportRecord[] = [];
    const removed: ReportRecord[] = [];

    for (const record of records) {
      const flag = record.flag;
      if (this.excludeFlags.some(name => flag.has(name))) {
        removed.push(record);
      } else {
        kept.push(record);
      }
    }

    return { kept, removed };
  }
}
