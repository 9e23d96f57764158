/**
 * Filter: Keep records with enough reference bases assembled
 */

import type { ReportRecord } from '../../../report';
import type { Filter, FilterResult } from '../types';

export class MinRefBaseAssembledFilter implements Filter<ReportRecord> {
  name = 'min-ref-base-assembled';
  description: string;

  constructor(private minRefBaseAssembled: number) {
    this.description = `Keep records with >= ${minRefBaseAssembled} reference bases assembled`;
  }

  apply(records: readonly ReportRecord[]): FilterResult<ReportRecord> {
    const kept: ReportRecord[] = [];
    const removed: ReportRecord[] = [];

    for (const record of records) {
      const assembled = record.refBaseAssembled;
      if (assembled !== undefined && assembled >= this.minRefBaseAssembled) {
        kept.push(record);
      } else {
        removed.push(record);
      }
    }

    return { kept, removed };
  }
}
