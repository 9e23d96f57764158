/**
 * Filter: Keep records that report a known variant (has_known_var == "1")
 */

import type { ReportRecord } from '../../../report';
import type { Filter, FilterResult } from '../types';

export class KnownVariantFilter implements Filter<ReportRecord> {
  name = 'known-variant';
  description = 'Keep records with a known variant';

  apply(records: readonly ReportRecord[]): FilterResult<ReportRecord> {
    const kept: ReportRecord[] = [];
    const removed: ReportRecord[] = [];

    for (const record of records) {
      if (record.hasKnownVar === '1') {
        kept.push(record);
      } else {
        removed.push(record);
      }
    }

    return { kept, removed };
  }
}
