/**
 * Filter: Keep records whose percent identity meets the minimum
 */

import type { ReportRecord } from '../../../report';
import type { Filter, FilterResult } from '../types';

export class MinPcIdentFilter implements Filter<ReportRecord> {
  name = 'min-pc-ident';
  description: string;

  constructor(private minPcIdent: number) {
    this.description = `Keep records with percent identity >= ${minPcIdent}`;
  }

  apply(records: readonly ReportRecord[]): FilterResult<ReportRecord> {
    const kept: ReportRecord[] = [];
    const removed: ReportRecord[] = [];

    for (const record of records) {
      // "." never meets the minimum
      const pcIdent = record.pcIdent;
      if (pcIdent !== undefined && pcIdent >= this.minPcIdent) {
        kept.push(record);
      } else {
        removed.push(record);
      }
    }

    return { kept, removed };
  }
}
