/**
 * Report collection: reference name -> contig name -> ordered records
 */

import type { ReportRecord } from './record';

export interface ReportGroup {
  refName: string;
  contigName: string;
  records: readonly ReportRecord[];
}

export class ReportCollection {
  private readonly refs = new Map<string, Map<string, ReportRecord[]>>();

  static fromRecords(records: Iterable<ReportRecord>): ReportCollection {
    const collection = new ReportCollection();
    for (const record of records) {
      collection.add(record);
    }
    return collection;
  }

  /** Append a record to the end of its group */
  add(record: ReportRecord): void {
    let contigs = this.refs.get(record.refName);
    if (!contigs) {
      contigs = new Map<string, ReportRecord[]>();
      this.refs.set(record.refName, contigs);
    }
    const records = contigs.get(record.contigName);
    if (records) {
      records.push(record);
    } else {
      contigs.set(record.contigName, [record]);
    }
  }

  /**
   * Replace a group's records. An empty list is stored as-is until prune() runs.
   */
  setGroup(refName: string, contigName: string, records: readonly ReportRecord[]): void {
    let contigs = this.refs.get(refName);
    if (!contigs) {
      contigs = new Map<string, ReportRecord[]>();
      this.refs.set(refName, contigs);
    }
    contigs.set(contigName, [...records]);
  }

  getGroup(refName: string, contigName: string): readonly ReportRecord[] | undefined {
    return this.refs.get(refName)?.get(contigName);
  }

  hasRef(refName: string): boolean {
    return this.refs.has(refName);
  }

  hasGroup(refName: string, contigName: string): boolean {
    return this.refs.get(refName)?.has(contigName) ?? false;
  }

  /** Reference names in lexicographic order */
  refNames(): string[] {
    return [...this.refs.keys()].sort();
  }

  /** Contig names of one reference in lexicographic order */
  contigNames(refName: string): string[] {
    return [...(this.refs.get(refName)?.keys() ?? [])].sort();
  }

  /**
   * Groups ordered by reference then contig name
   */
  *groups(): Generator<ReportGroup> {
    for (const refName of this.refNames()) {
      for (const contigName of this.contigNames(refName)) {
        yield { refName, contigName, records: this.getGroup(refName, contigName) ?? [] };
      }
    }
  }

  /** All records in output order */
  records(): ReportRecord[] {
    const all: ReportRecord[] = [];
    for (const group of this.groups()) {
      all.push(...group.records);
    }
    return all;
  }

  /**
   * Remove groups with no records, then references with no groups.
   * Returns the removed [refName, contigName] pairs.
   */
  prune(): Array<[string, string]> {
    const emptyGroups: Array<[string, string]> = [];
    for (const [refName, contigs] of this.refs) {
      for (const [contigName, records] of contigs) {
        if (records.length === 0) {
          emptyGroups.push([refName, contigName]);
        }
      }
    }

    const emptyRefs = new Set<string>();
    for (const [refName, contigName] of emptyGroups) {
      const contigs = this.refs.get(refName);
      contigs?.delete(contigName);
      if (contigs && contigs.size === 0) {
        emptyRefs.add(refName);
      }
    }

    for (const refName of emptyRefs) {
      this.refs.delete(refName);
    }

    return emptyGroups;
  }

  get refCount(): number {
    return this.refs.size;
  }

  get groupCount(): number {
    let count = 0;
    for (const contigs of this.refs.values()) {
      count += contigs.size;
    }
    return count;
  }

  get recordCount(): number {
    let count = 0;
    for (const contigs of this.refs.values()) {
      for (const records of contigs.values()) {
        count += records.length;
      }
    }
    return count;
  }
}
