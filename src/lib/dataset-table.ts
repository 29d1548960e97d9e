/**
 * src/lib/dataset-table.ts
 *
 * Immutable in-memory table of branch-year records. Built once at startup and
 * shared by reference with every lookup; nothing mutates it afterwards.
 */

import { BranchRecord, STAT_COLUMNS } from '../types';
import { DatasetError } from '../utils/errors';

// Ordinal comparison keeps ordering independent of the host locale
export function compareCodes(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareRecords(a: BranchRecord, b: BranchRecord): number {
  return compareCodes(a.code, b.code) || a.year - b.year;
}

function freezeRecord(record: BranchRecord): BranchRecord {
  return Object.freeze({
    ...record,
    coordinate: record.coordinate ? Object.freeze({ ...record.coordinate }) : null,
    stats: Object.freeze({ ...record.stats }),
  });
}

function validateRecord(record: BranchRecord, supportedYears: ReadonlySet<number>): void {
  if (!record.code) {
    throw new DatasetError(`Record "${record.name}" (${record.year}) has no library code`);
  }
  if (!supportedYears.has(record.year)) {
    throw new DatasetError(`Record ${record.code} has unsupported year ${record.year}`);
  }
  for (const column of STAT_COLUMNS) {
    const value = record.stats[column];
    if (value !== null && (!Number.isInteger(value) || value < 0)) {
      throw new DatasetError(
        `Record ${record.code} (${record.year}) has invalid ${column} value ${value}`
      );
    }
  }
}

export class DatasetTable {
  readonly records: readonly BranchRecord[];
  readonly supportedYears: readonly number[];
  private readonly byCode: ReadonlyMap<string, readonly BranchRecord[]>;
  private readonly byYear: ReadonlyMap<number, readonly BranchRecord[]>;
  private readonly latestByCode: readonly BranchRecord[];

  private constructor(records: readonly BranchRecord[], supportedYears: readonly number[]) {
    this.records = records;
    this.supportedYears = supportedYears;

    const byCode = new Map<string, BranchRecord[]>();
    const byYear = new Map<number, BranchRecord[]>(supportedYears.map(year => [year, []]));
    for (const record of records) {
      const history = byCode.get(record.code);
      if (history) {
        history.push(record);
      } else {
        byCode.set(record.code, [record]);
      }
      byYear.get(record.year)?.push(record);
    }
    this.byCode = byCode;
    this.byYear = byYear;
    this.latestByCode = Object.freeze(
      [...byCode.values()].map(history => history[history.length - 1])
    );
  }

  /**
   * Validates and freezes `records` into a table. Row order of the input does
   * not matter: records are kept sorted by code, then year.
   */
  static from(records: Iterable<BranchRecord>, supportedYears: readonly number[]): DatasetTable {
    const years = Object.freeze([...new Set(supportedYears)].sort((a, b) => a - b));
    const yearSet = new Set(years);
    const seen = new Set<string>();
    const rows: BranchRecord[] = [];

    for (const record of records) {
      validateRecord(record, yearSet);
      const key = `${record.code}|${record.year}`;
      if (seen.has(key)) {
        throw new DatasetError(`Duplicate record for ${record.code} in ${record.year}`);
      }
      seen.add(key);
      rows.push(freezeRecord(record));
    }

    rows.sort(compareRecords);
    return new DatasetTable(Object.freeze(rows), years);
  }

  get size(): number {
    return this.records.length;
  }

  codes(): string[] {
    return [...this.byCode.keys()];
  }

  /** Every record of a branch, oldest year first; empty for unknown codes. */
  recordsFor(code: string): readonly BranchRecord[] {
    return this.byCode.get(code) ?? [];
  }

  latest(code: string): BranchRecord | undefined {
    const history = this.byCode.get(code);
    return history ? history[history.length - 1] : undefined;
  }

  /** The most recent record of every branch, ordered by code. */
  latestRecords(): readonly BranchRecord[] {
    return this.latestByCode;
  }

  forYear(year: number): readonly BranchRecord[] {
    return this.byYear.get(year) ?? [];
  }

  isSupportedYear(year: number): boolean {
    return this.supportedYears.includes(year);
  }
}
