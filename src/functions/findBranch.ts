/**
 * src/functions/findBranch.ts
 *
 * Resolves a user-supplied library name or code to the matching branch
 * records across every year in the table.
 */

import { DatasetTable } from '../lib/dataset-table';
import type { BranchHistory, BranchRecord } from '../types';

function normalizeName(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Case-insensitive exact match on the library code first; otherwise a
 * case-insensitive substring match on any year's name. Returns every record of
 * each matched branch, ordered by code then year. An empty array means no
 * branch matched.
 */
export const findBranch = (table: DatasetTable, query: string): BranchRecord[] => {
  const trimmed = query.trim();
  if (!trimmed) return [];

  const byCode = table.recordsFor(trimmed.toUpperCase());
  if (byCode.length > 0) {
    return [...byCode];
  }

  const needle = normalizeName(trimmed);
  const matches: BranchRecord[] = [];
  for (const code of table.codes()) {
    const history = table.recordsFor(code);
    if (history.some(record => normalizeName(record.name).includes(needle))) {
      matches.push(...history);
    }
  }
  return matches;
};

/** Groups lookup results by branch so the caller can disambiguate. */
export const groupByBranch = (records: readonly BranchRecord[]): BranchHistory[] => {
  const groups = new Map<string, BranchRecord[]>();
  for (const record of records) {
    const group = groups.get(record.code);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.code, [record]);
    }
  }

  const histories: BranchHistory[] = [];
  for (const [code, history] of groups) {
    const sorted = [...history].sort((a, b) => a.year - b.year);
    histories.push({ code, latest: sorted[sorted.length - 1], records: sorted });
  }
  return histories;
};
