/**
 * src/functions/summarizeYear.ts
 *
 * Yearly archive statistics: per-column totals, descriptive statistics and
 * record-holders, plus average resources per cardholder by service type and
 * region.
 */

import { DatasetTable, compareCodes } from '../lib/dataset-table';
import { mapStatColumns, resourcesPerCardholder, summaryValue } from '../lib/branch-metrics';
import { InvalidYearError } from '../utils/errors';
import {
  BranchRecord,
  ColumnSummary,
  ResourcesPerCardholderCell,
  SummaryColumn,
  YearlySummary,
} from '../types';

const UNSPECIFIED = 'Unspecified';

export function summarizeColumn(records: readonly BranchRecord[], column: SummaryColumn): ColumnSummary {
  let total = 0;
  let reportedCount = 0;
  let min: number | null = null;
  let max: number | null = null;

  for (const record of records) {
    const value = summaryValue(record, column);
    if (value === null) continue;
    total += value;
    reportedCount++;
    if (min === null || value < min) min = value;
    if (max === null || value > max) max = value;
  }

  // Every branch sharing the maximum is a record-holder, listed by code
  const holdersOf = (maximum: number) =>
    records
      .filter(record => summaryValue(record, column) === maximum)
      .map(record => ({ code: record.code, name: record.name, value: maximum }))
      .sort((a, b) => compareCodes(a.code, b.code));
  const recordHolders = max === null ? [] : holdersOf(max);

  return {
    total,
    reportedCount,
    unknownCount: records.length - reportedCount,
    mean: reportedCount > 0 ? total / reportedCount : null,
    min,
    max,
    recordHolders,
  };
}

export function averageResourcesPerCardholder(
  records: readonly BranchRecord[]
): ResourcesPerCardholderCell[] {
  const groups = new Map<string, { serviceType: string; region: string; values: number[]; branchCount: number }>();

  for (const record of records) {
    const serviceType = record.serviceType ?? UNSPECIFIED;
    const region = record.region ?? UNSPECIFIED;
    const key = `${serviceType}\u0000${region}`;
    let group = groups.get(key);
    if (!group) {
      group = { serviceType, region, values: [], branchCount: 0 };
      groups.set(key, group);
    }
    group.branchCount++;
    const ratio = resourcesPerCardholder(record);
    if (ratio !== null) group.values.push(ratio);
  }

  return [...groups.values()]
    .map(({ serviceType, region, values, branchCount }) => ({
      serviceType,
      region,
      average: values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : null,
      branchCount,
    }))
    .sort((a, b) => compareCodes(a.serviceType, b.serviceType) || compareCodes(a.region, b.region));
}

/**
 * Summarises one archive year. Unknown values are left out of every total and
 * statistic. A supported year without records yields zero totals.
 */
export const summarizeYear = (table: DatasetTable, year: number): YearlySummary => {
  if (!Number.isInteger(year) || !table.isSupportedYear(year)) {
    throw new InvalidYearError(year, table.supportedYears);
  }

  const records = table.forYear(year);
  const columns: Record<SummaryColumn, ColumnSummary> = {
    ...mapStatColumns(column => summarizeColumn(records, column)),
    totalResources: summarizeColumn(records, 'totalResources'),
  };

  return {
    year,
    branchCount: records.length,
    columns,
    resourcesPerCardholder: averageResourcesPerCardholder(records),
  };
};
