/**
 * Text rendering for portal results. Pure functions returning output lines;
 * unknown values print as N/A.
 */

import { NEEDS, NEED_DEFINITIONS } from '../functions/needs';
import { STAT_COLUMN_HEADERS } from '../lib/source-rows';
import type {
  BranchHistory,
  ColumnSummary,
  NearbyBranch,
  SummaryColumn,
  YearlySummary,
} from '../types';
import { SUMMARY_COLUMNS } from '../types';

const NOT_AVAILABLE = 'N/A';

export const COLUMN_LABELS: Record<SummaryColumn, string> = {
  ...STAT_COLUMN_HEADERS,
  totalResources: 'Total Resources',
};

function withThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

export function formatCount(value: number | null): string {
  if (value === null) return NOT_AVAILABLE;
  return withThousands(String(Math.round(value)));
}

export function formatDecimal(value: number | null, fractionDigits = 2): string {
  if (value === null) return NOT_AVAILABLE;
  const [whole, fraction] = value.toFixed(fractionDigits).split('.');
  return fraction === undefined ? withThousands(whole) : `${withThousands(whole)}.${fraction}`;
}

export function formatBranchInfo(history: BranchHistory): string[] {
  const { latest } = history;
  const lines = ['*****LIBRARY BRANCH INFORMATION*****', ''];

  lines.push(`Library Name: ${latest.name}`);
  lines.push(`Library Number: ${latest.code}`);
  lines.push(`Service Region: ${latest.region ?? NOT_AVAILABLE}`);
  lines.push(`Street Address: ${latest.address ?? NOT_AVAILABLE}`);
  if (latest.city || latest.postalCode) {
    const locality = [latest.city, 'ON', latest.postalCode].filter((part): part is string => Boolean(part));
    lines.push(`\t\t${locality.join(', ')}`);
  }
  lines.push(`Website or E-mail: ${latest.website ?? NOT_AVAILABLE}`);
  lines.push(`Number of Cardholders: ${formatCount(latest.stats.cardholders)}`);
  lines.push(`Number of Print Resources: ${formatCount(latest.stats.printTitles)}`);
  lines.push(`Number of e-Book/e-Audio Resources: ${formatCount(latest.stats.electronicTitles)}`);
  lines.push(`Years Reported: ${history.records.map(record => record.year).join(', ')}`);

  return lines;
}

export function formatBranchChoices(histories: readonly BranchHistory[]): string[] {
  return histories.map((history, index) => `${index + 1}. ${history.latest.name} (${history.code})`);
}

export function formatNeedsMenu(): string[] {
  return NEEDS.map((need, index) => `${index + 1}. ${NEED_DEFINITIONS[need].label}`);
}

export function formatNearbyBranches(results: readonly NearbyBranch[], limit: number): string[] {
  return results
    .slice(0, limit)
    .map(
      ({ record, distanceKm }, index) =>
        `${index + 1}. ${record.name} (${record.code}) - ${formatDecimal(distanceKm)} km`
    );
}

function formatColumnStatistics(label: string, column: ColumnSummary, branchCount: number): string {
  return (
    `${label}: total ${formatCount(column.total)}` +
    ` | reported ${column.reportedCount}/${branchCount}` +
    ` | mean ${formatDecimal(column.mean, 1)}` +
    ` | min ${formatCount(column.min)}` +
    ` | max ${formatCount(column.max)}`
  );
}

function formatRecordHolders(label: string, column: ColumnSummary): string {
  if (column.recordHolders.length === 0) {
    return `Most ${label}: ${NOT_AVAILABLE}`;
  }
  const holders = column.recordHolders.map(holder => `${holder.name} (${holder.code})`).join(', ');
  return `Most ${label}: ${holders} (${formatCount(column.max)})`;
}

export function formatYearlySummary(summary: YearlySummary): string[] {
  const { columns, branchCount } = summary;
  const lines = [`*******LIBRARY STATISTICAL ARCHIVES IN ${summary.year}*******`, ''];

  if (branchCount === 0) {
    lines.push(`No library branches reported statistics in ${summary.year}.`);
    return lines;
  }

  lines.push(`Library branches reporting: ${branchCount}`, '');

  lines.push('*****GENERAL DATA STATISTICS*****', '');
  for (const column of SUMMARY_COLUMNS) {
    lines.push(formatColumnStatistics(COLUMN_LABELS[column], columns[column], branchCount));
  }

  lines.push('', '*****RESOURCES BY LANGUAGE*****', '');
  lines.push(
    `English: ${formatCount(columns.englishPrintTitles.total)} print, ` +
      `${formatCount(columns.englishElectronicTitles.total)} e-book/e-audio`
  );
  lines.push(
    `French: ${formatCount(columns.frenchPrintTitles.total)} print, ` +
      `${formatCount(columns.frenchElectronicTitles.total)} e-book/e-audio`
  );
  lines.push(
    `Other: ${formatCount(columns.otherPrintTitles.total)} print, ` +
      `${formatCount(columns.otherElectronicTitles.total)} e-book/e-audio`
  );

  lines.push('', '*****AVERAGE RESOURCES PER CARDHOLDER BY SERVICE REGION & TYPE*****', '');
  for (const cell of summary.resourcesPerCardholder) {
    lines.push(
      `${cell.serviceType} / ${cell.region}: ${formatDecimal(cell.average)} ` +
        `(${cell.branchCount} ${cell.branchCount === 1 ? 'branch' : 'branches'})`
    );
  }

  lines.push('', '*****LIBRARY RECORDS*****', '');
  for (const column of SUMMARY_COLUMNS) {
    lines.push(formatRecordHolders(COLUMN_LABELS[column], columns[column]));
  }

  return lines;
}
