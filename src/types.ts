// Numeric statistic columns carried by every branch-year record
export const STAT_COLUMNS = [
  'cardholders',
  'circulation',
  'printTitles',
  'englishPrintTitles',
  'frenchPrintTitles',
  'otherPrintTitles',
  'electronicTitles',
  'englishElectronicTitles',
  'frenchElectronicTitles',
  'otherElectronicTitles',
] as const;

export type StatColumn = (typeof STAT_COLUMNS)[number];

// Columns the yearly archive aggregates (stat columns plus derived totals)
export const SUMMARY_COLUMNS = [...STAT_COLUMNS, 'totalResources'] as const;

export type SummaryColumn = (typeof SUMMARY_COLUMNS)[number];

// null marks a value the branch did not report; it is never treated as zero
export type StatValue = number | null;

export interface Coordinate {
  lat: number;
  lng: number;
}

export interface BranchRecord {
  readonly code: string;
  readonly name: string;
  readonly year: number;
  readonly region: string | null;
  readonly serviceType: string | null;
  readonly address: string | null;
  readonly city: string | null;
  readonly postalCode: string | null;
  readonly website: string | null;
  readonly coordinate: Readonly<Coordinate> | null;
  readonly stats: Readonly<Record<StatColumn, StatValue>>;
}

// All records of one branch, oldest year first
export interface BranchHistory {
  code: string;
  latest: BranchRecord;
  records: readonly BranchRecord[];
}

export interface NearbyBranch {
  record: BranchRecord;
  distanceKm: number;
}

export interface RecordHolder {
  code: string;
  name: string;
  value: number;
}

export interface ColumnSummary {
  total: number;
  reportedCount: number;
  unknownCount: number;
  mean: number | null;
  min: number | null;
  max: number | null;
  recordHolders: readonly RecordHolder[];
}

export interface ResourcesPerCardholderCell {
  serviceType: string;
  region: string;
  average: number | null;
  branchCount: number;
}

export interface YearlySummary {
  year: number;
  branchCount: number;
  columns: Record<SummaryColumn, ColumnSummary>;
  resourcesPerCardholder: readonly ResourcesPerCardholderCell[];
}

// CLI types
export interface NearbyOptions {
  need?: string[];
  limit?: string;
}
