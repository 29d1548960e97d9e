/**
 * src/lib/source-rows.ts
 *
 * Maps rows of the yearly Ontario public library statistics spreadsheets onto
 * BranchRecords. Blank cells become unknown values; counts may carry thousands
 * separators.
 */

import { BranchRecord, Coordinate, StatColumn, StatValue } from '../types';
import { PostalGeocoder } from './postal-geocoder';
import { mapStatColumns } from './branch-metrics';
import { normalizePostalCode, formatPostalCode } from '../utils/postalCode';

export type SourceRow = Record<string, string | undefined>;

// Spreadsheet header for each stat column
export const STAT_COLUMN_HEADERS: Record<StatColumn, string> = {
  cardholders: 'No. Cardholders',
  circulation: 'Annual Circulation',
  printTitles: 'Total Print Titles Held',
  englishPrintTitles: 'English Print Titles Held',
  frenchPrintTitles: 'French Print Titles Held',
  otherPrintTitles: 'Other Print Titles Held',
  electronicTitles: 'Total E-book and E-audio Titles',
  englishElectronicTitles: 'English E-book and E-audio Titles',
  frenchElectronicTitles: 'French E-book and E-audio Titles',
  otherElectronicTitles: 'Other E-book and E-audio Titles',
};

export const SOURCE_HEADERS = {
  name: 'Library Full Name',
  code: 'Library Number',
  year: 'Year',
  region: 'Ontario Library Service Region',
  serviceType: 'Service Type',
  streetAddress: 'Street Address',
  mailingAddress: 'Mailing Address',
  city: 'City/Town',
  postalCode: 'Postal Code',
  website: 'Web Site Address',
  latitude: 'Latitude',
  longitude: 'Longitude',
} as const;

export interface RowIssue {
  code: string;
  column: string;
  value: string;
  reason: string;
}

export interface MappedRow {
  record: BranchRecord | null;
  issues: RowIssue[];
}

function text(row: SourceRow, header: string): string | null {
  const value = row[header]?.trim();
  return value ? value : null;
}

/**
 * Parses a count cell. Returns undefined for a present but unusable value so
 * the caller can report it; blank cells are unknown (null).
 */
export function parseCount(raw: string | undefined): StatValue | undefined {
  const value = raw?.trim().replace(/,/g, '');
  if (!value) return null;
  if (!/^\d+(\.0+)?$/.test(value)) return undefined;
  return parseInt(value, 10);
}

function parseCoordinate(row: SourceRow): Coordinate | null {
  const lat = parseFloat(row[SOURCE_HEADERS.latitude] ?? '');
  const lng = parseFloat(row[SOURCE_HEADERS.longitude] ?? '');
  if (Number.isNaN(lat) || Number.isNaN(lng)) return null;
  if (Math.abs(lat) > 90 || Math.abs(lng) > 180) return null;
  return { lat, lng };
}

/**
 * Maps one spreadsheet row. `year` is used when the row has no Year cell.
 * The street address falls back to the mailing address. Coordinates come
 * from Latitude/Longitude cells, else from the postal code's area centroid.
 */
export function mapSourceRow(row: SourceRow, year: number, geocoder?: PostalGeocoder): MappedRow {
  const issues: RowIssue[] = [];
  const code = text(row, SOURCE_HEADERS.code)?.toUpperCase() ?? '';
  const name = text(row, SOURCE_HEADERS.name);

  if (!code || !name) {
    issues.push({
      code,
      column: code ? SOURCE_HEADERS.name : SOURCE_HEADERS.code,
      value: '',
      reason: 'required value missing',
    });
    return { record: null, issues };
  }

  const yearCell = text(row, SOURCE_HEADERS.year);
  const rowYear = yearCell ? parseInt(yearCell, 10) : year;

  const stats = mapStatColumns(column => {
    const header = STAT_COLUMN_HEADERS[column];
    const parsed = parseCount(row[header]);
    if (parsed === undefined) {
      issues.push({ code, column: header, value: row[header] ?? '', reason: 'not a non-negative integer' });
      return null;
    }
    return parsed;
  });

  const rawPostalCode = text(row, SOURCE_HEADERS.postalCode);
  const postalCode = rawPostalCode ? formatPostalCode(normalizePostalCode(rawPostalCode)) : null;
  const coordinate =
    parseCoordinate(row) ?? (postalCode && geocoder ? geocoder.tryResolve(postalCode) ?? null : null);

  const record: BranchRecord = {
    code,
    name,
    year: Number.isNaN(rowYear) ? year : rowYear,
    region: text(row, SOURCE_HEADERS.region),
    serviceType: text(row, SOURCE_HEADERS.serviceType),
    address: text(row, SOURCE_HEADERS.streetAddress) ?? text(row, SOURCE_HEADERS.mailingAddress),
    city: text(row, SOURCE_HEADERS.city),
    postalCode,
    website: text(row, SOURCE_HEADERS.website),
    coordinate: coordinate ? { lat: coordinate.lat, lng: coordinate.lng } : null,
    stats,
  };

  return { record, issues };
}
