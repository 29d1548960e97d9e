/**
 * src/lib/library-database.ts
 *
 * SQLite storage for branch statistics. `npm run setup-db` writes the
 * database once from the yearly spreadsheets; the portal opens it read-only
 * and loads every row into a DatasetTable at startup.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import { BranchRecord, StatColumn, STAT_COLUMNS } from '../types';
import { DatasetTable } from './dataset-table';
import { mapStatColumns } from './branch-metrics';
import { DatasetError } from '../utils/errors';
import { logger } from '../utils/logger';

// SQL column for each stat column
export const STAT_COLUMN_SQL: Record<StatColumn, string> = {
  cardholders: 'cardholders',
  circulation: 'circulation',
  printTitles: 'print_titles',
  englishPrintTitles: 'english_print_titles',
  frenchPrintTitles: 'french_print_titles',
  otherPrintTitles: 'other_print_titles',
  electronicTitles: 'electronic_titles',
  englishElectronicTitles: 'english_electronic_titles',
  frenchElectronicTitles: 'french_electronic_titles',
  otherElectronicTitles: 'other_electronic_titles',
};

const STAT_SQL_COLUMNS = STAT_COLUMNS.map(column => STAT_COLUMN_SQL[column]);

const BASE_SQL_COLUMNS = [
  'code',
  'year',
  'name',
  'region',
  'service_type',
  'address',
  'city',
  'postal_code',
  'website',
  'latitude',
  'longitude',
] as const;

interface BranchRow {
  code: string;
  year: number;
  name: string;
  region: string | null;
  service_type: string | null;
  address: string | null;
  city: string | null;
  postal_code: string | null;
  website: string | null;
  latitude: number | null;
  longitude: number | null;
  [statColumn: string]: string | number | null;
}

export function createSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS branch_statistics (
      code TEXT NOT NULL,
      year INTEGER NOT NULL,
      name TEXT NOT NULL,
      region TEXT,
      service_type TEXT,
      address TEXT,
      city TEXT,
      postal_code TEXT,
      website TEXT,
      latitude REAL,
      longitude REAL,
      ${STAT_SQL_COLUMNS.map(column => `${column} INTEGER CHECK (${column} >= 0)`).join(',\n      ')},
      PRIMARY KEY (code, year)
    );

    CREATE INDEX IF NOT EXISTS idx_branch_year ON branch_statistics(year);
  `);
}

/** Inserts records in one transaction; returns the number of rows written. */
export function insertBranchRecords(db: Database.Database, records: readonly BranchRecord[]): number {
  const columns = [...BASE_SQL_COLUMNS, ...STAT_SQL_COLUMNS];
  const insert = db.prepare(`
    INSERT INTO branch_statistics (${columns.join(', ')})
    VALUES (${columns.map(() => '?').join(', ')})
  `);

  const insertAll = db.transaction((rows: readonly BranchRecord[]) => {
    for (const record of rows) {
      insert.run(
        record.code,
        record.year,
        record.name,
        record.region,
        record.serviceType,
        record.address,
        record.city,
        record.postalCode,
        record.website,
        record.coordinate?.lat ?? null,
        record.coordinate?.lng ?? null,
        ...STAT_COLUMNS.map(column => record.stats[column])
      );
    }
  });

  insertAll(records);
  return records.length;
}

function statCell(row: BranchRow, column: StatColumn): number | null {
  const value = row[STAT_COLUMN_SQL[column]];
  return typeof value === 'number' ? value : null;
}

function rowToRecord(row: BranchRow): BranchRecord {
  return {
    code: row.code,
    year: row.year,
    name: row.name,
    region: row.region,
    serviceType: row.service_type,
    address: row.address,
    city: row.city,
    postalCode: row.postal_code,
    website: row.website,
    coordinate:
      row.latitude !== null && row.longitude !== null ? { lat: row.latitude, lng: row.longitude } : null,
    stats: mapStatColumns(column => statCell(row, column)),
  };
}

export function readBranchRecords(db: Database.Database): BranchRecord[] {
  const rows = db
    .prepare<[], BranchRow>(
      `SELECT ${[...BASE_SQL_COLUMNS, ...STAT_SQL_COLUMNS].join(', ')}
       FROM branch_statistics
       ORDER BY code, year`
    )
    .all();
  return rows.map(rowToRecord);
}

/** Opens the database read-only and builds the shared DatasetTable from it. */
export function loadDatasetTable(dbPath: string, supportedYears: readonly number[]): DatasetTable {
  if (!fs.existsSync(dbPath)) {
    throw new DatasetError(`Database not found at ${dbPath}. Run: npm run setup-db`);
  }

  const db = new Database(dbPath, { readonly: true, fileMustExist: true });
  try {
    const table = DatasetTable.from(readBranchRecords(db), supportedYears);
    logger.info('Library dataset loaded', {
      path: dbPath,
      records: table.size,
      branches: table.codes().length,
      years: table.supportedYears,
    });
    return table;
  } finally {
    db.close();
  }
}
