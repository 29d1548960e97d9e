#!/usr/bin/env node

/**
 * One-time script to import the yearly Ontario public library statistics
 * spreadsheets (exported as CSV) into the SQLite database the portal reads.
 *
 * Expects library_data/ontario_public_library_statistics_<year>.csv for every
 * supported year. Re-running replaces the database.
 */

import Database from 'better-sqlite3';
import { parse } from 'csv-parse/sync';
import path from 'path';
import fs from 'fs';
import { config } from './config';
import { PostalGeocoder } from './lib/postal-geocoder';
import { RowIssue, SOURCE_HEADERS, SourceRow, mapSourceRow } from './lib/source-rows';
import { createSchema, insertBranchRecords } from './lib/library-database';
import { DatasetError } from './utils/errors';
import { logger } from './utils/logger';
import type { BranchRecord } from './types';

export function sourceFileFor(dataDir: string, year: number): string {
  return path.join(dataDir, `ontario_public_library_statistics_${year}.csv`);
}

export function parseSourceCsv(content: string): SourceRow[] {
  return parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  }) as SourceRow[];
}

/**
 * Maps every row of one year's spreadsheet, skipping rows without a code or
 * name, rows reporting another (or an unsupported) year and repeated
 * (code, year) pairs already in `seen`.
 */
export function collectYearRecords(
  rows: readonly SourceRow[],
  year: number,
  geocoder: PostalGeocoder,
  seen: Set<string>
): { records: BranchRecord[]; skipped: number } {
  const records: BranchRecord[] = [];
  let skipped = 0;

  for (const row of rows) {
    const { record, issues } = mapSourceRow(row, year, geocoder);
    for (const issue of issues) {
      logger.warn('Source value ignored', { year, ...issue });
    }
    if (!record) {
      skipped++;
      continue;
    }

    if (record.year !== year || !config.dataset.supportedYears.includes(record.year)) {
      const issue: RowIssue = {
        code: record.code,
        column: SOURCE_HEADERS.year,
        value: String(record.year),
        reason: `not the ${year} reporting year`,
      };
      logger.warn('Branch row skipped', { year, ...issue });
      skipped++;
      continue;
    }

    const key = `${record.code}|${record.year}`;
    if (seen.has(key)) {
      logger.warn('Duplicate branch row skipped', { code: record.code, year: record.year });
      skipped++;
      continue;
    }
    seen.add(key);
    records.push(record);
  }

  return { records, skipped };
}

async function createDatabase(): Promise<void> {
  const { dataDir, dbPath, centroidsPath, supportedYears } = config.dataset;
  logger.info('Creating SQLite database from library statistics', { source: dataDir, target: dbPath });

  const geocoder = PostalGeocoder.fromFile(centroidsPath);

  const seen = new Set<string>();
  const records: BranchRecord[] = [];
  for (const year of supportedYears) {
    const file = sourceFileFor(dataDir, year);
    if (!fs.existsSync(file)) {
      throw new DatasetError(`Source spreadsheet not found at ${file}`);
    }
    const rows = parseSourceCsv(await fs.promises.readFile(file, 'utf-8'));
    const result = collectYearRecords(rows, year, geocoder, seen);
    records.push(...result.records);
    logger.info('Processed source spreadsheet', {
      year,
      rows: rows.length,
      imported: result.records.length,
      skipped: result.skipped,
    });
  }

  const unlocated = records.filter(record => !record.coordinate).length;
  if (unlocated > 0) {
    logger.warn('Branch records without a location', { count: unlocated });
  }

  // Remove old database if exists
  if (fs.existsSync(dbPath)) {
    logger.warn('Removing existing database', { path: dbPath });
    fs.unlinkSync(dbPath);
  }

  const db = new Database(dbPath);
  try {
    createSchema(db);
    const inserted = insertBranchRecords(db, records);
    db.exec('VACUUM');
    db.exec('ANALYZE');
    logger.info('Database created successfully', {
      path: dbPath,
      records: inserted,
      sizeKb: Math.round(fs.statSync(dbPath).size / 1024),
    });
  } finally {
    db.close();
  }
}

// Run if called directly
if (require.main === module) {
  createDatabase().catch(error => {
    logger.error('Fatal error creating database', { error });
    process.exit(1);
  });
}
