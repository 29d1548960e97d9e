import Database from 'better-sqlite3';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  createSchema,
  insertBranchRecords,
  loadDatasetTable,
  readBranchRecords,
} from '../../lib/library-database';
import { DatasetError } from '../../utils/errors';
import { FIXTURE_RECORDS, SUPPORTED_YEARS, makeRecord, stats } from '../helpers';

describe('library database', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    createSchema(db);
  });

  afterEach(() => {
    db.close();
  });

  test('should read back every inserted record unchanged', () => {
    expect(insertBranchRecords(db, FIXTURE_RECORDS)).toBe(FIXTURE_RECORDS.length);

    const records = readBranchRecords(db);
    const byKey = (code: string, year: number) => records.find(r => r.code === code && r.year === year);

    expect(records).toHaveLength(FIXTURE_RECORDS.length);
    for (const original of FIXTURE_RECORDS) {
      expect(byKey(original.code, original.year)).toEqual(original);
    }
  });

  test('should return rows ordered by code then year', () => {
    insertBranchRecords(db, [...FIXTURE_RECORDS].reverse());

    const keys = readBranchRecords(db).map(r => `${r.code}/${r.year}`);

    expect(keys.slice(0, 4)).toEqual(['L0001/2017', 'L0001/2018', 'L0001/2019', 'L0002/2018']);
  });

  test('should reject negative counts', () => {
    const negative = makeRecord({
      code: 'L0009',
      name: 'Broken Library',
      year: 2019,
      stats: stats(-1, null, [null, null, null, null], [null, null, null, null]),
    });

    expect(() => insertBranchRecords(db, [negative])).toThrow(/CHECK constraint failed/);
    expect(readBranchRecords(db)).toEqual([]);
  });

  test('should reject a second row for the same branch and year', () => {
    expect(() => insertBranchRecords(db, [FIXTURE_RECORDS[0], FIXTURE_RECORDS[0]])).toThrow(/UNIQUE constraint failed/);
  });

  describe('loadDatasetTable', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'library-db-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    test('should build a table from a database file', () => {
      const dbPath = path.join(dir, 'libraries.db');
      const fileDb = new Database(dbPath);
      createSchema(fileDb);
      insertBranchRecords(fileDb, FIXTURE_RECORDS);
      fileDb.close();

      const table = loadDatasetTable(dbPath, SUPPORTED_YEARS);

      expect(table.size).toBe(FIXTURE_RECORDS.length);
      expect(table.codes()).toEqual(['L0001', 'L0002', 'L0003', 'L0004', 'L0005']);
    });

    test('should explain how to create a missing database', () => {
      const dbPath = path.join(dir, 'missing.db');

      expect(() => loadDatasetTable(dbPath, SUPPORTED_YEARS)).toThrow(DatasetError);
      expect(() => loadDatasetTable(dbPath, SUPPORTED_YEARS)).toThrow(
        `Database not found at ${dbPath}. Run: npm run setup-db`
      );
    });
  });
});
