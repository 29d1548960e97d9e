import fs from 'fs';
import path from 'path';
import { collectYearRecords, parseSourceCsv, sourceFileFor } from '../setup-database';
import { fixtureGeocoder } from './helpers';

const DATA_DIR = path.join(__dirname, '../../library_data');

describe('setup-database', () => {
  test('sourceFileFor names the yearly spreadsheet', () => {
    expect(sourceFileFor('/data', 2018)).toBe(path.join('/data', 'ontario_public_library_statistics_2018.csv'));
  });

  test('parseSourceCsv keys rows by header and keeps quoted thousands', () => {
    const rows = parseSourceCsv(
      '\uFEFFLibrary Full Name,Library Number,No. Cardholders\n Harbourfront Public Library ,L0201,"1,200"\n\n'
    );

    expect(rows).toEqual([
      { 'Library Full Name': 'Harbourfront Public Library', 'Library Number': 'L0201', 'No. Cardholders': '1,200' },
    ]);
  });

  describe('collectYearRecords', () => {
    const csv = [
      'Library Full Name,Library Number,Year,Postal Code,No. Cardholders',
      'Harbourfront Public Library,L0201,2018,M5V 3L9,"1,200"',
      ',L0202,2018,,5',
      'Harbourfront Public Library,l0201,2018,,7',
    ].join('\n');

    test('should skip rows without a name and repeated branch years', () => {
      const seen = new Set<string>();
      const { records, skipped } = collectYearRecords(parseSourceCsv(csv), 2018, fixtureGeocoder(), seen);

      expect(skipped).toBe(2);
      expect(records).toHaveLength(1);
      expect(records[0].stats.cardholders).toBe(1200);
      expect(records[0].coordinate).toEqual({ lat: 43.0, lng: -79.0 });
      expect([...seen]).toEqual(['L0201|2018']);
    });

    test('should skip branch years already imported', () => {
      const seen = new Set(['L0201|2018']);

      expect(collectYearRecords(parseSourceCsv(csv), 2018, fixtureGeocoder(), seen).records).toEqual([]);
    });
  });

  describe('reporting year', () => {
    const csv = [
      'Library Full Name,Library Number,Year',
      'Harbourfront Public Library,L0900,2020',
      'Harbourfront Public Library,L0901,2019',
      'Harbourfront Public Library,L0902,2018',
      'Harbourfront Public Library,L0903,',
    ].join('\n');

    test('should skip rows reporting a year other than the spreadsheet year', () => {
      const { records, skipped } = collectYearRecords(parseSourceCsv(csv), 2019, fixtureGeocoder(), new Set());

      expect(records.map(r => `${r.code}/${r.year}`)).toEqual(['L0901/2019', 'L0903/2019']);
      expect(skipped).toBe(2);
    });

    test('should skip every row of an unsupported spreadsheet year', () => {
      const { records, skipped } = collectYearRecords(parseSourceCsv(csv), 2020, fixtureGeocoder(), new Set());

      expect(records).toEqual([]);
      expect(skipped).toBe(4);
    });

    test('should keep skipped rows out of the seen set', () => {
      const seen = new Set<string>();
      collectYearRecords(parseSourceCsv(csv), 2019, fixtureGeocoder(), seen);

      expect([...seen]).toEqual(['L0901|2019', 'L0903|2019']);
    });
  });

  test('the bundled 2019 spreadsheet maps without skipped rows', () => {
    const content = fs.readFileSync(sourceFileFor(DATA_DIR, 2019), 'utf-8');
    const { records, skipped } = collectYearRecords(parseSourceCsv(content), 2019, fixtureGeocoder(), new Set());

    expect(skipped).toBe(0);
    expect(records.map(r => r.code)).toEqual(['L0101', 'L0102', 'L0103', 'L0104', 'L0106', 'L0107', 'L0108']);

    const fortYork = records[1];
    expect(fortYork.address).toBe('789 Yonge St');
    expect(fortYork.stats.cardholders).toBe(1250000);

    const cedarNarrows = records[6];
    expect(cedarNarrows.coordinate).toBeNull();
    expect(cedarNarrows.stats.electronicTitles).toBeNull();
    expect(cedarNarrows.stats.printTitles).toBe(4000);
  });
});
