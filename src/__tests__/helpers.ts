import { DatasetTable } from '../lib/dataset-table';
import { PostalGeocoder } from '../lib/postal-geocoder';
import { LibraryCatalog } from '../lib/library-catalog';
import type { OutputSink, Prompter } from '../portal/prompter';
import type { BranchRecord, Coordinate, StatColumn, StatValue } from '../types';

export const SUPPORTED_YEARS = [2017, 2018, 2019];

type Quad = [StatValue, StatValue, StatValue, StatValue];

// print and electronic are [total, english, french, other]
export function stats(
  cardholders: StatValue,
  circulation: StatValue,
  print: Quad,
  electronic: Quad
): Record<StatColumn, StatValue> {
  return {
    cardholders,
    circulation,
    printTitles: print[0],
    englishPrintTitles: print[1],
    frenchPrintTitles: print[2],
    otherPrintTitles: print[3],
    electronicTitles: electronic[0],
    englishElectronicTitles: electronic[1],
    frenchElectronicTitles: electronic[2],
    otherElectronicTitles: electronic[3],
  };
}

export function makeRecord(
  fields: Pick<BranchRecord, 'code' | 'name' | 'year'> & Partial<BranchRecord>
): BranchRecord {
  return {
    region: null,
    serviceType: null,
    address: null,
    city: null,
    postalCode: null,
    website: null,
    coordinate: null,
    stats: stats(null, null, [null, null, null, null], [null, null, null, null]),
    ...fields,
  };
}

export const CENTROIDS: Record<string, Coordinate> = {
  K1P: { lat: 45.0, lng: -75.0 },
  K2P: { lat: 46.0, lng: -75.0 },
  M5V: { lat: 43.0, lng: -79.0 },
  P3E: { lat: 46.5, lng: -81.0 },
};

const CAPITAL = {
  code: 'L0001',
  region: 'Southern',
  serviceType: 'Public Library',
  address: '1 Main St',
  city: 'Ottawa',
  postalCode: 'K1P 1A1',
  coordinate: { lat: 45.0, lng: -75.0 },
};

const RIVERSIDE = {
  code: 'L0002',
  name: 'Riverside Public Library',
  region: 'Southern',
  serviceType: 'Public Library',
  coordinate: { lat: 45.5, lng: -75.0 },
};

const LAKESIDE = {
  code: 'L0003',
  name: 'Lakeside Public Library',
  region: 'Southern',
  serviceType: 'County Library',
  website: 'lakeside.example',
  coordinate: { lat: 45.5, lng: -75.0 },
};

export const FIXTURE_RECORDS: BranchRecord[] = [
  makeRecord({
    ...CAPITAL,
    name: 'Capital Region Library',
    year: 2017,
    stats: stats(800, 20000, [4500, 4400, 100, 0], [1500, 1500, 0, 0]),
  }),
  makeRecord({
    ...CAPITAL,
    name: 'Capital City Public Library',
    year: 2018,
    stats: stats(900, 21000, [4800, 4700, 100, 0], [1800, 1790, 10, 0]),
  }),
  makeRecord({
    ...CAPITAL,
    name: 'Capital City Public Library',
    year: 2019,
    website: 'www.capital.example',
    stats: stats(1000, 22000, [5000, 4900, 100, 0], [2000, 1980, 20, 0]),
  }),
  makeRecord({
    ...RIVERSIDE,
    year: 2018,
    stats: stats(400, null, [2500, 2500, 0, 0], [0, 0, 0, 0]),
  }),
  makeRecord({
    ...RIVERSIDE,
    year: 2019,
    stats: stats(500, 9000, [3000, 3000, 0, 0], [0, 0, 0, 0]),
  }),
  makeRecord({
    ...LAKESIDE,
    year: 2018,
    stats: stats(0, 5000, [4800, 4700, 100, 0], [400, 400, 0, 0]),
  }),
  makeRecord({
    ...LAKESIDE,
    year: 2019,
    stats: stats(null, 6000, [5000, 4980, 20, 0], [500, 500, 0, 0]),
  }),
  makeRecord({
    code: 'L0004',
    name: 'Northern Lights Library',
    year: 2019,
    region: 'Northern',
    serviceType: 'Public Library',
    website: 'northern.example',
    stats: stats(50, 300, [400, 350, 50, 0], [10, 10, 0, 0]),
  }),
  makeRecord({
    code: 'L0005',
    name: 'Riverside Branch Library',
    year: 2017,
    coordinate: { lat: 43.0, lng: -79.0 },
    stats: stats(700, 15000, [3500, 3000, 0, 500], [1000, 900, 0, 100]),
  }),
];

export function fixtureTable(records: readonly BranchRecord[] = FIXTURE_RECORDS): DatasetTable {
  return DatasetTable.from(records, SUPPORTED_YEARS);
}

export function fixtureGeocoder(): PostalGeocoder {
  return new PostalGeocoder(CENTROIDS);
}

export function fixtureCatalog(records: readonly BranchRecord[] = FIXTURE_RECORDS, cacheSize = 10): LibraryCatalog {
  return new LibraryCatalog(fixtureTable(records), fixtureGeocoder(), { cacheSize });
}

/** Replays fixed answers, then reports end of input. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private readonly answers: string[];

  constructor(answers: readonly string[]) {
    this.answers = [...answers];
  }

  ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return Promise.resolve(this.answers.shift() ?? null);
  }

  close(): void {
    this.answers.length = 0;
  }
}

export class MemoryOutput implements OutputSink {
  readonly lines: string[] = [];

  print(line = ''): void {
    this.lines.push(line);
  }

  count(line: string): number {
    return this.lines.filter(candidate => candidate === line).length;
  }
}
