import fs from 'fs';
import os from 'os';
import path from 'path';
import { PostalGeocoder } from '../../lib/postal-geocoder';
import { DatasetError, UnresolvableLocationError } from '../../utils/errors';
import { fixtureGeocoder } from '../helpers';

describe('PostalGeocoder', () => {
  const geocoder = fixtureGeocoder();

  describe('resolve', () => {
    test('should resolve a postal code by its forward sortation area', () => {
      expect(geocoder.resolve('K1P 1A1')).toEqual({ lat: 45.0, lng: -75.0 });
      expect(geocoder.resolve('k1p9z9')).toEqual({ lat: 45.0, lng: -75.0 });
    });

    test('should reject malformed postal codes', () => {
      expect(() => geocoder.resolve('12345')).toThrow(UnresolvableLocationError);
      expect(() => geocoder.resolve('12345')).toThrow(
        'Cannot locate postal code "12345": expected a postal code like K1A 0B1'
      );
    });

    test('should reject postal codes outside Ontario', () => {
      expect(() => geocoder.resolve('H2X 1Y4')).toThrow(
        'Cannot locate postal code "H2X 1Y4": only Ontario postal codes are supported'
      );
    });

    test('should reject Ontario areas without a reference location', () => {
      expect(() => geocoder.resolve('N0B 1A0')).toThrow('no reference location for area N0B');
    });
  });

  describe('tryResolve', () => {
    test('should return undefined instead of throwing', () => {
      expect(geocoder.tryResolve('M5V 3L9')).toEqual({ lat: 43.0, lng: -79.0 });
      expect(geocoder.tryResolve('not a code')).toBeUndefined();
      expect(geocoder.tryResolve('N0B1A0')).toBeUndefined();
    });
  });

  describe('fromFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'centroids-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    test('should load a valid centroid file', () => {
      const file = path.join(dir, 'centroids.json');
      fs.writeFileSync(file, JSON.stringify({ K7L: { lat: 44.23, lng: -76.49 } }));

      const loaded = PostalGeocoder.fromFile(file);

      expect(loaded.size).toBe(1);
      expect(loaded.resolve('K7L 1X8')).toEqual({ lat: 44.23, lng: -76.49 });
    });

    test('should reject entries that are not coordinates', () => {
      const file = path.join(dir, 'centroids.json');
      fs.writeFileSync(file, JSON.stringify({ K7L: { lat: 144.23, lng: -76.49 } }));

      expect(() => PostalGeocoder.fromFile(file)).toThrow(DatasetError);
    });

    test('should reject files that are not JSON', () => {
      const file = path.join(dir, 'centroids.json');
      fs.writeFileSync(file, 'K7L,44.23,-76.49');

      expect(() => PostalGeocoder.fromFile(file)).toThrow(/is not valid JSON/);
    });

    test('should report a missing file', () => {
      const file = path.join(dir, 'missing.json');

      expect(() => PostalGeocoder.fromFile(file)).toThrow(`Postal centroid file not found at ${file}`);
    });
  });
});
