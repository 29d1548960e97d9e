/**
 * src/lib/postal-geocoder.ts
 *
 * Resolves Ontario postal codes to a reference coordinate using a static table
 * of forward sortation area (FSA) centroids.
 */

import fs from 'fs';
import * as Joi from 'joi';
import { Coordinate } from '../types';
import { DatasetError, UnresolvableLocationError } from '../utils/errors';
import {
  forwardSortationArea,
  isOntarioPostalCode,
  isWellFormedPostalCode,
  normalizePostalCode,
} from '../utils/postalCode';

const centroidSchema = Joi.object<Record<string, Coordinate>>()
  .pattern(
    Joi.string().pattern(/^[A-Z]\d[A-Z]$/),
    Joi.object({
      lat: Joi.number().min(-90).max(90).required(),
      lng: Joi.number().min(-180).max(180).required(),
    })
  )
  .min(1);

export class PostalGeocoder {
  private readonly centroids: ReadonlyMap<string, Readonly<Coordinate>>;

  constructor(centroids: Record<string, Coordinate>) {
    this.centroids = new Map(
      Object.entries(centroids).map(([fsa, coordinate]) => [
        fsa.toUpperCase(),
        Object.freeze({ lat: coordinate.lat, lng: coordinate.lng }),
      ])
    );
  }

  static fromFile(filePath: string): PostalGeocoder {
    if (!fs.existsSync(filePath)) {
      throw new DatasetError(`Postal centroid file not found at ${filePath}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
      throw new DatasetError(
        `Postal centroid file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const { error, value } = centroidSchema.validate(parsed);
    if (error) {
      throw new DatasetError(`Postal centroid file ${filePath} is invalid: ${error.message}`);
    }
    return new PostalGeocoder(value);
  }

  get size(): number {
    return this.centroids.size;
  }

  /** Looks up a postal code, returning undefined instead of throwing. */
  tryResolve(postalCode: string): Readonly<Coordinate> | undefined {
    if (!isWellFormedPostalCode(postalCode)) return undefined;
    return this.centroids.get(forwardSortationArea(postalCode));
  }

  resolve(postalCode: string): Readonly<Coordinate> {
    const normalized = normalizePostalCode(postalCode);
    if (!isWellFormedPostalCode(normalized)) {
      throw new UnresolvableLocationError(postalCode, 'expected a postal code like K1A 0B1');
    }
    if (!isOntarioPostalCode(normalized)) {
      throw new UnresolvableLocationError(postalCode, 'only Ontario postal codes are supported');
    }
    const coordinate = this.centroids.get(forwardSortationArea(normalized));
    if (!coordinate) {
      throw new UnresolvableLocationError(
        postalCode,
        `no reference location for area ${forwardSortationArea(normalized)}`
      );
    }
    return coordinate;
  }
}
