/**
 * src/lib/library-catalog.ts
 *
 * Entry point for every portal lookup. Owns the shared dataset table and the
 * postal geocoder, and memoises search and archive results in a bounded LRU
 * cache. Failed calls are never cached.
 */

import { DatasetTable } from './dataset-table';
import { PostalGeocoder } from './postal-geocoder';
import { loadDatasetTable } from './library-database';
import { findBranch } from '../functions/findBranch';
import { Need, canonicalNeeds } from '../functions/needs';
import { searchNearbyBranches } from '../functions/searchNearbyBranches';
import { summarizeYear } from '../functions/summarizeYear';
import { CacheStats, LRUCache } from '../utils/LRUCache';
import { normalizePostalCode } from '../utils/postalCode';
import { logger } from '../utils/logger';
import type { PortalConfig } from '../config';
import { SUMMARY_COLUMNS } from '../types';
import type { BranchRecord, Coordinate, NearbyBranch, YearlySummary } from '../types';

// Deep freeze: cached summaries are shared by every caller
function freezeSummary(summary: YearlySummary): YearlySummary {
  for (const column of SUMMARY_COLUMNS) {
    const statistics = summary.columns[column];
    statistics.recordHolders.forEach(holder => Object.freeze(holder));
    Object.freeze(statistics.recordHolders);
    Object.freeze(statistics);
  }
  summary.resourcesPerCardholder.forEach(cell => Object.freeze(cell));
  Object.freeze(summary.resourcesPerCardholder);
  Object.freeze(summary.columns);
  return Object.freeze(summary);
}

export interface LibraryCatalogOptions {
  cacheSize: number;
}

export class LibraryCatalog {
  private readonly nearbyCache: LRUCache<readonly NearbyBranch[]>;
  private readonly summaryCache: LRUCache<YearlySummary>;

  constructor(
    private readonly table: DatasetTable,
    private readonly geocoder: PostalGeocoder,
    options: LibraryCatalogOptions = { cacheSize: 0 }
  ) {
    this.nearbyCache = new LRUCache(options.cacheSize);
    this.summaryCache = new LRUCache(options.cacheSize);
  }

  static load(portalConfig: PortalConfig): LibraryCatalog {
    const { dbPath, centroidsPath, supportedYears } = portalConfig.dataset;
    const table = loadDatasetTable(dbPath, supportedYears);
    const geocoder = PostalGeocoder.fromFile(centroidsPath);
    logger.info('Postal centroids loaded', { path: centroidsPath, areas: geocoder.size });
    return new LibraryCatalog(table, geocoder, { cacheSize: portalConfig.cache.resultCacheSize });
  }

  get supportedYears(): readonly number[] {
    return this.table.supportedYears;
  }

  get recordCount(): number {
    return this.table.size;
  }

  findBranch(query: string): BranchRecord[] {
    const records = findBranch(this.table, query);
    logger.debug('Branch lookup', { query, matches: records.length });
    return records;
  }

  /** Reference coordinate of a postal code; throws UnresolvableLocationError. */
  locate(postalCode: string): Readonly<Coordinate> {
    return this.geocoder.resolve(postalCode);
  }

  searchNearby(postalCode: string, needs: readonly Need[] = []): readonly NearbyBranch[] {
    const selected = canonicalNeeds(needs);
    const key = `${normalizePostalCode(postalCode)}|${selected.join(',')}`;
    const cached = this.nearbyCache.get(key);
    if (cached) {
      logger.debug('Nearby search served from cache', { key });
      return cached;
    }

    const results = Object.freeze(
      searchNearbyBranches(this.table, this.geocoder, postalCode, selected).map(result => Object.freeze(result))
    );
    logger.debug('Nearby search', { postalCode, needs: selected, results: results.length });
    this.nearbyCache.set(key, results);
    return results;
  }

  summarize(year: number): YearlySummary {
    return this.summaryCache.getOrCompute(String(year), () => {
      logger.debug('Summarising archive year', { year });
      return freezeSummary(summarizeYear(this.table, year));
    });
  }

  cacheStats(): { nearby: CacheStats; summaries: CacheStats } {
    return { nearby: this.nearbyCache.stats(), summaries: this.summaryCache.stats() };
  }
}
