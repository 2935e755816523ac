/**
 * Geo Extractor
 *
 * Parses each region's embedded shape and point text once and caches the
 * result per source. A region whose text is malformed gets a GeoParseError
 * in `failures`; the other regions are still extracted.
 *
 * CACHE: entries live until invalidate() is called for their source key
 * (the pipeline context does this on reload).
 */

import { bbox, centroid } from '@turf/turf';
import { GeoParseError } from '../core/errors.js';
import type { CleanTable, GeoShape, LatLon } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { compareCodes } from '../core/utils/ordering.js';
import { GeometryTextError, parsePointText, parseShapeText } from './parse-geometry.js';

const log = createLogger({ module: 'geo' });

export interface GeoExtraction {
  /** Parsed shapes keyed by region code, in code order */
  readonly shapes: ReadonlyMap<string, GeoShape>;
  readonly failures: readonly GeoParseError[];
  readonly failedRegionCodes: readonly string[];
}

export interface GeoExtractorStats {
  readonly cachedSources: number;
  /** Region geometries parsed since construction */
  readonly parses: number;
}

interface RegionGeoText {
  readonly code: string;
  readonly name: string;
  readonly row: number;
  readonly shape: string | null;
  readonly point: string | null;
}

/**
 * First non-empty shape and point text per region code, in code order.
 */
function collectGeoText(table: CleanTable): RegionGeoText[] {
  const byCode = new Map<string, RegionGeoText>();
  for (const row of table.rows) {
    const known = byCode.get(row.regionCode);
    if (known === undefined) {
      byCode.set(row.regionCode, {
        code: row.regionCode,
        name: row.regionName,
        row: row.row,
        shape: row.geoShape,
        point: row.geoPoint,
      });
      continue;
    }
    if (known.shape === null || known.point === null) {
      byCode.set(row.regionCode, {
        ...known,
        row: known.shape === null && row.geoShape !== null ? row.row : known.row,
        shape: known.shape ?? row.geoShape,
        point: known.point ?? row.geoPoint,
      });
    }
  }
  return [...byCode.values()].sort((a, b) => compareCodes(a.code, b.code));
}

export class GeoExtractor {
  private readonly cache = new Map<string, GeoExtraction>();
  private parses = 0;

  /**
   * Extract geometry for every region of `table`, or return the cached
   * extraction for `sourceKey`.
   */
  extract(sourceKey: string, table: CleanTable): GeoExtraction {
    const cached = this.cache.get(sourceKey);
    if (cached !== undefined) {
      return cached;
    }

    const shapes = new Map<string, GeoShape>();
    const failures: GeoParseError[] = [];

    for (const region of collectGeoText(table)) {
      this.parses += 1;
      try {
        shapes.set(region.code, this.parseRegion(region));
      } catch (error) {
        if (!(error instanceof GeoParseError)) {
          throw error;
        }
        failures.push(error);
      }
    }

    const extraction: GeoExtraction = {
      shapes,
      failures,
      failedRegionCodes: failures.map((failure) => failure.regionCode),
    };

    if (failures.length > 0) {
      log.warn('Region geometry omitted', {
        sourceKey,
        regions: extraction.failedRegionCodes,
        reasons: failures.map((failure) => failure.message),
      });
    }
    log.debug('Geometry extracted', { sourceKey, regions: shapes.size });

    this.cache.set(sourceKey, extraction);
    return extraction;
  }

  /**
   * Drop the cached extraction for one source, or for all sources.
   */
  invalidate(sourceKey?: string): void {
    if (sourceKey === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(sourceKey);
    }
  }

  stats(): GeoExtractorStats {
    return { cachedSources: this.cache.size, parses: this.parses };
  }

  private parseRegion(region: RegionGeoText): GeoShape {
    const fail = (message: string, cause?: unknown): GeoParseError =>
      new GeoParseError(`Region ${region.code} (${region.name}): ${message}`, region.code, {
        row: region.row,
        cause,
      });

    if (region.shape === null) {
      throw fail('no shape text in any row');
    }

    try {
      const geometry = parseShapeText(region.shape);
      const center: LatLon =
        region.point === null ? centerOf(geometry) : parsePointText(region.point);

      return {
        regionCode: region.code,
        regionName: region.name,
        geometry,
        center,
        bbox: bbox(geometry),
      };
    } catch (error) {
      if (error instanceof GeometryTextError) {
        throw fail(error.message, error);
      }
      throw error;
    }
  }
}

function centerOf(geometry: GeoShape['geometry']): LatLon {
  const [lon = 0, lat = 0] = centroid(geometry).geometry.coordinates;
  return { lat, lon };
}
