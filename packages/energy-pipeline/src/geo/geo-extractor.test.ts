/**
 * Tests for the geo extractor and choropleth builder
 *
 * Validates:
 * 1. Per-region extraction (shape, center, bbox)
 * 2. Caching per source key and invalidation
 * 3. Malformed geometry collected as GeoParseError, other regions kept
 */

import { describe, expect, it } from 'vitest';
import { GeoParseError } from '../core/errors.js';
import type { CleanRow, CleanTable } from '../core/types.js';
import { squarePoint, squareShape } from '../__tests__/fixtures/energy-dataset.js';
import { buildChoropleth } from './choropleth.js';
import { GeoExtractor } from './geo-extractor.js';

function row(index: number, regionCode: string, regionName: string, geo: Partial<Pick<CleanRow, 'geoShape' | 'geoPoint'>> = {}): CleanRow {
  return {
    row: index + 1,
    year: 2020,
    regionCode,
    regionName,
    productionGwh: {},
    geoShape: geo.geoShape === undefined ? squareShape(index) : geo.geoShape,
    geoPoint: geo.geoPoint === undefined ? squarePoint(index) : geo.geoPoint,
  };
}

function table(rows: CleanRow[]): CleanTable {
  return {
    sourcePath: 'memory.csv',
    energyTypes: [],
    regions: [],
    yearRange: { min: 2020, max: 2020 },
    rows,
    report: { zeroFilled: [], forwardFilled: 0 },
  };
}

describe('GeoExtractor', () => {
  it('extracts shape, center and bbox per region', () => {
    const extraction = new GeoExtractor().extract('a', table([row(0, '53', 'Bretagne'), row(1, '11', 'Île-de-France')]));

    expect([...extraction.shapes.keys()]).toEqual(['11', '53']);
    expect(extraction.shapes.get('53')).toEqual({
      regionCode: '53',
      regionName: 'Bretagne',
      geometry: {
        type: 'Polygon',
        coordinates: [
          [
            [0, 40],
            [1, 40],
            [1, 41],
            [0, 41],
            [0, 40],
          ],
        ],
      },
      center: { lat: 40.5, lon: 0.5 },
      bbox: [0, 40, 1, 41],
    });
    expect(extraction.failures).toEqual([]);
  });

  it('falls back to the shape centroid when no point is given', () => {
    const extraction = new GeoExtractor().extract('a', table([row(2, '53', 'Bretagne', { geoPoint: null })]));

    expect(extraction.shapes.get('53')?.center).toEqual({ lat: 40.5, lon: 2.5 });
  });

  it('parses each source once until invalidated', () => {
    const extractor = new GeoExtractor();
    const source = table([row(0, '53', 'Bretagne'), row(1, '11', 'Île-de-France')]);

    const first = extractor.extract('a', source);
    const second = extractor.extract('a', source);

    expect(second).toBe(first);
    expect(extractor.stats()).toEqual({ cachedSources: 1, parses: 2 });

    extractor.invalidate('a');
    const third = extractor.extract('a', source);

    expect(third).not.toBe(first);
    expect(extractor.stats()).toEqual({ cachedSources: 1, parses: 4 });
  });

  it('omits a region with malformed geometry and records why', () => {
    const extraction = new GeoExtractor().extract(
      'a',
      table([row(0, '53', 'Bretagne', { geoShape: '{"type":"Polygon"' }), row(1, '11', 'Île-de-France')])
    );

    expect([...extraction.shapes.keys()]).toEqual(['11']);
    expect(extraction.failedRegionCodes).toEqual(['53']);
    expect(extraction.failures[0]).toBeInstanceOf(GeoParseError);
    expect(extraction.failures[0]).toMatchObject({
      stage: 'geo',
      row: 1,
      fatal: false,
      message: 'Region 53 (Bretagne): Shape is not valid JSON',
    });
  });

  it('takes the first non-empty shape of a region', () => {
    const extraction = new GeoExtractor().extract(
      'a',
      table([row(0, '53', 'Bretagne', { geoShape: null }), row(3, '53', 'Bretagne')])
    );

    expect(extraction.shapes.get('53')?.bbox).toEqual([3, 40, 4, 41]);
  });
});

describe('buildChoropleth', () => {
  it('emits one feature per region with a total', () => {
    const extraction = new GeoExtractor().extract('a', table([row(0, '53', 'Bretagne'), row(1, '11', 'Île-de-France')]));

    const collection = buildChoropleth(extraction, new Map([['53', 2900]]));

    expect(collection.type).toBe('FeatureCollection');
    expect(collection.features).toHaveLength(1);
    expect(collection.features[0]?.properties).toEqual({
      regionCode: '53',
      regionName: 'Bretagne',
      productionMwh: 2900,
      centerLat: 40.5,
      centerLon: 0.5,
    });
  });
});
