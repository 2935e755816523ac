/**
 * Choropleth feature collection for map consumers: one feature per region
 * that has both parsed geometry and a production total.
 */

import { feature, featureCollection } from '@turf/turf';
import type { Feature, FeatureCollection } from 'geojson';
import type { RegionGeometry } from '../core/types.js';
import type { GeoExtraction } from './geo-extractor.js';

// A type alias rather than an interface: turf's property generic needs an
// implicit index signature.
export type RegionFeatureProperties = {
  readonly regionCode: string;
  readonly regionName: string;
  readonly productionMwh: number;
  readonly centerLat: number;
  readonly centerLon: number;
};

export type RegionFeatureCollection = FeatureCollection<RegionGeometry, RegionFeatureProperties>;

/**
 * @param totals - production per region code; regions absent here are left out
 */
export function buildChoropleth(
  extraction: GeoExtraction,
  totals: ReadonlyMap<string, number>
): RegionFeatureCollection {
  const features: Array<Feature<RegionGeometry, RegionFeatureProperties>> = [];

  for (const [regionCode, shape] of extraction.shapes) {
    const productionMwh = totals.get(regionCode);
    if (productionMwh === undefined) continue;

    features.push(
      feature(shape.geometry, {
        regionCode,
        regionName: shape.regionName,
        productionMwh,
        centerLat: shape.center.lat,
        centerLon: shape.center.lon,
      })
    );
  }

  return featureCollection(features);
}
