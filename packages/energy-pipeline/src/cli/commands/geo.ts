/**
 * Geo Command
 *
 * Prints the choropleth FeatureCollection (GeoJSON) of the filtered view:
 * one feature per region with parsed geometry, carrying its production
 * total. Without --from or --to the map covers the latest year only.
 * Always JSON.
 *
 * @module cli/commands/geo
 */

import type { DatasetSnapshot } from '../../context/pipeline.js';
import { buildChoropleth } from '../../geo/choropleth.js';
import { EXIT_CODES, type CommandResult } from '../lib/exit-codes.js';
import { filterOptionsSchema, readOptions, toFilterSpec } from '../lib/options.js';
import { formatJson } from '../lib/output.js';

export function runGeo(snapshot: DatasetSnapshot, options: unknown): CommandResult {
  const parsed = readOptions(filterOptionsSchema, options);
  const years =
    parsed.from === undefined && parsed.to === undefined ? { ...parsed, from: snapshot.yearRange.max } : parsed;
  const view = snapshot.aggregator.filter(toFilterSpec(years, snapshot.yearRange));
  const collection = buildChoropleth(snapshot.geo, view.totalByRegion());

  return {
    output: formatJson(collection, false),
    exitCode: snapshot.geo.failures.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS,
  };
}
