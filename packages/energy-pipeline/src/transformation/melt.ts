/**
 * Wide → long reshaping.
 *
 * One observation per (row, energy type column). The result is sorted by
 * year, region code, energy type so that every consumer sees the same order.
 */

import type { Observation, WideMwhTable } from '../core/types.js';
import { compareObservations } from '../core/utils/ordering.js';

export function meltToLong(table: WideMwhTable): Observation[] {
  const observations: Observation[] = [];

  for (const row of table.rows) {
    for (const energyType of table.energyTypes) {
      observations.push({
        regionCode: row.regionCode,
        regionName: row.regionName,
        year: row.year,
        energyType,
        valueMwh: row.productionMwh[energyType] ?? 0,
      });
    }
  }

  return observations.sort(compareObservations);
}
