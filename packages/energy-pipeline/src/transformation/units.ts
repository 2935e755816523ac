/**
 * GWh → MWh conversion of the cleaned wide table.
 *
 * Each value is multiplied by GWH_TO_MWH once; nothing is rounded.
 */

import { GWH_TO_MWH, type EnergyType } from '../core/constants.js';
import type { CleanTable, WideMwhRow, WideMwhTable } from '../core/types.js';

export function gwhToMwh(valueGwh: number): number {
  return valueGwh * GWH_TO_MWH;
}

export function toMegawattHours(table: CleanTable): WideMwhTable {
  const rows = table.rows.map((row): WideMwhRow => {
    const productionMwh: Partial<Record<EnergyType, number>> = {};
    for (const energyType of table.energyTypes) {
      productionMwh[energyType] = gwhToMwh(row.productionGwh[energyType] ?? 0);
    }
    return {
      year: row.year,
      regionCode: row.regionCode,
      regionName: row.regionName,
      productionMwh,
    };
  });

  return { energyTypes: table.energyTypes, rows };
}
