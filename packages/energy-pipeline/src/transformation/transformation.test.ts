/**
 * Tests for the unit & shape transformer
 *
 * Validates:
 * 1. GWh → MWh conversion
 * 2. Wide → long melt and its ordering
 * 3. Absent and required energy types
 */

import { describe, expect, it } from 'vitest';
import { SchemaError } from '../core/errors.js';
import type { CleanRow, CleanTable } from '../core/types.js';
import { gwhToMwh, meltToLong, toMegawattHours, transformTable } from './index.js';

function cleanRow(row: number, year: number, regionCode: string, regionName: string, productionGwh: CleanRow['productionGwh']): CleanRow {
  return { row, year, regionCode, regionName, productionGwh, geoShape: null, geoPoint: null };
}

const BRETAGNE_2020: CleanTable = {
  sourcePath: 'memory.csv',
  energyTypes: ['hydraulic', 'bioenergy', 'wind', 'solar'],
  regions: [{ code: '53', name: 'Bretagne' }],
  yearRange: { min: 2020, max: 2020 },
  rows: [cleanRow(1, 2020, '53', 'Bretagne', { hydraulic: 0.5, bioenergy: 0.3, wind: 2.0, solar: 0.1 })],
  report: { zeroFilled: [], forwardFilled: 0 },
};

describe('gwhToMwh', () => {
  it('multiplies by 1000 without rounding', () => {
    expect(gwhToMwh(0.5)).toBe(500);
    expect(gwhToMwh(1.2345)).toBeCloseTo(1234.5, 9);
    expect(gwhToMwh(0)).toBe(0);
  });
});

describe('transformTable', () => {
  it('converts one region-year into one observation per energy type', () => {
    const result = transformTable(BRETAGNE_2020);

    expect(result.observations).toEqual([
      { regionCode: '53', regionName: 'Bretagne', year: 2020, energyType: 'bioenergy', valueMwh: 300 },
      { regionCode: '53', regionName: 'Bretagne', year: 2020, energyType: 'hydraulic', valueMwh: 500 },
      { regionCode: '53', regionName: 'Bretagne', year: 2020, energyType: 'solar', valueMwh: 100 },
      { regionCode: '53', regionName: 'Bretagne', year: 2020, energyType: 'wind', valueMwh: 2000 },
    ]);
    expect(result.wide.rows[0]?.productionMwh).toEqual({ hydraulic: 500, bioenergy: 300, wind: 2000, solar: 100 });
  });

  it('reports energy types with no source column instead of filling them', () => {
    const result = transformTable(BRETAGNE_2020);

    expect(result.energyTypes).toEqual(['hydraulic', 'bioenergy', 'wind', 'solar']);
    expect(result.skippedEnergyTypes).toEqual(['total_electric', 'renewable_gas', 'total_renewable']);
    expect(result.observations.some((row) => row.energyType === 'renewable_gas')).toBe(false);
  });

  it('fails when a required energy type has no column', () => {
    let caught: unknown;
    try {
      transformTable(BRETAGNE_2020, { requiredEnergyTypes: ['solar', 'renewable_gas'] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaError);
    expect(caught).toMatchObject({ stage: 'transform', missing: ['renewable_gas'] });
  });
});

describe('meltToLong', () => {
  it('orders observations by year, region code, then energy type', () => {
    const wide = toMegawattHours({
      ...BRETAGNE_2020,
      energyTypes: ['wind', 'solar'],
      regions: [
        { code: '11', name: 'Île-de-France' },
        { code: '53', name: 'Bretagne' },
      ],
      yearRange: { min: 2020, max: 2021 },
      rows: [
        cleanRow(1, 2021, '53', 'Bretagne', { wind: 1, solar: 2 }),
        cleanRow(2, 2020, '53', 'Bretagne', { wind: 3, solar: 4 }),
        cleanRow(3, 2021, '11', 'Île-de-France', { wind: 5, solar: 6 }),
        cleanRow(4, 2020, '11', 'Île-de-France', { wind: 7, solar: 8 }),
      ],
    });

    const order = meltToLong(wide).map((row) => `${row.year}/${row.regionCode}/${row.energyType}=${row.valueMwh}`);

    expect(order).toEqual([
      '2020/11/solar=8000',
      '2020/11/wind=7000',
      '2020/53/solar=4000',
      '2020/53/wind=3000',
      '2021/11/solar=6000',
      '2021/11/wind=5000',
      '2021/53/solar=2000',
      '2021/53/wind=1000',
    ]);
  });
});
