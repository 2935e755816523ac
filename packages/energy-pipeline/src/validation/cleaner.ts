/**
 * Cleaner
 *
 * Applies the missing-value policy to a raw table and enforces the dataset
 * invariants. This is the only stage that checks invariants; everything
 * downstream assumes a clean table.
 *
 * POLICY:
 * - empty production cell → 0, listed in report.zeroFilled
 * - empty region name/code → value of the nearest preceding row
 *
 * INVARIANTS (ValidationError):
 * - no negative production value
 * - exactly `expectedRegionCount` distinct region codes
 * - contiguous years (and equal to `expectedYearRange` when given)
 * - every year has every region exactly once
 * - a region code always carries the same name
 */

import { EXPECTED_REGION_COUNT, type EnergyType } from '../core/constants.js';
import { ValidationError } from '../core/errors.js';
import type {
  CleanRow,
  CleanTable,
  MissingCell,
  RawTable,
  Region,
  YearRange,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { compareCodes } from '../core/utils/ordering.js';

const log = createLogger({ module: 'cleaner' });

export interface CleanOptions {
  readonly expectedRegionCount?: number;
  readonly expectedYearRange?: YearRange;
}

// ============================================================================
// Missing-Value Policy
// ============================================================================

function fillRows(raw: RawTable): { rows: CleanRow[]; zeroFilled: MissingCell[]; forwardFilled: number } {
  const { identity } = raw.columns;
  const zeroFilled: MissingCell[] = [];
  let forwardFilled = 0;
  let lastName: string | null = null;
  let lastCode: string | null = null;

  const rows = raw.rows.map((source): CleanRow => {
    const year = source.year;
    if (year === null) {
      throw new ValidationError('Year is missing', { row: source.row, column: identity.year });
    }

    let regionName = source.regionName;
    if (regionName === null) {
      if (lastName === null) {
        throw new ValidationError('Region name is missing with no preceding value to fill from', {
          row: source.row,
          column: identity.regionName,
        });
      }
      regionName = lastName;
      forwardFilled += 1;
    }

    let regionCode = source.regionCode;
    if (regionCode === null) {
      if (lastCode === null) {
        throw new ValidationError('Region code is missing with no preceding value to fill from', {
          row: source.row,
          column: identity.regionCode,
        });
      }
      regionCode = lastCode;
      forwardFilled += 1;
    }

    lastName = regionName;
    lastCode = regionCode;

    const productionGwh: Partial<Record<EnergyType, number>> = {};
    for (const energyType of raw.energyTypes) {
      const value = source.productionGwh[energyType] ?? null;
      if (value === null) {
        zeroFilled.push({ row: source.row, regionCode, year, energyType });
        productionGwh[energyType] = 0;
        continue;
      }
      if (value < 0) {
        throw new ValidationError(`Negative production value ${value}`, {
          row: source.row,
          column: raw.columns.energy[energyType] ?? energyType,
        });
      }
      productionGwh[energyType] = value;
    }

    return {
      row: source.row,
      year,
      regionName,
      regionCode,
      productionGwh,
      geoShape: source.geoShape,
      geoPoint: source.geoPoint,
    };
  });

  return { rows, zeroFilled, forwardFilled };
}

// ============================================================================
// Invariant Checks
// ============================================================================

function collectRegions(rows: readonly CleanRow[], codeColumn: string): Region[] {
  const names = new Map<string, string>();
  for (const row of rows) {
    const known = names.get(row.regionCode);
    if (known === undefined) {
      names.set(row.regionCode, row.regionName);
    } else if (known !== row.regionName) {
      throw new ValidationError(
        `Region code ${row.regionCode} is named both "${known}" and "${row.regionName}"`,
        { row: row.row, column: codeColumn }
      );
    }
  }
  return [...names.entries()]
    .map(([code, name]) => ({ code, name }))
    .sort((a, b) => compareCodes(a.code, b.code));
}

function checkYears(rows: readonly CleanRow[], expected: YearRange | undefined): YearRange {
  const years = [...new Set(rows.map((row) => row.year))].sort((a, b) => a - b);
  const min = years[0];
  const max = years[years.length - 1];
  if (min === undefined || max === undefined) {
    throw new ValidationError('Source contains no data rows');
  }

  if (years.length !== max - min + 1) {
    const present = new Set(years);
    const missing: number[] = [];
    for (let year = min; year <= max; year++) {
      if (!present.has(year)) missing.push(year);
    }
    throw new ValidationError(`Year range ${min}-${max} has gaps: ${missing.join(', ')}`);
  }

  if (expected !== undefined && (expected.min !== min || expected.max !== max)) {
    throw new ValidationError(
      `Years ${min}-${max} do not match the expected range ${expected.min}-${expected.max}`
    );
  }

  return { min, max };
}

function checkGrid(rows: readonly CleanRow[], regions: readonly Region[], yearRange: YearRange): void {
  const seen = new Map<string, number>();
  for (const row of rows) {
    const key = `${row.regionCode}|${row.year}`;
    const previous = seen.get(key);
    if (previous !== undefined) {
      throw new ValidationError(
        `Region ${row.regionCode} has two rows for ${row.year} (rows ${previous} and ${row.row})`,
        { row: row.row }
      );
    }
    seen.set(key, row.row);
  }

  for (let year = yearRange.min; year <= yearRange.max; year++) {
    const absent = regions.filter((region) => !seen.has(`${region.code}|${year}`));
    if (absent.length > 0) {
      throw new ValidationError(
        `Year ${year} is missing regions: ${absent.map((region) => region.code).join(', ')}`
      );
    }
  }
}

// ============================================================================
// Cleaner
// ============================================================================

/**
 * Clean a raw table and verify the dataset invariants.
 *
 * @throws ValidationError on the first invariant that does not hold
 */
export function cleanTable(raw: RawTable, options: CleanOptions = {}): CleanTable {
  const expectedRegionCount = options.expectedRegionCount ?? EXPECTED_REGION_COUNT;
  const { rows, zeroFilled, forwardFilled } = fillRows(raw);

  const regions = collectRegions(rows, raw.columns.identity.regionCode);
  if (regions.length !== expectedRegionCount) {
    throw new ValidationError(
      `Expected ${expectedRegionCount} distinct region codes, found ${regions.length}: ${regions
        .map((region) => region.code)
        .join(', ')}`,
      { column: raw.columns.identity.regionCode }
    );
  }

  const yearRange = checkYears(rows, options.expectedYearRange);
  checkGrid(rows, regions, yearRange);

  if (zeroFilled.length > 0) {
    log.info('Filled empty production cells with 0', { cells: zeroFilled.length });
  }

  return {
    sourcePath: raw.sourcePath,
    energyTypes: raw.energyTypes,
    regions,
    yearRange,
    rows,
    report: { zeroFilled, forwardFilled },
  };
}
