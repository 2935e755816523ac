/**
 * FilteredView
 *
 * Read-only projection of observations for one normalized filter, with the
 * aggregates the dashboard asks for. Aggregates are computed on first access
 * and memoized; the view never mutates the rows it was given.
 *
 * ORDERING: rows keep the source order (year, region code, energy type);
 * grouped outputs are sorted by their key the same way.
 */

import type { EnergyType } from '../core/constants.js';
import { ValidationError } from '../core/errors.js';
import type { Observation, Region } from '../core/types.js';
import { compareCodes } from '../core/utils/ordering.js';
import type { NormalizedFilter } from './filter-spec.js';

// ============================================================================
// Result Types
// ============================================================================

export interface YoyGrowthPoint {
  readonly year: number;
  readonly valueMwh: number;
  readonly previousValueMwh: number;
  /** (value - previous) / previous; undefined when previous is 0 */
  readonly growth: number | undefined;
}

export type PivotDimension = 'year' | 'region' | 'energyType';
export type PivotKey = string | number;

export interface ViewSummary {
  readonly totalMwh: number;
  readonly rowCount: number;
  readonly regionCount: number;
  readonly energyTypeCount: number;
  readonly firstYear: number | undefined;
  readonly lastYear: number | undefined;
  readonly yearsCovered: number;
  /** Mean of the yearly totals */
  readonly averageAnnualMwh: number;
  /** Last year total relative to first year total; undefined with < 2 years or a 0 first total */
  readonly growthRate: number | undefined;
}

export interface EnergyShare {
  readonly energyType: EnergyType;
  readonly totalMwh: number;
  /** Fraction of the view total; undefined when the view total is 0 */
  readonly share: number | undefined;
}

export interface CumulativePoint {
  readonly year: number;
  readonly cumulativeMwh: number;
}

export interface EnergyTypeChange {
  readonly energyType: EnergyType;
  readonly startMwh: number;
  readonly endMwh: number;
  readonly changeMwh: number;
}

export interface ProductionChange {
  readonly startYear: number;
  readonly endYear: number;
  /** Non-zero changes only */
  readonly changes: readonly EnergyTypeChange[];
}

export interface RegionTotal {
  readonly regionCode: string;
  readonly regionName: string;
  readonly totalMwh: number;
}

// ============================================================================
// Pivot Table
// ============================================================================

function compareKeys(a: PivotKey, b: PivotKey): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  return compareCodes(String(a), String(b));
}

function dimensionKey(observation: Observation, dimension: PivotDimension): PivotKey {
  switch (dimension) {
    case 'year':
      return observation.year;
    case 'region':
      return observation.regionCode;
    case 'energyType':
      return observation.energyType;
  }
}

export class PivotTable {
  private readonly rowIndex: ReadonlyMap<PivotKey, number>;
  private readonly colIndex: ReadonlyMap<PivotKey, number>;

  constructor(
    readonly rowsDim: PivotDimension,
    readonly colsDim: PivotDimension,
    readonly rowKeys: readonly PivotKey[],
    readonly colKeys: readonly PivotKey[],
    readonly values: readonly (readonly number[])[]
  ) {
    this.rowIndex = new Map(rowKeys.map((key, index) => [key, index] as const));
    this.colIndex = new Map(colKeys.map((key, index) => [key, index] as const));
  }

  static fromObservations(
    rows: readonly Observation[],
    rowsDim: PivotDimension,
    colsDim: PivotDimension
  ): PivotTable {
    const rowKeys = [...new Set(rows.map((row) => dimensionKey(row, rowsDim)))].sort(compareKeys);
    const colKeys = [...new Set(rows.map((row) => dimensionKey(row, colsDim)))].sort(compareKeys);
    const rowIndex = new Map(rowKeys.map((key, index) => [key, index] as const));
    const colIndex = new Map(colKeys.map((key, index) => [key, index] as const));
    const values = rowKeys.map(() => colKeys.map(() => 0));

    for (const row of rows) {
      const r = rowIndex.get(dimensionKey(row, rowsDim));
      const c = colIndex.get(dimensionKey(row, colsDim));
      const cells = r === undefined ? undefined : values[r];
      if (cells === undefined || c === undefined) continue;
      cells[c] = (cells[c] ?? 0) + row.valueMwh;
    }

    return new PivotTable(rowsDim, colsDim, rowKeys, colKeys, values);
  }

  /** Summed value for a cell; 0 when either key is absent */
  get(rowKey: PivotKey, colKey: PivotKey): number {
    const r = this.rowIndex.get(rowKey);
    const c = this.colIndex.get(colKey);
    if (r === undefined || c === undefined) return 0;
    return this.values[r]?.[c] ?? 0;
  }

  toJSON(): {
    rowsDim: PivotDimension;
    colsDim: PivotDimension;
    rowKeys: readonly PivotKey[];
    colKeys: readonly PivotKey[];
    values: readonly (readonly number[])[];
  } {
    return {
      rowsDim: this.rowsDim,
      colsDim: this.colsDim,
      rowKeys: this.rowKeys,
      colKeys: this.colKeys,
      values: this.values,
    };
  }
}

// ============================================================================
// Filtered View
// ============================================================================

function sumBy<K>(rows: readonly Observation[], key: (row: Observation) => K): Map<K, number> {
  const totals = new Map<K, number>();
  for (const row of rows) {
    const k = key(row);
    totals.set(k, (totals.get(k) ?? 0) + row.valueMwh);
  }
  return totals;
}

function sortedMap<K extends PivotKey, V>(map: ReadonlyMap<K, V>): ReadonlyMap<K, V> {
  return new Map([...map.entries()].sort(([a], [b]) => compareKeys(a, b)));
}

export class FilteredView {
  readonly rows: readonly Observation[];

  private regionTotals?: ReadonlyMap<string, number>;
  private energyTypeTotals?: ReadonlyMap<EnergyType, number>;
  private yearTotals?: ReadonlyMap<number, number>;
  private readonly pivots = new Map<string, PivotTable>();

  constructor(
    readonly filter: NormalizedFilter,
    rows: readonly Observation[]
  ) {
    this.rows = Object.freeze([...rows]);
  }

  get size(): number {
    return this.rows.length;
  }

  years(): number[] {
    return [...this.totalByYear().keys()];
  }

  regions(): Region[] {
    const names = new Map<string, string>();
    for (const row of this.rows) {
      names.set(row.regionCode, row.regionName);
    }
    return [...names.entries()]
      .map(([code, name]) => ({ code, name }))
      .sort((a, b) => compareCodes(a.code, b.code));
  }

  energyTypes(): EnergyType[] {
    return [...this.totalByEnergyType().keys()];
  }

  totalByRegion(): ReadonlyMap<string, number> {
    this.regionTotals ??= sortedMap(sumBy(this.rows, (row) => row.regionCode));
    return this.regionTotals;
  }

  totalByEnergyType(): ReadonlyMap<EnergyType, number> {
    this.energyTypeTotals ??= sortedMap(sumBy(this.rows, (row) => row.energyType));
    return this.energyTypeTotals;
  }

  totalByYear(): ReadonlyMap<number, number> {
    this.yearTotals ??= sortedMap(sumBy(this.rows, (row) => row.year));
    return this.yearTotals;
  }

  /**
   * Year-over-year growth for one energy type, for one region or summed
   * over every region in the view. Only pairs of consecutive years that
   * are both present produce a point.
   */
  yoyGrowth(energyType: EnergyType, regionCode?: string): YoyGrowthPoint[] {
    const series = sortedMap(
      sumBy(
        this.rows.filter(
          (row) =>
            row.energyType === energyType && (regionCode === undefined || row.regionCode === regionCode)
        ),
        (row) => row.year
      )
    );

    const points: YoyGrowthPoint[] = [];
    for (const [year, valueMwh] of series) {
      const previousValueMwh = series.get(year - 1);
      if (previousValueMwh === undefined) continue;
      points.push({
        year,
        valueMwh,
        previousValueMwh,
        growth: previousValueMwh === 0 ? undefined : (valueMwh - previousValueMwh) / previousValueMwh,
      });
    }
    return points;
  }

  /**
   * Matrix of summed values keyed by two distinct dimensions.
   *
   * @throws ValidationError when both dimensions are the same
   */
  pivot(rowsDim: PivotDimension, colsDim: PivotDimension): PivotTable {
    if (rowsDim === colsDim) {
      throw new ValidationError(`Pivot dimensions must differ, got ${rowsDim} twice`, {
        stage: 'filter',
      });
    }
    const key = `${rowsDim}/${colsDim}`;
    let table = this.pivots.get(key);
    if (table === undefined) {
      table = PivotTable.fromObservations(this.rows, rowsDim, colsDim);
      this.pivots.set(key, table);
    }
    return table;
  }

  summary(): ViewSummary {
    const yearTotals = this.totalByYear();
    const years = [...yearTotals.keys()];
    const firstYear = years[0];
    const lastYear = years[years.length - 1];
    let totalMwh = 0;
    for (const value of yearTotals.values()) {
      totalMwh += value;
    }

    const firstTotal = firstYear === undefined ? undefined : yearTotals.get(firstYear);
    const lastTotal = lastYear === undefined ? undefined : yearTotals.get(lastYear);
    const growthRate =
      years.length < 2 || firstTotal === undefined || lastTotal === undefined || firstTotal === 0
        ? undefined
        : (lastTotal - firstTotal) / firstTotal;

    return {
      totalMwh,
      rowCount: this.rows.length,
      regionCount: this.totalByRegion().size,
      energyTypeCount: this.totalByEnergyType().size,
      firstYear,
      lastYear,
      yearsCovered: firstYear === undefined || lastYear === undefined ? 0 : lastYear - firstYear + 1,
      averageAnnualMwh: years.length === 0 ? 0 : totalMwh / years.length,
      growthRate,
    };
  }

  energyShares(): EnergyShare[] {
    const totals = this.totalByEnergyType();
    let grandTotal = 0;
    for (const value of totals.values()) {
      grandTotal += value;
    }
    return [...totals.entries()].map(([energyType, totalMwh]) => ({
      energyType,
      totalMwh,
      share: grandTotal === 0 ? undefined : totalMwh / grandTotal,
    }));
  }

  cumulativeByEnergyType(): ReadonlyMap<EnergyType, readonly CumulativePoint[]> {
    const pivot = this.pivot('energyType', 'year');
    const years = this.years();
    const series = new Map<EnergyType, readonly CumulativePoint[]>();

    for (const energyType of this.energyTypes()) {
      let running = 0;
      series.set(
        energyType,
        years.map((year) => {
          running += pivot.get(energyType, year);
          return { year, cumulativeMwh: running };
        })
      );
    }
    return series;
  }

  /**
   * Per energy type change between the first and last year of the view.
   * Undefined when the view covers fewer than two years.
   */
  productionChange(): ProductionChange | undefined {
    const years = this.years();
    const startYear = years[0];
    const endYear = years[years.length - 1];
    if (startYear === undefined || endYear === undefined || startYear === endYear) {
      return undefined;
    }

    const pivot = this.pivot('energyType', 'year');
    const changes: EnergyTypeChange[] = [];
    for (const energyType of this.energyTypes()) {
      const startMwh = pivot.get(energyType, startYear);
      const endMwh = pivot.get(energyType, endYear);
      const changeMwh = endMwh - startMwh;
      if (changeMwh !== 0) {
        changes.push({ energyType, startMwh, endMwh, changeMwh });
      }
    }
    return { startYear, endYear, changes };
  }

  /**
   * Regions with the largest totals, ties broken by region code.
   *
   * @throws ValidationError when `limit` is not a positive integer
   */
  topRegions(limit: number): RegionTotal[] {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`Region limit must be a positive integer, got ${limit}`, {
        stage: 'filter',
      });
    }
    const names = new Map(this.regions().map((region) => [region.code, region.name] as const));
    return [...this.totalByRegion().entries()]
      .map(([regionCode, totalMwh]) => ({
        regionCode,
        regionName: names.get(regionCode) ?? regionCode,
        totalMwh,
      }))
      .sort((a, b) => b.totalMwh - a.totalMwh || compareCodes(a.regionCode, b.regionCode))
      .slice(0, limit);
  }
}
