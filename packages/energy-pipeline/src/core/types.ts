/**
 * Energy Pipeline Core Types
 *
 * Table shapes passed between pipeline stages. Every stage returns a fresh
 * table; none of these are mutated after construction.
 */

import type { BBox, MultiPolygon, Polygon } from 'geojson';
import type { EnergyType, IdentityColumn } from './constants.js';

// ============================================================================
// Raw Loader Output
// ============================================================================

/**
 * Source header name for every recognised column.
 */
export interface ColumnMap {
  readonly identity: Readonly<Record<IdentityColumn, string>>;
  readonly energy: Readonly<Partial<Record<EnergyType, string>>>;
}

export type ProductionValues<T> = Readonly<Partial<Record<EnergyType, T>>>;

/**
 * One source row with typed cells. `null` marks an empty cell.
 */
export interface RawRow {
  /** 1-based data row number (header excluded) */
  readonly row: number;
  readonly year: number | null;
  readonly regionName: string | null;
  readonly regionCode: string | null;
  readonly productionGwh: ProductionValues<number | null>;
  readonly geoShape: string | null;
  readonly geoPoint: string | null;
}

export interface RawTable {
  readonly sourcePath: string;
  readonly columns: ColumnMap;
  /** Energy types with a column in the source header, canonical order */
  readonly energyTypes: readonly EnergyType[];
  readonly ignoredColumns: readonly string[];
  readonly rows: readonly RawRow[];
}

// ============================================================================
// Cleaner Output
// ============================================================================

export interface Region {
  readonly code: string;
  readonly name: string;
}

export interface YearRange {
  readonly min: number;
  readonly max: number;
}

export interface CleanRow {
  readonly row: number;
  readonly year: number;
  readonly regionName: string;
  readonly regionCode: string;
  readonly productionGwh: ProductionValues<number>;
  readonly geoShape: string | null;
  readonly geoPoint: string | null;
}

/**
 * A production cell that was empty in the source and filled with 0.
 */
export interface MissingCell {
  readonly row: number;
  readonly regionCode: string;
  readonly year: number;
  readonly energyType: EnergyType;
}

export interface CleaningReport {
  readonly zeroFilled: readonly MissingCell[];
  /** Region name or code cells taken from a preceding row */
  readonly forwardFilled: number;
}

export interface CleanTable {
  readonly sourcePath: string;
  readonly energyTypes: readonly EnergyType[];
  readonly regions: readonly Region[];
  readonly yearRange: YearRange;
  readonly rows: readonly CleanRow[];
  readonly report: CleaningReport;
}

// ============================================================================
// Transformer Output
// ============================================================================

export interface WideMwhRow {
  readonly year: number;
  readonly regionCode: string;
  readonly regionName: string;
  readonly productionMwh: ProductionValues<number>;
}

export interface WideMwhTable {
  readonly energyTypes: readonly EnergyType[];
  readonly rows: readonly WideMwhRow[];
}

export interface Observation {
  readonly regionCode: string;
  readonly regionName: string;
  readonly year: number;
  readonly energyType: EnergyType;
  readonly valueMwh: number;
}

export interface TransformResult {
  readonly wide: WideMwhTable;
  readonly observations: readonly Observation[];
  readonly energyTypes: readonly EnergyType[];
  /** Known energy types with no source column */
  readonly skippedEnergyTypes: readonly EnergyType[];
}

// ============================================================================
// Geometry
// ============================================================================

export interface LatLon {
  readonly lat: number;
  readonly lon: number;
}

export type RegionGeometry = Polygon | MultiPolygon;

export interface GeoShape {
  readonly regionCode: string;
  readonly regionName: string;
  readonly geometry: RegionGeometry;
  readonly center: LatLon;
  readonly bbox: BBox;
}
