/**
 * Synthetic regional production fixtures
 *
 * Builds source files in the semicolon-delimited layout the loader reads:
 * one row per (region, year), rows grouped by region, every region a
 * one-degree square. Values are made up: by default
 * 100 * (type index + 1) + 10 * region index + year offset, in GWh.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { EnergyType } from '../../core/constants.js';
import type { Region } from '../../core/types.js';

export const FIXTURE_REGIONS: readonly Region[] = [
  { code: '11', name: 'Île-de-France' },
  { code: '24', name: 'Centre-Val de Loire' },
  { code: '27', name: 'Bourgogne-Franche-Comté' },
  { code: '28', name: 'Normandie' },
  { code: '32', name: 'Hauts-de-France' },
  { code: '44', name: 'Grand Est' },
  { code: '52', name: 'Pays de la Loire' },
  { code: '53', name: 'Bretagne' },
  { code: '75', name: 'Nouvelle-Aquitaine' },
  { code: '76', name: 'Occitanie' },
  { code: '84', name: 'Auvergne-Rhône-Alpes' },
  { code: '93', name: "Provence-Alpes-Côte d'Azur" },
  { code: '94', name: 'Corse' },
];

export const FIXTURE_YEARS: readonly number[] = [2019, 2020, 2021];

export const FIXTURE_ENERGY_TYPES: readonly EnergyType[] = ['hydraulic', 'bioenergy', 'wind', 'solar'];

const FRENCH_ENERGY_HEADERS: Record<EnergyType, string> = {
  hydraulic: 'Production hydraulique renouvelable (GWh)',
  bioenergy: 'Production bioénergies renouvelable (GWh)',
  wind: 'Production éolienne renouvelable (GWh)',
  solar: 'Production solaire renouvelable (GWh)',
  total_electric: 'Production électrique renouvelable (GWh)',
  renewable_gas: 'Production gaz renouvelable (GWh)',
  total_renewable: 'Production totale renouvelable (GWh)',
};

export const FRENCH_IDENTITY_HEADERS = [
  'Année',
  'Nom INSEE région',
  'Code INSEE région',
  'Géo-shape région',
  'Géo-point région',
] as const;

export type Cell = string | number | null;

export interface FixtureRow {
  year: Cell;
  regionName: Cell;
  regionCode: Cell;
  production: Partial<Record<EnergyType, Cell>>;
  geoShape: Cell;
  geoPoint: Cell;
  extra?: Cell;
}

/**
 * Unit square with its south-west corner at (index, 40).
 */
export function squareShape(index: number): string {
  return JSON.stringify({
    type: 'Polygon',
    coordinates: [
      [
        [index, 40],
        [index + 1, 40],
        [index + 1, 41],
        [index, 41],
        [index, 40],
      ],
    ],
  });
}

export function squarePoint(index: number): string {
  return `40.5, ${index + 0.5}`;
}

export function defaultGwh(regionIndex: number, yearOffset: number, typeIndex: number): number {
  return 100 * (typeIndex + 1) + 10 * regionIndex + yearOffset;
}

export interface BuildRowsOptions {
  readonly regions?: readonly Region[];
  readonly years?: readonly number[];
  readonly energyTypes?: readonly EnergyType[];
  readonly value?: (regionIndex: number, yearOffset: number, typeIndex: number) => Cell;
}

export function buildRows(options: BuildRowsOptions = {}): FixtureRow[] {
  const regions = options.regions ?? FIXTURE_REGIONS;
  const years = options.years ?? FIXTURE_YEARS;
  const energyTypes = options.energyTypes ?? FIXTURE_ENERGY_TYPES;
  const value = options.value ?? defaultGwh;
  const firstYear = years[0] ?? 0;

  return regions.flatMap((region, regionIndex) =>
    years.map((year) => {
      const production: Partial<Record<EnergyType, Cell>> = {};
      energyTypes.forEach((energyType, typeIndex) => {
        production[energyType] = value(regionIndex, year - firstYear, typeIndex);
      });
      return {
        year,
        regionName: region.name,
        regionCode: region.code,
        production,
        geoShape: squareShape(regionIndex),
        geoPoint: squarePoint(regionIndex),
      };
    })
  );
}

function csvCell(cell: Cell): string {
  if (cell === null) return '';
  const text = String(cell);
  return /[;"\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export interface ToCsvOptions {
  readonly energyTypes?: readonly EnergyType[];
  readonly delimiter?: string;
  /** Extra trailing column the loader should ignore */
  readonly extraHeader?: string;
}

export function toCsv(rows: readonly FixtureRow[], options: ToCsvOptions = {}): string {
  const energyTypes = options.energyTypes ?? FIXTURE_ENERGY_TYPES;
  const delimiter = options.delimiter ?? ';';
  const header = [
    ...FRENCH_IDENTITY_HEADERS,
    ...energyTypes.map((energyType) => FRENCH_ENERGY_HEADERS[energyType]),
    ...(options.extraHeader === undefined ? [] : [options.extraHeader]),
  ];

  const lines = rows.map((row) =>
    [
      row.year,
      row.regionName,
      row.regionCode,
      row.geoShape,
      row.geoPoint,
      ...energyTypes.map((energyType) => row.production[energyType] ?? null),
      ...(options.extraHeader === undefined ? [] : [row.extra ?? null]),
    ]
      .map(csvCell)
      .join(delimiter)
  );

  return [header.map(csvCell).join(delimiter), ...lines].join('\n') + '\n';
}

export function energyHeader(energyType: EnergyType): string {
  return FRENCH_ENERGY_HEADERS[energyType];
}

// ============================================================================
// Temp Files
// ============================================================================

export interface FixtureDir {
  readonly path: string;
  write(name: string, content: string | Uint8Array): Promise<string>;
  remove(): Promise<void>;
}

export async function createFixtureDir(): Promise<FixtureDir> {
  const path = await mkdtemp(join(tmpdir(), 'energy-pipeline-'));
  return {
    path,
    async write(name, content) {
      const filePath = join(path, name);
      await writeFile(filePath, content);
      return filePath;
    },
    async remove() {
      await rm(path, { recursive: true, force: true });
    },
  };
}
