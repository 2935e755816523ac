/**
 * Energy Pipeline Constants
 *
 * Energy type vocabulary, dataset expectations, and the header aliases used
 * to recognise source columns. Header aliases are compared after
 * normalizeHeader() (accents stripped, lower case, collapsed whitespace).
 */

// ============================================================================
// Energy Types
// ============================================================================

/**
 * Canonical energy types, in the order source columns are usually laid out.
 */
export const ENERGY_TYPES = [
  'hydraulic',
  'bioenergy',
  'wind',
  'solar',
  'total_electric',
  'renewable_gas',
  'total_renewable',
] as const;

export type EnergyType = (typeof ENERGY_TYPES)[number];

export function isEnergyType(value: string): value is EnergyType {
  return (ENERGY_TYPES as readonly string[]).includes(value);
}

/**
 * Display labels for presentation consumers.
 */
export const ENERGY_TYPE_LABELS: Record<EnergyType, string> = {
  hydraulic: 'Hydraulic',
  bioenergy: 'Bioenergy',
  wind: 'Wind',
  solar: 'Solar',
  total_electric: 'Total renewable electricity',
  renewable_gas: 'Renewable gas',
  total_renewable: 'Total renewable',
};

// ============================================================================
// Dataset Expectations
// ============================================================================

/** Metropolitan regions since the 2016 territorial reform */
export const EXPECTED_REGION_COUNT = 13;

export const GWH_TO_MWH = 1000;

export const SOURCE_DELIMITER = ';';

// ============================================================================
// Header Aliases
// ============================================================================

export type IdentityColumn = 'year' | 'regionName' | 'regionCode' | 'geoShape' | 'geoPoint';

export const REQUIRED_COLUMNS: readonly IdentityColumn[] = [
  'year',
  'regionName',
  'regionCode',
  'geoShape',
  'geoPoint',
];

export const IDENTITY_COLUMN_ALIASES: Record<IdentityColumn, readonly string[]> = {
  year: ['annee', 'year'],
  regionName: ['nom insee region', 'region', 'region_name', 'region name'],
  regionCode: ['code insee region', 'region_code', 'region code'],
  geoShape: ['geo-shape region', 'geo_shape', 'geo shape'],
  geoPoint: ['geo-point region', 'geo_point', 'geo point'],
};

export const ENERGY_COLUMN_ALIASES: Record<EnergyType, readonly string[]> = {
  hydraulic: ['production hydraulique renouvelable (gwh)', 'hydraulic_gwh'],
  bioenergy: ['production bioenergies renouvelable (gwh)', 'bioenergy_gwh'],
  wind: ['production eolienne renouvelable (gwh)', 'wind_gwh'],
  solar: ['production solaire renouvelable (gwh)', 'solar_gwh'],
  total_electric: ['production electrique renouvelable (gwh)', 'total_electric_gwh'],
  renewable_gas: ['production gaz renouvelable (gwh)', 'renewable_gas_gwh'],
  total_renewable: ['production totale renouvelable (gwh)', 'total_renewable_gwh'],
};

/**
 * Normalize a header cell for alias lookup.
 *
 * "Nom INSEE région" → "nom insee region"
 */
export function normalizeHeader(header: string): string {
  return header
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}
