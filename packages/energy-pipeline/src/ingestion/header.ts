/**
 * Source header resolution
 *
 * Maps raw header cells onto identity columns and energy type columns via
 * the aliases in core/constants.
 */

import {
  ENERGY_COLUMN_ALIASES,
  ENERGY_TYPES,
  IDENTITY_COLUMN_ALIASES,
  REQUIRED_COLUMNS,
  normalizeHeader,
  type EnergyType,
  type IdentityColumn,
} from '../core/constants.js';
import { SchemaError } from '../core/errors.js';

export interface ResolvedHeader {
  /** Cell index for each identity column */
  readonly identity: Readonly<Record<IdentityColumn, number>>;
  /** Cell index for each energy type present, canonical order */
  readonly energy: ReadonlyMap<EnergyType, number>;
  readonly names: readonly string[];
  readonly ignored: readonly string[];
}

function findAlias<K extends string>(
  aliases: Record<K, readonly string[]>,
  keys: readonly K[],
  normalized: string
): K | undefined {
  return keys.find((key) => aliases[key].includes(normalized));
}

/**
 * Resolve header cells to column indices.
 *
 * @throws SchemaError when a required identity column is missing, a column
 *   appears twice, or no production column is recognised
 */
export function resolveHeader(cells: readonly string[]): ResolvedHeader {
  const names = cells.map((cell) => cell.trim());
  const identity: Partial<Record<IdentityColumn, number>> = {};
  const energyIndex = new Map<EnergyType, number>();
  const ignored: string[] = [];

  names.forEach((name, index) => {
    const normalized = normalizeHeader(name);

    const identityKey = findAlias(IDENTITY_COLUMN_ALIASES, REQUIRED_COLUMNS, normalized);
    if (identityKey !== undefined) {
      if (identity[identityKey] !== undefined) {
        throw new SchemaError(`Column "${name}" duplicates ${identityKey}`, [], { column: name });
      }
      identity[identityKey] = index;
      return;
    }

    const energyType = findAlias(ENERGY_COLUMN_ALIASES, ENERGY_TYPES, normalized);
    if (energyType !== undefined) {
      if (energyIndex.has(energyType)) {
        throw new SchemaError(`Column "${name}" duplicates ${energyType}`, [], { column: name });
      }
      energyIndex.set(energyType, index);
      return;
    }

    ignored.push(name);
  });

  const missing = REQUIRED_COLUMNS.filter((key) => identity[key] === undefined);
  const { year, regionName, regionCode, geoShape, geoPoint } = identity;
  if (
    year === undefined ||
    regionName === undefined ||
    regionCode === undefined ||
    geoShape === undefined ||
    geoPoint === undefined
  ) {
    throw new SchemaError(`Missing required columns: ${missing.join(', ')}`, missing);
  }

  if (energyIndex.size === 0) {
    throw new SchemaError('No production column recognised in header', ['production (GWh)']);
  }

  const energy = new Map<EnergyType, number>();
  for (const energyType of ENERGY_TYPES) {
    const index = energyIndex.get(energyType);
    if (index !== undefined) {
      energy.set(energyType, index);
    }
  }

  return {
    identity: { year, regionName, regionCode, geoShape, geoPoint },
    energy,
    names,
    ignored,
  };
}
