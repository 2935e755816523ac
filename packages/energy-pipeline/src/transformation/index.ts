/**
 * Unit & Shape Transformer
 *
 * Converts the cleaned wide table to MWh and melts it into observations.
 * Energy types without a source column are skipped and reported, never
 * filled with zeros; a skipped type listed as required is a SchemaError.
 */

import { ENERGY_TYPES, type EnergyType } from '../core/constants.js';
import { SchemaError } from '../core/errors.js';
import type { CleanTable, TransformResult } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { meltToLong } from './melt.js';
import { toMegawattHours } from './units.js';

export { gwhToMwh, toMegawattHours } from './units.js';
export { meltToLong } from './melt.js';

const log = createLogger({ module: 'transformer' });

export interface TransformOptions {
  readonly requiredEnergyTypes?: readonly EnergyType[];
}

export function transformTable(table: CleanTable, options: TransformOptions = {}): TransformResult {
  const present = new Set(table.energyTypes);
  const skippedEnergyTypes = ENERGY_TYPES.filter((energyType) => !present.has(energyType));

  const missingRequired = (options.requiredEnergyTypes ?? []).filter(
    (energyType) => !present.has(energyType)
  );
  if (missingRequired.length > 0) {
    throw new SchemaError(
      `Required energy types have no source column: ${missingRequired.join(', ')}`,
      missingRequired,
      { stage: 'transform' }
    );
  }

  const wide = toMegawattHours(table);
  const observations = meltToLong(wide);

  if (skippedEnergyTypes.length > 0) {
    log.debug('Energy types absent from source header', { skippedEnergyTypes });
  }

  return {
    wide,
    observations,
    energyTypes: table.energyTypes,
    skippedEnergyTypes,
  };
}
