/**
 * Hand-sized observation set for aggregate tests.
 *
 *            2019          2020          2021
 *   11   solar 100     solar 150     solar 300
 *        wind  200     wind  200     wind  100
 *   53   solar   0     solar  50     solar 100
 *        wind  400     wind  500     wind  500
 */

import type { EnergyType } from '../../core/constants.js';
import type { Observation } from '../../core/types.js';
import { compareObservations } from '../../core/utils/ordering.js';

const NAMES: Record<string, string> = { '11': 'Île-de-France', '53': 'Bretagne' };

const VALUES: ReadonlyArray<readonly [string, number, EnergyType, number]> = [
  ['11', 2019, 'solar', 100],
  ['11', 2019, 'wind', 200],
  ['11', 2020, 'solar', 150],
  ['11', 2020, 'wind', 200],
  ['11', 2021, 'solar', 300],
  ['11', 2021, 'wind', 100],
  ['53', 2019, 'solar', 0],
  ['53', 2019, 'wind', 400],
  ['53', 2020, 'solar', 50],
  ['53', 2020, 'wind', 500],
  ['53', 2021, 'solar', 100],
  ['53', 2021, 'wind', 500],
];

export const SAMPLE_OBSERVATIONS: readonly Observation[] = VALUES.map(
  ([regionCode, year, energyType, valueMwh]): Observation => ({
    regionCode,
    regionName: NAMES[regionCode] ?? regionCode,
    year,
    energyType,
    valueMwh,
  })
).sort(compareObservations);
