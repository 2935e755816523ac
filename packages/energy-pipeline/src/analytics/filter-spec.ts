/**
 * Filter specifications
 *
 * A caller-supplied spec is validated and normalized (sorted, deduplicated)
 * so that equal filters share one cache key.
 */

import { z } from 'zod';
import { ENERGY_TYPES, type EnergyType } from '../core/constants.js';
import { ValidationError } from '../core/errors.js';
import type { Observation, YearRange } from '../core/types.js';
import { compareCodes } from '../core/utils/ordering.js';

export type FilterValues = readonly string[] | ReadonlySet<string>;

export interface FilterSpec {
  /** Inclusive [min, max]; absent = every year */
  readonly yearRange?: readonly [number, number];
  /** Region codes; absent or empty = every region */
  readonly regions?: FilterValues;
  /** Energy types; absent or empty = every type */
  readonly energyTypes?: FilterValues;
}

export interface NormalizedFilter {
  readonly yearRange: readonly [number, number] | null;
  readonly regions: readonly string[];
  readonly energyTypes: readonly EnergyType[];
}

const filterSpecSchema = z
  .object({
    yearRange: z
      .tuple([z.number().int(), z.number().int()])
      .refine(([min, max]) => min <= max, 'yearRange min must be <= max')
      .optional(),
    regions: z.array(z.string().trim().min(1, 'Region code must not be empty')),
    energyTypes: z.array(z.enum(ENERGY_TYPES, {
        errorMap: () => ({ message: `Energy type must be one of ${ENERGY_TYPES.join(', ')}` }),
      })),
  })
  .strict();

/**
 * Validate and normalize a filter spec.
 *
 * @throws ValidationError (stage "filter") for a reversed or non-integer
 *   year range, an empty region code, or an unknown energy type
 */
export function normalizeFilter(spec: FilterSpec = {}): NormalizedFilter {
  // Untyped callers can still hand over a bare code, which would iterate as characters
  for (const field of ['regions', 'energyTypes'] as const) {
    const values: unknown = spec[field];
    if (typeof values === 'string') {
      throw new ValidationError(`Invalid filter: ${field} must be a list, got "${values}"`, {
        stage: 'filter',
        column: field,
      });
    }
  }

  const result = filterSpecSchema.safeParse({
    yearRange: spec.yearRange === undefined ? undefined : [...spec.yearRange],
    regions: Array.from(spec.regions ?? []),
    energyTypes: Array.from(spec.energyTypes ?? []),
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path[0];
    throw new ValidationError(`Invalid filter: ${issue?.message ?? 'invalid'}`, {
      stage: 'filter',
      column: typeof field === 'string' ? field : undefined,
    });
  }

  const { yearRange, regions, energyTypes } = result.data;
  return {
    yearRange: yearRange ?? null,
    regions: [...new Set(regions)].sort(compareCodes),
    energyTypes: [...new Set(energyTypes)].sort(compareCodes),
  };
}

/**
 * Year range from optional bounds; a missing bound falls back to the
 * matching bound of `available`. Undefined when neither bound is given.
 */
export function yearRangeFrom(
  from: number | undefined,
  to: number | undefined,
  available: YearRange
): readonly [number, number] | undefined {
  if (from === undefined && to === undefined) {
    return undefined;
  }
  return [from ?? available.min, to ?? available.max];
}

export function filterCacheKey(filter: NormalizedFilter): string {
  return JSON.stringify([filter.yearRange, filter.regions, filter.energyTypes]);
}

/**
 * Predicate for one normalized filter: AND across dimensions, membership
 * within each.
 */
export function createMatcher(filter: NormalizedFilter): (observation: Observation) => boolean {
  const regions = new Set(filter.regions);
  const energyTypes = new Set<string>(filter.energyTypes);
  const minYear = filter.yearRange?.[0] ?? -Infinity;
  const maxYear = filter.yearRange?.[1] ?? Infinity;

  return (observation) =>
    observation.year >= minYear &&
    observation.year <= maxYear &&
    (regions.size === 0 || regions.has(observation.regionCode)) &&
    (energyTypes.size === 0 || energyTypes.has(observation.energyType));
}
