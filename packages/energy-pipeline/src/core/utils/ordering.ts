/**
 * Deterministic orderings shared by every stage that exposes sorted output.
 *
 * Observations sort by year, then region code, then energy type name.
 * Comparisons are by code unit, never locale-dependent.
 */

import type { Observation } from '../types.js';

export function compareCodes(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareObservations(a: Observation, b: Observation): number {
  return a.year - b.year || compareCodes(a.regionCode, b.regionCode) || compareCodes(a.energyType, b.energyType);
}
