/**
 * Geometry text parsing
 *
 * Region shapes arrive as GeoJSON text embedded in a CSV cell; centers as
 * "lat, lon". Both are validated before anything downstream sees them.
 */

import { area } from '@turf/turf';
import { z } from 'zod';
import type { LatLon, RegionGeometry } from '../core/types.js';

export class GeometryTextError extends Error {
  readonly name = 'GeometryTextError' as const;
}

// ============================================================================
// Schemas
// ============================================================================

const positionSchema = z
  .tuple([z.number().min(-180).max(180), z.number().min(-90).max(90)])
  .rest(z.number());

const ringSchema = z
  .array(positionSchema)
  .min(4, 'Linear ring needs at least 4 positions')
  .refine((ring) => {
    const first = ring[0];
    const last = ring[ring.length - 1];
    return first !== undefined && last !== undefined && first[0] === last[0] && first[1] === last[1];
  }, 'Linear ring is not closed');

const polygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(ringSchema).min(1),
});

const multiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(ringSchema).min(1)).min(1),
});

const geometrySchema = z.discriminatedUnion('type', [polygonSchema, multiPolygonSchema]);

const featureSchema = z.object({
  type: z.literal('Feature'),
  geometry: geometrySchema,
});

const shapeSchema = z.union([geometrySchema, featureSchema]);

// ============================================================================
// Parsers
// ============================================================================

/**
 * Parse a GeoJSON Polygon or MultiPolygon (bare or wrapped in a Feature).
 *
 * @throws GeometryTextError on invalid JSON, unsupported type, bad rings,
 *   out-of-range coordinates, or zero area
 */
export function parseShapeText(text: string): RegionGeometry {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new GeometryTextError('Shape is not valid JSON', { cause: error });
  }

  const result = shapeSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new GeometryTextError(`Shape is not a valid Polygon or MultiPolygon${where}: ${issue?.message ?? 'invalid'}`);
  }

  const parsed = result.data.type === 'Feature' ? result.data.geometry : result.data;
  const geometry: RegionGeometry =
    parsed.type === 'Polygon'
      ? { type: 'Polygon', coordinates: parsed.coordinates }
      : { type: 'MultiPolygon', coordinates: parsed.coordinates };

  if (!(area(geometry) > 0)) {
    throw new GeometryTextError('Shape has zero area');
  }
  return geometry;
}

const POINT_PATTERN = /^\s*\[?\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*\]?\s*$/;

/**
 * Parse a "lat, lon" point.
 *
 * @throws GeometryTextError on anything else or out-of-range values
 */
export function parsePointText(text: string): LatLon {
  const match = POINT_PATTERN.exec(text);
  if (match === null) {
    throw new GeometryTextError(`Point "${text}" is not "lat, lon"`);
  }
  const lat = Number(match[1]);
  const lon = Number(match[2]);
  if (lat < -90 || lat > 90 || lon < -180 || lon > 180) {
    throw new GeometryTextError(`Point "${text}" is out of range`);
  }
  return { lat, lon };
}
