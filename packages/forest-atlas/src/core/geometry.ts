/**
 * Region geometry parsing and validation
 */

import { area, kinks } from '@turf/turf';
import type { Position } from 'geojson';
import { z } from 'zod';

import { InvalidRequestError } from './errors.js';
import type { RegionGeometry } from './types.js';

const PositionSchema = z.array(z.number()).min(2);
const RingSchema = z.array(PositionSchema);

const GeometrySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('Polygon'),
    coordinates: z.array(RingSchema),
  }),
  z.object({
    type: z.literal('MultiPolygon'),
    coordinates: z.array(z.array(RingSchema)),
  }),
]);

const FeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: GeometrySchema,
});

const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(FeatureSchema).min(1),
});

const GeoJsonSchema = z.union([GeometrySchema, FeatureSchema, FeatureCollectionSchema]);

/**
 * Accept a bare Polygon/MultiPolygon, a Feature, or a FeatureCollection
 * (first feature), then validate it
 *
 * @throws InvalidRequestError
 */
export function parseRegionGeometry(raw: unknown): RegionGeometry {
  const result = GeoJsonSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.errors[0];
    throw new InvalidRequestError(
      `Geometry must be a GeoJSON Polygon or MultiPolygon: ${issue?.message ?? 'invalid value'}`,
      'geometry'
    );
  }

  const parsed = result.data;
  let geometry: RegionGeometry;
  if (parsed.type === 'FeatureCollection') {
    const [first] = parsed.features;
    if (!first) {
      throw new InvalidRequestError('FeatureCollection has no features', 'geometry');
    }
    geometry = first.geometry;
  } else if (parsed.type === 'Feature') {
    geometry = parsed.geometry;
  } else {
    geometry = parsed;
  }

  validateRegionGeometry(geometry);
  return geometry;
}

function samePosition(a: Position, b: Position): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

function validateRing(ring: readonly Position[], path: string): void {
  if (ring.length < 4) {
    throw new InvalidRequestError(`${path} needs at least 4 positions, got ${ring.length}`, 'geometry');
  }

  const first = ring[0];
  const last = ring[ring.length - 1];
  if (!first || !last || !samePosition(first, last)) {
    throw new InvalidRequestError(`${path} is not closed`, 'geometry');
  }

  for (const [lon, lat] of ring) {
    if (lon === undefined || lat === undefined || !Number.isFinite(lon) || !Number.isFinite(lat)) {
      throw new InvalidRequestError(`${path} has a non-numeric coordinate`, 'geometry');
    }
    if (lon < -180 || lon > 180 || lat < -90 || lat > 90) {
      throw new InvalidRequestError(`${path} has coordinate outside WGS84 bounds: [${lon}, ${lat}]`, 'geometry');
    }
  }
}

function validatePolygon(rings: readonly (readonly Position[])[], path: string): void {
  if (rings.length === 0) {
    throw new InvalidRequestError(`${path} has no rings`, 'geometry');
  }
  rings.forEach((ring, i) => validateRing(ring, `${path} ring ${i}`));
}

/**
 * Non-empty, every ring closed with at least 4 positions, WGS84 bounds,
 * non-zero area, no self-intersections
 *
 * @throws InvalidRequestError
 */
export function validateRegionGeometry(geometry: RegionGeometry): void {
  if (geometry.type === 'Polygon') {
    validatePolygon(geometry.coordinates, 'Polygon');
  } else {
    if (geometry.coordinates.length === 0) {
      throw new InvalidRequestError('MultiPolygon has no polygons', 'geometry');
    }
    geometry.coordinates.forEach((polygon, i) => validatePolygon(polygon, `MultiPolygon polygon ${i}`));
  }

  if (area(geometry) <= 0) {
    throw new InvalidRequestError('Geometry has zero area', 'geometry');
  }

  if (kinks(geometry).features.length > 0) {
    throw new InvalidRequestError('Geometry is self-intersecting', 'geometry');
  }
}

/**
 * Geodesic area in hectares
 */
export function geometryAreaHa(geometry: RegionGeometry): number {
  return area(geometry) / 10_000;
}
