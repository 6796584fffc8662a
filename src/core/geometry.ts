import { convex } from '@turf/convex';
import { points } from '@turf/helpers';
import type { LineString, Polygon } from 'geojson';
import { BoundingBox, GeometryType, HullEnvelope, Position } from '../types';

/**
 * Default number of positions kept in a coordinate summary
 */
export const SUMMARY_POINTS = 30;

export function isValidLatitude(num: number): boolean {
  return Number.isFinite(num) && num >= -90 && num <= 90;
}

export function isValidLongitude(num: number): boolean {
  return Number.isFinite(num) && num >= -180 && num <= 180;
}

/**
 * Zip parallel latitude/longitude lists into unique `[lon, lat]` positions.
 *
 * Pairs with an out-of-range axis are dropped together, so the remaining
 * positions never mix a latitude with another sample's longitude.
 * First occurrence wins; input order is preserved.
 */
export function pairCoordinates(
  lat: number[],
  lon: number[]
): { positions: Position[]; dropped: number } {
  const count = Math.min(lat.length, lon.length);
  const seen = new Set<string>();
  const positions: Position[] = [];
  let dropped = 0;

  for (let i = 0; i < count; i++) {
    if (!isValidLatitude(lat[i]) || !isValidLongitude(lon[i])) {
      dropped++;
      continue;
    }
    const key = `${lon[i]},${lat[i]}`;
    if (seen.has(key)) continue;
    seen.add(key);
    positions.push([lon[i], lat[i]]);
  }

  return { positions, dropped };
}

/**
 * Bounding box in `[minLon, minLat, maxLon, maxLat]` order
 */
export function boundingBox(positions: Position[]): BoundingBox {
  if (positions.length === 0) {
    throw new Error('Cannot compute a bounding box without positions');
  }

  let minLon = Infinity;
  let minLat = Infinity;
  let maxLon = -Infinity;
  let maxLat = -Infinity;

  for (const [lon, lat] of positions) {
    minLon = Math.min(minLon, lon);
    minLat = Math.min(minLat, lat);
    maxLon = Math.max(maxLon, lon);
    maxLat = Math.max(maxLat, lat);
  }

  return [minLon, minLat, maxLon, maxLat];
}

/**
 * Reorder a bbox into the hull's latitude-first layout
 */
export function toHullOrder(bbox: BoundingBox): HullEnvelope {
  const [minLon, minLat, maxLon, maxLat] = bbox;
  return [minLat, minLon, maxLat, maxLon];
}

/**
 * Reorder a hull extent back into bbox layout
 */
export function toBboxOrder(hull: HullEnvelope): BoundingBox {
  const [minLat, minLon, maxLat, maxLon] = hull;
  return [minLon, minLat, maxLon, maxLat];
}

export function inferGeometryType(positions: Position[]): GeometryType {
  return positions.length === 1 ? 'Point' : 'LineString';
}

/**
 * Evenly spaced sample of the positions as a LineString.
 * Keeps every `ceil(n / maxPoints)`-th position starting with the first.
 */
export function summarise(
  positions: Position[],
  maxPoints: number = SUMMARY_POINTS
): LineString | undefined {
  if (positions.length < 2) return undefined;

  const step = Math.ceil(positions.length / maxPoints);
  const sampled = positions.filter((_, i) => i % step === 0);
  if (sampled.length < 2) return undefined;

  return {
    type: 'LineString',
    coordinates: sampled,
  };
}

/**
 * Convex hull polygon around the positions.
 * Needs more than three unique positions; degenerate (collinear) input yields nothing.
 */
export function outline(positions: Position[]): Polygon | undefined {
  if (positions.length <= 3) return undefined;

  const hull = convex(points(positions));
  return hull ? hull.geometry : undefined;
}
