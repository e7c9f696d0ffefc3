import { EARTH_RADIUS_METERS, isValidCoordinate } from './math';
import type { Position } from './types';

const DEG_TO_RAD = Math.PI / 180;

export type StreetKind = 'radial' | 'arc';

export interface StreetLine {
  id: string;
  name: string;
  type: StreetKind;
  width: number;
  coordinates: Position[];
  active: boolean;
}

export interface NearestStreet {
  id: string;
  name: string;
  type: StreetKind;
  distanceMeters: number;
}

type Point = { x: number; y: number };

const distanceToSegment = (p: Point, a: Point, b: Point): number => {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSquared = dx * dx + dy * dy;
  if (lengthSquared === 0) return Math.hypot(p.x - a.x, p.y - a.y);
  const t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSquared));
  return Math.hypot(p.x - (a.x + t * dx), p.y - (a.y + t * dy));
};

/** Meters from the point to a `[lng, lat]` polyline, projected around the point. */
export const distanceToPolylineMeters = (lat: number, lng: number, line: Position[]): number => {
  const cosLat = Math.cos(lat * DEG_TO_RAD);
  const project = (position: Position): Point => ({
    x: (position[0] - lng) * DEG_TO_RAD * EARTH_RADIUS_METERS * cosLat,
    y: (position[1] - lat) * DEG_TO_RAD * EARTH_RADIUS_METERS,
  });
  const points = line
    .filter((position) => position.length >= 2 && isValidCoordinate(position[1], position[0]))
    .map(project);
  if (!points.length) return Number.POSITIVE_INFINITY;

  const origin = { x: 0, y: 0 };
  if (points.length === 1) return Math.hypot(points[0].x, points[0].y);
  let best = Number.POSITIVE_INFINITY;
  for (let i = 1; i < points.length; i += 1) {
    best = Math.min(best, distanceToSegment(origin, points[i - 1], points[i]));
  }
  return best;
};

export const nearestStreet = (lat: number, lng: number, streets: readonly StreetLine[]): NearestStreet | null => {
  if (!isValidCoordinate(lat, lng)) return null;
  let nearest: NearestStreet | null = null;
  for (const street of streets) {
    if (!street.active) continue;
    const distance = distanceToPolylineMeters(lat, lng, street.coordinates);
    if (!Number.isFinite(distance)) continue;
    if (!nearest || distance < nearest.distanceMeters) {
      nearest = { id: street.id, name: street.name, type: street.type, distanceMeters: distance };
    }
  }
  return nearest;
};
