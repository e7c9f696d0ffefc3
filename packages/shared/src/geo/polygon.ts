import { isValidCoordinate } from './math';
import type { Coordinates, Position, Ring } from './types';

const EDGE_EPSILON = 1e-12;

const isPosition = (value: unknown): value is Position =>
  Array.isArray(value) &&
  value.length >= 2 &&
  typeof value[0] === 'number' &&
  typeof value[1] === 'number' &&
  Number.isFinite(value[0]) &&
  Number.isFinite(value[1]);

const samePosition = (a: Position, b: Position) => a[0] === b[0] && a[1] === b[1];

const usablePositions = (ring: readonly unknown[]): Position[] => ring.filter(isPosition);

/** Ring with the closing duplicate dropped, if present. */
const openPositions = (ring: Ring): Position[] => {
  if (ring.length >= 2 && samePosition(ring[0], ring[ring.length - 1])) {
    return ring.slice(0, -1);
  }
  return ring;
};

const countDistinct = (positions: Position[]): number =>
  new Set(positions.map((position) => `${position[0]},${position[1]}`)).size;

export const isClosedRing = (ring: Ring): boolean =>
  ring.length >= 2 && samePosition(ring[0], ring[ring.length - 1]);

export const closeRing = (ring: Ring): Ring => {
  if (!ring.length || isClosedRing(ring)) return ring;
  return [...ring, [ring[0][0], ring[0][1]]];
};

/** At least three distinct finite points and first == last. */
export const isValidRing = (ring: readonly unknown[]): ring is Ring => {
  const positions = usablePositions(ring);
  if (positions.length !== ring.length || positions.length < 4) return false;
  return isClosedRing(positions) && countDistinct(positions) >= 3;
};

const isOnSegment = (x: number, y: number, ax: number, ay: number, bx: number, by: number): boolean => {
  const cross = (bx - ax) * (y - ay) - (by - ay) * (x - ax);
  if (Math.abs(cross) > EDGE_EPSILON) return false;
  return (
    x >= Math.min(ax, bx) - EDGE_EPSILON &&
    x <= Math.max(ax, bx) + EDGE_EPSILON &&
    y >= Math.min(ay, by) - EDGE_EPSILON &&
    y <= Math.max(ay, by) + EDGE_EPSILON
  );
};

/**
 * Ray-casting containment test against a `[lng, lat]` ring.
 *
 * Boundary convention: a point lying exactly on an edge or a vertex is outside.
 * Crossings use a half-open rule on latitude, so a vertex touched by the ray is counted
 * once, and the zero-length edge formed by a closing duplicate point never counts.
 * The result does not depend on which vertex the ring starts from.
 */
export const pointInPolygon = (lat: number, lng: number, ring: readonly unknown[] | null | undefined): boolean => {
  if (!isValidCoordinate(lat, lng) || !Array.isArray(ring)) return false;
  const points = usablePositions(ring);
  if (countDistinct(points) < 3) return false;

  const x = lng;
  const y = lat;
  let inside = false;
  for (let i = 0, j = points.length - 1; i < points.length; j = i, i += 1) {
    const [xi, yi] = points[i];
    const [xj, yj] = points[j];
    if (isOnSegment(x, y, xj, yj, xi, yi)) return false;
    if (yi > y !== yj > y) {
      const intersectX = ((xj - xi) * (y - yi)) / (yj - yi) + xi;
      if (x < intersectX) inside = !inside;
    }
  }
  return inside;
};

/** Vertex average of a ring, ignoring the closing duplicate. */
export const polygonCentroid = (ring: readonly unknown[]): Coordinates | null => {
  const positions = openPositions(usablePositions(ring));
  if (!positions.length) return null;
  const sum = positions.reduce(
    (acc, position) => ({ lng: acc.lng + position[0], lat: acc.lat + position[1] }),
    { lng: 0, lat: 0 },
  );
  return { lat: sum.lat / positions.length, lng: sum.lng / positions.length };
};
