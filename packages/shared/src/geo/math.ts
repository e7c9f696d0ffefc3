import type { CoordinateBounds, Coordinates } from './types';

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

export const EARTH_RADIUS_METERS = 6_371_000;
export const METERS_PER_MILE = 1609.344;
export const METERS_PER_FOOT = 0.3048;

export const metersToMiles = (meters: number): number => meters / METERS_PER_MILE;
export const milesToMeters = (miles: number): number => miles * METERS_PER_MILE;
export const feetToMeters = (feet: number): number => feet * METERS_PER_FOOT;

export const roundCoordinate = (value: number, precision = 6): number =>
  Number.isFinite(value) ? Number(value.toFixed(precision)) : 0;

export const isValidCoordinate = (lat: unknown, lng: unknown): boolean =>
  typeof lat === 'number' &&
  typeof lng === 'number' &&
  Number.isFinite(lat) &&
  Number.isFinite(lng) &&
  lat >= -90 &&
  lat <= 90 &&
  lng >= -180 &&
  lng <= 180;

export const isWithinBounds = (point: Coordinates, bounds: CoordinateBounds): boolean =>
  isValidCoordinate(point.lat, point.lng) &&
  point.lat >= bounds.sw.lat &&
  point.lat <= bounds.ne.lat &&
  point.lng >= bounds.sw.lng &&
  point.lng <= bounds.ne.lng;

/** Great-circle distance in meters. Non-finite input yields `NaN`. */
export const haversineMeters = (lat1: number, lng1: number, lat2: number, lng2: number): number => {
  const dLat = (lat2 - lat1) * DEG_TO_RAD;
  const dLng = (lng2 - lng1) * DEG_TO_RAD;
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(lat1 * DEG_TO_RAD) * Math.cos(lat2 * DEG_TO_RAD) *
      Math.sin(dLng / 2) * Math.sin(dLng / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_METERS * c;
};

/**
 * Initial great-circle bearing from the first point to the second, in `[0, 360)`.
 * Identical points give 0; non-finite input gives `NaN`.
 */
export const bearingDegrees = (fromLat: number, fromLng: number, toLat: number, toLng: number): number => {
  if (![fromLat, fromLng, toLat, toLng].every(Number.isFinite)) return Number.NaN;
  const phi1 = fromLat * DEG_TO_RAD;
  const phi2 = toLat * DEG_TO_RAD;
  const dLng = (toLng - fromLng) * DEG_TO_RAD;
  const y = Math.sin(dLng) * Math.cos(phi2);
  const x = Math.cos(phi1) * Math.sin(phi2) - Math.sin(phi1) * Math.cos(phi2) * Math.cos(dLng);
  if (y === 0 && x === 0) return 0;
  const degrees = Math.atan2(y, x) * RAD_TO_DEG;
  return ((degrees % 360) + 360) % 360;
};

/** Point reached by travelling `distanceMeters` from `origin` along the initial `bearing`. */
export const destinationPoint = (origin: Coordinates, bearing: number, distanceMeters: number): Coordinates => {
  const delta = distanceMeters / EARTH_RADIUS_METERS;
  const theta = bearing * DEG_TO_RAD;
  const phi1 = origin.lat * DEG_TO_RAD;
  const lambda1 = origin.lng * DEG_TO_RAD;
  const sinPhi2 = Math.sin(phi1) * Math.cos(delta) + Math.cos(phi1) * Math.sin(delta) * Math.cos(theta);
  const phi2 = Math.asin(sinPhi2);
  const y = Math.sin(theta) * Math.sin(delta) * Math.cos(phi1);
  const x = Math.cos(delta) - Math.sin(phi1) * sinPhi2;
  const lambda2 = lambda1 + Math.atan2(y, x);
  return {
    lat: phi2 * RAD_TO_DEG,
    lng: ((((lambda2 * RAD_TO_DEG) + 540) % 360) - 180),
  };
};
