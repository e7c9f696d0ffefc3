import { feetToMeters } from '../geo/math';
import type { LandmarkType } from './types';
import { isLandmarkType } from './types';

const DEFAULT_RADIUS_METERS: Partial<Record<LandmarkType, number>> = {
  center: 50,
  plaza: 50,
  toilet: 20,
};

const FALLBACK_RADIUS_METERS = 30;

export const defaultRadiusMeters = (type: LandmarkType): number =>
  DEFAULT_RADIUS_METERS[type] ?? FALLBACK_RADIUS_METERS;

export interface ProximityRadiusGroup {
  key: 'camp' | 'service' | 'art' | 'toilet' | 'other';
  radiusFeet: number;
  types: LandmarkType[];
}

export const PROXIMITY_RADIUS_GROUPS: ProximityRadiusGroup[] = [
  { key: 'camp', radiusFeet: 150, types: ['center', 'sacred', 'plaza'] },
  { key: 'service', radiusFeet: 200, types: ['service', 'medical', 'ranger'] },
  { key: 'art', radiusFeet: 100, types: ['art'] },
  { key: 'toilet', radiusFeet: 50, types: ['toilet'] },
  { key: 'other', radiusFeet: 25, types: ['cpn', 'other'] },
];

export const proximityRadiusMeters = (type: LandmarkType): number => {
  const group = PROXIMITY_RADIUS_GROUPS.find((entry) => entry.types.includes(type));
  return feetToMeters(group?.radiusFeet ?? 25);
};

/** A landmark is nearby within its type radius or its own radius, whichever is larger. */
export const effectiveRadiusMeters = (type: LandmarkType, landmarkRadiusMeters: number): number => {
  const typeRadius = proximityRadiusMeters(type);
  return Number.isFinite(landmarkRadiusMeters) ? Math.max(typeRadius, landmarkRadiusMeters) : typeRadius;
};

const PRIORITY: Record<LandmarkType, number> = {
  center: 1,
  sacred: 1,
  medical: 2,
  ranger: 2,
  service: 3,
  toilet: 3,
  art: 4,
  plaza: 5,
  cpn: 5,
  other: 5,
};

export const landmarkPriority = (type: string): number => (isLandmarkType(type) ? PRIORITY[type] : 5);

/** Maps free-form GeoJSON categories onto the closed type set. */
export const normalizeLandmarkType = (value: unknown): LandmarkType => {
  if (typeof value !== 'string') return 'other';
  const key = value.trim().toLowerCase();
  if (isLandmarkType(key)) return key;
  if (key === 'temple') return 'sacred';
  if (key === 'man' || key === 'center camp') return 'center';
  if (key === 'medic' || key === 'rampart') return 'medical';
  if (key === 'portos' || key === 'porto' || key === 'toilets') return 'toilet';
  if (key === 'infrastructure' || key === 'ice') return 'service';
  return 'other';
};
