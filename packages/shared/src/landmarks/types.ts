export const LANDMARK_TYPES = [
  'center',
  'sacred',
  'plaza',
  'service',
  'art',
  'toilet',
  'cpn',
  'medical',
  'ranger',
  'other',
] as const;

export type LandmarkType = (typeof LANDMARK_TYPES)[number];

export interface Landmark {
  id: string;
  name: string;
  type: LandmarkType;
  lat: number;
  lng: number;
  radiusMeters: number;
  icon?: string | null;
  description?: string | null;
  properties: Record<string, unknown>;
  active: boolean;
}

export interface NearbyLandmark {
  id: string;
  name: string;
  type: LandmarkType;
  lat: number;
  lng: number;
  distanceMeters: number;
  description?: string | null;
}

export const isLandmarkType = (value: unknown): value is LandmarkType =>
  typeof value === 'string' && LANDMARK_TYPES.some((type) => type === value);
