import type { Landmark, LandmarkType, NearbyLandmark, Position, StreetLine } from '@playa/shared';

export type BoundaryType = 'fence' | 'city_block' | 'plaza' | 'other';

export interface Boundary {
  id: string;
  name: string;
  type: BoundaryType;
  rings: Position[][];
  description: string | null;
  properties: Record<string, unknown>;
  active: boolean;
}

export type LandmarkInput = Omit<Landmark, 'id'>;
export type StreetInput = Omit<StreetLine, 'id'> & { properties: Record<string, unknown> };
export type BoundaryInput = Omit<Boundary, 'id'>;

export interface WithinQuery {
  lat: number;
  lng: number;
  radiusMeters: number;
  types: readonly LandmarkType[];
}

/**
 * Read side is what the proximity and location paths use; the upserts back the importer.
 * Landmark lists come back in store order: ascending id in Postgres, insertion order in memory.
 */
export interface LandmarkRepository {
  readonly kind: 'supabase' | 'memory';
  listActive(types?: readonly LandmarkType[]): Promise<Landmark[]>;
  /** Active landmarks within `max(radiusMeters, landmark.radiusMeters)` of the point. */
  findWithin(query: WithinQuery): Promise<NearbyLandmark[]>;
  supportsSpatialIndex(): Promise<boolean>;
  findActiveBoundary(type: BoundaryType): Promise<Boundary | null>;
  listStreets(): Promise<StreetLine[]>;
  upsertLandmarks(rows: readonly LandmarkInput[]): Promise<number>;
  upsertStreets(rows: readonly StreetInput[]): Promise<number>;
  upsertBoundaries(rows: readonly BoundaryInput[]): Promise<number>;
  ping(): Promise<void>;
}
