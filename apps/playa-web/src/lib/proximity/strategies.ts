import {
  effectiveRadiusMeters,
  haversineMeters,
  isValidCoordinate,
  type LandmarkType,
  type NearbyLandmark,
} from '@playa/shared';

import type { SpatialIndexMode } from '@/lib/config';
import type { LandmarkRepository } from '@/lib/landmarks/types';

export interface RadiusGroupQuery {
  radiusMeters: number;
  types: readonly LandmarkType[];
}

/** One way of answering "which landmarks of these types are near this point". */
export interface ProximityQuery {
  readonly strategy: 'indexed' | 'geometric';
  nearby(lat: number, lng: number, group: RadiusGroupQuery): Promise<NearbyLandmark[]>;
}

export class IndexedProximityQuery implements ProximityQuery {
  readonly strategy = 'indexed';

  constructor(private readonly repository: LandmarkRepository) {}

  nearby(lat: number, lng: number, group: RadiusGroupQuery): Promise<NearbyLandmark[]> {
    return this.repository.findWithin({ lat, lng, radiusMeters: group.radiusMeters, types: group.types });
  }
}

export class GeometricProximityQuery implements ProximityQuery {
  readonly strategy = 'geometric';

  constructor(private readonly repository: LandmarkRepository) {}

  async nearby(lat: number, lng: number, group: RadiusGroupQuery): Promise<NearbyLandmark[]> {
    if (!isValidCoordinate(lat, lng)) return [];
    const candidates = await this.repository.listActive(group.types);
    const results: NearbyLandmark[] = [];
    for (const landmark of candidates) {
      const distance = haversineMeters(lat, lng, landmark.lat, landmark.lng);
      if (!Number.isFinite(distance)) continue;
      const radius = Math.max(group.radiusMeters, effectiveRadiusMeters(landmark.type, landmark.radiusMeters));
      if (distance > radius) continue;
      results.push({
        id: landmark.id,
        name: landmark.name,
        type: landmark.type,
        lat: landmark.lat,
        lng: landmark.lng,
        distanceMeters: distance,
        description: landmark.description ?? null,
      });
    }
    return results;
  }
}

/** Picks the strategy once, probing the store only in `auto` mode. */
export const selectProximityQuery = async (
  repository: LandmarkRepository,
  mode: SpatialIndexMode,
): Promise<ProximityQuery> => {
  if (mode === 'on') return new IndexedProximityQuery(repository);
  if (mode === 'off') return new GeometricProximityQuery(repository);
  const indexed = await repository.supportsSpatialIndex();
  console.info(`[proximity] spatial index ${indexed ? 'available' : 'unavailable'} on ${repository.kind} store`);
  return indexed ? new IndexedProximityQuery(repository) : new GeometricProximityQuery(repository);
};
