import {
  PROXIMITY_RADIUS_GROUPS,
  feetToMeters,
  mapMode,
  pointInPolygon,
  visualEffects,
  type MapMode,
  type NearbyLandmark,
  type VisualEffect,
} from '@playa/shared';

import type { LandmarkRepository } from '@/lib/landmarks/types';
import type { ProximityQuery } from '@/lib/proximity/strategies';

export interface ProximityReport {
  landmarks: NearbyLandmark[];
  toilets: NearbyLandmark[];
  mapMode: MapMode;
  visualEffects: VisualEffect[];
  context: string | null;
}

export const describeContext = (nearest: NearbyLandmark | undefined): string | null => {
  if (!nearest) return null;
  return nearest.description?.trim() || `Near ${nearest.name}`;
};

export class ProximityEngine {
  constructor(
    private readonly repository: LandmarkRepository,
    private readonly query: ProximityQuery,
  ) {}

  get strategy(): ProximityQuery['strategy'] {
    return this.query.strategy;
  }

  /** Every landmark within its type radius, nearest first; ties keep store order. */
  async nearby(lat: number, lng: number): Promise<NearbyLandmark[]> {
    const groups = await Promise.all(
      PROXIMITY_RADIUS_GROUPS.map((group) =>
        this.query.nearby(lat, lng, { radiusMeters: feetToMeters(group.radiusFeet), types: group.types }),
      ),
    );

    const seen = new Set<string>();
    const unique: NearbyLandmark[] = [];
    for (const landmark of groups.flat()) {
      if (seen.has(landmark.id)) continue;
      seen.add(landmark.id);
      unique.push(landmark);
    }
    // Array#sort is stable.
    return unique.sort((a, b) => a.distanceMeters - b.distanceMeters);
  }

  async report(lat: number, lng: number): Promise<ProximityReport> {
    const all = await this.nearby(lat, lng);
    const landmarks = all.filter((landmark) => landmark.type !== 'toilet');
    const toilets = all.filter((landmark) => landmark.type === 'toilet');
    return {
      landmarks,
      toilets,
      mapMode: mapMode(landmarks),
      visualEffects: visualEffects(landmarks),
      context: describeContext(landmarks[0]),
    };
  }

  /** `false` when no active fence is configured. */
  async withinFence(lat: number, lng: number): Promise<boolean> {
    const fence = await this.repository.findActiveBoundary('fence');
    if (!fence) return false;
    return pointInPolygon(lat, lng, fence.rings[0]);
  }
}
