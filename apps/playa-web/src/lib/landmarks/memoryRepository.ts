import ngeohash from 'ngeohash';

import {
  haversineMeters,
  isValidCoordinate,
  type Landmark,
  type LandmarkType,
  type NearbyLandmark,
  type StreetLine,
} from '@playa/shared';

import type {
  Boundary,
  BoundaryInput,
  BoundaryType,
  LandmarkInput,
  LandmarkRepository,
  StreetInput,
  WithinQuery,
} from '@/lib/landmarks/types';

// Precision-6 cells are about 1.2 km by 0.6 km, so a cell plus its neighbours
// covers at least this radius around any point inside it.
const INDEX_PRECISION = 6;
const INDEX_COVERAGE_METERS = 600;

export interface MemoryLandmarkSeed {
  landmarks?: readonly Landmark[];
  streets?: readonly StreetLine[];
  boundaries?: readonly Boundary[];
}

/** In-process landmark store with a geohash bucket index. */
export class MemoryLandmarkRepository implements LandmarkRepository {
  readonly kind = 'memory';

  private landmarks: Landmark[];
  private streets: StreetLine[];
  private boundaries: Boundary[];
  private index = new Map<string, Landmark[]>();
  private order = new Map<string, number>();
  private nextId = 1;

  constructor(seed: MemoryLandmarkSeed = {}) {
    this.landmarks = [...(seed.landmarks ?? [])];
    this.streets = [...(seed.streets ?? [])];
    this.boundaries = [...(seed.boundaries ?? [])];
    this.rebuildIndex();
  }

  async listActive(types?: readonly LandmarkType[]): Promise<Landmark[]> {
    return this.landmarks.filter((landmark) => landmark.active && (!types || types.includes(landmark.type)));
  }

  async findWithin(query: WithinQuery): Promise<NearbyLandmark[]> {
    if (!isValidCoordinate(query.lat, query.lng)) return [];
    const largestRadius = this.landmarks.reduce(
      (max, landmark) => (Number.isFinite(landmark.radiusMeters) ? Math.max(max, landmark.radiusMeters) : max),
      0,
    );
    const searchRadius = Math.max(query.radiusMeters, largestRadius);

    const candidates = searchRadius <= INDEX_COVERAGE_METERS ? this.bucketCandidates(query.lat, query.lng) : this.landmarks;

    const results: NearbyLandmark[] = [];
    for (const landmark of candidates) {
      if (!landmark.active || !query.types.includes(landmark.type)) continue;
      const distance = haversineMeters(query.lat, query.lng, landmark.lat, landmark.lng);
      const radius = Number.isFinite(landmark.radiusMeters)
        ? Math.max(query.radiusMeters, landmark.radiusMeters)
        : query.radiusMeters;
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

  async supportsSpatialIndex(): Promise<boolean> {
    return true;
  }

  async findActiveBoundary(type: BoundaryType): Promise<Boundary | null> {
    return this.boundaries.find((boundary) => boundary.active && boundary.type === type) ?? null;
  }

  async listStreets(): Promise<StreetLine[]> {
    return this.streets.filter((street) => street.active);
  }

  async upsertLandmarks(rows: readonly LandmarkInput[]): Promise<number> {
    for (const row of rows) {
      const existing = this.landmarks.findIndex((item) => item.name === row.name && item.type === row.type);
      if (existing >= 0) {
        this.landmarks[existing] = { ...row, id: this.landmarks[existing].id };
      } else {
        this.landmarks.push({ ...row, id: this.allocateId('landmark') });
      }
    }
    this.rebuildIndex();
    return rows.length;
  }

  async upsertStreets(rows: readonly StreetInput[]): Promise<number> {
    for (const { properties: _properties, ...row } of rows) {
      const existing = this.streets.findIndex((item) => item.name === row.name && item.type === row.type);
      if (existing >= 0) {
        this.streets[existing] = { ...row, id: this.streets[existing].id };
      } else {
        this.streets.push({ ...row, id: this.allocateId('street') });
      }
    }
    return rows.length;
  }

  async upsertBoundaries(rows: readonly BoundaryInput[]): Promise<number> {
    for (const row of rows) {
      const existing = this.boundaries.findIndex((item) => item.name === row.name && item.type === row.type);
      if (existing >= 0) {
        this.boundaries[existing] = { ...row, id: this.boundaries[existing].id };
      } else {
        this.boundaries.push({ ...row, id: this.allocateId('boundary') });
      }
    }
    return rows.length;
  }

  async ping(): Promise<void> {}

  private allocateId(prefix: string): string {
    const id = `${prefix}-${this.nextId}`;
    this.nextId += 1;
    return id;
  }

  private bucketCandidates(lat: number, lng: number): Landmark[] {
    const cell = ngeohash.encode(lat, lng, INDEX_PRECISION);
    const seen = new Set<string>();
    const candidates: Landmark[] = [];
    for (const hash of [cell, ...ngeohash.neighbors(cell)]) {
      for (const landmark of this.index.get(hash) ?? []) {
        if (seen.has(landmark.id)) continue;
        seen.add(landmark.id);
        candidates.push(landmark);
      }
    }
    return candidates.sort((a, b) => (this.order.get(a.id) ?? 0) - (this.order.get(b.id) ?? 0));
  }

  private rebuildIndex() {
    this.index = new Map();
    this.order = new Map();
    this.landmarks.forEach((landmark, position) => {
      this.order.set(landmark.id, position);
      if (!isValidCoordinate(landmark.lat, landmark.lng)) return;
      const hash = ngeohash.encode(landmark.lat, landmark.lng, INDEX_PRECISION);
      const bucket = this.index.get(hash);
      if (bucket) bucket.push(landmark);
      else this.index.set(hash, [landmark]);
    });
  }
}
