import ngeohash from 'ngeohash';

import {
  describeBrcLocation,
  landmarkPriority,
  nearestStreet,
  type Landmark,
  type NearestStreet,
} from '@playa/shared';

import {
  MemoryEphemeralStore,
  SupabaseEphemeralStore,
  type EphemeralStore,
} from '@/lib/cache/ephemeralStore';
import { SnapshotCache } from '@/lib/cache/snapshotCache';
import { loadLocationConfig, type LocationConfig } from '@/lib/config';
import { DEFAULT_LANDMARKS } from '@/lib/landmarks/defaults';
import { MemoryLandmarkRepository } from '@/lib/landmarks/memoryRepository';
import { SupabaseLandmarkRepository } from '@/lib/landmarks/supabaseRepository';
import type { LandmarkRepository } from '@/lib/landmarks/types';
import { ProximityEngine, type ProximityReport } from '@/lib/proximity/engine';
import { selectProximityQuery } from '@/lib/proximity/strategies';
import { LocationResolver, type ResolvedPosition } from '@/lib/location/resolver';
import {
  LOCATION_SNAPSHOT_KEY,
  SIMULATION_HISTORY_KEY,
  locationSampleSchema,
  proximityCacheKey,
  proximityReportSchema,
  routeHistorySchema,
  type LocationSample,
  type RoutePoint,
} from '@/lib/location/schemas';
import { getOptionalServiceClient } from '@/lib/supabase/service';
import { getErrorMessage } from '@/lib/utils/getErrorMessage';

const PROXIMITY_GEOHASH_PRECISION = 12;

const EMPTY_PROXIMITY: ProximityReport = {
  landmarks: [],
  toilets: [],
  mapMode: 'normal',
  visualEffects: [],
  context: null,
};

export interface CurrentProximity extends ProximityReport {
  withinFence: boolean;
  location: { lat: number; lng: number } | null;
}

export interface LandmarkListing {
  landmarks: Array<Landmark & { priority: number }>;
  source: 'database' | 'memory' | 'fallback';
}

export type RouteHistory =
  | { mode: 'simulated'; points: RoutePoint[] }
  | { mode: 'live'; points: RoutePoint[] };

export interface HealthReport {
  ok: boolean;
  store: { kind: LandmarkRepository['kind']; reachable: boolean; error?: string };
  ephemeralStore: string;
  spatialIndex: 'indexed' | 'geometric' | null;
  simulation: boolean;
  cityPlan: string;
}

export interface LocationServiceDeps {
  config: LocationConfig;
  repository: LandmarkRepository;
  store: EphemeralStore;
  resolver?: LocationResolver;
  now?: () => number;
}

class LocationUnavailableError extends Error {
  constructor() {
    super('No position source available');
    this.name = 'LocationUnavailableError';
  }
}

const absorb = async <T>(label: string, work: () => Promise<T>, fallback: T): Promise<T> => {
  try {
    return await work();
  } catch (error) {
    console.warn(`[location] ${label} failed: ${getErrorMessage(error)}`);
    return fallback;
  }
};

/** Resolves where the installation is and what is around it, with TTL caching. */
export class LocationService {
  readonly config: LocationConfig;
  readonly repository: LandmarkRepository;
  readonly store: EphemeralStore;

  private readonly resolver: LocationResolver;
  private readonly cache: SnapshotCache;
  private enginePromise: Promise<ProximityEngine> | null = null;

  constructor(deps: LocationServiceDeps) {
    this.config = deps.config;
    this.repository = deps.repository;
    this.store = deps.store;
    this.resolver =
      deps.resolver ?? new LocationResolver({ config: deps.config, store: deps.store, repository: deps.repository });
    this.cache = new SnapshotCache(deps.store, deps.now);
  }

  /** Strategy is chosen on first use and kept for the life of the service. */
  engine(): Promise<ProximityEngine> {
    if (!this.enginePromise) {
      this.enginePromise = selectProximityQuery(this.repository, this.config.spatialIndex).then(
        (query) => new ProximityEngine(this.repository, query),
      );
    }
    return this.enginePromise;
  }

  /** Position sources are consulted only on a cache miss; `null` is never cached. */
  async currentLocation(): Promise<LocationSample | null> {
    try {
      const { value } = await this.cache.getOrCompute<LocationSample>(
        LOCATION_SNAPSHOT_KEY,
        this.config.cacheTtlMs,
        async () => {
          const position = await this.resolver.resolve();
          if (!position) throw new LocationUnavailableError();
          return this.buildSample(position);
        },
        locationSampleSchema,
      );
      return value;
    } catch (error) {
      if (error instanceof LocationUnavailableError) return null;
      throw error;
    }
  }

  async proximityAt(lat: number, lng: number): Promise<ProximityReport> {
    const engine = await this.engine();
    const key = proximityCacheKey(ngeohash.encode(lat, lng, PROXIMITY_GEOHASH_PRECISION));
    const { value } = await this.cache.getOrCompute<ProximityReport>(
      key,
      this.config.cacheTtlMs,
      () => engine.report(lat, lng),
      proximityReportSchema,
    );
    return value;
  }

  /** Store failures propagate; an unknown position yields an empty report. */
  async currentProximity(): Promise<CurrentProximity> {
    const location = await this.currentLocation();
    if (!location) return { ...EMPTY_PROXIMITY, withinFence: false, location: null };

    const engine = await this.engine();
    const [report, withinFence] = await Promise.all([
      this.proximityAt(location.lat, location.lng),
      engine.withinFence(location.lat, location.lng),
    ]);
    return { ...report, withinFence, location: { lat: location.lat, lng: location.lng } };
  }

  async listLandmarks(): Promise<LandmarkListing> {
    const withPriority = (landmarks: readonly Landmark[]) =>
      landmarks.map((landmark) => ({ ...landmark, priority: landmarkPriority(landmark.type) }));
    try {
      const landmarks = await this.repository.listActive();
      if (landmarks.length) {
        return {
          landmarks: withPriority(landmarks),
          source: this.repository.kind === 'supabase' ? 'database' : 'memory',
        };
      }
      console.warn('[landmarks] store is empty; serving built-in landmarks');
    } catch (error) {
      console.error(`[landmarks] store unavailable: ${getErrorMessage(error)}`);
    }
    return { landmarks: withPriority(DEFAULT_LANDMARKS), source: 'fallback' };
  }

  async routeHistory(): Promise<RouteHistory> {
    if (!this.config.simulateMovement) return { mode: 'live', points: [] };
    const parsed = routeHistorySchema.safeParse(
      await absorb('route history', () => this.store.get(SIMULATION_HISTORY_KEY), null),
    );
    return { mode: 'simulated', points: parsed.success ? parsed.data : [] };
  }

  async health(): Promise<HealthReport> {
    let reachable = true;
    let error: string | undefined;
    try {
      await this.repository.ping();
    } catch (caught) {
      reachable = false;
      error = getErrorMessage(caught);
    }
    const engine = await absorb<ProximityEngine | null>('spatial index check', () => this.engine(), null);
    return {
      ok: reachable,
      store: { kind: this.repository.kind, reachable, ...(error ? { error } : {}) },
      ephemeralStore: this.store.kind,
      spatialIndex: engine?.strategy ?? null,
      simulation: this.config.simulateMovement,
      cityPlan: this.config.cityPlan.slug,
    };
  }

  private async buildSample(position: ResolvedPosition): Promise<LocationSample> {
    const { lat, lng } = position;
    const brc = describeBrcLocation(lat, lng, this.config.cityPlan);

    const [proximity, withinFence, street] = await Promise.all([
      absorb<ProximityReport>('proximity', () => this.proximityAt(lat, lng), EMPTY_PROXIMITY),
      absorb('fence check', async () => (await this.engine()).withinFence(lat, lng), false),
      absorb<NearestStreet | null>(
        'nearest street',
        async () => nearestStreet(lat, lng, await this.repository.listStreets()),
        null,
      ),
    ]);

    return {
      lat,
      lng,
      timestamp: position.timestamp,
      accuracy: position.accuracy,
      battery: position.battery,
      source: position.source,
      address: brc.address,
      radialStreet: brc.radialStreet,
      concentricStreet: brc.concentricStreet,
      section: brc.section,
      distanceFromCenterMeters: brc.distanceFromCenterMeters,
      distanceFromCenterMiles: brc.distanceFromCenterMiles,
      bearingFromCenter: brc.bearingFromCenter,
      withinFence,
      nearestStreet: street ? toStreetSummary(street) : null,
      landmarkName: position.landmarkName ?? proximity.landmarks[0]?.name ?? null,
      context: proximity.context ?? (position.landmarkName ? `Near ${position.landmarkName}` : null),
      destination: position.destination,
      nearbyLandmarks: proximity.landmarks,
      nearbyToilets: proximity.toilets,
      mapMode: proximity.mapMode,
      visualEffects: proximity.visualEffects,
    };
  }
}

const toStreetSummary = (street: NearestStreet) => ({
  name: street.name,
  type: street.type,
  distanceMeters: street.distanceMeters,
});

export const createLocationService = (config: LocationConfig = loadLocationConfig()): LocationService => {
  const client = getOptionalServiceClient(config.supabase);
  const repository: LandmarkRepository = client
    ? new SupabaseLandmarkRepository(client, config.landmarkStoreTimeoutMs)
    : new MemoryLandmarkRepository({
        landmarks: DEFAULT_LANDMARKS,
        boundaries: [
          {
            id: 'perimeter-fence',
            name: config.cityPlan.perimeter.name,
            type: 'fence',
            rings: [config.cityPlan.perimeter.ring],
            description: config.cityPlan.perimeter.description,
            properties: { cityPlan: config.cityPlan.slug },
            active: true,
          },
        ],
      });

  let store: EphemeralStore;
  if (config.ephemeralStore === 'supabase' && client) {
    store = new SupabaseEphemeralStore(client, config.landmarkStoreTimeoutMs);
  } else {
    if (config.ephemeralStore === 'supabase') {
      console.warn('[cache] EPHEMERAL_STORE=supabase without credentials; using memory');
    }
    store = new MemoryEphemeralStore();
  }

  return new LocationService({ config, repository, store });
};

let sharedService: LocationService | null = null;

export const getLocationService = (): LocationService => {
  if (!sharedService) sharedService = createLocationService();
  return sharedService;
};
