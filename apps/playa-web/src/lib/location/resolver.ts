import { isWithinBounds, type Landmark } from '@playa/shared';

import type { EphemeralStore } from '@/lib/cache/ephemeralStore';
import type { LocationConfig } from '@/lib/config';
import { fetchDeviceTracker } from '@/lib/homeAssistant/client';
import { DEFAULT_LANDMARKS } from '@/lib/landmarks/defaults';
import type { LandmarkRepository } from '@/lib/landmarks/types';
import {
  SIMULATED_POSITION_KEY,
  simulatedPositionSchema,
  type LocationSource,
  type SimulatedDestination,
} from '@/lib/location/schemas';
import { getErrorMessage } from '@/lib/utils/getErrorMessage';

export interface ResolvedPosition {
  lat: number;
  lng: number;
  timestamp: string;
  accuracy: number | null;
  battery: number | null;
  source: LocationSource;
  landmarkName: string | null;
  destination: SimulatedDestination | null;
}

export interface LocationResolverDeps {
  config: LocationConfig;
  store: EphemeralStore;
  repository: LandmarkRepository;
  random?: () => number;
  now?: () => Date;
  fetchImpl?: typeof fetch;
  defaults?: readonly Landmark[];
}

export const pickIndex = (length: number, random: () => number): number => {
  const value = random();
  const index = Math.floor((Number.isFinite(value) ? value : 0) * length);
  return Math.min(Math.max(index, 0), length - 1);
};

/**
 * Position source chain: simulated (when enabled), Home Assistant, a random stored
 * landmark, then the built-in landmarks. Every failure is logged and moves down the chain.
 */
export class LocationResolver {
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly defaults: readonly Landmark[];

  constructor(private readonly deps: LocationResolverDeps) {
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? (() => new Date());
    this.defaults = deps.defaults ?? DEFAULT_LANDMARKS;
  }

  async resolve(): Promise<ResolvedPosition | null> {
    if (this.deps.config.simulateMovement) {
      const simulated = await this.fromSimulation();
      if (simulated) return simulated;
    }

    const live = await this.fromHomeAssistant();
    if (live) return live;

    const stored = await this.fromStoredLandmarks();
    if (stored) return stored;

    if (!this.defaults.length) {
      console.error('[location] no position source available');
      return null;
    }
    return this.atLandmark(this.defaults[pickIndex(this.defaults.length, this.random)], 'fallback');
  }

  private async fromSimulation(): Promise<ResolvedPosition | null> {
    try {
      const raw = await this.deps.store.get(SIMULATED_POSITION_KEY);
      if (raw === null || raw === undefined) return null;
      const parsed = simulatedPositionSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn('[location] ignoring malformed simulated position');
        return null;
      }
      return {
        lat: parsed.data.lat,
        lng: parsed.data.lng,
        timestamp: parsed.data.timestamp,
        accuracy: null,
        battery: null,
        source: 'simulated',
        landmarkName: null,
        destination: parsed.data.destination,
      };
    } catch (error) {
      console.warn(`[location] simulated position unavailable: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private async fromHomeAssistant(): Promise<ResolvedPosition | null> {
    const { url, token, entityId, timeoutMs } = this.deps.config.homeAssistant;
    if (!url || !token) return null;
    try {
      const reading = await fetchDeviceTracker(entityId, {
        url,
        token,
        timeoutMs,
        fetchImpl: this.deps.fetchImpl,
      });
      if (!isWithinBounds(reading, this.deps.config.cityPlan.bounds)) {
        console.warn(`[location] rejecting ${entityId} reading outside city bounds`, {
          lat: reading.lat,
          lng: reading.lng,
        });
        return null;
      }
      return { ...reading, source: 'live', landmarkName: null, destination: null };
    } catch (error) {
      console.warn(`[location] home assistant unavailable: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private async fromStoredLandmarks(): Promise<ResolvedPosition | null> {
    try {
      const landmarks = await this.deps.repository.listActive();
      if (!landmarks.length) return null;
      return this.atLandmark(landmarks[pickIndex(landmarks.length, this.random)], 'random_location');
    } catch (error) {
      console.warn(`[location] landmark store unavailable: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private atLandmark(landmark: Landmark, source: LocationSource): ResolvedPosition {
    return {
      lat: landmark.lat,
      lng: landmark.lng,
      timestamp: this.now().toISOString(),
      accuracy: null,
      battery: null,
      source,
      landmarkName: landmark.name,
      destination: null,
    };
  }
}
