import { haversineMeters, roundCoordinate, type Landmark } from '@playa/shared';

import type { EphemeralStore } from '@/lib/cache/ephemeralStore';
import { DEFAULT_LANDMARKS } from '@/lib/landmarks/defaults';
import type { LandmarkRepository } from '@/lib/landmarks/types';
import { pickIndex } from '@/lib/location/resolver';
import {
  SIMULATED_POSITION_KEY,
  SIMULATION_HISTORY_KEY,
  routeHistorySchema,
  simulatedPositionSchema,
  type RoutePoint,
  type SimulatedDestination,
  type SimulatedPosition,
} from '@/lib/location/schemas';
import { getErrorMessage } from '@/lib/utils/getErrorMessage';

export interface SimulationSettings {
  /** Step length per tick, in degrees. */
  speedDegrees: number;
  /** Arrival when both axes are within this many degrees. */
  arrivalThresholdDegrees: number;
  /** Random sideways drift, as a fraction of the step. */
  wanderFactor: number;
  minDestinationMeters: number;
  historyLimit: number;
}

export const DEFAULT_SIMULATION_SETTINGS: SimulationSettings = {
  speedDegrees: 0.0001,
  arrivalThresholdDegrees: 0.0005,
  wanderFactor: 0.2,
  minDestinationMeters: 160,
  historyLimit: 100,
};

export interface SimulationDeps {
  store: EphemeralStore;
  repository: LandmarkRepository;
  random?: () => number;
  now?: () => Date;
  settings?: Partial<SimulationSettings>;
}

export interface SimulationStep {
  position: SimulatedPosition;
  arrived: boolean;
  historyLength: number;
}

const toDestination = (landmark: Landmark): SimulatedDestination => ({
  name: landmark.name,
  lat: landmark.lat,
  lng: landmark.lng,
});

const loadDestinations = async (repository: LandmarkRepository): Promise<SimulatedDestination[]> => {
  try {
    const landmarks = await repository.listActive();
    const candidates = landmarks.filter((landmark) => landmark.type !== 'toilet');
    if (candidates.length) return candidates.map(toDestination);
  } catch (error) {
    console.warn(`[simulation] landmark store unavailable: ${getErrorMessage(error)}`);
  }
  return DEFAULT_LANDMARKS.map(toDestination);
};

/** Random destination at least `minMeters` away; the farthest one when none qualify. */
export const pickDestination = (
  from: { lat: number; lng: number },
  destinations: readonly SimulatedDestination[],
  minMeters: number,
  random: () => number,
): SimulatedDestination | null => {
  if (!destinations.length) return null;
  const distances = destinations.map((destination) => haversineMeters(from.lat, from.lng, destination.lat, destination.lng));
  const available = destinations.filter((_, index) => distances[index] >= minMeters);
  if (available.length) return available[pickIndex(available.length, random)];

  let farthest = 0;
  distances.forEach((distance, index) => {
    if (distance > distances[farthest]) farthest = index;
  });
  return destinations[farthest];
};

const readHistory = async (store: EphemeralStore): Promise<RoutePoint[]> => {
  const parsed = routeHistorySchema.safeParse(await store.get(SIMULATION_HISTORY_KEY));
  return parsed.success ? parsed.data : [];
};

/** Moves the simulated installation one step and persists position and route history. */
export const advanceSimulation = async (deps: SimulationDeps): Promise<SimulationStep | null> => {
  const random = deps.random ?? Math.random;
  const now = deps.now ?? (() => new Date());
  const settings = { ...DEFAULT_SIMULATION_SETTINGS, ...deps.settings };

  const destinations = await loadDestinations(deps.repository);
  if (!destinations.length) return null;

  const stored = simulatedPositionSchema.safeParse(await deps.store.get(SIMULATED_POSITION_KEY));
  const start = stored.success ? stored.data : null;
  let current: { lat: number; lng: number };
  if (start) {
    current = { lat: start.lat, lng: start.lng };
  } else {
    const origin = destinations[pickIndex(destinations.length, random)];
    console.info(`[simulation] starting at ${origin.name}`);
    current = { lat: origin.lat, lng: origin.lng };
  }

  let destination =
    start?.destination ?? pickDestination(current, destinations, settings.minDestinationMeters, random);
  if (!destination) return null;

  const latDiff = destination.lat - current.lat;
  const lngDiff = destination.lng - current.lng;
  const distance = Math.sqrt(latDiff * latDiff + lngDiff * lngDiff);
  if (distance > 0) {
    const wander = () => (random() * 2 - 1) * settings.wanderFactor * settings.speedDegrees;
    current.lat += (latDiff / distance) * settings.speedDegrees + wander();
    current.lng += (lngDiff / distance) * settings.speedDegrees + wander();
  }

  const timestamp = now().toISOString();
  const history = [
    ...(await readHistory(deps.store)),
    { lat: current.lat, lng: current.lng, timestamp, destination: destination.name },
  ].slice(-settings.historyLimit);

  const arrived =
    Math.abs(destination.lat - current.lat) < settings.arrivalThresholdDegrees &&
    Math.abs(destination.lng - current.lng) < settings.arrivalThresholdDegrees;
  if (arrived) {
    console.info(`[simulation] arrived at ${destination.name}`);
    destination = pickDestination(current, destinations, settings.minDestinationMeters, random) ?? destination;
  }

  const position: SimulatedPosition = {
    lat: roundCoordinate(current.lat),
    lng: roundCoordinate(current.lng),
    timestamp,
    destination,
  };
  await deps.store.set(SIMULATED_POSITION_KEY, position);
  await deps.store.set(SIMULATION_HISTORY_KEY, history);

  return { position, arrived, historyLength: history.length };
};
