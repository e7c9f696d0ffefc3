import { z } from 'zod';

import { LANDMARK_TYPES } from '@playa/shared';

export const SIMULATED_POSITION_KEY = 'location:simulated';
export const SIMULATION_HISTORY_KEY = 'location:simulated:history';
export const LOCATION_SNAPSHOT_KEY = 'location:current';
export const proximityCacheKey = (geohash: string) => `proximity:${geohash}`;

const finite = z.number().finite();

export const destinationSchema = z.object({
  name: z.string(),
  lat: finite,
  lng: finite,
});

export const simulatedPositionSchema = z.object({
  lat: finite,
  lng: finite,
  timestamp: z.string(),
  destination: destinationSchema.nullable().default(null),
});

export const routePointSchema = z.object({
  lat: finite,
  lng: finite,
  timestamp: z.string(),
  destination: z.string().nullable().default(null),
});

export const routeHistorySchema = z.array(routePointSchema);

export const nearbyLandmarkSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.enum(LANDMARK_TYPES),
  lat: finite,
  lng: finite,
  distanceMeters: finite,
  description: z.string().nullable().optional(),
});

export const visualEffectSchema = z.object({
  type: z.enum(['aura', 'pulse', 'beacon', 'glow']),
  color: z.string(),
  intensity: z.enum(['soft', 'strong', 'steady', 'medium']),
  description: z.string(),
});

export const proximityReportSchema = z.object({
  landmarks: z.array(nearbyLandmarkSchema),
  toilets: z.array(nearbyLandmarkSchema),
  mapMode: z.enum(['normal', 'temple', 'man', 'emergency', 'service', 'landmark']),
  visualEffects: z.array(visualEffectSchema),
  context: z.string().nullable(),
});

export const locationSourceSchema = z.enum(['live', 'simulated', 'random_location', 'fallback']);

export const locationSampleSchema = z.object({
  lat: finite,
  lng: finite,
  timestamp: z.string(),
  accuracy: finite.nullable(),
  battery: finite.nullable(),
  source: locationSourceSchema,
  address: z.string(),
  radialStreet: z.string().nullable(),
  concentricStreet: z.string().nullable(),
  section: z.enum(['InTheCity', 'InnerPlaya', 'OuterPlaya', 'DeepPlaya', 'Unknown']),
  distanceFromCenterMeters: finite,
  distanceFromCenterMiles: finite,
  bearingFromCenter: finite,
  withinFence: z.boolean(),
  nearestStreet: z
    .object({ name: z.string(), type: z.enum(['radial', 'arc']), distanceMeters: finite })
    .nullable(),
  landmarkName: z.string().nullable(),
  context: z.string().nullable(),
  destination: destinationSchema.nullable(),
  nearbyLandmarks: z.array(nearbyLandmarkSchema),
  nearbyToilets: z.array(nearbyLandmarkSchema),
  mapMode: proximityReportSchema.shape.mapMode,
  visualEffects: z.array(visualEffectSchema),
});

export type SimulatedDestination = z.infer<typeof destinationSchema>;
export type SimulatedPosition = z.infer<typeof simulatedPositionSchema>;
export type RoutePoint = z.infer<typeof routePointSchema>;
export type LocationSource = z.infer<typeof locationSourceSchema>;
export type LocationSample = z.infer<typeof locationSampleSchema>;
