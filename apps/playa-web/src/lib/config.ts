import { z } from 'zod';

import { getCityPlan, type CityPlan } from '@playa/shared';

export type SpatialIndexMode = 'auto' | 'on' | 'off';
export type EphemeralStoreKind = 'memory' | 'supabase';

export interface LocationConfig {
  supabase: { url: string; serviceKey: string } | null;
  homeAssistant: {
    url: string | null;
    token: string | null;
    entityId: string;
    timeoutMs: number;
  };
  landmarkStoreTimeoutMs: number;
  simulateMovement: boolean;
  cacheTtlMs: number;
  spatialIndex: SpatialIndexMode;
  ephemeralStore: EphemeralStoreKind;
  cityPlan: CityPlan;
  cronSecret: string | null;
}

export const DEFAULT_DEVICE_TRACKER_ENTITY = 'device_tracker.art_car';
export const DEFAULT_TIMEOUT_MS = 3_000;
export const DEFAULT_CACHE_TTL_MS = 15_000;

type Env = Record<string, string | undefined>;

const pick = (env: Env, ...keys: string[]): string | null => {
  for (const key of keys) {
    const value = env[key]?.trim();
    if (value) return value;
  }
  return null;
};

const durationSchema = (fallback: number) =>
  z.coerce.number().int().positive().catch(fallback);

const flagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes(value))
  .catch(false);

const spatialIndexSchema = z.enum(['auto', 'on', 'off']).catch('auto');
const ephemeralStoreSchema = z.enum(['memory', 'supabase']).catch('memory');

export const loadLocationConfig = (env: Env = process.env): LocationConfig => {
  const supabaseUrl = pick(env, 'NEXT_PUBLIC_SUPABASE_URL');
  const serviceKey = pick(env, 'SUPABASE_SERVICE_KEY', 'SUPABASE_SERVICE_ROLE_KEY');
  const haUrl = pick(env, 'HOME_ASSISTANT_URL', 'HA_URL');

  return {
    supabase: supabaseUrl && serviceKey ? { url: supabaseUrl, serviceKey } : null,
    homeAssistant: {
      url: haUrl ? haUrl.replace(/\/+$/, '') : null,
      token: pick(env, 'HOME_ASSISTANT_TOKEN', 'HA_TOKEN'),
      entityId: pick(env, 'GPS_DEVICE_TRACKER_ENTITY') ?? DEFAULT_DEVICE_TRACKER_ENTITY,
      timeoutMs: durationSchema(DEFAULT_TIMEOUT_MS).parse(env.HOME_ASSISTANT_TIMEOUT_MS),
    },
    landmarkStoreTimeoutMs: durationSchema(DEFAULT_TIMEOUT_MS).parse(env.LANDMARK_STORE_TIMEOUT_MS),
    simulateMovement: flagSchema.parse(env.SIMULATE_MOVEMENT),
    cacheTtlMs: durationSchema(DEFAULT_CACHE_TTL_MS).parse(env.LOCATION_CACHE_TTL_MS),
    spatialIndex: spatialIndexSchema.parse(env.LANDMARK_SPATIAL_INDEX?.trim().toLowerCase()),
    ephemeralStore: ephemeralStoreSchema.parse(env.EPHEMERAL_STORE?.trim().toLowerCase()),
    cityPlan: getCityPlan(pick(env, 'CITY_PLAN') ?? undefined),
    cronSecret: pick(env, 'CRON_SECRET'),
  };
};
