import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import {
  defaultRadiusMeters,
  normalizeLandmarkType,
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
import { withTimeout } from '@/lib/utils/withTimeout';

const LANDMARK_COLUMNS =
  'id, name, landmark_type, latitude, longitude, radius_meters, icon, description, properties, active';

const idSchema = z.union([z.string(), z.number()]).transform(String);
const propertiesSchema = z.record(z.unknown()).nullable().catch(null).transform((value) => value ?? {});
const positionSchema = z.array(z.number()).min(2);

const landmarkRowSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  landmark_type: z.string().nullable(),
  latitude: z.number().finite(),
  longitude: z.number().finite(),
  radius_meters: z.number().finite().nullable().catch(null),
  icon: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  properties: propertiesSchema,
  active: z.boolean().nullable().catch(true),
});

const nearbyRowSchema = landmarkRowSchema.extend({
  distance_m: z.number().finite(),
});

const streetRowSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  street_type: z.enum(['radial', 'arc']),
  width: z.number().positive().catch(10),
  coordinates: z.array(positionSchema).min(1),
  active: z.boolean().nullable().catch(true),
});

const boundaryRowSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  boundary_type: z.enum(['fence', 'city_block', 'plaza', 'other']).catch('other'),
  rings: z.array(z.array(positionSchema)),
  description: z.string().nullable().optional(),
  properties: propertiesSchema,
  active: z.boolean().nullable().catch(true),
});

type LandmarkRow = z.infer<typeof landmarkRowSchema>;

const toLandmark = (row: LandmarkRow): Landmark => {
  const type = normalizeLandmarkType(row.landmark_type);
  return {
    id: row.id,
    name: row.name,
    type,
    lat: row.latitude,
    lng: row.longitude,
    radiusMeters: row.radius_meters ?? defaultRadiusMeters(type),
    icon: row.icon ?? null,
    description: row.description ?? null,
    properties: row.properties,
    active: row.active ?? true,
  };
};

const parseRows = <T>(rows: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>, table: string): T[] => {
  if (!Array.isArray(rows)) return [];
  const parsed: T[] = [];
  let skipped = 0;
  for (const row of rows) {
    const result = schema.safeParse(row);
    if (result.success) parsed.push(result.data);
    else skipped += 1;
  }
  if (skipped) console.warn(`[landmarks] skipped ${skipped} malformed ${table} rows`);
  return parsed;
};

/** Postgres-backed store; `landmarks_within` is present only where PostGIS is installed. */
export class SupabaseLandmarkRepository implements LandmarkRepository {
  readonly kind = 'supabase';

  constructor(
    private readonly client: SupabaseClient,
    private readonly timeoutMs: number,
  ) {}

  async listActive(types?: readonly LandmarkType[]): Promise<Landmark[]> {
    let query = this.client.from('landmarks').select(LANDMARK_COLUMNS).eq('active', true);
    if (types) query = query.in('landmark_type', [...types]);
    const { data, error } = await withTimeout(query.order('id', { ascending: true }), this.timeoutMs, 'landmarks list');
    if (error) throw error;
    return parseRows(data, landmarkRowSchema, 'landmarks').map(toLandmark);
  }

  async findWithin(query: WithinQuery): Promise<NearbyLandmark[]> {
    const { data, error } = await withTimeout(
      this.client.rpc('landmarks_within', {
        p_lat: query.lat,
        p_lng: query.lng,
        p_radius_m: query.radiusMeters,
        p_types: [...query.types],
      }),
      this.timeoutMs,
      'landmarks_within',
    );
    if (error) throw error;
    return parseRows(data, nearbyRowSchema, 'landmarks_within').map((row) => {
      const landmark = toLandmark(row);
      return {
        id: landmark.id,
        name: landmark.name,
        type: landmark.type,
        lat: landmark.lat,
        lng: landmark.lng,
        distanceMeters: row.distance_m,
        description: landmark.description ?? null,
      };
    });
  }

  async supportsSpatialIndex(): Promise<boolean> {
    try {
      const { error } = await withTimeout(
        this.client.rpc('landmarks_within', { p_lat: 0, p_lng: 0, p_radius_m: 0, p_types: [] }),
        this.timeoutMs,
        'landmarks_within check',
      );
      return !error;
    } catch (error) {
      console.warn('[landmarks] spatial index check failed', error);
      return false;
    }
  }

  async findActiveBoundary(type: BoundaryType): Promise<Boundary | null> {
    const { data, error } = await withTimeout(
      this.client
        .from('boundaries')
        .select('id, name, boundary_type, rings, description, properties, active')
        .eq('boundary_type', type)
        .eq('active', true)
        .order('id', { ascending: true })
        .limit(1),
      this.timeoutMs,
      'boundaries',
    );
    if (error) throw error;
    const [row] = parseRows(data, boundaryRowSchema, 'boundaries');
    if (!row) return null;
    return {
      id: row.id,
      name: row.name,
      type: row.boundary_type,
      rings: row.rings,
      description: row.description ?? null,
      properties: row.properties,
      active: row.active ?? true,
    };
  }

  async listStreets(): Promise<StreetLine[]> {
    const { data, error } = await withTimeout(
      this.client
        .from('streets')
        .select('id, name, street_type, width, coordinates, active')
        .eq('active', true)
        .order('id', { ascending: true }),
      this.timeoutMs,
      'streets',
    );
    if (error) throw error;
    return parseRows(data, streetRowSchema, 'streets').map((row) => ({
      id: row.id,
      name: row.name,
      type: row.street_type,
      width: row.width,
      coordinates: row.coordinates,
      active: row.active ?? true,
    }));
  }

  async upsertLandmarks(rows: readonly LandmarkInput[]): Promise<number> {
    if (!rows.length) return 0;
    const payload = rows.map((row) => ({
      name: row.name,
      landmark_type: row.type,
      latitude: row.lat,
      longitude: row.lng,
      radius_meters: row.radiusMeters,
      icon: row.icon ?? null,
      description: row.description ?? null,
      properties: row.properties,
      active: row.active,
    }));
    return this.upsert('landmarks', payload, 'name,landmark_type');
  }

  async upsertStreets(rows: readonly StreetInput[]): Promise<number> {
    if (!rows.length) return 0;
    const payload = rows.map((row) => ({
      name: row.name,
      street_type: row.type,
      width: row.width,
      coordinates: row.coordinates,
      properties: row.properties,
      active: row.active,
    }));
    return this.upsert('streets', payload, 'name,street_type');
  }

  async upsertBoundaries(rows: readonly BoundaryInput[]): Promise<number> {
    if (!rows.length) return 0;
    const payload = rows.map((row) => ({
      name: row.name,
      boundary_type: row.type,
      rings: row.rings,
      description: row.description,
      properties: row.properties,
      active: row.active,
    }));
    return this.upsert('boundaries', payload, 'name,boundary_type');
  }

  async ping(): Promise<void> {
    const { error } = await withTimeout(
      this.client.from('landmarks').select('id', { head: true, count: 'exact' }).limit(1),
      this.timeoutMs,
      'landmarks ping',
    );
    if (error) throw error;
  }

  private async upsert(table: string, payload: Record<string, unknown>[], onConflict: string): Promise<number> {
    const { data, error } = await withTimeout(
      this.client.from(table).upsert(payload, { onConflict }).select('id'),
      this.timeoutMs,
      `${table} upsert`,
    );
    if (error) throw error;
    return Array.isArray(data) ? data.length : payload.length;
  }
}
