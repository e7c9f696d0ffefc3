import { z } from 'zod';

import {
  closeRing,
  defaultRadiusMeters,
  isValidCoordinate,
  isValidRing,
  normalizeLandmarkType,
  polygonCentroid,
  type CityPlan,
  type Coordinates,
  type LandmarkType,
  type Position,
} from '@playa/shared';

import type { BoundaryInput, LandmarkInput, LandmarkRepository, StreetInput } from '@/lib/landmarks/types';

export const IMPORT_KINDS = ['landmarks', 'toilets', 'plazas', 'cpns', 'streets', 'city_blocks'] as const;
export type ImportKind = (typeof IMPORT_KINDS)[number];

export interface ImportStats {
  kind: ImportKind | 'fence';
  total: number;
  imported: number;
  skipped: number;
}

const positionSchema = z.array(z.number().finite()).min(2);

const geometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Point'), coordinates: positionSchema }),
  z.object({ type: z.literal('LineString'), coordinates: z.array(positionSchema).min(2) }),
  z.object({ type: z.literal('MultiLineString'), coordinates: z.array(z.array(positionSchema).min(2)).min(1) }),
  z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(positionSchema)).min(1) }),
  z.object({
    type: z.literal('MultiPolygon'),
    coordinates: z.array(z.array(z.array(positionSchema)).min(1)).min(1),
  }),
]);

const featureSchema = z.object({
  type: z.literal('Feature'),
  geometry: geometrySchema,
  properties: z.record(z.unknown()).nullable().optional(),
});

const collectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(z.unknown()),
});

type Geometry = z.infer<typeof geometrySchema>;
type Properties = Record<string, unknown>;

const readString = (properties: Properties, ...keys: string[]): string | null => {
  for (const key of keys) {
    const value = properties[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return null;
};

const readNumber = (properties: Properties, key: string): number | null => {
  const value = properties[key];
  const numeric = typeof value === 'string' && value.trim() ? Number(value) : value;
  return typeof numeric === 'number' && Number.isFinite(numeric) ? numeric : null;
};

const toCoordinates = (position: Position): Coordinates | null =>
  isValidCoordinate(position[1], position[0]) ? { lat: position[1], lng: position[0] } : null;

const outerRing = (geometry: Geometry): Position[] | null => {
  if (geometry.type === 'Polygon') return geometry.coordinates[0] ?? null;
  if (geometry.type === 'MultiPolygon') return geometry.coordinates[0]?.[0] ?? null;
  return null;
};

/** Point geometries as-is; polygons collapse to their vertex centroid. */
const representativePoint = (geometry: Geometry): Coordinates | null => {
  if (geometry.type === 'Point') return toCoordinates(geometry.coordinates);
  const ring = outerRing(geometry);
  if (!ring) return null;
  const centroid = polygonCentroid(ring);
  return centroid && isValidCoordinate(centroid.lat, centroid.lng) ? centroid : null;
};

const landmarkRow = (
  name: string,
  type: LandmarkType,
  point: Coordinates,
  properties: Properties,
): LandmarkInput => ({
  name,
  type,
  lat: point.lat,
  lng: point.lng,
  radiusMeters: readNumber(properties, 'radius') ?? defaultRadiusMeters(type),
  icon: readString(properties, 'icon'),
  description: readString(properties, 'description'),
  properties,
  active: true,
});

const RADIAL_NAME = /^\d{1,2}:\d{2}$/;

type FeatureMapper = {
  landmarks?: (geometry: Geometry, properties: Properties, position: number) => LandmarkInput | null;
  streets?: (geometry: Geometry, properties: Properties) => StreetInput | null;
  boundaries?: (geometry: Geometry, properties: Properties, position: number) => BoundaryInput | null;
};

const MAPPERS: Record<ImportKind, FeatureMapper> = {
  landmarks: {
    landmarks: (geometry, properties) => {
      const name = readString(properties, 'name', 'Name', 'title');
      const point = representativePoint(geometry);
      if (!name || !point) return null;
      const type = normalizeLandmarkType(readString(properties, 'type', 'category', 'landmark_type'));
      return landmarkRow(name, type, point, properties);
    },
  },
  toilets: {
    landmarks: (geometry, properties, position) => {
      const point = representativePoint(geometry);
      if (!point) return null;
      return landmarkRow(`Toilet ${position + 1}`, 'toilet', point, properties);
    },
  },
  plazas: {
    landmarks: (geometry, properties) => {
      const name = readString(properties, 'name', 'Name');
      const point = representativePoint(geometry);
      if (!name || !point) return null;
      return landmarkRow(name, 'plaza', point, properties);
    },
  },
  cpns: {
    landmarks: (geometry, properties) => {
      const name = readString(properties, 'name', 'Name');
      const point = representativePoint(geometry);
      if (!name || !point) return null;
      return landmarkRow(name, 'cpn', point, properties);
    },
  },
  streets: {
    streets: (geometry, properties) => {
      const name = readString(properties, 'name', 'Name');
      if (!name) return null;
      let line: Position[];
      if (geometry.type === 'LineString') line = geometry.coordinates;
      else if (geometry.type === 'MultiLineString') line = geometry.coordinates.flat();
      else return null;
      if (!line.every((position) => toCoordinates(position))) return null;
      const declared = readString(properties, 'type', 'street_type');
      const type = declared === 'radial' || declared === 'arc' ? declared : RADIAL_NAME.test(name) ? 'radial' : 'arc';
      const width = readNumber(properties, 'width');
      return {
        name,
        type,
        width: width && width > 0 ? width : 10,
        coordinates: line,
        properties,
        active: true,
      };
    },
  },
  city_blocks: {
    boundaries: (geometry, properties, position) => {
      const ring = outerRing(geometry);
      if (!ring) return null;
      const closed = closeRing(ring);
      if (!isValidRing(closed)) return null;
      return {
        name: readString(properties, 'name', 'Name') ?? `Block ${position + 1}`,
        type: 'city_block',
        rings: [closed],
        description: readString(properties, 'description'),
        properties,
        active: true,
      };
    },
  },
};

// One upsert statement cannot touch the same (name, type) twice; the later feature wins.
const uniqueByNameAndType = <T extends { name: string; type: string }>(rows: T[]): T[] => {
  const byKey = new Map<string, T>();
  for (const row of rows) byKey.set(`${row.type}\u0000${row.name}`, row);
  return [...byKey.values()];
};

/**
 * Imports one GeoJSON FeatureCollection. Features that fail validation are skipped and
 * counted; repository errors propagate.
 */
export const importGeoJson = async (
  repository: LandmarkRepository,
  kind: ImportKind,
  payload: unknown,
): Promise<ImportStats> => {
  const collection = collectionSchema.safeParse(payload);
  if (!collection.success) {
    throw new Error('Expected a GeoJSON FeatureCollection');
  }

  const mapper = MAPPERS[kind];
  const landmarks: LandmarkInput[] = [];
  const streets: StreetInput[] = [];
  const boundaries: BoundaryInput[] = [];
  let skipped = 0;

  collection.data.features.forEach((raw, position) => {
    const feature = featureSchema.safeParse(raw);
    if (!feature.success) {
      skipped += 1;
      return;
    }
    const { geometry } = feature.data;
    const properties = feature.data.properties ?? {};
    const landmark = mapper.landmarks?.(geometry, properties, position) ?? null;
    const street = mapper.streets?.(geometry, properties) ?? null;
    const boundary = mapper.boundaries?.(geometry, properties, position) ?? null;
    if (landmark) landmarks.push(landmark);
    else if (street) streets.push(street);
    else if (boundary) boundaries.push(boundary);
    else skipped += 1;
  });

  const imported =
    (await repository.upsertLandmarks(uniqueByNameAndType(landmarks))) +
    (await repository.upsertStreets(uniqueByNameAndType(streets))) +
    (await repository.upsertBoundaries(uniqueByNameAndType(boundaries)));

  if (skipped) console.warn(`[import] ${kind}: skipped ${skipped} malformed features`);
  console.info(`[import] ${kind}: imported ${imported} of ${collection.data.features.length} features`);
  return { kind, total: collection.data.features.length, imported, skipped };
};

export const seedPerimeterFence = async (repository: LandmarkRepository, city: CityPlan): Promise<ImportStats> => {
  const ring = closeRing(city.perimeter.ring);
  if (!isValidRing(ring)) {
    throw new Error(`City plan ${city.slug} has an invalid perimeter ring`);
  }
  const imported = await repository.upsertBoundaries([
    {
      name: city.perimeter.name,
      type: 'fence',
      rings: [ring],
      description: city.perimeter.description,
      properties: { cityPlan: city.slug },
      active: true,
    },
  ]);
  console.info(`[import] fence: seeded ${city.perimeter.name} for ${city.slug}`);
  return { kind: 'fence', total: 1, imported, skipped: 0 };
};

export const isImportKind = (value: unknown): value is ImportKind =>
  typeof value === 'string' && IMPORT_KINDS.some((kind) => kind === value);
