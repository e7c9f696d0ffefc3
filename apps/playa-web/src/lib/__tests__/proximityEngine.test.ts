import { destinationPoint, type Landmark, type LandmarkType, type NearbyLandmark } from '@playa/shared';

import { MemoryLandmarkRepository } from '../landmarks/memoryRepository';
import type { LandmarkRepository } from '../landmarks/types';
import { ProximityEngine } from '../proximity/engine';
import {
  GeometricProximityQuery,
  IndexedProximityQuery,
  selectProximityQuery,
  type ProximityQuery,
} from '../proximity/strategies';

const origin = { lat: 40.78, lng: -119.21 };

const landmark = (
  id: string,
  name: string,
  type: LandmarkType,
  bearing: number,
  distanceMeters: number,
  radiusMeters: number,
  extra: Partial<Landmark> = {},
): Landmark => {
  const point = destinationPoint(origin, bearing, distanceMeters);
  return {
    id,
    name,
    type,
    lat: point.lat,
    lng: point.lng,
    radiusMeters,
    icon: null,
    description: null,
    properties: {},
    active: true,
    ...extra,
  };
};

const fixture = (): Landmark[] => [
  landmark('art-1', 'Sculpture', 'art', 90, 20, 10),
  landmark('sacred-1', 'Shrine', 'sacred', 0, 40, 15, { description: 'Quiet place' }),
  landmark('toilet-1', 'Toilet 1', 'toilet', 180, 10, 20),
  landmark('other-1', 'Far Thing', 'other', 90, 100, 30),
  landmark('medical-1', 'Rampart', 'medical', 270, 55, 30),
  landmark('art-2', 'Hidden', 'art', 0, 5, 30, { active: false }),
];

const fenceRing = [
  [-119.2327, 40.7834],
  [-119.2077, 40.7644],
  [-119.1762, 40.7766],
  [-119.1817, 40.8031],
  [-119.2166, 40.8074],
  [-119.2327, 40.7834],
];

const strategies: Array<[string, (repository: LandmarkRepository) => ProximityQuery]> = [
  ['indexed', (repository) => new IndexedProximityQuery(repository)],
  ['geometric', (repository) => new GeometricProximityQuery(repository)],
];

describe.each(strategies)('ProximityEngine with the %s strategy', (_name, build) => {
  const engineFor = (landmarks: Landmark[]) => {
    const repository = new MemoryLandmarkRepository({ landmarks });
    return new ProximityEngine(repository, build(repository));
  };

  it('finds a large-radius camp 100 m away', async () => {
    const centerCamp: Landmark = {
      id: 'center-camp',
      name: 'Center Camp',
      type: 'center',
      lat: 40.786958,
      lng: -119.202994,
      radiusMeters: 300,
      properties: {},
      active: true,
    };
    const point = destinationPoint(centerCamp, 0, 100);

    const report = await engineFor([centerCamp]).report(point.lat, point.lng);

    expect(report.landmarks).toHaveLength(1);
    expect(report.landmarks[0].type).toBe('center');
    expect(report.landmarks[0].distanceMeters).toBeCloseTo(100, 3);
    expect(report.mapMode).toBe('man');
    expect(report.visualEffects.map((effect) => effect.type)).toEqual(['pulse']);
  });

  it('applies per-type radii and sorts nearest first', async () => {
    const nearby = await engineFor(fixture()).nearby(origin.lat, origin.lng);

    expect(nearby.map((item) => item.id)).toEqual(['toilet-1', 'art-1', 'sacred-1', 'medical-1']);
  });

  it('reports toilets separately from landmarks', async () => {
    const report = await engineFor(fixture()).report(origin.lat, origin.lng);

    expect(report.landmarks.map((item) => item.name)).toEqual(['Sculpture', 'Shrine', 'Rampart']);
    expect(report.toilets.map((item) => item.name)).toEqual(['Toilet 1']);
    expect(report.mapMode).toBe('landmark');
    expect(report.visualEffects.map((effect) => effect.type)).toEqual(['aura', 'beacon']);
    expect(report.context).toBe('Near Sculpture');
  });

  it('keeps store order for equal distances', async () => {
    const twins = [
      landmark('b-twin', 'Twin B', 'art', 90, 10, 10),
      landmark('a-twin', 'Twin A', 'art', 90, 10, 10),
    ];

    const nearby = await engineFor(twins).nearby(origin.lat, origin.lng);

    expect(nearby.map((item) => item.id)).toEqual(['b-twin', 'a-twin']);
  });

  it('honours landmark radii beyond the index cell', async () => {
    const nearby = await engineFor([landmark('big', 'Big Camp', 'center', 90, 650, 700)]).nearby(
      origin.lat,
      origin.lng,
    );

    expect(nearby.map((item) => item.id)).toEqual(['big']);
  });

  it('returns nothing for invalid coordinates', async () => {
    await expect(engineFor(fixture()).nearby(Number.NaN, origin.lng)).resolves.toEqual([]);
  });
});

describe('ProximityEngine', () => {
  it('deduplicates landmarks returned by several radius groups', async () => {
    const shared: NearbyLandmark = {
      id: 'dup',
      name: 'Everywhere',
      type: 'art',
      lat: origin.lat,
      lng: origin.lng,
      distanceMeters: 3,
    };
    const query: ProximityQuery = {
      strategy: 'indexed',
      nearby: jest.fn(async () => [shared]),
    };
    const engine = new ProximityEngine(new MemoryLandmarkRepository(), query);

    const nearby = await engine.nearby(origin.lat, origin.lng);

    expect(query.nearby).toHaveBeenCalledTimes(5);
    expect(nearby).toEqual([shared]);
  });

  it('tests containment against the active fence', async () => {
    const repository = new MemoryLandmarkRepository({
      boundaries: [
        {
          id: 'fence',
          name: 'Trash Fence',
          type: 'fence',
          rings: fenceRing,
          description: null,
          properties: {},
          active: true,
        },
      ],
    });
    const engine = new ProximityEngine(repository, new GeometricProximityQuery(repository));

    await expect(engine.withinFence(40.7864, -119.2065)).resolves.toBe(true);
    await expect(engine.withinFence(40.6, -119.4)).resolves.toBe(false);
  });

  it('is never within a fence that does not exist', async () => {
    const repository = new MemoryLandmarkRepository();
    const engine = new ProximityEngine(repository, new GeometricProximityQuery(repository));

    await expect(engine.withinFence(40.7864, -119.2065)).resolves.toBe(false);
  });
});

describe('selectProximityQuery', () => {
  let infoSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    infoSpy.mockRestore();
  });

  it('honours explicit modes without probing', async () => {
    const repository = new MemoryLandmarkRepository();
    const indexCheck = jest.spyOn(repository, 'supportsSpatialIndex');

    await expect(selectProximityQuery(repository, 'on')).resolves.toBeInstanceOf(IndexedProximityQuery);
    await expect(selectProximityQuery(repository, 'off')).resolves.toBeInstanceOf(GeometricProximityQuery);
    expect(indexCheck).not.toHaveBeenCalled();
  });

  it('checks the store for the index in auto mode', async () => {
    const repository = new MemoryLandmarkRepository();
    jest.spyOn(repository, 'supportsSpatialIndex').mockResolvedValue(false);

    const query = await selectProximityQuery(repository, 'auto');

    expect(query.strategy).toBe('geometric');
    expect(infoSpy).toHaveBeenCalledWith('[proximity] spatial index unavailable on memory store');
  });
});
