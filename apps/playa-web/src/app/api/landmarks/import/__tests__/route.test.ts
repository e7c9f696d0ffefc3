import { blackRockCity2025 } from '@playa/shared';

import { MemoryLandmarkRepository } from '@/lib/landmarks/memoryRepository';

jest.mock('next/server', () => ({
  NextResponse: {
    json: (body: unknown, init?: ResponseInit) => ({ body, init }),
  },
}));

const getLocationService = jest.fn();

jest.mock('@/lib/location/service', () => ({
  getLocationService: (...args: unknown[]) => getLocationService(...args),
}));

import { POST } from '../route';

type JsonResponse = { body: unknown; init?: ResponseInit };

const importRequest = (kind: string, body: string, secret = 'test-secret') =>
  new Request(`http://localhost/api/landmarks/import?kind=${kind}`, {
    method: 'POST',
    headers: { authorization: `Bearer ${secret}` },
    body,
  });

describe('POST /api/landmarks/import', () => {
  let repository: MemoryLandmarkRepository;
  let infoSpy: jest.SpyInstance;

  beforeEach(() => {
    repository = new MemoryLandmarkRepository();
    getLocationService.mockReturnValue({
      config: { cronSecret: 'test-secret', cityPlan: blackRockCity2025 },
      repository,
    });
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    infoSpy.mockRestore();
  });

  it('rejects requests without the cron secret', async () => {
    const response = (await POST(importRequest('landmarks', '{}', 'wrong'))) as unknown as JsonResponse;

    expect(response.body).toEqual({ error: 'Unauthorized' });
    expect(response.init).toEqual({ status: 401 });
  });

  it('rejects unknown import kinds', async () => {
    const response = (await POST(importRequest('bogus', '{}'))) as unknown as JsonResponse;

    expect(response.body).toEqual({ error: 'Unknown import kind: bogus' });
    expect(response.init).toEqual({ status: 400 });
  });

  it('rejects a body that is not JSON', async () => {
    const response = (await POST(importRequest('landmarks', 'not json'))) as unknown as JsonResponse;

    expect(response.body).toEqual({ error: 'Body must be GeoJSON' });
    expect(response.init).toEqual({ status: 400 });
  });

  it('imports a feature collection into the landmark store', async () => {
    const payload = {
      type: 'FeatureCollection',
      features: [
        {
          type: 'Feature',
          geometry: { type: 'Point', coordinates: [-119.2, 40.79] },
          properties: { name: 'Lighthouse', type: 'art' },
        },
      ],
    };

    const response = (await POST(importRequest('landmarks', JSON.stringify(payload)))) as unknown as JsonResponse;

    expect(response.body).toEqual({ kind: 'landmarks', total: 1, imported: 1, skipped: 0 });
    await expect(repository.listActive()).resolves.toMatchObject([{ name: 'Lighthouse', type: 'art' }]);
  });

  it('seeds the perimeter fence from the city plan', async () => {
    const response = (await POST(importRequest('fence', ''))) as unknown as JsonResponse;

    expect(response.body).toEqual({ kind: 'fence', total: 1, imported: 1, skipped: 0 });
    await expect(repository.findActiveBoundary('fence')).resolves.toMatchObject({ name: 'Trash Fence' });
  });
});
