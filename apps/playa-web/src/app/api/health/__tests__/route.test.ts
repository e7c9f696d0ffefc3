jest.mock('next/server', () => ({
  NextResponse: {
    json: (body: unknown, init?: ResponseInit) => ({ body, init }),
  },
}));

const getLocationService = jest.fn();

jest.mock('@/lib/location/service', () => ({
  getLocationService: (...args: unknown[]) => getLocationService(...args),
}));

import { GET } from '../route';

type JsonResponse = { body: unknown; init?: ResponseInit };

describe('GET /api/health', () => {
  const health = jest.fn();

  beforeEach(() => {
    health.mockReset();
    getLocationService.mockReturnValue({ health });
  });

  it('responds 200 when the landmark store is reachable', async () => {
    const report = {
      ok: true,
      store: { kind: 'memory', reachable: true },
      ephemeralStore: 'memory',
      spatialIndex: 'indexed',
      simulation: false,
      cityPlan: 'brc-2025',
    };
    health.mockResolvedValue(report);

    const response = (await GET()) as unknown as JsonResponse;

    expect(response.body).toEqual(report);
    expect(response.init).toEqual({ status: 200 });
  });

  it('responds 503 when the landmark store is unreachable', async () => {
    health.mockResolvedValue({
      ok: false,
      store: { kind: 'supabase', reachable: false, error: 'timeout' },
      ephemeralStore: 'supabase',
      spatialIndex: null,
      simulation: false,
      cityPlan: 'brc-2025',
    });

    const response = (await GET()) as unknown as JsonResponse;

    expect(response.init).toEqual({ status: 503 });
  });
});
