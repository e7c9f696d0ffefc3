jest.mock('next/server', () => ({
  NextResponse: {
    json: (body: unknown, init?: ResponseInit) => ({ body, init }),
  },
}));

const getLocationService = jest.fn();
const advanceSimulation = jest.fn();

jest.mock('@/lib/location/service', () => ({
  getLocationService: (...args: unknown[]) => getLocationService(...args),
}));

jest.mock('@/lib/location/simulation', () => ({
  advanceSimulation: (...args: unknown[]) => advanceSimulation(...args),
}));

import { POST } from '../route';

type JsonResponse = { body: unknown; init?: ResponseInit };

const cronRequest = () =>
  new Request('http://localhost/api/cron/simulation', {
    method: 'POST',
    headers: { authorization: 'Bearer test-secret' },
  });

describe('POST /api/cron/simulation', () => {
  const store = { kind: 'memory' };
  const repository = { kind: 'memory' };

  const useConfig = (simulateMovement: boolean) =>
    getLocationService.mockReturnValue({ config: { cronSecret: 'test-secret', simulateMovement }, store, repository });

  beforeEach(() => {
    advanceSimulation.mockReset();
  });

  it('responds 500 when no cron secret is configured', async () => {
    getLocationService.mockReturnValue({ config: { cronSecret: null, simulateMovement: true }, store, repository });

    const response = (await POST(cronRequest())) as unknown as JsonResponse;

    expect(response.init).toEqual({ status: 500 });
    expect(advanceSimulation).not.toHaveBeenCalled();
  });

  it('skips when movement simulation is off', async () => {
    useConfig(false);

    const response = (await POST(cronRequest())) as unknown as JsonResponse;

    expect(response.body).toEqual({ skipped: true, reason: 'SIMULATE_MOVEMENT is off' });
    expect(advanceSimulation).not.toHaveBeenCalled();
  });

  it('advances the simulation one step', async () => {
    useConfig(true);
    const position = {
      lat: 40.787,
      lng: -119.2029,
      timestamp: '2025-08-28T12:00:00.000Z',
      destination: { name: 'The Temple', lat: 40.791815, lng: -119.196622 },
    };
    advanceSimulation.mockResolvedValue({ position, arrived: false, historyLength: 2 });

    const response = (await POST(cronRequest())) as unknown as JsonResponse;

    expect(advanceSimulation).toHaveBeenCalledWith({ store, repository });
    expect(response.body).toEqual({ skipped: false, position, arrived: false, historyLength: 2 });
  });

  it('responds 503 when there is nowhere to go', async () => {
    useConfig(true);
    advanceSimulation.mockResolvedValue(null);

    const response = (await POST(cronRequest())) as unknown as JsonResponse;

    expect(response.body).toEqual({ error: 'No destinations available' });
    expect(response.init).toEqual({ status: 503 });
  });
});
