import { fetchDeviceTracker } from '../homeAssistant/client';
import { TimeoutError } from '../utils/withTimeout';

const options = { url: 'http://ha.local:8123', token: 'test-token', timeoutMs: 1000 };

const jsonResponse = (status: number, body: unknown) => ({
  ok: status >= 200 && status < 300,
  status,
  json: async () => body,
});

describe('fetchDeviceTracker', () => {
  it('reads coordinates and optional attributes', async () => {
    const fetchImpl = jest.fn().mockResolvedValue(
      jsonResponse(200, {
        entity_id: 'device_tracker.art_car',
        state: 'not_home',
        last_updated: '2025-08-28T10:00:00+00:00',
        attributes: { latitude: 40.78, longitude: -119.2, gps_accuracy: 5, battery_level: '87' },
      }),
    );

    const reading = await fetchDeviceTracker('device_tracker.art_car', { ...options, fetchImpl });

    expect(reading).toEqual({
      lat: 40.78,
      lng: -119.2,
      accuracy: 5,
      battery: 87,
      timestamp: '2025-08-28T10:00:00+00:00',
    });
    expect(fetchImpl).toHaveBeenCalledWith(
      'http://ha.local:8123/api/states/device_tracker.art_car',
      expect.objectContaining({
        headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
      }),
    );
  });

  it('treats missing optional attributes as null', async () => {
    const fetchImpl = jest.fn().mockResolvedValue(
      jsonResponse(200, {
        last_updated: '2025-08-28T10:00:00+00:00',
        attributes: { latitude: 40.78, longitude: -119.2, battery_level: null },
      }),
    );

    const reading = await fetchDeviceTracker('device_tracker.art_car', { ...options, fetchImpl });

    expect(reading.accuracy).toBeNull();
    expect(reading.battery).toBeNull();
  });

  it('rejects non-2xx responses', async () => {
    const fetchImpl = jest.fn().mockResolvedValue(jsonResponse(404, {}));

    await expect(fetchDeviceTracker('device_tracker.art_car', { ...options, fetchImpl })).rejects.toThrow(
      'Home Assistant responded 404 for device_tracker.art_car',
    );
  });

  it('rejects entities without coordinates', async () => {
    const fetchImpl = jest.fn().mockResolvedValue(jsonResponse(200, { state: 'unknown', attributes: {} }));

    await expect(fetchDeviceTracker('device_tracker.art_car', { ...options, fetchImpl })).rejects.toThrow(
      'Home Assistant entity device_tracker.art_car has no GPS coordinates',
    );
  });

  it('aborts slow requests with a TimeoutError', async () => {
    const fetchImpl = jest.fn(
      (_url: unknown, init?: RequestInit) =>
        new Promise<never>((_, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );

    await expect(
      fetchDeviceTracker('device_tracker.art_car', { ...options, timeoutMs: 10, fetchImpl }),
    ).rejects.toBeInstanceOf(TimeoutError);
  });

  it('bounds a response whose body never arrives', async () => {
    let signal: AbortSignal | undefined;
    const fetchImpl = jest.fn().mockImplementation(async (_url: unknown, init?: RequestInit) => {
      signal = init?.signal ?? undefined;
      return { ok: true, status: 200, json: () => new Promise<never>(() => undefined) };
    });

    await expect(
      fetchDeviceTracker('device_tracker.art_car', { ...options, timeoutMs: 10, fetchImpl }),
    ).rejects.toThrow('home assistant device_tracker.art_car timed out after 10ms');
    expect(signal?.aborted).toBe(true);
  });
});
