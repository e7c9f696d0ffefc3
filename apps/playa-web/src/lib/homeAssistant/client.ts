import { z } from 'zod';

import { TimeoutError, withTimeout } from '@/lib/utils/withTimeout';

const optionalNumber = z.unknown().transform((value) => {
  const numeric = typeof value === 'string' && value.trim() ? Number(value) : value;
  return typeof numeric === 'number' && Number.isFinite(numeric) ? numeric : null;
});

const deviceTrackerSchema = z.object({
  entity_id: z.string().optional(),
  state: z.string().optional(),
  last_updated: z.string().optional(),
  attributes: z
    .object({
      latitude: z.number().finite(),
      longitude: z.number().finite(),
      gps_accuracy: optionalNumber,
      battery_level: optionalNumber,
    })
    .passthrough(),
});

export interface DeviceTrackerReading {
  lat: number;
  lng: number;
  accuracy: number | null;
  battery: number | null;
  timestamp: string;
}

export interface HomeAssistantOptions {
  url: string;
  token: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/** Reads a device-tracker entity. Any failure surfaces as a thrown `Error`. */
export const fetchDeviceTracker = async (
  entityId: string,
  options: HomeAssistantOptions,
): Promise<DeviceTrackerReading> => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();

  const readState = async (): Promise<unknown> => {
    const response = await fetchImpl(`${options.url}/api/states/${encodeURIComponent(entityId)}`, {
      headers: {
        Authorization: `Bearer ${options.token}`,
        'Content-Type': 'application/json',
      },
      signal: controller.signal,
      cache: 'no-store',
    });
    if (!response.ok) {
      throw new Error(`Home Assistant responded ${response.status} for ${entityId}`);
    }
    const body: unknown = await response.json();
    return body;
  };

  // The bound covers the body as well as the headers.
  let payload: unknown;
  try {
    payload = await withTimeout(readState(), options.timeoutMs, `home assistant ${entityId}`);
  } catch (error) {
    if (error instanceof TimeoutError) controller.abort();
    throw error;
  }

  const parsed = deviceTrackerSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Home Assistant entity ${entityId} has no GPS coordinates`);
  }

  const { attributes, last_updated: lastUpdated } = parsed.data;
  return {
    lat: attributes.latitude,
    lng: attributes.longitude,
    accuracy: attributes.gps_accuracy ?? null,
    battery: attributes.battery_level ?? null,
    timestamp: lastUpdated ?? new Date().toISOString(),
  };
};
