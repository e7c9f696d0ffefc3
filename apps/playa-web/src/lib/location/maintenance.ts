import { timingSafeEqual } from 'crypto';

import { NextResponse } from 'next/server';

import { getLocationService, type LocationService } from '@/lib/location/service';

export type MaintenanceAccess =
  | { granted: true; service: LocationService }
  | { granted: false; response: Response };

const BEARER = /^bearer\s+(\S+)$/i;

const bearerToken = (request: Request): string | null => {
  const match = BEARER.exec(request.headers.get('authorization')?.trim() ?? '');
  return match ? match[1] : null;
};

const matchesSecret = (token: string, secret: string): boolean => {
  const given = Buffer.from(token);
  const expected = Buffer.from(secret);
  return given.length === expected.length && timingSafeEqual(given, expected);
};

const deny = (status: number, error: string): MaintenanceAccess => ({
  granted: false,
  response: NextResponse.json({ error }, { status }),
});

/** Import and simulation routes take the `CRON_SECRET` bearer configured on the location service. */
export const authorizeMaintenance = (request: Request): MaintenanceAccess => {
  const service = getLocationService();
  const { cronSecret } = service.config;
  if (!cronSecret) return deny(500, 'Server misconfigured: CRON_SECRET is not set.');

  const token = bearerToken(request);
  if (!token || !matchesSecret(token, cronSecret)) return deny(401, 'Unauthorized');
  return { granted: true, service };
};
