import { NextResponse } from 'next/server';

import { authorizeMaintenance } from '@/lib/location/maintenance';
import { advanceSimulation } from '@/lib/location/simulation';
import { getErrorMessage } from '@/lib/utils/getErrorMessage';

export const dynamic = 'force-dynamic';
export const revalidate = 0;

export async function POST(request: Request) {
  const access = authorizeMaintenance(request);
  if (!access.granted) return access.response;
  const { service } = access;

  if (!service.config.simulateMovement) {
    return NextResponse.json({ skipped: true, reason: 'SIMULATE_MOVEMENT is off' });
  }

  try {
    const step = await advanceSimulation({ store: service.store, repository: service.repository });
    if (!step) {
      return NextResponse.json({ error: 'No destinations available' }, { status: 503 });
    }
    return NextResponse.json({ skipped: false, ...step });
  } catch (error) {
    console.error('[simulation] step failed', error);
    return NextResponse.json({ error: getErrorMessage(error) }, { status: 500 });
  }
}
