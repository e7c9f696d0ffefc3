import { NextResponse } from 'next/server';

import { getLocationService } from '@/lib/location/service';
import { getErrorMessage } from '@/lib/utils/getErrorMessage';

export const dynamic = 'force-dynamic';
export const revalidate = 0;

export async function GET() {
  try {
    const sample = await getLocationService().currentLocation();
    if (!sample) {
      return NextResponse.json({ error: 'Location unavailable' }, { status: 503 });
    }
    return NextResponse.json(
      {
        lat: sample.lat,
        lng: sample.lng,
        timestamp: sample.timestamp,
        accuracy: sample.accuracy,
        battery: sample.battery,
        address: sample.address,
        section: sample.section,
        distanceFromCenterMiles: sample.distanceFromCenterMiles,
        source: sample.source,
        withinFence: sample.withinFence,
        landmarkName: sample.landmarkName,
        context: sample.context,
        nearestStreet: sample.nearestStreet,
        destination: sample.destination,
      },
      { headers: { 'Cache-Control': 'no-store' } },
    );
  } catch (error) {
    console.error('[location] resolution failed', error);
    return NextResponse.json({ error: getErrorMessage(error) }, { status: 500 });
  }
}
