import { NextResponse } from 'next/server';

import type { NearbyLandmark } from '@playa/shared';

import { describeContext } from '@/lib/proximity/engine';
import { getLocationService } from '@/lib/location/service';
import { getErrorMessage } from '@/lib/utils/getErrorMessage';

export const dynamic = 'force-dynamic';
export const revalidate = 0;

const toEntry = (landmark: NearbyLandmark) => ({
  name: landmark.name,
  type: landmark.type,
  distanceMeters: Math.round(landmark.distanceMeters * 10) / 10,
  context: describeContext(landmark),
});

export async function GET() {
  try {
    const proximity = await getLocationService().currentProximity();
    return NextResponse.json({
      landmarks: proximity.landmarks.map(toEntry),
      toilets: proximity.toilets.map(toEntry),
      mapMode: proximity.mapMode,
      visualEffects: proximity.visualEffects,
      withinFence: proximity.withinFence,
    });
  } catch (error) {
    console.error('[proximity] lookup failed', error);
    return NextResponse.json({ error: getErrorMessage(error) }, { status: 500 });
  }
}
