import { NextResponse } from 'next/server';

import { getLocationService } from '@/lib/location/service';
import { getErrorMessage } from '@/lib/utils/getErrorMessage';

export const dynamic = 'force-dynamic';

const IMMUTABLE_CACHE = 'public, max-age=31536000, immutable';

export async function GET() {
  try {
    const { landmarks, source } = await getLocationService().listLandmarks();
    const body = {
      landmarks: landmarks.map((landmark) => ({
        name: landmark.name,
        lat: landmark.lat,
        lng: landmark.lng,
        type: landmark.type,
        priority: landmark.priority,
        description: landmark.description ?? null,
      })),
      count: landmarks.length,
      source,
    };
    const headers: Record<string, string> =
      source === 'fallback' ? { 'Cache-Control': 'no-store' } : { 'Cache-Control': IMMUTABLE_CACHE };
    return NextResponse.json(body, { headers });
  } catch (error) {
    console.error('[landmarks] listing failed', error);
    return NextResponse.json({ error: getErrorMessage(error) }, { status: 500 });
  }
}
