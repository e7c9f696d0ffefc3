import { NextResponse } from 'next/server';

import { getLocationService } from '@/lib/location/service';
import { getErrorMessage } from '@/lib/utils/getErrorMessage';

export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    const history = await getLocationService().routeHistory();
    return NextResponse.json({ ...history, count: history.points.length });
  } catch (error) {
    console.error('[location] history failed', error);
    return NextResponse.json({ error: getErrorMessage(error) }, { status: 500 });
  }
}
