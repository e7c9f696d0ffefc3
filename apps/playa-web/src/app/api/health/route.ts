import { NextResponse } from 'next/server';

import { getLocationService } from '@/lib/location/service';

export const dynamic = 'force-dynamic';
export const revalidate = 0;

export async function GET() {
  const report = await getLocationService().health();
  return NextResponse.json(report, { status: report.ok ? 200 : 503 });
}
