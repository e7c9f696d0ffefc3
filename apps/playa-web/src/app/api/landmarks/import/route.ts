import { NextResponse } from 'next/server';

import { importGeoJson, isImportKind, seedPerimeterFence } from '@/lib/landmarks/importer';
import { authorizeMaintenance } from '@/lib/location/maintenance';
import { getErrorMessage } from '@/lib/utils/getErrorMessage';

export const dynamic = 'force-dynamic';
export const revalidate = 0;

export async function POST(request: Request) {
  const access = authorizeMaintenance(request);
  if (!access.granted) return access.response;
  const { service } = access;

  const kind = new URL(request.url).searchParams.get('kind')?.trim() ?? '';

  try {
    if (kind === 'fence') {
      return NextResponse.json(await seedPerimeterFence(service.repository, service.config.cityPlan));
    }
    if (!isImportKind(kind)) {
      return NextResponse.json({ error: `Unknown import kind: ${kind || '(missing)'}` }, { status: 400 });
    }

    let payload: unknown;
    try {
      payload = await request.json();
    } catch {
      return NextResponse.json({ error: 'Body must be GeoJSON' }, { status: 400 });
    }

    const stats = await importGeoJson(service.repository, kind, payload);
    return NextResponse.json(stats);
  } catch (error) {
    console.error(`[import] ${kind} failed`, error);
    return NextResponse.json({ error: getErrorMessage(error) }, { status: 500 });
  }
}
