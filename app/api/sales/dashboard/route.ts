/**
 * GET /api/sales/dashboard?from=YYYY-MM-DD&to=YYYY-MM-DD&productLine=...&month=...
 * Response: selection echo, KPIs (total, daily average, transactions) and chart-ready tables.
 * productLine / month may repeat; none given = no restriction.
 */

import { NextRequest, NextResponse } from 'next/server';
import { buildDashboard } from '@/lib/sales/dashboard';
import { selectionFromSearchParams } from '@/lib/sales/selectionParams';
import { getSalesTable, salesErrorResponse } from '@/lib/sales/salesSource';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  try {
    const selection = selectionFromSearchParams(request.nextUrl.searchParams);
    const table = getSalesTable();
    return NextResponse.json(buildDashboard(table, selection));
  } catch (e) {
    return salesErrorResponse('GET /api/sales/dashboard', e);
  }
}
