/**
 * GET /api/sales/filters?from=YYYY-MM-DD&to=YYYY-MM-DD
 * Response: minDate, maxDate, productLines, months (only months present in the date range).
 */

import { NextRequest, NextResponse } from 'next/server';
import { buildFilterOptions } from '@/lib/sales/dashboard';
import { dateRangeFromSearchParams } from '@/lib/sales/selectionParams';
import { getSalesTable, salesErrorResponse } from '@/lib/sales/salesSource';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  try {
    const range = dateRangeFromSearchParams(request.nextUrl.searchParams);
    return NextResponse.json(buildFilterOptions(getSalesTable(), range));
  } catch (e) {
    return salesErrorResponse('GET /api/sales/filters', e);
  }
}
