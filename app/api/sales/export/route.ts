/**
 * GET /api/sales/export?from=YYYY-MM-DD&to=YYYY-MM-DD&productLine=...&month=...
 * Download the filtered rows as CSV (same selection params as /api/sales/dashboard).
 */

import { NextRequest, NextResponse } from 'next/server';
import { salesTableToCSV } from '@/lib/sales/exportCsv';
import { applySelection } from '@/lib/sales/filter';
import { selectionFromSearchParams } from '@/lib/sales/selectionParams';
import { getSalesTable, salesErrorResponse } from '@/lib/sales/salesSource';
import { SALES_EXPORT_FILENAME } from '@/lib/salesConfig';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  try {
    const selection = selectionFromSearchParams(request.nextUrl.searchParams);
    const csv = salesTableToCSV(applySelection(getSalesTable(), selection));
    return new NextResponse(csv, {
      status: 200,
      headers: {
        'Content-Type': 'text/csv; charset=utf-8',
        'Content-Disposition': `attachment; filename="${SALES_EXPORT_FILENAME}"`,
      },
    });
  } catch (e) {
    return salesErrorResponse('GET /api/sales/export', e);
  }
}
