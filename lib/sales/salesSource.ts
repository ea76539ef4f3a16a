/**
 * Process-wide sales table for API routes: one SalesTableCache over SALES_DATA_PATH.
 * Error → HTTP status mapping shared by the /api/sales/* handlers.
 */

import { NextResponse } from 'next/server';
import { SALES_DATA_PATH } from '@/lib/salesConfig';
import { InvalidSelectionError, SalesSchemaError, SourceUnavailableError } from './errors';
import { SalesTableCache } from './salesCache';
import type { SalesTable } from './types';

export const salesTableCache = new SalesTableCache();

export function getSalesTable(): SalesTable {
  return salesTableCache.get(SALES_DATA_PATH);
}

export function salesErrorStatus(e: unknown): number {
  if (e instanceof InvalidSelectionError) return 400;
  if (e instanceof SourceUnavailableError) return 503;
  return 500;
}

/** JSON error response; load failures are logged, bad query params are not. */
export function salesErrorResponse(route: string, e: unknown): NextResponse {
  const status = salesErrorStatus(e);
  if (status !== 400) console.error(`[${route}]`, e);
  const message =
    e instanceof InvalidSelectionError || e instanceof SourceUnavailableError || e instanceof SalesSchemaError
      ? e.message
      : 'Internal error';
  return NextResponse.json({ error: message }, { status });
}
