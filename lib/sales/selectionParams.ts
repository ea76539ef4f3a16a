/**
 * Query string → SalesSelection.
 * ?from=YYYY-MM-DD&to=YYYY-MM-DD&productLine=...&productLine=...&month=January&month=March
 */

import { InvalidIsoDateError, isMonthName, parseIsoDateOrThrow, type MonthName } from '@/lib/time/parse';
import { InvalidSelectionError } from './errors';
import { restrictTo, type DateRange, type SalesSelection } from './filter';

function parseBound(params: URLSearchParams, name: 'from' | 'to'): Date | undefined {
  const raw = params.get(name)?.trim();
  if (!raw) return undefined;
  try {
    return parseIsoDateOrThrow(raw);
  } catch (e) {
    if (e instanceof InvalidIsoDateError) throw new InvalidSelectionError(name, raw);
    throw e;
  }
}

/** "march" / "MARCH" → "March". */
function toMonthName(raw: string): MonthName {
  const s = raw.trim();
  const candidate = s.charAt(0).toUpperCase() + s.slice(1).toLowerCase();
  if (!isMonthName(candidate)) throw new InvalidSelectionError('month', raw);
  return candidate;
}

export function dateRangeFromSearchParams(params: URLSearchParams): DateRange {
  let from = parseBound(params, 'from');
  let to = parseBound(params, 'to');
  if (from && to && from.getTime() > to.getTime()) {
    [from, to] = [to, from];
  }
  return { from, to };
}

export function selectionFromSearchParams(params: URLSearchParams): SalesSelection {
  const productLines = params
    .getAll('productLine')
    .map((p) => p.trim())
    .filter(Boolean);
  const months = params
    .getAll('month')
    .filter((m) => m.trim() !== '')
    .map(toMonthName);
  return {
    dateRange: dateRangeFromSearchParams(params),
    productLines: restrictTo(productLines),
    months: restrictTo(months),
  };
}
