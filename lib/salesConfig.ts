/**
 * Sales dashboard config from env.
 * Defaults: bundled data/data.csv, "sales-filtered.csv" download name.
 */
import { resolve } from 'path';
import type { NumericColumn } from '@/lib/sales/types';

const env: Record<string, string | undefined> = typeof process !== 'undefined' ? process.env : {};

const NUMERIC_COLUMNS: readonly NumericColumn[] = [
  'unitPrice',
  'quantity',
  'tax',
  'total',
  'cogs',
  'grossIncome',
  'rating',
  'hour',
];

const DEFAULT_CORRELATION_COLUMNS: NumericColumn[] = ['unitPrice', 'quantity', 'total', 'rating'];

function isNumericColumn(s: string): s is NumericColumn {
  return (NUMERIC_COLUMNS as readonly string[]).includes(s);
}

/** Comma list of numeric column names; unknown names are ignored, empty result → defaults. */
export function parseCorrelationColumns(raw: string | undefined): NumericColumn[] {
  const picked = (raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(isNumericColumn);
  const unique = Array.from(new Set(picked));
  return unique.length > 0 ? unique : [...DEFAULT_CORRELATION_COLUMNS];
}

export const SALES_DATA_PATH = resolve(env.SALES_DATA_PATH?.trim() || 'data/data.csv');

export const SALES_EXPORT_FILENAME = env.SALES_EXPORT_FILENAME?.trim() || 'sales-filtered.csv';

export const SALES_CORRELATION_COLUMNS = parseCorrelationColumns(env.SALES_CORRELATION_COLUMNS);

/** Bins for the rating distribution chart. */
export const RATING_HISTOGRAM_BINS = 12;
