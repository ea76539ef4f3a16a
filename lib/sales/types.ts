/**
 * Canonical sales table: one SaleRecord per transaction row of the source file.
 * Day / month / hour / dateKey are projections of date + time, computed once at load.
 */

import type { ClockTime, MonthName, WeekdayName } from '@/lib/time/parse';

/** Source header → record field. */
export const SALES_COLUMNS = {
  Branch: 'branch',
  City: 'city',
  'Customer type': 'customerType',
  Gender: 'gender',
  'Product line': 'productLine',
  'Unit price': 'unitPrice',
  Quantity: 'quantity',
  'Tax 5%': 'tax',
  Total: 'total',
  Date: 'date',
  Time: 'time',
  Payment: 'payment',
  cogs: 'cogs',
  'gross income': 'grossIncome',
  Rating: 'rating',
} as const;

export type SalesColumnHeader = keyof typeof SALES_COLUMNS;

export function isSalesColumnHeader(h: string): h is SalesColumnHeader {
  return Object.prototype.hasOwnProperty.call(SALES_COLUMNS, h);
}

export const REQUIRED_HEADERS = Object.keys(SALES_COLUMNS) as SalesColumnHeader[];

/** Derived on load; ignored when present in a source file. */
export const DERIVED_HEADERS = ['Day', 'Month', 'Hour'] as const;

export const TEXT_FIELDS = ['branch', 'city', 'customerType', 'gender', 'productLine', 'payment'] as const;
export type TextField = (typeof TEXT_FIELDS)[number];

export const NUMERIC_FIELDS = ['unitPrice', 'quantity', 'tax', 'total', 'cogs', 'grossIncome', 'rating'] as const;
export type NumericField = (typeof NUMERIC_FIELDS)[number];

export type SaleRecord = {
  branch: string;
  city: string;
  customerType: string;
  gender: string;
  productLine: string;
  payment: string;
  unitPrice: number;
  quantity: number;
  tax: number;
  total: number;
  cogs: number;
  grossIncome: number;
  rating: number;
  /** 00:00 UTC of the sale day */
  date: Date;
  time: ClockTime;
  dateKey: string;
  day: WeekdayName;
  month: MonthName;
  hour: number;
  /** Source columns outside the known schema, by trimmed header. */
  extra: Readonly<Record<string, string>>;
};

/** Columns usable as numeric series in aggregates (hour included). */
export type NumericColumn = NumericField | 'hour';
/** Columns usable as grouping keys. */
export type CategoryColumn = TextField | 'day' | 'month';

export type DroppedRowReport = {
  total: number;
  invalidDate: number;
  invalidTime: number;
  missingValue: number;
};

export type SalesTable = {
  readonly rows: readonly SaleRecord[];
  /** Source headers (required and extra, derived excluded) in file order; the export column order. */
  readonly sourceHeaders: readonly string[];
  /** Non-required source headers kept on each record's `extra`, in source order. */
  readonly extraHeaders: readonly string[];
  readonly rowsRead: number;
  readonly dropped: DroppedRowReport;
};
