/**
 * Sales filter engine. Pure: returns a new table, input rows are never touched or reordered.
 * Predicates are ANDed: inclusive date range, product line, month.
 */

import { MONTH_NAMES, type MonthName } from '@/lib/time/parse';
import type { SaleRecord, SalesTable } from './types';

/**
 * A multi-select value. `all` = no restriction (what an empty multi-select means in the UI);
 * `only` with an empty set matches nothing.
 */
export type Restriction<T> = { kind: 'all' } | { kind: 'only'; values: ReadonlySet<T> };

export type DateRange = { from?: Date; to?: Date };

export type SalesSelection = {
  dateRange: DateRange;
  productLines: Restriction<string>;
  months: Restriction<MonthName>;
};

export function unrestricted<T>(): Restriction<T> {
  return { kind: 'all' };
}

/** Empty input → unrestricted (select-all). */
export function restrictTo<T>(values: Iterable<T>): Restriction<T> {
  const set = new Set(values);
  return set.size === 0 ? { kind: 'all' } : { kind: 'only', values: set };
}

export function allows<T>(restriction: Restriction<T>, value: T): boolean {
  return restriction.kind === 'all' || restriction.values.has(value);
}

export function unrestrictedSelection(): SalesSelection {
  return { dateRange: {}, productLines: unrestricted(), months: unrestricted() };
}

function withRows(table: SalesTable, rows: SaleRecord[]): SalesTable {
  return { ...table, rows };
}

/** Observed min/max sale date, or null for an empty table. */
export function dateBounds(table: SalesTable): { min: Date; max: Date } | null {
  let min: Date | null = null;
  let max: Date | null = null;
  for (const r of table.rows) {
    if (!min || r.date.getTime() < min.getTime()) min = r.date;
    if (!max || r.date.getTime() > max.getTime()) max = r.date;
  }
  return min && max ? { min, max } : null;
}

/** Inclusive on both ends. A missing bound does not narrow that side. */
export function inDateRange(range: DateRange): (r: SaleRecord) => boolean {
  const fromMs = range.from?.getTime() ?? -Infinity;
  const toMs = range.to?.getTime() ?? Infinity;
  return (r) => {
    const t = r.date.getTime();
    return t >= fromMs && t <= toMs;
  };
}

export function filterByDate(table: SalesTable, range: DateRange): SalesTable {
  return withRows(table, table.rows.filter(inDateRange(range)));
}

export function applySelection(table: SalesTable, selection: SalesSelection): SalesTable {
  const inRange = inDateRange(selection.dateRange);
  return withRows(
    table,
    table.rows.filter(
      (r) => inRange(r) && allows(selection.productLines, r.productLine) && allows(selection.months, r.month)
    )
  );
}

/** Distinct product lines, first-seen order. */
export function productLineOptions(table: SalesTable): string[] {
  return Array.from(new Set(table.rows.map((r) => r.productLine)));
}

/** Months present after the date filter, calendar order. */
export function monthOptions(table: SalesTable, range: DateRange = {}): MonthName[] {
  const present = new Set(filterByDate(table, range).rows.map((r) => r.month));
  return MONTH_NAMES.filter((m) => present.has(m));
}
