/**
 * Sales aggregates — pure, read-only computations over a SalesTable (usually a filtered one).
 * Empty tables are valid input: sums/counts are 0, means NaN, grouped outputs empty
 * (except the fixed-shape weekday and hourly tables).
 */

import { WEEKDAY_NAMES, type WeekdayName } from '@/lib/time/parse';
import type { CategoryColumn, NumericColumn, SaleRecord, SalesTable } from '@/lib/sales/types';
import { boxStats, mean, pearson, round2, sum, type BoxStats } from './stats';

export type DailyTotal = { dateKey: string; total: number };
export type DailyCount = { dateKey: string; count: number };
export type WeekdayMean = { day: WeekdayName; mean: number | null };
export type HourlyBin = { hour: number; total: number };
export type CategoryValue = { category: string; value: number };
export type CategoryStats = { category: string; stats: BoxStats };
export type PaymentFrequency = { method: string; count: number };
export type CostIncomePoint = { cogs: number; grossIncome: number };
export type CorrelationMatrix = { columns: NumericColumn[]; values: number[][] };

export const HOURS_PER_DAY = 24;

export function numericValues(table: SalesTable, column: NumericColumn): number[] {
  return table.rows.map((r) => r[column]);
}

function groupBy<K>(rows: readonly SaleRecord[], key: (r: SaleRecord) => K): Map<K, SaleRecord[]> {
  const groups = new Map<K, SaleRecord[]>();
  for (const r of rows) {
    const k = key(r);
    const bucket = groups.get(k);
    if (bucket) bucket.push(r);
    else groups.set(k, [r]);
  }
  return groups;
}

export function totalSum(table: SalesTable): number {
  return sum(numericValues(table, 'total'));
}

export function transactionCount(table: SalesTable): number {
  return table.rows.length;
}

/** Sum of `total` per sale day, ascending by date. */
export function dailyTotals(table: SalesTable): DailyTotal[] {
  const byDay = groupBy(table.rows, (r) => r.dateKey);
  return Array.from(byDay.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([dateKey, rows]) => ({ dateKey, total: sum(rows.map((r) => r.total)) }));
}

/** Mean of the per-day sums; days without sales do not count. */
export function averageDailyTotal(table: SalesTable): number {
  return mean(dailyTotals(table).map((d) => d.total));
}

export function dailyTransactionCounts(table: SalesTable): DailyCount[] {
  const byDay = groupBy(table.rows, (r) => r.dateKey);
  return Array.from(byDay.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([dateKey, rows]) => ({ dateKey, count: rows.length }));
}

/** Always 7 entries, Monday → Sunday. A weekday with no sales has mean null (not 0). */
export function weekdayMeans(table: SalesTable): WeekdayMean[] {
  const byDay = groupBy(table.rows, (r) => r.day);
  return WEEKDAY_NAMES.map((day) => {
    const rows = byDay.get(day);
    return { day, mean: rows ? mean(rows.map((r) => r.total)) : null };
  });
}

/** Sum of `total` per hour of day; 24 fixed bins. */
export function hourlyDistribution(table: SalesTable): HourlyBin[] {
  const bins: HourlyBin[] = Array.from({ length: HOURS_PER_DAY }, (_, hour) => ({ hour, total: 0 }));
  for (const r of table.rows) {
    if (r.hour >= 0 && r.hour < HOURS_PER_DAY) bins[r.hour].total += r.total;
  }
  return bins;
}

/** Sum of `numeric` per category value, first-seen order. */
export function categoryBreakdown(
  table: SalesTable,
  category: CategoryColumn,
  numeric: NumericColumn
): CategoryValue[] {
  const groups = groupBy(table.rows, (r) => r[category]);
  return Array.from(groups.entries()).map(([key, rows]) => ({
    category: key,
    value: sum(rows.map((r) => r[numeric])),
  }));
}

/** Per-category distribution of `numeric` (box plot input), first-seen order. */
export function categoryDistribution(
  table: SalesTable,
  category: CategoryColumn,
  numeric: NumericColumn
): CategoryStats[] {
  const groups = groupBy(table.rows, (r) => r[category]);
  return Array.from(groups.entries()).map(([key, rows]) => ({
    category: key,
    stats: boxStats(rows.map((r) => r[numeric])),
  }));
}

/**
 * Pearson correlation across `columns`, rounded to 2 dp.
 * A zero-variance column yields NaN in its row and column.
 */
export function correlationMatrix(table: SalesTable, columns: readonly NumericColumn[]): CorrelationMatrix {
  const series = columns.map((c) => numericValues(table, c));
  const values = series.map((_, i) => series.map(() => NaN));
  for (let i = 0; i < series.length; i++) {
    for (let j = i; j < series.length; j++) {
      const r = round2(pearson(series[i], series[j]));
      values[i][j] = r;
      values[j][i] = r;
    }
  }
  return { columns: [...columns], values };
}

/** Transactions per payment method, most frequent first (ties keep first-seen order). */
export function paymentMethodFrequency(table: SalesTable): PaymentFrequency[] {
  const groups = groupBy(table.rows, (r) => r.payment);
  return Array.from(groups.entries())
    .map(([method, rows]) => ({ method, count: rows.length }))
    .sort((a, b) => b.count - a.count);
}

export function costIncomePoints(table: SalesTable): CostIncomePoint[] {
  return table.rows.map((r) => ({ cogs: r.cogs, grossIncome: r.grossIncome }));
}
