/**
 * Dashboard payload: KPIs and chart-ready tables for one selection.
 * Every aggregate reads the filtered table, payment methods and cost-vs-income included.
 * NaN (empty selection) is sent as null so the payload survives JSON.
 */

import { formatIsoDate, type MonthName } from '@/lib/time/parse';
import {
  averageDailyTotal,
  categoryDistribution,
  correlationMatrix,
  costIncomePoints,
  dailyTotals,
  dailyTransactionCounts,
  hourlyDistribution,
  numericValues,
  paymentMethodFrequency,
  totalSum,
  transactionCount,
  weekdayMeans,
  type CostIncomePoint,
  type DailyCount,
  type DailyTotal,
  type HourlyBin,
  type PaymentFrequency,
  type WeekdayMean,
} from '@/lib/metrics/salesAggregates';
import { descriptiveStats, histogram, type BoxStats, type HistogramBin } from '@/lib/metrics/stats';
import { RATING_HISTOGRAM_BINS, SALES_CORRELATION_COLUMNS } from '@/lib/salesConfig';
import {
  applySelection,
  dateBounds,
  monthOptions,
  productLineOptions,
  type DateRange,
  type Restriction,
  type SalesSelection,
} from './filter';
import type { DroppedRowReport, NumericColumn, SalesTable } from './types';

type Nullable<T> = { [K in keyof T]: T[K] extends number ? number | null : T[K] };

export type SelectionSummary = {
  from: string | null;
  to: string | null;
  /** null = unrestricted */
  productLines: string[] | null;
  months: MonthName[] | null;
};

export type DashboardPayload = {
  selection: SelectionSummary;
  kpis: {
    totalSales: number;
    averageDailySales: number | null;
    transactions: number;
  };
  charts: {
    dailyTotals: DailyTotal[];
    weekdayMeans: WeekdayMean[];
    dailyTransactions: DailyCount[];
    hourly: HourlyBin[];
    rating: {
      histogram: HistogramBin[];
      stats: { mean: number; median: number; q1: number; q3: number };
    } | null;
    customerTypeSpend: { category: string; stats: Nullable<BoxStats> }[];
    costVsIncome: CostIncomePoint[];
    paymentMethods: PaymentFrequency[];
    correlation: { columns: NumericColumn[]; values: (number | null)[][] };
  };
  dropped: DroppedRowReport;
};

export type FilterOptions = {
  minDate: string | null;
  maxDate: string | null;
  productLines: string[];
  months: MonthName[];
};

export type DashboardOptions = {
  correlationColumns?: readonly NumericColumn[];
  ratingBins?: number;
};

function finiteOrNull(n: number): number | null {
  return Number.isFinite(n) ? n : null;
}

function restrictionList<T>(r: Restriction<T>): T[] | null {
  return r.kind === 'all' ? null : Array.from(r.values);
}

function summarizeSelection(table: SalesTable, selection: SalesSelection): SelectionSummary {
  const bounds = dateBounds(table);
  const from = selection.dateRange.from ?? bounds?.min;
  const to = selection.dateRange.to ?? bounds?.max;
  return {
    from: from ? formatIsoDate(from) : null,
    to: to ? formatIsoDate(to) : null,
    productLines: restrictionList(selection.productLines),
    months: restrictionList(selection.months),
  };
}

export function buildDashboard(
  table: SalesTable,
  selection: SalesSelection,
  options: DashboardOptions = {}
): DashboardPayload {
  const filtered = applySelection(table, selection);
  const ratings = numericValues(filtered, 'rating');
  const correlation = correlationMatrix(filtered, options.correlationColumns ?? SALES_CORRELATION_COLUMNS);

  return {
    selection: summarizeSelection(table, selection),
    kpis: {
      totalSales: totalSum(filtered),
      averageDailySales: finiteOrNull(averageDailyTotal(filtered)),
      transactions: transactionCount(filtered),
    },
    charts: {
      dailyTotals: dailyTotals(filtered),
      weekdayMeans: weekdayMeans(filtered),
      dailyTransactions: dailyTransactionCounts(filtered),
      hourly: hourlyDistribution(filtered),
      rating:
        ratings.length > 0
          ? {
              histogram: histogram(ratings, options.ratingBins ?? RATING_HISTOGRAM_BINS),
              stats: descriptiveStats(ratings),
            }
          : null,
      customerTypeSpend: categoryDistribution(filtered, 'customerType', 'total').map(({ category, stats }) => ({
        category,
        stats: {
          mean: finiteOrNull(stats.mean),
          median: finiteOrNull(stats.median),
          q1: finiteOrNull(stats.q1),
          q3: finiteOrNull(stats.q3),
          min: finiteOrNull(stats.min),
          max: finiteOrNull(stats.max),
          count: stats.count,
        },
      })),
      costVsIncome: costIncomePoints(filtered),
      paymentMethods: paymentMethodFrequency(filtered),
      correlation: {
        columns: correlation.columns,
        values: correlation.values.map((row) => row.map(finiteOrNull)),
      },
    },
    dropped: table.dropped,
  };
}

export function buildFilterOptions(table: SalesTable, dateRange: DateRange = {}): FilterOptions {
  const bounds = dateBounds(table);
  return {
    minDate: bounds ? formatIsoDate(bounds.min) : null,
    maxDate: bounds ? formatIsoDate(bounds.max) : null,
    productLines: productLineOptions(table),
    months: monthOptions(table, dateRange),
  };
}
