/**
 * Numeric helpers for sales aggregates. Empty input → NaN (means, quantiles) or 0 (sums).
 */

export function sum(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return sum(values) / values.length;
}

/** Quantile with linear interpolation between closest ranks (q in [0, 1]). */
export function quantile(values: readonly number[], q: number): number {
  if (values.length === 0 || !(q >= 0 && q <= 1)) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function median(values: readonly number[]): number {
  return quantile(values, 0.5);
}

export type DescriptiveStats = {
  mean: number;
  median: number;
  q1: number;
  q3: number;
};

export type BoxStats = DescriptiveStats & {
  min: number;
  max: number;
  count: number;
};

export function descriptiveStats(values: readonly number[]): DescriptiveStats {
  return {
    mean: mean(values),
    median: median(values),
    q1: quantile(values, 0.25),
    q3: quantile(values, 0.75),
  };
}

/** Min and max in one pass; NaN for both on empty input. */
export function extent(values: readonly number[]): { min: number; max: number } {
  if (values.length === 0) return { min: NaN, max: NaN };
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}

export function boxStats(values: readonly number[]): BoxStats {
  const { min, max } = extent(values);
  return {
    ...descriptiveStats(values),
    min,
    max,
    count: values.length,
  };
}

/** Pearson r; NaN when either series has zero variance or fewer than 2 points. */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return NaN;
  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) return NaN;
  const r = sxy / Math.sqrt(sxx * syy);
  return Math.max(-1, Math.min(1, r));
}

export function round2(n: number): number {
  if (!Number.isFinite(n)) return n;
  return Math.round(n * 100) / 100;
}

export type HistogramBin = { start: number; end: number; count: number };

/**
 * Equal-width bins over [min, max]; the last bin includes max.
 * All-equal input yields a single bin holding every value.
 */
export function histogram(values: readonly number[], binCount: number): HistogramBin[] {
  if (values.length === 0 || binCount < 1) return [];
  const { min, max } = extent(values);
  if (min === max) return [{ start: min, end: max, count: values.length }];
  const bins = Math.floor(binCount);
  const width = (max - min) / bins;
  const out: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    start: min + i * width,
    end: i === bins - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));
  for (const v of values) {
    const idx = Math.min(bins - 1, Math.floor((v - min) / width));
    out[idx].count += 1;
  }
  return out;
}
