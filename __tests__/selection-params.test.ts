/**
 * Query params → selection: strict ISO bounds, repeated productLine / month.
 */

import { InvalidSelectionError } from '@/lib/sales/errors';
import { dateRangeFromSearchParams, selectionFromSearchParams } from '@/lib/sales/selectionParams';

describe('selectionFromSearchParams', () => {
  it('no params = unrestricted', () => {
    expect(selectionFromSearchParams(new URLSearchParams(''))).toEqual({
      dateRange: { from: undefined, to: undefined },
      productLines: { kind: 'all' },
      months: { kind: 'all' },
    });
  });

  it('reads repeated productLine and month params', () => {
    const s = selectionFromSearchParams(
      new URLSearchParams('productLine=Health+and+beauty&productLine=Sports+and+travel&month=march&month=JANUARY')
    );
    expect(s.productLines.kind).toBe('only');
    if (s.productLines.kind === 'only') {
      expect(Array.from(s.productLines.values)).toEqual(['Health and beauty', 'Sports and travel']);
    }
    expect(s.months.kind).toBe('only');
    if (s.months.kind === 'only') expect(Array.from(s.months.values)).toEqual(['March', 'January']);
  });

  it('treats blank values as absent', () => {
    const s = selectionFromSearchParams(new URLSearchParams('productLine=&month=+'));
    expect(s.productLines).toEqual({ kind: 'all' });
    expect(s.months).toEqual({ kind: 'all' });
  });

  it('rejects unknown month names', () => {
    expect(() => selectionFromSearchParams(new URLSearchParams('month=Smarch'))).toThrow(InvalidSelectionError);
  });
});

describe('dateRangeFromSearchParams', () => {
  it('parses from / to as UTC dates', () => {
    const r = dateRangeFromSearchParams(new URLSearchParams('from=2024-01-05&to=2024-02-10'));
    expect(r.from?.toISOString()).toBe('2024-01-05T00:00:00.000Z');
    expect(r.to?.toISOString()).toBe('2024-02-10T00:00:00.000Z');
  });

  it('swaps reversed bounds', () => {
    const r = dateRangeFromSearchParams(new URLSearchParams('from=2024-03-01&to=2024-01-01'));
    expect(r.from?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(r.to?.toISOString()).toBe('2024-03-01T00:00:00.000Z');
  });

  it('rejects non-ISO dates with the param name', () => {
    expect(() => dateRangeFromSearchParams(new URLSearchParams('from=1/5/2024'))).toThrow(InvalidSelectionError);
    try {
      dateRangeFromSearchParams(new URLSearchParams('to=2024-02-30'));
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidSelectionError);
      if (e instanceof InvalidSelectionError) {
        expect(e.param).toBe('to');
        expect(e.input).toBe('2024-02-30');
      }
    }
  });
});
