/**
 * Sales dataset loader: delimited text → canonical SalesTable.
 * - Headers are trimmed; every column in SALES_COLUMNS is required.
 * - Date "M/D/YYYY", Time "H:MM" (24h). Unparseable values mark the row incomplete.
 * - Rows with any missing value are dropped and counted, never raised.
 */

import { readFileSync } from 'fs';
import * as XLSX from 'xlsx';
import {
  formatIsoDate,
  monthName,
  parseClockTimeOrNull,
  parseUsDateOrNull,
  weekdayName,
} from '@/lib/time/parse';
import { SalesSchemaError, SourceUnavailableError, errorCode } from './errors';
import {
  DERIVED_HEADERS,
  REQUIRED_HEADERS,
  type DroppedRowReport,
  type SaleRecord,
  type SalesColumnHeader,
  type SalesTable,
} from './types';

const QUIET = typeof process !== 'undefined' && process.env?.NODE_ENV === 'test';

const REQUIRED_SET = new Set<string>(REQUIRED_HEADERS);
const DERIVED_SET = new Set<string>(DERIVED_HEADERS);

/** Cell value as trimmed text. Reader keeps cells raw, so most values arrive as strings. */
export function cellText(raw: unknown): string {
  if (raw == null) return '';
  if (typeof raw === 'number') return Number.isFinite(raw) ? String(raw) : '';
  if (raw instanceof Date) return '';
  return String(raw).trim();
}

const DECIMAL = /^-?\d+(\.\d+)?$/;

/** Plain decimal only ("1,234.5" ok); hex, binary and exponent forms count as missing. */
function numberOrNull(text: string): number | null {
  const plain = text.replace(/,/g, '');
  if (!DECIMAL.test(plain)) return null;
  const n = Number(plain);
  return Number.isFinite(n) ? n : null;
}

function textOrNull(text: string): string | null {
  return text === '' ? null : text;
}

type Complete<T> = { [K in keyof T]: NonNullable<T[K]> };

function isComplete<T extends object>(o: T): o is T & Complete<T> {
  return Object.values(o).every((v) => v !== null && v !== undefined);
}

/** Parse delimited text (comma, tab or semicolon; sniffed by the reader) into a cell grid. */
export function readSalesGrid(text: string): unknown[][] {
  const clean = text.replace(/^\uFEFF/, '');
  if (!clean.trim()) return [];
  const workbook = XLSX.read(clean, { type: 'string', raw: true });
  const first = workbook.SheetNames[0];
  const sheet = first != null ? workbook.Sheets[first] : undefined;
  if (!sheet) return [];
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', blankrows: false });
}

/** First row is the header. Throws SalesSchemaError when a required column is absent. */
export function buildSalesTable(grid: unknown[][]): SalesTable {
  const [headerRow = [], ...dataRows] = grid;
  const header = headerRow.map((c) => cellText(c));

  const colIndex = new Map<string, number>();
  header.forEach((h, i) => {
    if (h && !colIndex.has(h)) colIndex.set(h, i);
  });

  const missing = REQUIRED_HEADERS.filter((h) => !colIndex.has(h));
  if (missing.length > 0) throw new SalesSchemaError(missing);

  const sourceHeaders = Array.from(colIndex.keys()).filter((h) => !DERIVED_SET.has(h));
  const extraHeaders = sourceHeaders.filter((h) => !REQUIRED_SET.has(h));

  const dropped: DroppedRowReport = { total: 0, invalidDate: 0, invalidTime: 0, missingValue: 0 };
  const rows: SaleRecord[] = [];
  let rowsRead = 0;

  for (const row of dataRows) {
    if (row.every((c) => cellText(c) === '')) continue;
    rowsRead += 1;
    const at = (h: SalesColumnHeader) => cellText(row[colIndex.get(h) ?? -1]);

    const date = parseUsDateOrNull(at('Date'));
    if (!date) {
      dropped.invalidDate += 1;
      continue;
    }
    const time = parseClockTimeOrNull(at('Time'));
    if (!time) {
      dropped.invalidTime += 1;
      continue;
    }

    const values = {
      branch: textOrNull(at('Branch')),
      city: textOrNull(at('City')),
      customerType: textOrNull(at('Customer type')),
      gender: textOrNull(at('Gender')),
      productLine: textOrNull(at('Product line')),
      payment: textOrNull(at('Payment')),
      unitPrice: numberOrNull(at('Unit price')),
      quantity: numberOrNull(at('Quantity')),
      tax: numberOrNull(at('Tax 5%')),
      total: numberOrNull(at('Total')),
      cogs: numberOrNull(at('cogs')),
      grossIncome: numberOrNull(at('gross income')),
      rating: numberOrNull(at('Rating')),
    };
    const extra: Record<string, string> = {};
    let extraComplete = true;
    for (const h of extraHeaders) {
      const v = cellText(row[colIndex.get(h) ?? -1]);
      if (v === '') extraComplete = false;
      extra[h] = v;
    }
    if (!isComplete(values) || !extraComplete) {
      dropped.missingValue += 1;
      continue;
    }

    rows.push({
      ...values,
      date,
      time,
      dateKey: formatIsoDate(date),
      day: weekdayName(date),
      month: monthName(date),
      hour: time.hour,
      extra,
    });
  }

  dropped.total = dropped.invalidDate + dropped.invalidTime + dropped.missingValue;
  if (dropped.total > 0 && !QUIET) {
    console.warn(
      `[buildSalesTable] Dropped ${dropped.total} of ${rowsRead} rows`,
      `(invalid date: ${dropped.invalidDate}, invalid time: ${dropped.invalidTime}, missing value: ${dropped.missingValue})`
    );
  }

  return { rows, sourceHeaders, extraHeaders, rowsRead, dropped };
}

export function parseSalesText(text: string): SalesTable {
  return buildSalesTable(readSalesGrid(text));
}

/** Read and parse a sales file. Throws SourceUnavailableError if it cannot be read. */
export function loadSalesTable(path: string): SalesTable {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (e) {
    throw new SourceUnavailableError(path, errorCode(e));
  }
  return parseSalesText(text);
}
