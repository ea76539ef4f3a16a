/**
 * Filtered table → CSV for download. Output re-loads through loadSalesData with the same rows and values.
 * Columns: source headers in file order, then derived Day / Month / Hour.
 */

import { formatClockTime, formatUsDate } from '@/lib/time/parse';
import {
  DERIVED_HEADERS,
  SALES_COLUMNS,
  isSalesColumnHeader,
  type SaleRecord,
  type SalesColumnHeader,
  type SalesTable,
} from './types';

function escapeCsv(s: string): string {
  const t = String(s);
  if (/[",\n\r]/.test(t)) return `"${t.replace(/"/g, '""')}"`;
  return t;
}

function fieldText(r: SaleRecord, header: SalesColumnHeader): string {
  const field = SALES_COLUMNS[header];
  switch (field) {
    case 'date':
      return formatUsDate(r.date);
    case 'time':
      return formatClockTime(r.time);
    default:
      return String(r[field]);
  }
}

export function salesTableToCSV(table: SalesTable): string {
  const header = [...table.sourceHeaders, ...DERIVED_HEADERS];
  const lines = [header.map(escapeCsv).join(',')];
  for (const r of table.rows) {
    const cells = [
      ...table.sourceHeaders.map((h) => (isSalesColumnHeader(h) ? fieldText(r, h) : r.extra[h] ?? '')),
      r.day,
      r.month,
      String(r.hour),
    ];
    lines.push(cells.map(escapeCsv).join(','));
  }
  return lines.join('\r\n');
}
