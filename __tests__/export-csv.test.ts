/**
 * CSV export of a filtered table, and re-loading the export with the same parse rules.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { salesTableToCSV } from '@/lib/sales/exportCsv';
import { applySelection, restrictTo, unrestrictedSelection } from '@/lib/sales/filter';
import { loadSalesTable, parseSalesText } from '@/lib/sales/loadSalesData';
import { salesTable } from './fixtures/salesGrid';

const DATA_FILE = path.join(__dirname, '..', 'data', 'data.csv');

describe('salesTableToCSV', () => {
  it('writes source columns in file order, then derived Day / Month / Hour', () => {
    const csv = salesTableToCSV(salesTable([{}]));
    const [header, row] = csv.split('\r\n');
    expect(header).toBe(
      'Invoice ID,Branch,City,Customer type,Gender,Product line,Unit price,Quantity,Tax 5%,Total,Date,Time,Payment,cogs,gross income,Rating,Day,Month,Hour'
    );
    expect(row).toBe('INV-1,A,Riverton,Member,Female,Health and beauty,10,2,1,21,01/05/2024,10:30,Cash,20,1,7,Friday,January,10');
  });

  it('keeps the bundled file column order', () => {
    const sourceHeader = readFileSync(DATA_FILE, 'utf8').split(/\r?\n/)[0];
    const csv = salesTableToCSV(loadSalesTable(DATA_FILE));
    expect(csv.split('\r\n')[0]).toBe(`${sourceHeader},Day,Month,Hour`);
  });

  it('quotes fields containing commas or quotes', () => {
    const csv = salesTableToCSV(salesTable([{ 'Product line': 'Sports, "pro" travel' }]));
    expect(csv.split('\r\n')[1]).toContain(',"Sports, ""pro"" travel",');
  });

  it('writes only the header for an empty table', () => {
    const t = salesTable([{}]);
    const empty = applySelection(t, { ...unrestrictedSelection(), productLines: restrictTo(['None']) });
    expect(salesTableToCSV(empty).split('\r\n').length).toBe(1);
  });
});

describe('export round-trip', () => {
  it('re-loads to the same rows and values', () => {
    const table = salesTable([
      { 'Invoice ID': 'X-1', Total: '548.9715', Time: '7:05', Date: '2/29/2024' },
      { 'Invoice ID': 'X-2', 'Product line': 'Sports, travel', City: 'Lake "North"' },
    ]);
    const reloaded = parseSalesText(salesTableToCSV(table));
    expect(reloaded.rows).toEqual(table.rows);
    expect(reloaded.extraHeaders).toEqual(['Invoice ID']);
    expect(reloaded.sourceHeaders).toEqual(table.sourceHeaders);
    expect(reloaded.dropped.total).toBe(0);
  });

  it('round-trips a filtered view of the bundled dataset', () => {
    const table = loadSalesTable(DATA_FILE);
    expect(table.rows.length).toBe(60);
    const filtered = applySelection(table, { ...unrestrictedSelection(), months: restrictTo(['February' as const]) });
    const reloaded = parseSalesText(salesTableToCSV(filtered));
    expect(reloaded.rows.length).toBe(filtered.rows.length);
    expect(reloaded.rows).toEqual(filtered.rows);
  });
});
