/**
 * Caller-owned cache of loaded sales tables, keyed by (resolved path, mtime).
 * A changed mtime reloads; invalidate() drops entries explicitly.
 */

import { statSync } from 'fs';
import { resolve } from 'path';
import { SourceUnavailableError, errorCode } from './errors';
import { loadSalesTable } from './loadSalesData';
import type { SalesTable } from './types';

type CacheEntry = { mtimeMs: number; table: SalesTable };

export type SalesTableLoader = (path: string) => SalesTable;

export class SalesTableCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly load: SalesTableLoader = loadSalesTable) {}

  get(path: string): SalesTable {
    const key = resolve(path);
    let mtimeMs: number;
    try {
      mtimeMs = statSync(key).mtimeMs;
    } catch (e) {
      this.entries.delete(key);
      throw new SourceUnavailableError(path, errorCode(e));
    }
    const hit = this.entries.get(key);
    if (hit && hit.mtimeMs === mtimeMs) return hit.table;
    const table = this.load(key);
    this.entries.set(key, { mtimeMs, table });
    return table;
  }

  /** Drop one path, or everything when called without arguments. */
  invalidate(path?: string): void {
    if (path == null) {
      this.entries.clear();
      return;
    }
    this.entries.delete(resolve(path));
  }

  get size(): number {
    return this.entries.size;
  }
}
