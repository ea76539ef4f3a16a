/**
 * Load-time failures. Both abort the load; per-row parse failures are not errors
 * (rows are dropped and counted on SalesTable.dropped).
 */

export class SourceUnavailableError extends Error {
  constructor(
    public readonly path: string,
    public readonly code?: string
  ) {
    super(`Sales data source unavailable: ${path}${code ? ` (${code})` : ''}`);
    this.name = 'SourceUnavailableError';
  }
}

export class SalesSchemaError extends Error {
  constructor(public readonly missingColumns: string[]) {
    super(`Sales data is missing required column(s): ${missingColumns.join(', ')}`);
    this.name = 'SalesSchemaError';
  }
}

export class InvalidSelectionError extends Error {
  constructor(
    public readonly param: string,
    public readonly input: string
  ) {
    super(`Invalid ${param}: ${input}`);
    this.name = 'InvalidSelectionError';
  }
}

/** Node fs errors carry a string `code` (ENOENT, EACCES, ...). */
export function errorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e) {
    return typeof e.code === 'string' ? e.code : undefined;
  }
  return undefined;
}
