import Database from 'better-sqlite3';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value)
  );
}

export function readString(
  data: Record<string, unknown>,
  key: string
): string | null {
  const value = data[key];
  if (typeof value === 'string') {
    return value;
  }
  return null;
}

export function readNumber(
  data: Record<string, unknown>,
  key: string
): number | null {
  const value = data[key];
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return null;
}

export function readNullableString(
  data: Record<string, unknown>,
  key: string
): string | null | undefined {
  const value = data[key];
  if (value === null) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  return undefined;
}

/** Parse every row with `parse`, dropping rows that do not match the expected shape. */
export function parseRows<T>(rows: unknown[], parse: (row: Record<string, unknown>) => T | null): T[] {
  const result: T[] = [];
  for (const row of rows) {
    if (!isRecord(row)) {
      continue;
    }
    const parsed = parse(row);
    if (parsed !== null) {
      result.push(parsed);
    }
  }
  return result;
}

export function parseRow<T>(row: unknown, parse: (row: Record<string, unknown>) => T | null): T | null {
  if (!isRecord(row)) {
    return null;
  }
  return parse(row);
}

export function isUniqueConstraintError(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}
