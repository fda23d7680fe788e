import type { Row, Value } from "@libsql/client";

export function readString(row: Row, column: string): string {
  const value: Value | undefined = row[column];
  if (value === null || value === undefined) {
    throw new Error(`Column ${column} is null`);
  }
  return String(value);
}

export function readOptionalString(row: Row, column: string): string | null {
  const value: Value | undefined = row[column];
  return value === null || value === undefined ? null : String(value);
}

export function readNumber(row: Row, column: string): number {
  return Number(row[column] ?? 0);
}

/** Parses a JSON text column; malformed content reads as `fallback`. */
export function readJson(row: Row, column: string, fallback: unknown): unknown {
  const raw = readOptionalString(row, column);
  if (raw === null) return fallback;
  try {
    return JSON.parse(raw);
  } catch (error) {
    console.warn(`[DB] Malformed JSON in column ${column}:`, error);
    return fallback;
  }
}
