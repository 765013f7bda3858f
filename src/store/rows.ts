// src/store/rows.ts
// Shared helpers for converting snake_case rows into domain records.

/** Parse a JSON column; malformed or empty values yield `fallback`. */
export function parseJsonColumn(json: string | null, fallback: unknown = null): unknown {
  if (!json) return fallback;
  try {
    const parsed: unknown = JSON.parse(json);
    return parsed;
  } catch {
    return fallback;
  }
}

export function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && values.some((v) => v === value);
}

/** Narrow a stored enum column, falling back when the value is unknown. */
export function oneOf<T extends string>(values: readonly T[], value: unknown, fallback: T): T {
  return isOneOf(values, value) ? value : fallback;
}

/** SQLite has no boolean type; flags are stored as 0/1. */
export const toFlag = (value: boolean): number => (value ? 1 : 0);
export const fromFlag = (value: number | null): boolean => value === 1;
