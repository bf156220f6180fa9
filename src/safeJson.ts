/**
 * Safe JSON parse for values read back from the index. Corrupted rows must not abort a query.
 */
export function safeParse<T>(raw: string, fallback: T): T {
  try {
    return JSON.parse(raw) as T;
  } catch {
    return fallback;
  }
}

/** Parse a JSON array column, keeping only string entries. */
export function safeParseStringArray(raw: string | null | undefined): string[] {
  if (!raw) return [];
  const value: unknown = safeParse<unknown>(raw, []);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}
