/**
 * Coerces a timestamp read from the store to an ISO-8601 string.
 * `pg` hands back `TIMESTAMP` columns as `Date`; anything else is passed
 * through as text.
 */
export function coerceTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === 'string') {
    return value;
  }

  return String(value);
}
