/**
 * Query string helpers for Express handlers
 */

export function queryString(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return queryString(value[0]);
  }
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * Positive integer from the query string, `fallback` when missing or invalid,
 * capped at `max`
 */
export function queryInt(value: unknown, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = parseInt(queryString(value) ?? '', 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    return fallback;
  }
  return Math.min(parsed, max);
}
