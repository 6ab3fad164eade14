/**
 * Wildcard patterns used in config entries.
 *
 * `*` matches any sequence and `.` keeps its regex meaning (any character);
 * other regex metacharacters are literal. Matching is anchored at the start
 * only, so `ds.*|id` also matches columns named `id_old`.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  const body = pattern
    .replace(/[\\^$+?()[\]{}|]/g, '\\$&')
    .replace(/\*/g, '.*');
  return new RegExp(`^${body}`);
}

export function matchesWildcard(pattern: string, value: string): boolean {
  return wildcardToRegExp(pattern).test(value);
}
