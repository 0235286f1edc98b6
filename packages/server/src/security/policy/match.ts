/**
 * Action pattern matching for policies.
 *
 * Supports:
 * - `*` matches every action
 * - `prefix*` matches actions starting with prefix (e.g. `s3:*`)
 * - exact match otherwise
 *
 * Comparison is case-insensitive.
 */
export function actionMatches(pattern: string, action: string): boolean {
  const p = pattern.trim().toLowerCase();
  const a = action.trim().toLowerCase();

  if (!p) return false;
  if (p === '*') return true;
  if (p.endsWith('*')) return a.startsWith(p.slice(0, -1));
  return p === a;
}

/**
 * Return true if any pattern in the list matches the action.
 */
export function anyActionMatches(patterns: readonly string[], action: string): boolean {
  return patterns.some((p) => actionMatches(p, action));
}
