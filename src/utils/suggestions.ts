/**
 * "Did you mean" suggestions for mistyped command names.
 */

/**
 * Edit distance (insertions, deletions, substitutions) between two strings.
 *
 * @example
 * ```typescript
 * editDistance('set_tempo', 'set_temp'); // 1
 * editDistance('fire_clip', 'stop_clip'); // 4
 * ```
 */
export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}

/**
 * Closest candidates to `target`, nearest first. Ties keep candidate order.
 *
 * @param maxDistance - Defaults to a third of the target length, at least 2
 */
export function suggestNames(
  target: string,
  candidates: readonly string[],
  maxResults: number = 3,
  maxDistance: number = Math.max(2, Math.floor(target.length / 3))
): string[] {
  return candidates
    .map((name, index) => ({ name, index, distance: editDistance(target, name) }))
    .filter((entry) => entry.distance <= maxDistance)
    .sort((x, y) => x.distance - y.distance || x.index - y.index)
    .slice(0, maxResults)
    .map((entry) => entry.name);
}
