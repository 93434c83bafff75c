/**
 * Levenshtein distance between `a` and `b` (insert, delete and substitute all cost 1).
 */
export function editDistance(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row.push(
        Math.min((prev[j] ?? 0) + 1, (row[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost),
      );
    }
    prev = row;
  }
  return prev[b.length] ?? 0;
}

/**
 * Closest candidate to `name`, ignoring case, or `undefined` when none is close enough.
 *
 * The smallest distance wins and ties go to the earlier candidate. A candidate is accepted when its
 * distance is at most half the length of `name` (but always at least 1).
 */
export function suggestName(name: string, candidates: Iterable<string>): string | undefined {
  const needle = name.toLowerCase();
  let best: { name: string; dist: number } | undefined;
  for (const candidate of candidates) {
    if (candidate === name) continue;
    const dist = editDistance(needle, candidate.toLowerCase());
    if (best === undefined || dist < best.dist) best = { name: candidate, dist };
  }
  if (!best) return undefined;
  return best.dist <= Math.max(1, Math.floor(name.length / 2)) ? best.name : undefined;
}
