/** Multiset of tile ordinals: ordinal -> number of copies (never stores zero). */
export type TileCounts = ReadonlyMap<number, number>;

export function countOrdinals(ordinals: Iterable<number>): Map<number, number> {
  const m = new Map<number, number>();
  for (const o of ordinals) m.set(o, (m.get(o) ?? 0) + 1);
  return m;
}

export function countOf(counts: TileCounts, ordinal: number): number {
  return counts.get(ordinal) ?? 0;
}

export function totalCount(counts: TileCounts): number {
  let n = 0;
  for (const c of counts.values()) n += c;
  return n;
}

export function smallestOrdinal(counts: TileCounts): number | null {
  let min: number | null = null;
  for (const o of counts.keys()) {
    if (min === null || o < min) min = o;
  }
  return min;
}

/**
 * Copy of `counts` with `n` copies of each given ordinal removed, or null
 * when any of them is short.
 */
export function withoutTiles(counts: TileCounts, ordinals: number[], n = 1): Map<number, number> | null {
  const next = new Map(counts);
  for (const o of ordinals) {
    const c = next.get(o) ?? 0;
    if (c < n) return null;
    if (c === n) next.delete(o);
    else next.set(o, c - n);
  }
  return next;
}

export function ascendingOrdinals(counts: TileCounts): number[] {
  return [...counts.keys()].sort((a, b) => a - b);
}
