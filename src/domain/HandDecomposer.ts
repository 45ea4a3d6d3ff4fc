import type { TileCounts } from './counts';
import { ascendingOrdinals, countOf, smallestOrdinal, withoutTiles } from './counts';
import { isSuited, rankOfOrdinal } from './Tile';

export type Decomposition = {
  /** Root ordinal of every triplet, in the order found. */
  triplets: number[];
  /** Lowest ordinal of every sequence, in the order found. */
  sequences: number[];
};

export type PairedDecomposition = Decomposition & { pair: number };

/**
 * Backtracking search that splits a tile multiset into `setsNeeded` groups.
 *
 * The smallest remaining ordinal must belong to some group, and that group can
 * only start at it, so only the smallest tile is ever tried as a start. A
 * triplet is tried before a sequence; the first decomposition found wins.
 */
export class HandDecomposer {
  static decompose(counts: TileCounts, setsNeeded: number): Decomposition | null {
    if (setsNeeded === 0) return counts.size === 0 ? { triplets: [], sequences: [] } : null;

    const t = smallestOrdinal(counts);
    if (t === null) return null;

    if (countOf(counts, t) >= 3) {
      const rest = withoutTiles(counts, [t], 3);
      const sub = rest ? this.decompose(rest, setsNeeded - 1) : null;
      if (sub) return { triplets: [t, ...sub.triplets], sequences: sub.sequences };
    }

    if (isSuited(t) && rankOfOrdinal(t) <= 7) {
      const rest = withoutTiles(counts, [t, t + 1, t + 2]);
      const sub = rest ? this.decompose(rest, setsNeeded - 1) : null;
      if (sub) return { triplets: sub.triplets, sequences: [t, ...sub.sequences] };
    }

    return null;
  }

  /**
   * Tries each ordinal with at least two copies as the pair, in ascending
   * order, and decomposes the rest.
   */
  static findPairAndSets(counts: TileCounts, setsNeeded: number): PairedDecomposition | null {
    if (setsNeeded < 0 || setsNeeded > 4) return null;

    for (const pair of ascendingOrdinals(counts)) {
      if (countOf(counts, pair) < 2) continue;
      const rest = withoutTiles(counts, [pair], 2);
      const sets = rest ? this.decompose(rest, setsNeeded) : null;
      if (sets) return { pair, ...sets };
    }
    return null;
  }
}
