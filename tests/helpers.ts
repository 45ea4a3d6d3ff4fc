import { emptyHand, type Hand } from '../src/domain/MahjongHand';
import { functionalOrdinals, isSuited, rankOfOrdinal } from '../src/domain/Tile';

export function hand(concealed: number[], rest: Partial<Hand> = {}): Hand {
  return { ...emptyHand(), concealed, ...rest };
}

/** Small deterministic PRNG so generated hands are the same on every run. */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(rand: () => number, items: readonly T[]): T {
  const item = items[Math.floor(rand() * items.length)];
  if (item === undefined) throw new Error('pick from empty list');
  return item;
}

/** Fourteen concealed tiles built as four random groups plus a pair, never more than four copies of a tile. */
export function randomWinningTiles(rand: () => number): number[] {
  const all = functionalOrdinals();
  const sequenceStarts = all.filter((t) => isSuited(t) && rankOfOrdinal(t) <= 7);
  const used = new Map<number, number>();
  const fits = (tiles: number[]) => {
    const next = new Map(used);
    for (const t of tiles) next.set(t, (next.get(t) ?? 0) + 1);
    return [...next.values()].every((c) => c <= 4);
  };
  const take = (tiles: number[]) => {
    for (const t of tiles) used.set(t, (used.get(t) ?? 0) + 1);
  };

  const out: number[] = [];
  while (out.length < 12) {
    let group: number[];
    if (rand() < 0.5) {
      const t = pick(rand, all);
      group = [t, t, t];
    } else {
      const s = pick(rand, sequenceStarts);
      group = [s, s + 1, s + 2];
    }
    if (!fits(group)) continue;
    take(group);
    out.push(...group);
  }
  for (;;) {
    const p = pick(rand, all);
    if (!fits([p, p])) continue;
    out.push(p, p);
    return out;
  }
}
