import type { Hand } from '../../domain/MahjongHand';
import { liveTiles } from '../../domain/MahjongHand';
import { assertOrdinal, isSuited, rankOfOrdinal } from '../../domain/Tile';
import { countTile } from './common';
import type { ChiOption } from './types';

/**
 * Every way the hand can chi `discarded`: the pairs of concealed tiles that
 * sit at (d-2, d-1), (d-1, d+1) or (d+1, d+2). Honors and bonus tiles
 * cannot be chi'd, so they give an empty list.
 */
export function enumerateChiOptions(hand: Hand, discarded: number): ChiOption[] {
  assertOrdinal(discarded);
  if (!isSuited(discarded)) return [];

  const n = rankOfOrdinal(discarded);
  const tiles = liveTiles(hand);
  const has = (t: number) => countTile(tiles, t) >= 1;
  const d = discarded;

  const opts: ChiOption[] = [];

  // (d-2, d-1, d)
  if (n - 2 >= 1 && has(d - 2) && has(d - 1)) opts.push({ discarded: d, tiles: [d - 2, d - 1] });

  // (d-1, d, d+1)
  if (n - 1 >= 1 && n + 1 <= 9 && has(d - 1) && has(d + 1)) opts.push({ discarded: d, tiles: [d - 1, d + 1] });

  // (d, d+1, d+2)
  if (n + 2 <= 9 && has(d + 1) && has(d + 2)) opts.push({ discarded: d, tiles: [d + 1, d + 2] });

  return opts;
}
