import type { Hand } from '../../domain/MahjongHand';
import { liveTiles } from '../../domain/MahjongHand';
import { isBonus } from '../../domain/Tile';
import type { ChiOption } from './types';

/**
 * Small helpers shared by the claim code: tile counting and the
 * pon/kong checks against a discarded tile.
 */

export function countTile(tiles: readonly number[], t: number): number {
  let c = 0;
  for (const x of tiles) if (x === t) c++;
  return c;
}

export function canPon(hand: Hand, tile: number): boolean {
  return !isBonus(tile) && countTile(liveTiles(hand), tile) >= 2;
}

export function canKong(hand: Hand, tile: number): boolean {
  return !isBonus(tile) && countTile(liveTiles(hand), tile) >= 3;
}

/** The three tiles of a chi, ascending. */
export function chiSequence(o: ChiOption): number[] {
  return [o.discarded, ...o.tiles].sort((x, y) => x - y);
}

export function sameChiOption(a: ChiOption, b: ChiOption): boolean {
  const [x1, y1] = [...a.tiles].sort((p, q) => p - q);
  const [x2, y2] = [...b.tiles].sort((p, q) => p - q);
  return a.discarded === b.discarded && x1 === x2 && y1 === y2;
}
