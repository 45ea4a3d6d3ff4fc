import { countOrdinals } from '../domain/counts';
import { liveTiles, type Hand } from '../domain/MahjongHand';
import { functionalOrdinals, isBonus } from '../domain/Tile';
import { WinAnalyzer } from '../domain/WinAnalyzer';
import { handWithTile } from '../game/hu';
import type { Seat } from '../game/Player';
import { scoreContextFor, scoreHand, type ScoreOptions } from './scoring';

export type WaitingTile = { tile: number; points: number };

/** Copies of each ordinal the player can see in their own tiles, quads included. */
function ownedCounts(hand: Hand): Map<number, number> {
  const tiles = liveTiles(hand).filter((t) => !isBonus(t));
  for (const k of hand.selfKongs) tiles.push(k, k, k, k);
  for (const m of hand.melds) tiles.push(...m.tiles);
  return countOrdinals(tiles);
}

/**
 * Tiles that would complete the hand, each with what a self-drawn win on it
 * would score. A tile the player already holds four of is never a wait.
 */
export function findWaitingTiles(hand: Hand, seat: Seat, opts: ScoreOptions): WaitingTile[] {
  const owned = ownedCounts(hand);
  const out: WaitingTile[] = [];

  for (const tile of functionalOrdinals()) {
    if ((owned.get(tile) ?? 0) >= 4) continue;
    const completed = handWithTile(hand, tile);
    const analysis = WinAnalyzer.analyze(completed);
    if (!analysis.isWinning) continue;
    out.push({ tile, points: scoreHand(analysis, scoreContextFor(completed, seat, true), opts).points });
  }
  return out;
}

/** Ordinals held four times among the concealed and drawn tiles, ascending. */
export function findConcealedKongs(hand: Hand): number[] {
  const counts = countOrdinals(liveTiles(hand).filter((t) => !isBonus(t)));
  return [...counts.entries()]
    .filter(([, c]) => c >= 4)
    .map(([t]) => t)
    .sort((a, b) => a - b);
}
