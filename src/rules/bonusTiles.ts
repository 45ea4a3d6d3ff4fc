import type { Seat } from '../game/Player';
import { InvalidArgumentError } from '../domain/errors';
import { assertOrdinal, isBonus, rankOfOrdinal, suitOfOrdinal } from '../domain/Tile';

export type ScoreLine = { label: string; points: number };

/** Bonus tiles that make up a color set: ranks 1-4 of each color. */
const SET_RANKS = [1, 2, 3, 4];

export function formatLine(l: ScoreLine): string {
  return `${l.label}: ${l.points >= 0 ? '+' : ''}${l.points}`;
}

function hasAllRanks(ranks: Set<number>): boolean {
  return SET_RANKS.every((r) => ranks.has(r));
}

/**
 * Score adjustment for bonus (flower) tiles.
 *
 * - the own flower is the one numbered seat + 1; holding flowers but not the
 *   own one costs a point, holding two copies of it earns one
 * - a full 1-4 set in one color earns 2, a 1-4 set made from both colors 1,
 *   and all eight earn 3 instead
 */
export function bonusTileLines(seat: Seat, bonusTiles: readonly number[]): ScoreLine[] {
  if (bonusTiles.length === 0) return [];

  for (const t of bonusTiles) {
    assertOrdinal(t);
    if (!isBonus(t)) throw new InvalidArgumentError(`tile ${t} is not a bonus tile`);
  }

  const lines: ScoreLine[] = [];
  const own = seat + 1;
  const ownCount = bonusTiles.filter((t) => rankOfOrdinal(t) === own).length;
  if (ownCount === 0) lines.push({ label: 'Wrong Flower', points: -1 });
  else if (ownCount >= 2) lines.push({ label: 'Own Flower Pair', points: 1 });

  const blue = new Set(bonusTiles.filter((t) => suitOfOrdinal(t) === 'blueBonus').map(rankOfOrdinal));
  const red = new Set(bonusTiles.filter((t) => suitOfOrdinal(t) === 'redBonus').map(rankOfOrdinal));
  const blueSet = hasAllRanks(blue);
  const redSet = hasAllRanks(red);

  if (blueSet && redSet) lines.push({ label: 'All Eight Flowers', points: 3 });
  else if (blueSet || redSet) lines.push({ label: 'Full Flower Set', points: 2 });
  else if (hasAllRanks(new Set([...blue, ...red]))) lines.push({ label: 'Mixed Flower Set', points: 1 });

  return lines;
}
