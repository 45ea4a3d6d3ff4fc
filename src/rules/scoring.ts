import type { AnalysisResult } from '../domain/WinAnalyzer';
import { InvalidArgumentError } from '../domain/errors';
import { claimedKongCount, type Hand, liveTiles } from '../domain/MahjongHand';
import { DRAGONS, EAST, isBonus } from '../domain/Tile';
import { assertSeat, type Seat, seatWind } from '../game/Player';
import { bonusTileLines, formatLine, type ScoreLine } from './bonusTiles';

export type ScoreContext = {
  seat: Seat;
  selfDrawn: boolean;
  /** Quads declared from the player's own tiles. */
  selfKongs: number;
  /** Quads claimed from a discard. */
  claimedKongs: number;
  bonusTiles: readonly number[];
};

export type ScoreOptions = {
  /** Wind ordinal of the current round. */
  roundWind: number;
};

export type ScoreResult = { points: number; breakdown: string[] };

const BASE_POINTS = 1;

function assertCount(name: string, v: number) {
  if (!Number.isInteger(v) || v < 0) throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${v}`);
}

function sum(lines: ScoreLine[]): number {
  return lines.reduce((a, l) => a + l.points, 0);
}

function result(lines: ScoreLine[]): ScoreResult {
  return { points: BASE_POINTS + sum(lines), breakdown: lines.map(formatLine) };
}

function mannerLines(a: AnalysisResult, ctx: ScoreContext): ScoreLine[] {
  const lines: ScoreLine[] = [];
  if (ctx.selfDrawn && a.isFullyConcealed) lines.push({ label: 'Fully Concealed Self-Draw', points: 3 });
  else if (ctx.selfDrawn) lines.push({ label: 'Self-Draw', points: 1 });

  if (!ctx.selfDrawn && a.isFullyExposed && ctx.selfKongs === 0) {
    lines.push({ label: 'Fully Exposed Hand', points: 2 });
  }

  if (ctx.selfKongs > 0) lines.push({ label: `Self-Declared Kong x${ctx.selfKongs}`, points: 2 * ctx.selfKongs });
  if (ctx.claimedKongs > 0) lines.push({ label: `Claimed Kong x${ctx.claimedKongs}`, points: ctx.claimedKongs });
  return lines;
}

function compositionLines(a: AnalysisResult, ctx: ScoreContext, opts: ScoreOptions): ScoreLine[] {
  const lines: ScoreLine[] = [];
  if (a.isPureSuit) lines.push({ label: 'Pure Hand', points: 4 });
  else if (a.isHalfSuit) lines.push({ label: 'Half Hand', points: 2 });

  // a hand cannot be both; four groups are either all runs or all sets
  if (a.sequences.length === 4) lines.push({ label: 'All Sequences', points: 1 });
  else if (a.triplets.length === 4) lines.push({ label: 'All Triplets', points: 2 });

  if (a.triplets.some((t) => DRAGONS.includes(t))) lines.push({ label: 'Dragon Triplet', points: 1 });
  if (a.triplets.includes(seatWind(ctx.seat))) lines.push({ label: 'Seat Wind Triplet', points: 1 });
  if (a.triplets.includes(opts.roundWind)) lines.push({ label: 'Round Wind Triplet', points: 1 });
  return lines;
}

/**
 * Points for an analyzed hand. The tiers are exclusive and checked in order:
 * thirteen orphans, seven pairs, the pure-hand fallback, then a traditional
 * 4-groups-plus-pair win where every bonus stacks.
 */
export function scoreHand(a: AnalysisResult, ctx: ScoreContext, opts: ScoreOptions = { roundWind: EAST }): ScoreResult {
  assertSeat(ctx.seat);
  assertCount('selfKongs', ctx.selfKongs);
  assertCount('claimedKongs', ctx.claimedKongs);

  if (!a.isWinning) return { points: 0, breakdown: [] };

  // flat score; flowers are ignored
  if (a.winKind === 'thirteenOrphans') return { points: 8, breakdown: ['Thirteen Orphans: +8'] };

  const flowers = bonusTileLines(ctx.seat, ctx.bonusTiles);

  if (a.winKind === 'sevenPairs') return result([...flowers, { label: 'Seven Pairs', points: 3 }]);
  if (a.winKind === 'pureFallback') return result([...flowers, { label: 'Pure Hand (Non-Traditional)', points: 3 }]);

  return result([...mannerLines(a, ctx), ...flowers, ...compositionLines(a, ctx, opts)]);
}

/**
 * Score context taken from a hand snapshot: quad counts from its groups and
 * bonus tiles from both the bonus row and any still mixed into the hand.
 */
export function scoreContextFor(hand: Hand, seat: Seat, selfDrawn: boolean): ScoreContext {
  return {
    seat,
    selfDrawn,
    selfKongs: hand.selfKongs.length,
    claimedKongs: claimedKongCount(hand),
    bonusTiles: [...hand.bonus, ...liveTiles(hand).filter(isBonus)],
  };
}
