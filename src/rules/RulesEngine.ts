import type { EngineConfig } from '../config';
import type { Hand } from '../domain/MahjongHand';
import { type AnalysisResult, WinAnalyzer } from '../domain/WinAnalyzer';
import { enumerateChiOptions } from '../game/claim/chi';
import { resolveInterrupt } from '../game/claim/decision';
import { type ArbiterOptions, InterruptArbiter } from '../game/claim/InterruptArbiter';
import type { ChiOption, ReactionCandidate } from '../game/claim/types';
import { assertSeat, type Seat } from '../game/Player';
import { type ScoreContext, type ScoreResult, scoreHand } from './scoring';
import { findConcealedKongs, findWaitingTiles, type WaitingTile } from './waits';

export type RulesEngineOptions = Pick<EngineConfig, 'roundWind' | 'reactionTimeoutMs'>;

/**
 * Entry point for the surrounding game: one instance per table (or process),
 * created with the round settings and passed to whoever needs it.
 */
export class RulesEngine {
  constructor(private readonly opts: RulesEngineOptions) {}

  get roundWind(): number {
    return this.opts.roundWind;
  }

  analyze(hand: Hand): AnalysisResult {
    return WinAnalyzer.analyze(hand);
  }

  score(analysis: AnalysisResult, ctx: ScoreContext): ScoreResult {
    return scoreHand(analysis, ctx, { roundWind: this.opts.roundWind });
  }

  enumerateChiOptions(hand: Hand, discarded: number): ChiOption[] {
    return enumerateChiOptions(hand, discarded);
  }

  resolveInterrupt(candidates: readonly ReactionCandidate[]): ReactionCandidate {
    return resolveInterrupt(candidates);
  }

  findWaitingTiles(hand: Hand, seat: Seat): WaitingTile[] {
    return findWaitingTiles(hand, assertSeat(seat), { roundWind: this.opts.roundWind });
  }

  findConcealedKongs(hand: Hand): number[] {
    return findConcealedKongs(hand);
  }

  /** A fresh reaction window using the configured timeout. */
  createArbiter(hooks: Omit<ArbiterOptions, 'timeoutMs'> = {}): InterruptArbiter {
    return new InterruptArbiter({ ...hooks, timeoutMs: this.opts.reactionTimeoutMs });
  }
}
