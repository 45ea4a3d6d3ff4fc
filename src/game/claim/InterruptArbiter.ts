import { InvalidArgumentError } from '../../domain/errors';
import type { Hand } from '../../domain/MahjongHand';
import { assertOrdinal, isBonus, tileCode } from '../../domain/Tile';
import { canRonOnDiscard } from '../hu';
import { isSeat, nextSeat, SEATS, type Seat } from '../Player';
import { enumerateChiOptions } from './chi';
import { canKong, canPon, sameChiOption } from './common';
import { resolveInterrupt } from './decision';
import type {
  ActionResult,
  ArbiterPhase,
  ChiOption,
  DiscardEvent,
  ReactionCandidate,
  ReactionOptions,
} from './types';

export type ArbiterOptions = {
  /** How long players get to react before missing answers count as pass. */
  timeoutMs: number;
  onResolved?: (winner: ReactionCandidate, discard: DiscardEvent) => void;
  log?: (message: string) => void;
};

export function reactionOptionsFor(hand: Hand, discard: DiscardEvent, seat: Seat): ReactionOptions {
  if (seat === discard.seat || isBonus(discard.tile)) return { seat, ron: false, kong: false, pon: false, chi: [] };
  return {
    seat,
    ron: canRonOnDiscard(hand, discard.tile),
    kong: canKong(hand, discard.tile),
    pon: canPon(hand, discard.tile),
    // only the next player may chi
    chi: seat === nextSeat(discard.seat) ? enumerateChiOptions(hand, discard.tile) : [],
  };
}

function hasAnyOption(o: ReactionOptions): boolean {
  return o.ron || o.kong || o.pon || o.chi.length > 0;
}

function fail(message: string): ActionResult {
  return { ok: false, message };
}

/**
 * Reaction window for one discard.
 *
 * idle -> awaitingReactions (-> awaitingChiChoice) -> resolved
 *
 * How a window plays out:
 * - open() works out what each of the other three seats may do. Seats with
 *   nothing to claim are registered as pass right away, in seat order.
 * - Every remaining seat answers once. Candidates keep the order they were
 *   registered in, and resolveInterrupt gives a tie (kong vs pon) to the
 *   earlier one, so "who submitted first" is the tie-break. Auto-passes sit
 *   at the front but never win a tie against a real claim.
 * - A chi with several possible pairs parks the window in awaitingChiChoice
 *   until chooseChi() names one; nothing resolves while that choice is open.
 * - When the timeout fires, every silent seat (and a seat still choosing its
 *   chi) counts as pass, appended in seat order.
 *
 * Exactly one candidate is reported per window, through onResolved.
 */
export class InterruptArbiter {
  private phase: ArbiterPhase = 'idle';
  private discard: DiscardEvent | null = null;
  private options = new Map<Seat, ReactionOptions>();
  private candidates: ReactionCandidate[] = [];
  /** Seat that chose chi but still has to pick one of several options. */
  private pendingChiSeat: Seat | null = null;
  private timer: NodeJS.Timeout | null = null;
  private outcome: ReactionCandidate | null = null;

  constructor(private readonly opts: ArbiterOptions) {}

  get currentPhase(): ArbiterPhase {
    return this.phase;
  }

  get currentDiscard(): DiscardEvent | null {
    return this.discard;
  }

  /** The reaction that took effect, once resolved. */
  get resolution(): ReactionCandidate | null {
    return this.outcome;
  }

  optionsFor(seat: Seat): ReactionOptions | null {
    return this.options.get(seat) ?? null;
  }

  /** Seats that still have to answer. */
  pendingSeats(): Seat[] {
    return [...this.options.keys()].filter((s) => !this.hasDecided(s)).sort((a, b) => a - b);
  }

  open(discard: DiscardEvent, hands: Partial<Record<Seat, Hand>>): ActionResult {
    if (this.isOpen()) return fail('a reaction window is already open');
    if (!isSeat(discard.seat)) throw new InvalidArgumentError(`seat must be 0-3, got ${String(discard.seat)}`);
    assertOrdinal(discard.tile);

    const options = new Map<Seat, ReactionOptions>();
    const autoPass: ReactionCandidate[] = [];
    for (const s of SEATS) {
      if (s === discard.seat) continue;
      const hand = hands[s];
      if (!hand) throw new InvalidArgumentError(`missing hand for seat ${s}`);
      const o = reactionOptionsFor(hand, discard, s);
      options.set(s, o);
      if (!hasAnyOption(o)) autoPass.push({ seat: s, action: 'pass' });
    }

    this.discard = discard;
    this.options = options;
    this.candidates = autoPass;
    this.pendingChiSeat = null;
    this.outcome = null;
    this.phase = 'awaitingReactions';

    if (this.tryResolve()) return { ok: true, message: `no one can claim ${tileCode(discard.tile)}` };

    this.timer = setTimeout(() => this.expire(), this.opts.timeoutMs);
    this.timer.unref();
    return { ok: true, message: `waiting for reactions to ${tileCode(discard.tile)}` };
  }

  submit(candidate: ReactionCandidate): ActionResult {
    if (!this.isOpen()) return fail('no reaction window is open');

    const { seat } = candidate;
    const o = this.options.get(seat);
    if (!o) return fail(`seat ${String(seat)} cannot react to its own discard`);
    if (this.hasDecided(seat)) return fail(`seat ${seat} has already reacted`);

    let accepted = candidate;
    switch (candidate.action) {
      case 'pass':
        accepted = { seat, action: 'pass' };
        break;
      case 'ron':
        if (!o.ron) return fail(`seat ${seat} cannot ron`);
        break;
      case 'kong':
        if (!o.kong) return fail(`seat ${seat} cannot kong`);
        break;
      case 'pon':
        if (!o.pon) return fail(`seat ${seat} cannot pon`);
        break;
      case 'chi': {
        if (o.chi.length === 0) return fail(`seat ${seat} cannot chi`);
        const wanted = candidate.chi;
        if (wanted) {
          const match = o.chi.find((x) => sameChiOption(x, wanted));
          if (!match) return fail('not a valid chi option');
          accepted = { seat, action: 'chi', chi: match };
        } else if (o.chi.length === 1) {
          accepted = { seat, action: 'chi', chi: o.chi[0] };
        } else {
          this.pendingChiSeat = seat;
          this.phase = 'awaitingChiChoice';
          return { ok: true, message: `seat ${seat} must choose one of ${o.chi.length} chi options` };
        }
        break;
      }
    }

    this.candidates.push(accepted);
    const resolved = this.tryResolve();
    return { ok: true, message: resolved ? `seat ${seat} ${accepted.action} (resolved)` : `seat ${seat} ${accepted.action} (waiting for others)` };
  }

  chooseChi(seat: Seat, option: ChiOption): ActionResult {
    if (this.phase !== 'awaitingChiChoice' || this.pendingChiSeat !== seat) return fail(`seat ${seat} has no chi choice pending`);
    const match = this.options.get(seat)?.chi.find((x) => sameChiOption(x, option));
    if (!match) return fail('not a valid chi option');

    this.pendingChiSeat = null;
    this.phase = 'awaitingReactions';
    this.candidates.push({ seat, action: 'chi', chi: match });
    const resolved = this.tryResolve();
    return { ok: true, message: resolved ? `seat ${seat} chi (resolved)` : `seat ${seat} chi (waiting for others)` };
  }

  /** Drops the current window without reporting a result. */
  cancel() {
    this.clearTimer();
    this.phase = 'idle';
    this.discard = null;
    this.options = new Map();
    this.candidates = [];
    this.pendingChiSeat = null;
    this.outcome = null;
  }

  private isOpen(): boolean {
    return this.phase === 'awaitingReactions' || this.phase === 'awaitingChiChoice';
  }

  private hasDecided(seat: Seat): boolean {
    return this.pendingChiSeat === seat || this.candidates.some((c) => c.seat === seat);
  }

  private tryResolve(): boolean {
    if (this.pendingChiSeat !== null) return false;
    if (this.candidates.length < this.options.size) return false;
    this.finish(resolveInterrupt(this.candidates));
    return true;
  }

  private expire() {
    this.timer = null;
    if (!this.isOpen()) return;

    const missing = [...this.options.keys()].filter((s) => !this.candidates.some((c) => c.seat === s));
    this.log(`[interrupt] reaction window timed out; seats ${missing.join(',')} pass`);

    this.pendingChiSeat = null;
    for (const s of missing.sort((a, b) => a - b)) this.candidates.push({ seat: s, action: 'pass' });
    this.finish(resolveInterrupt(this.candidates));
  }

  private finish(winner: ReactionCandidate) {
    this.clearTimer();
    const discard = this.discard;
    this.phase = 'resolved';
    this.outcome = winner;
    this.candidates = [];
    if (!discard || !this.opts.onResolved) return;

    // finish() also runs from the timer, where a throw would be uncaught
    try {
      this.opts.onResolved(winner, discard);
    } catch (err) {
      this.log(`[interrupt] onResolved listener failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private log(message: string) {
    (this.opts.log ?? console.log)(message);
  }

  private clearTimer() {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }
}
