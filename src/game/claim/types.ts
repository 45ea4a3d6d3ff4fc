import type { Seat } from '../Player';

/**
 * Data types of the claim window: after a discard, every other player may
 * react with ron / kong / pon / chi or pass.
 */

export type ReactionAction = 'pass' | 'chi' | 'pon' | 'kong' | 'ron';

/** Two hand tiles that complete a sequence with the discarded tile. */
export type ChiOption = {
  discarded: number;
  tiles: [number, number];
};

export type ReactionCandidate = {
  seat: Seat;
  action: ReactionAction;
  /** Required for a resolved chi; may be left out while the player still has to pick. */
  chi?: ChiOption;
};

export type DiscardEvent = { seat: Seat; tile: number };

/** What one seat is allowed to do with the current discard. */
export type ReactionOptions = {
  seat: Seat;
  ron: boolean;
  kong: boolean;
  pon: boolean;
  chi: ChiOption[];
};

export type ArbiterPhase = 'idle' | 'awaitingReactions' | 'awaitingChiChoice' | 'resolved';

export type ActionResult = { ok: boolean; message: string };
