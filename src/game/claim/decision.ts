import { InvalidArgumentError } from '../../domain/errors';
import type { ReactionAction, ReactionCandidate } from './types';

/**
 * Claim priority: ron > kong = pon > chi > pass.
 * Kong and pon share a level, so between them the earlier candidate wins.
 */
export const REACTION_PRIORITY: Record<ReactionAction, number> = {
  ron: 3,
  kong: 2,
  pon: 2,
  chi: 1,
  pass: 0,
};

/**
 * Picks the single reaction that takes effect. Pure: only reads the list.
 * Ties go to the candidate registered first; when everyone passes, the
 * first candidate (a pass) is returned.
 */
export function resolveInterrupt(candidates: readonly ReactionCandidate[]): ReactionCandidate {
  const first = candidates[0];
  if (!first) throw new InvalidArgumentError('resolveInterrupt needs at least one candidate');

  let best = first;
  for (const c of candidates) {
    if (REACTION_PRIORITY[c.action] > REACTION_PRIORITY[best.action]) best = c;
  }
  return best;
}
