import { countOrdinals, totalCount } from './counts';
import { MalformedHandError } from './errors';
import { HandDecomposer, type PairedDecomposition } from './HandDecomposer';
import { assertMeldShape, type Hand, liveTiles } from './MahjongHand';
import { isSevenPairs, isThirteenOrphans } from './specialHands';
import { assertOrdinal, isBonus, isHonor, isSuited, suitOfOrdinal } from './Tile';

export type WinKind = 'none' | 'thirteenOrphans' | 'sevenPairs' | 'pureFallback' | 'traditional';

export type AnalysisResult = {
  readonly isWinning: boolean;
  readonly isTraditional: boolean;
  readonly isSevenPairs: boolean;
  readonly isThirteenOrphans: boolean;
  readonly isPureSuit: boolean;
  readonly isHalfSuit: boolean;
  /** No group was claimed from a discard. */
  readonly isFullyConcealed: boolean;
  /** All four groups were claimed from discards and none was self-declared. */
  readonly isFullyExposed: boolean;
  readonly bonusTileCount: number;
  /** Pair ordinal of a traditional win, otherwise null. */
  readonly pair: number | null;
  /** Triplet roots, including claimed triplets and every quad. */
  readonly triplets: readonly number[];
  /** Sequence roots, including claimed sequences. */
  readonly sequences: readonly number[];
  /** Which scoring tier the win falls in; exactly one applies. */
  readonly winKind: WinKind;
};

/**
 * Groups that must come from the concealed tiles once exposed groups are
 * taken out. Outside 0..4 the bookkeeping cannot add up.
 */
export function setsNeededFromConcealed(hand: Hand): number {
  const exposed = hand.selfKongs.length + hand.melds.length;
  const needed = 4 - exposed;
  if (needed < 0 || needed > 4) {
    throw new MalformedHandError(`hand has ${exposed} exposed groups; at most 4 are possible`);
  }
  return needed;
}

function validateTiles(hand: Hand) {
  for (const t of hand.concealed) assertOrdinal(t);
  if (hand.drawn !== null) assertOrdinal(hand.drawn);
  for (const t of hand.selfKongs) {
    assertOrdinal(t);
    if (isBonus(t)) throw new MalformedHandError('bonus tiles cannot form a kong');
  }
  for (const t of hand.bonus) assertOrdinal(t);
  for (const m of hand.melds) assertMeldShape(m);
}

/** Every non-bonus tile the player owns: concealed, drawn, quads and melds. */
function functionalTiles(hand: Hand): number[] {
  const out = liveTiles(hand).filter((t) => !isBonus(t));
  for (const k of hand.selfKongs) out.push(k, k, k, k);
  for (const m of hand.melds) out.push(...m.tiles);
  return out;
}

function suitFlags(tiles: number[]): { isPureSuit: boolean; isHalfSuit: boolean } {
  const suits = new Set(tiles.map(suitOfOrdinal));
  const numbered = tiles.filter(isSuited).map(suitOfOrdinal);
  const numberedSuits = new Set(numbered).size;
  const hasHonor = tiles.some(isHonor);

  const isPureSuit = suits.size === 1 && numberedSuits === 1;
  const isHalfSuit = numberedSuits === 1 && hasHonor && tiles.length >= 14;
  return { isPureSuit, isHalfSuit };
}

function freeze(r: AnalysisResult): AnalysisResult {
  Object.freeze(r.triplets);
  Object.freeze(r.sequences);
  return Object.freeze(r);
}

/**
 * Turns a hand snapshot into an AnalysisResult.
 *
 * Order of work:
 * 1. Validate every tile and meld; bad input throws (InvalidTileError,
 *    MalformedHandError).
 * 2. Strip bonus tiles out of the structural count; they only feed
 *    `bonusTileCount`.
 * 3. If the remaining tiles do not add up to groups plus a pair, the hand
 *    simply does not win. No error: waits and ron checks feed partial hands.
 * 4. Check the concealed-only special hands, then always run the traditional
 *    decomposition so its groups are reported even for a seven-pairs shape.
 * 5. Fold exposed and self-declared groups into the triplet/sequence lists.
 * 6. Pick the single `winKind` that scoring uses.
 */
export class WinAnalyzer {
  static analyze(hand: Hand): AnalysisResult {
    validateTiles(hand);
    const setsNeeded = setsNeededFromConcealed(hand);

    const live = liveTiles(hand);
    const bonusTileCount = hand.bonus.length + live.filter(isBonus).length;
    const counts = countOrdinals(live.filter((t) => !isBonus(t)));

    const { isPureSuit, isHalfSuit } = suitFlags(functionalTiles(hand));
    const isFullyConcealed = hand.melds.length === 0;
    const isFullyExposed = hand.melds.length === 4 && hand.selfKongs.length === 0;

    let thirteenOrphans = false;
    let sevenPairs = false;
    let decomposition: PairedDecomposition | null = null;

    // A wrong tile count is a normal non-win, not an error: callers check
    // half-built hands (waits, ron checks) and only want a yes or no. Exposed
    // groups that cannot add up are still thrown above as MalformedHandError.
    const countOk = totalCount(counts) === 3 * setsNeeded + 2;
    if (countOk) {
      // special hands are concealed-only
      if (setsNeeded === 4) {
        thirteenOrphans = isThirteenOrphans(counts);
        sevenPairs = !thirteenOrphans && isSevenPairs(counts);
      }
      // Always tried, so a seven-pairs shape that is also four groups plus a
      // pair still reports its decomposition. winKind decides how it scores.
      decomposition = HandDecomposer.findPairAndSets(counts, setsNeeded);
    }

    const triplets = decomposition ? [...decomposition.triplets] : [];
    const sequences = decomposition ? [...decomposition.sequences] : [];
    if (decomposition) {
      for (const k of hand.selfKongs) {
        if (!triplets.includes(k)) triplets.push(k);
      }
      for (const m of hand.melds) {
        const root = Math.min(...m.tiles);
        if (m.kind === 'chi') sequences.push(root);
        else if (!triplets.includes(root)) triplets.push(root);
      }
    }

    const isTraditional = decomposition !== null;
    // exactly one tier applies; the flags above may overlap
    let winKind: WinKind = 'none';
    if (thirteenOrphans) winKind = 'thirteenOrphans';
    else if (sevenPairs) winKind = 'sevenPairs';
    else if (isTraditional) winKind = 'traditional';
    else if (isPureSuit && countOk) winKind = 'pureFallback';

    return freeze({
      isWinning: winKind !== 'none',
      isTraditional,
      isSevenPairs: sevenPairs,
      isThirteenOrphans: thirteenOrphans,
      isPureSuit,
      isHalfSuit,
      isFullyConcealed,
      isFullyExposed,
      bonusTileCount,
      pair: decomposition ? decomposition.pair : null,
      triplets,
      sequences,
      winKind,
    });
  }
}
