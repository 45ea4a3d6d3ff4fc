import { MalformedHandError } from './errors';
import { assertOrdinal, isBonus, isSuited } from './Tile';

export type MeldKind = 'chi' | 'pon' | 'kong';

/** A group claimed from another player's discard. `claimed` is the discarded ordinal. */
export type ExposedMeld = {
  readonly kind: MeldKind;
  readonly tiles: readonly number[];
  readonly claimed: number;
};

/**
 * Read-only snapshot of one player's tiles, as handed over by the turn
 * management layer. Every tile is an ordinal (`suit * 100 + rank`).
 */
export type Hand = {
  readonly concealed: readonly number[];
  readonly drawn: number | null;
  /** Ordinal of each self-declared (concealed-origin) quad. */
  readonly selfKongs: readonly number[];
  readonly melds: readonly ExposedMeld[];
  readonly bonus: readonly number[];
};

export function emptyHand(): Hand {
  return { concealed: [], drawn: null, selfKongs: [], melds: [], bonus: [] };
}

export function claimedKongCount(hand: Hand): number {
  return hand.melds.filter((m) => m.kind === 'kong').length;
}

/** Concealed tiles plus the drawn tile, in hand order. */
export function liveTiles(hand: Hand): number[] {
  return hand.drawn === null ? [...hand.concealed] : [...hand.concealed, hand.drawn];
}

/** Throws MalformedHandError unless the meld is a legal chi/pon/kong containing its claimed tile. */
export function assertMeldShape(meld: ExposedMeld): void {
  const tiles = meld.tiles.map(assertOrdinal).slice().sort((a, b) => a - b);
  assertOrdinal(meld.claimed);
  if (!tiles.includes(meld.claimed)) throw new MalformedHandError(`claimed tile ${meld.claimed} is not part of its ${meld.kind}`);

  const first = tiles[0];
  if (first === undefined) throw new MalformedHandError(`empty ${meld.kind}`);
  if (isBonus(first)) throw new MalformedHandError('bonus tiles cannot be melded');

  const size = meld.kind === 'kong' ? 4 : 3;
  if (tiles.length !== size) throw new MalformedHandError(`${meld.kind} must have ${size} tiles, got ${tiles.length}`);

  if (meld.kind === 'chi') {
    const ok = isSuited(first) && (first % 100) <= 7 && tiles[1] === first + 1 && tiles[2] === first + 2;
    if (!ok) throw new MalformedHandError(`chi ${tiles.join(',')} is not a suited run`);
    return;
  }
  if (tiles.some((t) => t !== first)) throw new MalformedHandError(`${meld.kind} ${tiles.join(',')} mixes tiles`);
}
