import { InvalidTileError } from './errors';

export type Suit = 'characters' | 'circles' | 'bamboos' | 'wind' | 'dragon' | 'blueBonus' | 'redBonus';

export type Tile = { readonly suit: Suit; readonly rank: number };

/** Suit index used as the hundreds digit of an ordinal. */
export const SUIT_INDEX: Record<Suit, number> = {
  characters: 1,
  circles: 2,
  bamboos: 3,
  wind: 4,
  dragon: 5,
  blueBonus: 6,
  redBonus: 7,
};

export const SUITS: Suit[] = ['characters', 'circles', 'bamboos', 'wind', 'dragon', 'blueBonus', 'redBonus'];

const MAX_RANK: Record<Suit, number> = {
  characters: 9,
  circles: 9,
  bamboos: 9,
  wind: 4,
  dragon: 3,
  blueBonus: 8,
  redBonus: 8,
};

// Short codes: m/p/s suited, w winds, d dragons, b/r bonus
const CODE_PREFIX: Record<Suit, string> = {
  characters: 'm',
  circles: 'p',
  bamboos: 's',
  wind: 'w',
  dragon: 'd',
  blueBonus: 'b',
  redBonus: 'r',
};

export const EAST = 401;
export const SOUTH = 402;
export const WEST = 403;
export const NORTH = 404;
export const WINDS: readonly number[] = [EAST, SOUTH, WEST, NORTH];
export const DRAGONS: readonly number[] = [501, 502, 503];

/** Terminals of the three suits plus every honor: the thirteen orphans. */
export const TERMINALS_AND_HONORS: readonly number[] = [
  101, 109, 201, 209, 301, 309,
  401, 402, 403, 404,
  501, 502, 503,
];

function suitOfIndex(i: number): Suit | null {
  return SUITS.find((s) => SUIT_INDEX[s] === i) ?? null;
}

export function isValidRank(suit: Suit, rank: number): boolean {
  return Number.isInteger(rank) && rank >= 1 && rank <= MAX_RANK[suit];
}

export function makeTile(suit: Suit, rank: number): Tile {
  if (!isValidRank(suit, rank)) throw new InvalidTileError(`rank ${rank} is out of range for ${suit}`);
  return { suit, rank };
}

export function ordinalOf(t: Tile): number {
  return SUIT_INDEX[t.suit] * 100 + t.rank;
}

export function tileOf(ordinal: number): Tile {
  if (!Number.isInteger(ordinal)) throw new InvalidTileError(`ordinal ${ordinal} is not an integer`);
  const suit = suitOfIndex(Math.floor(ordinal / 100));
  if (!suit) throw new InvalidTileError(`ordinal ${ordinal} has no valid suit`);
  return makeTile(suit, ordinal % 100);
}

export function isOrdinal(ordinal: number): boolean {
  if (!Number.isInteger(ordinal)) return false;
  const suit = suitOfIndex(Math.floor(ordinal / 100));
  return suit !== null && isValidRank(suit, ordinal % 100);
}

/** Throws InvalidTileError unless `ordinal` names a real tile. */
export function assertOrdinal(ordinal: number): number {
  tileOf(ordinal);
  return ordinal;
}

export function suitOfOrdinal(ordinal: number): Suit {
  return tileOf(ordinal).suit;
}

export function rankOfOrdinal(ordinal: number): number {
  return ordinal % 100;
}

export function isSuited(ordinal: number): boolean {
  const i = Math.floor(ordinal / 100);
  return i >= 1 && i <= 3;
}

export function isHonor(ordinal: number): boolean {
  const i = Math.floor(ordinal / 100);
  return i === 4 || i === 5;
}

export function isBonus(ordinal: number): boolean {
  const i = Math.floor(ordinal / 100);
  return i === 6 || i === 7;
}

export function compareTiles(a: Tile, b: Tile): number {
  return ordinalOf(a) - ordinalOf(b);
}

export function tileCode(ordinal: number): string {
  const t = tileOf(ordinal);
  return `${CODE_PREFIX[t.suit]}${t.rank}`;
}

export function parseTile(code: string): number {
  const m = /^([mpswdbr])([1-9])$/.exec(code.trim());
  const suit = m ? SUITS.find((s) => CODE_PREFIX[s] === m[1]) : undefined;
  if (!m || !suit) throw new InvalidTileError(`unknown tile code '${code}'`);
  return ordinalOf(makeTile(suit, Number(m[2])));
}

/** Every functional (non-bonus) ordinal in ascending order: 27 suited tiles plus 7 honors. */
export function functionalOrdinals(): number[] {
  const out: number[] = [];
  for (const s of SUITS) {
    if (s === 'blueBonus' || s === 'redBonus') continue;
    for (let r = 1; r <= MAX_RANK[s]; r++) out.push(SUIT_INDEX[s] * 100 + r);
  }
  return out;
}
