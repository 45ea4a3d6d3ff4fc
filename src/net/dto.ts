import { InvalidArgumentError } from '../domain/errors';
import type { ExposedMeld, Hand, MeldKind } from '../domain/MahjongHand';
import { assertOrdinal, parseTile } from '../domain/Tile';
import type { ChiOption, ReactionAction, ReactionCandidate } from '../game/claim/types';
import { assertSeat, type Seat } from '../game/Player';

/**
 * Request bodies of the HTTP surface. Everything arrives as `unknown` JSON and
 * is narrowed here; bad input becomes an InvalidArgumentError (or
 * InvalidTileError for a tile that does not exist).
 */

const MELD_KINDS: readonly MeldKind[] = ['chi', 'pon', 'kong'];
const ACTIONS: readonly ReactionAction[] = ['pass', 'chi', 'pon', 'kong', 'ron'];

type Json = Record<string, unknown>;

function isRecord(v: unknown): v is Json {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function requireObject(v: unknown, field: string): Json {
  if (!isRecord(v)) throw new InvalidArgumentError(`${field} must be an object`);
  return v;
}

/** A tile as an ordinal (`101`, `"101"`) or a short code (`"m1"`). */
export function parseTileValue(v: unknown, field: string): number {
  if (typeof v === 'number') return assertOrdinal(v);
  if (typeof v === 'string') return /^\d+$/.test(v.trim()) ? assertOrdinal(Number(v)) : parseTile(v);
  throw new InvalidArgumentError(`${field} must be a tile ordinal or code`);
}

export function parseTileList(v: unknown, field: string): number[] {
  if (v === undefined) return [];
  if (!Array.isArray(v)) throw new InvalidArgumentError(`${field} must be an array of tiles`);
  return v.map((t, i) => parseTileValue(t, `${field}[${i}]`));
}

function parseMeldKind(v: unknown, field: string): MeldKind {
  const kind = MELD_KINDS.find((k) => k === v);
  if (!kind) throw new InvalidArgumentError(`${field} must be one of ${MELD_KINDS.join(', ')}`);
  return kind;
}

function parseMeld(v: unknown, field: string): ExposedMeld {
  const m = requireObject(v, field);
  return {
    kind: parseMeldKind(m.kind, `${field}.kind`),
    tiles: parseTileList(m.tiles, `${field}.tiles`),
    claimed: parseTileValue(m.claimed, `${field}.claimed`),
  };
}

export function parseHand(v: unknown): Hand {
  const h = requireObject(v, 'hand');
  const melds = h.melds === undefined ? [] : h.melds;
  if (!Array.isArray(melds)) throw new InvalidArgumentError('hand.melds must be an array');
  return {
    concealed: parseTileList(h.concealed, 'hand.concealed'),
    drawn: h.drawn === undefined || h.drawn === null ? null : parseTileValue(h.drawn, 'hand.drawn'),
    selfKongs: parseTileList(h.selfKongs, 'hand.selfKongs'),
    melds: melds.map((m, i) => parseMeld(m, `hand.melds[${i}]`)),
    bonus: parseTileList(h.bonus, 'hand.bonus'),
  };
}

export function parseSeat(v: unknown): Seat {
  return assertSeat(typeof v === 'string' && v.trim() !== '' ? Number(v) : v);
}

export function parseBoolean(v: unknown, field: string): boolean {
  if (typeof v !== 'boolean') throw new InvalidArgumentError(`${field} must be true or false`);
  return v;
}

export function parseChiOption(v: unknown, field: string): ChiOption {
  const o = requireObject(v, field);
  const tiles = parseTileList(o.tiles, `${field}.tiles`);
  const [a, b] = tiles;
  if (tiles.length !== 2 || a === undefined || b === undefined) {
    throw new InvalidArgumentError(`${field}.tiles must hold exactly two tiles`);
  }
  return { discarded: parseTileValue(o.discarded, `${field}.discarded`), tiles: [a, b] };
}

export function parseCandidate(v: unknown, field: string): ReactionCandidate {
  const c = requireObject(v, field);
  const action = ACTIONS.find((a) => a === c.action);
  if (!action) throw new InvalidArgumentError(`${field}.action must be one of ${ACTIONS.join(', ')}`);
  const seat = parseSeat(c.seat);
  if (c.chi === undefined) return { seat, action };
  return { seat, action, chi: parseChiOption(c.chi, `${field}.chi`) };
}

export function parseCandidates(v: unknown): ReactionCandidate[] {
  if (!Array.isArray(v)) throw new InvalidArgumentError('candidates must be an array');
  return v.map((c, i) => parseCandidate(c, `candidates[${i}]`));
}
