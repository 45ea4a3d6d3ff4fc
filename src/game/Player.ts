import { InvalidArgumentError } from '../domain/errors';
import { EAST } from '../domain/Tile';

export type Seat = 0 | 1 | 2 | 3;

export const SEATS: readonly Seat[] = [0, 1, 2, 3];

export function isSeat(v: unknown): v is Seat {
  return v === 0 || v === 1 || v === 2 || v === 3;
}

export function assertSeat(v: unknown): Seat {
  if (!isSeat(v)) throw new InvalidArgumentError(`seat must be 0-3, got ${String(v)}`);
  return v;
}

/** Seat 0 sits East, then South, West, North. */
export function seatWind(seat: Seat): number {
  return EAST + seat;
}

/** The seat that plays after `seat`, the only one allowed to chi its discard. */
export function nextSeat(seat: Seat): Seat {
  return SEATS[(seat + 1) % 4] ?? 0;
}
