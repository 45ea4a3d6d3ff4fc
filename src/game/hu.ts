import type { Hand } from '../domain/MahjongHand';
import { WinAnalyzer } from '../domain/WinAnalyzer';

/** The hand with `tile` taken in as its drawn tile. */
export function handWithTile(hand: Hand, tile: number): Hand {
  const concealed = hand.drawn === null ? [...hand.concealed] : [...hand.concealed, hand.drawn];
  return { ...hand, concealed, drawn: tile };
}

export function canRonOnDiscard(hand: Hand, discard: number): boolean {
  return WinAnalyzer.analyze(handWithTile(hand, discard)).isWinning;
}
