/**
 * Library entry. The HTTP server boots from `main.ts`; everything a game
 * loop needs to analyze, score and arbitrate claims is exported here.
 */
export { RulesEngine, type RulesEngineOptions } from './rules/RulesEngine';
export { DEFAULT_CONFIG, loadConfig, type EngineConfig } from './config';
export { createApp, type AppOptions } from './server';

export { EngineError, InvalidArgumentError, InvalidTileError, MalformedHandError, type EngineErrorCode } from './domain/errors';
export {
  DRAGONS,
  EAST,
  NORTH,
  SOUTH,
  TERMINALS_AND_HONORS,
  WEST,
  WINDS,
  functionalOrdinals,
  isBonus,
  isHonor,
  isSuited,
  makeTile,
  ordinalOf,
  parseTile,
  tileCode,
  tileOf,
  type Suit,
  type Tile,
} from './domain/Tile';
export { assertMeldShape, emptyHand, type ExposedMeld, type Hand, type MeldKind } from './domain/MahjongHand';
export { WinAnalyzer, type AnalysisResult, type WinKind } from './domain/WinAnalyzer';
export { scoreContextFor, scoreHand, type ScoreContext, type ScoreOptions, type ScoreResult } from './rules/scoring';
export { findConcealedKongs, findWaitingTiles, type WaitingTile } from './rules/waits';
export { InterruptArbiter, reactionOptionsFor, type ArbiterOptions } from './game/claim/InterruptArbiter';
export type {
  ActionResult,
  ArbiterPhase,
  ChiOption,
  DiscardEvent,
  ReactionAction,
  ReactionCandidate,
  ReactionOptions,
} from './game/claim/types';
export { SEATS, isSeat, seatWind, nextSeat, type Seat } from './game/Player';
