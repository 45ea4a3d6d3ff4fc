import cors from 'cors';
import express, { type ErrorRequestHandler } from 'express';
import { EngineError } from './domain/errors';
import { tileCode } from './domain/Tile';
import {
  parseBoolean,
  parseCandidates,
  parseHand,
  parseSeat,
  parseTileValue,
  requireObject,
} from './net/dto';
import type { RulesEngine } from './rules/RulesEngine';
import { scoreContextFor } from './rules/scoring';

export type AppOptions = {
  log?: (message: string) => void;
};

/**
 * Stateless JSON surface over the engine: each request carries the snapshot it
 * is about and gets the derived result back.
 */
export function createApp(engine: RulesEngine, opts: AppOptions = {}) {
  const log = opts.log ?? console.log;
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.post('/analyze', (req, res) => {
    const body = requireObject(req.body, 'body');
    res.json(engine.analyze(parseHand(body.hand)));
  });

  app.post('/score', (req, res) => {
    const body = requireObject(req.body, 'body');
    const hand = parseHand(body.hand);
    const seat = parseSeat(body.seat);
    const selfDrawn = parseBoolean(body.selfDrawn, 'selfDrawn');
    const analysis = engine.analyze(hand);
    const { points, breakdown } = engine.score(analysis, scoreContextFor(hand, seat, selfDrawn));
    res.json({ analysis, points, breakdown });
  });

  app.post('/chi-options', (req, res) => {
    const body = requireObject(req.body, 'body');
    const hand = parseHand(body.hand);
    res.json(engine.enumerateChiOptions(hand, parseTileValue(body.discarded, 'discarded')));
  });

  app.post('/resolve', (req, res) => {
    const body = requireObject(req.body, 'body');
    res.json(engine.resolveInterrupt(parseCandidates(body.candidates)));
  });

  app.post('/waits', (req, res) => {
    const body = requireObject(req.body, 'body');
    const waits = engine.findWaitingTiles(parseHand(body.hand), parseSeat(body.seat));
    res.json(waits.map((w) => ({ tile: w.tile, code: tileCode(w.tile), points: w.points })));
  });

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof EngineError) {
      res.status(400).json({ ok: false, error: err.name, message: err.message });
      return;
    }
    // body-parser rejects malformed JSON with a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ ok: false, error: 'InvalidArgumentError', message: 'request body is not valid JSON' });
      return;
    }
    log(`[mahjong-rules] unexpected error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    res.status(500).json({ ok: false, error: 'InternalError', message: 'internal error' });
  };
  app.use(onError);

  return app;
}
