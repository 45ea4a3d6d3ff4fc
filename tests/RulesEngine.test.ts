import { InvalidArgumentError } from '../src/domain/errors';
import { SOUTH } from '../src/domain/Tile';
import { RulesEngine } from '../src/rules/RulesEngine';
import { scoreContextFor } from '../src/rules/scoring';
import { hand } from './helpers';

describe('RulesEngine', () => {
  const engine = new RulesEngine({ roundWind: SOUTH, reactionTimeoutMs: 500 });

  it('scores with the configured round wind', () => {
    const h = hand([101, 102, 103, 204, 205, 206, 307, 308, 309, 402, 402, 402, 503], { drawn: 503 });
    const analysis = engine.analyze(h);
    // seat 1 sits South, the same as the round
    expect(engine.score(analysis, scoreContextFor(h, 1, false))).toEqual({
      points: 3,
      breakdown: ['Seat Wind Triplet: +1', 'Round Wind Triplet: +1'],
    });
  });

  it('exposes the claim helpers', () => {
    expect(engine.enumerateChiOptions(hand([204, 205]), 203)).toEqual([{ discarded: 203, tiles: [204, 205] }]);
    expect(engine.resolveInterrupt([{ seat: 2, action: 'pass' }, { seat: 3, action: 'chi' }])).toEqual({ seat: 3, action: 'chi' });
    expect(engine.findConcealedKongs(hand([501, 501, 501, 501]))).toEqual([501]);
  });

  it('scores waits for the given seat', () => {
    const h = hand([101, 102, 103, 204, 205, 206, 307, 308, 309, 402, 402, 402, 503]);
    expect(engine.findWaitingTiles(h, 1)).toEqual([{ tile: 503, points: 6 }]);
    expect(engine.findWaitingTiles(h, 0)).toEqual([{ tile: 503, points: 5 }]);
  });

  it('creates arbiters with the configured timeout', () => {
    jest.useFakeTimers();
    try {
      const onResolved = jest.fn();
      const arbiter = engine.createArbiter({ onResolved, log: () => undefined });
      arbiter.open({ seat: 0, tile: 305 }, { 1: hand([305, 305]), 2: hand([]), 3: hand([]) });
      arbiter.submit({ seat: 1, action: 'pon' });
      expect(onResolved).toHaveBeenCalledWith({ seat: 1, action: 'pon' }, { seat: 0, tile: 305 });

      arbiter.open({ seat: 2, tile: 305 }, { 0: hand([305, 305]), 1: hand([]), 3: hand([]) });
      jest.advanceTimersByTime(500);
      expect(arbiter.resolution).toEqual({ seat: 1, action: 'pass' });
    } finally {
      jest.useRealTimers();
    }
  });

  it('rejects an empty candidate list', () => {
    expect(() => engine.resolveInterrupt([])).toThrow(InvalidArgumentError);
  });
});
