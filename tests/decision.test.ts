import { InvalidArgumentError } from '../src/domain/errors';
import { resolveInterrupt } from '../src/game/claim/decision';
import type { ReactionCandidate } from '../src/game/claim/types';

describe('resolveInterrupt', () => {
  it('picks the first pon over an earlier chi', () => {
    const candidates: ReactionCandidate[] = [
      { seat: 3, action: 'chi', chi: { discarded: 205, tiles: [203, 204] } },
      { seat: 1, action: 'pon' },
      { seat: 2, action: 'pon' },
    ];
    expect(resolveInterrupt(candidates)).toEqual({ seat: 1, action: 'pon' });
  });

  it('lets ron beat everything', () => {
    expect(resolveInterrupt([{ seat: 1, action: 'kong' }, { seat: 2, action: 'ron' }])).toEqual({ seat: 2, action: 'ron' });
  });

  it('treats kong and pon as equals', () => {
    expect(resolveInterrupt([{ seat: 2, action: 'kong' }, { seat: 1, action: 'pon' }])).toEqual({ seat: 2, action: 'kong' });
    expect(resolveInterrupt([{ seat: 1, action: 'pon' }, { seat: 2, action: 'kong' }])).toEqual({ seat: 1, action: 'pon' });
  });

  it('returns the first candidate when everyone passes', () => {
    expect(resolveInterrupt([{ seat: 3, action: 'pass' }, { seat: 1, action: 'pass' }])).toEqual({ seat: 3, action: 'pass' });
  });

  it('does not touch the input', () => {
    const candidates: ReactionCandidate[] = [{ seat: 1, action: 'chi' }, { seat: 2, action: 'pon' }];
    resolveInterrupt(candidates);
    expect(candidates).toEqual([{ seat: 1, action: 'chi' }, { seat: 2, action: 'pon' }]);
  });

  it('rejects an empty list', () => {
    expect(() => resolveInterrupt([])).toThrow(InvalidArgumentError);
  });
});
