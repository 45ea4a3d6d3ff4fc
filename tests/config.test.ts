import { DEFAULT_CONFIG, loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({ port: 5174, roundWind: 401, reactionTimeoutMs: 10_000 });
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads every setting', () => {
    expect(loadConfig({ PORT: '8080', ROUND_WIND: 'w3', REACTION_TIMEOUT_MS: '2500' })).toEqual({
      port: 8080,
      roundWind: 403,
      reactionTimeoutMs: 2500,
    });
    expect(loadConfig({ ROUND_WIND: '402' }).roundWind).toBe(402);
  });

  it('falls back on invalid values', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      expect(loadConfig({ PORT: 'abc', REACTION_TIMEOUT_MS: '-5', ROUND_WIND: 'd1' })).toEqual(DEFAULT_CONFIG);
      expect(loadConfig({ ROUND_WIND: '501' }).roundWind).toBe(401);
      expect(loadConfig({ ROUND_WIND: 'zz' }).roundWind).toBe(401);
      expect(spy).toHaveBeenCalledTimes(1);
    } finally {
      spy.mockRestore();
    }
  });
});
