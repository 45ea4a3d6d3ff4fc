import http from 'http';
import { RulesEngine } from '../src/rules/RulesEngine';
import { createApp } from '../src/server';

const WIN_CODES = ['m1', 'm2', 'm3', 'p4', 'p5', 'p6', 's7', 's8', 's9', 'w1', 'w1', 'w1', 'd3'];

describe('HTTP surface', () => {
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    const engine = new RulesEngine({ roundWind: 401, reactionTimeoutMs: 10_000 });
    server = http.createServer(createApp(engine, { log: () => undefined }));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const addr = server.address();
    if (addr === null || typeof addr === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${addr.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  async function post(path: string, body: unknown) {
    const res = await fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  it('answers health checks', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(await res.json()).toEqual({ ok: true });
  });

  it('analyzes a hand given as tile codes', async () => {
    const res = await post('/analyze', { hand: { concealed: WIN_CODES, drawn: 'd3' } });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ isWinning: true, winKind: 'traditional', pair: 503, triplets: [401] });
  });

  it('scores a hand', async () => {
    const res = await post('/score', { hand: { concealed: WIN_CODES, drawn: 'd3' }, seat: 0, selfDrawn: true });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      points: 6,
      breakdown: ['Fully Concealed Self-Draw: +3', 'Seat Wind Triplet: +1', 'Round Wind Triplet: +1'],
    });
  });

  it('lists chi options', async () => {
    const res = await post('/chi-options', { hand: { concealed: [101, 102, 104] }, discarded: 'm3' });
    expect(res.body).toEqual([
      { discarded: 103, tiles: [101, 102] },
      { discarded: 103, tiles: [102, 104] },
    ]);
  });

  it('resolves competing reactions', async () => {
    const res = await post('/resolve', {
      candidates: [
        { seat: 3, action: 'chi', chi: { discarded: 205, tiles: [203, 204] } },
        { seat: 1, action: 'pon' },
        { seat: 2, action: 'pon' },
      ],
    });
    expect(res.body).toEqual({ seat: 1, action: 'pon' });
  });

  it('lists waiting tiles', async () => {
    const res = await post('/waits', { hand: { concealed: WIN_CODES }, seat: 0 });
    expect(res.body).toEqual([{ tile: 503, code: 'd3', points: 6 }]);
  });

  it('maps engine errors to 400', async () => {
    expect(await post('/analyze', { hand: { concealed: [999] } })).toEqual({
      status: 400,
      body: { ok: false, error: 'InvalidTileError', message: 'ordinal 999 has no valid suit' },
    });
    expect(await post('/score', { hand: { concealed: WIN_CODES }, seat: 7, selfDrawn: false })).toEqual({
      status: 400,
      body: { ok: false, error: 'InvalidArgumentError', message: 'seat must be 0-3, got 7' },
    });
    expect(await post('/resolve', { candidates: [] })).toEqual({
      status: 400,
      body: { ok: false, error: 'InvalidArgumentError', message: 'resolveInterrupt needs at least one candidate' },
    });
  });

  it('rejects malformed JSON', async () => {
    const res = await fetch(`${baseUrl}/analyze`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"hand":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'InvalidArgumentError', message: 'request body is not valid JSON' });
  });
});
