import { EAST, isOrdinal, parseTile, WINDS } from './domain/Tile';

export type EngineConfig = {
  port: number;
  /** Wind ordinal of the current round. */
  roundWind: number;
  /** Reaction window length; players who have not answered by then pass. */
  reactionTimeoutMs: number;
};

export const DEFAULT_CONFIG: EngineConfig = {
  port: 5174,
  roundWind: EAST,
  reactionTimeoutMs: 10_000,
};

type Env = Record<string, string | undefined>;

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw || fallback);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

// accepts an ordinal (401) or a code (w1)
function windOrdinal(raw: string | undefined, fallback: number): number {
  const v = (raw ?? '').trim();
  if (!v) return fallback;
  if (/^\d+$/.test(v)) {
    const n = Number(v);
    return isOrdinal(n) && WINDS.includes(n) ? n : fallback;
  }
  try {
    const n = parseTile(v);
    return WINDS.includes(n) ? n : fallback;
  } catch (err) {
    console.log(`[config] ignoring ROUND_WIND=${v}: ${err instanceof Error ? err.message : String(err)}`);
    return fallback;
  }
}

/** Settings from the environment; anything missing or invalid keeps its default. */
export function loadConfig(env: Env = process.env): EngineConfig {
  return {
    port: positiveInt(env.PORT, DEFAULT_CONFIG.port),
    roundWind: windOrdinal(env.ROUND_WIND, DEFAULT_CONFIG.roundWind),
    reactionTimeoutMs: positiveInt(env.REACTION_TIMEOUT_MS, DEFAULT_CONFIG.reactionTimeoutMs),
  };
}
