import { isLogLevel, type LogLevel } from './logger';

/**
 * How group overrides reach the rest of the tree during composition.
 *  - `scoped`: a group's overrides apply to its own subtree only.
 *  - `legacy`: one shared defaults value is overwritten in document order, so overrides
 *    also reach every node visited after the group, siblings included.
 */
export type CascadeMode = 'scoped' | 'legacy';

export type EngineConfig = {
  cascade: CascadeMode;
  /** Throw the first pass error instead of collecting it. */
  failFast: boolean;
  logLevel: LogLevel;
  /** Layout or composition passes slower than this are logged as warnings. */
  slowPassMs: number;
};

export const DEFAULT_CONFIG: EngineConfig = {
  cascade: 'scoped',
  failFast: false,
  logLevel: 'WARN',
  slowPassMs: 16,
};

export type EnvSource = Record<string, string | undefined>;

function parseBoolean(raw: string): boolean | undefined {
  const v = raw.trim().toLowerCase();
  if (v === 'true' || v === '1' || v === 'yes') return true;
  if (v === 'false' || v === '0' || v === 'no') return false;
  return undefined;
}

/**
 * Defaults, then environment variables, then explicit overrides.
 * Unparseable environment values are ignored.
 */
export function loadConfig(env: EnvSource = process.env, overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_CONFIG };

  const cascade = env.SCENE_CASCADE?.trim().toLowerCase();
  if (cascade === 'scoped' || cascade === 'legacy') config.cascade = cascade;

  if (env.SCENE_FAIL_FAST !== undefined) {
    const failFast = parseBoolean(env.SCENE_FAIL_FAST);
    if (failFast !== undefined) config.failFast = failFast;
  }

  const level = env.SCENE_LOG_LEVEL?.trim().toUpperCase();
  if (level !== undefined && isLogLevel(level)) config.logLevel = level;

  if (env.SCENE_SLOW_PASS_MS !== undefined) {
    const ms = Number(env.SCENE_SLOW_PASS_MS);
    if (Number.isFinite(ms) && ms >= 0) config.slowPassMs = ms;
  }

  return { ...config, ...overrides };
}
