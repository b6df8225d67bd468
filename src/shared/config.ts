// shared/config.ts — Runtime configuration: defaults + env vars + overrides

import { resolve } from 'node:path';
import { TICK_RATE_MS, SNAPSHOT_INTERVAL_TICKS } from './constants.js';

export interface CombatConfig {
  tickMs: number;
  dbPath: string;
  effectsPath: string;
  migrationsDir: string;
  snapshotIntervalTicks: number;
  /** null = cryptographic randomness. */
  seed: number | null;
}

const DEFAULTS = {
  tickMs: TICK_RATE_MS,
  dbPath: 'combat.db',
  effectsPath: 'data/effects.json',
  migrationsDir: 'db/migrations',
  snapshotIntervalTicks: SNAPSHOT_INTERVAL_TICKS,
} as const;

function positiveInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

export function loadConfig(
  overrides: Partial<CombatConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): CombatConfig {
  const tickMs = env.COMBAT_TICK_MS !== undefined
    ? positiveInt('COMBAT_TICK_MS', env.COMBAT_TICK_MS)
    : DEFAULTS.tickMs;

  const snapshotIntervalTicks = env.COMBAT_SNAPSHOT_INTERVAL_TICKS !== undefined
    ? positiveInt('COMBAT_SNAPSHOT_INTERVAL_TICKS', env.COMBAT_SNAPSHOT_INTERVAL_TICKS)
    : DEFAULTS.snapshotIntervalTicks;

  let seed: number | null = null;
  if (env.COMBAT_SEED !== undefined && env.COMBAT_SEED !== '') {
    seed = Number(env.COMBAT_SEED);
    if (!Number.isInteger(seed)) {
      throw new Error(`COMBAT_SEED must be an integer (got "${env.COMBAT_SEED}")`);
    }
  }

  const config: CombatConfig = {
    tickMs,
    dbPath: env.COMBAT_DB_PATH ?? DEFAULTS.dbPath,
    effectsPath: resolve(env.COMBAT_EFFECTS_PATH ?? DEFAULTS.effectsPath),
    migrationsDir: resolve(DEFAULTS.migrationsDir),
    snapshotIntervalTicks,
    seed,
    ...overrides,
  };

  if (!Number.isInteger(config.tickMs) || config.tickMs <= 0) {
    throw new Error(`tickMs must be a positive integer (got ${config.tickMs})`);
  }
  if (!Number.isInteger(config.snapshotIntervalTicks) || config.snapshotIntervalTicks <= 0) {
    throw new Error(`snapshotIntervalTicks must be a positive integer (got ${config.snapshotIntervalTicks})`);
  }

  return config;
}
