// tests/config.test.ts — Configuration defaults, env vars and overrides

import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadConfig } from '../src/shared/config.js';

describe('loadConfig', () => {
  it('uses defaults with an empty environment', () => {
    expect(loadConfig({}, {})).toEqual({
      tickMs: 3000,
      dbPath: 'combat.db',
      effectsPath: resolve('data/effects.json'),
      migrationsDir: resolve('db/migrations'),
      snapshotIntervalTicks: 20,
      seed: null,
    });
  });

  it('reads environment variables', () => {
    const config = loadConfig({}, {
      COMBAT_TICK_MS: '500',
      COMBAT_SNAPSHOT_INTERVAL_TICKS: '4',
      COMBAT_SEED: '42',
      COMBAT_DB_PATH: ':memory:',
    });

    expect(config.tickMs).toBe(500);
    expect(config.snapshotIntervalTicks).toBe(4);
    expect(config.seed).toBe(42);
    expect(config.dbPath).toBe(':memory:');
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig({ tickMs: 100, seed: 7 }, { COMBAT_TICK_MS: '500', COMBAT_SEED: '42' });

    expect(config.tickMs).toBe(100);
    expect(config.seed).toBe(7);
  });

  it('treats an empty seed as unseeded', () => {
    expect(loadConfig({}, { COMBAT_SEED: '' }).seed).toBeNull();
  });

  it('rejects bad numbers', () => {
    expect(() => loadConfig({}, { COMBAT_TICK_MS: 'fast' })).toThrow(
      'COMBAT_TICK_MS must be a positive integer (got "fast")',
    );
    expect(() => loadConfig({}, { COMBAT_SNAPSHOT_INTERVAL_TICKS: '0' })).toThrow(/COMBAT_SNAPSHOT_INTERVAL_TICKS/);
    expect(() => loadConfig({}, { COMBAT_SEED: '1.5' })).toThrow('COMBAT_SEED must be an integer (got "1.5")');
    expect(() => loadConfig({ tickMs: -1 }, {})).toThrow('tickMs must be a positive integer (got -1)');
  });
});
