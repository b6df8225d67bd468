// server/index.ts — Server entry point
// Wire: config → DB init → world load → effect catalog → pipeline → tick loop
// Graceful shutdown on SIGINT/SIGTERM

import { Database } from './db.js';
import { WorldState } from './world.js';
import { EventBus } from './event-bus.js';
import { TickLoop } from './tick-loop.js';
import { createRng } from './rng.js';
import { loadConfig, type CombatConfig } from '../shared/config.js';
import { Dice } from '../pipeline/dice.js';
import { EffectCatalog } from '../pipeline/effect-catalog.js';
import { EffectEngine } from '../pipeline/effect-engine.js';
import { CombatSessionManager } from '../pipeline/session-manager.js';
import { AttackResolver } from '../pipeline/attack-resolver.js';
import { HealthProcessor } from '../pipeline/health-processor.js';
import { NpcController } from '../pipeline/npc-policy.js';
import { ActionQueue } from '../pipeline/action-queue.js';
import { CommandValidator } from '../pipeline/validator.js';
import { CommandProcessor } from '../pipeline/command-processor.js';
import { toISO } from '../shared/utils.js';

// --- CLI arg parsing (flag/value pairs) ---

function parseArgs(argv: string[]): Partial<CombatConfig> {
  const overrides: Partial<CombatConfig> = {};

  for (let i = 0; i < argv.length; i++) {
    const value = argv[i + 1];
    switch (argv[i]) {
      case '--db':
        if (value !== undefined) overrides.dbPath = value;
        i++;
        break;
      case '--tick-ms':
        if (value !== undefined) overrides.tickMs = Number(value);
        i++;
        break;
      case '--seed':
        if (value !== undefined) overrides.seed = Number(value);
        i++;
        break;
    }
  }

  return overrides;
}

// --- Main ---

const config = loadConfig(parseArgs(process.argv.slice(2)));

// 1. Init Database + run migrations
console.log(`[Server] Initializing database: ${config.dbPath}`);
const db = new Database(config.dbPath);
db.runMigrations(config.migrationsDir);

// 2. Restore world state from the last snapshot
const world = new WorldState();
const loaded = db.loadWorldSnapshot();

if (!loaded.ok) {
  console.error(`[Server] Could not read snapshot: ${loaded.message}`);
  db.close();
  process.exit(1);
}

if (loaded.snapshot) {
  const { snapshot } = loaded;
  world.tick = snapshot.tick;
  for (const combatant of snapshot.combatants) {
    world.addCombatant(combatant);
  }
  for (const session of snapshot.sessions) {
    world.addSession(session);
  }
  for (const instance of snapshot.effects) {
    world.getEffectInstances(instance.combatantId).push(instance);
  }
  console.log(
    `[Server] Restored tick ${snapshot.tick}: ${world.combatants.size} combatants, ` +
    `${world.sessions.size} active sessions, ${snapshot.effects.length} effects`,
  );
} else {
  console.log('[Server] No snapshot found. Starting an empty world.');
  db.setMetaValue('created_at', toISO(Date.now()), 0);
}

// 3. Effect definitions
const catalog = EffectCatalog.load(config.effectsPath);
console.log(`[Server] Loaded ${catalog.size} effect definitions from ${config.effectsPath}`);

// 4. Wire pipeline components
const bus = new EventBus();
const dice = new Dice(createRng(config.seed));
const effects = new EffectEngine(world, catalog);
const sessions = new CombatSessionManager(world, bus);
const attacks = new AttackResolver(world, sessions, effects, dice, bus);
const health = new HealthProcessor(world, bus, config.tickMs);
const npcs = new NpcController(world, sessions, attacks, bus);
const queue = new ActionQueue();
const validator = new CommandValidator(world, effects, dice, bus);
const processor = new CommandProcessor(sessions, attacks);

bus.on('combat_ended', event => {
  if (event.winnerName) console.log(`[Server] ${event.winnerName} won the fight in room ${event.roomId}`);
});

// 5. Start tick loop
const tickLoop = new TickLoop(
  { world, queue, validator, processor, sessions, effects, health, npcs, bus, db },
  { tickMs: config.tickMs, snapshotIntervalTicks: config.snapshotIntervalTicks },
);

const shutdownController = new AbortController();
tickLoop.start(shutdownController.signal);
console.log(`[Server] Tick loop running (${config.tickMs}ms intervals). Current tick: ${world.tick}`);

// --- Graceful shutdown ---

function shutdown(signal: string): void {
  if (shutdownController.signal.aborted) return;
  shutdownController.abort();

  console.log(`\n[Server] ${signal} received. Shutting down gracefully...`);

  console.log(`[Server] Saving final snapshot at tick ${world.tick}...`);
  const stored = db.snapshotWorld(world);
  if (stored.ok) console.log('[Server] Snapshot saved.');

  db.close();
  console.log('[Server] Database closed.');
  process.exit(stored.ok ? 0 : 1);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
