// server/tick-loop.ts — The heartbeat: commands, effect sweeps, pools, NPCs, snapshots

import type { Clock, GameEvent, TickResult, Timestamp } from '../types/index.js';
import { systemClock } from '../types/index.js';
import type { WorldState } from './world.js';
import type { Database } from './db.js';
import type { EventBus } from './event-bus.js';
import type { ActionQueue } from '../pipeline/action-queue.js';
import type { CommandValidator } from '../pipeline/validator.js';
import type { CommandProcessor } from '../pipeline/command-processor.js';
import type { CombatSessionManager } from '../pipeline/session-manager.js';
import type { EffectEngine } from '../pipeline/effect-engine.js';
import type { HealthProcessor } from '../pipeline/health-processor.js';
import type { NpcController } from '../pipeline/npc-policy.js';
import { TICK_RATE_MS, SNAPSHOT_INTERVAL_TICKS, SLOW_TICK_WARN_MS } from '../shared/constants.js';

export interface TickLoopDeps {
  world: WorldState;
  queue: ActionQueue;
  validator: CommandValidator;
  processor: CommandProcessor;
  sessions: CombatSessionManager;
  effects: EffectEngine;
  health: HealthProcessor;
  npcs: NpcController;
  bus: EventBus;
  db?: Database | null;
}

export interface TickLoopOptions {
  tickMs?: number;
  snapshotIntervalTicks?: number;
  clock?: Clock;
}

export class TickLoop {
  private deps: TickLoopDeps;
  private tickMs: number;
  private snapshotIntervalTicks: number;
  private clock: Clock;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private controller: AbortController | null = null;

  constructor(deps: TickLoopDeps, options: TickLoopOptions = {}) {
    this.deps = deps;
    this.tickMs = options.tickMs ?? TICK_RATE_MS;
    this.snapshotIntervalTicks = options.snapshotIntervalTicks ?? SNAPSHOT_INTERVAL_TICKS;
    this.clock = options.clock ?? systemClock;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  /** Schedules ticks until stop() is called or the given signal aborts. */
  start(signal?: AbortSignal): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;

    if (signal) {
      if (signal.aborted) {
        this.stop();
        return;
      }
      signal.addEventListener('abort', () => this.stop(), { once: true });
    }

    this.schedule(controller.signal);
  }

  stop(): void {
    this.controller?.abort();
    this.controller = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(signal: AbortSignal): void {
    if (signal.aborted) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      if (signal.aborted) return;
      try {
        this.processTick(this.clock(), signal);
      } catch (err) {
        console.error('[Tick] Tick failed:', err);
      }
      this.schedule(signal);
    }, this.tickMs);
  }

  processTick(now: Timestamp = this.clock(), signal?: AbortSignal): TickResult {
    const startTime = performance.now();
    const { world, queue, validator, processor, sessions, effects, health, npcs, bus, db } = this.deps;

    // 1. Increment tick
    const tick = ++world.tick;

    const events: GameEvent[] = [];
    const unsubscribe = bus.subscribe(event => {
      events.push(event);
    });

    const result: TickResult = {
      tick,
      startedAt: now,
      executed: [],
      rejected: [],
      events,
      effectMessages: [],
      healthUpdates: 0,
      npcDecisions: 0,
      expiredEffects: 0,
      durationMs: 0,
    };

    try {
      // 2. Drain queued commands
      const commands = queue.drainAll();

      // 3. Validate, then execute
      this.phase('commands', () => {
        const { validated, rejected } = validator.validateBatch(commands, now);
        const execution = processor.executeBatch(validated, now);
        result.executed = execution.executed;
        result.rejected = [...rejected, ...execution.rejected];
      });

      // 4. Timed penalties
      this.phase('penalties', () => {
        sessions.pruneExpiredPenalties(now);
      });

      // 5. Periodic effects and natural wound healing
      if (!signal?.aborted) {
        for (const combatant of world.combatants.values()) {
          if (signal?.aborted) break;
          if (!combatant.isAlive) continue;
          try {
            result.effectMessages.push(...effects.processPeriodicEffects(combatant.id, now));
            effects.processNaturalWoundHealing(combatant.id, now);
          } catch (err) {
            console.error(`[Tick] Effect processing failed for ${combatant.id}:`, err);
          }
        }
        this.phase('effect cleanup', () => {
          result.expiredEffects = effects.cleanupExpiredEffects(now);
        });
      }

      // 6. Pending pools and regeneration
      if (!signal?.aborted) {
        this.phase('health', () => {
          result.healthUpdates = health.tick(now, signal).updated;
        });
      }

      // 7. Deaths from drained vitality
      this.phase('deaths', () => {
        sessions.resolveDeaths(now);
      });

      // 8. NPC decisions
      if (!signal?.aborted) {
        this.phase('npc', () => {
          result.npcDecisions = npcs.tick(now, signal).length;
        });
      }

      // 9. Persist (snapshot every snapshotIntervalTicks)
      if (tick % this.snapshotIntervalTicks === 0) {
        const stored = db ? db.snapshotWorld(world).ok : true;
        // Ended sessions stay in memory until they have been written
        if (stored) world.pruneEndedSessions();
      }
    } finally {
      unsubscribe();
    }

    // 10. Log tick performance
    result.durationMs = performance.now() - startTime;
    if (result.durationMs > SLOW_TICK_WARN_MS) {
      console.warn(`[Tick] Tick ${tick} took ${result.durationMs.toFixed(1)}ms`);
    }

    return result;
  }

  private phase(name: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      console.error(`[Tick] Phase ${name} failed:`, err);
    }
  }
}
