// pipeline/health-processor.ts — Drains pending pools into current values, passive regen

import type { Combatant, Timestamp } from '../types/index.js';
import { maxFatigueOf, maxVitalityOf, safeAdd } from '../types/index.js';
import type { WorldState } from '../server/world.js';
import type { EventBus } from '../server/event-bus.js';
import {
  FATIGUE_CRASH_VITALITY_DAMAGE,
  FATIGUE_REGEN_AMOUNT,
  TICK_RATE_MS,
  VITALITY_REGEN_INTERVAL_MS,
} from '../shared/constants.js';
import { calculateAvailable, fatigueRegenInterval } from './vitality-rules.js';

export interface PoolStep {
  current: number;
  pending: number;
  /** Damage that found no current value left to reduce. */
  overflow: number;
}

/**
 * One processing step for a single pool. Half the pending magnitude (at
 * least 1) is moved into current. Healing never exceeds max and any healing
 * queued against a full pool is discarded.
 */
export function stepPool(current: number, pending: number, max: number): PoolStep {
  if (pending === 0) return { current, pending, overflow: 0 };

  const amount = Math.max(1, Math.ceil(Math.abs(pending) / 2));

  if (pending > 0) {
    const applied = Math.min(amount, current);
    return {
      current: current - applied,
      pending: Math.max(0, pending - amount),
      overflow: amount - applied,
    };
  }

  const capacity = max - current;
  if (capacity <= 0) return { current, pending: 0, overflow: 0 };

  return {
    current: current + Math.min(amount, capacity),
    pending: Math.min(0, pending + amount),
    overflow: 0,
  };
}

/** Fatigue overflow and a fatigue crash both spill into pending vitality. */
export function processFatiguePool(c: Combatant): boolean {
  if (c.pendingFatigueDamage === 0) return false;

  const before = c.currentFatigue;
  const step = stepPool(c.currentFatigue, c.pendingFatigueDamage, maxFatigueOf(c));
  c.currentFatigue = step.current;
  c.pendingFatigueDamage = step.pending;

  if (step.overflow > 0) {
    c.pendingVitalityDamage = safeAdd(c.pendingVitalityDamage, step.overflow);
  }
  const crashed = before > 0 && c.currentFatigue === 0;
  if (crashed) {
    c.pendingVitalityDamage = safeAdd(c.pendingVitalityDamage, FATIGUE_CRASH_VITALITY_DAMAGE);
  }

  return before !== c.currentFatigue || step.overflow > 0 || crashed || step.pending !== 0;
}

export function processVitalityPool(c: Combatant): boolean {
  if (c.pendingVitalityDamage === 0) return false;

  const before = c.currentVitality;
  const step = stepPool(c.currentVitality, c.pendingVitalityDamage, maxVitalityOf(c));
  c.currentVitality = step.current;
  c.pendingVitalityDamage = step.pending;
  return before !== c.currentVitality || step.pending !== 0;
}

/** Queues one point of fatigue recovery per elapsed interval. */
export function applyFatigueRegen(c: Combatant, now: Timestamp, baseIntervalMs: number): boolean {
  const available = calculateAvailable(c.currentVitality, c.pendingVitalityDamage);
  const interval = fatigueRegenInterval(available, baseIntervalMs);

  if (interval === null) {
    const changed = c.lastFatigueRegenAt !== null;
    c.lastFatigueRegenAt = null;
    return changed;
  }

  if (c.lastFatigueRegenAt === null) {
    c.lastFatigueRegenAt = now;
    return true;
  }

  if (c.currentFatigue < maxFatigueOf(c) && now - c.lastFatigueRegenAt >= interval) {
    c.pendingFatigueDamage = safeAdd(c.pendingFatigueDamage, -FATIGUE_REGEN_AMOUNT);
    c.lastFatigueRegenAt = now;
    return true;
  }

  return false;
}

/** One vitality point per elapsed hour, straight into current. */
export function applyVitalityRegen(c: Combatant, now: Timestamp): boolean {
  const max = maxVitalityOf(c);

  if (c.currentVitality <= 0) {
    const changed = c.lastVitalityRegenAt !== null;
    c.lastVitalityRegenAt = null;
    return changed;
  }

  if (c.lastVitalityRegenAt === null || c.currentVitality >= max) {
    const changed = c.lastVitalityRegenAt !== now;
    c.lastVitalityRegenAt = now;
    return changed;
  }

  const elapsed = now - c.lastVitalityRegenAt;
  const ticks = Math.floor(elapsed / VITALITY_REGEN_INTERVAL_MS);
  if (ticks <= 0) return false;

  const healed = Math.min(ticks, max - c.currentVitality);
  c.currentVitality += healed;
  c.lastVitalityRegenAt = c.currentVitality >= max
    ? now
    : c.lastVitalityRegenAt + ticks * VITALITY_REGEN_INTERVAL_MS;
  return true;
}

export function needsProcessing(c: Combatant): boolean {
  return c.pendingFatigueDamage !== 0
    || c.pendingVitalityDamage !== 0
    || c.currentFatigue < maxFatigueOf(c)
    || c.currentVitality < maxVitalityOf(c);
}

export interface HealthTickSummary {
  processed: number;
  updated: number;
  failed: number;
}

export class HealthProcessor {
  private world: WorldState;
  private bus: EventBus;
  private baseFatigueRegenMs: number;

  constructor(world: WorldState, bus: EventBus, baseFatigueRegenMs: number = TICK_RATE_MS) {
    this.world = world;
    this.bus = bus;
    this.baseFatigueRegenMs = baseFatigueRegenMs;
  }

  processCombatant(c: Combatant, now: Timestamp): boolean {
    const vitalityBefore = c.currentVitality;
    const fatigueBefore = c.currentFatigue;

    let updated = applyFatigueRegen(c, now, this.baseFatigueRegenMs);
    updated = applyVitalityRegen(c, now) || updated;
    updated = processFatiguePool(c) || updated;
    updated = processVitalityPool(c) || updated;

    if (c.currentVitality !== vitalityBefore || c.currentFatigue !== fatigueBefore) {
      this.bus.publish({
        type: 'health_changed',
        combatantId: c.id,
        name: c.name,
        roomId: c.roomId,
        currentFatigue: c.currentFatigue,
        maxFatigue: maxFatigueOf(c),
        currentVitality: c.currentVitality,
        maxVitality: maxVitalityOf(c),
        at: now,
      });
    }

    return updated;
  }

  tick(now: Timestamp, signal?: AbortSignal): HealthTickSummary {
    const summary: HealthTickSummary = { processed: 0, updated: 0, failed: 0 };

    for (const c of this.world.combatants.values()) {
      if (signal?.aborted) break;
      if (!c.isAlive || !needsProcessing(c)) continue;

      summary.processed++;
      try {
        if (this.processCombatant(c, now)) summary.updated++;
      } catch (err) {
        summary.failed++;
        console.error(`[Health] Failed to process ${c.id}:`, err);
      }
    }

    return summary;
  }
}
