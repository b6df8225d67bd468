// pipeline/effect-engine.ts — Status effects: stacking, summaries, periodic ticks, wound healing

import type {
  EntityId,
  Timestamp,
  ApplyEffectOptions,
  BodyLocation,
  EffectApplicationResult,
  EffectCategory,
  EffectRemovalReason,
  EffectSummary,
  StatusEffectDefinition,
  StatusEffectInstance,
} from '../types/index.js';
import { safeAdd } from '../types/index.js';
import type { WorldState } from '../server/world.js';
import type { EffectCatalog } from './effect-catalog.js';
import {
  SECOND_MS,
  WOUND_ATTACK_PENALTY,
  WOUND_EFFECT_NAME,
  WOUND_HEAL_INTERVAL_MS,
} from '../shared/constants.js';
import { generateEffectId } from '../shared/utils.js';

function isCurrent(instance: StatusEffectInstance, now: Timestamp): boolean {
  return instance.isActive && (instance.expiresAt === null || instance.expiresAt > now);
}

function deactivate(instance: StatusEffectInstance, reason: EffectRemovalReason, now: Timestamp): void {
  instance.isActive = false;
  instance.removedAt = now;
  instance.removalReason = reason;
}

export function emptySummary(combatantId: EntityId): EffectSummary {
  return {
    combatantId,
    attackValueModifier: 0,
    defenseValueModifier: 0,
    attributeModifiers: {},
    skillModifiers: {},
    maxFatigueModifier: 0,
    maxVitalityModifier: 0,
    damageDealtModifier: 0,
    damageReceivedModifier: 0,
    woundCount: 0,
    woundsByLocation: {},
    canMove: true,
    canCastSpells: true,
    canAct: true,
    isInvisible: false,
    activeEffectNames: [],
  };
}

export class EffectEngine {
  private world: WorldState;
  private catalog: EffectCatalog;

  constructor(world: WorldState, catalog: EffectCatalog) {
    this.world = world;
    this.catalog = catalog;
  }

  getDefinition(name: string): StatusEffectDefinition | undefined {
    return this.catalog.get(name);
  }

  applyEffect(
    combatantId: EntityId,
    effectName: string,
    now: Timestamp,
    options: ApplyEffectOptions = {},
  ): EffectApplicationResult {
    const def = this.catalog.get(effectName);
    if (!def) {
      return { ok: false, reason: 'unknown_effect', message: `Unknown effect: ${effectName}` };
    }
    if (!this.world.getCombatant(combatantId)) {
      return { ok: false, reason: 'missing_combatant', message: `No combatant ${combatantId}` };
    }

    const intensity = options.intensity ?? def.defaultIntensity;
    const durationSeconds = options.durationSeconds ?? def.defaultDurationSeconds;
    const location = options.bodyLocation ?? null;
    const instances = this.world.getEffectInstances(combatantId);

    for (const inst of instances) {
      if (inst.isActive && !isCurrent(inst, now)) deactivate(inst, 'expired', now);
    }

    const existing = instances.find(i =>
      i.isActive
      && i.definitionName === def.name
      && (!def.isStackable || location === null || i.bodyLocation === location));

    if (existing) {
      const refresh = (): void => {
        if (durationSeconds > 0) {
          existing.appliedAt = now;
          existing.expiresAt = now + durationSeconds * SECOND_MS;
        }
      };

      if (def.isStackable && existing.currentStacks < def.maxStacks) {
        existing.currentStacks++;
        refresh();
        return {
          ok: true,
          instance: existing,
          wasStacked: true,
          wasRefreshed: false,
          stackCount: existing.currentStacks,
          message: `${def.name} stacked (${existing.currentStacks}/${def.maxStacks})`,
        };
      }

      existing.intensity = intensity;
      refresh();
      return {
        ok: true,
        instance: existing,
        wasStacked: false,
        wasRefreshed: true,
        stackCount: existing.currentStacks,
        message: def.isStackable ? `${def.name} refreshed (max stacks)` : `${def.name} refreshed`,
      };
    }

    let expiresAt: Timestamp | null = null;
    if (options.durationSeconds !== undefined) {
      // an explicit zero expires immediately
      expiresAt = now + options.durationSeconds * SECOND_MS;
    } else if (def.defaultDurationSeconds > 0) {
      expiresAt = now + def.defaultDurationSeconds * SECOND_MS;
    }

    const instance: StatusEffectInstance = {
      id: generateEffectId(),
      combatantId,
      definitionName: def.name,
      currentStacks: 1,
      intensity,
      appliedAt: now,
      expiresAt,
      lastTickAt: null,
      bodyLocation: location,
      sourceId: options.sourceId ?? null,
      isActive: true,
      removedAt: null,
      removalReason: null,
    };
    instances.push(instance);

    return {
      ok: true,
      instance,
      wasStacked: false,
      wasRefreshed: false,
      stackCount: 1,
      message: `${def.name} applied`,
    };
  }

  applyWound(combatantId: EntityId, location: BodyLocation, now: Timestamp): EffectApplicationResult {
    return this.applyEffect(combatantId, WOUND_EFFECT_NAME, now, { bodyLocation: location });
  }

  removeEffect(instanceId: string, reason: EffectRemovalReason, now: Timestamp): boolean {
    const instance = this.world.findEffectInstance(instanceId);
    if (!instance || !instance.isActive) return false;
    deactivate(instance, reason, now);
    return true;
  }

  removeEffectsByCategory(
    combatantId: EntityId,
    category: EffectCategory,
    reason: EffectRemovalReason,
    now: Timestamp,
  ): number {
    let removed = 0;
    for (const inst of this.world.getEffectInstances(combatantId)) {
      if (!inst.isActive) continue;
      if (this.catalog.get(inst.definitionName)?.category !== category) continue;
      deactivate(inst, reason, now);
      removed++;
    }
    return removed;
  }

  /**
   * Heals wound stacks oldest first. `count` 0 heals every matching stack.
   * Returns the number of stacks removed.
   */
  healWounds(combatantId: EntityId, count: number, now: Timestamp, location?: BodyLocation): number {
    const wounds = this.activeWounds(combatantId, now)
      .filter(i => location === undefined || i.bodyLocation === location)
      .sort((a, b) => a.appliedAt - b.appliedAt);

    let remaining = count === 0 ? Number.POSITIVE_INFINITY : count;
    let healed = 0;
    for (const inst of wounds) {
      if (remaining <= 0) break;
      const take = Math.min(inst.currentStacks, remaining);
      inst.currentStacks -= take;
      remaining -= take;
      healed += take;
      if (inst.currentStacks <= 0) deactivate(inst, 'healed', now);
    }

    this.decrementWoundCounter(combatantId, healed);
    return healed;
  }

  getActiveEffects(combatantId: EntityId, now: Timestamp): StatusEffectInstance[] {
    return (this.world.effects.get(combatantId) ?? []).filter(i => isCurrent(i, now));
  }

  hasEffect(combatantId: EntityId, effectName: string, now: Timestamp): boolean {
    return this.getActiveEffects(combatantId, now).some(i => i.definitionName === effectName);
  }

  getWoundCount(combatantId: EntityId, now: Timestamp): number {
    return this.activeWounds(combatantId, now).reduce((sum, i) => sum + i.currentStacks, 0);
  }

  getWoundsByLocation(combatantId: EntityId, now: Timestamp): Partial<Record<BodyLocation, number>> {
    const result: Partial<Record<BodyLocation, number>> = {};
    for (const inst of this.activeWounds(combatantId, now)) {
      const loc = inst.bodyLocation ?? 'general';
      result[loc] = (result[loc] ?? 0) + inst.currentStacks;
    }
    return result;
  }

  getEffectSummary(combatantId: EntityId, now: Timestamp): EffectSummary {
    const summary = emptySummary(combatantId);

    for (const inst of this.getActiveEffects(combatantId, now)) {
      const def = this.catalog.get(inst.definitionName);
      if (!def) continue;

      const stacks = inst.currentStacks;
      summary.activeEffectNames.push(stacks > 1 ? `${def.name} x${stacks}` : def.name);

      if (def.category === 'wound') {
        const loc = inst.bodyLocation ?? 'general';
        summary.woundCount += stacks;
        summary.woundsByLocation[loc] = (summary.woundsByLocation[loc] ?? 0) + stacks;
        summary.attackValueModifier -= WOUND_ATTACK_PENALTY * stacks;
      }

      for (const impact of def.impacts) {
        const scaled = impact.value * (impact.scalesWithIntensity ? inst.intensity : 1) * stacks;
        const amount = Math.round(scaled);

        switch (impact.type) {
          case 'modify_attribute':
            if (impact.targetAttribute) {
              summary.attributeModifiers[impact.targetAttribute] =
                (summary.attributeModifiers[impact.targetAttribute] ?? 0) + amount;
            }
            break;
          case 'modify_skill':
            if (impact.targetSkill) {
              summary.skillModifiers[impact.targetSkill] =
                (summary.skillModifiers[impact.targetSkill] ?? 0) + amount;
            }
            break;
          case 'modify_attack_value':
            summary.attackValueModifier += amount;
            break;
          case 'modify_defense_value':
            summary.defenseValueModifier += amount;
            break;
          case 'modify_max_fatigue':
            summary.maxFatigueModifier += amount;
            break;
          case 'modify_max_vitality':
            summary.maxVitalityModifier += amount;
            break;
          case 'modify_damage_dealt':
            summary.damageDealtModifier += scaled;
            break;
          case 'modify_damage_received':
            summary.damageReceivedModifier += scaled;
            break;
          case 'prevent_movement':
            summary.canMove = false;
            break;
          case 'prevent_spellcasting':
            summary.canCastSpells = false;
            break;
          case 'prevent_actions':
            summary.canAct = false;
            break;
          case 'invisibility':
            summary.isInvisible = true;
            break;
          case 'periodic_fatigue_damage':
          case 'periodic_vitality_damage':
          case 'periodic_fatigue_healing':
          case 'periodic_vitality_healing':
            break;
        }
      }
    }

    return summary;
  }

  /**
   * Queues damage/healing for every whole tick interval elapsed since the
   * last tick (or application), never counting time past expiry.
   */
  processPeriodicEffects(combatantId: EntityId, now: Timestamp): string[] {
    const combatant = this.world.getCombatant(combatantId);
    if (!combatant) return [];

    const messages: string[] = [];
    for (const inst of this.world.effects.get(combatantId) ?? []) {
      if (!inst.isActive) continue;
      const def = this.catalog.get(inst.definitionName);
      if (!def || def.tickIntervalSeconds <= 0) continue;

      const intervalMs = def.tickIntervalSeconds * SECOND_MS;
      const last = inst.lastTickAt ?? inst.appliedAt;
      const horizon = inst.expiresAt === null ? now : Math.min(now, inst.expiresAt);
      const elapsed = horizon - last;
      if (elapsed < intervalMs) continue;

      const ticks = Math.floor(elapsed / intervalMs);
      for (const impact of def.impacts) {
        const amount = Math.round(impact.value * inst.intensity * inst.currentStacks) * ticks;
        if (amount === 0) continue;

        switch (impact.type) {
          case 'periodic_fatigue_damage':
            combatant.pendingFatigueDamage = safeAdd(combatant.pendingFatigueDamage, amount);
            messages.push(`${combatant.name} suffers ${amount} fatigue damage from ${def.name}`);
            break;
          case 'periodic_vitality_damage':
            combatant.pendingVitalityDamage = safeAdd(combatant.pendingVitalityDamage, amount);
            messages.push(`${combatant.name} suffers ${amount} vitality damage from ${def.name}`);
            break;
          case 'periodic_fatigue_healing':
            combatant.pendingFatigueDamage = safeAdd(combatant.pendingFatigueDamage, -amount);
            messages.push(`${combatant.name} recovers ${amount} fatigue from ${def.name}`);
            break;
          case 'periodic_vitality_healing':
            combatant.pendingVitalityDamage = safeAdd(combatant.pendingVitalityDamage, -amount);
            messages.push(`${combatant.name} recovers ${amount} vitality from ${def.name}`);
            break;
          default:
            break;
        }
      }

      inst.lastTickAt = last + ticks * intervalMs;
    }

    return messages;
  }

  /** One wound stack heals per full interval since the instance was applied. */
  processNaturalWoundHealing(combatantId: EntityId, now: Timestamp): number {
    let healed = 0;
    for (const inst of this.activeWounds(combatantId, now)) {
      const intervals = Math.floor((now - inst.appliedAt) / WOUND_HEAL_INTERVAL_MS);
      if (intervals <= 0) continue;

      const take = Math.min(intervals, inst.currentStacks);
      inst.currentStacks -= take;
      inst.appliedAt = now;
      healed += take;
      if (inst.currentStacks <= 0) deactivate(inst, 'natural_healing', now);
    }

    this.decrementWoundCounter(combatantId, healed);
    return healed;
  }

  /**
   * Deactivates expired instances and drops inactive ones from memory.
   * Returns the number that expired during this sweep.
   */
  cleanupExpiredEffects(now: Timestamp): number {
    let expired = 0;
    for (const [combatantId, list] of this.world.effects) {
      for (const inst of list) {
        if (inst.isActive && inst.expiresAt !== null && inst.expiresAt <= now) {
          deactivate(inst, 'expired', now);
          expired++;
        }
      }
      const kept = list.filter(i => i.isActive);
      if (kept.length === 0) {
        this.world.effects.delete(combatantId);
      } else if (kept.length !== list.length) {
        this.world.effects.set(combatantId, kept);
      }
    }
    return expired;
  }

  private activeWounds(combatantId: EntityId, now: Timestamp): StatusEffectInstance[] {
    return this.getActiveEffects(combatantId, now)
      .filter(i => this.catalog.get(i.definitionName)?.category === 'wound');
  }

  private decrementWoundCounter(combatantId: EntityId, healed: number): void {
    if (healed <= 0) return;
    const combatant = this.world.getCombatant(combatantId);
    if (combatant) combatant.wounds = Math.max(0, combatant.wounds - healed);
  }
}
