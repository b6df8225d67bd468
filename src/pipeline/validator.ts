// pipeline/validator.ts — Command validation and the injury/exhaustion action gate

import type {
  Timestamp,
  Combatant,
  QueuedCommand,
  RejectedCommand,
} from '../types/index.js';
import { skillLevelOf } from '../types/index.js';
import type { WorldState } from '../server/world.js';
import type { EventBus } from '../server/event-bus.js';
import type { DiceRoller } from './dice.js';
import type { EffectEngine } from './effect-engine.js';
import {
  calculateAvailable,
  evaluateFatigueRestriction,
  evaluateVitalityRestriction,
  type ActionRestriction,
} from './vitality-rules.js';

export type GateResult =
  | { ok: true }
  | { ok: false; reason: 'blocked' | 'focus_failed' | 'incapacitated'; message: string };

export class CommandValidator {
  private world: WorldState;
  private effects: EffectEngine;
  private dice: DiceRoller;
  private bus: EventBus;

  constructor(world: WorldState, effects: EffectEngine, dice: DiceRoller, bus: EventBus) {
    this.world = world;
    this.effects = effects;
    this.dice = dice;
    this.bus = bus;
  }

  validateBatch(
    commands: QueuedCommand[],
    now: Timestamp,
  ): { validated: QueuedCommand[]; rejected: RejectedCommand[] } {
    const validated: QueuedCommand[] = [];
    const rejected: RejectedCommand[] = [];

    for (const command of commands) {
      const rejection = this.validateSingle(command, now);
      if (rejection) {
        rejected.push(rejection);
      } else {
        validated.push(command);
      }
    }

    return { validated, rejected };
  }

  /**
   * Vitality first, then fatigue. A pool low enough to need a Focus check
   * rolls one; failing blocks the action.
   */
  checkActionGate(c: Combatant, now: Timestamp): GateResult {
    const vitality = evaluateVitalityRestriction(
      calculateAvailable(c.currentVitality, c.pendingVitalityDamage),
    );
    const vitalityResult = this.resolveRestriction(c, vitality, 'vitality_focus_check', now);
    if (!vitalityResult.ok) return vitalityResult;

    const fatigue = evaluateFatigueRestriction(
      calculateAvailable(c.currentFatigue, c.pendingFatigueDamage),
    );
    const fatigueResult = this.resolveRestriction(c, fatigue, 'fatigue_focus_check', now);
    if (!fatigueResult.ok) return fatigueResult;

    if (!this.effects.getEffectSummary(c.id, now).canAct) {
      return { ok: false, reason: 'incapacitated', message: 'You are unable to act.' };
    }
    return { ok: true };
  }

  private validateSingle(command: QueuedCommand, now: Timestamp): RejectedCommand | null {
    const type = command.params.type;
    const c = this.world.getCombatant(command.combatantId);
    if (!c) return this.reject(command, 'missing_combatant', 'Combatant not found.');
    if (!c.isAlive) return this.reject(command, 'dead', 'You are dead.');

    switch (command.params.type) {
      case 'idle':
      case 'parry':
        return null;
      case 'attack': {
        const target = this.world.getCombatant(command.params.targetId);
        if (command.params.targetId === c.id) {
          return this.reject(command, 'invalid_target', 'You cannot attack yourself.');
        }
        if (!target || !target.isAlive) {
          return this.reject(command, 'missing_combatant', 'There is nobody there to fight.');
        }
        break;
      }
      case 'flee':
        break;
    }

    const gate = this.checkActionGate(c, now);
    if (!gate.ok) {
      console.debug(`[Gate] ${c.name} blocked from ${type}: ${gate.message}`);
      return this.reject(command, gate.reason, gate.message);
    }
    return null;
  }

  private resolveRestriction(
    c: Combatant,
    restriction: ActionRestriction,
    context: string,
    now: Timestamp,
  ): GateResult {
    switch (restriction.kind) {
      case 'allowed':
        return { ok: true };
      case 'blocked':
        return { ok: false, reason: 'blocked', message: restriction.message };
      case 'focus_check': {
        const focus = skillLevelOf(c, 'Focus')
          + (this.effects.getEffectSummary(c.id, now).attributeModifiers['Focus'] ?? 0);
        const roll = focus + this.dice.rollExplodingSymmetric();
        const succeeded = roll >= restriction.check.targetValue;

        this.bus.publish({
          type: 'skill_used',
          combatantId: c.id,
          skillName: 'Focus',
          usageType: 'challenging_use',
          basePoints: 1,
          context,
          succeeded,
          at: now,
        });

        if (succeeded) return { ok: true };
        return { ok: false, reason: 'focus_failed', message: restriction.check.failureMessage };
      }
    }
  }

  private reject(command: QueuedCommand, reason: string, message: string): RejectedCommand {
    return { combatantId: command.combatantId, command: command.params.type, reason, message };
  }
}
