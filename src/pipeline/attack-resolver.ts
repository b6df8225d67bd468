// pipeline/attack-resolver.ts — Melee attack resolution: AV vs DV, physicality, armor, damage

import type {
  EntityId,
  Timestamp,
  AttackFailure,
  AttackFailureReason,
  AttackOptions,
  AttackOutcome,
  Combatant,
  DamageClass,
  DamageType,
  EffectSummary,
  EquippedItem,
} from '../types/index.js';
import { safeAdd, skillLevelOf } from '../types/index.js';
import type { WorldState } from '../server/world.js';
import type { EventBus } from '../server/event-bus.js';
import type { DiceRoller } from './dice.js';
import type { EffectEngine } from './effect-engine.js';
import type { CombatSessionManager } from './session-manager.js';
import { applyArmor } from './armor.js';
import {
  damageToPools,
  resultValueBonus,
  rollDamageForSuccessValue,
  rollHitLocation,
} from './combat-tables.js';
import {
  DODGE_FATIGUE_COST,
  DUAL_WIELD_FATIGUE_COST,
  OFF_HAND_PENALTY,
  PHYSICALITY_BASELINE,
  SINGLE_ATTACK_FATIGUE_COST,
  TIMED_PENALTY_THRESHOLD,
  UNARMED_WEAPON,
} from '../shared/constants.js';

export interface WeaponProfile {
  name: string;
  skillLevel: number;
  attackValueModifier: number;
  successValueModifier: number;
  damageType: DamageType;
  damageClass: DamageClass;
  isBroken: boolean;
}

function physicalityOf(c: Combatant, summary: EffectSummary): number {
  return skillLevelOf(c, 'Physicality') + (summary.attributeModifiers['Physicality'] ?? 0);
}

export function unarmedProfile(c: Combatant, summary: EffectSummary): WeaponProfile {
  return {
    name: UNARMED_WEAPON.name,
    skillLevel: physicalityOf(c, summary),
    attackValueModifier: 0,
    successValueModifier: 0,
    damageType: UNARMED_WEAPON.damageType,
    damageClass: UNARMED_WEAPON.damageClass,
    isBroken: false,
  };
}

/**
 * The weapon in the requested hand (or a two-handed weapon), else bare
 * hands. A held item without weapon properties counts as bare hands.
 */
export function resolveWeapon(
  c: Combatant,
  items: readonly EquippedItem[],
  offHand: boolean,
  summary: EffectSummary,
): WeaponProfile {
  const slot = offHand ? 'off_hand' : 'main_hand';
  const held = items.find(i => i.slot === slot) ?? items.find(i => i.slot === 'two_hand');
  if (!held?.weapon) return unarmedProfile(c, summary);

  return {
    name: held.name,
    skillLevel: physicalityOf(c, summary) + held.weapon.skillBonus,
    attackValueModifier: held.weapon.attackValueModifier,
    successValueModifier: held.weapon.baseSuccessValueModifier,
    damageType: held.weapon.damageType,
    damageClass: held.weapon.damageClass,
    isBroken: held.isBroken,
  };
}

/** Dodge adjustments from every intact weapon and armor piece worn. */
export function equipmentDodgeModifier(items: readonly EquippedItem[]): number {
  let total = 0;
  for (const item of items) {
    if (item.isBroken) continue;
    total += item.weapon?.dodgeModifier ?? 0;
    total += item.armor?.dodgeModifier ?? 0;
  }
  return total;
}

function fail(reason: AttackFailureReason, message: string): AttackFailure {
  return { ok: false, reason, message };
}

export class AttackResolver {
  private world: WorldState;
  private sessions: CombatSessionManager;
  private effects: EffectEngine;
  private dice: DiceRoller;
  private bus: EventBus;

  constructor(
    world: WorldState,
    sessions: CombatSessionManager,
    effects: EffectEngine,
    dice: DiceRoller,
    bus: EventBus,
  ) {
    this.world = world;
    this.sessions = sessions;
    this.effects = effects;
    this.dice = dice;
    this.bus = bus;
  }

  performMeleeAttack(
    attackerId: EntityId,
    targetId: EntityId,
    now: Timestamp,
    options: AttackOptions = {},
  ): AttackOutcome {
    const attacker = this.world.getCombatant(attackerId);
    const target = this.world.getCombatant(targetId);
    if (!attacker || !target || !attacker.isAlive || !target.isAlive) {
      console.warn(`[Combat] Cannot attack: missing combatant (${attackerId} → ${targetId})`);
      return fail('missing_combatant', 'There is nobody there to fight.');
    }

    // 1. Session
    const session = this.sessions.initiateCombat(attackerId, targetId, now);
    if (!session) {
      return fail('room_mismatch', `${target.name} is not here.`);
    }

    // 2. Fatigue and incapacitation
    const fatigueCost = options.dualWield ? DUAL_WIELD_FATIGUE_COST : SINGLE_ATTACK_FATIGUE_COST;
    if (attacker.currentFatigue < fatigueCost) {
      console.debug(`[Combat] ${attacker.name} has insufficient fatigue (${attacker.currentFatigue}) to attack`);
      return fail('insufficient_fatigue', 'You are too exhausted to attack.');
    }

    const attackerEffects = this.effects.getEffectSummary(attackerId, now);
    if (!attackerEffects.canAct) {
      return fail('incapacitated', 'You are unable to act.');
    }

    // 3. Weapon
    const offHand = options.offHand ?? false;
    const weapon = resolveWeapon(attacker, this.world.getEquippedItems(attackerId), offHand, attackerEffects);
    if (weapon.isBroken) {
      const description = `${attacker.name}'s ${weapon.name} is broken and unusable!`;
      this.sessions.recordAction(session, now, {
        actorId: attackerId,
        targetId,
        actionType: 'broken_weapon',
        description,
      });
      this.bus.publish({
        type: 'combat_action',
        sessionId: session.id,
        roomId: attacker.roomId,
        actorId: attackerId,
        actorName: attacker.name,
        targetId,
        targetName: target.name,
        description,
        damage: null,
        isHit: false,
        soundLevel: 'quiet',
        at: now,
      });
      return fail('broken_weapon', description);
    }

    // 4. Attack value
    const attackValue = weapon.skillLevel
      - (offHand ? OFF_HAND_PENALTY : 0)
      + weapon.attackValueModifier
      + this.sessions.getTotalTimedPenalty(attackerId, now)
      + attackerEffects.attackValueModifier
      + this.dice.rollExplodingSymmetric();

    // 5. Defense value
    const defenderEffects = this.effects.getEffectSummary(targetId, now);
    const defenderItems = this.world.getEquippedItems(targetId);
    const parrying = this.sessions.isInParryMode(targetId);
    const defenseSkill = parrying
      ? resolveWeapon(target, defenderItems, false, defenderEffects).skillLevel
      : skillLevelOf(target, 'Dodge')
        + (defenderEffects.attributeModifiers['Dodge'] ?? 0)
        + equipmentDodgeModifier(defenderItems);
    const defenseValue = defenseSkill
      + defenderEffects.defenseValueModifier
      + this.dice.rollExplodingSymmetric();

    // 6. Success value
    const successValue = attackValue - defenseValue;

    // 7. Fatigue costs
    attacker.currentFatigue = Math.max(0, attacker.currentFatigue - fatigueCost);
    if (!parrying && target.currentFatigue > 0) {
      target.currentFatigue = Math.max(0, target.currentFatigue - DODGE_FATIGUE_COST);
    }

    // 8. Penalty for a badly failed attack
    if (successValue <= TIMED_PENALTY_THRESHOLD) {
      this.sessions.applyTimedPenalty(attackerId, successValue, now);
    }

    this.publishSkillUse(attacker, weapon.name, successValue >= 0, 'melee_attack', now);
    this.publishSkillUse(target, parrying ? 'Parry' : 'Dodge', successValue < 0, 'melee_defense', now);

    // 9. Miss
    if (successValue < 0) {
      const description = `${attacker.name} attacks ${target.name} but misses!`;
      const log = this.sessions.recordAction(session, now, {
        actorId: attackerId,
        targetId,
        actionType: 'melee_attack',
        attackValue,
        defenseValue,
        successValue,
        description,
      });
      this.bus.publish({
        type: 'combat_action',
        sessionId: session.id,
        roomId: attacker.roomId,
        actorId: attackerId,
        actorName: attacker.name,
        targetId,
        targetName: target.name,
        description,
        damage: null,
        isHit: false,
        soundLevel: 'normal',
        at: now,
      });
      return {
        ok: true,
        sessionId: session.id,
        hit: false,
        attackValue,
        defenseValue,
        successValue,
        resultValue: null,
        finalSuccessValue: null,
        hitLocation: null,
        rawDamage: 0,
        damage: { fatigue: 0, vitality: 0, wounds: 0 },
        targetDied: false,
        log,
      };
    }

    // 10. Physicality check
    const resultValue = physicalityOf(attacker, attackerEffects)
      + this.dice.rollExplodingSymmetric()
      - PHYSICALITY_BASELINE;
    const boostedSuccessValue = successValue + resultValueBonus(resultValue) + weapon.successValueModifier;
    if (resultValue <= TIMED_PENALTY_THRESHOLD) {
      this.sessions.applyTimedPenalty(attackerId, resultValue, now);
    }

    // 11. Hit location
    const hitLocation = rollHitLocation(this.dice);

    // 12. Armor
    const mitigation = applyArmor(
      boostedSuccessValue,
      defenderItems,
      hitLocation,
      weapon.damageType,
      weapon.damageClass,
    );
    if (mitigation.totalAbsorption > 0) {
      console.debug(
        `[Combat] ${target.name}'s armor absorbed ${mitigation.totalAbsorption} ` +
        `(SV ${boostedSuccessValue} → ${mitigation.finalSuccessValue})`,
      );
    }

    // 13. Damage
    const rawDamage = rollDamageForSuccessValue(mitigation.finalSuccessValue, this.dice);
    const multiplier = (1 + attackerEffects.damageDealtModifier) * (1 + defenderEffects.damageReceivedModifier);
    const damage = damageToPools(Math.max(0, Math.round(rawDamage * multiplier)));

    // 14. Pending pools and wounds
    target.pendingFatigueDamage = safeAdd(target.pendingFatigueDamage, damage.fatigue);
    target.pendingVitalityDamage = safeAdd(target.pendingVitalityDamage, damage.vitality);
    // A location already at max stacks only refreshes; the counter tracks stacks held.
    let woundsAdded = 0;
    for (let i = 0; i < damage.wounds; i++) {
      const applied = this.effects.applyWound(targetId, hitLocation, now);
      if (!applied.ok) {
        console.warn(`[Combat] Could not apply wound to ${target.name}: ${applied.message}`);
        break;
      }
      if (!applied.wasRefreshed) woundsAdded++;
    }
    target.wounds = safeAdd(target.wounds, woundsAdded);

    // 15. Log, publish, death
    const log = this.sessions.recordAction(session, now, {
      actorId: attackerId,
      targetId,
      actionType: 'melee_attack',
      attackValue,
      defenseValue,
      successValue,
      damageDealt: damage.fatigue + damage.vitality,
      fatigueDamage: damage.fatigue,
      vitalityDamage: damage.vitality,
      wounds: damage.wounds,
      hitLocation,
      damageType: weapon.damageType,
      description: `${attacker.name} hits ${target.name} for ${damage.fatigue + damage.vitality} damage!`,
    });
    this.bus.publish({
      type: 'combat_action',
      sessionId: session.id,
      roomId: attacker.roomId,
      actorId: attackerId,
      actorName: attacker.name,
      targetId,
      targetName: target.name,
      description: `${attacker.name} hits ${target.name} dealing ${damage.fatigue} FAT and ${damage.vitality} VIT damage!`,
      damage,
      isHit: true,
      soundLevel: 'normal',
      at: now,
    });

    const targetDied = target.currentVitality <= 0;
    if (targetDied) {
      this.sessions.handleDeath(targetId, now, attackerId);
    }

    return {
      ok: true,
      sessionId: session.id,
      hit: true,
      attackValue,
      defenseValue,
      successValue,
      resultValue,
      finalSuccessValue: mitigation.finalSuccessValue,
      hitLocation,
      rawDamage,
      damage,
      targetDied,
      log,
    };
  }

  performRangedAttack(attackerId: EntityId, targetId: EntityId, range: number): AttackOutcome {
    console.warn(`[Combat] Ranged attack ${attackerId} → ${targetId} at range ${range} is not implemented`);
    return fail('not_implemented', 'Ranged combat is not available yet.');
  }

  performKnockback(attackerId: EntityId, targetId: EntityId): AttackOutcome {
    console.warn(`[Combat] Knockback ${attackerId} → ${targetId} is not implemented`);
    return fail('not_implemented', 'Knockback is not available yet.');
  }

  private publishSkillUse(
    c: Combatant,
    skillName: string,
    succeeded: boolean,
    context: string,
    now: Timestamp,
  ): void {
    this.bus.publish({
      type: 'skill_used',
      combatantId: c.id,
      skillName,
      usageType: 'routine_use',
      basePoints: 1,
      context,
      succeeded,
      at: now,
    });
  }
}
