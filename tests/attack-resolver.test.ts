// tests/attack-resolver.test.ts — Melee attack resolution

import { describe, it, expect, beforeEach } from 'vitest';
import type { AttackOutcome, AttackResult } from '../src/types/index.js';
import { resolveWeapon, equipmentDodgeModifier } from '../src/pipeline/attack-resolver.js';
import { emptySummary } from '../src/pipeline/effect-engine.js';
import {
  T0,
  ScriptedDice,
  createHarness,
  createNpc,
  createPlayer,
  createWeapon,
  eventsOfType,
  playerAttributes,
  type Harness,
} from './helpers.js';

function expectHit(outcome: AttackOutcome): AttackResult {
  if (!outcome.ok) throw new Error(`attack failed: ${outcome.reason}`);
  return outcome;
}

describe('AttackResolver.performMeleeAttack', () => {
  let h: Harness;
  let dice: ScriptedDice;

  beforeEach(() => {
    dice = new ScriptedDice();
    h = createHarness(dice);
    h.world.addCombatant(createPlayer({ id: 'p1', name: 'Aldric' }));
    h.world.addCombatant(createPlayer({ id: 'p2', name: 'Brenna' }));
  });

  it('resolves a hit from attack roll through damage pools', () => {
    h.world.equip('p1', createWeapon({}, { skillBonus: 2 }));
    dice.exploding = [2, 0, 3];
    dice.dice = [4, 4, 5];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0));

    expect(result.hit).toBe(true);
    expect(result.attackValue).toBe(14);
    expect(result.defenseValue).toBe(10);
    expect(result.successValue).toBe(4);
    expect(result.resultValue).toBe(5);
    expect(result.finalSuccessValue).toBe(6);
    expect(result.hitLocation).toBe('torso');
    expect(dice.sides).toEqual([12, 8, 8]);
    expect(result.rawDamage).toBe(9);
    expect(result.damage).toEqual({ fatigue: 9, vitality: 8, wounds: 1 });
    expect(result.targetDied).toBe(false);

    const target = h.world.getCombatant('p2');
    expect(target?.pendingFatigueDamage).toBe(9);
    expect(target?.pendingVitalityDamage).toBe(8);
    expect(target?.wounds).toBe(1);
    expect(h.effects.getWoundsByLocation('p2', T0)).toEqual({ torso: 1 });
  });

  it('charges the attacker and the dodging defender one fatigue each', () => {
    dice.exploding = [2, 0, 3];
    dice.dice = [4, 4];
    h.attacks.performMeleeAttack('p1', 'p2', T0);

    expect(h.world.getCombatant('p1')?.currentFatigue).toBe(14);
    expect(h.world.getCombatant('p2')?.currentFatigue).toBe(14);
  });

  it('logs the hit and publishes it', () => {
    h.world.equip('p1', createWeapon({}, { skillBonus: 2 }));
    dice.exploding = [2, 0, 3];
    dice.dice = [4, 4, 5];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0));
    const session = h.sessions.getActiveSession('p1');

    expect(session?.actionLog).toEqual([result.log]);
    expect(result.log).toMatchObject({
      actorId: 'p1',
      targetId: 'p2',
      actionType: 'melee_attack',
      attackValue: 14,
      defenseValue: 10,
      successValue: 4,
      damageDealt: 17,
      fatigueDamage: 9,
      vitalityDamage: 8,
      wounds: 1,
      hitLocation: 'torso',
      damageType: 'cutting',
      description: 'Aldric hits Brenna for 17 damage!',
    });

    expect(h.events.map(e => e.type)).toEqual([
      'combat_started',
      'skill_used',
      'skill_used',
      'combat_action',
    ]);
    const [action] = eventsOfType(h.events, 'combat_action');
    expect(action?.description).toBe('Aldric hits Brenna dealing 9 FAT and 8 VIT damage!');
    expect(action?.isHit).toBe(true);
    expect(action?.damage).toEqual({ fatigue: 9, vitality: 8, wounds: 1 });

    const skills = eventsOfType(h.events, 'skill_used');
    expect(skills.map(s => [s.combatantId, s.skillName, s.context, s.succeeded])).toEqual([
      ['p1', 'Longsword', 'melee_attack', true],
      ['p2', 'Dodge', 'melee_defense', false],
    ]);
  });

  it('misses on a negative success value and penalises a bad swing', () => {
    dice.exploding = [-2, 3];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0));

    expect(result.hit).toBe(false);
    expect(result.attackValue).toBe(8);
    expect(result.defenseValue).toBe(13);
    expect(result.successValue).toBe(-5);
    expect(result.resultValue).toBeNull();
    expect(result.damage).toEqual({ fatigue: 0, vitality: 0, wounds: 0 });
    expect(result.log.description).toBe('Aldric attacks Brenna but misses!');
    expect(dice.sides).toEqual([]);
    expect(h.world.getCombatant('p2')?.pendingFatigueDamage).toBe(0);

    expect(h.sessions.getTotalTimedPenalty('p1', T0)).toBe(-2);
    expect(h.sessions.getTotalTimedPenalty('p1', T0 + 3000)).toBe(0);
  });

  it('applies active timed penalties to the next attack', () => {
    dice.exploding = [-2, 3, 0, 0];

    h.attacks.performMeleeAttack('p1', 'p2', T0);
    const second = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0 + 1000));

    expect(second.attackValue).toBe(8);
    expect(second.successValue).toBe(-2);
    expect(h.sessions.getTotalTimedPenalty('p1', T0 + 1000)).toBe(-2);
  });

  it('penalises a poor physicality check', () => {
    h.world.addCombatant(createPlayer({
      id: 'p3',
      name: 'Weakling',
      attributes: playerAttributes({ Physicality: 4 }),
    }));
    dice.exploding = [6, 0, -2];
    dice.dice = [4, 3];

    const result = expectHit(h.attacks.performMeleeAttack('p3', 'p2', T0));

    // AV 4 + 6 = 10 vs DV 10; RV 4 - 2 - 8 = -6
    expect(result.successValue).toBe(0);
    expect(result.resultValue).toBe(-6);
    expect(result.finalSuccessValue).toBe(0);
    expect(result.rawDamage).toBe(1);
    expect(h.sessions.getTotalTimedPenalty('p3', T0)).toBe(-2);
  });

  it('reduces attack value for the off hand', () => {
    h.world.equip('p1', createWeapon({ id: 'item_dagger', name: 'Dagger', slot: 'off_hand' }, { skillBonus: 1 }));
    dice.exploding = [0, 0];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0, { offHand: true }));
    expect(result.attackValue).toBe(9);
  });

  it('costs two fatigue when dual wielding', () => {
    dice.exploding = [-4, 4];
    h.attacks.performMeleeAttack('p1', 'p2', T0, { dualWield: true });
    expect(h.world.getCombatant('p1')?.currentFatigue).toBe(13);
  });

  it('defends with the weapon skill while parrying and spends no defender fatigue', () => {
    h.world.equip('p2', createWeapon({ id: 'item_axe', name: 'Axe' }, { skillBonus: 3 }));
    h.sessions.initiateCombat('p1', 'p2', T0);
    h.sessions.setParryMode('p2', true, T0);
    dice.exploding = [0, 0];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0));

    expect(result.defenseValue).toBe(13);
    expect(result.successValue).toBe(-3);
    expect(h.world.getCombatant('p2')?.currentFatigue).toBe(15);
    expect(h.sessions.getTotalTimedPenalty('p1', T0)).toBe(-1);

    const defense = eventsOfType(h.events, 'skill_used').find(e => e.combatantId === 'p2');
    expect(defense?.skillName).toBe('Parry');
    expect(defense?.succeeded).toBe(true);
  });

  it('adds equipment dodge modifiers when dodging', () => {
    h.world.equip('p2', {
      id: 'item_leather',
      name: 'Leather Jerkin',
      slot: 'chest',
      isBroken: false,
      armor: { absorption: {}, damageClass: 1, dodgeModifier: -1, layerPriority: 0 },
    });
    dice.exploding = [0, 0];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0));
    expect(result.defenseValue).toBe(9);
  });

  it('mitigates with armor covering the hit location', () => {
    h.world.equip('p1', createWeapon({}, { skillBonus: 2 }));
    h.world.equip('p2', {
      id: 'item_mail',
      name: 'Mail Shirt',
      slot: 'chest',
      isBroken: false,
      armor: { absorption: { cutting: 2 }, damageClass: 2, dodgeModifier: 0, layerPriority: 0 },
    });
    dice.exploding = [2, 0, 3];
    dice.dice = [4, 7];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0));

    expect(result.finalSuccessValue).toBe(4);
    expect(dice.sides).toEqual([12, 10]);
    expect(result.damage).toEqual({ fatigue: 7, vitality: 4, wounds: 1 });
  });

  it('applies effect modifiers to attack and defense values', () => {
    h.effects.applyEffect('p1', 'Battle Focus', T0);
    h.effects.applyEffect('p2', 'Iron Skin', T0);
    dice.exploding = [0, 0, 0];
    dice.dice = [4, 6];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0));

    expect(result.attackValue).toBe(12);
    expect(result.defenseValue).toBe(12);
    expect(result.resultValue).toBe(2);
    expect(result.finalSuccessValue).toBe(1);
    expect(result.damage).toEqual({ fatigue: 3, vitality: 0, wounds: 0 });
  });

  it('lowers attack value by two per wound stack', () => {
    h.effects.applyWound('p1', 'left_arm', T0);
    h.effects.applyWound('p1', 'left_arm', T0);
    dice.exploding = [0, 0];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0));
    expect(result.attackValue).toBe(6);
  });

  it('scales raw damage by damage dealt and received modifiers', () => {
    h.world.equip('p1', createWeapon({}, { skillBonus: 2 }));
    h.effects.applyEffect('p1', 'Curse', T0);
    dice.exploding = [2, 0, 3];
    dice.dice = [4, 4, 5];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0));

    // 9 × 0.75 = 6.75
    expect(result.rawDamage).toBe(9);
    expect(result.damage).toEqual({ fatigue: 7, vitality: 4, wounds: 1 });
  });

  it('kills a target already at zero vitality and despawns the NPC', () => {
    h.world.addCombatant(createNpc({ id: 'n1', name: 'Goblin', currentVitality: 0 }));
    dice.exploding = [2, 0, 3];
    dice.dice = [4, 4, 5];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'n1', T0));
    const npc = h.world.getCombatant('n1');

    expect(result.targetDied).toBe(true);
    expect(npc?.isAlive).toBe(false);
    expect(npc?.kind === 'npc' ? npc.despawnReason : null).toBe('death');

    const [ended] = eventsOfType(h.events, 'combat_ended');
    expect(ended?.reason).toBe('Goblin died');
    expect(ended?.winnerId).toBe('p1');
    expect(ended?.winnerName).toBe('Aldric');
    expect(h.sessions.isInCombat('p1')).toBe(false);
  });

  it('fails with room_mismatch when the target is elsewhere', () => {
    h.world.moveCombatant('p2', 2);
    const outcome = h.attacks.performMeleeAttack('p1', 'p2', T0);

    expect(outcome).toEqual({ ok: false, reason: 'room_mismatch', message: 'Brenna is not here.' });
    expect(h.world.sessions.size).toBe(0);
  });

  it('fails with missing_combatant for an unknown target', () => {
    const outcome = h.attacks.performMeleeAttack('p1', 'ghost', T0);
    expect(outcome.ok ? null : outcome.reason).toBe('missing_combatant');
  });

  it('fails with insufficient_fatigue when too tired to swing', () => {
    const attacker = h.world.getCombatant('p1');
    if (attacker) attacker.currentFatigue = 1;

    const outcome = h.attacks.performMeleeAttack('p1', 'p2', T0, { dualWield: true });

    expect(outcome.ok ? null : outcome.reason).toBe('insufficient_fatigue');
    expect(attacker?.currentFatigue).toBe(1);
  });

  it('fails with incapacitated while stunned', () => {
    h.effects.applyEffect('p1', 'Stunned', T0);
    const outcome = h.attacks.performMeleeAttack('p1', 'p2', T0);
    expect(outcome.ok ? null : outcome.reason).toBe('incapacitated');
  });

  it('attacks unarmed when the hand holds something that is not a weapon', () => {
    h.world.equip('p1', {
      id: 'item_torch',
      name: 'Torch',
      slot: 'main_hand',
      isBroken: false,
    });
    dice.exploding = [2, 0, 3];
    dice.dice = [4, 4, 5];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0));

    expect(result.attackValue).toBe(12);
    expect(result.successValue).toBe(2);
    expect(eventsOfType(h.events, 'skill_used')[0]).toMatchObject({
      combatantId: 'p1',
      skillName: 'Unarmed Combat',
      context: 'melee_attack',
    });
  });

  it('fails with room_mismatch against a target in another room while already fighting', () => {
    h.world.addCombatant(createPlayer({ id: 'p3', name: 'Cedric', roomId: 2 }));
    const session = h.sessions.initiateCombat('p1', 'p2', T0);
    dice.exploding = [2, 0, 3];
    dice.dice = [4, 4, 5];

    const outcome = h.attacks.performMeleeAttack('p1', 'p3', T0);

    expect(outcome).toEqual({ ok: false, reason: 'room_mismatch', message: 'Cedric is not here.' });
    expect(h.world.getCombatant('p3')?.pendingVitalityDamage).toBe(0);
    expect(h.world.getCombatant('p1')?.currentFatigue).toBe(15);
    expect(session?.participants.map(p => p.combatantId)).toEqual(['p1', 'p2']);
    expect(dice.exploding).toEqual([2, 0, 3]);
  });

  it('stops counting wounds once a location holds the maximum stacks', () => {
    h.world.equip('p1', createWeapon({}, { skillBonus: 2 }));
    for (let i = 0; i < 10; i++) h.effects.applyWound('p2', 'torso', T0);
    const target = h.world.getCombatant('p2');
    if (target) target.wounds = 10;
    dice.exploding = [2, 0, 3];
    dice.dice = [4, 4, 5];

    const result = expectHit(h.attacks.performMeleeAttack('p1', 'p2', T0));

    expect(result.damage.wounds).toBe(1);
    expect(target?.wounds).toBe(10);
    expect(h.effects.getWoundsByLocation('p2', T0)).toEqual({ torso: 10 });

    expect(h.effects.healWounds('p2', 0, T0)).toBe(10);
    expect(target?.wounds).toBe(0);
  });

  it('logs and publishes a broken weapon without consuming fatigue', () => {
    h.world.equip('p1', createWeapon({ name: 'Rusty Sword', isBroken: true }));

    const outcome = h.attacks.performMeleeAttack('p1', 'p2', T0);

    expect(outcome).toEqual({
      ok: false,
      reason: 'broken_weapon',
      message: "Aldric's Rusty Sword is broken and unusable!",
    });
    expect(h.world.getCombatant('p1')?.currentFatigue).toBe(15);
    expect(h.sessions.getActiveSession('p1')?.actionLog.map(l => l.actionType)).toEqual(['broken_weapon']);
    expect(eventsOfType(h.events, 'combat_action')[0]?.soundLevel).toBe('quiet');
  });
});

describe('AttackResolver stubs', () => {
  it('reports ranged attacks and knockback as not implemented', () => {
    const h = createHarness();
    expect(h.attacks.performRangedAttack('p1', 'p2', 3)).toEqual({
      ok: false,
      reason: 'not_implemented',
      message: 'Ranged combat is not available yet.',
    });
    expect(h.attacks.performKnockback('p1', 'p2')).toEqual({
      ok: false,
      reason: 'not_implemented',
      message: 'Knockback is not available yet.',
    });
  });
});

describe('resolveWeapon', () => {
  const player = createPlayer({ attributes: playerAttributes({ Physicality: 9 }) });

  it('falls back to unarmed combat with empty hands', () => {
    expect(resolveWeapon(player, [], false, emptySummary('p1'))).toEqual({
      name: 'Unarmed Combat',
      skillLevel: 9,
      attackValueModifier: 0,
      successValueModifier: 0,
      damageType: 'bashing',
      damageClass: 1,
      isBroken: false,
    });
  });

  it('uses a two-handed weapon for either hand', () => {
    const greatsword = createWeapon(
      { id: 'item_great', name: 'Greatsword', slot: 'two_hand' },
      { skillBonus: 3, attackValueModifier: 1, baseSuccessValueModifier: 2, damageClass: 4 },
    );
    const profile = resolveWeapon(player, [greatsword], true, emptySummary('p1'));
    expect(profile).toMatchObject({
      name: 'Greatsword',
      skillLevel: 12,
      attackValueModifier: 1,
      successValueModifier: 2,
      damageClass: 4,
    });
  });

  it('adds the effect Physicality modifier', () => {
    const summary = emptySummary('p1');
    summary.attributeModifiers['Physicality'] = 2;
    expect(resolveWeapon(player, [], false, summary)?.skillLevel).toBe(11);
  });
});

describe('equipmentDodgeModifier', () => {
  it('sums intact weapons and armor only', () => {
    const items = [
      createWeapon({}, { dodgeModifier: 1 }),
      createWeapon({ id: 'item_broken', slot: 'off_hand', isBroken: true }, { dodgeModifier: 5 }),
      {
        id: 'item_plate',
        name: 'Plate',
        slot: 'chest' as const,
        isBroken: false,
        armor: { absorption: {}, damageClass: 4 as const, dodgeModifier: -3, layerPriority: 0 },
      },
    ];
    expect(equipmentDodgeModifier(items)).toBe(-2);
  });
});
