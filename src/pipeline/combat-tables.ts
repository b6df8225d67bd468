// pipeline/combat-tables.ts — Fixed lookup tables: RV bonus, penalties, hit location, damage

import type { DamageTriple, HitLocation } from '../types/index.js';
import type { DiceRoller } from './dice.js';
import { RESULT_VALUE_BONUS, ROUND_MS, TIMED_PENALTY_TABLE } from '../shared/constants.js';

export function resultValueBonus(resultValue: number): number {
  for (const row of RESULT_VALUE_BONUS) {
    if (resultValue >= row.min) return row.bonus;
  }
  return 0;
}

export interface PenaltySeverity {
  amount: number;
  durationMs: number;
}

/** null when the value is not bad enough to earn a penalty. */
export function penaltyForValue(value: number): PenaltySeverity | null {
  for (const row of TIMED_PENALTY_TABLE) {
    if (value <= row.max) return { amount: row.amount, durationMs: row.rounds * ROUND_MS };
  }
  return null;
}

/** 1d12 with a head/torso sub-roll on a 1. */
export function rollHitLocation(dice: DiceRoller): HitLocation {
  const roll = dice.rollDie(12);
  if (roll === 1) return dice.rollDie(12) <= 6 ? 'head' : 'torso';
  if (roll <= 6) return 'torso';
  if (roll === 7) return 'left_arm';
  if (roll === 8) return 'right_arm';
  if (roll <= 10) return 'left_leg';
  return 'right_leg';
}

/** Raw damage for a final success value. Negative values deal nothing. */
export function rollDamageForSuccessValue(sv: number, dice: DiceRoller): number {
  if (sv < 0) return 0;
  switch (sv) {
    case 0: return Math.floor(dice.rollDie(6) / 3);
    case 1: return Math.floor(dice.rollDie(6) / 2);
    case 2: return dice.rollDie(6);
    case 3: return dice.rollDie(8);
    case 4: return dice.rollDie(10);
    case 5: return dice.rollDie(12);
    case 6: return dice.rollDice(2, 8);
    case 7: return dice.rollDice(2, 8);
    case 8: return dice.rollDice(2, 10);
    case 9: return dice.rollDice(2, 12);
    case 10: return dice.rollDice(3, 10);
    case 11: return dice.rollDice(3, 12);
    case 12:
    case 13:
    case 14:
      return dice.rollDice(4, 10);
    default:
      return dice.rollDie(6) * 10;
  }
}

/** Splits raw damage into fatigue, vitality and wounds. */
export function damageToPools(damage: number): DamageTriple {
  const d = Math.max(0, Math.floor(damage));
  if (d <= 4) return { fatigue: d, vitality: 0, wounds: 0 };
  switch (d) {
    case 5: return { fatigue: 5, vitality: 1, wounds: 0 };
    case 6: return { fatigue: 6, vitality: 2, wounds: 0 };
    case 7: return { fatigue: 7, vitality: 4, wounds: 1 };
    case 8: return { fatigue: 8, vitality: 6, wounds: 1 };
    case 9: return { fatigue: 9, vitality: 8, wounds: 1 };
    case 10: return { fatigue: 10, vitality: 10, wounds: 2 };
    case 15: return { fatigue: 15, vitality: 15, wounds: 3 };
    default:
      if (d < 15) return { fatigue: d, vitality: d, wounds: 2 };
      return { fatigue: d, vitality: d, wounds: 3 + Math.floor((d - 16) / 5) };
  }
}
