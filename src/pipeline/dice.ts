// pipeline/dice.ts — Fudge dice (4dF), exploding rolls, polyhedral dice

import type { Rng } from '../server/rng.js';
import { FUDGE_FACES, MAX_EXPLOSION_REROLLS } from '../shared/constants.js';
import { clamp } from '../shared/utils.js';

export interface DiceRoller {
  rollSymmetric(): number;
  rollExplodingSymmetric(): number;
  /** One die, 1..sides. */
  rollDie(sides: number): number;
  /** Sum of `count` dice, each 1..sides. */
  rollDice(count: number, sides: number): number;
}

export class Dice implements DiceRoller {
  private rng: Rng;

  constructor(rng: Rng) {
    this.rng = rng;
  }

  rollFudgeDie(): number {
    return FUDGE_FACES[this.rng.nextInt(0, FUDGE_FACES.length - 1)] ?? 0;
  }

  /** 4dF, range [-4, +4]. */
  rollSymmetric(): number {
    let total = 0;
    for (let i = 0; i < 4; i++) {
      total += this.rollFudgeDie();
    }
    return total;
  }

  /**
   * 4dF that explodes on ±4: roll four more, add the dice showing the same
   * sign, and keep going while a re-roll lands all four on that sign.
   */
  rollExplodingSymmetric(): number {
    let total = this.rollSymmetric();
    if (Math.abs(total) !== 4) return total;

    const sign = Math.sign(total);
    for (let reroll = 0; reroll < MAX_EXPLOSION_REROLLS; reroll++) {
      let matches = 0;
      for (let i = 0; i < 4; i++) {
        if (this.rollFudgeDie() === sign) matches++;
      }
      total += sign * matches;
      if (matches !== 4) break;
    }
    return total;
  }

  rollMultipleSymmetric(count: number): number[] {
    return Array.from({ length: count }, () => this.rollSymmetric());
  }

  rollSymmetricWithModifier(modifier: number, min = 1, max = 20): number {
    return clamp(modifier + this.rollSymmetric(), min, max);
  }

  rollDie(sides: number): number {
    if (sides < 1) return 0;
    return this.rng.nextInt(1, sides);
  }

  rollDice(count: number, sides: number): number {
    let total = 0;
    for (let i = 0; i < count; i++) {
      total += this.rollDie(sides);
    }
    return total;
  }
}
