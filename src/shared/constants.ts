// shared/constants.ts — All combat and vitality constants

export const TICK_RATE_MS = 3000;
export const SNAPSHOT_INTERVAL_TICKS = 20;
export const SLOW_TICK_WARN_MS = 500;

/** One combat round, used for timed penalty durations. */
export const ROUND_MS = 3000;

export const SECOND_MS = 1000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;

// Dice
export const MAX_EXPLOSION_REROLLS = 20;
export const FUDGE_FACES = [0, 0, 1, 1, -1, -1] as const;

// Attack resolution
export const DUAL_WIELD_FATIGUE_COST = 2;
export const SINGLE_ATTACK_FATIGUE_COST = 1;
export const DODGE_FATIGUE_COST = 1;
export const OFF_HAND_PENALTY = 2;
export const PHYSICALITY_BASELINE = 8;
export const TIMED_PENALTY_THRESHOLD = -3;

export const UNARMED_WEAPON = {
  name: 'Unarmed Combat',
  skill: 'Physicality',
  damageType: 'bashing',
  damageClass: 1,
} as const;

/** Result value → success value bonus, checked top-down. */
export const RESULT_VALUE_BONUS = [
  { min: 12, bonus: 4 },
  { min: 8, bonus: 3 },
  { min: 4, bonus: 2 },
  { min: 2, bonus: 1 },
] as const;

/** Severity table for timed penalties, checked top-down. */
export const TIMED_PENALTY_TABLE = [
  { max: -9, amount: -3, rounds: 3 },
  { max: -7, amount: -2, rounds: 2 },
  { max: -5, amount: -2, rounds: 1 },
  { max: -3, amount: -1, rounds: 1 },
] as const;

// Health processing
export const FATIGUE_CRASH_VITALITY_DAMAGE = 2;
export const FATIGUE_REGEN_AMOUNT = 1;
export const VITALITY_REGEN_INTERVAL_MS = HOUR_MS;
export const WOUND_HEAL_INTERVAL_MS = 4 * HOUR_MS;
export const WOUND_ATTACK_PENALTY = 2;
export const WOUND_EFFECT_NAME = 'Wound';

// NPC policy
export const DEFAULT_FLEE_THRESHOLD = 0.25;
export const MIN_FATIGUE_FOR_DODGE = 3;
