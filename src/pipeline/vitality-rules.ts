// pipeline/vitality-rules.ts — Action gating and regen pacing from available pools

import { HOUR_MS, MINUTE_MS } from '../shared/constants.js';

export interface FocusCheck {
  targetValue: number;
  failureMessage: string;
}

export type ActionRestriction =
  | { kind: 'allowed' }
  | { kind: 'blocked'; message: string }
  | { kind: 'focus_check'; check: FocusCheck };

/** Current minus any damage still queued against it; queued healing does not count. */
export function calculateAvailable(current: number, pending: number): number {
  return Math.max(0, current - Math.max(0, pending));
}

export function evaluateVitalityRestriction(availableVitality: number): ActionRestriction {
  switch (availableVitality) {
    case 0:
      return { kind: 'blocked', message: 'You have died.' };
    case 1:
      return { kind: 'blocked', message: 'You are too grievously injured to move.' };
    case 2:
      return {
        kind: 'focus_check',
        check: {
          targetValue: 12,
          failureMessage: 'You hover on the edge of death and your limbs refuse to move.',
        },
      };
    case 3:
      return {
        kind: 'focus_check',
        check: {
          targetValue: 7,
          failureMessage: 'Pain grips every nerve; you cannot force your body to respond.',
        },
      };
    default:
      return { kind: 'allowed' };
  }
}

export function evaluateFatigueRestriction(availableFatigue: number): ActionRestriction {
  switch (availableFatigue) {
    case 1:
      return {
        kind: 'focus_check',
        check: {
          targetValue: 12,
          failureMessage: 'You sway on your feet and blackness creeps at the edge of your sight.',
        },
      };
    case 2:
      return {
        kind: 'focus_check',
        check: { targetValue: 7, failureMessage: 'Your vision swims as exhaustion overtakes you.' },
      };
    case 3:
      return {
        kind: 'focus_check',
        check: {
          targetValue: 5,
          failureMessage: "You force yourself to stay upright, but you can't muster the focus to act.",
        },
      };
    default:
      return { kind: 'allowed' };
  }
}

/**
 * Milliseconds between passive fatigue regen points, slowed as vitality runs
 * low. null = no fatigue regeneration at all.
 */
export function fatigueRegenInterval(availableVitality: number, baseIntervalMs: number): number | null {
  if (availableVitality <= 1) return null;
  if (availableVitality === 2) return HOUR_MS;
  if (availableVitality === 3) return 30 * MINUTE_MS;
  if (availableVitality === 4) return MINUTE_MS;
  return baseIntervalMs;
}
