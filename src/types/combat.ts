// types/combat.ts — Sessions, participants, attack outcomes

import type { EntityId, RoomId, Timestamp } from './core.js';
import type { CombatantKind } from './combatant.js';
import type { DamageType } from './equipment.js';

export type HitLocation = 'head' | 'torso' | 'left_arm' | 'right_arm' | 'left_leg' | 'right_leg';

export interface TimedPenalty {
  amount: number;
  expiresAt: Timestamp;
}

export interface CombatParticipant {
  combatantId: EntityId;
  kind: CombatantKind;
  name: string;
  isActive: boolean;
  isInParryMode: boolean;
  timedPenalties: TimedPenalty[];
  joinedAt: Timestamp;
  leftAt: Timestamp | null;
  leaveReason: string | null;
}

export type CombatActionType = 'melee_attack' | 'flee' | 'enter_parry' | 'exit_parry' | 'broken_weapon';

export interface CombatActionLog {
  readonly id: string;
  readonly sessionId: string;
  readonly timestamp: Timestamp;
  readonly actorId: EntityId;
  readonly targetId: EntityId | null;
  readonly actionType: CombatActionType;
  readonly attackValue: number | null;
  readonly defenseValue: number | null;
  readonly successValue: number | null;
  readonly damageDealt: number;
  readonly fatigueDamage: number;
  readonly vitalityDamage: number;
  readonly wounds: number;
  readonly hitLocation: HitLocation | null;
  readonly damageType: DamageType | null;
  readonly description: string;
}

export interface CombatSession {
  id: string;
  roomId: RoomId;
  isActive: boolean;
  startedAt: Timestamp;
  endedAt: Timestamp | null;
  endReason: string | null;
  participants: CombatParticipant[];
  actionLog: CombatActionLog[];
}

export interface DamageTriple {
  fatigue: number;
  vitality: number;
  wounds: number;
}

export interface AttackOptions {
  dualWield?: boolean;
  offHand?: boolean;
}

export type AttackFailureReason =
  | 'room_mismatch'
  | 'missing_combatant'
  | 'insufficient_fatigue'
  | 'broken_weapon'
  | 'incapacitated'
  | 'not_implemented';

export interface AttackFailure {
  ok: false;
  reason: AttackFailureReason;
  message: string;
}

export interface AttackResult {
  ok: true;
  sessionId: string;
  hit: boolean;
  attackValue: number;
  defenseValue: number;
  successValue: number;
  /** Physicality result value; null on a miss. */
  resultValue: number | null;
  /** Success value after the physicality bonus and armor; null on a miss. */
  finalSuccessValue: number | null;
  hitLocation: HitLocation | null;
  rawDamage: number;
  damage: DamageTriple;
  targetDied: boolean;
  log: CombatActionLog;
}

export type AttackOutcome = AttackResult | AttackFailure;
