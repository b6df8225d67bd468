// types/events.ts — Events published on the game bus

import type { EntityId, RoomId, Timestamp } from './core.js';
import type { DamageTriple } from './combat.js';

export type SoundLevel = 'quiet' | 'normal' | 'loud';

export type SkillUsageType =
  | 'routine_use'
  | 'challenging_use'
  | 'critical_success'
  | 'teaching_others'
  | 'training_practice';

export type GameEvent =
  | {
      type: 'combat_started';
      sessionId: string;
      roomId: RoomId;
      initiatorId: EntityId;
      initiatorName: string;
      targetId: EntityId;
      targetName: string;
      soundLevel: SoundLevel;
      at: Timestamp;
    }
  | {
      type: 'combat_action';
      sessionId: string | null;
      roomId: RoomId;
      actorId: EntityId;
      actorName: string;
      targetId: EntityId | null;
      targetName: string | null;
      description: string;
      damage: DamageTriple | null;
      isHit: boolean;
      soundLevel: SoundLevel;
      at: Timestamp;
    }
  | {
      type: 'combat_ended';
      sessionId: string;
      roomId: RoomId;
      reason: string;
      winnerId: EntityId | null;
      winnerName: string | null;
      at: Timestamp;
    }
  | {
      type: 'skill_used';
      combatantId: EntityId;
      skillName: string;
      usageType: SkillUsageType;
      basePoints: number;
      context: string;
      succeeded: boolean;
      at: Timestamp;
    }
  | {
      type: 'health_changed';
      combatantId: EntityId;
      name: string;
      roomId: RoomId;
      currentFatigue: number;
      maxFatigue: number;
      currentVitality: number;
      maxVitality: number;
      at: Timestamp;
    };

export type GameEventType = GameEvent['type'];
