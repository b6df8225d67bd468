// types/action.ts — Player commands and their outcomes

import type { EntityId, Tick } from './core.js';

export type CommandType = 'attack' | 'flee' | 'parry' | 'idle';

export interface RawCommand {
  command: string;
  params?: Record<string, unknown>;
}

export type CommandParams =
  | { type: 'attack'; targetId: EntityId; dualWield: boolean; offHand: boolean }
  | { type: 'flee' }
  | { type: 'parry'; enabled: boolean }
  | { type: 'idle' };

export interface QueuedCommand {
  combatantId: EntityId;
  params: CommandParams;
  receivedTick: Tick;
}

export interface ExecutedCommand {
  combatantId: EntityId;
  command: CommandType;
  message: string;
}

export interface RejectedCommand {
  combatantId: EntityId;
  command: CommandType;
  reason: string;
  message: string;
}
