// types/tick.ts — Tick output

import type { Tick, Timestamp } from './core.js';
import type { ExecutedCommand, RejectedCommand } from './action.js';
import type { GameEvent } from './events.js';

export interface TickResult {
  tick: Tick;
  startedAt: Timestamp;
  executed: ExecutedCommand[];
  rejected: RejectedCommand[];
  events: GameEvent[];
  effectMessages: string[];
  healthUpdates: number;
  npcDecisions: number;
  expiredEffects: number;
  durationMs: number;
}
