// pipeline/action-queue.ts — Per-combatant command buffering between ticks

import type {
  EntityId,
  Tick,
  CommandParams,
  CommandType,
  QueuedCommand,
  RawCommand,
} from '../types/index.js';

const VALID_COMMANDS: ReadonlySet<string> = new Set<CommandType>(['attack', 'flee', 'parry', 'idle']);

function isCommandType(value: string): value is CommandType {
  return VALID_COMMANDS.has(value);
}

export class ActionQueue {
  private queues: Map<EntityId, QueuedCommand> = new Map();

  /** Returns false when the command is malformed and was dropped. */
  enqueue(combatantId: EntityId, raw: RawCommand, tick: Tick): boolean {
    const parsed = this.parseCommand(combatantId, raw, tick);
    if (!parsed) return false;

    // 1 command per combatant per tick, last-write-wins
    this.queues.set(combatantId, parsed);
    return true;
  }

  has(combatantId: EntityId): boolean {
    return this.queues.has(combatantId);
  }

  get size(): number {
    return this.queues.size;
  }

  drainAll(): QueuedCommand[] {
    const all = [...this.queues.values()];
    this.queues.clear();
    return all;
  }

  private parseCommand(combatantId: EntityId, raw: RawCommand, tick: Tick): QueuedCommand | null {
    if (typeof raw.command !== 'string') return null;
    const command = raw.command.trim().toLowerCase();
    if (!isCommandType(command)) return null;

    const params = this.parseParams(command, raw.params ?? {});
    if (!params) return null;

    return { combatantId, params, receivedTick: tick };
  }

  private parseParams(command: CommandType, raw: Record<string, unknown>): CommandParams | null {
    switch (command) {
      case 'attack':
        return this.parseAttackParams(raw);
      case 'parry':
        return this.parseParryParams(raw);
      case 'flee':
        return { type: 'flee' };
      case 'idle':
        return { type: 'idle' };
    }
  }

  private parseAttackParams(raw: Record<string, unknown>): CommandParams | null {
    if (typeof raw.targetId !== 'string' || raw.targetId === '') return null;
    const dualWield = raw.dualWield === undefined ? false : raw.dualWield;
    const offHand = raw.offHand === undefined ? false : raw.offHand;
    if (typeof dualWield !== 'boolean' || typeof offHand !== 'boolean') return null;
    return { type: 'attack', targetId: raw.targetId, dualWield, offHand };
  }

  private parseParryParams(raw: Record<string, unknown>): CommandParams | null {
    const enabled = raw.enabled === undefined ? true : raw.enabled;
    if (typeof enabled !== 'boolean') return null;
    return { type: 'parry', enabled };
  }
}
