// pipeline/command-processor.ts — Executes validated combat commands

import type {
  Timestamp,
  ExecutedCommand,
  QueuedCommand,
  RejectedCommand,
} from '../types/index.js';
import type { AttackResolver } from './attack-resolver.js';
import type { CombatSessionManager } from './session-manager.js';

export interface ExecutionResult {
  executed: ExecutedCommand[];
  rejected: RejectedCommand[];
}

export class CommandProcessor {
  private sessions: CombatSessionManager;
  private attacks: AttackResolver;

  constructor(sessions: CombatSessionManager, attacks: AttackResolver) {
    this.sessions = sessions;
    this.attacks = attacks;
  }

  executeBatch(commands: QueuedCommand[], now: Timestamp): ExecutionResult {
    const result: ExecutionResult = { executed: [], rejected: [] };

    for (const command of commands) {
      try {
        this.executeSingle(command, now, result);
      } catch (err) {
        console.error(`[Command] ${command.params.type} failed for ${command.combatantId}:`, err);
        result.rejected.push({
          combatantId: command.combatantId,
          command: command.params.type,
          reason: 'internal_error',
          message: 'Something went wrong.',
        });
      }
    }

    return result;
  }

  private executeSingle(command: QueuedCommand, now: Timestamp, result: ExecutionResult): void {
    const { combatantId, params } = command;

    switch (params.type) {
      case 'attack': {
        const outcome = this.attacks.performMeleeAttack(combatantId, params.targetId, now, {
          dualWield: params.dualWield,
          offHand: params.offHand,
        });
        if (!outcome.ok) {
          result.rejected.push({ combatantId, command: 'attack', reason: outcome.reason, message: outcome.message });
          return;
        }
        result.executed.push({ combatantId, command: 'attack', message: outcome.log.description });
        return;
      }
      case 'flee': {
        if (!this.sessions.flee(combatantId, now)) {
          result.rejected.push({ combatantId, command: 'flee', reason: 'not_in_combat', message: 'You are not fighting anyone.' });
          return;
        }
        result.executed.push({ combatantId, command: 'flee', message: 'You flee from combat!' });
        return;
      }
      case 'parry': {
        if (!this.sessions.setParryMode(combatantId, params.enabled, now)) {
          result.rejected.push({ combatantId, command: 'parry', reason: 'not_in_combat', message: 'You are not fighting anyone.' });
          return;
        }
        result.executed.push({
          combatantId,
          command: 'parry',
          message: params.enabled ? 'You raise your guard to parry.' : 'You ready yourself to dodge.',
        });
        return;
      }
      case 'idle':
        result.executed.push({ combatantId, command: 'idle', message: 'You wait.' });
        return;
    }
  }
}
