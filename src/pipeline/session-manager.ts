// pipeline/session-manager.ts — Combat session lifecycle, parry/flee, timed penalties

import { v4 as uuidv4 } from 'uuid';
import type {
  EntityId,
  Timestamp,
  Combatant,
  CombatActionLog,
  CombatParticipant,
  CombatSession,
  TimedPenalty,
} from '../types/index.js';
import type { WorldState } from '../server/world.js';
import type { EventBus } from '../server/event-bus.js';
import { generateLogId } from '../shared/utils.js';
import { penaltyForValue } from './combat-tables.js';

export interface ParticipantRef {
  session: CombatSession;
  participant: CombatParticipant;
}

type RequiredLogFields = 'actorId' | 'targetId' | 'actionType' | 'description';

export type ActionLogInput = Pick<CombatActionLog, RequiredLogFields>
  & Partial<Omit<CombatActionLog, RequiredLogFields | 'id' | 'sessionId' | 'timestamp'>>;

function createParticipant(c: Combatant, now: Timestamp): CombatParticipant {
  return {
    combatantId: c.id,
    kind: c.kind,
    name: c.name,
    isActive: true,
    isInParryMode: false,
    timedPenalties: [],
    joinedAt: now,
    leftAt: null,
    leaveReason: null,
  };
}

export class CombatSessionManager {
  private world: WorldState;
  private bus: EventBus;

  constructor(world: WorldState, bus: EventBus) {
    this.world = world;
    this.bus = bus;
  }

  /**
   * Returns the session the attacker fights in, creating or joining one as
   * needed. null when the two cannot fight (different rooms).
   */
  initiateCombat(attackerId: EntityId, targetId: EntityId, now: Timestamp): CombatSession | null {
    const attacker = this.world.getCombatant(attackerId);
    const target = this.world.getCombatant(targetId);
    if (!attacker || !target) return null;

    const existing = this.getActiveSession(attackerId);
    if (existing) {
      if (target.roomId !== existing.roomId || attacker.roomId !== existing.roomId) {
        console.warn(`[Combat] ${attacker.name} cannot reach ${target.name} from session ${existing.id}`);
        return null;
      }
      if (!this.getActiveSession(targetId) && target.isAlive) {
        existing.participants.push(createParticipant(target, now));
      }
      return existing;
    }

    const targetSession = this.getActiveSession(targetId);
    if (targetSession) {
      if (attacker.roomId !== targetSession.roomId) {
        console.warn(`[Combat] ${attacker.name} cannot join combat in room ${targetSession.roomId} from room ${attacker.roomId}`);
        return null;
      }
      targetSession.participants.push(createParticipant(attacker, now));
      console.log(`[Combat] ${attacker.name} joined session ${targetSession.id}`);
      return targetSession;
    }

    if (attacker.roomId !== target.roomId) {
      console.warn(`[Combat] Cannot start combat: ${attacker.name} and ${target.name} are in different rooms`);
      return null;
    }

    const session: CombatSession = {
      id: uuidv4(),
      roomId: attacker.roomId,
      isActive: true,
      startedAt: now,
      endedAt: null,
      endReason: null,
      participants: [createParticipant(attacker, now), createParticipant(target, now)],
      actionLog: [],
    };
    this.world.addSession(session);

    this.bus.publish({
      type: 'combat_started',
      sessionId: session.id,
      roomId: session.roomId,
      initiatorId: attacker.id,
      initiatorName: attacker.name,
      targetId: target.id,
      targetName: target.name,
      soundLevel: 'loud',
      at: now,
    });
    console.log(`[Combat] ${attacker.name} engages ${target.name} in room ${session.roomId}`);

    return session;
  }

  getActiveSession(combatantId: EntityId): CombatSession | null {
    return this.getParticipant(combatantId)?.session ?? null;
  }

  getParticipant(combatantId: EntityId): ParticipantRef | null {
    for (const session of this.world.sessions.values()) {
      if (!session.isActive) continue;
      const participant = session.participants.find(p => p.combatantId === combatantId && p.isActive);
      if (participant) return { session, participant };
    }
    return null;
  }

  isInCombat(combatantId: EntityId): boolean {
    return this.getParticipant(combatantId) !== null;
  }

  isInParryMode(combatantId: EntityId): boolean {
    return this.getParticipant(combatantId)?.participant.isInParryMode ?? false;
  }

  getActiveParticipants(sessionId: string): CombatParticipant[] {
    const session = this.world.sessions.get(sessionId);
    if (!session) return [];
    return session.participants.filter(p => p.isActive);
  }

  setParryMode(combatantId: EntityId, enabled: boolean, now: Timestamp): boolean {
    const ref = this.getParticipant(combatantId);
    if (!ref) return false;
    if (ref.participant.isInParryMode === enabled) return true;

    ref.participant.isInParryMode = enabled;
    this.recordAction(ref.session, now, {
      actorId: combatantId,
      targetId: null,
      actionType: enabled ? 'enter_parry' : 'exit_parry',
      description: enabled
        ? `${ref.participant.name} raises a guard to parry.`
        : `${ref.participant.name} drops their guard to dodge.`,
    });
    console.debug(`[Combat] ${ref.participant.name} parry mode: ${enabled}`);
    return true;
  }

  flee(combatantId: EntityId, now: Timestamp): boolean {
    const ref = this.getParticipant(combatantId);
    if (!ref) return false;

    const { session, participant } = ref;
    participant.isActive = false;
    participant.leftAt = now;
    participant.leaveReason = 'Fled';
    this.recordAction(session, now, {
      actorId: combatantId,
      targetId: null,
      actionType: 'flee',
      description: `${participant.name} flees from combat!`,
    });
    console.log(`[Combat] ${participant.name} fled session ${session.id}`);

    if (session.participants.filter(p => p.isActive).length <= 1) {
      this.endCombat(session.id, 'One participant fled', now);
    }
    return true;
  }

  endCombat(sessionId: string, reason: string, now: Timestamp, winnerId: EntityId | null = null): void {
    const session = this.world.sessions.get(sessionId);
    if (!session || !session.isActive) return;

    session.isActive = false;
    session.endedAt = now;
    session.endReason = reason;
    for (const p of session.participants) {
      if (!p.isActive) continue;
      p.isActive = false;
      p.leftAt = now;
      p.leaveReason = reason;
    }

    const winner = winnerId === null
      ? undefined
      : session.participants.find(p => p.combatantId === winnerId);

    this.bus.publish({
      type: 'combat_ended',
      sessionId,
      roomId: session.roomId,
      reason,
      winnerId: winner ? winner.combatantId : null,
      winnerName: winner ? winner.name : null,
      at: now,
    });
    console.log(`[Combat] Session ${sessionId} ended: ${reason}`);
  }

  /**
   * Ends the combatant's session because it died. NPC spawns are despawned;
   * player death handling belongs to the wider game.
   */
  handleDeath(combatantId: EntityId, now: Timestamp, killerId: EntityId | null = null): void {
    const combatant = this.world.getCombatant(combatantId);
    if (!combatant) return;

    if (combatant.kind === 'npc' && combatant.isAlive) {
      combatant.isAlive = false;
      combatant.despawnReason = 'death';
      combatant.despawnedAt = now;
    }

    const session = this.getActiveSession(combatantId);
    console.log(`[Combat] ${combatant.name} has died`);
    if (session) this.endCombat(session.id, `${combatant.name} died`, now, killerId);
  }

  /** Ends sessions whose participants were drained to zero vitality between attacks. */
  resolveDeaths(now: Timestamp): number {
    let deaths = 0;
    for (const session of this.world.getActiveSessions()) {
      for (const p of session.participants) {
        if (!p.isActive || !session.isActive) continue;
        const combatant = this.world.getCombatant(p.combatantId);
        if (combatant && combatant.currentVitality <= 0) {
          this.handleDeath(combatant.id, now);
          deaths++;
        }
      }
    }
    return deaths;
  }

  // --- Timed penalties ---

  applyTimedPenalty(combatantId: EntityId, value: number, now: Timestamp): TimedPenalty | null {
    const severity = penaltyForValue(value);
    if (!severity) return null;
    const ref = this.getParticipant(combatantId);
    if (!ref) return null;

    const penalty: TimedPenalty = { amount: severity.amount, expiresAt: now + severity.durationMs };
    ref.participant.timedPenalties.push(penalty);
    console.debug(`[Combat] ${ref.participant.name} penalised ${penalty.amount} until ${penalty.expiresAt}`);
    return penalty;
  }

  getTotalTimedPenalty(combatantId: EntityId, now: Timestamp): number {
    const ref = this.getParticipant(combatantId);
    if (!ref) return 0;

    const active = ref.participant.timedPenalties.filter(p => p.expiresAt > now);
    ref.participant.timedPenalties = active;
    return active.reduce((sum, p) => sum + p.amount, 0);
  }

  pruneExpiredPenalties(now: Timestamp): number {
    let pruned = 0;
    for (const session of this.world.getActiveSessions()) {
      for (const p of session.participants) {
        const before = p.timedPenalties.length;
        p.timedPenalties = p.timedPenalties.filter(t => t.expiresAt > now);
        pruned += before - p.timedPenalties.length;
      }
    }
    return pruned;
  }

  // --- Action log ---

  recordAction(session: CombatSession, now: Timestamp, input: ActionLogInput): CombatActionLog {
    const entry: CombatActionLog = Object.freeze({
      id: generateLogId(),
      sessionId: session.id,
      timestamp: now,
      attackValue: null,
      defenseValue: null,
      successValue: null,
      damageDealt: 0,
      fatigueDamage: 0,
      vitalityDamage: 0,
      wounds: 0,
      hitLocation: null,
      damageType: null,
      ...input,
    });
    session.actionLog.push(entry);
    return entry;
  }
}
