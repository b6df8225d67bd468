// pipeline/npc-policy.ts — NPC combat turn: flee, guard stance, attack

import { z } from 'zod';
import type {
  EntityId,
  Timestamp,
  AttackFailureReason,
  AttackResult,
  CombatSession,
  NpcBehaviorConfig,
  NpcSpawn,
} from '../types/index.js';
import { maxVitalityOf } from '../types/index.js';
import type { WorldState } from '../server/world.js';
import type { EventBus } from '../server/event-bus.js';
import type { AttackResolver } from './attack-resolver.js';
import type { CombatSessionManager } from './session-manager.js';
import { DEFAULT_FLEE_THRESHOLD, MIN_FATIGUE_FOR_DODGE } from '../shared/constants.js';

export const behaviorConfigSchema = z.object({
  fleeThreshold: z.number().min(0).max(1).optional(),
  neverFlee: z.boolean().optional(),
});

/** Malformed or missing config falls back to default behaviour. */
export function parseBehaviorConfig(raw: string | null): NpcBehaviorConfig {
  if (raw === null || raw.trim() === '') return {};
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    console.warn(`[NPC] Ignoring unparseable behaviour config: ${raw}`);
    return {};
  }
  const parsed = behaviorConfigSchema.safeParse(json);
  if (!parsed.success) {
    console.warn(`[NPC] Ignoring invalid behaviour config: ${parsed.error.issues[0]?.message ?? raw}`);
    return {};
  }
  return parsed.data;
}

/** Fraction of max vitality at or below which the NPC runs; null = never. */
export function fleeThresholdOf(behavior: NpcBehaviorConfig): number | null {
  if (behavior.neverFlee) return null;
  return behavior.fleeThreshold ?? DEFAULT_FLEE_THRESHOLD;
}

export interface NpcPlan {
  flee: boolean;
  parry: boolean;
  targetId: EntityId | null;
}

export function decide(npc: NpcSpawn, session: CombatSession): NpcPlan {
  const threshold = fleeThresholdOf(npc.template.behavior);
  const maxVitality = maxVitalityOf(npc);
  const fraction = maxVitality > 0 ? npc.currentVitality / maxVitality : 1;

  const target = session.participants.find(p => p.isActive && p.kind === 'player');

  return {
    flee: threshold !== null && fraction <= threshold,
    parry: npc.currentFatigue < MIN_FATIGUE_FOR_DODGE,
    targetId: target ? target.combatantId : null,
  };
}

export type NpcDecision =
  | { kind: 'fled' }
  | { kind: 'attacked'; targetId: EntityId; result: AttackResult }
  | { kind: 'no_target' }
  | { kind: 'attack_failed'; targetId: EntityId; reason: AttackFailureReason };

export class NpcController {
  private world: WorldState;
  private sessions: CombatSessionManager;
  private attacks: AttackResolver;
  private bus: EventBus;

  constructor(
    world: WorldState,
    sessions: CombatSessionManager,
    attacks: AttackResolver,
    bus: EventBus,
  ) {
    this.world = world;
    this.sessions = sessions;
    this.attacks = attacks;
    this.bus = bus;
  }

  decideAndAct(npc: NpcSpawn, session: CombatSession, now: Timestamp): NpcDecision {
    const plan = decide(npc, session);

    if (plan.flee) {
      if (this.sessions.flee(npc.id, now)) {
        this.bus.publish({
          type: 'combat_action',
          sessionId: session.id,
          roomId: npc.roomId,
          actorId: npc.id,
          actorName: npc.name,
          targetId: null,
          targetName: null,
          description: `${npc.name} flees from combat!`,
          damage: null,
          isHit: false,
          soundLevel: 'normal',
          at: now,
        });
        console.log(`[NPC] ${npc.name} fled from combat`);
        return { kind: 'fled' };
      }
      console.debug(`[NPC] ${npc.name} failed to flee`);
    }

    if (this.sessions.isInParryMode(npc.id) !== plan.parry) {
      this.sessions.setParryMode(npc.id, plan.parry, now);
    }

    if (plan.targetId === null) {
      console.debug(`[NPC] ${npc.name} has no valid targets`);
      return { kind: 'no_target' };
    }

    const outcome = this.attacks.performMeleeAttack(npc.id, plan.targetId, now);
    if (!outcome.ok) {
      return { kind: 'attack_failed', targetId: plan.targetId, reason: outcome.reason };
    }
    return { kind: 'attacked', targetId: plan.targetId, result: outcome };
  }

  /** One decision per active NPC participant of every active session. */
  tick(now: Timestamp, signal?: AbortSignal): NpcDecision[] {
    const decisions: NpcDecision[] = [];

    for (const session of this.world.getActiveSessions()) {
      for (const participant of [...session.participants]) {
        if (signal?.aborted) return decisions;
        if (!session.isActive) break;
        if (!participant.isActive || participant.kind !== 'npc') continue;

        const npc = this.world.getCombatant(participant.combatantId);
        if (!npc || npc.kind !== 'npc' || !npc.isAlive) continue;

        try {
          decisions.push(this.decideAndAct(npc, session, now));
        } catch (err) {
          console.error(`[NPC] Decision failed for ${npc.id}:`, err);
        }
      }
    }

    return decisions;
  }
}
