// types/combatant.ts — Players, NPC spawns and their derived pools

import type { EntityId, RoomId, Timestamp } from './core.js';

export type CombatantKind = 'player' | 'npc';

export type SkillName =
  | 'Physicality'
  | 'Dodge'
  | 'Drive'
  | 'Reasoning'
  | 'Awareness'
  | 'Focus'
  | 'Bearing';

export const SKILL_NAMES: readonly SkillName[] = [
  'Physicality',
  'Dodge',
  'Drive',
  'Reasoning',
  'Awareness',
  'Focus',
  'Bearing',
];

export type PlayerAttributes = Record<SkillName, number>;

export interface VitalityPools {
  currentFatigue: number;
  currentVitality: number;
  /** Positive = damage queued, negative = healing queued. */
  pendingFatigueDamage: number;
  pendingVitalityDamage: number;
  wounds: number;
  lastFatigueRegenAt: Timestamp | null;
  lastVitalityRegenAt: Timestamp | null;
}

interface CombatantBase extends VitalityPools {
  id: EntityId;
  name: string;
  roomId: RoomId;
  isAlive: boolean;
}

export interface PlayerCharacter extends CombatantBase {
  kind: 'player';
  attributes: PlayerAttributes;
  maxFatigue: number;
  maxVitality: number;
}

export interface NpcBehaviorConfig {
  fleeThreshold?: number;
  neverFlee?: boolean;
}

export interface NpcTemplate {
  id: string;
  name: string;
  strength: number;
  quickness: number;
  endurance: number;
  intelligence: number;
  coordination: number;
  willpower: number;
  charisma: number;
  behavior: NpcBehaviorConfig;
}

export type DespawnReason = 'death' | 'timeout' | 'admin';

export interface NpcSpawn extends CombatantBase {
  kind: 'npc';
  template: NpcTemplate;
  despawnReason: DespawnReason | null;
  despawnedAt: Timestamp | null;
}

export type Combatant = PlayerCharacter | NpcSpawn;

export function maxFatigueOf(c: Combatant): number {
  if (c.kind === 'player') return c.maxFatigue;
  return Math.max(1, c.template.endurance + c.template.willpower - 5);
}

export function maxVitalityOf(c: Combatant): number {
  if (c.kind === 'player') return c.maxVitality;
  return Math.max(1, c.template.strength * 2 - 5);
}

/** Player pool maxima derived from attributes at character creation. */
export function derivePlayerMaxima(attributes: PlayerAttributes): { maxFatigue: number; maxVitality: number } {
  return {
    maxFatigue: Math.max(1, attributes.Drive + attributes.Focus - 5),
    maxVitality: Math.max(1, attributes.Physicality * 2 - 5),
  };
}

/**
 * Base level of an attribute skill. NPC templates use their own attribute
 * names and map onto the player skill set.
 */
export function skillLevelOf(c: Combatant, skill: SkillName): number {
  if (c.kind === 'player') return c.attributes[skill];
  const t = c.template;
  switch (skill) {
    case 'Physicality': return t.strength;
    case 'Dodge': return t.quickness;
    case 'Drive': return t.endurance;
    case 'Reasoning': return t.intelligence;
    case 'Awareness': return t.coordination;
    case 'Focus': return t.willpower;
    case 'Bearing': return t.charisma;
  }
}
