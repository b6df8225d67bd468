// types/effect.ts — Status effect definitions, instances, aggregated summary

import type { EntityId, Timestamp } from './core.js';

export type EffectCategory =
  | 'wound'
  | 'buff'
  | 'debuff'
  | 'damage_over_time'
  | 'heal_over_time'
  | 'status';

export type ImpactType =
  | 'modify_attribute'
  | 'modify_skill'
  | 'modify_attack_value'
  | 'modify_defense_value'
  | 'periodic_fatigue_damage'
  | 'periodic_vitality_damage'
  | 'periodic_fatigue_healing'
  | 'periodic_vitality_healing'
  | 'modify_max_fatigue'
  | 'modify_max_vitality'
  | 'prevent_movement'
  | 'prevent_spellcasting'
  | 'prevent_actions'
  | 'invisibility'
  | 'modify_damage_dealt'
  | 'modify_damage_received';

export interface EffectImpact {
  type: ImpactType;
  value: number;
  scalesWithIntensity: boolean;
  targetAttribute?: string;
  targetSkill?: string;
}

export interface StatusEffectDefinition {
  name: string;
  description: string;
  category: EffectCategory;
  isStackable: boolean;
  maxStacks: number;
  tickIntervalSeconds: number;
  defaultDurationSeconds: number;
  defaultIntensity: number;
  impacts: readonly EffectImpact[];
}

export type BodyLocation = 'general' | 'head' | 'torso' | 'left_arm' | 'right_arm' | 'left_leg' | 'right_leg';

export type EffectRemovalReason = 'expired' | 'healed' | 'natural_healing' | 'dispelled';

export interface StatusEffectInstance {
  id: string;
  combatantId: EntityId;
  definitionName: string;
  currentStacks: number;
  intensity: number;
  appliedAt: Timestamp;
  /** null = permanent until removed. */
  expiresAt: Timestamp | null;
  lastTickAt: Timestamp | null;
  bodyLocation: BodyLocation | null;
  sourceId: EntityId | null;
  isActive: boolean;
  removedAt: Timestamp | null;
  removalReason: EffectRemovalReason | null;
}

export interface ApplyEffectOptions {
  durationSeconds?: number;
  intensity?: number;
  bodyLocation?: BodyLocation;
  sourceId?: EntityId;
}

export type EffectApplicationResult =
  | {
      ok: true;
      instance: StatusEffectInstance;
      wasStacked: boolean;
      wasRefreshed: boolean;
      stackCount: number;
      message: string;
    }
  | { ok: false; reason: 'unknown_effect' | 'missing_combatant'; message: string };

export interface EffectSummary {
  combatantId: EntityId;
  attackValueModifier: number;
  defenseValueModifier: number;
  attributeModifiers: Record<string, number>;
  skillModifiers: Record<string, number>;
  maxFatigueModifier: number;
  maxVitalityModifier: number;
  /** Fractional, e.g. -0.25 = 25% less damage dealt. */
  damageDealtModifier: number;
  damageReceivedModifier: number;
  woundCount: number;
  woundsByLocation: Partial<Record<BodyLocation, number>>;
  canMove: boolean;
  canCastSpells: boolean;
  canAct: boolean;
  isInvisible: boolean;
  activeEffectNames: string[];
}
