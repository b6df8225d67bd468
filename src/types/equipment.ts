// types/equipment.ts — Read-only equipment view supplied by the inventory system

import type { EntityId } from './core.js';

export type DamageType =
  | 'bashing'
  | 'cutting'
  | 'piercing'
  | 'projectile'
  | 'energy'
  | 'heat'
  | 'cold'
  | 'acid';

/** 1 (light) through 4 (heavy). */
export type DamageClass = 1 | 2 | 3 | 4;

export type EquipmentSlot =
  | 'head'
  | 'face'
  | 'neck'
  | 'shoulders'
  | 'back'
  | 'chest'
  | 'arm_left'
  | 'arm_right'
  | 'hands'
  | 'waist'
  | 'legs'
  | 'feet'
  | 'main_hand'
  | 'off_hand'
  | 'two_hand';

export interface WeaponProperties {
  skillBonus: number;
  attackValueModifier: number;
  baseSuccessValueModifier: number;
  dodgeModifier: number;
  damageType: DamageType;
  damageClass: DamageClass;
}

export interface ArmorProperties {
  absorption: Partial<Record<DamageType, number>>;
  damageClass: DamageClass;
  dodgeModifier: number;
  layerPriority: number;
  /** Comma/semicolon/pipe separated body locations; slot is used when absent. */
  coverage?: string;
}

export interface EquippedItem {
  id: string;
  name: string;
  slot: EquipmentSlot;
  isBroken: boolean;
  weapon?: WeaponProperties;
  armor?: ArmorProperties;
}

export interface EquipmentProvider {
  getEquippedItems(combatantId: EntityId): readonly EquippedItem[];
}
