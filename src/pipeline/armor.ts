// pipeline/armor.ts — Layered armor coverage and absorption by damage type

import type {
  DamageClass,
  DamageType,
  EquippedItem,
  HitLocation,
} from '../types/index.js';

export interface ArmorMitigation {
  finalSuccessValue: number;
  totalAbsorption: number;
  /** Names of the covering pieces, in layer priority order. */
  layers: string[];
}

const LOCATION_ALIASES: Record<HitLocation, readonly string[]> = {
  head: ['head'],
  torso: ['torso', 'chest', 'body'],
  left_arm: ['leftarm', 'arm', 'arms'],
  right_arm: ['rightarm', 'arm', 'arms'],
  left_leg: ['leftleg', 'leg', 'legs'],
  right_leg: ['rightleg', 'leg', 'legs'],
};

function normalise(token: string): string {
  return token.trim().toLowerCase().replace(/[\s_-]/g, '');
}

export function parseCoverage(coverage: string): Set<string> {
  const covered = new Set<string>();
  for (const part of coverage.split(/[,;|]/)) {
    const token = normalise(part);
    if (token !== '') covered.add(token);
  }
  return covered;
}

export function armorCoversLocation(item: EquippedItem, location: HitLocation): boolean {
  const coverage = item.armor?.coverage;
  if (coverage === undefined || coverage.trim() === '') {
    switch (item.slot) {
      case 'head': return location === 'head';
      case 'chest': return location === 'torso';
      case 'arm_left': return location === 'left_arm';
      case 'arm_right': return location === 'right_arm';
      case 'legs': return location === 'left_leg' || location === 'right_leg';
      default: return false;
    }
  }

  const covered = parseCoverage(coverage);
  return LOCATION_ALIASES[location].some(alias => covered.has(alias));
}

/** Heavier weapons punch through lighter armor one point per class of difference. */
export function effectiveAbsorption(
  absorption: number,
  weaponClass: DamageClass,
  armorClass: DamageClass,
): number {
  const classGap = weaponClass - armorClass;
  if (classGap <= 0) return absorption;
  return Math.max(0, absorption - classGap);
}

export function applyArmor(
  successValue: number,
  items: readonly EquippedItem[],
  location: HitLocation,
  damageType: DamageType,
  weaponClass: DamageClass,
): ArmorMitigation {
  if (successValue < 0) {
    return { finalSuccessValue: successValue, totalAbsorption: 0, layers: [] };
  }

  const pieces = items
    .filter(i => i.armor !== undefined && !i.isBroken && armorCoversLocation(i, location))
    .sort((a, b) => (a.armor?.layerPriority ?? 0) - (b.armor?.layerPriority ?? 0));

  let totalAbsorption = 0;
  const layers: string[] = [];
  for (const piece of pieces) {
    if (!piece.armor) continue;
    const base = piece.armor.absorption[damageType] ?? 0;
    const absorbed = effectiveAbsorption(base, weaponClass, piece.armor.damageClass);
    totalAbsorption += absorbed;
    layers.push(piece.name);
  }

  return {
    finalSuccessValue: Math.max(0, successValue - totalAbsorption),
    totalAbsorption,
    layers,
  };
}
