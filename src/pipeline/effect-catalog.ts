// pipeline/effect-catalog.ts — Immutable effect definitions loaded from JSON

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { StatusEffectDefinition } from '../types/index.js';

const impactSchema = z.object({
  type: z.enum([
    'modify_attribute',
    'modify_skill',
    'modify_attack_value',
    'modify_defense_value',
    'periodic_fatigue_damage',
    'periodic_vitality_damage',
    'periodic_fatigue_healing',
    'periodic_vitality_healing',
    'modify_max_fatigue',
    'modify_max_vitality',
    'prevent_movement',
    'prevent_spellcasting',
    'prevent_actions',
    'invisibility',
    'modify_damage_dealt',
    'modify_damage_received',
  ]),
  value: z.number(),
  scalesWithIntensity: z.boolean().default(true),
  targetAttribute: z.string().min(1).optional(),
  targetSkill: z.string().min(1).optional(),
});

const definitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  category: z.enum(['wound', 'buff', 'debuff', 'damage_over_time', 'heal_over_time', 'status']),
  isStackable: z.boolean(),
  maxStacks: z.number().int().min(1),
  tickIntervalSeconds: z.number().int().min(0),
  defaultDurationSeconds: z.number().int().min(0),
  defaultIntensity: z.number().positive().default(1),
  impacts: z.array(impactSchema),
});

const catalogSchema = z.array(definitionSchema);

export class EffectCatalog {
  private readonly byName: ReadonlyMap<string, StatusEffectDefinition>;

  constructor(definitions: readonly StatusEffectDefinition[]) {
    const map = new Map<string, StatusEffectDefinition>();
    for (const def of definitions) {
      if (map.has(def.name)) {
        throw new Error(`Duplicate effect definition: ${def.name}`);
      }
      map.set(def.name, Object.freeze({ ...def, impacts: Object.freeze([...def.impacts]) }));
    }
    this.byName = map;
  }

  static fromJson(raw: unknown): EffectCatalog {
    const parsed = catalogSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
      throw new Error(`Invalid effect definitions at ${where}: ${issue?.message ?? 'unknown error'}`);
    }
    return new EffectCatalog(parsed.data);
  }

  static load(path: string): EffectCatalog {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return EffectCatalog.fromJson(raw);
  }

  get(name: string): StatusEffectDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  get size(): number {
    return this.byName.size;
  }
}
