// tests/helpers.ts — Shared factories and a scripted dice roller

import { fileURLToPath } from 'node:url';
import type {
  GameEvent,
  NpcSpawn,
  NpcTemplate,
  PlayerAttributes,
  PlayerCharacter,
  EquippedItem,
  WeaponProperties,
} from '../src/types/index.js';
import type { DiceRoller } from '../src/pipeline/dice.js';
import { WorldState } from '../src/server/world.js';
import { EventBus } from '../src/server/event-bus.js';
import { EffectCatalog } from '../src/pipeline/effect-catalog.js';
import { EffectEngine } from '../src/pipeline/effect-engine.js';
import { CombatSessionManager } from '../src/pipeline/session-manager.js';
import { AttackResolver } from '../src/pipeline/attack-resolver.js';
import { HealthProcessor } from '../src/pipeline/health-processor.js';
import { NpcController } from '../src/pipeline/npc-policy.js';
import { CommandValidator } from '../src/pipeline/validator.js';
import { CommandProcessor } from '../src/pipeline/command-processor.js';
import { ActionQueue } from '../src/pipeline/action-queue.js';

export const EFFECTS_PATH = fileURLToPath(new URL('../data/effects.json', import.meta.url));
export const MIGRATIONS_DIR = fileURLToPath(new URL('../db/migrations', import.meta.url));

export const T0 = 1_700_000_000_000;

/**
 * Dice that return queued values. Empty queues roll 0 on the symmetric dice
 * and 1 on polyhedral dice.
 */
export class ScriptedDice implements DiceRoller {
  exploding: number[] = [];
  symmetric: number[] = [];
  dice: number[] = [];
  /** Sides of every polyhedral die rolled, in order. */
  sides: number[] = [];

  constructor(script: { exploding?: number[]; symmetric?: number[]; dice?: number[] } = {}) {
    this.exploding = [...(script.exploding ?? [])];
    this.symmetric = [...(script.symmetric ?? [])];
    this.dice = [...(script.dice ?? [])];
  }

  rollSymmetric(): number {
    return this.symmetric.shift() ?? 0;
  }

  rollExplodingSymmetric(): number {
    return this.exploding.shift() ?? 0;
  }

  rollDie(sides: number): number {
    this.sides.push(sides);
    return this.dice.shift() ?? 1;
  }

  rollDice(count: number, sides: number): number {
    let total = 0;
    for (let i = 0; i < count; i++) total += this.rollDie(sides);
    return total;
  }
}

export function playerAttributes(overrides: Partial<PlayerAttributes> = {}): PlayerAttributes {
  return {
    Physicality: 10,
    Dodge: 10,
    Drive: 10,
    Reasoning: 10,
    Awareness: 10,
    Focus: 10,
    Bearing: 10,
    ...overrides,
  };
}

export function createPlayer(overrides: Partial<PlayerCharacter> = {}): PlayerCharacter {
  return {
    kind: 'player',
    id: 'p1',
    name: 'Aldric',
    roomId: 1,
    isAlive: true,
    attributes: playerAttributes(),
    maxFatigue: 15,
    maxVitality: 15,
    currentFatigue: 15,
    currentVitality: 15,
    pendingFatigueDamage: 0,
    pendingVitalityDamage: 0,
    wounds: 0,
    lastFatigueRegenAt: null,
    lastVitalityRegenAt: null,
    ...overrides,
  };
}

export function npcTemplate(overrides: Partial<NpcTemplate> = {}): NpcTemplate {
  return {
    id: 'tpl_goblin',
    name: 'Goblin',
    strength: 10,
    quickness: 10,
    endurance: 10,
    intelligence: 10,
    coordination: 10,
    willpower: 10,
    charisma: 10,
    behavior: {},
    ...overrides,
  };
}

/** Template attributes of 10 give max fatigue 15 and max vitality 15. */
export function createNpc(overrides: Partial<NpcSpawn> = {}): NpcSpawn {
  return {
    kind: 'npc',
    id: 'n1',
    name: 'Goblin',
    roomId: 1,
    isAlive: true,
    template: npcTemplate(),
    currentFatigue: 15,
    currentVitality: 15,
    pendingFatigueDamage: 0,
    pendingVitalityDamage: 0,
    wounds: 0,
    lastFatigueRegenAt: null,
    lastVitalityRegenAt: null,
    despawnReason: null,
    despawnedAt: null,
    ...overrides,
  };
}

export function createWeapon(
  overrides: Partial<Omit<EquippedItem, 'weapon'>> = {},
  weapon: Partial<WeaponProperties> = {},
): EquippedItem {
  return {
    id: 'item_sword',
    name: 'Longsword',
    slot: 'main_hand',
    isBroken: false,
    ...overrides,
    weapon: {
      skillBonus: 0,
      attackValueModifier: 0,
      baseSuccessValueModifier: 0,
      dodgeModifier: 0,
      damageType: 'cutting',
      damageClass: 2,
      ...weapon,
    },
  };
}

let catalog: EffectCatalog | null = null;

export function loadCatalog(): EffectCatalog {
  catalog ??= EffectCatalog.load(EFFECTS_PATH);
  return catalog;
}

export interface Harness {
  world: WorldState;
  bus: EventBus;
  events: GameEvent[];
  dice: ScriptedDice;
  effects: EffectEngine;
  sessions: CombatSessionManager;
  attacks: AttackResolver;
  health: HealthProcessor;
  npcs: NpcController;
  validator: CommandValidator;
  processor: CommandProcessor;
  queue: ActionQueue;
}

export function createHarness(dice: ScriptedDice = new ScriptedDice()): Harness {
  const world = new WorldState();
  const bus = new EventBus();
  const events: GameEvent[] = [];
  bus.subscribe(event => {
    events.push(event);
  });
  const effects = new EffectEngine(world, loadCatalog());
  const sessions = new CombatSessionManager(world, bus);
  const attacks = new AttackResolver(world, sessions, effects, dice, bus);
  const health = new HealthProcessor(world, bus);
  const npcs = new NpcController(world, sessions, attacks, bus);
  const validator = new CommandValidator(world, effects, dice, bus);
  const processor = new CommandProcessor(sessions, attacks);
  const queue = new ActionQueue();

  return { world, bus, events, dice, effects, sessions, attacks, health, npcs, validator, processor, queue };
}

export function eventsOfType<T extends GameEvent['type']>(
  events: readonly GameEvent[],
  type: T,
): Extract<GameEvent, { type: T }>[] {
  return events.filter((e): e is Extract<GameEvent, { type: T }> => e.type === type);
}
