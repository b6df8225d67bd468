// types/index.ts — Barrel export

export type { EntityId, Tick, RoomId, Timestamp, Clock } from './core.js';
export { systemClock, safeAdd, INT32_MIN, INT32_MAX } from './core.js';

export type {
  CombatantKind,
  SkillName,
  PlayerAttributes,
  VitalityPools,
  PlayerCharacter,
  NpcBehaviorConfig,
  NpcTemplate,
  DespawnReason,
  NpcSpawn,
  Combatant,
} from './combatant.js';
export {
  SKILL_NAMES,
  maxFatigueOf,
  maxVitalityOf,
  derivePlayerMaxima,
  skillLevelOf,
} from './combatant.js';

export type {
  DamageType,
  DamageClass,
  EquipmentSlot,
  WeaponProperties,
  ArmorProperties,
  EquippedItem,
  EquipmentProvider,
} from './equipment.js';

export type {
  HitLocation,
  TimedPenalty,
  CombatParticipant,
  CombatActionType,
  CombatActionLog,
  CombatSession,
  DamageTriple,
  AttackOptions,
  AttackFailureReason,
  AttackFailure,
  AttackResult,
  AttackOutcome,
} from './combat.js';

export type {
  EffectCategory,
  ImpactType,
  EffectImpact,
  StatusEffectDefinition,
  BodyLocation,
  EffectRemovalReason,
  StatusEffectInstance,
  ApplyEffectOptions,
  EffectApplicationResult,
  EffectSummary,
} from './effect.js';

export type {
  SoundLevel,
  SkillUsageType,
  GameEvent,
  GameEventType,
} from './events.js';

export type {
  CommandType,
  RawCommand,
  CommandParams,
  QueuedCommand,
  ExecutedCommand,
  RejectedCommand,
} from './action.js';

export type {
  TickResult,
} from './tick.js';
