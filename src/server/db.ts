// server/db.ts — SQLite persistence layer

import BetterSqlite3 from 'better-sqlite3';
import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type {
  EntityId,
  Tick,
  Combatant,
  CombatActionLog,
  CombatParticipant,
  CombatSession,
  StatusEffectInstance,
} from '../types/index.js';
import { behaviorConfigSchema } from '../pipeline/npc-policy.js';

export type StorageResult =
  | { ok: true }
  | { ok: false; reason: 'storage_error'; message: string };

export interface WorldSnapshot {
  tick: Tick;
  combatants: Combatant[];
  sessions: CombatSession[];
  effects: StatusEffectInstance[];
}

export type SnapshotLoadResult =
  | { ok: true; snapshot: WorldSnapshot | null }
  | { ok: false; reason: 'storage_error'; message: string };

// --- Column validation ---

const attributesSchema = z.object({
  Physicality: z.number().int(),
  Dodge: z.number().int(),
  Drive: z.number().int(),
  Reasoning: z.number().int(),
  Awareness: z.number().int(),
  Focus: z.number().int(),
  Bearing: z.number().int(),
});

const templateSchema = z.object({
  id: z.string(),
  name: z.string(),
  strength: z.number().int(),
  quickness: z.number().int(),
  endurance: z.number().int(),
  intelligence: z.number().int(),
  coordination: z.number().int(),
  willpower: z.number().int(),
  charisma: z.number().int(),
  behavior: behaviorConfigSchema.default({}),
});

const kindSchema = z.enum(['player', 'npc']);
const despawnReasonSchema = z.enum(['death', 'timeout', 'admin']).nullable();
const actionTypeSchema = z.enum(['melee_attack', 'flee', 'enter_parry', 'exit_parry', 'broken_weapon']);
const hitLocationSchema = z.enum(['head', 'torso', 'left_arm', 'right_arm', 'left_leg', 'right_leg']).nullable();
const damageTypeSchema = z
  .enum(['bashing', 'cutting', 'piercing', 'projectile', 'energy', 'heat', 'cold', 'acid'])
  .nullable();
const bodyLocationSchema = z
  .enum(['general', 'head', 'torso', 'left_arm', 'right_arm', 'left_leg', 'right_leg'])
  .nullable();
const removalReasonSchema = z.enum(['expired', 'healed', 'natural_healing', 'dispelled']).nullable();

function parseJsonColumn<T>(raw: string | null, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  if (raw === null) return null;
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    console.error('[DB] Malformed JSON column:', err);
    return null;
  }
  const parsed = schema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

interface Statements {
  upsertCombatant: BetterSqlite3.Statement<CombatantRow>;
  deleteCombatant: BetterSqlite3.Statement<[string]>;
  loadAllCombatants: BetterSqlite3.Statement<[], CombatantRow>;
  upsertSession: BetterSqlite3.Statement<SessionRow>;
  loadActiveSessions: BetterSqlite3.Statement<[], SessionRow>;
  deleteParticipants: BetterSqlite3.Statement<[string]>;
  insertParticipant: BetterSqlite3.Statement<ParticipantRow>;
  loadParticipants: BetterSqlite3.Statement<[string], ParticipantRow>;
  insertPenalty: BetterSqlite3.Statement<Omit<PenaltyRow, 'id'>>;
  loadPenalties: BetterSqlite3.Statement<[string, string], PenaltyRow>;
  insertActionLog: BetterSqlite3.Statement<ActionLogRow>;
  loadActionLogs: BetterSqlite3.Statement<[string], ActionLogRow>;
  clearEffects: BetterSqlite3.Statement<[]>;
  insertEffect: BetterSqlite3.Statement<EffectRow>;
  loadAllEffects: BetterSqlite3.Statement<[], EffectRow>;
  getMeta: BetterSqlite3.Statement<[string], { value: string }>;
  setMeta: BetterSqlite3.Statement<{ key: string; value: string; updated_at: number }>;
}

export class Database {
  private db: BetterSqlite3.Database;

  // Prepared statements (initialized after migrations)
  private statements: Statements | null = null;

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
  }

  runMigrations(migrationsDir: string): void {
    // Create migration tracking table (idempotent)
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name TEXT PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    const applied = new Set(
      this.db.prepare<[], { name: string }>('SELECT name FROM _migrations').all().map(r => r.name),
    );

    const files = readdirSync(migrationsDir)
      .filter(f => f.endsWith('.sql'))
      .sort();

    for (const file of files) {
      if (applied.has(file)) continue;
      const sql = readFileSync(join(migrationsDir, file), 'utf-8');
      this.db.transaction(() => {
        this.db.exec(sql);
        this.db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(file);
      })();
      console.log(`[DB] Applied migration ${file}`);
    }

    this.prepareStatements();
  }

  listTables(): string[] {
    return this.db
      .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name`)
      .all()
      .map(r => r.name);
  }

  private get stmts(): Statements {
    if (!this.statements) throw new Error('Database migrations have not been run');
    return this.statements;
  }

  private prepareStatements(): void {
    this.statements = {
      upsertCombatant: this.db.prepare(`
        INSERT OR REPLACE INTO combatants (
          id, kind, name, room_id, current_fatigue, current_vitality,
          pending_fatigue_damage, pending_vitality_damage, wounds,
          last_fatigue_regen_at, last_vitality_regen_at, is_alive,
          max_fatigue, max_vitality, attributes, template, despawn_reason, despawned_at
        ) VALUES (
          @id, @kind, @name, @room_id, @current_fatigue, @current_vitality,
          @pending_fatigue_damage, @pending_vitality_damage, @wounds,
          @last_fatigue_regen_at, @last_vitality_regen_at, @is_alive,
          @max_fatigue, @max_vitality, @attributes, @template, @despawn_reason, @despawned_at
        )
      `),

      deleteCombatant: this.db.prepare('DELETE FROM combatants WHERE id = ?'),

      loadAllCombatants: this.db.prepare('SELECT * FROM combatants'),

      upsertSession: this.db.prepare(`
        INSERT INTO combat_sessions (id, room_id, is_active, started_at, ended_at, end_reason)
        VALUES (@id, @room_id, @is_active, @started_at, @ended_at, @end_reason)
        ON CONFLICT (id) DO UPDATE SET
          is_active = excluded.is_active,
          ended_at = excluded.ended_at,
          end_reason = excluded.end_reason
      `),

      loadActiveSessions: this.db.prepare(
        'SELECT * FROM combat_sessions WHERE is_active = 1 ORDER BY started_at',
      ),

      deleteParticipants: this.db.prepare('DELETE FROM combat_participants WHERE session_id = ?'),

      insertParticipant: this.db.prepare(`
        INSERT INTO combat_participants (
          session_id, combatant_id, position, kind, name, is_active, is_in_parry_mode,
          joined_at, left_at, leave_reason
        ) VALUES (
          @session_id, @combatant_id, @position, @kind, @name, @is_active, @is_in_parry_mode,
          @joined_at, @left_at, @leave_reason
        )
      `),

      loadParticipants: this.db.prepare(
        'SELECT * FROM combat_participants WHERE session_id = ? ORDER BY position',
      ),

      insertPenalty: this.db.prepare(`
        INSERT INTO timed_penalties (session_id, combatant_id, amount, expires_at)
        VALUES (@session_id, @combatant_id, @amount, @expires_at)
      `),

      loadPenalties: this.db.prepare(
        'SELECT * FROM timed_penalties WHERE session_id = ? AND combatant_id = ? ORDER BY id',
      ),

      // Log entries are immutable; re-saving a session leaves existing rows alone
      insertActionLog: this.db.prepare(`
        INSERT OR IGNORE INTO combat_action_logs (
          id, session_id, seq, timestamp, actor_id, target_id, action_type,
          attack_value, defense_value, success_value, damage_dealt, fatigue_damage,
          vitality_damage, wounds, hit_location, damage_type, description
        ) VALUES (
          @id, @session_id, @seq, @timestamp, @actor_id, @target_id, @action_type,
          @attack_value, @defense_value, @success_value, @damage_dealt, @fatigue_damage,
          @vitality_damage, @wounds, @hit_location, @damage_type, @description
        )
      `),

      loadActionLogs: this.db.prepare(
        'SELECT * FROM combat_action_logs WHERE session_id = ? ORDER BY seq',
      ),

      clearEffects: this.db.prepare('DELETE FROM effect_instances'),

      insertEffect: this.db.prepare(`
        INSERT INTO effect_instances (
          id, combatant_id, definition_name, current_stacks, intensity, applied_at,
          expires_at, last_tick_at, body_location, source_id, is_active, removed_at, removal_reason
        ) VALUES (
          @id, @combatant_id, @definition_name, @current_stacks, @intensity, @applied_at,
          @expires_at, @last_tick_at, @body_location, @source_id, @is_active, @removed_at, @removal_reason
        )
      `),

      loadAllEffects: this.db.prepare('SELECT * FROM effect_instances WHERE is_active = 1'),

      getMeta: this.db.prepare('SELECT value FROM world_meta WHERE key = ?'),

      setMeta: this.db.prepare(`
        INSERT OR REPLACE INTO world_meta (key, value, updated_at)
        VALUES (@key, @value, @updated_at)
      `),
    };
  }

  // --- Combatants ---

  saveCombatant(c: Combatant): void {
    this.stmts.upsertCombatant.run({
      id: c.id,
      kind: c.kind,
      name: c.name,
      room_id: c.roomId,
      current_fatigue: c.currentFatigue,
      current_vitality: c.currentVitality,
      pending_fatigue_damage: c.pendingFatigueDamage,
      pending_vitality_damage: c.pendingVitalityDamage,
      wounds: c.wounds,
      last_fatigue_regen_at: c.lastFatigueRegenAt,
      last_vitality_regen_at: c.lastVitalityRegenAt,
      is_alive: c.isAlive ? 1 : 0,
      max_fatigue: c.kind === 'player' ? c.maxFatigue : null,
      max_vitality: c.kind === 'player' ? c.maxVitality : null,
      attributes: c.kind === 'player' ? JSON.stringify(c.attributes) : null,
      template: c.kind === 'npc' ? JSON.stringify(c.template) : null,
      despawn_reason: c.kind === 'npc' ? c.despawnReason : null,
      despawned_at: c.kind === 'npc' ? c.despawnedAt : null,
    });
  }

  deleteCombatant(id: EntityId): StorageResult {
    try {
      this.stmts.deleteCombatant.run(id);
      return { ok: true };
    } catch (err) {
      console.error(`[DB] Failed to delete combatant ${id}:`, err);
      return { ok: false, reason: 'storage_error', message: errorMessage(err) };
    }
  }

  loadAllCombatants(): Combatant[] {
    const result: Combatant[] = [];
    for (const row of this.stmts.loadAllCombatants.all()) {
      const combatant = this.rowToCombatant(row);
      if (combatant) {
        result.push(combatant);
      } else {
        console.error(`[DB] Skipping unreadable combatant row ${row.id}`);
      }
    }
    return result;
  }

  private rowToCombatant(row: CombatantRow): Combatant | null {
    const kind = kindSchema.safeParse(row.kind);
    if (!kind.success) return null;

    const base = {
      id: row.id,
      name: row.name,
      roomId: row.room_id,
      isAlive: row.is_alive === 1,
      currentFatigue: row.current_fatigue,
      currentVitality: row.current_vitality,
      pendingFatigueDamage: row.pending_fatigue_damage,
      pendingVitalityDamage: row.pending_vitality_damage,
      wounds: row.wounds,
      lastFatigueRegenAt: row.last_fatigue_regen_at,
      lastVitalityRegenAt: row.last_vitality_regen_at,
    };

    if (kind.data === 'player') {
      const attributes = parseJsonColumn(row.attributes, attributesSchema);
      if (!attributes || row.max_fatigue === null || row.max_vitality === null) return null;
      return {
        ...base,
        kind: 'player',
        attributes,
        maxFatigue: row.max_fatigue,
        maxVitality: row.max_vitality,
      };
    }

    const template = parseJsonColumn(row.template, templateSchema);
    const despawnReason = despawnReasonSchema.safeParse(row.despawn_reason);
    if (!template || !despawnReason.success) return null;
    return {
      ...base,
      kind: 'npc',
      template,
      despawnReason: despawnReason.data,
      despawnedAt: row.despawned_at,
    };
  }

  // --- Sessions ---

  saveSession(session: CombatSession): void {
    this.stmts.upsertSession.run({
      id: session.id,
      room_id: session.roomId,
      is_active: session.isActive ? 1 : 0,
      started_at: session.startedAt,
      ended_at: session.endedAt,
      end_reason: session.endReason,
    });

    this.stmts.deleteParticipants.run(session.id);
    session.participants.forEach((p, position) => {
      this.stmts.insertParticipant.run({
        session_id: session.id,
        combatant_id: p.combatantId,
        position,
        kind: p.kind,
        name: p.name,
        is_active: p.isActive ? 1 : 0,
        is_in_parry_mode: p.isInParryMode ? 1 : 0,
        joined_at: p.joinedAt,
        left_at: p.leftAt,
        leave_reason: p.leaveReason,
      });
      for (const penalty of p.timedPenalties) {
        this.stmts.insertPenalty.run({
          session_id: session.id,
          combatant_id: p.combatantId,
          amount: penalty.amount,
          expires_at: penalty.expiresAt,
        });
      }
    });

    session.actionLog.forEach((entry, seq) => {
      this.stmts.insertActionLog.run({
        id: entry.id,
        session_id: session.id,
        seq,
        timestamp: entry.timestamp,
        actor_id: entry.actorId,
        target_id: entry.targetId,
        action_type: entry.actionType,
        attack_value: entry.attackValue,
        defense_value: entry.defenseValue,
        success_value: entry.successValue,
        damage_dealt: entry.damageDealt,
        fatigue_damage: entry.fatigueDamage,
        vitality_damage: entry.vitalityDamage,
        wounds: entry.wounds,
        hit_location: entry.hitLocation,
        damage_type: entry.damageType,
        description: entry.description,
      });
    });
  }

  loadActiveSessions(): CombatSession[] {
    return this.stmts.loadActiveSessions.all().map(row => ({
      id: row.id,
      roomId: row.room_id,
      isActive: row.is_active === 1,
      startedAt: row.started_at,
      endedAt: row.ended_at,
      endReason: row.end_reason,
      participants: this.loadParticipants(row.id),
      actionLog: this.loadActionLog(row.id),
    }));
  }

  private loadParticipants(sessionId: string): CombatParticipant[] {
    const result: CombatParticipant[] = [];
    for (const row of this.stmts.loadParticipants.all(sessionId)) {
      const kind = kindSchema.safeParse(row.kind);
      if (!kind.success) {
        console.error(`[DB] Skipping participant ${row.combatant_id} with kind ${row.kind}`);
        continue;
      }
      result.push({
        combatantId: row.combatant_id,
        kind: kind.data,
        name: row.name,
        isActive: row.is_active === 1,
        isInParryMode: row.is_in_parry_mode === 1,
        timedPenalties: this.stmts.loadPenalties
          .all(sessionId, row.combatant_id)
          .map(p => ({ amount: p.amount, expiresAt: p.expires_at })),
        joinedAt: row.joined_at,
        leftAt: row.left_at,
        leaveReason: row.leave_reason,
      });
    }
    return result;
  }

  private loadActionLog(sessionId: string): CombatActionLog[] {
    const result: CombatActionLog[] = [];
    for (const row of this.stmts.loadActionLogs.all(sessionId)) {
      const actionType = actionTypeSchema.safeParse(row.action_type);
      const hitLocation = hitLocationSchema.safeParse(row.hit_location);
      const damageType = damageTypeSchema.safeParse(row.damage_type);
      if (!actionType.success || !hitLocation.success || !damageType.success) {
        console.error(`[DB] Skipping unreadable action log ${row.id}`);
        continue;
      }
      result.push(Object.freeze({
        id: row.id,
        sessionId: row.session_id,
        timestamp: row.timestamp,
        actorId: row.actor_id,
        targetId: row.target_id,
        actionType: actionType.data,
        attackValue: row.attack_value,
        defenseValue: row.defense_value,
        successValue: row.success_value,
        damageDealt: row.damage_dealt,
        fatigueDamage: row.fatigue_damage,
        vitalityDamage: row.vitality_damage,
        wounds: row.wounds,
        hitLocation: hitLocation.data,
        damageType: damageType.data,
        description: row.description,
      }));
    }
    return result;
  }

  // --- Effects ---

  replaceEffects(instances: Iterable<StatusEffectInstance>): void {
    this.stmts.clearEffects.run();
    for (const inst of instances) {
      this.stmts.insertEffect.run({
        id: inst.id,
        combatant_id: inst.combatantId,
        definition_name: inst.definitionName,
        current_stacks: inst.currentStacks,
        intensity: inst.intensity,
        applied_at: inst.appliedAt,
        expires_at: inst.expiresAt,
        last_tick_at: inst.lastTickAt,
        body_location: inst.bodyLocation,
        source_id: inst.sourceId,
        is_active: inst.isActive ? 1 : 0,
        removed_at: inst.removedAt,
        removal_reason: inst.removalReason,
      });
    }
  }

  loadActiveEffects(): StatusEffectInstance[] {
    const result: StatusEffectInstance[] = [];
    for (const row of this.stmts.loadAllEffects.all()) {
      const bodyLocation = bodyLocationSchema.safeParse(row.body_location);
      const removalReason = removalReasonSchema.safeParse(row.removal_reason);
      if (!bodyLocation.success || !removalReason.success) {
        console.error(`[DB] Skipping unreadable effect instance ${row.id}`);
        continue;
      }
      result.push({
        id: row.id,
        combatantId: row.combatant_id,
        definitionName: row.definition_name,
        currentStacks: row.current_stacks,
        intensity: row.intensity,
        appliedAt: row.applied_at,
        expiresAt: row.expires_at,
        lastTickAt: row.last_tick_at,
        bodyLocation: bodyLocation.data,
        sourceId: row.source_id,
        isActive: row.is_active === 1,
        removedAt: row.removed_at,
        removalReason: removalReason.data,
      });
    }
    return result;
  }

  // --- Snapshots ---

  snapshotWorld(world: {
    tick: Tick;
    combatants: Map<EntityId, Combatant>;
    sessions: Map<string, CombatSession>;
    effects: Map<EntityId, StatusEffectInstance[]>;
  }): StorageResult {
    try {
      this.db.transaction(() => {
        this.setMetaValue('current_tick', String(world.tick), world.tick);

        for (const combatant of world.combatants.values()) {
          this.saveCombatant(combatant);
        }
        for (const session of world.sessions.values()) {
          this.saveSession(session);
        }
        const instances: StatusEffectInstance[] = [];
        for (const list of world.effects.values()) instances.push(...list);
        this.replaceEffects(instances);
      })();
      return { ok: true };
    } catch (err) {
      console.error(`[DB] Snapshot at tick ${world.tick} failed:`, err);
      return { ok: false, reason: 'storage_error', message: errorMessage(err) };
    }
  }

  loadWorldSnapshot(): SnapshotLoadResult {
    try {
      const tickStr = this.getMetaValue('current_tick');
      if (tickStr === null) return { ok: true, snapshot: null };

      return {
        ok: true,
        snapshot: {
          tick: Number(tickStr),
          combatants: this.loadAllCombatants(),
          sessions: this.loadActiveSessions(),
          effects: this.loadActiveEffects(),
        },
      };
    } catch (err) {
      console.error('[DB] Failed to load world snapshot:', err);
      return { ok: false, reason: 'storage_error', message: errorMessage(err) };
    }
  }

  // --- Meta ---

  getMetaValue(key: string): string | null {
    return this.stmts.getMeta.get(key)?.value ?? null;
  }

  setMetaValue(key: string, value: string, tick: Tick): void {
    this.stmts.setMeta.run({ key, value, updated_at: tick });
  }

  // --- Lifecycle ---

  close(): void {
    this.db.close();
  }
}

// --- Row types for SQL result mapping ---

interface CombatantRow {
  id: string;
  kind: string;
  name: string;
  room_id: number;
  current_fatigue: number;
  current_vitality: number;
  pending_fatigue_damage: number;
  pending_vitality_damage: number;
  wounds: number;
  last_fatigue_regen_at: number | null;
  last_vitality_regen_at: number | null;
  is_alive: number;
  max_fatigue: number | null;
  max_vitality: number | null;
  attributes: string | null;
  template: string | null;
  despawn_reason: string | null;
  despawned_at: number | null;
}

interface SessionRow {
  id: string;
  room_id: number;
  is_active: number;
  started_at: number;
  ended_at: number | null;
  end_reason: string | null;
}

interface ParticipantRow {
  session_id: string;
  combatant_id: string;
  position: number;
  kind: string;
  name: string;
  is_active: number;
  is_in_parry_mode: number;
  joined_at: number;
  left_at: number | null;
  leave_reason: string | null;
}

interface PenaltyRow {
  id: number;
  session_id: string;
  combatant_id: string;
  amount: number;
  expires_at: number;
}

interface ActionLogRow {
  id: string;
  session_id: string;
  seq: number;
  timestamp: number;
  actor_id: string;
  target_id: string | null;
  action_type: string;
  attack_value: number | null;
  defense_value: number | null;
  success_value: number | null;
  damage_dealt: number;
  fatigue_damage: number;
  vitality_damage: number;
  wounds: number;
  hit_location: string | null;
  damage_type: string | null;
  description: string;
}

interface EffectRow {
  id: string;
  combatant_id: string;
  definition_name: string;
  current_stacks: number;
  intensity: number;
  applied_at: number;
  expires_at: number | null;
  last_tick_at: number | null;
  body_location: string | null;
  source_id: string | null;
  is_active: number;
  removed_at: number | null;
  removal_reason: string | null;
}
