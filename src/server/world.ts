// server/world.ts — In-memory world state

import type {
  EntityId,
  RoomId,
  Tick,
  Combatant,
  CombatSession,
  StatusEffectInstance,
  EquippedItem,
  EquipmentProvider,
} from '../types/index.js';

export class WorldState implements EquipmentProvider {
  tick: Tick = 0;

  combatants: Map<EntityId, Combatant> = new Map();
  sessions: Map<string, CombatSession> = new Map();
  effects: Map<EntityId, StatusEffectInstance[]> = new Map();
  equipment: Map<EntityId, EquippedItem[]> = new Map();

  // --- Combatant methods ---

  addCombatant(combatant: Combatant): void {
    this.combatants.set(combatant.id, combatant);
  }

  removeCombatant(id: EntityId): void {
    this.combatants.delete(id);
    this.effects.delete(id);
    this.equipment.delete(id);
  }

  getCombatant(id: EntityId): Combatant | undefined {
    return this.combatants.get(id);
  }

  getCombatantsInRoom(roomId: RoomId): Combatant[] {
    const result: Combatant[] = [];
    for (const c of this.combatants.values()) {
      if (c.roomId === roomId && c.isAlive) result.push(c);
    }
    return result;
  }

  moveCombatant(id: EntityId, roomId: RoomId): void {
    const combatant = this.combatants.get(id);
    if (!combatant) return;
    combatant.roomId = roomId;
  }

  // --- Equipment methods ---

  equip(combatantId: EntityId, item: EquippedItem): void {
    const items = (this.equipment.get(combatantId) ?? []).filter(i => i.slot !== item.slot);
    items.push(item);
    this.equipment.set(combatantId, items);
  }

  unequip(combatantId: EntityId, itemId: string): void {
    const items = this.equipment.get(combatantId);
    if (!items) return;
    this.equipment.set(combatantId, items.filter(i => i.id !== itemId));
  }

  getEquippedItems(combatantId: EntityId): readonly EquippedItem[] {
    return this.equipment.get(combatantId) ?? [];
  }

  // --- Effect instance storage ---

  getEffectInstances(combatantId: EntityId): StatusEffectInstance[] {
    let list = this.effects.get(combatantId);
    if (!list) {
      list = [];
      this.effects.set(combatantId, list);
    }
    return list;
  }

  findEffectInstance(instanceId: string): StatusEffectInstance | undefined {
    for (const list of this.effects.values()) {
      const found = list.find(i => i.id === instanceId);
      if (found) return found;
    }
    return undefined;
  }

  // --- Session methods ---

  addSession(session: CombatSession): void {
    this.sessions.set(session.id, session);
  }

  getActiveSessions(): CombatSession[] {
    const result: CombatSession[] = [];
    for (const session of this.sessions.values()) {
      if (session.isActive) result.push(session);
    }
    return result;
  }

  /** Drops ended sessions so the map does not grow without bound. */
  pruneEndedSessions(): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (!session.isActive) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
