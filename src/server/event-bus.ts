// server/event-bus.ts — Typed publish/subscribe for game events

import type { GameEvent, GameEventType } from '../types/index.js';

export type EventListener<T extends GameEventType = GameEventType> = (
  event: Extract<GameEvent, { type: T }>,
) => void;

type AnyListener = (event: GameEvent) => void;

export class EventBus {
  private listeners: Set<AnyListener> = new Set();
  private typed: Map<GameEventType, Set<AnyListener>> = new Map();

  subscribe(listener: AnyListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  on<T extends GameEventType>(type: T, listener: EventListener<T>): () => void {
    const wrapped: AnyListener = (event) => {
      if (isEventOfType(event, type)) listener(event);
    };
    const set = this.typed.get(type) ?? new Set<AnyListener>();
    this.typed.set(type, set);
    set.add(wrapped);
    return () => {
      set.delete(wrapped);
    };
  }

  publish(event: GameEvent): void {
    for (const listener of this.listeners) {
      this.deliver(listener, event);
    }
    const typed = this.typed.get(event.type);
    if (typed) {
      for (const listener of typed) {
        this.deliver(listener, event);
      }
    }
  }

  private deliver(listener: AnyListener, event: GameEvent): void {
    try {
      listener(event);
    } catch (err) {
      console.error(`[Bus] Listener failed on ${event.type}:`, err);
    }
  }
}

function isEventOfType<T extends GameEventType>(
  event: GameEvent,
  type: T,
): event is Extract<GameEvent, { type: T }> {
  return event.type === type;
}
