// tests/action-queue.test.ts — ActionQueue tests

import { describe, it, expect, beforeEach } from 'vitest';
import { ActionQueue } from '../src/pipeline/action-queue.js';

describe('ActionQueue', () => {
  let queue: ActionQueue;

  beforeEach(() => {
    queue = new ActionQueue();
  });

  it('enqueues and drains a single attack', () => {
    expect(queue.enqueue('p1', { command: 'attack', params: { targetId: 'n1' } }, 5)).toBe(true);

    const commands = queue.drainAll();
    expect(commands).toEqual([{
      combatantId: 'p1',
      params: { type: 'attack', targetId: 'n1', dualWield: false, offHand: false },
      receivedTick: 5,
    }]);
  });

  it('last-write-wins: only the final command for a combatant survives', () => {
    queue.enqueue('p1', { command: 'attack', params: { targetId: 'n1' } }, 5);
    queue.enqueue('p1', { command: 'parry' }, 5);
    queue.enqueue('p1', { command: 'flee' }, 5);

    const commands = queue.drainAll();
    expect(commands).toHaveLength(1);
    expect(commands[0]?.params).toEqual({ type: 'flee' });
  });

  it('keeps one command per combatant', () => {
    for (let i = 1; i <= 5; i++) {
      queue.enqueue(`p${i}`, { command: 'idle' }, 1);
    }

    expect(queue.size).toBe(5);
    expect(queue.drainAll().map(c => c.combatantId).sort()).toEqual(['p1', 'p2', 'p3', 'p4', 'p5']);
  });

  it('drainAll clears the queue', () => {
    queue.enqueue('p1', { command: 'idle' }, 1);
    expect(queue.drainAll()).toHaveLength(1);
    expect(queue.drainAll()).toHaveLength(0);
    expect(queue.has('p1')).toBe(false);
  });

  it('normalises the command name', () => {
    queue.enqueue('p1', { command: '  PARRY ', params: { enabled: false } }, 1);
    expect(queue.drainAll()[0]?.params).toEqual({ type: 'parry', enabled: false });
  });

  it('defaults parry to enabled', () => {
    queue.enqueue('p1', { command: 'parry' }, 1);
    expect(queue.drainAll()[0]?.params).toEqual({ type: 'parry', enabled: true });
  });

  it('reads dual wield and off-hand flags', () => {
    queue.enqueue('p1', { command: 'attack', params: { targetId: 'n1', dualWield: true, offHand: true } }, 1);
    expect(queue.drainAll()[0]?.params).toEqual({ type: 'attack', targetId: 'n1', dualWield: true, offHand: true });
  });

  it('drops malformed commands', () => {
    expect(queue.enqueue('p1', { command: 'dance' }, 1)).toBe(false);
    expect(queue.enqueue('p1', { command: 'attack' }, 1)).toBe(false);
    expect(queue.enqueue('p1', { command: 'attack', params: { targetId: '' } }, 1)).toBe(false);
    expect(queue.enqueue('p1', { command: 'attack', params: { targetId: 'n1', dualWield: 'yes' } }, 1)).toBe(false);
    expect(queue.enqueue('p1', { command: 'parry', params: { enabled: 1 } }, 1)).toBe(false);
    expect(queue.size).toBe(0);
  });

  it('keeps the earlier command when a later one is malformed', () => {
    queue.enqueue('p1', { command: 'flee' }, 1);
    queue.enqueue('p1', { command: 'dance' }, 1);
    expect(queue.drainAll()[0]?.params).toEqual({ type: 'flee' });
  });
});
