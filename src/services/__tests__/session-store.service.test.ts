/**
 * SessionStore Tests
 * Capacity bound, LRU victim choice and id allocation
 */

import { describe, it, expect } from 'vitest';
import { SessionStore } from '../session-store.service.js';
import type { ThoughtInput } from '../../types/thought.types.js';

const thought = (n: number): ThoughtInput => ({
  thought: `thought ${n}`,
  thoughtNumber: n,
  totalThoughts: 3,
  nextThoughtNeeded: true,
});

// Frozen clock: ordering must come from the store's own stamps
const frozenClock = () => 1_000;

describe('SessionStore', () => {
  describe('getOrCreate', () => {
    it('should mint session 1 with an empty log when no hint is given', () => {
      const store = new SessionStore();
      const { id, session } = store.getOrCreate();
      expect(id).toBe(1);
      expect(session.length).toBe(0);
      expect(store.size).toBe(1);
    });

    it('should return the existing session for a known id', () => {
      const store = new SessionStore();
      const first = store.getOrCreate();
      first.session.process(thought(1));

      const again = store.getOrCreate('1');
      expect(again.id).toBe(1);
      expect(again.session).toBe(first.session);
      expect(again.session.length).toBe(1);
    });

    it('should accept surrounding whitespace in the id', () => {
      const store = new SessionStore();
      store.getOrCreate();
      expect(store.getOrCreate(' 1 ').id).toBe(1);
    });

    it('should mint a new session for unknown or malformed ids', () => {
      const store = new SessionStore();
      store.getOrCreate();
      expect(store.getOrCreate('42').id).toBe(2);
      expect(store.getOrCreate('abc').id).toBe(3);
      expect(store.getOrCreate('1.0').id).toBe(4);
      expect(store.getOrCreate('-1').id).toBe(5);
    });

    it('should never exceed capacity', () => {
      const store = new SessionStore({ maxSessions: 5 });
      for (let i = 0; i < 50; i++) {
        store.getOrCreate();
        expect(store.size).toBeLessThanOrEqual(5);
      }
      expect(store.size).toBe(5);
    });

    it('should evict the least recently touched session when full', () => {
      const store = new SessionStore({ maxSessions: 2, now: frozenClock });
      store.getOrCreate();
      store.getOrCreate();
      store.touch(2);

      const fresh = store.getOrCreate();
      expect(fresh.id).toBe(3);
      expect(store.get(1)).toBeUndefined();
      expect(store.get(2)).toBeDefined();

      const reused = store.getOrCreate('1');
      expect(reused.id).toBe(4);
      expect(reused.session.length).toBe(0);
      expect(store.get(2)).toBeUndefined();
      expect(store.size).toBe(2);
    });

    it('should treat access through getOrCreate as a touch', () => {
      const store = new SessionStore({ maxSessions: 3, now: frozenClock });
      store.getOrCreate();
      store.getOrCreate();
      store.getOrCreate();
      store.getOrCreate('1');

      store.getOrCreate();
      expect(store.get(1)).toBeDefined();
      expect(store.get(2)).toBeUndefined();
    });

    it('should not reuse ids after eviction', () => {
      const store = new SessionStore({ maxSessions: 1 });
      const ids = [store.getOrCreate().id, store.getOrCreate().id, store.getOrCreate().id];
      expect(ids).toEqual([1, 2, 3]);
    });
  });

  describe('touch', () => {
    it('should strictly increase the access stamp even with a frozen clock', () => {
      const store = new SessionStore({ now: frozenClock });
      store.getOrCreate();
      const before = store.lastAccessOf(1) ?? 0;
      store.touch(1);
      const after = store.lastAccessOf(1) ?? 0;
      expect(after).toBeGreaterThan(before);
    });

    it('should follow the clock when it moves forward', () => {
      let now = 5_000;
      const store = new SessionStore({ now: () => now });
      store.getOrCreate();
      now = 9_000;
      store.touch(1);
      expect(store.lastAccessOf(1)).toBe(9_000);
    });

    it('should ignore unknown ids', () => {
      const store = new SessionStore();
      store.touch(99);
      expect(store.lastAccessOf(99)).toBeUndefined();
      expect(store.size).toBe(0);
    });

    it('should protect the most recently touched session from eviction', () => {
      const store = new SessionStore({ maxSessions: 3, now: frozenClock });
      store.getOrCreate();
      store.getOrCreate();
      store.getOrCreate();
      store.touch(1);

      expect(store.evictOldest()).toBe(2);
      expect(store.evictOldest()).toBe(3);
      expect(store.evictOldest()).toBe(1);
    });
  });

  describe('evictOldest', () => {
    it('should return undefined on an empty store', () => {
      expect(new SessionStore().evictOldest()).toBeUndefined();
    });

    it('should remove exactly one session with its access stamp', () => {
      const store = new SessionStore();
      store.getOrCreate();
      store.getOrCreate();
      expect(store.evictOldest()).toBe(1);
      expect(store.size).toBe(1);
      expect(store.lastAccessOf(1)).toBeUndefined();
    });
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new SessionStore({ maxSessions: 0 })).toThrow(RangeError);
  });
});
