/**
 * SessionStore - Bounded registry of thinking sessions
 * Evicts the least recently accessed session when full. Ids are never reused.
 *
 * Every method runs synchronously to completion, so getOrCreate, touch and
 * evictOldest are indivisible with respect to concurrent connection handlers.
 */

import { ThinkingSession } from './thinking.service.js';
import type { ResolvedSession } from '../types/session.types.js';
import { DEFAULT_MAX_SESSIONS } from '../constants/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('session-store');

const SESSION_ID_PATTERN = /^\d+$/;

export interface SessionStoreOptions {
  maxSessions?: number;
  /** Clock used for access stamps (ms) */
  now?: () => number;
}

export class SessionStore {
  private readonly sessions = new Map<number, ThinkingSession>();
  private readonly lastAccess = new Map<number, number>();
  private nextId = 1;
  private lastStamp = Number.NEGATIVE_INFINITY;

  private readonly maxSessions: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.now = options.now ?? Date.now;
    if (!Number.isInteger(this.maxSessions) || this.maxSessions < 1) {
      throw new RangeError(`maxSessions must be a positive integer, got ${this.maxSessions}`);
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  get capacity(): number {
    return this.maxSessions;
  }

  get(id: number): ThinkingSession | undefined {
    return this.sessions.get(id);
  }

  lastAccessOf(id: number): number | undefined {
    return this.lastAccess.get(id);
  }

  /**
   * Return the session named by candidateId, or mint a new one.
   * An unknown id is not an error: a fresh session is created under a new id.
   */
  getOrCreate(candidateId?: string): ResolvedSession {
    const existingId = this.parseId(candidateId);
    if (existingId !== undefined) {
      const existing = this.sessions.get(existingId);
      if (existing) {
        this.lastAccess.set(existingId, this.stamp());
        return { id: existingId, session: existing };
      }
    }

    while (this.sessions.size >= this.maxSessions) {
      this.evictOldest();
    }

    const id = this.nextId++;
    const session = new ThinkingSession(id);
    this.sessions.set(id, session);
    this.lastAccess.set(id, this.stamp());

    if (candidateId !== undefined) {
      log.warn('Unknown session id, starting a new session', { candidateId, id });
    } else {
      log.debug('Session created', { id, size: this.sessions.size });
    }
    return { id, session };
  }

  touch(id: number): void {
    if (!this.sessions.has(id)) return;
    this.lastAccess.set(id, this.stamp());
  }

  /** Remove the session with the oldest access stamp (ties: smallest id) */
  evictOldest(): number | undefined {
    let victim: number | undefined;
    let oldest = Number.POSITIVE_INFINITY;

    for (const [id, stamp] of this.lastAccess) {
      if (stamp < oldest || (stamp === oldest && victim !== undefined && id < victim)) {
        oldest = stamp;
        victim = id;
      }
    }

    if (victim === undefined) return undefined;

    const evicted = this.sessions.get(victim);
    this.sessions.delete(victim);
    this.lastAccess.delete(victim);
    log.info('Evicted least recently used session', {
      id: victim,
      thoughts: evicted?.length ?? 0,
    });
    return victim;
  }

  private parseId(candidateId: string | undefined): number | undefined {
    if (candidateId === undefined) return undefined;
    const trimmed = candidateId.trim();
    if (!SESSION_ID_PATTERN.test(trimmed)) return undefined;
    const id = Number(trimmed);
    return Number.isSafeInteger(id) ? id : undefined;
  }

  /** Strictly increasing even when the clock stalls or steps back */
  private stamp(): number {
    const next = Math.max(this.now(), this.lastStamp + 1);
    this.lastStamp = next;
    return next;
  }
}
