/**
 * RecallService - Fuzzy search through a session's thought log
 * Keeps one Fuse.js index per session, rebuilt when the log has grown
 */

import Fuse from 'fuse.js';
import type {
  ThoughtRecord,
  RecallInput,
  RecallResult,
  RecallMatch,
  RecallMatchType,
} from '../types/thought.types.js';
import type { ThinkingSession } from './thinking.service.js';
import {
  RECALL_DEFAULT_LIMIT,
  RECALL_DEFAULT_THRESHOLD,
  RECALL_SNIPPET_CONTEXT,
} from '../constants/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('recall');

/** Searchable item for Fuse.js index */
interface FuseSearchItem {
  thoughtNumber: number;
  content: string;
  type: RecallMatchType;
  branchId?: string;
}

interface IndexedLog {
  indexedLength: number;
  fuse: Fuse<FuseSearchItem>;
}

function matchType(t: ThoughtRecord): RecallMatchType {
  if (t.isRevision) return 'revision';
  if (t.branchFromThought) return 'branch';
  return 'thought';
}

export class RecallService {
  private readonly indexes = new WeakMap<ThinkingSession, IndexedLog>();

  private indexFor(session: ThinkingSession): Fuse<FuseSearchItem> {
    const cached = this.indexes.get(session);
    if (cached && cached.indexedLength === session.length) {
      return cached.fuse;
    }

    const items: FuseSearchItem[] = session.thoughts.map((t) => ({
      thoughtNumber: t.thoughtNumber,
      content: t.thought,
      type: matchType(t),
      branchId: t.branchId,
    }));

    const fuse = new Fuse(items, {
      keys: ['content'],
      threshold: RECALL_DEFAULT_THRESHOLD,
      includeScore: true,
      minMatchCharLength: 2,
      ignoreLocation: true, // Search entire content, not just beginning
    });
    this.indexes.set(session, { indexedLength: session.length, fuse });
    log.debug('Fuse index rebuilt', { sessionId: session.id, items: items.length });
    return fuse;
  }

  /**
   * Extract snippet with context around the first query word
   */
  extractSnippet(text: string, query: string): string {
    const lowerQuery = query.toLowerCase().split(/\s+/)[0] ?? '';
    const idx = lowerQuery ? text.toLowerCase().indexOf(lowerQuery) : -1;

    if (idx === -1) {
      return text.length > 200 ? text.substring(0, 200) + '...' : text;
    }

    const start = Math.max(0, idx - RECALL_SNIPPET_CONTEXT);
    const end = Math.min(text.length, idx + lowerQuery.length + RECALL_SNIPPET_CONTEXT);
    const prefix = start > 0 ? '...' : '';
    const suffix = end < text.length ? '...' : '';

    return prefix + text.substring(start, end).trim() + suffix;
  }

  recall(input: RecallInput, session: ThinkingSession): RecallResult {
    const { query, limit = RECALL_DEFAULT_LIMIT, threshold = RECALL_DEFAULT_THRESHOLD } = input;

    if (!query || query.trim().length < 2 || session.length === 0) {
      return { matches: [], totalSearched: session.length, query };
    }

    const rawResults = this.indexFor(session).search(query, { limit: limit * 5 });

    // Fuse score: lower = better match
    const matches: RecallMatch[] = rawResults
      .filter((r) => (r.score ?? 1) <= threshold)
      .slice(0, limit)
      .map((r) => ({
        thoughtNumber: r.item.thoughtNumber,
        snippet: this.extractSnippet(r.item.content, query),
        relevance: r.score ?? 1,
        matchedIn: r.item.type,
        ...(r.item.branchId ? { branchId: r.item.branchId } : {}),
      }));

    log.debug('Recall search', { sessionId: session.id, query, matches: matches.length });

    return { matches, totalSearched: session.length, query };
  }
}
