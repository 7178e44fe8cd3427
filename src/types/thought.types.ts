/**
 * Type definitions for the sequential thinking server
 */

export interface ThoughtInput {
  thought: string;
  nextThoughtNeeded: boolean;
  thoughtNumber: number;
  totalThoughts: number;
  isRevision?: boolean;
  revisesThought?: number;
  branchFromThought?: number;
  branchId?: string;
  /** Informational only - never changes how the thought is stored */
  needsMoreThoughts?: boolean;
}

/** Accepted thought. Frozen on append, never mutated afterwards */
export interface ThoughtRecord extends Readonly<ThoughtInput> {
  readonly timestamp: number;
}

export interface ValidationError {
  kind: 'validation';
  /** Offending field, absent when the whole input is malformed */
  field?: string;
  message: string;
}

export type ThoughtValidation =
  | { ok: true; input: ThoughtInput }
  | { ok: false; error: ValidationError };

export interface ThinkingResult {
  sessionId: number;
  thoughtNumber: number;
  totalThoughts: number;
  nextThoughtNeeded: boolean;
  branches: string[];
  thoughtHistoryLength: number;
}

export type ProcessOutcome =
  | { ok: true; result: ThinkingResult }
  | { ok: false; error: ValidationError };

export type RecallMatchType = 'thought' | 'revision' | 'branch';

export interface RecallInput {
  query: string;
  limit?: number;
  threshold?: number;
}

export interface RecallMatch {
  thoughtNumber: number;
  snippet: string;
  /** Fuse score: 0 = exact, 1 = no match */
  relevance: number;
  matchedIn: RecallMatchType;
  branchId?: string;
}

export interface RecallResult {
  matches: RecallMatch[];
  totalSearched: number;
  query: string;
}
