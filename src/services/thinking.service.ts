/**
 * ThinkingSession - One reasoning conversation
 * Append-only thought log with branch index. Records are frozen on append;
 * revisions and branch continuations are appended, never merged.
 */

import type {
  ThoughtInput,
  ThoughtRecord,
  ThinkingResult,
  ProcessOutcome,
} from '../types/thought.types.js';
import { ValidationService } from './validation.service.js';
import { VisualizationService } from './visualization.service.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('thinking');

const validator = new ValidationService();
const visualizer = new VisualizationService();

export class ThinkingSession {
  private readonly thoughtHistory: ThoughtRecord[] = [];
  private readonly branchIndex = new Map<string, ThoughtRecord[]>();

  constructor(readonly id: number) {}

  get thoughts(): readonly ThoughtRecord[] {
    return this.thoughtHistory;
  }

  get branches(): ReadonlyMap<string, readonly ThoughtRecord[]> {
    return this.branchIndex;
  }

  get length(): number {
    return this.thoughtHistory.length;
  }

  /**
   * Validate raw tool arguments, then process them.
   * A rejected input leaves the session untouched.
   */
  submit(raw: unknown): ProcessOutcome {
    const validation = validator.validateThought(raw);
    if (!validation.ok) {
      log.debug('Thought rejected', { sessionId: this.id, error: validation.error.message });
      return { ok: false, error: validation.error };
    }
    return { ok: true, result: this.process(validation.input) };
  }

  /**
   * Append an already validated thought.
   * totalThoughts is raised to thoughtNumber when the estimate was exceeded.
   */
  process(input: ThoughtInput): ThinkingResult {
    const record: ThoughtRecord = Object.freeze({
      ...input,
      totalThoughts: Math.max(input.totalThoughts, input.thoughtNumber),
      timestamp: Date.now(),
    });

    this.thoughtHistory.push(record);

    if (record.branchFromThought && record.branchId) {
      const branchHistory = this.branchIndex.get(record.branchId) ?? [];
      branchHistory.push(record);
      this.branchIndex.set(record.branchId, branchHistory);
    }

    log.info(`Session ${this.id}\n${visualizer.formatThought(record)}`);

    return {
      sessionId: this.id,
      thoughtNumber: record.thoughtNumber,
      totalThoughts: record.totalThoughts,
      nextThoughtNeeded: record.nextThoughtNeeded,
      branches: Array.from(this.branchIndex.keys()),
      thoughtHistoryLength: this.thoughtHistory.length,
    };
  }
}
