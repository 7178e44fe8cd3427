/**
 * VisualizationService - Boxed thought rendering and ASCII tree generation
 * Stateless service - receives data as parameters
 */

import type { ThoughtRecord } from '../types/thought.types.js';

// Max main-line thoughts to show in tree (older ones collapsed)
const MAX_TREE_THOUGHTS = 5;
const TREE_PREVIEW_LENGTH = 35;

export class VisualizationService {
  /**
   * Render one thought inside a box:
   * header (kind, position/total, revision or branch context), then content.
   */
  formatThought(record: ThoughtRecord): string {
    let prefix: string;
    let context = '';

    if (record.isRevision) {
      prefix = '🔄 Revision';
      context = ` (revising thought ${record.revisesThought})`;
    } else if (record.branchFromThought) {
      prefix = '🌿 Branch';
      context = ` (from thought ${record.branchFromThought}, ID: ${record.branchId})`;
    } else {
      prefix = '💭 Thought';
    }

    const header = `${prefix} ${record.thoughtNumber}/${record.totalThoughts}${context}`;
    const border = '─'.repeat(Math.max(header.length, record.thought.length) + 4);

    return [
      `┌${border}┐`,
      `│ ${header.padEnd(border.length - 2)} │`,
      `├${border}┤`,
      `│ ${record.thought.padEnd(border.length - 2)} │`,
      `└${border}┘`,
    ].join('\n');
  }

  /**
   * Generate ASCII tree of the main line with revision and branch counts
   * @param thoughts - session log in submission order
   * @param branches - branch id to branch records
   */
  generateAsciiTree(
    thoughts: readonly ThoughtRecord[],
    branches: ReadonlyMap<string, readonly ThoughtRecord[]>
  ): string {
    if (thoughts.length === 0) return '(empty)';

    const mainThoughts = thoughts.filter((t) => !t.branchFromThought && !t.isRevision);

    const shouldTruncate = mainThoughts.length > MAX_TREE_THOUGHTS;
    const hiddenCount = shouldTruncate ? mainThoughts.length - MAX_TREE_THOUGHTS : 0;
    const visibleThoughts = shouldTruncate ? mainThoughts.slice(-MAX_TREE_THOUGHTS) : mainThoughts;

    const lines: string[] = ['📊 Thought Tree:'];
    if (shouldTruncate) {
      lines.push(`│   ... ${hiddenCount} earlier thought(s) hidden`);
    }

    visibleThoughts.forEach((thought, i) => {
      const isLast = i === visibleThoughts.length - 1;
      const prefix = isLast ? '└──' : '├──';
      const childPrefix = isLast ? '    ' : '│   ';
      const preview =
        thought.thought.length > TREE_PREVIEW_LENGTH
          ? `${thought.thought.substring(0, TREE_PREVIEW_LENGTH)}...`
          : thought.thought;
      lines.push(`${prefix} #${thought.thoughtNumber}: ${preview}`);

      const revisions = thoughts.filter(
        (t) => t.isRevision && t.revisesThought === thought.thoughtNumber
      );
      if (revisions.length > 0) {
        lines.push(`${childPrefix}🔄 [${revisions.length} revision(s)]`);
      }

      for (const [branchId, branchThoughts] of branches) {
        const fromThis = branchThoughts.filter((t) => t.branchFromThought === thought.thoughtNumber);
        if (fromThis.length > 0) {
          lines.push(`${childPrefix}🌿 [${branchId}]: ${fromThis.length} thought(s)`);
        }
      }
    });

    return lines.join('\n');
  }
}
