/**
 * ExportService - Export a session as Markdown or JSON report
 * Stateless service - receives data as parameters
 */

import type { ThinkingSession } from './thinking.service.js';
import { VisualizationService } from './visualization.service.js';

export type ExportFormat = 'markdown' | 'json';

export interface ExportOptions {
  format?: ExportFormat;
  includeTree?: boolean;
}

export class ExportService {
  private readonly visualizer = new VisualizationService();

  /**
   * Export session as Markdown or JSON report
   * @param session - session to export
   * @param options - Export options
   */
  export(session: ThinkingSession, options: ExportOptions = {}): string {
    const { format = 'markdown', includeTree = true } = options;

    if (session.length === 0) {
      return format === 'json'
        ? JSON.stringify({ sessionId: session.id, error: 'No thoughts recorded in this session' })
        : `# Thinking Session ${session.id}\n\n*No thoughts recorded in this session.*`;
    }

    if (format === 'json') {
      return JSON.stringify(
        {
          sessionId: session.id,
          thoughts: session.thoughts,
          branches: Object.fromEntries(
            Array.from(session.branches, ([id, records]) => [id, records.map((r) => r.thoughtNumber)])
          ),
        },
        null,
        2
      );
    }

    return this.generateMarkdown(session, includeTree);
  }

  private generateMarkdown(session: ThinkingSession, includeTree: boolean): string {
    const { thoughts, branches } = session;
    const revisions = thoughts.filter((t) => t.isRevision).length;

    const sections: string[] = [
      `# Thinking Session ${session.id}`,
      '',
      '## 📊 Summary',
      `- **Total thoughts:** ${thoughts.length}`,
      `- **Revisions:** ${revisions}`,
      `- **Branches:** ${branches.size}`,
      '',
      '## 💭 Thoughts',
      '',
    ];

    for (const t of thoughts) {
      const revStr = t.isRevision ? ` *(revision of #${t.revisesThought})*` : '';
      const branchStr = t.branchFromThought
        ? ` *(branch ${t.branchId ?? '?'} from #${t.branchFromThought})*`
        : '';
      sections.push(`### Thought #${t.thoughtNumber}/${t.totalThoughts}${revStr}${branchStr}`, t.thought, '');
    }

    if (branches.size > 0) {
      sections.push('## 🌿 Branches', '');
      for (const [branchId, records] of branches) {
        sections.push(`- **${branchId}:** ${records.map((r) => `#${r.thoughtNumber}`).join(' → ')}`);
      }
      sections.push('');
    }

    if (includeTree) {
      sections.push('## 🌳 Tree', '', '```', this.visualizer.generateAsciiTree(thoughts, branches), '```', '');
    }

    return sections.join('\n');
  }
}
