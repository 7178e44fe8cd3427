/**
 * MCP server factory. One server per connection, bound to that
 * connection's thinking session.
 *
 * Tools:
 * - sequentialthinking: Add a thought to the session's chain
 * - thinking_recall: Fuzzy search through the session's thoughts
 * - thinking_export: Render the session as Markdown or JSON
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { thoughtToolShape } from './services/validation.service.js';
import { RecallService } from './services/recall.service.js';
import { ExportService } from './services/export.service.js';
import type { SessionBinding } from './types/session.types.js';
import { errorMessage } from './utils/errors.js';

export const SERVER_NAME = 'sequential-thinking-server';
export const SERVER_VERSION = '1.0.0';

const recallService = new RecallService();
const exportService = new ExportService();

const sessionIdArg = z
  .union([z.string(), z.number().int()])
  .optional()
  .describe('Session to use; defaults to the session bound to this connection');

function hintOf(sessionId: string | number | undefined): string | undefined {
  return sessionId === undefined ? undefined : String(sessionId);
}

function errorResult(message: string) {
  return { content: [{ type: 'text' as const, text: `Error: ${message}` }], isError: true };
}

// ============================================
// 1. SEQUENTIALTHINKING - Add a thought
// ============================================

const THINK_DESCRIPTION = `A tool for dynamic and reflective problem-solving through thoughts.
Each thought can build on, question, or revise previous insights as understanding deepens.

When to use:
- Breaking down complex problems into steps
- Planning and design with room for revision
- Analysis that might need course correction
- Problems where the full scope might not be clear initially

Key features:
- Adjust totalThoughts up or down as you progress (it is raised automatically when thoughtNumber exceeds it)
- Revise earlier thoughts (isRevision + revisesThought); the original stays in history
- Branch into alternative lines of reasoning (branchFromThought + branchId)
- Thoughts live in a session bound to this connection; pass sessionId to resume an earlier one

Only set nextThoughtNeeded to false when truly done and a satisfactory answer is reached.`;

// ============================================
// 2. THINKING_RECALL - Search session
// ============================================

const RECALL_DESCRIPTION = `Fuzzy search through the thoughts of the current session.
Use to find earlier decisions before revising or branching.`;

const recallSchema = {
  query: z.string().min(2).describe('Search query (fuzzy matching)'),
  limit: z.number().int().min(1).max(10).optional().describe('Max results (default 3)'),
  threshold: z.number().min(0).max(1).optional().describe('Match strictness, lower = stricter (default 0.4)'),
  sessionId: sessionIdArg,
};

// ============================================
// 3. THINKING_EXPORT - Report
// ============================================

const EXPORT_DESCRIPTION = `Export the current session's thoughts, revisions and branches as a Markdown or JSON report.`;

const exportSchema = {
  format: z.enum(['markdown', 'json']).optional().describe('Report format (default markdown)'),
  includeTree: z.boolean().optional().describe('Include ASCII tree (markdown only)'),
  sessionId: sessionIdArg,
};

export function createThinkingServer(binding: SessionBinding): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    'sequentialthinking',
    {
      title: 'Sequential Thinking',
      description: THINK_DESCRIPTION,
      inputSchema: { ...thoughtToolShape, sessionId: sessionIdArg },
    },
    async ({ sessionId, ...thought }) => {
      try {
        const { session } = binding.resolveSession(hintOf(sessionId));
        const outcome = session.submit(thought);
        if (!outcome.ok) {
          return errorResult(outcome.error.message);
        }
        return { content: [{ type: 'text' as const, text: JSON.stringify(outcome.result, null, 2) }] };
      } catch (error) {
        return errorResult(errorMessage(error));
      }
    }
  );

  server.registerTool(
    'thinking_recall',
    { title: 'Thinking Recall', description: RECALL_DESCRIPTION, inputSchema: recallSchema },
    async ({ query, limit, threshold, sessionId }) => {
      try {
        const { id, session } = binding.resolveSession(hintOf(sessionId));
        const result = recallService.recall({ query, limit, threshold }, session);

        if (result.matches.length === 0) {
          return {
            content: [
              {
                type: 'text' as const,
                text: `🔍 No matches for "${query}" in ${result.totalSearched} thoughts (session ${id})`,
              },
            ],
          };
        }

        const text = [
          `🔍 RECALL "${query}" (session ${id})`,
          `Found ${result.matches.length}/${result.totalSearched}`,
          '',
          ...result.matches.map((m, i) =>
            [
              `#${i + 1} Thought #${m.thoughtNumber} [${m.matchedIn}${m.branchId ? `:${m.branchId}` : ''}] (${Math.round((1 - m.relevance) * 100)}%)`,
              `  "${m.snippet}"`,
            ].join('\n')
          ),
        ].join('\n');

        return { content: [{ type: 'text' as const, text }] };
      } catch (error) {
        return errorResult(errorMessage(error));
      }
    }
  );

  server.registerTool(
    'thinking_export',
    { title: 'Thinking Export', description: EXPORT_DESCRIPTION, inputSchema: exportSchema },
    async ({ format, includeTree, sessionId }) => {
      try {
        const { session } = binding.resolveSession(hintOf(sessionId));
        const text = exportService.export(session, { format, includeTree });
        return { content: [{ type: 'text' as const, text }] };
      } catch (error) {
        return errorResult(errorMessage(error));
      }
    }
  );

  return server;
}
