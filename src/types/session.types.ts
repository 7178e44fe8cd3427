import type { ThinkingSession } from '../services/thinking.service.js';

export interface ResolvedSession {
  id: number;
  session: ThinkingSession;
}

/** Source of the session a tool call operates on */
export interface SessionBinding {
  resolveSession(hint?: string): ResolvedSession;
}

export type ConnectionState = 'connecting' | 'established' | 'closing' | 'closed';
