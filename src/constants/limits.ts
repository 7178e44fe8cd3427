/**
 * Defaults for the session store, heartbeat and recall
 */

// Session store
export const DEFAULT_MAX_SESSIONS = 1000;

// Heartbeat
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 15_000;
export const HEARTBEAT_ID_PREFIX = 'heartbeat-';

// HTTP
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 8002;
export const SSE_PATH = '/sse';
export const MESSAGES_PATH = '/messages';

// Recall
export const RECALL_DEFAULT_LIMIT = 3;
export const RECALL_DEFAULT_THRESHOLD = 0.4;
export const RECALL_SNIPPET_CONTEXT = 100; // Characters before/after match for snippet
