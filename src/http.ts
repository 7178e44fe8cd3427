/**
 * HTTP surface: SSE stream endpoint, inbound message endpoint, health check
 */

import express, { type Express, type Request, type Response } from 'express';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { ConnectionHandler } from './services/connection.service.js';
import type { SessionStore } from './services/session-store.service.js';
import { MESSAGES_PATH, SSE_PATH } from './constants/index.js';
import { createLogger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

const log = createLogger('http');

export interface AppOptions {
  store: SessionStore;
  heartbeatIntervalMs?: number;
}

export interface ThinkingApp {
  app: Express;
  /** Live connections keyed by transport connection id */
  connections: ReadonlyMap<string, ConnectionHandler>;
  /** Close every live connection and wait for their teardown */
  closeAll(): Promise<void>;
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createApp(options: AppOptions): ThinkingApp {
  const { store, heartbeatIntervalMs } = options;
  const connections = new Map<string, ConnectionHandler>();
  const transports = new Map<string, SSEServerTransport>();
  const running = new Set<Promise<void>>();

  const app = express();

  app.get(SSE_PATH, async (req: Request, res: Response) => {
    const transport = new SSEServerTransport(MESSAGES_PATH, res);
    const handler = new ConnectionHandler({
      store,
      transport,
      sessionHint: queryString(req, 'session'),
      heartbeatIntervalMs,
    });

    connections.set(handler.connectionId, handler);
    transports.set(handler.connectionId, transport);
    const lifecycle = handler.run();
    running.add(lifecycle);
    try {
      await lifecycle;
    } catch (error) {
      log.error('Connection failed', { connection: handler.connectionId, error: errorMessage(error) });
      if (!res.headersSent) {
        res.status(500).json({ error: 'Failed to establish stream' });
      }
    } finally {
      running.delete(lifecycle);
      connections.delete(handler.connectionId);
      transports.delete(handler.connectionId);
    }
  });

  app.post(MESSAGES_PATH, async (req: Request, res: Response) => {
    const connectionId = queryString(req, 'sessionId');
    if (!connectionId) {
      res.status(400).json({ error: 'Missing sessionId query parameter' });
      return;
    }

    const handler = connections.get(connectionId);
    const transport = transports.get(connectionId);
    if (!handler || !transport || handler.state === 'closing' || handler.state === 'closed') {
      res.status(404).json({ error: `No active connection ${connectionId}` });
      return;
    }

    await transport.handlePostMessage(req, res);
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      sessions: store.size,
      capacity: store.capacity,
      connections: connections.size,
    });
  });

  async function closeAll(): Promise<void> {
    const pending = Array.from(running);
    await Promise.all(Array.from(connections.values(), (handler) => handler.close()));
    await Promise.allSettled(pending);
  }

  return { app, connections, closeAll };
}
