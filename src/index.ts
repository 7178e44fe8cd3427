#!/usr/bin/env node
/**
 * Sequential Thinking MCP Server over SSE
 *
 * Endpoints:
 * - GET  /sse?session=<id>              Event stream, optionally resuming a session
 * - POST /messages?sessionId=<conn id>  Inbound client messages
 * - GET  /health                        Store and connection counts
 */

import type { Server } from 'node:http';
import { loadConfig } from './config.js';
import { createApp } from './http.js';
import { SessionStore } from './services/session-store.service.js';
import { SERVER_NAME, SERVER_VERSION } from './server.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

const log = createLogger('main');

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const store = new SessionStore({ maxSessions: config.maxSessions });
  const { app, closeAll } = createApp({ store, heartbeatIntervalMs: config.heartbeatIntervalMs });

  const httpServer = await new Promise<Server>((resolve, reject) => {
    const server = app.listen(config.port, config.host, (error?: Error) => {
      if (error) reject(error);
      else resolve(server);
    });
  });

  log.info(`${SERVER_NAME} v${SERVER_VERSION} running on SSE`, {
    host: config.host,
    port: config.port,
    maxSessions: config.maxSessions,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('Shutting down', { signal });
    await closeAll();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        log.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  log.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
