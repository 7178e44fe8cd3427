/**
 * ConnectionHandler - Binds one streaming connection to a thinking session
 *
 * Lifecycle: connecting → established → closing → closed.
 * While established the MCP protocol loop and the heartbeat loop share the
 * connection's outbound channel. The heartbeat is always stopped, and its
 * exit awaited, before the handler finishes. The bound session is left in
 * the store on disconnect so the client can resume it later.
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ConnectionChannel } from './connection-channel.js';
import { HeartbeatService } from './heartbeat.service.js';
import type { SessionStore } from './session-store.service.js';
import { createThinkingServer } from '../server.js';
import type { ConnectionState, ResolvedSession, SessionBinding } from '../types/session.types.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = createLogger('connection');

export interface ConnectionHandlerOptions {
  store: SessionStore;
  /** Raw SDK transport for this connection (SSE, in-memory, ...) */
  transport: Transport;
  /** Session id requested by the client when connecting */
  sessionHint?: string;
  heartbeatIntervalMs?: number;
}

export class ConnectionHandler implements SessionBinding {
  readonly channel: ConnectionChannel;

  private connectionState: ConnectionState = 'connecting';
  private boundId: number | undefined;

  private readonly store: SessionStore;
  private readonly sessionHint: string | undefined;
  private readonly heartbeat: HeartbeatService;

  constructor(options: ConnectionHandlerOptions) {
    this.store = options.store;
    this.sessionHint = options.sessionHint;
    this.channel = new ConnectionChannel(options.transport);
    this.heartbeat = new HeartbeatService(this.channel, {
      intervalMs: options.heartbeatIntervalMs,
      label: this.connectionId,
    });
    this.channel.onerror = (error) => {
      log.warn('Transport error', { connection: this.connectionId, error: error.message });
    };
  }

  get state(): ConnectionState {
    return this.connectionState;
  }

  get connectionId(): string {
    return this.channel.sessionId ?? 'unknown';
  }

  get sessionId(): number | undefined {
    return this.boundId;
  }

  get heartbeatRunning(): boolean {
    return this.heartbeat.isRunning;
  }

  /**
   * Serve the connection until the client goes away or close() is called.
   * Resolves once teardown has finished.
   */
  async run(): Promise<void> {
    if (this.connectionState !== 'connecting') {
      throw new Error(`Connection ${this.connectionId} already ${this.connectionState}`);
    }

    try {
      const { id } = this.resolveSession(this.sessionHint);
      log.info('Connection opened', { connection: this.connectionId, sessionId: id });

      const server = createThinkingServer(this);
      await server.connect(this.channel);

      if (this.channel.isOpen) {
        this.connectionState = 'established';
        this.heartbeat.start();
      }
      await this.channel.closed;
    } finally {
      await this.teardown();
    }
  }

  /** Server-side shutdown of this connection */
  async close(): Promise<void> {
    try {
      await this.channel.close();
    } catch (error) {
      log.warn('Failed to close transport', { connection: this.connectionId, error: errorMessage(error) });
    }
  }

  /**
   * Session for the next tool call: the hinted one, else the bound one.
   * Rebinds when the bound session was evicted or another one was named.
   */
  resolveSession(hint?: string): ResolvedSession {
    const candidate = hint ?? (this.boundId === undefined ? undefined : String(this.boundId));
    const resolved = this.store.getOrCreate(candidate);

    if (this.boundId !== undefined && resolved.id !== this.boundId) {
      log.info('Connection rebound to another session', {
        connection: this.connectionId,
        from: this.boundId,
        to: resolved.id,
      });
    }
    this.boundId = resolved.id;
    return resolved;
  }

  private async teardown(): Promise<void> {
    if (this.connectionState === 'closed') return;
    this.connectionState = 'closing';

    await this.heartbeat.stop();
    if (this.channel.isOpen) {
      await this.close();
    }

    this.connectionState = 'closed';
    log.info('Connection closed', {
      connection: this.connectionId,
      sessionId: this.boundId,
      pingsSent: this.heartbeat.pingsSent,
    });
  }
}
