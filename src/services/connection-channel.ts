/**
 * ConnectionChannel - Single-writer wrapper around an MCP transport
 *
 * Protocol responses and heartbeat pings share one outbound stream; every
 * send goes through one mutex so frames never interleave. Replies to
 * heartbeat pings are dropped before they reach the protocol layer.
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { HEARTBEAT_ID_PREFIX } from '../constants/index.js';
import { Mutex } from '../utils/mutex.js';
import { TransportWriteError } from '../utils/errors.js';

type SendOptions = Parameters<Transport['send']>[1];

/** The one outbound contract every connection transport satisfies */
export interface OutboundChannel {
  send(frame: JSONRPCMessage): Promise<void>;
}

export function isHeartbeatId(id: unknown): boolean {
  return typeof id === 'string' && id.startsWith(HEARTBEAT_ID_PREFIX);
}

function isHeartbeatReply(message: JSONRPCMessage): boolean {
  return 'id' in message && !('method' in message) && isHeartbeatId(message.id);
}

export class ConnectionChannel implements Transport, OutboundChannel {
  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: Transport['onmessage'];

  readonly closed: Promise<void>;

  private readonly writeLock = new Mutex();
  private isClosed = false;
  private markClosed: () => void = () => {};

  constructor(private readonly inner: Transport) {
    this.closed = new Promise((resolve) => {
      this.markClosed = resolve;
    });

    inner.onmessage = (message, ...rest) => {
      if (isHeartbeatReply(message)) return;
      this.onmessage?.(message, ...rest);
    };
    inner.onerror = (error) => {
      this.onerror?.(error);
    };
    inner.onclose = () => this.handleClose();
  }

  get sessionId(): string | undefined {
    return this.inner.sessionId;
  }

  get isOpen(): boolean {
    return !this.isClosed;
  }

  async start(): Promise<void> {
    await this.inner.start();
  }

  /** Protocol-layer writes. Failures propagate to the caller */
  async send(message: JSONRPCMessage, options?: SendOptions): Promise<void> {
    await this.writeLock.run(async () => {
      try {
        await this.inner.send(message, options);
      } catch (error) {
        throw new TransportWriteError(isHeartbeatId(this.requestId(message)) ? 'heartbeat' : 'response', {
          cause: error,
        });
      }
    });
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    await this.inner.close();
    this.handleClose();
  }

  private handleClose(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.markClosed();
    this.onclose?.();
  }

  private requestId(message: JSONRPCMessage): unknown {
    return 'id' in message ? message.id : undefined;
  }
}
