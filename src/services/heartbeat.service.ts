/**
 * HeartbeatService - Keep-alive pings for one established connection
 * Sends a reply-less JSON-RPC ping every interval so idle intermediaries
 * do not drop the stream. Write failures are logged and the loop goes on.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { nanoid } from 'nanoid';
import type { JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import type { OutboundChannel } from './connection-channel.js';
import { DEFAULT_HEARTBEAT_INTERVAL_MS, HEARTBEAT_ID_PREFIX } from '../constants/index.js';
import { TransportWriteError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('heartbeat');

export interface HeartbeatOptions {
  intervalMs?: number;
  /** Label for log lines, usually the connection id */
  label?: string;
}

export function createPingFrame(): JSONRPCMessage {
  return { jsonrpc: '2.0', id: `${HEARTBEAT_ID_PREFIX}${nanoid()}`, method: 'ping' };
}

export class HeartbeatService {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private sent = 0;

  private readonly intervalMs: number;
  private readonly label: string;

  constructor(
    private readonly channel: OutboundChannel,
    options: HeartbeatOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.label = options.label ?? 'connection';
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  get pingsSent(): number {
    return this.sent;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).catch((error: unknown) => {
      log.error('Heartbeat loop failed', { connection: this.label, error: errorMessage(error) });
    });
    log.debug('Heartbeat started', { connection: this.label, intervalMs: this.intervalMs });
  }

  /** Cancel the loop and wait until it has exited; an in-flight write is abandoned */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    try {
      await loop;
    } finally {
      this.loop = null;
      this.controller = null;
      log.debug('Heartbeat stopped', { connection: this.label, pingsSent: this.sent });
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await sleep(this.intervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }
      if (signal.aborted) return;
      await this.beatUntilAborted(signal);
    }
  }

  /** A write that never completes must not hold up stop() */
  private async beatUntilAborted(signal: AbortSignal): Promise<void> {
    let onAbort: () => void = () => {};
    const aborted = new Promise<void>((resolve) => {
      onAbort = resolve;
      signal.addEventListener('abort', onAbort, { once: true });
    });
    try {
      await Promise.race([this.beat(), aborted]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async beat(): Promise<void> {
    const frame = createPingFrame();
    try {
      await this.channel.send(frame);
      this.sent++;
    } catch (error) {
      const failure = error instanceof TransportWriteError ? error : new TransportWriteError('heartbeat', { cause: error });
      log.warn('Heartbeat write failed', { connection: this.label, error: failure.message });
    }
  }
}
