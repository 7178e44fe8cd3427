/**
 * HeartbeatService Tests
 * Ping frames, failure tolerance and cancellation
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { HeartbeatService, createPingFrame } from '../heartbeat.service.js';
import type { OutboundChannel } from '../connection-channel.js';
import { setTimeout as timerSleep } from 'node:timers/promises';

vi.mock('node:timers/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:timers/promises')>();
  return { ...actual, setTimeout: vi.fn(actual.setTimeout) };
});

const INTERVAL_MS = 10;

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function createChannel(impl?: (frame: JSONRPCMessage) => Promise<void>) {
  const send = vi.fn(impl ?? (async (_frame: JSONRPCMessage) => {}));
  const channel: OutboundChannel = { send };
  return { channel, send };
}

describe('HeartbeatService', () => {
  let heartbeat: HeartbeatService | undefined;

  afterEach(async () => {
    await heartbeat?.stop();
    heartbeat = undefined;
  });

  describe('createPingFrame', () => {
    it('should build a JSON-RPC ping with a heartbeat id', () => {
      const frame = createPingFrame();
      expect(frame).toMatchObject({ jsonrpc: '2.0', method: 'ping' });
      expect('id' in frame && frame.id).toMatch(/^heartbeat-/);
    });

    it('should use a unique id per frame', () => {
      const ids = new Set(Array.from({ length: 20 }, () => {
        const frame = createPingFrame();
        return 'id' in frame ? frame.id : undefined;
      }));
      expect(ids.size).toBe(20);
    });
  });

  it('should send pings on every interval', async () => {
    const { channel, send } = createChannel();
    heartbeat = new HeartbeatService(channel, { intervalMs: INTERVAL_MS });
    heartbeat.start();

    await vi.waitFor(() => expect(send.mock.calls.length).toBeGreaterThanOrEqual(3));
    expect(send.mock.calls.every(([frame]) => 'method' in frame && frame.method === 'ping')).toBe(true);
    expect(heartbeat.pingsSent).toBeGreaterThanOrEqual(3);
  });

  it('should not send before the first interval has elapsed', async () => {
    const { channel, send } = createChannel();
    heartbeat = new HeartbeatService(channel, { intervalMs: 60_000 });
    heartbeat.start();
    await delay(20);
    expect(send).not.toHaveBeenCalled();
  });

  it('should keep running after a failed write', async () => {
    let calls = 0;
    const { channel, send } = createChannel(async () => {
      calls++;
      if (calls === 1) throw new Error('socket hang up');
    });
    heartbeat = new HeartbeatService(channel, { intervalMs: INTERVAL_MS });
    heartbeat.start();

    await vi.waitFor(() => expect(send.mock.calls.length).toBeGreaterThanOrEqual(3));
    expect(heartbeat.isRunning).toBe(true);
    expect(heartbeat.pingsSent).toBe(send.mock.calls.length - 1);
  });

  it('should send nothing after stop resolves', async () => {
    const { channel, send } = createChannel();
    heartbeat = new HeartbeatService(channel, { intervalMs: INTERVAL_MS });
    heartbeat.start();
    await vi.waitFor(() => expect(send).toHaveBeenCalled());

    await heartbeat.stop();
    const countAtStop = send.mock.calls.length;
    await delay(INTERVAL_MS * 5);

    expect(send.mock.calls.length).toBe(countAtStop);
    expect(heartbeat.isRunning).toBe(false);
  });

  it('should not wait for a write that never completes', async () => {
    const { channel, send } = createChannel(() => new Promise<void>(() => {}));
    heartbeat = new HeartbeatService(channel, { intervalMs: INTERVAL_MS });
    heartbeat.start();
    await vi.waitFor(() => expect(send).toHaveBeenCalledTimes(1));

    await heartbeat.stop();
    await delay(INTERVAL_MS * 3);

    expect(heartbeat.isRunning).toBe(false);
    expect(heartbeat.pingsSent).toBe(0);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('should log a failing timer instead of rejecting', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.mocked(timerSleep).mockRejectedValueOnce(new Error('timer failure'));
    const { channel, send } = createChannel();
    heartbeat = new HeartbeatService(channel, { intervalMs: INTERVAL_MS, label: 'conn-9' });
    heartbeat.start();

    await vi.waitFor(() => expect(errorSpy).toHaveBeenCalled());
    const line = String(errorSpy.mock.calls[0]?.[0]);
    expect(line).toContain('[ERROR] [heartbeat] Heartbeat loop failed');
    expect(line).toContain('"error":"timer failure"');

    await expect(heartbeat.stop()).resolves.toBeUndefined();
    expect(send).not.toHaveBeenCalled();
    errorSpy.mockRestore();
  });

  it('should ignore repeated start calls', async () => {
    const { channel, send } = createChannel();
    heartbeat = new HeartbeatService(channel, { intervalMs: 40 });
    heartbeat.start();
    heartbeat.start();

    await vi.waitFor(() => expect(send).toHaveBeenCalled(), { interval: 2 });
    await delay(5);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('should resolve stop when never started', async () => {
    const { channel } = createChannel();
    heartbeat = new HeartbeatService(channel);
    await expect(heartbeat.stop()).resolves.toBeUndefined();
  });
});
