import net from 'node:net';
import { setTimeout as delay } from 'node:timers/promises';

import { ReadinessTimeoutError } from './errors';

export const DEFAULT_READINESS_INTERVAL_MS = 100;
export const DEFAULT_READINESS_MAX_ATTEMPTS = 6000;
const DEFAULT_CONNECT_TIMEOUT_MS = 1_000;

export type ReadinessOptions = {
  intervalMs?: number;
  maxAttempts?: number;
  connectTimeoutMs?: number;
  signal?: AbortSignal;
  /** Resolves once a connection to address:port was accepted. */
  connect?: (address: string, port: number, timeoutMs: number) => Promise<void>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
};

export function tcpConnect(address: string, port: number, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: address, port });
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => {
      socket.destroy();
      resolve();
    });
    socket.once('timeout', () => {
      socket.destroy();
      reject(new Error(`connect to ${address}:${port} timed out after ${timeoutMs}ms`));
    });
    socket.once('error', (err) => {
      socket.destroy();
      reject(err);
    });
  });
}

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

/**
 * Polls until `address:port` accepts a TCP connection. A missing port means the container opted
 * out of the check. The whole wait is bounded by `intervalMs * maxAttempts`, including time spent
 * in connects that hang, so fewer attempts may fit against a host that drops packets. Fails with
 * ReadinessTimeoutError after the last attempt or once that budget is spent.
 */
export async function waitForListeningPort(
  address: string,
  port: number | null | undefined,
  options: ReadinessOptions = {},
): Promise<void> {
  if (port === null || port === undefined) return;

  const intervalMs = options.intervalMs ?? DEFAULT_READINESS_INTERVAL_MS;
  const maxAttempts = options.maxAttempts ?? DEFAULT_READINESS_MAX_ATTEMPTS;
  const connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const connect = options.connect ?? tcpConnect;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const { signal } = options;
  const deadline = now() + intervalMs * maxAttempts;

  let lastError: unknown;
  let attempts = 0;
  while (attempts < maxAttempts) {
    signal?.throwIfAborted();
    attempts += 1;
    try {
      await connect(address, port, Math.max(1, Math.min(connectTimeoutMs, deadline - now())));
      return;
    } catch (err) {
      lastError = err;
    }
    const remaining = deadline - now();
    if (attempts >= maxAttempts || remaining <= 0) break;
    await sleep(Math.min(intervalMs, remaining), signal);
  }
  throw new ReadinessTimeoutError(address, port, attempts, lastError);
}
