/**
 * Blocking HTTP transport
 *
 * Node has no synchronous HTTP API, so requests run on a dedicated worker
 * thread with `fetch` while the calling thread sleeps in `Atomics.wait`.
 * The reply is collected with `receiveMessageOnPort`, which does not need
 * the caller's event loop.
 *
 * One worker per transport, started on the first request. It is unref'd so
 * an idle client never keeps the process alive.
 */

import { MessageChannel, receiveMessageOnPort, Worker } from 'worker_threads';
import type { PreparedRequest } from './http-request.js';

export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * Sends one request and returns status and raw body text, blocking the
 * caller. Throws on transport-level failure.
 */
export interface SyncTransport {
  send(request: PreparedRequest): TransportResponse;
  close(): void;
}

type WorkerReply =
  | { kind: 'response'; status: number; body: string }
  | { kind: 'failure'; name: string; message: string };

// Runs as a CommonJS script inside the worker. `heartbeat` becomes non-zero
// once the worker is ready and keeps counting while its event loop is alive.
const WORKER_SOURCE = `
const { parentPort, workerData } = require('node:worker_threads');
const { heartbeat, intervalMs } = workerData;

parentPort.on('message', async ({ request, signal, port }) => {
  let reply;
  try {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
    });
    reply = { kind: 'response', status: response.status, body: await response.text() };
  } catch (error) {
    const reason = error && error.cause && error.cause.message ? ': ' + error.cause.message : '';
    reply = {
      kind: 'failure',
      name: (error && error.name) || 'Error',
      message: String((error && error.message) || error) + reason,
    };
  }
  port.postMessage(reply);
  port.close();
  Atomics.store(signal, 0, 1);
  Atomics.notify(signal, 0);
});

setInterval(() => Atomics.add(heartbeat, 0, 1), intervalMs);
Atomics.store(heartbeat, 0, 1);
Atomics.notify(heartbeat, 0);
`;

const HEARTBEAT_INTERVAL_MS = 50;
/** A worker whose heartbeat has not moved for this long is treated as dead */
const WORKER_STALL_MS = 2000;
const WORKER_START_TIMEOUT_MS = 10_000;

export interface WorkerSyncTransportOptions {
  /** Upper bound on one round trip, excluding worker startup; unbounded when omitted */
  timeoutMs?: number;
}

interface TransportWorker {
  worker: Worker;
  heartbeat: Int32Array;
}

type WaitOutcome = 'ok' | 'timed-out' | 'stalled';

export class WorkerSyncTransport implements SyncTransport {
  private current?: TransportWorker;
  private readonly timeoutMs: number;

  constructor(options: WorkerSyncTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? Infinity;
  }

  send(request: PreparedRequest): TransportResponse {
    const { worker, heartbeat } = this.ensureWorker();
    const signal = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    const { port1, port2 } = new MessageChannel();

    try {
      worker.postMessage({ request, signal, port: port2 }, [port2]);

      const outcome = waitForSignal(signal, heartbeat, Date.now() + this.timeoutMs);
      if (outcome !== 'ok') {
        // The worker is busy with this request or gone; either way it is replaced
        this.close();
        throw new Error(
          outcome === 'timed-out'
            ? `request timed out after ${this.timeoutMs} ms`
            : 'transport worker stopped before replying'
        );
      }

      const received = receiveMessageOnPort(port1);
      if (!received || !isWorkerReply(received.message)) {
        throw new Error('transport worker returned no reply');
      }

      const reply = received.message;
      if (reply.kind === 'failure') {
        const error = new Error(reply.message);
        error.name = reply.name;
        throw error;
      }
      return { status: reply.status, body: reply.body };
    } finally {
      port1.close();
    }
  }

  /**
   * Stop the worker; the next request starts a new one
   */
  close(): void {
    const current = this.current;
    this.current = undefined;
    if (current) {
      void current.worker.terminate();
    }
  }

  /**
   * Start the worker thread. `heartbeat` must be advanced by the worker as
   * WORKER_SOURCE does.
   */
  protected createWorker(heartbeat: Int32Array): Worker {
    return new Worker(WORKER_SOURCE, {
      eval: true,
      workerData: { heartbeat, intervalMs: HEARTBEAT_INTERVAL_MS },
    });
  }

  /**
   * Running worker, started on demand; blocks until it reports ready so the
   * request timeout never covers startup.
   */
  private ensureWorker(): TransportWorker {
    if (this.current) return this.current;

    const heartbeat = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    const worker = this.createWorker(heartbeat);
    worker.unref();

    const deadline = Date.now() + WORKER_START_TIMEOUT_MS;
    while (Atomics.load(heartbeat, 0) === 0) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        void worker.terminate();
        throw new Error(`transport worker did not start within ${WORKER_START_TIMEOUT_MS} ms`);
      }
      Atomics.wait(heartbeat, 0, 0, Math.min(remaining, HEARTBEAT_INTERVAL_MS));
    }

    const current = { worker, heartbeat };
    worker.on('error', () => {
      // A crashed worker is replaced on the next request
      if (this.current === current) this.current = undefined;
    });
    this.current = current;
    return current;
  }
}

/**
 * Sleep until the worker sets `signal`, the deadline passes, or the worker's
 * heartbeat stops. The worker's exit events cannot be delivered while this
 * thread is blocked, so liveness is read from shared memory.
 */
function waitForSignal(signal: Int32Array, heartbeat: Int32Array, deadline: number): WaitOutcome {
  let lastBeat = Atomics.load(heartbeat, 0);
  let lastBeatAt = Date.now();

  while (Atomics.load(signal, 0) === 0) {
    const now = Date.now();
    if (now >= deadline) return 'timed-out';

    const beat = Atomics.load(heartbeat, 0);
    if (beat !== lastBeat) {
      lastBeat = beat;
      lastBeatAt = now;
    } else if (now - lastBeatAt > WORKER_STALL_MS) {
      return 'stalled';
    }

    Atomics.wait(signal, 0, 0, Math.min(deadline - now, HEARTBEAT_INTERVAL_MS));
  }

  return 'ok';
}

function isWorkerReply(value: unknown): value is WorkerReply {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  if (value.kind === 'response') {
    return 'status' in value && typeof value.status === 'number' && 'body' in value && typeof value.body === 'string';
  }
  if (value.kind === 'failure') {
    return 'message' in value && typeof value.message === 'string' && 'name' in value && typeof value.name === 'string';
  }
  return false;
}
