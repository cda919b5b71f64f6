/**
 * One writer in a worker thread, one reader on this thread, one buffer
 */

import type { BaseLogger } from '@ringbuf/logger';
import { forwardWorkerLogs } from '@ringbuf/logger';
import { setImmediate } from 'node:timers/promises';
import { Worker } from 'node:worker_threads';
import { describe, it, expect, vi } from 'vitest';

import type { ProducerData } from './__fixtures__/producer.worker.mjs';
import { RingBuffer } from './ring-buffer.mjs';
import { readBytes } from './sessions.mjs';

const CAPACITY = 64;
const TOTAL = 10_000;
// not a divisor of the capacity, so writes keep wrapping at different offsets
const CHUNK = 37;

const createLogger = () =>
  ({
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  }) satisfies BaseLogger;

const isDone = (value: unknown): value is { type: 'done'; written: number } =>
  typeof value === 'object' &&
  value !== null &&
  'type' in value &&
  value.type === 'done' &&
  'written' in value &&
  typeof value.written === 'number';

describe('RingBuffer across worker threads', () => {
  it('should deliver every byte written by a worker in order', async () => {
    const logger = createLogger();
    const buffer = new RingBuffer(CAPACITY, { logger });
    const workerData: ProducerData = { shared: buffer.shared, total: TOTAL, chunk: CHUNK };
    // Node 20 does not run `--import` from a worker's execArgv, so tsx is registered inside it
    const producer = new URL('./__fixtures__/producer.worker.mts', import.meta.url).href;
    const worker = new Worker(
      `import('tsx/esm/api').then((tsx) => { tsx.register(); return import(${JSON.stringify(producer)}); });`,
      { eval: true, workerData },
    );
    const stopForwarding = forwardWorkerLogs(worker, logger);

    let failed = false;
    const done = new Promise<number>((resolve, reject) => {
      worker.on('message', (value: unknown) => {
        if (isDone(value)) {
          resolve(value.written);
        }
      });
      worker.once('error', (error) => {
        failed = true;
        reject(error);
      });
    });

    try {
      const received = new Uint8Array(TOTAL);
      let copied = 0;
      while (copied < TOTAL) {
        if (failed) {
          // rejects with the worker's error
          await done;
        }
        const read = readBytes(buffer, received.subarray(copied));
        copied += read;
        if (read === 0) {
          await setImmediate();
        }
      }

      expect(await done).toBe(TOTAL);
      expect(received).toEqual(Uint8Array.from({ length: TOTAL }, (_, i) => i % 251));
      expect(buffer.isEmpty()).toBe(true);
      expect(buffer.isWriting()).toBe(false);
      expect(buffer.isReading()).toBe(false);
      expect(logger.debug).toHaveBeenCalledWith('ring buffer attached', { capacity: CAPACITY });
    } finally {
      stopForwarding();
      await worker.terminate();
    }
  }, 30_000);
});
