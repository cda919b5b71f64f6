/**
 * Worker side of the cross-thread test: attaches to the buffer it is handed
 * and writes `total` bytes of the sequence `i % 251`, then posts `done`.
 */

import { parentPort, workerData } from 'node:worker_threads';

import { RingBuffer } from '../ring-buffer.mjs';
import { writeBytes } from '../sessions.mjs';

export interface ProducerData {
  shared: SharedArrayBuffer;
  total: number;
  chunk: number;
}

const isProducerData = (value: unknown): value is ProducerData =>
  typeof value === 'object' &&
  value !== null &&
  'shared' in value &&
  value.shared instanceof SharedArrayBuffer &&
  'total' in value &&
  typeof value.total === 'number' &&
  'chunk' in value &&
  typeof value.chunk === 'number';

const data: unknown = workerData;
if (!isProducerData(data) || parentPort === null) {
  throw new Error('producer must run in a worker with { shared, total, chunk } as workerData');
}

const buffer = RingBuffer.attach(data.shared);
const source = Uint8Array.from({ length: data.total }, (_, i) => i % 251);

let written = 0;
while (written < data.total) {
  written += writeBytes(buffer, source.subarray(written, Math.min(written + data.chunk, data.total)));
}

parentPort.postMessage({ type: 'done', written });
