/**
 * Scoped helpers over the begin/finish protocol
 *
 * Each helper opens a session, hands the range to a callback and always
 * finishes the session, with 0 bytes when the callback throws.
 */

import { IllegalStateError } from './errors.mjs';
import type { Range } from './range.mjs';
import type { RingBuffer } from './ring-buffer.mjs';

/**
 * Works on `storage` within `range` and returns how many bytes it used.
 * The range may be invalid when the buffer had nothing to hand out.
 */
export type SessionCallback = (range: Range, storage: Uint8Array) => number;

const runSession = (
  begin: () => Range,
  finish: (count: number) => void,
  storage: Uint8Array,
  fn: SessionCallback
): number => {
  let range: Range;
  try {
    range = begin();
  } catch (error) {
    // an IllegalStateError means someone else's session is open, leave it be
    if (!(error instanceof IllegalStateError)) {
      finish(0);
    }
    throw error;
  }

  let count = 0;
  try {
    count = fn(range, storage);
  } finally {
    finish(count);
  }
  return count;
};

/**
 * Run `fn` inside a writing session
 * @returns bytes committed
 */
export function withWriting(buffer: RingBuffer, maxLength: number, fn: SessionCallback): number {
  return runSession(
    () => buffer.beginWriting(maxLength),
    (count) => buffer.finishWriting(count),
    buffer.getStorage(),
    fn
  );
}

/**
 * Run `fn` inside a reading session
 * @returns bytes consumed
 */
export function withReading(buffer: RingBuffer, maxLength: number, fn: SessionCallback): number {
  return runSession(
    () => buffer.beginReading(maxLength),
    (count) => buffer.finishReading(count),
    buffer.getStorage(),
    fn
  );
}

// free space and data each span at most two contiguous regions of storage
const MAX_PASSES = 2;

/**
 * Copy as much of `source` into the buffer as fits
 * @returns bytes copied
 */
export function writeBytes(buffer: RingBuffer, source: Uint8Array): number {
  let copied = 0;
  for (let pass = 0; pass < MAX_PASSES && copied < source.length; pass++) {
    const written = withWriting(buffer, source.length - copied, (range, storage) => {
      if (!range.isValid()) {
        return 0;
      }
      storage.set(source.subarray(copied, copied + range.getLength()), range.getStart());
      return range.getLength();
    });
    if (written === 0) {
      break;
    }
    copied += written;
  }
  return copied;
}

/**
 * Move up to `target.length` bytes out of the buffer into `target`
 * @returns bytes copied
 */
export function readBytes(buffer: RingBuffer, target: Uint8Array): number {
  let copied = 0;
  for (let pass = 0; pass < MAX_PASSES && copied < target.length; pass++) {
    const read = withReading(buffer, target.length - copied, (range, storage) => {
      if (!range.isValid()) {
        return 0;
      }
      target.set(storage.subarray(range.getStart(), range.getEnd() + 1), copied);
      return range.getLength();
    });
    if (read === 0) {
      break;
    }
    copied += read;
  }
  return copied;
}
