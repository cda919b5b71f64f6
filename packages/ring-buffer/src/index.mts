/**
 * Byte ring buffer for one writer and one reader, shareable across
 * worker threads
 *
 * @packageDocumentation
 */

export { RingBuffer, HEADER_BYTES, MAX_CAPACITY } from './ring-buffer.mjs';
export type { RingBufferOptions } from './ring-buffer.mjs';
export { Range } from './range.mjs';
export { RingBufferError, InvalidArgumentError, IllegalStateError } from './errors.mjs';
export type { SessionOperation } from './errors.mjs';
export { SpinLock } from './spin-lock.mjs';
export { withWriting, withReading, writeBytes, readBytes } from './sessions.mjs';
export type { SessionCallback } from './sessions.mjs';
