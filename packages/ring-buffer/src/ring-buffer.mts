/**
 * Ring buffer of bytes that hands out regions of its own storage to one
 * writer and one reader.
 *
 * All bookkeeping lives in a SharedArrayBuffer, so the writer and the reader
 * may run on different threads: construct the buffer on one side and
 * {@link RingBuffer.attach} to its `shared` memory on the other. No operation
 * waits or sleeps. A full buffer answers {@link RingBuffer.beginWriting} with
 * an invalid range, an empty one answers {@link RingBuffer.beginReading} the
 * same way, and data is never overwritten.
 */

import type { BaseLogger, LoggerMeta } from '@ringbuf/logger';

import { IllegalStateError, InvalidArgumentError, type SessionOperation } from './errors.mjs';
import { getDefaultLogger } from './logger.mjs';
import { Range } from './range.mjs';
import { SpinLock } from './spin-lock.mjs';

// header layout, one Int32 per slot
const LOCK = 0;
const CAPACITY = 1;
const INDEX = 2;
const SIZE = 3;
const WRITING = 4;
const READING = 5;
const HEADER_SLOTS = 6;

export const HEADER_BYTES = HEADER_SLOTS * Int32Array.BYTES_PER_ELEMENT;

// capacity, index and size must fit an Int32 slot
export const MAX_CAPACITY = 0x7fffffff;

export interface RingBufferOptions {
  /**
   * Receives debug records and protocol violations.
   * Defaults to a shared logger named `ring-buffer`.
   */
  logger?: BaseLogger;
}

type Violation = (operation: SessionOperation, message: string) => IllegalStateError;

const assertCount = (argument: string, value: number): void => {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(argument, value, `${argument} must be a non-negative integer, got ${value}`);
  }
};

const resolveRange = (outRange: Range | undefined): Range => {
  if (outRange === undefined) {
    return new Range();
  }
  if (!(outRange instanceof Range)) {
    throw new InvalidArgumentError('outRange', outRange, 'outRange must be a Range');
  }
  return outRange;
};

export class RingBuffer {
  /**
   * Memory backing both the header and the storage. Pass it to
   * {@link RingBuffer.attach} (e.g. through `workerData`) to share the buffer.
   */
  readonly shared: SharedArrayBuffer;
  private readonly header: Int32Array;
  private readonly storage: Uint8Array;
  private readonly lock: SpinLock;
  private readonly capacity: number;
  private readonly logger: BaseLogger;

  /**
   * @param capacity size of the storage in bytes
   * @throws InvalidArgumentError if capacity is negative or not an integer
   */
  constructor(capacity: number, options?: RingBufferOptions);
  constructor(shared: SharedArrayBuffer, options?: RingBufferOptions);
  constructor(source: number | SharedArrayBuffer, options: RingBufferOptions = {}) {
    this.logger = options.logger ?? getDefaultLogger();

    if (typeof source === 'number') {
      if (!Number.isSafeInteger(source) || source < 0) {
        throw new InvalidArgumentError('capacity', source, `Capacity must be a non-negative integer, got ${source}`);
      }
      if (source > MAX_CAPACITY) {
        throw new InvalidArgumentError('capacity', source, `Capacity must not exceed ${MAX_CAPACITY}, got ${source}`);
      }
      this.shared = new SharedArrayBuffer(HEADER_BYTES + source);
      this.header = new Int32Array(this.shared, 0, HEADER_SLOTS);
      Atomics.store(this.header, CAPACITY, source);
      this.capacity = source;
    } else {
      if (source.byteLength < HEADER_BYTES) {
        throw new InvalidArgumentError('shared', source.byteLength, `Shared memory of ${source.byteLength} bytes is smaller than the ${HEADER_BYTES} byte header`);
      }
      this.shared = source;
      this.header = new Int32Array(this.shared, 0, HEADER_SLOTS);
      this.capacity = Atomics.load(this.header, CAPACITY);
      if (this.capacity < 0 || HEADER_BYTES + this.capacity !== source.byteLength) {
        throw new InvalidArgumentError('shared', source.byteLength, `Shared memory of ${source.byteLength} bytes does not hold a ring buffer of capacity ${this.capacity}`);
      }
    }

    this.storage = new Uint8Array(this.shared, HEADER_BYTES, this.capacity);
    this.lock = new SpinLock(this.header, LOCK);
    this.logger.debug(typeof source === 'number' ? 'ring buffer created' : 'ring buffer attached', {
      capacity: this.capacity,
    });
  }

  /**
   * Open another handle on a buffer created elsewhere, typically in a worker
   * that received `buffer.shared`.
   */
  static attach(shared: SharedArrayBuffer, options?: RingBufferOptions): RingBuffer {
    return new RingBuffer(shared, options);
  }

  /**
   * Index in storage of the first byte of data
   */
  getDataIndex(): number {
    return this.lock.withLock(() => this.load(INDEX));
  }

  /**
   * Number of bytes of data, starting at {@link RingBuffer.getDataIndex} and
   * possibly wrapping past the end of storage
   */
  getDataSize(): number {
    return this.lock.withLock(() => this.load(SIZE));
  }

  /**
   * Size of the underlying storage, empty and occupied bytes alike
   */
  getTotalSize(): number {
    return this.capacity;
  }

  /**
   * The storage itself, not a copy. Only touch bytes inside the range of a
   * session you have open.
   */
  getStorage(): Uint8Array {
    return this.storage;
  }

  isEmpty(): boolean {
    return this.lock.withLock(() => this.load(SIZE) === 0);
  }

  isFull(): boolean {
    return this.lock.withLock(() => this.load(SIZE) === this.capacity);
  }

  isWriting(): boolean {
    return this.lock.withLock(() => this.load(WRITING) === 1);
  }

  isReading(): boolean {
    return this.lock.withLock(() => this.load(READING) === 1);
  }

  /**
   * Start a writing session. Only one writing session may be open at a time.
   *
   * CONTRACT: always pair with {@link RingBuffer.finishWriting}, even when
   * this method throws an {@link InvalidArgumentError}, since the session is
   * already open by then. Calling `finishWriting(0)` in a `finally` block is
   * the usual way.
   *
   * @param maxLength how many bytes the writer wants to write at most
   * @param outRange filled in and returned instead of allocating a new range
   * @returns where the writer may write; invalid when full or `maxLength` is 0
   * @throws IllegalStateError if the previous writing session is not finished
   * @throws InvalidArgumentError if `maxLength` is negative or `outRange` is not a Range
   */
  beginWriting(maxLength: number, outRange?: Range): Range {
    return this.guarded((violation) => {
      if (this.load(WRITING) === 1) {
        throw violation('beginWriting', 'Cannot begin writing until previous writing is finished');
      }
      this.store(WRITING, 1);

      assertCount('maxLength', maxLength);
      const range = resolveRange(outRange);

      const index = this.load(INDEX);
      const size = this.load(SIZE);
      if (size === this.capacity || maxLength === 0) {
        range.clear();
        return range;
      }

      const start = (index + size) % this.capacity;
      // free space either runs up to the data (wrapped) or to the end of storage
      const upperBound = start < index ? index : this.capacity;
      Range.assign(range, start, Math.min(start + maxLength, upperBound) - 1);
      return range;
    });
  }

  /**
   * Finish the open writing session. The session is closed even when this
   * method throws.
   *
   * @param actuallyWritten how many bytes were written into the range
   * @throws IllegalStateError if no writing session is open
   * @throws InvalidArgumentError if the count is negative or exceeds the free space
   */
  finishWriting(actuallyWritten: number): void {
    this.guarded((violation) => {
      try {
        if (this.load(WRITING) !== 1) {
          throw violation('finishWriting', 'Cannot finish writing because it has not begun');
        }
        assertCount('actuallyWritten', actuallyWritten);
        const size = this.load(SIZE);
        if (size + actuallyWritten > this.capacity) {
          throw new InvalidArgumentError(
            'actuallyWritten',
            actuallyWritten,
            `Written byte count ${actuallyWritten} exceeds the ${this.capacity - size} bytes of free space`
          );
        }
        this.store(SIZE, size + actuallyWritten);
      } finally {
        this.store(WRITING, 0);
      }
    });
  }

  /**
   * Start a reading session. Only one reading session may be open at a time.
   *
   * CONTRACT: always pair with {@link RingBuffer.finishReading}, even when
   * this method throws an {@link InvalidArgumentError}.
   *
   * @param maxLength how many bytes the reader wants to read at most
   * @param outRange filled in and returned instead of allocating a new range
   * @returns where the reader may read; invalid when empty or `maxLength` is 0
   * @throws IllegalStateError if the previous reading session is not finished
   * @throws InvalidArgumentError if `maxLength` is negative or `outRange` is not a Range
   */
  beginReading(maxLength: number, outRange?: Range): Range {
    return this.guarded((violation) => {
      if (this.load(READING) === 1) {
        throw violation('beginReading', 'Cannot begin reading until previous reading is finished');
      }
      this.store(READING, 1);

      assertCount('maxLength', maxLength);
      const range = resolveRange(outRange);

      const index = this.load(INDEX);
      const size = this.load(SIZE);
      if (size === 0 || maxLength === 0) {
        range.clear();
        return range;
      }

      Range.assign(range, index, Math.min(index + maxLength, index + size, this.capacity) - 1);
      return range;
    });
  }

  /**
   * Finish the open reading session. The session is closed even when this
   * method throws.
   *
   * @param actuallyRead how many bytes were consumed from the range
   * @throws IllegalStateError if no reading session is open
   * @throws InvalidArgumentError if the count is negative or exceeds the data size
   */
  finishReading(actuallyRead: number): void {
    this.guarded((violation) => {
      try {
        if (this.load(READING) !== 1) {
          throw violation('finishReading', 'Cannot finish reading because it has not begun');
        }
        assertCount('actuallyRead', actuallyRead);
        const size = this.load(SIZE);
        if (actuallyRead > size) {
          throw new InvalidArgumentError(
            'actuallyRead',
            actuallyRead,
            `Read byte count ${actuallyRead} exceeds the ${size} bytes of data`
          );
        }
        this.store(SIZE, size - actuallyRead);
        this.store(INDEX, this.capacity === 0 ? 0 : (this.load(INDEX) + actuallyRead) % this.capacity);
      } finally {
        this.store(READING, 0);
      }
    });
  }

  /**
   * Mark the buffer as empty. Storage bytes are left as they are.
   *
   * @throws IllegalStateError if a reading or writing session is open
   */
  clear(): void {
    this.guarded((violation) => {
      if (this.load(READING) === 1) {
        throw violation('clear', 'Cannot clear buffer while reading');
      }
      if (this.load(WRITING) === 1) {
        throw violation('clear', 'Cannot clear buffer while writing');
      }
      this.store(INDEX, 0);
      this.store(SIZE, 0);
    });
    this.logger.debug('ring buffer cleared', { capacity: this.capacity });
  }

  private load(slot: number): number {
    return Atomics.load(this.header, slot);
  }

  private store(slot: number, value: number): void {
    Atomics.store(this.header, slot, value);
  }

  /**
   * Run `fn` under the lock. A protocol violation raised through the
   * `violation` callback snapshots index and size while the lock is held and
   * is logged once the lock is released.
   */
  private guarded<T>(fn: (violation: Violation) => T): T {
    const pending: { meta?: LoggerMeta } = {};
    const violation: Violation = (operation, message) => {
      pending.meta = { operation, index: this.load(INDEX), size: this.load(SIZE) };
      return new IllegalStateError(operation, message);
    };

    try {
      return this.lock.withLock(() => fn(violation));
    } catch (error) {
      if (pending.meta !== undefined && error instanceof IllegalStateError) {
        this.logger.warn(error.message, pending.meta);
      }
      throw error;
    }
  }
}
