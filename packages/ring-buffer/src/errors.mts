/**
 * Error classes thrown by the ring buffer
 */

/**
 * Base error class for all ring buffer errors
 */
export class RingBufferError extends Error {
  constructor(message: string, public readonly code: string, public readonly context?: unknown) {
    super(message);
    this.name = 'RingBufferError';

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a caller passes a structurally invalid value: a negative or
 * fractional length, or a count larger than the window it was given
 */
export class InvalidArgumentError extends RingBufferError {
  constructor(
    public readonly argument: string,
    public readonly value: unknown,
    message: string
  ) {
    super(message, 'INVALID_ARGUMENT', { argument, value });
    this.name = 'InvalidArgumentError';
  }
}

export type SessionOperation =
  | 'beginWriting'
  | 'finishWriting'
  | 'beginReading'
  | 'finishReading'
  | 'clear';

/**
 * Thrown on a begin/finish protocol violation
 */
export class IllegalStateError extends RingBufferError {
  constructor(public readonly operation: SessionOperation, message: string) {
    super(message, 'ILLEGAL_STATE', { operation });
    this.name = 'IllegalStateError';
  }
}
