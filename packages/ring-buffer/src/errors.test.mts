import { describe, it, expect } from 'vitest';

import { IllegalStateError, InvalidArgumentError, RingBufferError } from './errors.mjs';

describe('errors', () => {
  it('should describe the offending argument', () => {
    const error = new InvalidArgumentError('maxLength', -3, 'maxLength must be a non-negative integer, got -3');

    expect(error).toBeInstanceOf(RingBufferError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InvalidArgumentError');
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.context).toEqual({ argument: 'maxLength', value: -3 });
    expect(error.message).toBe('maxLength must be a non-negative integer, got -3');
  });

  it('should describe the attempted operation', () => {
    const error = new IllegalStateError('clear', 'Cannot clear buffer while reading');

    expect(error).toBeInstanceOf(RingBufferError);
    expect(error.name).toBe('IllegalStateError');
    expect(error.code).toBe('ILLEGAL_STATE');
    expect(error.operation).toBe('clear');
    expect(error.context).toEqual({ operation: 'clear' });
  });

  it('should keep a stack trace', () => {
    const error = new RingBufferError('broken', 'TEST');
    expect(error.stack).toContain('broken');
  });
});
