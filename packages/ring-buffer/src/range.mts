import { InvalidArgumentError } from './errors.mjs';

/**
 * Contiguous region of ring buffer storage (inclusive start and end indices)
 * that a writer may write to or a reader may read from.
 *
 * A range is either invalid (both bounds are {@link Range.INVALID_INDEX}) or
 * valid with `end >= start`. Note that a valid range can still be empty, so
 * check {@link Range.isValid} rather than the length to learn whether the
 * buffer had space or data to hand out.
 */
export class Range {
  static readonly INVALID_INDEX = -1;

  private start = Range.INVALID_INDEX;
  private end = Range.INVALID_INDEX;

  /**
   * Create a valid range over `[start..end]`
   */
  static of(start: number, end: number): Range {
    const range = new Range();
    Range.assign(range, start, end);
    return range;
  }

  /**
   * Overwrite the bounds of `target` with a valid `[start..end]`
   * @throws InvalidArgumentError if `start` is negative or `end < start`
   */
  static assign(target: Range, start: number, end: number): void {
    if (!Number.isInteger(start) || start < 0) {
      throw new InvalidArgumentError('start', start, `Range start must be a non-negative integer, got ${start}`);
    }
    if (!Number.isInteger(end) || end < start) {
      throw new InvalidArgumentError('end', end, `Range end must be an integer not less than ${start}, got ${end}`);
    }
    target.start = start;
    target.end = end;
  }

  /**
   * Inclusive start index
   */
  getStart(): number {
    return this.start;
  }

  /**
   * Inclusive end index
   */
  getEnd(): number {
    return this.end;
  }

  /**
   * Length in bytes, 0 when invalid
   */
  getLength(): number {
    return this.isValid() ? this.end - this.start + 1 : 0;
  }

  /**
   * Reset both bounds. {@link Range.isValid} returns false afterwards.
   */
  clear(): void {
    this.start = this.end = Range.INVALID_INDEX;
  }

  isValid(): boolean {
    return this.start !== Range.INVALID_INDEX && this.end !== Range.INVALID_INDEX;
  }

  toString(): string {
    return `[${this.start}..${this.end}]`;
  }
}
