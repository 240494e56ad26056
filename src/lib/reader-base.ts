import type { UintSize } from "semantic-types";
import { createInvalidOptionError } from "./errors/invalid-option";
import { createParserError } from "./errors/parser";
import { createWriteOverflowError } from "./errors/write-overflow";
import { GrowableBuffer, MAX_BUFFER_LENGTH } from "./growable-buffer";
import { type Done, type Incomplete, type Parser, type ParseResult, ParseResultType } from "./parse-result";

/**
 * Initial buffer capacity, in bytes.
 */
export const DEFAULT_CAPACITY: UintSize = 8 * 1024;

/**
 * Free space requested before a read when the parser gave no size hint, in bytes.
 */
export const DEFAULT_MIN_READ: UintSize = 1024;

export interface ReaderOptions {
  /**
   * Initial buffer capacity. Default: `DEFAULT_CAPACITY`.
   */
  capacity?: UintSize;

  /**
   * Upper bound on the buffer capacity. Default and ceiling: `MAX_BUFFER_LENGTH`.
   *
   * A parser that needs more unconsumed bytes than this fails with `BufferFull`.
   */
  maxCapacity?: UintSize;

  /**
   * Free space requested before a read when the parser reports `Incomplete` without a hint.
   * Default: `DEFAULT_MIN_READ`.
   */
  minRead?: UintSize;
}

/**
 * Buffer management and parse steps shared by the blocking and the suspending readers.
 */
export abstract class BufferedReaderBase {
  protected readonly buffer: GrowableBuffer;
  protected readonly minRead: UintSize;
  /**
   * Bytes handed to `read` callers straight from the source, without going through the buffer.
   */
  private passedThrough: UintSize;

  protected constructor(options: ReaderOptions = {}) {
    const capacity: UintSize = options.capacity ?? DEFAULT_CAPACITY;
    const maxCapacity: UintSize = options.maxCapacity ?? MAX_BUFFER_LENGTH;
    const minRead: UintSize = options.minRead ?? DEFAULT_MIN_READ;
    if (!Number.isInteger(capacity) || capacity < 0 || capacity > MAX_BUFFER_LENGTH) {
      throw createInvalidOptionError("capacity", capacity);
    }
    if (!(maxCapacity === Infinity || Number.isInteger(maxCapacity)) || maxCapacity < Math.max(capacity, 1)) {
      throw createInvalidOptionError("maxCapacity", maxCapacity);
    }
    if (!Number.isInteger(minRead) || minRead < 1) {
      throw createInvalidOptionError("minRead", minRead);
    }
    this.buffer = new GrowableBuffer(capacity, maxCapacity);
    this.minRead = minRead;
    this.passedThrough = 0;
  }

  /**
   * Bytes read from the source but not consumed yet.
   *
   * The view is only valid until the next call on the reader.
   */
  buffered(): Uint8Array {
    return this.buffer.window();
  }

  /**
   * Number of bytes consumed from the source since the reader was created: parsed, read or
   * discarded.
   */
  get position(): UintSize {
    return this.buffer.position + this.passedThrough;
  }

  get capacity(): UintSize {
    return this.buffer.capacity;
  }

  /**
   * Runs `parser` once over the unconsumed bytes.
   *
   * On success, the consumed bytes are retired from the buffer.
   * A parser failure is thrown as a `Parser` error.
   */
  protected scan<T, E>(parser: Parser<T, E>): Done<T> | Incomplete {
    const result: ParseResult<T, E> = parser(this.buffer.window());
    switch (result.type) {
      case ParseResultType.Done:
        this.buffer.advance(result.consumed);
        return result;
      case ParseResultType.Incomplete:
        return result;
      case ParseResultType.Error:
        throw createParserError(result.error);
    }
  }

  /**
   * Moves buffered bytes to the start of `target` and retires them.
   *
   * @returns The number of bytes copied.
   */
  protected drain(target: Uint8Array): UintSize {
    const window: Uint8Array = this.buffer.window();
    const count: UintSize = Math.min(window.length, target.length);
    target.set(window.subarray(0, count));
    this.buffer.advance(count);
    return count;
  }

  /**
   * Accounts for `count` bytes the source wrote straight into the caller's `target`.
   */
  protected passThrough(count: UintSize, target: Uint8Array): UintSize {
    if (!Number.isInteger(count) || count < 0 || count > target.length) {
      throw createWriteOverflowError(count, target.length);
    }
    this.passedThrough += count;
    return count;
  }

  /**
   * Prepares the free space for the next read.
   *
   * @param needed Additional bytes requested by the parser, if known.
   */
  protected prepareRefill(needed: UintSize | undefined): void {
    if (needed !== undefined && needed > 0) {
      this.buffer.makeRoom(Math.ceil(needed));
    } else {
      const headroom: UintSize = this.buffer.maxCapacity - this.buffer.available();
      this.buffer.makeRoom(Math.max(1, Math.min(this.minRead, headroom)));
    }
  }
}
