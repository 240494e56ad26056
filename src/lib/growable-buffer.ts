import { constants } from "buffer";
import type { UintSize } from "semantic-types";
import { createBufferFullError } from "./errors/buffer-full";
import { createConsumeOverflowError } from "./errors/consume-overflow";
import { createWriteOverflowError } from "./errors/write-overflow";

/**
 * Largest backing storage the runtime can allocate, in bytes.
 */
export const MAX_BUFFER_LENGTH: UintSize = constants.MAX_LENGTH;

/**
 * Byte buffer with a consumed boundary and a filled boundary.
 *
 * Bytes in `[consumed, filled)` were read from the source but not yet used by a successful parse.
 * Bytes in `[filled, capacity)` are free space for the next read.
 *
 * `window()` and `writable()` are views over the backing storage: any view obtained before a call
 * to `makeRoom`, `commitWrite` or `clear` must be considered stale.
 */
export class GrowableBuffer {
  private bytes: Uint8Array;
  private consumed: UintSize;
  private filled: UintSize;
  private retired: UintSize;
  /**
   * Upper bound on the capacity, never above `MAX_BUFFER_LENGTH`.
   */
  readonly maxCapacity: UintSize;

  constructor(capacity: UintSize = 0, maxCapacity: UintSize = MAX_BUFFER_LENGTH) {
    this.bytes = new Uint8Array(capacity);
    this.consumed = 0;
    this.filled = 0;
    this.retired = 0;
    this.maxCapacity = Math.min(maxCapacity, MAX_BUFFER_LENGTH);
  }

  get capacity(): UintSize {
    return this.bytes.length;
  }

  /**
   * Offset of the first unconsumed byte in the backing storage.
   */
  get consumedPos(): UintSize {
    return this.consumed;
  }

  /**
   * Offset of the end of the valid data in the backing storage.
   */
  get filledPos(): UintSize {
    return this.filled;
  }

  /**
   * Total number of bytes retired by `advance` or `clear` since the buffer was created.
   *
   * Unlike `consumedPos`, it is not reset by compaction.
   */
  get position(): UintSize {
    return this.retired;
  }

  available(): UintSize {
    return this.filled - this.consumed;
  }

  window(): Uint8Array {
    return this.bytes.subarray(this.consumed, this.filled);
  }

  writable(): Uint8Array {
    return this.bytes.subarray(this.filled);
  }

  /**
   * Retires `n` bytes from the start of the window.
   */
  advance(n: UintSize): void {
    const available: UintSize = this.available();
    if (!Number.isInteger(n) || n < 0 || n > available) {
      throw createConsumeOverflowError(n, available);
    }
    this.consumed += n;
    this.retired += n;
    if (this.consumed === this.filled) {
      // Empty window: rewinding is free
      this.consumed = 0;
      this.filled = 0;
    }
  }

  /**
   * Ensures that at least `minExtra` bytes can be written after the window.
   *
   * Unconsumed bytes are first moved to the start of the storage. If this is not enough, the storage
   * grows to at least twice its capacity.
   *
   * Throws `BufferFull` if the unconsumed bytes and `minExtra` do not fit under `maxCapacity`, or if
   * the storage cannot be allocated.
   */
  makeRoom(minExtra: UintSize): void {
    const available: UintSize = this.available();
    const needed: UintSize = available + minExtra;
    // `NaN > maxCapacity` is false
    if (!(needed <= this.maxCapacity)) {
      throw createBufferFullError(this.maxCapacity, needed);
    }
    if (this.bytes.length - this.filled >= minExtra) {
      return;
    }
    if (this.consumed > 0) {
      this.bytes.copyWithin(0, this.consumed, this.filled);
      this.consumed = 0;
      this.filled = available;
      if (this.bytes.length - this.filled >= minExtra) {
        return;
      }
    }
    const newCapacity: UintSize = Math.min(Math.max(this.bytes.length * 2, needed), this.maxCapacity);
    let newBytes: Uint8Array;
    try {
      newBytes = new Uint8Array(newCapacity);
    } catch (err) {
      if (err instanceof RangeError) {
        throw createBufferFullError(this.maxCapacity, needed);
      }
      throw err;
    }
    newBytes.set(this.bytes.subarray(0, this.filled));
    this.bytes = newBytes;
  }

  /**
   * Marks `n` bytes written at the start of `writable()` as valid.
   */
  commitWrite(n: UintSize): void {
    const writable: UintSize = this.bytes.length - this.filled;
    if (!Number.isInteger(n) || n < 0 || n > writable) {
      throw createWriteOverflowError(n, writable);
    }
    this.filled += n;
  }

  /**
   * Retires all unconsumed bytes at once, keeping the allocated storage.
   *
   * @returns The number of bytes dropped.
   */
  clear(): UintSize {
    const available: UintSize = this.available();
    this.retired += available;
    this.consumed = 0;
    this.filled = 0;
    return available;
  }
}
