import type { UintSize } from "semantic-types";
import type { AsyncSource } from "../source";

const EMPTY: Uint8Array = new Uint8Array(0);

/**
 * Suspending source pulling chunks from an async iterable.
 *
 * Works with Node readable streams (sockets, pipes, `fs.createReadStream`) as long as they emit
 * bytes, not strings. When a chunk does not fit in the target, the rest is kept for the next read.
 */
export class AsyncIterableSource implements AsyncSource {
  private readonly iterator: AsyncIterator<Uint8Array>;
  private chunk: Uint8Array;
  private ended: boolean;

  constructor(iterable: AsyncIterable<Uint8Array>) {
    this.iterator = iterable[Symbol.asyncIterator]();
    this.chunk = EMPTY;
    this.ended = false;
  }

  async read(target: Uint8Array): Promise<UintSize> {
    while (this.chunk.length === 0) {
      if (this.ended) {
        return 0;
      }
      const next: IteratorResult<Uint8Array> = await this.iterator.next();
      if (next.done === true) {
        this.ended = true;
        return 0;
      }
      this.chunk = next.value;
    }
    const count: UintSize = Math.min(target.length, this.chunk.length);
    target.set(this.chunk.subarray(0, count));
    this.chunk = this.chunk.subarray(count);
    return count;
  }

  /**
   * Stops the underlying iteration (destroys a Node stream).
   */
  async close(): Promise<void> {
    this.ended = true;
    this.chunk = EMPTY;
    if (this.iterator.return !== undefined) {
      await this.iterator.return();
    }
  }
}
