import type { UintSize } from "semantic-types";
import type { SyncSource } from "../source";

/**
 * In-memory blocking source replaying a list of chunks.
 *
 * Each read returns the rest of the current chunk, or as much of it as fits in the target.
 * Empty chunks are skipped.
 */
export class ChunkSource implements SyncSource {
  private readonly chunks: readonly Uint8Array[];
  private index: UintSize;
  private offset: UintSize;

  constructor(chunks: Iterable<Uint8Array>) {
    this.chunks = [...chunks];
    this.index = 0;
    this.offset = 0;
  }

  read(target: Uint8Array): UintSize {
    while (this.index < this.chunks.length && this.offset === this.chunks[this.index].length) {
      this.index++;
      this.offset = 0;
    }
    if (this.index === this.chunks.length) {
      return 0;
    }
    const chunk: Uint8Array = this.chunks[this.index];
    const count: UintSize = Math.min(target.length, chunk.length - this.offset);
    target.set(chunk.subarray(this.offset, this.offset + count));
    this.offset += count;
    return count;
  }
}
