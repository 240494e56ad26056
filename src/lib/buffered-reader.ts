import type { UintSize } from "semantic-types";
import { createUnexpectedEofError } from "./errors/unexpected-eof";
import { type Done, type Incomplete, type Parser, ParseResultType } from "./parse-result";
import { BufferedReaderBase, type ReaderOptions } from "./reader-base";
import { fillSync, readSync, type SyncSource } from "./source";

/**
 * Reader session over a blocking source.
 *
 * The reader owns its buffer: bytes read from the source but not consumed by a parse stay buffered
 * for the next call. Create a single reader per source, and read the rest of the stream through
 * `read` rather than through `source`.
 *
 * The reader is itself a `SyncSource`, so it can be handed to code expecting raw bytes.
 */
export class BufferedReader<S extends SyncSource = SyncSource> extends BufferedReaderBase implements SyncSource {
  readonly source: S;

  constructor(source: S, options?: ReaderOptions) {
    super(options);
    this.source = source;
  }

  /**
   * Parses the next unit from the source.
   *
   * The parser runs over the unconsumed bytes. While it reports `Incomplete`, the reader blocks on
   * the source for more bytes and runs it again from the start of the window.
   *
   * @param parser Parser for one unit
   * @returns The parsed value, after retiring the consumed bytes.
   * @throws ReadError<E> `Parser` if the parser fails, `UnexpectedEof` if the source ends before the
   *         unit is complete, `Source` if the read fails, `BufferFull` if the unit does not fit.
   */
  parse<T, E>(parser: Parser<T, E>): T {
    while (true) {
      const step: Done<T> | Incomplete = this.scan(parser);
      if (step.type === ParseResultType.Done) {
        return step.value;
      }
      this.prepareRefill(step.needed);
      if (fillSync(this.buffer, this.source) === 0) {
        throw createUnexpectedEofError(this.buffer.available());
      }
    }
  }

  /**
   * Checks if the source is exhausted and no unconsumed byte is left.
   *
   * Reads from the source if the buffer is empty.
   */
  isAtEnd(): boolean {
    if (this.buffer.available() > 0) {
      return false;
    }
    this.prepareRefill(undefined);
    const count: UintSize = fillSync(this.buffer, this.source);
    return count === 0;
  }

  /**
   * Reads raw bytes into `target`, buffered bytes first.
   *
   * If the buffer is empty and `target` is at least as large as the buffer, the source writes into
   * `target` directly.
   *
   * @returns The number of bytes written at the start of `target`, `0` at the end of the source.
   * @throws SourceError If the read fails.
   */
  read(target: Uint8Array): UintSize {
    if (target.length === 0) {
      return 0;
    }
    if (this.buffer.available() === 0) {
      if (target.length >= this.buffer.capacity) {
        return this.passThrough(readSync(this.source, target), target);
      }
      this.prepareRefill(undefined);
      if (fillSync(this.buffer, this.source) === 0) {
        return 0;
      }
    }
    return this.drain(target);
  }

  /**
   * Drops the unconsumed bytes, e.g. to skip past a unit the parser rejected.
   *
   * @returns The number of bytes dropped.
   */
  discard(): UintSize {
    return this.buffer.clear();
  }

  /**
   * Parses units until the source ends on a unit boundary.
   */
  *parseAll<T, E>(parser: Parser<T, E>): IterableIterator<T> {
    while (!this.isAtEnd()) {
      yield this.parse(parser);
    }
  }
}
