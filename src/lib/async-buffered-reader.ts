import type { UintSize } from "semantic-types";
import { createReaderBusyError } from "./errors/reader-busy";
import { createUnexpectedEofError } from "./errors/unexpected-eof";
import { type Done, type Incomplete, type Parser, ParseResultType } from "./parse-result";
import { BufferedReaderBase, type ReaderOptions } from "./reader-base";
import { type AsyncSource, readAsync } from "./source";

export interface ParseOptions {
  /**
   * Aborts the call while it waits for the source.
   *
   * The call rejects with `signal.reason`. A read already started is not lost: the next call on the
   * reader waits for it and keeps its bytes.
   */
  signal?: AbortSignal;
}

type ReadOutcome = {ok: true; count: UintSize} | {ok: false; error: unknown};

/**
 * Reader session over a suspending source.
 *
 * Same semantics as `BufferedReader`, with the reads awaited instead of blocking. The parser itself
 * stays synchronous: the only suspension point is the refill.
 *
 * Operations must not overlap: a call made while another one is pending rejects with `ReaderBusy`.
 *
 * The reader is itself an `AsyncSource`: `read` hands out the buffered bytes, then the rest of the
 * stream.
 */
export class AsyncBufferedReader<S extends AsyncSource = AsyncSource> extends BufferedReaderBase
  implements AsyncSource {
  readonly source: S;
  private busy: boolean;
  /**
   * Read started by a call that was aborted before it completed.
   */
  private pending: Promise<ReadOutcome> | undefined;

  constructor(source: S, options?: ReaderOptions) {
    super(options);
    this.source = source;
    this.busy = false;
    this.pending = undefined;
  }

  /**
   * Parses the next unit from the source.
   *
   * @param parser Parser for one unit
   * @param options Cancellation options
   * @returns The parsed value, after retiring the consumed bytes.
   * @throws ReadError<E> `Parser` if the parser fails, `UnexpectedEof` if the source ends before the
   *         unit is complete, `Source` if the read fails, `BufferFull` if the unit does not fit.
   */
  async parse<T, E>(parser: Parser<T, E>, options: ParseOptions = {}): Promise<T> {
    this.acquire();
    try {
      await this.settle(options.signal);
      while (true) {
        const step: Done<T> | Incomplete = this.scan(parser);
        if (step.type === ParseResultType.Done) {
          return step.value;
        }
        this.prepareRefill(step.needed);
        if (await this.fill(options.signal) === 0) {
          throw createUnexpectedEofError(this.buffer.available());
        }
      }
    } finally {
      this.busy = false;
    }
  }

  /**
   * Checks if the source is exhausted and no unconsumed byte is left.
   *
   * Reads from the source if the buffer is empty.
   */
  async isAtEnd(options: ParseOptions = {}): Promise<boolean> {
    this.acquire();
    try {
      await this.settle(options.signal);
      if (this.buffer.available() > 0) {
        return false;
      }
      this.prepareRefill(undefined);
      const count: UintSize = await this.fill(options.signal);
      return count === 0;
    } finally {
      this.busy = false;
    }
  }

  /**
   * Reads raw bytes into `target`, buffered bytes first.
   *
   * If the buffer is empty and `target` is at least as large as the buffer, the source writes into
   * `target` directly. With a `signal`, reads always go through the buffer so that an aborted read
   * keeps its bytes for the next call.
   *
   * @returns The number of bytes written at the start of `target`, `0` at the end of the source.
   * @throws SourceError If the read fails.
   */
  async read(target: Uint8Array, options: ParseOptions = {}): Promise<UintSize> {
    this.acquire();
    try {
      await this.settle(options.signal);
      if (target.length === 0) {
        return 0;
      }
      if (this.buffer.available() === 0) {
        if (options.signal === undefined && target.length >= this.buffer.capacity) {
          return this.passThrough(await readAsync(this.source, target), target);
        }
        this.prepareRefill(undefined);
        if (await this.fill(options.signal) === 0) {
          return 0;
        }
      }
      return this.drain(target);
    } finally {
      this.busy = false;
    }
  }

  /**
   * Drops the unconsumed bytes, e.g. to skip past a unit the parser rejected.
   *
   * A read left in flight by an aborted call is committed first, and dropped as well.
   *
   * @returns The number of bytes dropped.
   */
  async discard(options: ParseOptions = {}): Promise<UintSize> {
    this.acquire();
    try {
      await this.settle(options.signal);
      return this.buffer.clear();
    } finally {
      this.busy = false;
    }
  }

  /**
   * Parses units until the source ends on a unit boundary.
   */
  async *parseAll<T, E>(parser: Parser<T, E>, options: ParseOptions = {}): AsyncIterableIterator<T> {
    while (!await this.isAtEnd(options)) {
      yield await this.parse(parser, options);
    }
  }

  private acquire(): void {
    if (this.busy) {
      throw createReaderBusyError();
    }
    this.busy = true;
  }

  /**
   * Commits the read left over by an aborted call, if any.
   */
  private async settle(signal: AbortSignal | undefined): Promise<void> {
    if (this.pending !== undefined) {
      await this.fill(signal);
    }
  }

  /**
   * Reads once into the free tail of the buffer and commits the bytes.
   *
   * @returns The number of bytes added to the window, `0` at the end of the source.
   */
  private async fill(signal: AbortSignal | undefined): Promise<UintSize> {
    if (this.pending === undefined) {
      signal?.throwIfAborted();
      this.pending = readAsync(this.source, this.buffer.writable()).then(
        (count: UintSize): ReadOutcome => ({ok: true, count}),
        (error: unknown): ReadOutcome => ({ok: false, error}),
      );
    }
    const outcome: ReadOutcome = await abortable(this.pending, signal);
    this.pending = undefined;
    if (!outcome.ok) {
      throw outcome.error;
    }
    this.buffer.commitWrite(outcome.count);
    return outcome.count;
  }
}

function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (signal === undefined) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject): void => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, {once: true});
    void promise.then(
      (value: T): void => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown): void => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
