import type { UintSize } from "semantic-types";
import { createSourceError } from "./errors/source";
import type { GrowableBuffer } from "./growable-buffer";

/**
 * Blocking byte source.
 */
export interface SyncSource {
  /**
   * Performs a single read into `target`, blocking until some bytes are available.
   *
   * `target` is never empty.
   *
   * @returns The number of bytes written at the start of `target`, or `0` if the source is exhausted.
   */
  read(target: Uint8Array): UintSize;
}

/**
 * Suspending byte source.
 *
 * Same contract as `SyncSource`, but the read resolves asynchronously.
 */
export interface AsyncSource {
  read(target: Uint8Array): Promise<UintSize>;
}

export function readSync(source: SyncSource, target: Uint8Array): UintSize {
  try {
    return source.read(target);
  } catch (err) {
    throw createSourceError(err);
  }
}

export async function readAsync(source: AsyncSource, target: Uint8Array): Promise<UintSize> {
  try {
    return await source.read(target);
  } catch (err) {
    throw createSourceError(err);
  }
}

/**
 * Reads once into the free tail of `buffer` and commits the bytes.
 *
 * @returns The number of bytes added to the window, `0` at the end of the source.
 */
export function fillSync(buffer: GrowableBuffer, source: SyncSource): UintSize {
  const count: UintSize = readSync(source, buffer.writable());
  buffer.commitWrite(count);
  return count;
}
