import fs, { type PathLike } from "fs";
import type { FileHandle } from "fs/promises";
import type { UintSize } from "semantic-types";
import type { AsyncSource } from "../source";

/**
 * Suspending source reading from a `fs/promises` file handle.
 */
export class FileHandleSource implements AsyncSource {
  readonly handle: FileHandle;

  constructor(handle: FileHandle) {
    this.handle = handle;
  }

  static async open(path: PathLike): Promise<FileHandleSource> {
    return new FileHandleSource(await fs.promises.open(path, "r"));
  }

  async read(target: Uint8Array): Promise<UintSize> {
    const {bytesRead} = await this.handle.read(target, 0, target.length, null);
    return bytesRead;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
