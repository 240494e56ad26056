import fs, { type PathLike } from "fs";
import type { UintSize } from "semantic-types";
import type { SyncSource } from "../source";

/**
 * Blocking source reading from a file descriptor (file, pipe, terminal).
 *
 * Reads start at the current position of the descriptor.
 */
export class FdSource implements SyncSource {
  readonly fd: number;

  constructor(fd: number) {
    this.fd = fd;
  }

  static open(path: PathLike): FdSource {
    return new FdSource(fs.openSync(path, "r"));
  }

  read(target: Uint8Array): UintSize {
    return fs.readSync(this.fd, target, 0, target.length, null);
  }

  close(): void {
    fs.closeSync(this.fd);
  }
}
