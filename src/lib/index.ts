export { AsyncBufferedReader, type ParseOptions } from "./async-buffered-reader";
export { BufferedReader } from "./buffered-reader";
export * from "./errors/index";
export { GrowableBuffer, MAX_BUFFER_LENGTH } from "./growable-buffer";
export {
  type Done,
  done,
  type Failure,
  failure,
  type Incomplete,
  incomplete,
  type Parser,
  type ParseResult,
  ParseResultType,
} from "./parse-result";
export { DEFAULT_CAPACITY, DEFAULT_MIN_READ, type ReaderOptions } from "./reader-base";
export { type AsyncSource, fillSync, readAsync, readSync, type SyncSource } from "./source";
export { AsyncIterableSource } from "./sources/async-iterable-source";
export { ChunkSource } from "./sources/chunk-source";
export { FdSource } from "./sources/fd-source";
export { FileHandleSource } from "./sources/file-handle-source";
