import { type BufferFullError, name as bufferFullName } from "./buffer-full";
import { name as parserName, type ParserError } from "./parser";
import { name as sourceName, type SourceError } from "./source";
import { name as unexpectedEofName, type UnexpectedEofError } from "./unexpected-eof";

export type { BufferFullError } from "./buffer-full";
export type { ConsumeOverflowError } from "./consume-overflow";
export type { InvalidOptionError } from "./invalid-option";
export type { ParserError } from "./parser";
export type { ReaderBusyError } from "./reader-busy";
export type { SourceError } from "./source";
export type { UnexpectedEofError } from "./unexpected-eof";
export type { WriteOverflowError } from "./write-overflow";
export { createBufferFullError } from "./buffer-full";
export { createConsumeOverflowError } from "./consume-overflow";
export { createInvalidOptionError } from "./invalid-option";
export { createParserError } from "./parser";
export { createReaderBusyError } from "./reader-busy";
export { createSourceError } from "./source";
export { createUnexpectedEofError } from "./unexpected-eof";
export { createWriteOverflowError } from "./write-overflow";

/**
 * Errors a `parse` call reports for a well-behaved parser and source.
 *
 * Contract violations (`ConsumeOverflow`, `WriteOverflow`, `ReaderBusy`) and invalid options
 * are not part of this union.
 */
export type ReadError<E> = SourceError | UnexpectedEofError | ParserError<E> | BufferFullError;

const READ_ERROR_NAMES: ReadonlySet<string> = new Set([sourceName, unexpectedEofName, parserName, bufferFullName]);

/**
 * The parser error type cannot be checked at runtime: narrow `data.error` yourself.
 */
export function isReadError(value: unknown): value is ReadError<unknown> {
  return value instanceof Error && READ_ERROR_NAMES.has(value.name);
}
