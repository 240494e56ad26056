import type { UintSize } from "semantic-types";

export enum ParseResultType {
  Done,
  Incomplete,
  Error,
}

export interface Done<T> {
  type: ParseResultType.Done;
  value: T;
  /**
   * Number of bytes used from the start of the input.
   */
  consumed: UintSize;
}

export interface Incomplete {
  type: ParseResultType.Incomplete;
  /**
   * Number of additional bytes the parser needs, if it knows it.
   */
  needed?: UintSize;
}

export interface Failure<E> {
  type: ParseResultType.Error;
  error: E;
}

export type ParseResult<T, E> = Done<T> | Incomplete | Failure<E>;

/**
 * Incremental parser over a byte window.
 *
 * It must be a pure function of `input`: the reader calls it again from the start of the
 * unconsumed bytes after each refill. It must never report more consumed bytes than
 * `input.length`.
 */
export type Parser<T, E> = (input: Uint8Array) => ParseResult<T, E>;

export function done<T>(value: T, consumed: UintSize): Done<T> {
  return {type: ParseResultType.Done, value, consumed};
}

export function incomplete(needed?: UintSize): Incomplete {
  return needed === undefined ? {type: ParseResultType.Incomplete} : {type: ParseResultType.Incomplete, needed};
}

export function failure<E>(error: E): Failure<E> {
  return {type: ParseResultType.Error, error};
}
