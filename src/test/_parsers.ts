import type { Uint8, UintSize } from "semantic-types";
import { done, failure, incomplete, type ParseResult, type Parser } from "../lib/parse-result";

const SPACE: Uint8 = 0x20;
const CR: Uint8 = 0x0d;
const LF: Uint8 = 0x0a;
const UPPER_A: Uint8 = 0x41;
const UPPER_Z: Uint8 = 0x5a;
const DIGIT_0: Uint8 = 0x30;
const DIGIT_9: Uint8 = 0x39;

export interface UnexpectedByte {
  offset: UintSize;
  byte: Uint8;
}

function decode(input: Uint8Array, start: UintSize, end: UintSize): string {
  return Buffer.from(input.subarray(start, end)).toString("utf8");
}

/**
 * Upper-case token followed by a space, e.g. an HTTP method.
 */
export function token(input: Uint8Array): ParseResult<string, UnexpectedByte> {
  for (let i: UintSize = 0; i < input.length; i++) {
    const byte: Uint8 = input[i];
    if (byte >= UPPER_A && byte <= UPPER_Z) {
      continue;
    }
    if (byte === SPACE && i > 0) {
      return done(decode(input, 0, i), i + 1);
    }
    return failure({offset: i, byte});
  }
  return incomplete();
}

/**
 * Decimal number terminated by a line feed.
 */
export function decimal(input: Uint8Array): ParseResult<number, UnexpectedByte> {
  for (let i: UintSize = 0; i < input.length; i++) {
    const byte: Uint8 = input[i];
    if (byte >= DIGIT_0 && byte <= DIGIT_9) {
      continue;
    }
    if (byte === LF && i > 0) {
      return done(Number(decode(input, 0, i)), i + 1);
    }
    return failure({offset: i, byte});
  }
  return incomplete();
}

/**
 * Line terminated by CRLF, without the terminator.
 */
export function line(input: Uint8Array): ParseResult<string, never> {
  for (let i: UintSize = 0; i + 1 < input.length; i++) {
    if (input[i] === CR && input[i + 1] === LF) {
      return done(decode(input, 0, i), i + 2);
    }
  }
  return incomplete();
}

/**
 * Exactly `size` bytes, as text.
 */
export function take(size: UintSize): Parser<string, never> {
  return (input: Uint8Array): ParseResult<string, never> => {
    if (input.length < size) {
      return incomplete(size - input.length);
    }
    return done(decode(input, 0, size), size);
  };
}

/**
 * Frame with a big-endian `u16` length prefix, the payload decoded as text.
 */
export function frame(input: Uint8Array): ParseResult<string, never> {
  if (input.length < 2) {
    return incomplete(2 - input.length);
  }
  const length: UintSize = (input[0] << 8) | input[1];
  if (input.length < 2 + length) {
    return incomplete(2 + length - input.length);
  }
  return done(decode(input, 2, 2 + length), 2 + length);
}

/**
 * Frame with a big-endian `u32` length prefix, the payload returned as bytes.
 */
export function longFrame(input: Uint8Array): ParseResult<Uint8Array, never> {
  if (input.length < 4) {
    return incomplete(4 - input.length);
  }
  const length: UintSize = new DataView(input.buffer, input.byteOffset, input.byteLength).getUint32(0, false);
  if (input.length < 4 + length) {
    return incomplete(4 + length - input.length);
  }
  return done(input.slice(4, 4 + length), 4 + length);
}
