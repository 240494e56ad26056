import { Incident } from "incident";
import type { UintSize } from "semantic-types";

export type Name = "ConsumeOverflow";
export const name: Name = "ConsumeOverflow";

export interface Data {
  consumed: number;
  available: UintSize;
}

export type Cause = undefined;
export type ConsumeOverflowError = Incident<Data, Name, Cause>;

export function format({consumed, available}: Data): string {
  return `Invalid consumed length: ${consumed} (window holds ${available} bytes)`;
}

/**
 * Contract violation: a parser reported consuming bytes it was never given.
 */
export function createConsumeOverflowError(consumed: number, available: UintSize): ConsumeOverflowError {
  return new Incident(name, {consumed, available}, format);
}
