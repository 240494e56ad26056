import { Incident } from "incident";
import type { UintSize } from "semantic-types";

export type Name = "UnexpectedEof";
export const name: Name = "UnexpectedEof";

export interface Data {
  /**
   * Unconsumed bytes left in the buffer when the source ended.
   */
  available: UintSize;
}

export type Cause = undefined;
export type UnexpectedEofError = Incident<Data, Name, Cause>;

export function format({available}: Data): string {
  return `Source ended in the middle of a unit: ${available} buffered bytes are not enough to complete it`;
}

export function createUnexpectedEofError(available: UintSize): UnexpectedEofError {
  return new Incident(name, {available}, format);
}
