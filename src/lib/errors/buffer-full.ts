import { Incident } from "incident";
import type { UintSize } from "semantic-types";

export type Name = "BufferFull";
export const name: Name = "BufferFull";

export interface Data {
  maxCapacity: UintSize;
  /**
   * Total number of bytes the buffer would have to hold.
   */
  needed: UintSize;
}

export type Cause = undefined;
export type BufferFullError = Incident<Data, Name, Cause>;

export function format({maxCapacity, needed}: Data): string {
  return `Buffer limit reached: ${needed} bytes needed, at most ${maxCapacity} allowed`;
}

export function createBufferFullError(maxCapacity: UintSize, needed: UintSize): BufferFullError {
  return new Incident(name, {maxCapacity, needed}, format);
}
