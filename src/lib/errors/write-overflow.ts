import { Incident } from "incident";
import type { UintSize } from "semantic-types";

export type Name = "WriteOverflow";
export const name: Name = "WriteOverflow";

export interface Data {
  written: number;
  writable: UintSize;
}

export type Cause = undefined;
export type WriteOverflowError = Incident<Data, Name, Cause>;

export function format({written, writable}: Data): string {
  return `Invalid write length: ${written} (tail holds ${writable} bytes)`;
}

export function createWriteOverflowError(written: number, writable: UintSize): WriteOverflowError {
  return new Incident(name, {written, writable}, format);
}
