import { Incident } from "incident";

export type Name = "InvalidOption";
export const name: Name = "InvalidOption";

export interface Data {
  option: string;
  value: number;
}

export type Cause = undefined;
export type InvalidOptionError = Incident<Data, Name, Cause>;

export function format({option, value}: Data): string {
  return `Invalid reader option \`${option}\`: ${value}`;
}

export function createInvalidOptionError(option: string, value: number): InvalidOptionError {
  return new Incident(name, {option, value}, format);
}
