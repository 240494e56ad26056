import { Incident } from "incident";

export type Name = "Source";
export const name: Name = "Source";

export interface Data {
}

export type Cause = Error;
export type SourceError = Incident<Data, Name, Cause>;

export function format(_: Data): string {
  return "Failed to read from the source";
}

export function createSourceError(cause: unknown): SourceError {
  const error: Error = cause instanceof Error ? cause : new Error(String(cause));
  return new Incident(error, name, {}, format);
}
