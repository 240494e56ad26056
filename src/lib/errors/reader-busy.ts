import { Incident } from "incident";

export type Name = "ReaderBusy";
export const name: Name = "ReaderBusy";

export interface Data {
}

export type Cause = undefined;
export type ReaderBusyError = Incident<Data, Name, Cause>;

export function format(_: Data): string {
  return "Another operation is already pending on this reader";
}

export function createReaderBusyError(): ReaderBusyError {
  return new Incident(name, {}, format);
}
