import { Incident } from "incident";

export type Name = "Parser";
export const name: Name = "Parser";

export interface Data<E> {
  error: E;
}

export type Cause = undefined;
export type ParserError<E> = Incident<Data<E>, Name, Cause>;

export function format<E>({error}: Data<E>): string {
  return error instanceof Error ? `Parser rejected the input: ${error.message}` : "Parser rejected the input";
}

export function createParserError<E>(error: E): ParserError<E> {
  return new Incident(name, {error}, format);
}
