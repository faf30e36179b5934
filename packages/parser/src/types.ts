/**
 * Core types for @parsnip/parser
 *
 * Defines the cursor, the parse result union and the parser interface.
 */

import type { ParseError } from "./errors.js";

/** Immutable position over an input string. */
export interface Cursor {
  readonly input: string;
  readonly offset: number;
}

/**
 * Why a parser failed.
 *
 * - `token`: the expected literal or character class was not there (backtrackable)
 * - `conversion`: a token matched but is not one of the accepted literals
 * - `format`: a token matched but is malformed or out of range
 */
export type FailureKind = "token" | "conversion" | "format";

export interface ParseSuccess<T> {
  readonly ok: true;
  readonly value: T;
  /** Cursor just past the consumed input. */
  readonly cursor: Cursor;
}

export interface ParseFailure {
  readonly ok: false;
  /** Where the failure happened; its remaining text is the unconsumed input. */
  readonly cursor: Cursor;
  readonly expected: string;
  readonly kind: FailureKind;
  /** Enclosing `label` names, outermost first. */
  readonly context: readonly string[];
}

/** Result of a parse attempt: success with a value, or a failure. */
export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

/** Result of parsing a whole input. */
export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; error: ParseError };

export interface Parser<T> {
  /** Attempt to parse at `cursor`. */
  parseNext(cursor: Cursor): ParseResult<T>;
  /** Attempt to parse from the start of `input`; trailing input is allowed. */
  parse(input: string): ParseResult<T>;
  /** Parse the full input, throwing ParseError if it fails or leaves input unconsumed. */
  parseAll(input: string): T;
}
