/**
 * @parsnip/parser
 *
 * Recursive-descent parsing from small composable combinators.
 *
 * Provides:
 * - An immutable `Cursor` threaded through every parser
 * - A `ParseResult` union instead of thrown control flow
 * - Primitive, sequencing, alternation, repetition and whitespace combinators
 * - `ParseError` for the throwing entry points and for rendering diagnostics
 *
 * @module
 */

// Core types
export type {
  Cursor,
  FailureKind,
  ParseSuccess,
  ParseFailure,
  ParseResult,
  ParseOutcome,
  Parser,
} from "./types.js";

// Cursor
export { cursor, advance, remaining, atEnd, peek, lineCol } from "./cursor.js";

// Errors
export { ParseError, type ParseErrorOptions } from "./errors.js";

// Combinator API
export {
  runParser,
  isFatal,
  literal,
  char,
  satisfy,
  takeWhile,
  takeTill,
  takeUntil,
  isDigit,
  digits,
  eof,
  seq,
  preceded,
  terminated,
  separatedPair,
  between,
  alt,
  many,
  many1,
  optional,
  separated,
  map,
  value,
  tryMap,
  lazy,
  label,
  traced,
  multispace0,
  space0,
  padded,
  type ParserValues,
  type TakeOptions,
  type SeparatedOptions,
  type Converted,
} from "./combinators.js";
