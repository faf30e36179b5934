/**
 * Parser combinator API for @parsnip/parser
 *
 * All combinators return `Parser<T>` values that can be composed freely.
 * PEG semantics: ordered alternation, first match wins.
 *
 * Only `token` failures backtrack. A `conversion` or `format` failure means
 * the input was recognised and rejected, so alternation and repetition pass
 * it up unchanged instead of trying something else.
 */

import { globalTracer } from "@parsnip/core";
import { cursor as startOf, advance, atEnd, peek } from "./cursor.js";
import { ParseError, type ParseErrorOptions } from "./errors.js";
import type {
  Cursor,
  FailureKind,
  ParseFailure,
  ParseOutcome,
  ParseResult,
  Parser,
} from "./types.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Create a Parser<T> from a raw parse function. */
function mkParser<T>(parseFn: (c: Cursor) => ParseResult<T>): Parser<T> {
  const parser: Parser<T> = {
    parseNext: parseFn,
    parse(input: string): ParseResult<T> {
      return parseFn(startOf(input));
    },
    parseAll(input: string): T {
      const outcome = runParser(parser, input);
      if (!outcome.ok) throw outcome.error;
      return outcome.value;
    },
  };
  return parser;
}

function ok<T>(value: T, c: Cursor): ParseResult<T> {
  return { ok: true, value, cursor: c };
}

function fail(c: Cursor, expected: string, kind: FailureKind = "token"): ParseFailure {
  return { ok: false, cursor: c, expected, kind, context: [] };
}

/** Conversion and format failures are never backtracked over. */
export function isFatal(failure: ParseFailure): boolean {
  return failure.kind !== "token";
}

// ---------------------------------------------------------------------------
// Running
// ---------------------------------------------------------------------------

/**
 * Parse the whole of `input`. Leftover input is a failure ("end of input").
 */
export function runParser<T>(
  parser: Parser<T>,
  input: string,
  options: ParseErrorOptions = {}
): ParseOutcome<T> {
  const r = parser.parseNext(startOf(input));
  if (!r.ok) {
    return { ok: false, error: new ParseError(r, options) };
  }
  if (!atEnd(r.cursor)) {
    return { ok: false, error: new ParseError(fail(r.cursor, "end of input"), options) };
  }
  return { ok: true, value: r.value };
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

/** Match an exact string literal. */
export function literal(s: string): Parser<string> {
  const expected = JSON.stringify(s);
  return mkParser((c) => {
    if (c.input.startsWith(s, c.offset)) {
      return ok(s, advance(c, s.length));
    }
    return fail(c, expected);
  });
}

/** Match a single specific character. */
export function char(ch: string): Parser<string> {
  const expected = JSON.stringify(ch);
  return mkParser((c) => {
    if (peek(c) === ch) {
      return ok(ch, advance(c, 1));
    }
    return fail(c, expected);
  });
}

/** Match one character accepted by `pred`. */
export function satisfy(pred: (ch: string) => boolean, expected: string): Parser<string> {
  return mkParser((c) => {
    const ch = peek(c);
    if (ch !== undefined && pred(ch)) {
      return ok(ch, advance(c, 1));
    }
    return fail(c, expected);
  });
}

export interface TakeOptions {
  /** Minimum number of characters (default 0). */
  min?: number;
  /** Failure description when fewer than `min` characters match. */
  expected?: string;
}

/** The longest run of characters accepted by `pred`. */
export function takeWhile(pred: (ch: string) => boolean, options: TakeOptions = {}): Parser<string> {
  const min = options.min ?? 0;
  const expected = options.expected ?? "matching character";
  return mkParser((c) => {
    let end = c.offset;
    while (end < c.input.length && pred(c.input[end])) end++;
    if (end - c.offset < min) return fail(c, expected);
    return ok(c.input.slice(c.offset, end), advance(c, end - c.offset));
  });
}

/** The longest run of characters other than `ch`. */
export function takeTill(ch: string, options: TakeOptions = {}): Parser<string> {
  return takeWhile((x) => x !== ch, {
    min: options.min,
    expected: options.expected ?? `character other than ${JSON.stringify(ch)}`,
  });
}

/**
 * Everything up to (not including) the next occurrence of `terminator`.
 * Fails when `terminator` does not occur in the rest of the input.
 */
export function takeUntil(terminator: string, options: TakeOptions = {}): Parser<string> {
  const min = options.min ?? 0;
  const expected = options.expected ?? `text followed by ${JSON.stringify(terminator)}`;
  return mkParser((c) => {
    const end = c.input.indexOf(terminator, c.offset);
    if (end === -1 || end - c.offset < min) return fail(c, expected);
    return ok(c.input.slice(c.offset, end), advance(c, end - c.offset));
  });
}

export function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

/** One or more ASCII digits. */
export function digits(): Parser<string> {
  return takeWhile(isDigit, { min: 1, expected: "digit" });
}

/** Match end of input. */
export function eof(): Parser<null> {
  return mkParser((c) => (atEnd(c) ? ok(null, c) : fail(c, "end of input")));
}

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/** Value types of a tuple of parsers. */
export type ParserValues<Ps extends readonly Parser<unknown>[]> = {
  [K in keyof Ps]: Ps[K] extends Parser<infer T> ? T : never;
};

/** Run parsers in order; all must succeed. Yields the tuple of their values. */
export function seq<Ps extends readonly Parser<unknown>[]>(...parsers: Ps): Parser<ParserValues<Ps>> {
  return mkParser((c) => {
    const values: unknown[] = [];
    let cur = c;
    for (const p of parsers) {
      const r = p.parseNext(cur);
      if (!r.ok) return r;
      values.push(r.value);
      cur = r.cursor;
    }
    return ok(values as ParserValues<Ps>, cur);
  });
}

/** Run `first` then `p`, keeping only `p`'s value. */
export function preceded<A, T>(first: Parser<A>, p: Parser<T>): Parser<T> {
  return mkParser((c) => {
    const ra = first.parseNext(c);
    if (!ra.ok) return ra;
    return p.parseNext(ra.cursor);
  });
}

/** Run `p` then `last`, keeping only `p`'s value. */
export function terminated<T, B>(p: Parser<T>, last: Parser<B>): Parser<T> {
  return mkParser((c) => {
    const rp = p.parseNext(c);
    if (!rp.ok) return rp;
    const rb = last.parseNext(rp.cursor);
    if (!rb.ok) return rb;
    return ok(rp.value, rb.cursor);
  });
}

/** `left sep right`, keeping both sides. */
export function separatedPair<A, S, B>(
  left: Parser<A>,
  sep: Parser<S>,
  right: Parser<B>
): Parser<[A, B]> {
  return mkParser((c) => {
    const ra = left.parseNext(c);
    if (!ra.ok) return ra;
    const rs = sep.parseNext(ra.cursor);
    if (!rs.ok) return rs;
    const rb = right.parseNext(rs.cursor);
    if (!rb.ok) return rb;
    return ok<[A, B]>([ra.value, rb.value], rb.cursor);
  });
}

/** Parse `p` between `open` and `close`, returning only the inner result. */
export function between<O, T, C>(open: Parser<O>, p: Parser<T>, close: Parser<C>): Parser<T> {
  return mkParser((c) => {
    const ro = open.parseNext(c);
    if (!ro.ok) return ro;
    const rp = p.parseNext(ro.cursor);
    if (!rp.ok) return rp;
    const rc = close.parseNext(rp.cursor);
    if (!rc.ok) return rc;
    return ok(rp.value, rc.cursor);
  });
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/**
 * Ordered alternation (PEG): the first alternative that succeeds wins.
 * When every alternative fails, the failure sits where matching started and
 * lists what each alternative expected.
 */
export function alt<T>(...parsers: Parser<T>[]): Parser<T> {
  return mkParser((c) => {
    const expected: string[] = [];
    for (const p of parsers) {
      const r = p.parseNext(c);
      if (r.ok || isFatal(r)) return r;
      if (!expected.includes(r.expected)) expected.push(r.expected);
    }
    return fail(c, expected.join(" or "));
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/** Zero or more repetitions. */
export function many<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((c) => {
    const results: T[] = [];
    let cur = c;
    for (;;) {
      const r = p.parseNext(cur);
      if (!r.ok) {
        if (isFatal(r)) return r;
        break;
      }
      if (r.cursor.offset === cur.offset) break; // prevent infinite loop on zero-width match
      results.push(r.value);
      cur = r.cursor;
    }
    return ok(results, cur);
  });
}

/** One or more repetitions. */
export function many1<T>(p: Parser<T>): Parser<T[]> {
  const rest = many(p);
  return mkParser((c) => {
    const first = p.parseNext(c);
    if (!first.ok) return first;
    const r = rest.parseNext(first.cursor);
    if (!r.ok) return r;
    return ok([first.value, ...r.value], r.cursor);
  });
}

/** Optional: succeed with `null` if `p` fails with a token failure. */
export function optional<T>(p: Parser<T>): Parser<T | null> {
  return mkParser((c) => {
    const r = p.parseNext(c);
    if (r.ok || isFatal(r)) return r;
    return ok(null, c);
  });
}

export interface SeparatedOptions {
  /** Minimum number of items: 0 or 1 (default 0). */
  min?: number;
}

/**
 * Items separated by `sep`.
 *
 * Repetition stops at the first `sep item` step that fails; the separator of
 * that step is not consumed, so a trailing separator is left for the
 * enclosing parser to reject.
 */
export function separated<T, S>(
  item: Parser<T>,
  sep: Parser<S>,
  options: SeparatedOptions = {}
): Parser<T[]> {
  const min = options.min ?? 0;
  if (min !== 0 && min !== 1) {
    throw new RangeError(`separated: min must be 0 or 1, got ${String(min)}`);
  }
  return mkParser((c) => {
    const first = item.parseNext(c);
    if (!first.ok) {
      if (min === 0 && !isFatal(first)) return ok([], c);
      return first;
    }
    const results: T[] = [first.value];
    let cur = first.cursor;
    for (;;) {
      const rs = sep.parseNext(cur);
      if (!rs.ok) {
        if (isFatal(rs)) return rs;
        break;
      }
      const ri = item.parseNext(rs.cursor);
      if (!ri.ok) {
        if (isFatal(ri)) return ri;
        break;
      }
      if (ri.cursor.offset === cur.offset) break;
      results.push(ri.value);
      cur = ri.cursor;
    }
    return ok(results, cur);
  });
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return mkParser((c) => {
    const r = p.parseNext(c);
    if (!r.ok) return r;
    return ok(f(r.value), r.cursor);
  });
}

/** Replace a parser's result with a constant. */
export function value<A, B>(p: Parser<A>, v: B): Parser<B> {
  return map(p, () => v);
}

/** Outcome of a post-match conversion. */
export type Converted<T> = { ok: true; value: T } | { ok: false; expected: string };

/**
 * Convert a matched value, failing with `kind` at the start of the match when
 * the conversion is rejected.
 */
export function tryMap<A, B>(
  p: Parser<A>,
  convert: (a: A) => Converted<B>,
  kind: Exclude<FailureKind, "token"> = "conversion"
): Parser<B> {
  return mkParser((c) => {
    const r = p.parseNext(c);
    if (!r.ok) return r;
    const converted = convert(r.value);
    if (!converted.ok) return fail(c, converted.expected, kind);
    return ok(converted.value, r.cursor);
  });
}

// ---------------------------------------------------------------------------
// Recursion, context and tracing
// ---------------------------------------------------------------------------

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<T>(f: () => Parser<T>): Parser<T> {
  let cached: Parser<T> | null = null;
  return mkParser((c) => {
    if (!cached) cached = f();
    return cached.parseNext(c);
  });
}

/** Name `p` in the context of any failure that comes out of it. */
export function label<T>(name: string, p: Parser<T>): Parser<T> {
  return mkParser((c) => {
    const r = p.parseNext(c);
    if (r.ok) return r;
    return { ...r, context: [name, ...r.context] };
  });
}

/** Report every attempt of `p` to the global tracer under `name`. */
export function traced<T>(name: string, p: Parser<T>): Parser<T> {
  return mkParser((c) => {
    globalTracer.enter(name, c.offset);
    let settled = false;
    try {
      const r = p.parseNext(c);
      settled = true;
      if (r.ok) {
        globalTracer.success(name, c.offset, r.cursor.offset);
      } else {
        globalTracer.failure(name, c.offset, r.expected);
      }
      return r;
    } finally {
      if (!settled) globalTracer.abandon();
    }
  });
}

// ---------------------------------------------------------------------------
// Whitespace
// ---------------------------------------------------------------------------

function isMultispace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\r" || ch === "\n";
}

/** Zero or more spaces, tabs, carriage returns or newlines. */
export function multispace0(): Parser<string> {
  return takeWhile(isMultispace);
}

/** Zero or more spaces or tabs. */
export function space0(): Parser<string> {
  return takeWhile((ch) => ch === " " || ch === "\t");
}

/** Parse `p` surrounded by optional whitespace. */
export function padded<T>(p: Parser<T>): Parser<T> {
  const ws = multispace0();
  return between(ws, p, ws);
}
