/**
 * JSON value grammar
 *
 * ```
 * value   := null | bool | number | string | array | object
 * number  := "-"? digits ("." digits)?
 * string  := '"' [^"]* '"'
 * array   := "[" (value ("," value)*)? "]"
 * object  := "{" pair ("," pair)* "}"
 * pair    := string ":" value
 * ```
 *
 * Punctuation inside arrays and objects tolerates surrounding whitespace.
 * Strings are taken verbatim: backslash escapes are not decoded.
 */

import {
  alt,
  between,
  char,
  digits,
  label,
  lazy,
  literal,
  map,
  optional,
  padded,
  preceded,
  separated,
  separatedPair,
  seq,
  takeUntil,
  traced,
  tryMap,
  value,
  type Converted,
  type Parser,
} from "@parsnip/parser";
import {
  jsonArray,
  jsonBool,
  jsonFloat,
  jsonInt,
  jsonNull,
  jsonObject,
  jsonString,
  type JsonValue,
} from "./value.js";

const I64_MAX = 2n ** 63n - 1n;

function punct(ch: string): Parser<string> {
  return padded(char(ch));
}

const valueRef: Parser<JsonValue> = lazy(() => jsonValue);

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

export const nullLiteral: Parser<JsonValue> = traced("null", value(literal("null"), jsonNull()));

export const boolLiteral: Parser<JsonValue> = traced(
  "bool",
  alt(value(literal("true"), jsonBool(true)), value(literal("false"), jsonBool(false)))
);

/** Integer digits that fit a signed 64-bit integer. */
const integerPart = tryMap(
  digits(),
  (text): Converted<string> =>
    BigInt(text) <= I64_MAX
      ? { ok: true, value: text }
      : { ok: false, expected: "integer within the signed 64-bit range" },
  "format"
);

const fractionPart = optional(preceded(char("."), digits()));

export const numberLiteral: Parser<JsonValue> = traced(
  "number",
  map(seq(optional(char("-")), integerPart, fractionPart), ([minus, whole, fraction]) => {
    if (fraction === null) {
      const n = BigInt(whole);
      return jsonInt(minus === null ? n : -n);
    }
    const f = Number(`${whole}.${fraction}`);
    return jsonFloat(minus === null ? f : -f);
  })
);

const rawString: Parser<string> = between(
  char('"'),
  takeUntil('"', { expected: "closing quote" }),
  char('"')
);

export const stringLiteral: Parser<JsonValue> = traced("string", map(rawString, jsonString));

// ---------------------------------------------------------------------------
// Containers
// ---------------------------------------------------------------------------

export const arrayValue: Parser<JsonValue> = traced(
  "array",
  label("array", map(between(punct("["), separated(valueRef, punct(",")), punct("]")), jsonArray))
);

const pair = separatedPair(rawString, punct(":"), valueRef);

// At least one pair: "{}" is not an object here.
export const objectValue: Parser<JsonValue> = traced(
  "object",
  label(
    "object",
    map(between(punct("{"), separated(pair, punct(","), { min: 1 }), punct("}")), jsonObject)
  )
);

export const jsonValue: Parser<JsonValue> = traced(
  "value",
  alt(nullLiteral, boolLiteral, numberLiteral, stringLiteral, arrayValue, objectValue)
);

/** A whole document: one value with optional surrounding whitespace. */
export const jsonDocument: Parser<JsonValue> = padded(jsonValue);
