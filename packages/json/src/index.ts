/**
 * @parsnip/json - JSON values parsed with @parsnip/parser combinators
 *
 * @example
 * ```typescript
 * import { parseJson, toPlainJson } from "@parsnip/json";
 *
 * const result = parseJson('{"name": "parsnip", "tags": [1, 2.5]}');
 * if (result.ok) {
 *   toPlainJson(result.value); // { name: "parsnip", tags: [1n, 2.5] }
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */

import { logger } from "@parsnip/core";
import { runParser, type ParseOutcome } from "@parsnip/parser";
import { jsonDocument } from "./grammar.js";
import type { JsonValue } from "./value.js";

const ERROR_PREFIX = "Failed to parse JSON";

/**
 * Parse one complete JSON document.
 *
 * The grammar itself does no I/O. The first call in a process (or after
 * `config.reset()`) loads configuration, which searches the working
 * directory for a parsnip config file; call `config.reset({ searchFrom })`
 * or `config.set()` beforehand to settle it up front.
 */
export function parseJson(text: string): ParseOutcome<JsonValue> {
  const outcome = runParser(jsonDocument, text, { prefix: ERROR_PREFIX });
  if (!outcome.ok) {
    logger.verbose(outcome.error.message);
  }
  return outcome;
}

/**
 * Like {@link parseJson}, but throws the `ParseError` instead of
 * returning it.
 */
export function parseJsonOrThrow(text: string): JsonValue {
  const outcome = parseJson(text);
  if (!outcome.ok) throw outcome.error;
  return outcome.value;
}

export {
  nullLiteral,
  boolLiteral,
  numberLiteral,
  stringLiteral,
  arrayValue,
  objectValue,
  jsonValue,
  jsonDocument,
} from "./grammar.js";

export {
  jsonNull,
  jsonBool,
  jsonInt,
  jsonFloat,
  jsonString,
  jsonArray,
  jsonObject,
  jsonEquals,
  toPlainJson,
} from "./value.js";

export type { JsonValue, JsonNumber, JsonValueType, PlainJson } from "./value.js";
