/**
 * JSON value model
 *
 * A strict tree of readonly nodes. Integers are kept as `bigint` so that
 * every 64-bit value round-trips exactly; numbers with a fractional part are
 * doubles.
 */

export type JsonNumber =
  | { readonly type: "int"; readonly value: bigint }
  | { readonly type: "float"; readonly value: number };

export type JsonValue =
  | { readonly type: "null" }
  | { readonly type: "bool"; readonly value: boolean }
  | { readonly type: "number"; readonly value: JsonNumber }
  | { readonly type: "string"; readonly value: string }
  | { readonly type: "array"; readonly items: readonly JsonValue[] }
  | { readonly type: "object"; readonly entries: ReadonlyMap<string, JsonValue> };

export type JsonValueType = JsonValue["type"];

/** Plain JavaScript form of a JSON value. */
export type PlainJson =
  | null
  | boolean
  | bigint
  | number
  | string
  | PlainJson[]
  | { [key: string]: PlainJson };

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

const NULL: JsonValue = { type: "null" };

export function jsonNull(): JsonValue {
  return NULL;
}

export function jsonBool(value: boolean): JsonValue {
  return { type: "bool", value };
}

export function jsonInt(value: bigint | number): JsonValue {
  return { type: "number", value: { type: "int", value: BigInt(value) } };
}

export function jsonFloat(value: number): JsonValue {
  return { type: "number", value: { type: "float", value } };
}

export function jsonString(value: string): JsonValue {
  return { type: "string", value };
}

export function jsonArray(items: readonly JsonValue[]): JsonValue {
  return { type: "array", items };
}

/**
 * Build an object from key/value pairs. A key that appears more than once
 * keeps its last value.
 */
export function jsonObject(
  entries: Iterable<readonly [string, JsonValue]> | Record<string, JsonValue>
): JsonValue {
  const map = new Map<string, JsonValue>();
  const pairs = isPairIterable(entries) ? entries : Object.entries(entries);
  for (const [key, value] of pairs) {
    map.set(key, value);
  }
  return { type: "object", entries: map };
}

function isPairIterable(
  entries: Iterable<readonly [string, JsonValue]> | Record<string, JsonValue>
): entries is Iterable<readonly [string, JsonValue]> {
  return Symbol.iterator in entries;
}

// ---------------------------------------------------------------------------
// Equality
// ---------------------------------------------------------------------------

/**
 * Structural equality. Object key order is ignored; an `int` never equals a
 * `float`, whatever their values.
 */
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  switch (a.type) {
    case "null":
      return b.type === "null";
    case "bool":
    case "string":
      return b.type === a.type && b.value === a.value;
    case "number":
      return b.type === "number" && numberEquals(a.value, b.value);
    case "array":
      return (
        b.type === "array" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => jsonEquals(item, b.items[i]))
      );
    case "object": {
      if (b.type !== "object" || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !jsonEquals(value, other)) return false;
      }
      return true;
    }
  }
}

function numberEquals(a: JsonNumber, b: JsonNumber): boolean {
  if (a.type === "int") return b.type === "int" && a.value === b.value;
  return b.type === "float" && Object.is(a.value, b.value);
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

/** Convert to plain JavaScript values. Integers stay `bigint`. */
export function toPlainJson(value: JsonValue): PlainJson {
  switch (value.type) {
    case "null":
      return null;
    case "bool":
    case "string":
      return value.value;
    case "number":
      return value.value.value;
    case "array":
      return value.items.map(toPlainJson);
    case "object":
      // fromEntries defines own properties, so "__proto__" stays an ordinary key
      return Object.fromEntries(
        Array.from(value.entries, ([key, item]): [string, PlainJson] => [key, toPlainJson(item)])
      );
  }
}
