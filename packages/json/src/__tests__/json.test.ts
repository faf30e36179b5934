import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, afterEach } from "vitest";
import { config, globalTracer, logger } from "@parsnip/core";
import { ParseError } from "@parsnip/parser";
import {
  parseJson,
  parseJsonOrThrow,
  nullLiteral,
  boolLiteral,
  numberLiteral,
  stringLiteral,
  arrayValue,
  objectValue,
  jsonValue,
  jsonArray,
  jsonBool,
  jsonEquals,
  jsonFloat,
  jsonInt,
  jsonNull,
  jsonObject,
  jsonString,
  toPlainJson,
  type JsonValue,
} from "../index.js";

const ANY_VALUE = '"null" or "true" or "false" or digit or "\\"" or "[" or "{"';

function expectEquivalent(a: JsonValue, b: JsonValue): void {
  expect(jsonEquals(a, b)).toBe(true);
}

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

describe("null and booleans", () => {
  it("parses null", () => {
    expect(parseJsonOrThrow("null")).toEqual({ type: "null" });
  });

  it("parses true and false", () => {
    expect(parseJsonOrThrow("true")).toEqual(jsonBool(true));
    expect(parseJsonOrThrow("false")).toEqual(jsonBool(false));
  });

  it("scalar parsers stop after their literal", () => {
    const r = nullLiteral.parse("null,");
    expect(r.ok && r.cursor.offset).toBe(4);
    const b = boolLiteral.parse("falsey");
    expect(b.ok && b.value).toEqual(jsonBool(false));
  });
});

describe("numbers", () => {
  it("parses non-negative integers exactly", () => {
    expect(parseJsonOrThrow("0")).toEqual(jsonInt(0));
    expect(parseJsonOrThrow("42")).toEqual({
      type: "number",
      value: { type: "int", value: 42n },
    });
    expect(parseJsonOrThrow("9223372036854775807")).toEqual(jsonInt(9223372036854775807n));
  });

  it("negates with a leading minus", () => {
    expect(parseJsonOrThrow("-17")).toEqual(jsonInt(-17n));
  });

  it("parses int.frac as a float", () => {
    expect(parseJsonOrThrow("123.456")).toEqual(jsonFloat(123.456));
    expect(parseJsonOrThrow("-123.456")).toEqual(jsonFloat(-123.456));
  });

  it("keeps leading zeros of the fractional part", () => {
    expect(parseJsonOrThrow("1.05")).toEqual(jsonFloat(1.05));
  });

  it("keeps a zero fraction as a float", () => {
    const v = parseJsonOrThrow("90.0");
    expect(v).toEqual(jsonFloat(90));
    expect(jsonEquals(v, jsonInt(90))).toBe(false);
  });

  it("rejects integers outside the signed 64-bit range as a format failure", () => {
    const result = parseJson("9223372036854775808");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("format");
    expect(result.error.offset).toBe(0);
    expect(result.error.message).toBe(
      "Failed to parse JSON: expected integer within the signed 64-bit range at line 1, column 1"
    );
  });

  it("reports an out-of-range element where it starts", () => {
    const result = parseJson("[1, 99999999999999999999]");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("format");
    expect(result.error.message).toBe(
      "Failed to parse JSON: expected integer within the signed 64-bit range at line 1, column 5 (in array)"
    );
  });

  it("rejects a dot with no digits after it", () => {
    const result = parseJson("1.");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.offset).toBe(1);
    expect(result.error.expected).toBe("end of input");
  });

  it("does not accept exponent notation", () => {
    expect(parseJson("1e5").ok).toBe(false);
  });

  it("numberLiteral fails on a lone minus", () => {
    const r = numberLiteral.parse("-x");
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.cursor.offset).toBe(1);
    expect(r.expected).toBe("digit");
  });
});

describe("strings", () => {
  it("parses text between quotes", () => {
    expect(parseJsonOrThrow('"hello world"')).toEqual(jsonString("hello world"));
    expect(parseJsonOrThrow('""')).toEqual(jsonString(""));
  });

  it("takes backslashes literally", () => {
    expect(parseJsonOrThrow('"a\\nb"')).toEqual(jsonString("a\\nb"));
  });

  it("fails without a closing quote", () => {
    const r = stringLiteral.parse('"abc');
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.cursor.offset).toBe(1);
    expect(r.expected).toBe("closing quote");
  });
});

// ---------------------------------------------------------------------------
// Containers
// ---------------------------------------------------------------------------

describe("arrays", () => {
  it("accepts an empty array", () => {
    expect(parseJsonOrThrow("[]")).toEqual(jsonArray([]));
    expect(parseJsonOrThrow("[ \n ]")).toEqual(jsonArray([]));
  });

  it("keeps element order and mixed types", () => {
    expect(parseJsonOrThrow('[1, 2.5, "x", null, true, [false]]')).toEqual(
      jsonArray([
        jsonInt(1),
        jsonFloat(2.5),
        jsonString("x"),
        jsonNull(),
        jsonBool(true),
        jsonArray([jsonBool(false)]),
      ])
    );
  });

  it("leaves a trailing comma for the closing bracket to reject", () => {
    const r = arrayValue.parse("[1, 2,]");
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.cursor.offset).toBe(5);
    expect(r.expected).toBe('"]"');
    expect(r.context).toEqual(["array"]);
    expect(parseJson("[1, 2,]").ok).toBe(false);
  });
});

describe("objects", () => {
  it("ignores key order", () => {
    expectEquivalent(parseJsonOrThrow('{"a":1,"b":2}'), parseJsonOrThrow('{"b":2,"a":1}'));
  });

  it("builds a map of entries", () => {
    const v = parseJsonOrThrow('{"name": "parsnip", "size": 3}');
    expect(v.type).toBe("object");
    if (v.type !== "object") return;
    expect(v.entries.get("name")).toEqual(jsonString("parsnip"));
    expect(v.entries.get("size")).toEqual(jsonInt(3));
  });

  it("keeps the last value of a duplicate key", () => {
    const v = parseJsonOrThrow('{"k": 1, "k": 2}');
    expect(v.type === "object" && v.entries.size).toBe(1);
    expectEquivalent(v, jsonObject({ k: jsonInt(2) }));
  });

  it("rejects an empty object", () => {
    const r = objectValue.parse("{}");
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.cursor.offset).toBe(1);
    expect(r.expected).toBe('"\\""');
    expect(r.context).toEqual(["object"]);

    const result = parseJson("{}");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.offset).toBe(0);
    // the object branch failed on the key quote, which the string branch already listed
    expect(result.error.expected).toBe('"null" or "true" or "false" or digit or "\\"" or "["');
  });

  it("leaves a trailing comma for the closing brace to reject", () => {
    const r = objectValue.parse('{"a":1,}');
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.cursor.offset).toBe(6);
    expect(r.expected).toBe('"}"');
  });
});

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

describe("documents", () => {
  const compact = '{"a":[1,2],"b":{"c":null}}';
  const spaced = '\n{ "a" : [ 1 ,\t2 ] ,\r\n "b" : { "c" : null } }\n';

  it("is insensitive to whitespace around punctuation", () => {
    expectEquivalent(parseJsonOrThrow(compact), parseJsonOrThrow(spaced));
  });

  it("parses a nested document", () => {
    const text = `{
      "title": "Root vegetables",
      "servings": 4,
      "vegan": true,
      "weights": [120.5, -3.25, 80.0],
      "origin": {
        "farm": "Hillside",
        "plot": 17
      }
    }`;
    expect(toPlainJson(parseJsonOrThrow(text))).toEqual({
      title: "Root vegetables",
      servings: 4n,
      vegan: true,
      weights: [120.5, -3.25, 80],
      origin: { farm: "Hillside", plot: 17n },
    });
  });

  it("requires the whole input to be consumed", () => {
    const result = parseJson("42 x");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      "Failed to parse JSON: expected end of input at line 1, column 4"
    );
    expect(result.error.remaining).toBe("x");
  });

  it("lists every alternative when no value starts here", () => {
    const result = parseJson("?");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("token");
    expect(result.error.expected).toBe(ANY_VALUE);
  });

  it("parseJsonOrThrow throws a ParseError", () => {
    expect(() => parseJsonOrThrow("[1,")).toThrow(ParseError);
    expect(() => parseJsonOrThrow("")).toThrow(/^Failed to parse JSON: expected /);
  });

  it("jsonValue is usable without the document wrapper", () => {
    const r = jsonValue.parse("[true] rest");
    expect(r.ok && r.cursor.offset).toBe(6);
  });
});

// ---------------------------------------------------------------------------
// Ambient: tracing and logging
// ---------------------------------------------------------------------------

describe("tracing and logging", () => {
  afterEach(() => {
    globalTracer.disable();
    globalTracer.clear();
    logger.setWriters();
    config.reset();
  });

  it("records the rules a parse went through", () => {
    globalTracer.enable();
    parseJsonOrThrow("null");
    expect(globalTracer.getEvents().map((e) => `${e.kind} ${e.name}`)).toEqual([
      "enter value",
      "enter null",
      "success null",
      "success value",
    ]);
  });

  it("logs failures when verbose", () => {
    const lines: string[] = [];
    config.set({ verbose: true });
    logger.setWriters({ log: (line) => lines.push(line) });
    parseJson("nul");
    expect(lines).toEqual([
      `[parsnip] Failed to parse JSON: expected ${ANY_VALUE} at line 1, column 1`,
    ]);
  });

  it("reads the config file on the first parse", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "parsnip-json-"));
    try {
      fs.writeFileSync(path.join(dir, ".parsniprc.json"), JSON.stringify({ verbose: true }));
      config.reset({ searchFrom: dir });
      const lines: string[] = [];
      logger.setWriters({ log: (line) => lines.push(line) });

      parseJson("nul");

      expect(config.getConfigFilePath()).toBe(path.join(dir, ".parsniprc.json"));
      expect(lines).toEqual([
        `[parsnip] Failed to parse JSON: expected ${ANY_VALUE} at line 1, column 1`,
      ]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("stays quiet by default", () => {
    const lines: string[] = [];
    config.set({ verbose: false });
    logger.setWriters({ log: (line) => lines.push(line) });
    parseJson("nul");
    expect(lines).toEqual([]);
  });
});
