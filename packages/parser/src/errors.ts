import { config, P0001, P0002, P0003, type SourceDiagnostic } from "@parsnip/core";
import { lineCol, remaining } from "./cursor.js";
import type { FailureKind, ParseFailure } from "./types.js";

export interface ParseErrorOptions {
  /** Prepended to the message, e.g. "Failed to parse JSON" */
  prefix?: string;
}

const DIAGNOSTIC_FOR_KIND = {
  token: P0001,
  conversion: P0002,
  format: P0003,
} as const satisfies Record<FailureKind, unknown>;

/** Descriptive parse error with position context. */
export class ParseError extends Error {
  /** Zero-based offset in the input where parsing failed. */
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  /** What the parser expected at the failure position. */
  readonly expected: string;
  readonly kind: FailureKind;
  readonly context: readonly string[];
  /** Start of the unconsumed input at the failure point (truncated). */
  readonly remaining: string;
  readonly input: string;

  constructor(failure: ParseFailure, options: ParseErrorOptions = {}) {
    const { line, column } = lineCol(failure.cursor);
    const where = failure.context.length > 0 ? ` (in ${failure.context.join(" > ")})` : "";
    const prefix = options.prefix ? `${options.prefix}: ` : "";
    super(`${prefix}expected ${failure.expected} at line ${line}, column ${column}${where}`);
    this.name = "ParseError";
    this.offset = failure.cursor.offset;
    this.line = line;
    this.column = column;
    this.expected = failure.expected;
    this.kind = failure.kind;
    this.context = failure.context;
    this.input = failure.cursor.input;
    this.remaining = remaining(failure.cursor).slice(
      0,
      config.get<number>("diagnostics.contextChars") ?? 40
    );
  }

  /** The error as a renderable diagnostic. */
  toDiagnostic(sourceName?: string): SourceDiagnostic {
    const descriptor = DIAGNOSTIC_FOR_KIND[this.kind];
    const notes = this.context.length > 0 ? [`in ${this.context.join(" > ")}`] : [];
    return {
      severity: descriptor.severity,
      code: descriptor.code,
      message: `${descriptor.summary}: expected ${this.expected}`,
      source: this.input,
      sourceName,
      offset: this.offset,
      notes,
    };
  }
}
