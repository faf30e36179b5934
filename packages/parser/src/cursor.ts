import { lineAndColumn } from "@parsnip/core";
import type { Cursor } from "./types.js";

export function cursor(input: string, offset = 0): Cursor {
  return { input, offset };
}

/** A new cursor `n` characters further on. The original is untouched. */
export function advance(c: Cursor, n: number): Cursor {
  return { input: c.input, offset: Math.min(c.input.length, c.offset + n) };
}

/** The unconsumed input. */
export function remaining(c: Cursor): string {
  return c.input.slice(c.offset);
}

export function atEnd(c: Cursor): boolean {
  return c.offset >= c.input.length;
}

/** Next character, or undefined at end of input. */
export function peek(c: Cursor): string | undefined {
  return atEnd(c) ? undefined : c.input[c.offset];
}

/** 1-based line/column of the cursor. */
export function lineCol(c: Cursor): { line: number; column: number } {
  return lineAndColumn(c.input, c.offset);
}
