/**
 * Parse Tracing
 *
 * Records which named parsers ran, where they started, and how they ended.
 * Useful for working out why an alternation picked (or rejected) a branch.
 *
 * Tracing is off unless `tracing` is configured or `enable()` is called.
 * Events accumulate across parses until `clear()`; callers tracing many
 * inputs should clear between batches.
 */

import { config } from "./config.js";
import type { LogWriter } from "./logger.js";

export type TraceEventKind = "enter" | "success" | "failure";

/**
 * A single trace event.
 */
export interface TraceEvent {
  kind: TraceEventKind;
  /** Name given to the traced parser */
  name: string;
  /** Offset the parser started at */
  offset: number;
  /** Offset after a successful match */
  end?: number;
  /** What a failing parser expected */
  expected?: string;
  /** Nesting depth of traced parsers at the time of the event */
  depth: number;
}

export class ParseTracer {
  private events: TraceEvent[] = [];
  private depth = 0;
  private enabled: boolean | undefined;

  /**
   * Tracing state: an explicit enable()/disable() wins over the `tracing`
   * config value.
   */
  isEnabled(): boolean {
    return this.enabled ?? config.get<boolean>("tracing") ?? false;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  enter(name: string, offset: number): void {
    if (!this.isEnabled()) return;
    this.events.push({ kind: "enter", name, offset, depth: this.depth });
    this.depth++;
  }

  success(name: string, offset: number, end: number): void {
    if (!this.isEnabled()) return;
    this.depth = Math.max(0, this.depth - 1);
    this.events.push({ kind: "success", name, offset, end, depth: this.depth });
  }

  failure(name: string, offset: number, expected: string): void {
    if (!this.isEnabled()) return;
    this.depth = Math.max(0, this.depth - 1);
    this.events.push({ kind: "failure", name, offset, expected, depth: this.depth });
  }

  /**
   * Leave a parser that ended without a result (it threw). Restores the
   * depth; no event is recorded.
   */
  abandon(): void {
    if (!this.isEnabled()) return;
    this.depth = Math.max(0, this.depth - 1);
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  /**
   * Clear all recorded events. The enabled state is kept.
   */
  clear(): void {
    this.events = [];
    this.depth = 0;
  }

  /**
   * One line per event, indented two spaces per depth level.
   *
   * ```
   * > value @0
   *   > number @0
   *   < number @0..3
   * < value @0..3
   * ```
   */
  format(): string {
    return this.events.map(formatEvent).join("\n");
  }

  /**
   * Print the formatted trace (default writer: console.log).
   */
  print(writer: LogWriter = (line) => console.log(line)): void {
    if (this.events.length === 0) return;
    writer(this.format());
  }
}

function formatEvent(event: TraceEvent): string {
  const indent = "  ".repeat(event.depth);
  switch (event.kind) {
    case "enter":
      return `${indent}> ${event.name} @${event.offset}`;
    case "success":
      return `${indent}< ${event.name} @${event.offset}..${event.end}`;
    case "failure":
      return `${indent}! ${event.name} @${event.offset} expected ${event.expected}`;
  }
}

/**
 * Tracer shared by every `traced` parser.
 */
export const globalTracer = new ParseTracer();
