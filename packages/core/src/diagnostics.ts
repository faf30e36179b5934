/**
 * Diagnostics for parse failures
 *
 * Renders a failure against the text it came from, compiler-style:
 *
 * ```
 * error[P0001]: unexpected input: expected "]"
 *   --> request.json:1:6
 *     |
 *   1 | [1, 2,]
 *     |      ^
 *     |
 *     = note: in array
 * ```
 */

import { config } from "./config.js";
import type { LogWriter } from "./logger.js";

// ============================================================================
// Diagnostic Codes
// ============================================================================

export type Severity = "error" | "warning";

/**
 * Catalog entry for a diagnostic code.
 */
export interface DiagnosticDescriptor {
  readonly code: string;
  readonly severity: Severity;
  readonly summary: string;
}

/** Expected token or character class not found. */
export const P0001: DiagnosticDescriptor = {
  code: "P0001",
  severity: "error",
  summary: "unexpected input",
};

/** Matched token is not one of the accepted literals. */
export const P0002: DiagnosticDescriptor = {
  code: "P0002",
  severity: "error",
  summary: "unrecognized literal",
};

/** Matched text is malformed or out of range. */
export const P0003: DiagnosticDescriptor = {
  code: "P0003",
  severity: "error",
  summary: "malformed literal",
};

// ============================================================================
// Diagnostic Type
// ============================================================================

export interface SourceDiagnostic {
  severity: Severity;
  code: string;
  message: string;
  /** Full text the offset points into */
  source: string;
  /** File or stream name shown on the location line */
  sourceName?: string;
  /** Zero-based offset of the primary span */
  offset: number;
  /** Length of the primary span (default 1) */
  length?: number;
  notes: string[];
  help?: string;
}

// ============================================================================
// CLI Renderer
// ============================================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  green: "\x1b[32m",
} as const;

type ColorName = Exclude<keyof typeof COLORS, "reset">;

/**
 * Environment opt-outs first, then the `diagnostics.colors` config value.
 */
function colorsEnabled(): boolean {
  const env = process.env;
  if (env.NO_COLOR || env.PARSNIP_NO_COLOR || env.FORCE_COLOR === "0") return false;
  return config.get<boolean>("diagnostics.colors") ?? true;
}

/**
 * 1-based line and column of an offset.
 */
export function lineAndColumn(source: string, offset: number): { line: number; column: number } {
  let line = 1;
  let column = 1;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source[i] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column };
}

export interface RenderOptions {
  /** Whether to use colors (default: auto-detect) */
  colors?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: LogWriter;
}

/**
 * Render a diagnostic as a multi-line string.
 */
export function renderDiagnostic(diagnostic: SourceDiagnostic, options: RenderOptions = {}): string {
  const useColors = options.colors ?? colorsEnabled();
  const color = (text: string, ...styles: ColorName[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const severityClr: ColorName = diagnostic.severity === "error" ? "red" : "yellow";
  const { line, column } = lineAndColumn(diagnostic.source, diagnostic.offset);
  const lineText = diagnostic.source.split("\n")[line - 1] ?? "";
  const width = Math.max(2, String(line).length);
  const gutter = " ".repeat(width);
  const bar = color("|", "blue");

  const lines: string[] = [];
  lines.push(
    `${color(`${diagnostic.severity}[${diagnostic.code}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`
  );
  lines.push(`  ${color("-->", "blue")} ${diagnostic.sourceName ?? "<input>"}:${line}:${column}`);
  lines.push(` ${gutter} ${bar}`);
  lines.push(` ${color(String(line).padStart(width, " "), "blue")} ${bar} ${lineText}`);

  const underline = " ".repeat(column - 1) + "^".repeat(Math.max(1, diagnostic.length ?? 1));
  lines.push(` ${gutter} ${bar} ${color(underline, severityClr)}`);

  if (diagnostic.notes.length > 0 || diagnostic.help) {
    lines.push(` ${gutter} ${bar}`);
  }
  for (const note of diagnostic.notes) {
    lines.push(` ${gutter} ${color("= note:", "bold")} ${note}`);
  }
  if (diagnostic.help) {
    lines.push(` ${gutter} ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  return lines.join("\n");
}

/**
 * Print a diagnostic to the console (stderr).
 */
export function printDiagnostic(diagnostic: SourceDiagnostic, options: RenderOptions = {}): void {
  const writer = options.writer ?? ((line: string) => console.error(line));
  writer(renderDiagnostic(diagnostic, options));
}
