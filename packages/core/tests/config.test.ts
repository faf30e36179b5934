/**
 * Tests for the configuration store
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, defineConfig, loadConfigFromEnv } from "../src/config.js";
import { logger } from "../src/logger.js";

// ============================================================================
// Test Helpers
// ============================================================================

let tmpDir: string;

function writeRc(name: string, contents: string): void {
  fs.writeFileSync(path.join(tmpDir, name), contents);
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "parsnip-config-"));
  config.reset({ searchFrom: tmpDir });
});

afterEach(() => {
  config.reset();
  logger.setWriters();
  vi.unstubAllEnvs();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ============================================================================
// config.get / config.set
// ============================================================================

describe("config.get and config.set", () => {
  it("should return default values", () => {
    expect(config.get("tracing")).toBe(false);
    expect(config.get("verbose")).toBe(false);
    expect(config.get("diagnostics.colors")).toBe(true);
    expect(config.get("diagnostics.contextChars")).toBe(40);
  });

  it("should set nested values without dropping siblings", () => {
    config.set({ diagnostics: { colors: false } });
    expect(config.get("diagnostics.colors")).toBe(false);
    expect(config.get("diagnostics.contextChars")).toBe(40);
  });

  it("should return undefined for non-existent paths", () => {
    expect(config.get("nonexistent")).toBeUndefined();
    expect(config.get("diagnostics.colors.deeper")).toBeUndefined();
  });

  it("should report truthiness with has", () => {
    expect(config.has("tracing")).toBe(false);
    config.set({ tracing: true });
    expect(config.has("tracing")).toBe(true);
  });

  it("should forget set values on reset", () => {
    config.set({ verbose: true });
    config.reset({ searchFrom: tmpDir });
    expect(config.get("verbose")).toBe(false);
  });

  it("defineConfig should return its argument", () => {
    const cfg = { tracing: true };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});

// ============================================================================
// Environment variables
// ============================================================================

describe("loadConfigFromEnv", () => {
  it("should map PARSNIP_* variables to config paths", () => {
    expect(
      loadConfigFromEnv({
        PARSNIP_TRACING: "1",
        PARSNIP_DIAGNOSTICS_COLORS: "0",
        PARSNIP_DIAGNOSTICS_CONTEXTCHARS: "12",
        PARSNIP_VERBOSE: "true",
        HOME: "/home/test",
      })
    ).toEqual({
      tracing: true,
      verbose: true,
      diagnostics: { colors: false, contextChars: 12 },
    });
  });

  it("should treat empty and false as false", () => {
    expect(loadConfigFromEnv({ PARSNIP_TRACING: "", PARSNIP_VERBOSE: "false" })).toEqual({
      tracing: false,
      verbose: false,
    });
  });

  it("should keep other strings as they are", () => {
    expect(loadConfigFromEnv({ PARSNIP_PROFILE: "ci" })).toEqual({ profile: "ci" });
  });

  it("should skip PARSNIP_NO_COLOR", () => {
    expect(loadConfigFromEnv({ PARSNIP_NO_COLOR: "1" })).toEqual({});
  });
});

// ============================================================================
// Config files and precedence
// ============================================================================

describe("config files", () => {
  it("should load .parsniprc.json from the search directory", () => {
    writeRc(".parsniprc.json", JSON.stringify({ diagnostics: { contextChars: 12 } }));
    expect(config.get("diagnostics.contextChars")).toBe(12);
    expect(config.get("diagnostics.colors")).toBe(true);
    expect(config.getConfigFilePath()).toBe(path.join(tmpDir, ".parsniprc.json"));
  });

  it("should load the parsnip key of package.json", () => {
    writeRc("package.json", JSON.stringify({ name: "fixture", parsnip: { verbose: true } }));
    expect(config.get("verbose")).toBe(true);
  });

  it("should report no file when none exists", () => {
    expect(config.getConfigFilePath()).toBeUndefined();
  });

  it("should apply defaults < file < env < set()", () => {
    writeRc(".parsniprc.json", JSON.stringify({ tracing: true, verbose: true }));
    vi.stubEnv("PARSNIP_VERBOSE", "0");
    vi.stubEnv("PARSNIP_DIAGNOSTICS_CONTEXTCHARS", "8");

    expect(config.get("tracing")).toBe(true);
    expect(config.get("verbose")).toBe(false);
    expect(config.get("diagnostics.contextChars")).toBe(8);

    config.set({ tracing: false, diagnostics: { contextChars: 4 } });
    expect(config.get("tracing")).toBe(false);
    expect(config.get("diagnostics.contextChars")).toBe(4);
  });

  it("should warn about and ignore an unreadable file", () => {
    const warnings: string[] = [];
    logger.setWriters({ warn: (line) => warnings.push(line) });
    writeRc(".parsniprc.json", "{ not json");

    expect(config.get("tracing")).toBe(false);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^\[parsnip\] Ignoring unreadable config file: /);
  });
});
