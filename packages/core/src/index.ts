/**
 * @parsnip/core
 *
 * Shared infrastructure for the parsnip parsers:
 * - Configuration (files, PARSNIP_* environment, programmatic)
 * - Diagnostics rendering for parse failures
 * - Parse tracing and `[parsnip]` console output
 */

// Configuration System
export {
  config,
  defineConfig,
  loadConfigFromEnv,
  type ParsnipConfig,
  type DiagnosticsConfig,
  type ConfigResetOptions,
} from "./config.js";

// Console output
export { logger, type LogWriter } from "./logger.js";

// Tracing
export { ParseTracer, globalTracer, type TraceEvent, type TraceEventKind } from "./tracing.js";

// Diagnostics System
export * from "./diagnostics.js";
