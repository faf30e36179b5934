/**
 * @parsnip/nginx - NGINX combined access log lines
 *
 * @example
 * ```typescript
 * import { parseNginxLog, formatIpv4 } from "@parsnip/nginx";
 *
 * const result = parseNginxLog(line);
 * if (result.ok) {
 *   console.log(formatIpv4(result.value.address), result.value.status);
 * }
 * ```
 */

import { logger } from "@parsnip/core";
import { runParser, type ParseOutcome } from "@parsnip/parser";
import { nginxLogLine } from "./grammar.js";
import type { NginxLogRecord } from "./record.js";

const ERROR_PREFIX = "Failed to parse log";

/**
 * Parse one log line. The line must not carry its trailing newline.
 *
 * Like `parseJson`, the first call loads configuration, including the
 * config file search, if nothing has read it yet.
 */
export function parseNginxLog(line: string): ParseOutcome<NginxLogRecord> {
  const outcome = runParser(nginxLogLine, line, { prefix: ERROR_PREFIX });
  if (!outcome.ok) {
    logger.verbose(outcome.error.message);
  }
  return outcome;
}

export function parseNginxLogOrThrow(line: string): NginxLogRecord {
  const outcome = parseNginxLog(line);
  if (!outcome.ok) throw outcome.error;
  return outcome.value;
}

export {
  ipv4Address,
  identityFields,
  timestamp,
  requestLine,
  statusCode,
  responseSize,
  quotedField,
  nginxLogLine,
} from "./grammar.js";
export type { RequestLine } from "./grammar.js";

export { toHttpMethod, toHttpVersion, HTTP_METHODS, HTTP_VERSIONS } from "./http.js";
export type { HttpMethod, HttpVersion } from "./http.js";

export { parseTimestampText } from "./timestamp.js";

export { formatIpv4 } from "./record.js";
export type { Ipv4Address, NginxLogRecord } from "./record.js";
