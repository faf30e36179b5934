/**
 * NGINX combined log line grammar
 *
 * Fields are strictly sequential; each one consumes its token and then any
 * run of spaces after it:
 *
 * ```
 * 93.180.71.3 - - [17/May/2015:08:05:32 +0000] "GET /downloads/product_1 HTTP/1.1" 304 0 "-" "Debian APT-HTTP/1.3 (0.8.16~exp12ubuntu10.21)"
 * ```
 */

import {
  between,
  char,
  digits,
  label,
  literal,
  map,
  preceded,
  seq,
  space0,
  takeTill,
  takeUntil,
  takeWhile,
  terminated,
  traced,
  tryMap,
  type Converted,
  type Parser,
} from "@parsnip/parser";
import { toHttpMethod, toHttpVersion, type HttpMethod, type HttpVersion } from "./http.js";
import type { Ipv4Address, NginxLogRecord } from "./record.js";
import { parseTimestampText } from "./timestamp.js";

const U16_MAX = 0xffff;
const U64_MAX = 2n ** 64n - 1n;

/** `p` followed by any spaces. */
function field<T>(name: string, p: Parser<T>): Parser<T> {
  return traced(name, label(name, terminated(p, space0())));
}

// ---------------------------------------------------------------------------
// Address
// ---------------------------------------------------------------------------

const octet = tryMap(
  digits(),
  (text): Converted<number> => {
    const n = Number(text);
    return n <= 255 ? { ok: true, value: n } : { ok: false, expected: "octet between 0 and 255" };
  },
  "format"
);

const dot = char(".");

export const ipv4Address: Parser<Ipv4Address> = field(
  "address",
  map(
    seq(octet, preceded(dot, octet), preceded(dot, octet), preceded(dot, octet)),
    ([a, b, c, d]): Ipv4Address => ({ octets: [a, b, c, d] })
  )
);

// ---------------------------------------------------------------------------
// Identity and timestamp
// ---------------------------------------------------------------------------

/** `$remote_ident` and `$remote_user`, which must both be `-`. */
export const identityFields: Parser<string> = traced("identity", label("identity", literal("- - ")));

export const timestamp: Parser<Date> = field(
  "timestamp",
  tryMap(
    between(char("["), takeTill("]"), char("]")),
    parseTimestampText,
    "format"
  )
);

// ---------------------------------------------------------------------------
// Request line
// ---------------------------------------------------------------------------

function token(expected: string): Parser<string> {
  return takeWhile((ch) => ch !== " " && ch !== '"', { min: 1, expected });
}

const method: Parser<HttpMethod> = terminated(tryMap(token("HTTP method"), toHttpMethod), space0());

const path: Parser<string> = terminated(takeTill(" ", { min: 1, expected: "request path" }), space0());

const httpVersion: Parser<HttpVersion> = terminated(
  tryMap(token("HTTP version"), toHttpVersion),
  space0()
);

export interface RequestLine {
  method: HttpMethod;
  path: string;
  httpVersion: HttpVersion;
}

export const requestLine: Parser<RequestLine> = field(
  "request",
  map(between(char('"'), seq(method, path, httpVersion), char('"')), ([m, p, v]): RequestLine => ({
    method: m,
    path: p,
    httpVersion: v,
  }))
);

// ---------------------------------------------------------------------------
// Status, size, quoted fields
// ---------------------------------------------------------------------------

export const statusCode: Parser<number> = field(
  "status",
  tryMap(
    digits(),
    (text): Converted<number> => {
      const n = Number(text);
      return n <= U16_MAX
        ? { ok: true, value: n }
        : { ok: false, expected: "status code between 0 and 65535" };
    },
    "format"
  )
);

export const responseSize: Parser<bigint> = field(
  "size",
  tryMap(
    digits(),
    (text): Converted<bigint> => {
      const n = BigInt(text);
      return n <= U64_MAX
        ? { ok: true, value: n }
        : { ok: false, expected: "size within the unsigned 64-bit range" };
    },
    "format"
  )
);

/** Non-empty text between double quotes, taken verbatim. */
export function quotedField(name: string): Parser<string> {
  return field(
    name,
    between(char('"'), takeUntil('"', { min: 1, expected: "quoted text" }), char('"'))
  );
}

// ---------------------------------------------------------------------------
// Line
// ---------------------------------------------------------------------------

export const nginxLogLine: Parser<NginxLogRecord> = traced(
  "line",
  map(
    seq(
      ipv4Address,
      identityFields,
      timestamp,
      requestLine,
      statusCode,
      responseSize,
      quotedField("referer"),
      quotedField("user agent")
    ),
    ([address, , time, request, status, size, referer, userAgent]): NginxLogRecord => ({
      address,
      timestamp: time,
      method: request.method,
      path: request.path,
      httpVersion: request.httpVersion,
      status,
      size,
      referer,
      userAgent,
    })
  )
);
