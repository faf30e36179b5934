import type { Converted } from "@parsnip/parser";

export type HttpMethod =
  | "GET"
  | "POST"
  | "PUT"
  | "DELETE"
  | "HEAD"
  | "OPTIONS"
  | "CONNECT"
  | "TRACE"
  | "PATCH";

export type HttpVersion = "HTTP/1.0" | "HTTP/1.1" | "HTTP/2.0" | "HTTP/3.0";

export const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "DELETE",
  "HEAD",
  "OPTIONS",
  "CONNECT",
  "TRACE",
  "PATCH",
];

export const HTTP_VERSIONS: readonly HttpVersion[] = ["HTTP/1.0", "HTTP/1.1", "HTTP/2.0", "HTTP/3.0"];

function accept<T>(value: T): Converted<T> {
  return { ok: true, value };
}

/** Case-sensitive: `get` is not a method. */
export function toHttpMethod(token: string): Converted<HttpMethod> {
  switch (token) {
    case "GET":
      return accept("GET");
    case "POST":
      return accept("POST");
    case "PUT":
      return accept("PUT");
    case "DELETE":
      return accept("DELETE");
    case "HEAD":
      return accept("HEAD");
    case "OPTIONS":
      return accept("OPTIONS");
    case "CONNECT":
      return accept("CONNECT");
    case "TRACE":
      return accept("TRACE");
    case "PATCH":
      return accept("PATCH");
    default:
      return { ok: false, expected: `HTTP method (${HTTP_METHODS.join(", ")})` };
  }
}

export function toHttpVersion(token: string): Converted<HttpVersion> {
  switch (token) {
    case "HTTP/1.0":
      return accept("HTTP/1.0");
    case "HTTP/1.1":
      return accept("HTTP/1.1");
    case "HTTP/2.0":
      return accept("HTTP/2.0");
    case "HTTP/3.0":
      return accept("HTTP/3.0");
    default:
      return { ok: false, expected: `HTTP version (${HTTP_VERSIONS.join(", ")})` };
  }
}
