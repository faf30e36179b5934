import type { HttpMethod, HttpVersion } from "./http.js";

export interface Ipv4Address {
  readonly octets: readonly [number, number, number, number];
}

/**
 * One line of the NGINX "combined" access log.
 *
 * ```
 * $remote_addr - $remote_user [$time_local] "$request" $status $body_bytes_sent "$http_referer" "$http_user_agent"
 * ```
 *
 * The remote user is not kept: the grammar only accepts `- -` there.
 */
export interface NginxLogRecord {
  readonly address: Ipv4Address;
  /** Request time as a UTC instant, second resolution. */
  readonly timestamp: Date;
  readonly method: HttpMethod;
  /** Request target exactly as logged. */
  readonly path: string;
  readonly httpVersion: HttpVersion;
  readonly status: number;
  /** Response body size in bytes. */
  readonly size: bigint;
  readonly referer: string;
  readonly userAgent: string;
}

export function formatIpv4(address: Ipv4Address): string {
  return address.octets.join(".");
}
