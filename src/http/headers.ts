/**
 * Header helpers shared by the proxy and the read API.
 *
 * Client identity comes from headers injected by the trusted edge in front of
 * this process. Nothing here checks that the edge is really there; deployment
 * topology is what makes those headers trustworthy.
 */

import type { ClientIdentity } from "../types.js";

export type HeaderMap = Record<string, string | string[] | undefined>;

/** Real client IP as seen by the edge. */
export const CLIENT_IP_HEADER = "cf-connecting-ip";
/** Two-letter country code as seen by the edge. */
export const COUNTRY_HEADER = "cf-ipcountry";
export const FORWARDED_FOR_HEADER = "x-forwarded-for";

export const UNKNOWN_COUNTRY = "XX";
export const UNKNOWN_CLIENT = "unknown";

/**
 * Read a header as a single string.
 *
 * Node lowercases incoming header names; repeated headers arrive as arrays
 * and only the first value is used.
 */
export function headerValue(headers: HeaderMap, name: string): string {
  const value = headers[name.toLowerCase()];
  if (Array.isArray(value)) return value[0] ?? "";
  return value ?? "";
}

/**
 * Strip a trailing `:port` from an address.
 *
 * Handles `1.2.3.4:80`, `[::1]:80` and bare IPv6 literals (left alone).
 * IPv4-mapped IPv6 addresses (`::ffff:1.2.3.4`) are reduced to IPv4.
 */
export function stripPort(addr: string): string {
  let out = addr.trim();
  if (out.startsWith("[")) {
    const end = out.indexOf("]");
    out = end === -1 ? out.slice(1) : out.slice(1, end);
  } else {
    const colons = out.split(":").length - 1;
    if (colons === 1) out = out.slice(0, out.indexOf(":"));
  }
  if (out.toLowerCase().startsWith("::ffff:") && out.includes(".")) {
    out = out.slice("::ffff:".length);
  }
  return out;
}

/**
 * Resolve who is connecting.
 *
 * Precedence: trusted client-IP header, then the first X-Forwarded-For
 * entry, then the socket peer address.
 */
export function extractClientIdentity(
  headers: HeaderMap,
  remoteAddress: string | undefined,
): ClientIdentity {
  let clientIp = headerValue(headers, CLIENT_IP_HEADER).trim();
  if (!clientIp) {
    clientIp = headerValue(headers, FORWARDED_FOR_HEADER).split(",")[0].trim();
  }
  if (!clientIp && remoteAddress) {
    clientIp = stripPort(remoteAddress);
  }

  const country = headerValue(headers, COUNTRY_HEADER).trim();

  return {
    clientIp: clientIp || UNKNOWN_CLIENT,
    country: country || UNKNOWN_COUNTRY,
  };
}

/** Lowercase a Host header value and drop its port. */
export function normalizeHost(host: string | undefined): string {
  if (!host) return "";
  const lowered = host.trim().toLowerCase();
  if (lowered.startsWith("[")) {
    const end = lowered.indexOf("]");
    return end === -1 ? lowered : lowered.slice(0, end + 1);
  }
  const colon = lowered.indexOf(":");
  return colon === -1 ? lowered : lowered.slice(0, colon);
}

/** True when the Upgrade header carries a `websocket` token. */
export function isWebSocketUpgrade(headers: HeaderMap): boolean {
  return headerValue(headers, "upgrade")
    .split(",")
    .some((token) => token.trim().toLowerCase() === "websocket");
}

/** Request path without the query string. */
export function requestPath(rawUrl: string | undefined): string {
  if (!rawUrl) return "/";
  let target = rawUrl;
  // Absolute-form targets (`GET http://host/path`) keep only their path.
  const scheme = target.match(/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\/[^/?#]*/);
  if (scheme) target = target.slice(scheme[0].length);
  const q = target.search(/[?#]/);
  const path = q === -1 ? target : target.slice(0, q);
  return path || "/";
}
