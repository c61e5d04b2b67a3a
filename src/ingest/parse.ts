/**
 * Tunnel daemon log line parsing.
 *
 * The daemon writes either JSON lines or `key=value` text depending on its
 * log format setting. Both are reduced to a DaemonEvent, then classified as
 * a connection worth recording or noise.
 */

import * as v from "valibot";

import { DaemonLogEntrySchema } from "../schemas.js";
import type { ConnectionInput } from "../types.js";

/** What a log line says about one request; `""` when a field is absent. */
export interface DaemonEvent {
  time: string;
  message: string;
  clientIp: string;
  hostname: string;
  originUrl: string;
  path: string;
  method: string;
}

export type LineParser = (line: string) => DaemonEvent | null;

export type SkipReason = "empty" | "too-long" | "unparseable" | "no-request-fields" | "infrastructure";

export type LineClassification =
  | { kind: "record"; input: ConnectionInput }
  | { kind: "skip"; reason: SkipReason; detail: string };

/** Messages the daemon logs about its own lifecycle, not about clients. */
export const INFRASTRUCTURE_MESSAGES = [
  "Registered tunnel connection",
  "Initial protocol",
  "Connection established",
  "Starting tunnel",
  "Updated to new configuration",
];

export const DEFAULT_METHOD = "GET";

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

export const jsonLineParser: LineParser = (line) => {
  const trimmed = line.trim();
  if (!trimmed.startsWith("{")) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return null;
  }
  const result = v.safeParse(DaemonLogEntrySchema, raw);
  if (!result.success) return null;

  const entry = result.output;
  return {
    time: entry.time ?? "",
    message: entry.message || entry.msg || "",
    clientIp: entry.clientIP || entry.ip || "",
    hostname: entry.hostname ?? "",
    originUrl: entry.originURL ?? "",
    path: entry.path ?? "",
    method: entry.method ?? "",
  };
};

const KEY_VALUE_PATTERNS = {
  clientIp: /\b(?:ip|clientIP|client_ip)=["']?([0-9a-fA-F.:]+)["']?/,
  hostname: /\b(?:host|hostname)=["']?([a-zA-Z0-9.-]+)["']?/,
  path: /\b(?:path|uri|url)=["']?([^\s"']+)["']?/,
  method: /\bmethod=["']?([A-Z]+)["']?/,
  originUrl: /\boriginURL=["']?([^\s"']+)["']?/,
  time: /\btime=["']?([^\s"']+)["']?/,
  message: /\bmsg=(?:"([^"]*)"|(\S+))/,
};

function capture(line: string, pattern: RegExp): string {
  const m = line.match(pattern);
  if (!m) return "";
  return m[1] ?? m[2] ?? "";
}

export const keyValueLineParser: LineParser = (line) => ({
  time: capture(line, KEY_VALUE_PATTERNS.time),
  message: capture(line, KEY_VALUE_PATTERNS.message),
  clientIp: capture(line, KEY_VALUE_PATTERNS.clientIp),
  hostname: capture(line, KEY_VALUE_PATTERNS.hostname),
  originUrl: capture(line, KEY_VALUE_PATTERNS.originUrl),
  path: capture(line, KEY_VALUE_PATTERNS.path),
  method: capture(line, KEY_VALUE_PATTERNS.method),
});

const PARSERS: LineParser[] = [jsonLineParser, keyValueLineParser];

/** Run the parser chain; the first parser that recognizes the line wins. */
export function parseLine(line: string, parsers: LineParser[] = PARSERS): DaemonEvent | null {
  for (const parser of parsers) {
    const event = parser(line);
    if (event) return event;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

function stripScheme(url: string): string {
  return url.replace(/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//, "");
}

/** Host part of an origin URL, without scheme or port. */
export function hostFromUrl(url: string): string {
  let rest = stripScheme(url);
  const slash = rest.indexOf("/");
  if (slash !== -1) rest = rest.slice(0, slash);
  if (rest.startsWith("[")) {
    const end = rest.indexOf("]");
    return end === -1 ? rest : rest.slice(0, end + 1);
  }
  const colon = rest.indexOf(":");
  return colon === -1 ? rest : rest.slice(0, colon);
}

/** Path part of an origin URL; `/` when it has none. */
export function pathFromUrl(url: string): string {
  const rest = stripScheme(url);
  const slash = rest.indexOf("/");
  return slash === -1 ? "/" : rest.slice(slash);
}

function withoutQuery(path: string): string {
  const q = path.search(/[?#]/);
  return q === -1 ? path : path.slice(0, q);
}

const RFC3339 = /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

/** Parse an RFC 3339 timestamp, or null when the text is not one. */
export function parseRfc3339(text: string): Date | null {
  const trimmed = text.trim();
  if (!RFC3339.test(trimmed)) return null;
  const date = new Date(trimmed.replace(" ", "T"));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Decide whether a parsed line describes a client request and, if so, turn
 * it into a connection record.
 */
export function classifyLine(event: DaemonEvent, rawLine: string, now: Date = new Date()): LineClassification {
  if (!event.clientIp && !event.hostname && !event.originUrl) {
    return { kind: "skip", reason: "no-request-fields", detail: "no client IP, hostname or origin" };
  }

  const haystack = event.message || rawLine;
  const noise = INFRASTRUCTURE_MESSAGES.find((m) => haystack.includes(m));
  if (noise) {
    return { kind: "skip", reason: "infrastructure", detail: noise };
  }

  const hostname = event.hostname || (event.originUrl ? hostFromUrl(event.originUrl) : "");
  const rawPath = event.path || (event.originUrl ? pathFromUrl(event.originUrl) : "");

  return {
    kind: "record",
    input: {
      timestamp: (event.time && parseRfc3339(event.time)) || now,
      clientIp: event.clientIp,
      country: "",
      method: event.method || DEFAULT_METHOD,
      path: withoutQuery(rawPath),
      host: hostname,
      userAgent: "",
      referer: "",
      source: "daemon-log",
    },
  };
}
