/**
 * Valibot schemas for data that crosses a trust boundary:
 * - the route configuration file written by the operator
 * - JSON log lines emitted by the tunnel daemon
 *
 * The TypeScript interfaces in types.ts stay the source of truth for
 * in-memory types.
 */

import * as v from "valibot";

// ---------------------------------------------------------------------------
// Route configuration
// ---------------------------------------------------------------------------

export const RouteConfigEntrySchema = v.object({
  host: v.pipe(v.string(), v.trim(), v.nonEmpty("host must not be empty")),
  backend: v.pipe(v.string(), v.trim(), v.nonEmpty("backend must not be empty")),
  no_tls_verify: v.optional(v.boolean()),
});

// ---------------------------------------------------------------------------
// Tunnel daemon log lines
// ---------------------------------------------------------------------------

const OptionalText = v.optional(v.string());

/**
 * One structured log line. Only the fields we read are typed; the daemon
 * emits many more (levels, connection indexes, durations) which pass through.
 */
export const DaemonLogEntrySchema = v.looseObject({
  time: OptionalText,
  level: OptionalText,
  message: OptionalText,
  msg: OptionalText,
  originURL: OptionalText,
  clientIP: OptionalText,
  ip: OptionalText,
  cfRay: OptionalText,
  traceId: OptionalText,
  hostname: OptionalText,
  path: OptionalText,
  method: OptionalText,
});

export type DaemonLogEntry = v.InferOutput<typeof DaemonLogEntrySchema>;
