/**
 * Route configuration file loader.
 *
 * The file is optional: when it is missing or unreadable the server keeps
 * running with no routes (query and dashboard only).
 */

import fs from "node:fs";
import * as v from "valibot";

import { RouteConfigEntrySchema } from "../schemas.js";
import type { RouteConfigEntry } from "../types.js";

export interface InvalidRouteEntry {
  index: number;
  reason: string;
}

export type RouteConfigResult =
  | { ok: true; entries: RouteConfigEntry[]; invalid: InvalidRouteEntry[] }
  | { ok: false; reason: string };

export function parseRouteConfig(content: string): RouteConfigResult {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    return {
      ok: false,
      reason: `not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  if (!Array.isArray(raw)) {
    return { ok: false, reason: "expected a JSON array of routes" };
  }

  const entries: RouteConfigEntry[] = [];
  const invalid: InvalidRouteEntry[] = [];
  raw.forEach((item: unknown, index) => {
    const result = v.safeParse(RouteConfigEntrySchema, item);
    if (result.success) {
      entries.push(result.output);
    } else {
      invalid.push({ index, reason: v.summarize(result.issues) });
    }
  });
  return { ok: true, entries, invalid };
}

export function loadRouteConfig(file: string): RouteConfigResult {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf8");
  } catch (err: unknown) {
    const code = (err as NodeJS.ErrnoException).code;
    return {
      ok: false,
      reason:
        code === "ENOENT"
          ? `${file} does not exist`
          : `cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  return parseRouteConfig(content);
}
