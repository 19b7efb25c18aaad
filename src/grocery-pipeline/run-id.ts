/**
 * Run identifiers. One run = one scrape-process-store execution.
 */

import { createHash } from "node:crypto";
import { v4 as uuid } from "uuid";

function shortHash(value: string): string {
  return createHash("md5").update(value).digest("hex").slice(0, 12);
}

/**
 * A 12-character run ID. The same seed always gives the same ID; without a
 * seed the ID is random.
 */
export function generateRunId(seed?: string): string {
  if (seed) return shortHash(seed);
  return shortHash(`${new Date().toISOString()}-${uuid()}`);
}

/** Prefix a run ID with the local date, e.g. "20261019_3f2a9c1b7d4e". */
export function formatRunId(runId: string, withDate = true, now: Date = new Date()): string {
  if (!withDate) return runId;
  const yyyy = now.getFullYear();
  const mm = String(now.getMonth() + 1).padStart(2, "0");
  const dd = String(now.getDate()).padStart(2, "0");
  return `${yyyy}${mm}${dd}_${runId}`;
}
