/**
 * Run IDs: a UTC date and six hex digits, e.g. "20240115-a1b2c3".
 *
 * The CLI sets one for the process at startup; each pipeline run also
 * draws its own so interleaved runs stay apart in a shared log.
 */

import { randomBytes } from "node:crypto";

export function generateRunId(now: Date = new Date()): string {
  const day = now.toISOString().slice(0, 10).split("-").join("");
  return `${day}-${randomBytes(3).toString("hex")}`;
}

let processRunId: string | null = null;

/** Call once at startup. */
export function initRunId(): string {
  processRunId = generateRunId();
  return processRunId;
}

/** Null until initRunId() has run. */
export function getRunId(): string | null {
  return processRunId;
}
