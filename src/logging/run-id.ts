/**
 * Run ID generation and management.
 * Each CLI invocation gets one run ID so its log lines can be correlated.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: UTC date + hour/minute + random suffix (e.g. "20240115T0930-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const iso = now.toISOString();
  const datePart = iso.slice(0, 10).replace(/-/g, "");
  const timePart = iso.slice(11, 16).replace(":", "");
  return `${datePart}T${timePart}-${randomBytes(3).toString("hex")}`;
}

let currentRunId: string | null = null;

/**
 * Start a new run. Returns the fresh run ID.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
