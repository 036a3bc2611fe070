/**
 * Run identifiers.
 * Every CLI invocation tags its log lines with one, so that the lines of a
 * single conversion can be picked out of a shared log file.
 */

import { randomBytes } from "node:crypto";

const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

/**
 * A fresh run ID: the UTC date of `now` and six hex digits, e.g. "20240115-a1b2c3".
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}

let currentRunId: string | null = null;

/**
 * Start a new run and make its ID current.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * The current run ID, or null before `initRunId`.
 */
export function getRunId(): string | null {
  return currentRunId;
}
