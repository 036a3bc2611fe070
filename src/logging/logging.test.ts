/**
 * Logging Tests
 *
 * Run with: node --import tsx --test src/logging/logging.test.ts
 *
 * Covers:
 *   1. Entry format with and without a run ID
 *   2. Level filtering and the console sink
 *   3. File output into a fresh directory
 */

import { after, test } from "node:test";
import assert from "node:assert/strict";
import { readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  createLogger,
  formatLogEntry,
  generateRunId,
  getRunId,
  initRunId,
  isLevelEnabled,
  isRunId,
} from "./index.js";

const TEST_DIR = join(tmpdir(), `mibig-logging-test-${Date.now()}`);

after(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

const NOW = new Date("2024-01-15T10:00:00.000Z");

// ═══════════════════════════════════════════════════════════════════════════
// FORMAT
// ═══════════════════════════════════════════════════════════════════════════

test("entries before the first run carry a placeholder run ID", () => {
  assert.equal(getRunId(), null);
  assert.equal(
    formatLogEntry("info", "Converted entry", { accession: "BGC0000001" }, NOW),
    '[2024-01-15T10:00:00.000Z] [INFO ] [no-run-id] Converted entry {"accession":"BGC0000001"}'
  );
});

test("an empty context is left out", () => {
  assert.equal(formatLogEntry("error", "Failed", {}, NOW), "[2024-01-15T10:00:00.000Z] [ERROR] [no-run-id] Failed");
});

test("run IDs combine the date with six hex digits", () => {
  const runId = generateRunId(new Date("2024-01-15T23:59:00.000Z"));
  assert.ok(runId.startsWith("20240115-"));
  assert.ok(isRunId(runId));
  assert.equal(isRunId("2024-01-15"), false);

  const current = initRunId();
  assert.equal(getRunId(), current);
  assert.ok(formatLogEntry("debug", "x", undefined, NOW).includes(`[DEBUG] [${current}] x`));
});

// ═══════════════════════════════════════════════════════════════════════════
// SINKS
// ═══════════════════════════════════════════════════════════════════════════

test("levels below the minimum are dropped", () => {
  assert.equal(isLevelEnabled("info", "warn"), false);
  assert.equal(isLevelEnabled("error", "warn"), true);

  const lines: string[] = [];
  const logger = createLogger({ level: "warn", file: false, write: (line) => lines.push(line) });
  logger.debug("hidden");
  logger.info("hidden");
  logger.warn("Skipped module", { gene: "nrpB" });
  logger.error("Failed");
  assert.equal(lines.length, 2);
  assert.ok(lines[0]?.includes("[WARN ]"));
  assert.ok(lines[0]?.endsWith('] Skipped module {"gene":"nrpB"}'));
  assert.ok(lines[1]?.endsWith("] Failed"));
});

test("file output creates the log directory", () => {
  const logDir = join(TEST_DIR, "logs");
  const logger = createLogger({ level: "debug", logDir, logFile: "test.log", console: false, file: true });
  logger.debug("first");
  logger.info("second", { n: 2 });
  const lines = readFileSync(join(logDir, "test.log"), "utf-8").trimEnd().split("\n");
  assert.equal(lines.length, 2);
  assert.ok(lines[0]?.endsWith("] first"));
  assert.ok(lines[1]?.endsWith('] second {"n":2}'));
});
