/**
 * Configuration Tests
 *
 * Run with: node --import tsx --test src/config/config.test.ts
 *
 * Covers:
 *   1. Defaults when nothing is set
 *   2. Typed readers and their error messages
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import {
  ConfigError,
  loadConfig,
  optionalEnvBool,
  optionalEnvEnum,
  optionalEnvInt,
} from "./index.js";

function configErrorMessage(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) {
      return err.message;
    }
    throw err;
  }
  assert.fail("Expected a ConfigError");
}

test("an empty environment gives the defaults", () => {
  assert.deepEqual(loadConfig({}), {
    logLevel: "info",
    logDir: "output/logs",
    logToFile: false,
    jsonIndent: 2,
  });
});

test("only MIBIG_ variables are read", () => {
  assert.deepEqual(loadConfig({ NODE_ENV: "production", LOG_LEVEL: "debug" }), loadConfig({}));
});

test("set variables override the defaults", () => {
  const config = loadConfig({
    MIBIG_LOG_LEVEL: "debug",
    MIBIG_LOG_DIR: "/var/log/mibig",
    MIBIG_LOG_TO_FILE: "yes",
    MIBIG_JSON_INDENT: "0",
  });
  assert.deepEqual(config, {
    logLevel: "debug",
    logDir: "/var/log/mibig",
    logToFile: true,
    jsonIndent: 0,
  });
  assert.ok(Object.isFrozen(config));
});

test("malformed variables are named in the error", () => {
  assert.equal(
    configErrorMessage(() => loadConfig({ MIBIG_LOG_LEVEL: "verbose" })),
    "Environment variable MIBIG_LOG_LEVEL must be one of debug, info, warn, error, got: verbose"
  );
  assert.equal(
    configErrorMessage(() => loadConfig({ MIBIG_JSON_INDENT: "9" })),
    "Environment variable MIBIG_JSON_INDENT must be between 0 and 8, got: 9"
  );
  assert.equal(
    configErrorMessage(() => loadConfig({ MIBIG_JSON_INDENT: "2.5" })),
    "Environment variable MIBIG_JSON_INDENT must be a valid integer, got: 2.5"
  );
  assert.equal(
    configErrorMessage(() => loadConfig({ MIBIG_LOG_TO_FILE: "maybe" })),
    "Environment variable MIBIG_LOG_TO_FILE must be a boolean (true/false/1/0/yes/no), got: maybe"
  );
});

test("readers treat empty values as unset", () => {
  assert.equal(optionalEnvInt("N", 3, {}, { N: "" }), 3);
  assert.equal(optionalEnvBool("B", true, { B: "" }), true);
  assert.equal(optionalEnvEnum("E", ["a", "b"], "b", { E: "" }), "b");
});
