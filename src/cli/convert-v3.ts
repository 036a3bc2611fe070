#!/usr/bin/env node
/**
 * CLI tool to migrate a legacy (v3) entry to the v4 schema.
 *
 * Reads the legacy document, decodes it, migrates it at the "questionable"
 * quality tier, validates the result and writes it as v4 JSON. Every
 * validation issue is printed, not just the first.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   mibig-convert-v3 <input.json> <output.json>
 *   npx tsx src/cli/convert-v3.ts BGC0000001.json out/BGC0000001.json
 *
 * Options:
 *   -h, --help   Show help
 *
 * Environment:
 *   MIBIG_LOG_LEVEL, MIBIG_LOG_DIR, MIBIG_LOG_TO_FILE, MIBIG_JSON_INDENT
 *
 * Exit codes:
 *   0 - Entry written
 *   1 - The legacy document could not be read, migrated or validated
 *   2 - Usage error
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import { ConfigError, validateConfig, type AppConfig } from "../config/index.js";
import { MibigError, MigrationError, ValidationError } from "../common/errors.js";
import { convertLegacyEntry } from "../convert/index.js";
import { readLegacyFile, writeEntryFile } from "../io/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `
Usage: mibig-convert-v3 <input.json> <output.json>

Convert a legacy (v3) MIBiG entry to the v4 schema.

Options:
  -h, --help   Show help
`.trim();

// ============================================================
// Types
// ============================================================

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDependencies {
  readonly logger: Logger;
  /** Indentation of the written JSON */
  readonly indent: number;
  readonly output: CliOutput;
}

// ============================================================
// Command
// ============================================================

function describe(err: unknown): string {
  if (err instanceof ValidationError) {
    return err.format();
  }
  if (err instanceof MigrationError) {
    return err.value === undefined
      ? `Migration failed: ${err.message}`
      : `Migration failed: ${err.message} (value: ${err.value})`;
  }
  return err instanceof Error ? err.message : String(err);
}

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: { help: { type: "boolean", short: "h", default: false } },
    allowPositionals: true,
    strict: true,
  });
}

/**
 * Run the command against `argv` (without the node and script paths).
 *
 * @returns the process exit code
 */
export function run(argv: readonly string[], deps: CliDependencies): number {
  const { logger, output } = deps;

  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    output.err(`${describe(err)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (parsed.values.help) {
    output.out(USAGE);
    return EXIT_OK;
  }

  const [input, target, ...extra] = parsed.positionals;
  if (input === undefined || target === undefined || extra.length > 0) {
    output.err(`Expected 2 arguments, got ${parsed.positionals.length}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  try {
    logger.info("Reading legacy entry", { input });
    const entry = convertLegacyEntry(readLegacyFile(input), { logger });
    writeEntryFile(target, entry, deps.indent);
    logger.info("Wrote entry", { accession: entry.accession, output: target });
    return EXIT_OK;
  } catch (err) {
    if (!(err instanceof MibigError)) {
      throw err;
    }
    logger.error("Conversion failed", { input, error: err.name });
    output.err(describe(err));
    return EXIT_FAILURE;
  }
}

function main(): void {
  initRunId();

  let config: AppConfig;
  try {
    config = validateConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      process.exitCode = EXIT_USAGE;
      return;
    }
    throw err;
  }

  const logger = createLogger({
    level: config.logLevel,
    logDir: config.logDir,
    file: config.logToFile,
  });

  process.exitCode = run(process.argv.slice(2), {
    logger,
    indent: config.jsonIndent,
    output: {
      out: (text) => console.log(text),
      err: (text) => console.error(text),
    },
  });
}

// Only run when executed directly (not imported by tests)
const entryPoint = process.argv[1];
const isDirectExecution =
  entryPoint !== undefined && realpathSync(entryPoint) === fileURLToPath(import.meta.url);

if (isDirectExecution) {
  main();
}
