/**
 * Loader for the lookup tables shipped in the top-level data/ directory.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { z } from "zod";
import { MibigError } from "./errors.js";
import { deepFreeze, parseWire } from "./validation.js";

/**
 * Walk up from this module until a data/ directory holding `fileName` turns up.
 * Works from both src/ and the compiled dist/ tree.
 */
function findDataFile(fileName: string): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, "data", fileName);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new MibigError(`Data file not found: ${fileName}`);
    }
    dir = parent;
  }
}

/**
 * Read, parse and validate a JSON data file. The result is frozen.
 *
 * @throws MibigError if the file is missing or not valid JSON
 * @throws ValidationError if the content does not match the schema
 */
export function loadDataFile<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const path = findDataFile(fileName);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new MibigError(
      `Failed to read data file ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return deepFreeze(parseWire(schema, parsed, `data file ${fileName}`));
}
