/**
 * Reading legacy documents and writing v4 entries.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { MibigError } from "../common/errors.js";
import type { ValidationContext } from "../common/validation.js";
import type { MibigEntry } from "../entry/index.js";
import { readLegacyDocument, type LegacyDocument } from "../legacy/index.js";
import { DEFAULT_JSON_INDENT, deserializeEntry, parseJson, serializeEntry } from "./serialization.js";

function readText(filePath: string): string {
  try {
    return readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new MibigError(`Failed to read ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Load and structurally decode a legacy v3 document.
 *
 * @throws MibigError if the file cannot be read or is not JSON
 * @throws ValidationError if the document does not have the legacy shape
 */
export function readLegacyFile(filePath: string): LegacyDocument {
  return readLegacyDocument(parseJson(readText(filePath), "legacy document"));
}

/**
 * Load and fully validate a v4 entry.
 */
export function readEntryFile(filePath: string, ctx: ValidationContext): MibigEntry {
  return deserializeEntry(readText(filePath), ctx);
}

/**
 * Write an entry as v4 JSON, creating parent directories as needed.
 *
 * @returns the path written
 */
export function writeEntryFile(filePath: string, entry: MibigEntry, indent = DEFAULT_JSON_INDENT): string {
  const directory = dirname(filePath);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
  writeFileSync(filePath, `${serializeEntry(entry, indent)}\n`, "utf-8");
  return filePath;
}
