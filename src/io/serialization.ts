/**
 * v4 entry serialization.
 *
 * The wire form is plain JSON with snake_case keys where the schema has
 * them. Decoding always runs the full validation of the entry, so a
 * deserialized entry is as trustworthy as a freshly built one.
 */

import { MibigError } from "../common/errors.js";
import type { ValidationContext } from "../common/validation.js";
import { MibigEntry } from "../entry/index.js";

export const DEFAULT_JSON_INDENT = 2;

/**
 * Parse JSON text, reporting syntax errors against `subject`.
 *
 * @throws MibigError if the text is not JSON
 */
export function parseJson(text: string, subject: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new MibigError(
      `Failed to parse ${subject} JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * Serialize an entry to v4 JSON text; an indent of 0 gives a single line.
 */
export function serializeEntry(entry: MibigEntry, indent = DEFAULT_JSON_INDENT): string {
  return JSON.stringify(MibigEntry.encode(entry), null, indent > 0 ? indent : undefined);
}

/**
 * Deserialize and validate v4 JSON text.
 *
 * @throws MibigError if the text is not JSON
 * @throws ValidationError listing every structural and semantic violation
 */
export function deserializeEntry(text: string, ctx: ValidationContext): MibigEntry {
  return MibigEntry.decode(parseJson(text, "entry"), ctx);
}
