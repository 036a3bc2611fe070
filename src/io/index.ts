/**
 * Entry serialization and file access.
 */

export { DEFAULT_JSON_INDENT, deserializeEntry, parseJson, serializeEntry } from "./serialization.js";
export { readEntryFile, readLegacyFile, writeEntryFile } from "./files.js";
