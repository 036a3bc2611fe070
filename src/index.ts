/**
 * MIBiG entry model and legacy migration.
 *
 * Entities are built through their codecs (`X.create`, `X.decode`), which
 * validate the whole subtree against a ValidationContext and return frozen
 * values. `convertLegacyEntry` turns a legacy v3 document into a v4 entry.
 */

export * from "./common/index.js";
export * from "./changelog/index.js";
export * from "./record/index.js";
export * from "./biosynthesis/index.js";
export * from "./genes/index.js";
export * from "./compound/index.js";
export * from "./entry/index.js";
export * from "./legacy/index.js";
export * from "./convert/index.js";
export * from "./io/index.js";
export {
  ConfigError,
  getConfig,
  loadConfig,
  validateConfig,
  type AppConfig,
} from "./config/index.js";
export { createLogger, initRunId, getRunId, type Logger, type LogLevel, type LoggerOptions } from "./logging/index.js";
