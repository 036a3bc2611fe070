/**
 * Logging utilities.
 */

export { generateRunId, initRunId, getRunId, isRunId } from "./run-id.js";
export {
  LOG_LEVELS,
  createLogger,
  formatLogEntry,
  isLevelEnabled,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
