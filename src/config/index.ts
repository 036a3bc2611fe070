/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { LOG_LEVELS, type LogLevel } from "../logging/logger.js";
import { optionalEnv, optionalEnvBool, optionalEnvEnum, optionalEnvInt, type EnvSource } from "./env.js";

export {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvEnum,
  optionalEnvInt,
  type EnvSource,
} from "./env.js";

export interface AppConfig {
  /** Minimum level written to the log */
  readonly logLevel: LogLevel;
  /** Directory for log files */
  readonly logDir: string;
  /** Write the log to a file as well as stderr */
  readonly logToFile: boolean;
  /** Indentation of written v4 JSON; 0 writes a single line */
  readonly jsonIndent: number;
}

/**
 * Load and validate configuration from `source`.
 *
 * @throws ConfigError naming the first malformed variable
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  return Object.freeze({
    logLevel: optionalEnvEnum("MIBIG_LOG_LEVEL", LOG_LEVELS, "info", source),
    logDir: optionalEnv("MIBIG_LOG_DIR", "output/logs", source),
    logToFile: optionalEnvBool("MIBIG_LOG_TO_FILE", false, source),
    jsonIndent: optionalEnvInt("MIBIG_JSON_INDENT", 2, { min: 0, max: 8 }, source),
  });
}

let cached: AppConfig | undefined;

/**
 * Configuration of this process, read once from the environment.
 */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

/**
 * Read the configuration now so that malformed variables fail at startup.
 */
export function validateConfig(): AppConfig {
  return getConfig();
}
