/**
 * Environment variable loading and validation.
 */

import "dotenv/config";
import { MibigError } from "../common/errors.js";

export class ConfigError extends MibigError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Where variables are read from; the process environment unless a test says otherwise */
export type EnvSource = Readonly<Record<string, string | undefined>>;

function read(source: EnvSource, key: string): string | undefined {
  const value = source[key];
  return value !== undefined && value !== "" ? value : undefined;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string, source: EnvSource = process.env): string {
  return read(source, key) ?? defaultValue;
}

/**
 * Get an optional environment variable as an integer within [min, max].
 */
export function optionalEnvInt(
  key: string,
  defaultValue: number,
  range: { min?: number; max?: number } = {},
  source: EnvSource = process.env
): number {
  const value = read(source, key);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`Environment variable ${key} must be a valid integer, got: ${value}`);
  }
  const parsed = parseInt(value, 10);
  const { min = Number.MIN_SAFE_INTEGER, max = Number.MAX_SAFE_INTEGER } = range;
  if (parsed < min || parsed > max) {
    throw new ConfigError(`Environment variable ${key} must be between ${min} and ${max}, got: ${value}`);
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean, source: EnvSource = process.env): boolean {
  const value = read(source, key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
  );
}

/**
 * Get an optional environment variable restricted to a fixed set of values.
 */
export function optionalEnvEnum<T extends string>(
  key: string,
  allowed: readonly T[],
  defaultValue: T,
  source: EnvSource = process.env
): T {
  const value = read(source, key);
  if (value === undefined) {
    return defaultValue;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(`Environment variable ${key} must be one of ${allowed.join(", ")}, got: ${value}`);
  }
  return match;
}
