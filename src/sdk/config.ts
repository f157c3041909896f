/**
 * Bridge configuration: explicit options over environment over defaults.
 */

import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./log.js";

export interface BridgeConfig {
  /** Worker poll period, milliseconds. */
  pollIntervalMs: number;
  /** Dispatch loop period handed to the host scheduler, seconds. */
  dispatchIntervalSeconds: number;
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  pollIntervalMs?: number;
  dispatchIntervalSeconds?: number;
  logLevel?: LogLevel;
  /** Shorthand for `logLevel: "debug"` when no level is given. */
  verbose?: boolean;
}

export const DEFAULT_CONFIG: Readonly<BridgeConfig> = {
  pollIntervalMs: 10,
  dispatchIntervalSeconds: 0.01,
  logLevel: "warn",
};

export const ENV_POLL_INTERVAL = "WSBRIDGE_POLL_INTERVAL_MS";
export const ENV_DISPATCH_INTERVAL = "WSBRIDGE_DISPATCH_INTERVAL";
export const ENV_LOG_LEVEL = "WSBRIDGE_LOG_LEVEL";

export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): BridgeConfig {
  const pollIntervalMs =
    overrides.pollIntervalMs ??
    parseNumber(ENV_POLL_INTERVAL, env[ENV_POLL_INTERVAL]) ??
    DEFAULT_CONFIG.pollIntervalMs;
  const dispatchIntervalSeconds =
    overrides.dispatchIntervalSeconds ??
    parseNumber(ENV_DISPATCH_INTERVAL, env[ENV_DISPATCH_INTERVAL]) ??
    DEFAULT_CONFIG.dispatchIntervalSeconds;
  const logLevel =
    overrides.logLevel ??
    (overrides.verbose ? "debug" : undefined) ??
    parseLevel(env[ENV_LOG_LEVEL]) ??
    DEFAULT_CONFIG.logLevel;

  if (!Number.isFinite(pollIntervalMs) || pollIntervalMs < 0) {
    throw new ConfigError("pollIntervalMs", `must be a non-negative number, got ${pollIntervalMs}`);
  }
  if (!Number.isFinite(dispatchIntervalSeconds) || dispatchIntervalSeconds < 0) {
    throw new ConfigError(
      "dispatchIntervalSeconds",
      `must be a non-negative number, got ${dispatchIntervalSeconds}`,
    );
  }

  return { pollIntervalMs, dispatchIntervalSeconds, logLevel };
}

function parseNumber(key: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(key, `expected a number, got "${raw}"`);
  }
  return value;
}

function parseLevel(raw: string | undefined): LogLevel | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const level = LOG_LEVELS.find((l) => l === raw.trim().toLowerCase());
  if (!level) {
    throw new ConfigError(ENV_LOG_LEVEL, `expected one of ${LOG_LEVELS.join(", ")}, got "${raw}"`);
  }
  return level;
}
