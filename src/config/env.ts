/**
 * Environment variable validation module
 * Validates all environment variables at startup with clear error messages
 */

import { API_CONSTANTS, SECURITY_CONSTANTS, SERVER_CONSTANTS, STATISTICS_CONSTANTS } from "./constants.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EnvConfig {
  port: number;
  allowedOrigins: string[];
  nodeEnv?: string;
  databasePath: string;
  adminApiKey?: string;
  trustProxy: boolean;
  logFormat: "text" | "json";
  logLevel: LogLevel;
  /** Empty string disables file logging */
  logFile: string;
  hfEndpoint: string;
  /** Empty string disables the Hub auth check */
  hfAuthPath: string;
  hfTimeoutMs: number;
  maxAgeLongSeconds: number;
  maxAgeShortSeconds: number;
  histogramNumBins: number;
  cacheMaintenanceAction?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function parseBoolean(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

function parsePositiveInt(name: string, value: string | undefined, defaultValue: number, max = Number.MAX_SAFE_INTEGER): number {
  if (value === undefined || value === "") return defaultValue;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > max) {
    throw new Error(`${name} must be an integer between 1 and ${max}, got: ${value}`);
  }
  return parsed;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validates and returns all environment configuration.
 * Throws descriptive errors for missing or invalid values.
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const port = parsePositiveInt("PORT", source.PORT, SERVER_CONSTANTS.DEFAULT_PORT, 65535);

  // Parse ALLOWED_ORIGINS (optional, default: localhost origins)
  const allowedOriginsStr = source.ALLOWED_ORIGINS;
  const allowedOrigins = allowedOriginsStr
    ? allowedOriginsStr.split(",").map((o) => o.trim()).filter((o) => o.length > 0)
    : [...SERVER_CONSTANTS.DEFAULT_ALLOWED_ORIGINS];

  const databasePath = source.DATABASE_PATH?.trim() || SERVER_CONSTANTS.DEFAULT_DATABASE_PATH;

  // Parse ADMIN_API_KEY (optional)
  const adminApiKey = source.ADMIN_API_KEY?.trim() || undefined;
  if (adminApiKey) {
    if (adminApiKey.length < SECURITY_CONSTANTS.MIN_API_KEY_LENGTH) {
      throw new Error(
        `ADMIN_API_KEY must be at least ${SECURITY_CONSTANTS.MIN_API_KEY_LENGTH} characters long for security`
      );
    }
  } else if (source.NODE_ENV !== "test") {
    console.warn("ADMIN_API_KEY not set - admin routes are disabled.");
  }

  // When true, X-Forwarded-For is trusted for rate limiting.
  // Only enable this when running behind a trusted reverse proxy.
  const trustProxy = parseBoolean(source.TRUST_PROXY);

  const logFormat: "text" | "json" = (source.LOG_FORMAT || "text").toLowerCase() === "json" ? "json" : "text";

  const logLevelStr = (source.LOG_LEVEL || "info").toLowerCase();
  if (!isLogLevel(logLevelStr)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got: ${source.LOG_LEVEL}`);
  }

  const logFile = source.LOG_FILE ?? SERVER_CONSTANTS.DEFAULT_LOG_FILE;

  const hfEndpoint = (source.COMMON_HF_ENDPOINT || API_CONSTANTS.HF_ENDPOINT).replace(/\/+$/, "");
  const hfAuthPath = source.API_HF_AUTH_PATH ?? API_CONSTANTS.HF_AUTH_PATH;
  if (hfAuthPath && !hfAuthPath.includes("%s")) {
    throw new Error(`API_HF_AUTH_PATH must contain a %s placeholder for the dataset, got: ${hfAuthPath}`);
  }

  const timeoutStr = source.API_HF_TIMEOUT_SECONDS;
  let hfTimeoutMs = API_CONSTANTS.HF_TIMEOUT_SECONDS * 1000;
  if (timeoutStr) {
    const seconds = Number(timeoutStr);
    if (isNaN(seconds) || seconds <= 0) {
      throw new Error(`API_HF_TIMEOUT_SECONDS must be a positive number, got: ${timeoutStr}`);
    }
    hfTimeoutMs = seconds * 1000;
  }

  return {
    port,
    allowedOrigins,
    nodeEnv: source.NODE_ENV,
    databasePath,
    adminApiKey,
    trustProxy,
    logFormat,
    logLevel: logLevelStr,
    logFile,
    hfEndpoint,
    hfAuthPath,
    hfTimeoutMs,
    maxAgeLongSeconds: parsePositiveInt("API_MAX_AGE_LONG", source.API_MAX_AGE_LONG, API_CONSTANTS.MAX_AGE_LONG_SECONDS),
    maxAgeShortSeconds: parsePositiveInt("API_MAX_AGE_SHORT", source.API_MAX_AGE_SHORT, API_CONSTANTS.MAX_AGE_SHORT_SECONDS),
    histogramNumBins: parsePositiveInt(
      "DESCRIPTIVE_STATISTICS_HISTOGRAM_NUM_BINS",
      source.DESCRIPTIVE_STATISTICS_HISTOGRAM_NUM_BINS,
      STATISTICS_CONSTANTS.DEFAULT_NUM_BINS
    ),
    cacheMaintenanceAction: source.CACHE_MAINTENANCE_ACTION?.trim() || undefined,
  };
}

// Singleton instance - validation happens once at module load time
export const env = validateEnv();
