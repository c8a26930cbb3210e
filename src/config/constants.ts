/**
 * Application constants module
 * Centralizes all hard-coded values for easy configuration management
 */

export const API_CONSTANTS = {
  HF_AUTH_PATH: "/api/datasets/%s/auth-check",
  HF_ENDPOINT: "https://huggingface.co",
  HF_TIMEOUT_SECONDS: 0.2,
  MAX_AGE_LONG_SECONDS: 120, // successful, complete responses
  MAX_AGE_SHORT_SECONDS: 10, // errors and responses with pending parts
  MAX_NUM_ROWS_PER_PAGE: 100,
  FIRST_ROWS_MAX_NUMBER: 100,
} as const;

export const SERVER_CONSTANTS = {
  DEFAULT_PORT: 3000,
  DEFAULT_ALLOWED_ORIGINS: ["http://localhost:3000", "http://localhost:3001"],
  CORS_MAX_AGE_SECONDS: 86400, // 24 hours
  DEFAULT_DATABASE_PATH: "./data/datasets-server.db",
  DEFAULT_LOG_FILE: "./data/datasets-server.log",
} as const;

export const SECURITY_CONSTANTS = {
  RATE_LIMIT_WINDOW_MS: 60000, // 1 minute
  RATE_LIMIT_MAX_REQUESTS: 100, // 100 requests per minute per IP
  RATE_LIMIT_CLEANUP_INTERVAL_MS: 300000, // Clean up old entries every 5 minutes
  MIN_API_KEY_LENGTH: 16, // Minimum length for admin API key
  AUTH_HEADER_NAME: "X-API-Key", // Header carrying the admin API key
  BYPASS_AUTH_PATHS: ["/health", "/healthcheck"], // Paths that bypass rate limiting
} as const;

/**
 * Cache configuration constants
 * Controls in-memory caching of aggregated responses
 */
export const CACHE_CONSTANTS = {
  /** Default TTL for cached entries in milliseconds (30 seconds) */
  DEFAULT_TTL_MS: 30000,
  /** Cache key prefix for aggregated dataset-level responses */
  AGGREGATE_CACHE_KEY: "dataset",
  /** Enable/disable caching globally */
  ENABLE_CACHE: true,
  /** Expired entries are swept every 5 minutes */
  CLEANUP_INTERVAL_MS: 300000,
} as const;

/**
 * Cache kinds, as written by the workers that compute them
 */
export const CACHE_KINDS = {
  DATASET_CONFIG_NAMES: "dataset-config-names",
  CONFIG_SPLIT_NAMES_FROM_INFO: "config-split-names-from-info",
  CONFIG_SPLIT_NAMES_FROM_STREAMING: "config-split-names-from-streaming",
  CONFIG_PARQUET: "config-parquet",
  CONFIG_SIZE: "config-size",
  SPLIT_FIRST_ROWS: "split-first-rows",
  SPLIT_ROWS_INDEX: "split-rows-index",
  SPLIT_DESCRIPTIVE_STATISTICS: "split-descriptive-statistics",
} as const;

/** Kinds that can answer "which splits does this config have", best first */
export const CONFIG_SPLIT_NAMES_KINDS = [
  CACHE_KINDS.CONFIG_SPLIT_NAMES_FROM_INFO,
  CACHE_KINDS.CONFIG_SPLIT_NAMES_FROM_STREAMING,
] as const;

export const STATISTICS_CONSTANTS = {
  DEFAULT_NUM_BINS: 10,
  /** Above this many distinct values a string column is free text */
  MAX_NUM_STRING_LABELS: 30,
  DECIMALS: 5,
  /** ClassLabel value meaning "no label" */
  NO_LABEL_VALUE: -1,
} as const;

/**
 * Metrics configuration constants
 * Controls observability and metrics collection behavior
 */
export const METRICS_CONSTANTS = {
  /** Histogram bucket boundaries in seconds for request durations */
  HISTOGRAM_BUCKETS: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  /** Enable/disable metrics collection globally */
  ENABLE_METRICS: true,
} as const;
