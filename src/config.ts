/**
 * Config loading and validation.
 *
 * Loads config.yml from the data directory, substitutes ${ENV_VAR} references,
 * and validates required fields at startup so misconfigurations fail early.
 * Without a config.yml, defaults apply and the API key comes from
 * GEMINI_API_KEY.
 */

import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { DEFAULT_BASE_URL, DEFAULT_UPLOAD_BASE_URL } from "./backend/gemini.js";
import { MAX_CUSTOM_METADATA_ENTRIES } from "./file-search/metadata.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import type { RetryPolicy } from "./retry.js";

/** Hard cap on stores per search, whatever the config says. */
export const MAX_STORES_PER_QUERY = 5;

export interface Config {
  gemini: {
    api_key: string;
    /** REST root, no trailing slash. */
    base_url: string;
    /** Root for media uploads. */
    upload_base_url: string;
    /** Model used by search_documents when the caller names none. */
    default_model: string;
  };
  retry: {
    /** Total attempts including the first. Default: 3. */
    max_attempts: number;
    base_wait_ms: number;
    max_wait_ms: number;
  };
  timeouts: {
    /** Metadata and list calls. Default: 30 s. */
    request_ms: number;
    /** Uploads and grounded generation. Default: 300 s. */
    upload_ms: number;
  };
  limits: {
    max_file_size_mb: number;
    max_stores_per_query: number;
    max_custom_metadata: number;
  };
  statistics: {
    page_size: number;
  };
  logging: {
    level: LogLevel;
    /** Mirror log lines to <data_dir>/logs/YYYY-MM-DD.jsonl. */
    file: boolean;
  };
  data_dir: string;
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" && value ? value : fallback;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  return fallback;
}

/**
 * Replace ${VAR} references with values from process.env.
 */
function substituteEnvVars(text: string): string {
  // Only uppercase env-style names, so other ${...} text survives.
  return text.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Environment variable ${varName} is not set`);
    }
    return value;
  });
}

/**
 * Recursively substitute env vars in all string values of an object.
 */
function substituteDeep(obj: unknown): unknown {
  if (typeof obj === "string") {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteDeep);
  }
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteDeep(value);
    }
    return result;
  }
  return obj;
}

export function resolveDataDir(): string {
  return path.resolve(process.env.FILE_SEARCH_DATA_DIR || "./data");
}

function readConfigFile(cfgPath: string): RawSection {
  const parsed: unknown = parseYaml(fs.readFileSync(cfgPath, "utf-8"));
  if (parsed === null || parsed === undefined) return {};
  const substituted = substituteDeep(parsed);
  if (!isRecord(substituted)) {
    throw new Error(`Config file ${cfgPath} must contain a mapping at the top level`);
  }
  return substituted;
}

/**
 * Load config. An explicit path must exist; the default
 * <data_dir>/config.yml is optional.
 */
export function loadConfig(configPath?: string): Config {
  const dataDir = resolveDataDir();
  const cfgPath = configPath || path.join(dataDir, "config.yml");

  let raw: RawSection = {};
  if (fs.existsSync(cfgPath)) {
    raw = readConfigFile(cfgPath);
  } else if (configPath) {
    throw new Error(`Config file not found: ${cfgPath}`);
  }

  const gemini = section(raw, "gemini");
  const retry = section(raw, "retry");
  const timeouts = section(raw, "timeouts");
  const limits = section(raw, "limits");
  const statistics = section(raw, "statistics");
  const logging = section(raw, "logging");

  // Defaults
  const config: Config = {
    gemini: {
      api_key: stringOr(gemini.api_key, process.env.GEMINI_API_KEY ?? ""),
      base_url: stringOr(gemini.base_url, DEFAULT_BASE_URL).replace(/\/$/, ""),
      upload_base_url: stringOr(gemini.upload_base_url, DEFAULT_UPLOAD_BASE_URL).replace(/\/$/, ""),
      default_model: stringOr(gemini.default_model, "gemini-2.5-flash"),
    },
    retry: {
      max_attempts: toFiniteNumber(retry.max_attempts) ?? 3,
      base_wait_ms: toFiniteNumber(retry.base_wait_ms) ?? 2000,
      max_wait_ms: toFiniteNumber(retry.max_wait_ms) ?? 10000,
    },
    timeouts: {
      request_ms: toFiniteNumber(timeouts.request_ms) ?? 30_000,
      upload_ms: toFiniteNumber(timeouts.upload_ms) ?? 300_000,
    },
    limits: {
      max_file_size_mb: toFiniteNumber(limits.max_file_size_mb) ?? 100,
      max_stores_per_query: toFiniteNumber(limits.max_stores_per_query) ?? MAX_STORES_PER_QUERY,
      max_custom_metadata: toFiniteNumber(limits.max_custom_metadata) ?? MAX_CUSTOM_METADATA_ENTRIES,
    },
    statistics: {
      page_size: toFiniteNumber(statistics.page_size) ?? 100,
    },
    logging: {
      level: isLogLevel(logging.level) ? logging.level : "info",
      file: booleanOr(logging.file, true),
    },
    data_dir: dataDir,
  };

  if (logging.level !== undefined && !isLogLevel(logging.level)) {
    console.warn(`Config warning: logging.level "${String(logging.level)}" is not a level; using "info"`);
  }

  validateConfig(config);

  return config;
}

function positiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate config at startup so a bad value does not surface on the first
 * tool call.
 */
function validateConfig(config: Config): void {
  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Required fields ---

  if (!config.gemini.api_key) {
    errors.push("gemini.api_key is required (set GEMINI_API_KEY or gemini.api_key in config.yml)");
  }

  // --- Numeric ranges ---

  if (!positiveInteger(config.retry.max_attempts)) {
    errors.push("retry.max_attempts must be a positive integer");
  }
  if (config.retry.base_wait_ms < 0 || config.retry.max_wait_ms < 0) {
    errors.push("retry waits must not be negative");
  }
  if (config.retry.max_wait_ms < config.retry.base_wait_ms) {
    warnings.push("retry.max_wait_ms is below retry.base_wait_ms; every wait is capped at max_wait_ms");
  }
  if (config.timeouts.request_ms <= 0 || config.timeouts.upload_ms <= 0) {
    errors.push("timeouts must be positive");
  }
  if (config.limits.max_file_size_mb <= 0) {
    errors.push("limits.max_file_size_mb must be positive");
  }
  if (!positiveInteger(config.limits.max_stores_per_query)
    || config.limits.max_stores_per_query > MAX_STORES_PER_QUERY) {
    errors.push(`limits.max_stores_per_query must be an integer between 1 and ${MAX_STORES_PER_QUERY}`);
  }
  if (!positiveInteger(config.limits.max_custom_metadata)
    || config.limits.max_custom_metadata > MAX_CUSTOM_METADATA_ENTRIES) {
    errors.push(`limits.max_custom_metadata must be an integer between 1 and ${MAX_CUSTOM_METADATA_ENTRIES}`);
  }
  if (!positiveInteger(config.statistics.page_size)) {
    errors.push("statistics.page_size must be a positive integer");
  }

  // --- Emit ---

  for (const w of warnings) {
    console.warn(`Config warning: ${w}`);
  }
  if (errors.length > 0) {
    throw new Error(`Config errors:\n  - ${errors.join("\n  - ")}`);
  }
}

export function retryPolicyFromConfig(config: Config): RetryPolicy {
  return {
    maxAttempts: config.retry.max_attempts,
    baseWaitMs: config.retry.base_wait_ms,
    maxWaitMs: config.retry.max_wait_ms,
  };
}

/**
 * Ensure data directories exist.
 */
export function ensureDataDirs(config: Config): void {
  fs.mkdirSync(path.join(config.data_dir, "logs"), { recursive: true });
}
