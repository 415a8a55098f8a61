/**
 * Process-wide backend handle. Created once on first use and reused; there
 * is no teardown beyond process exit. Tests install a fake with setBackend()
 * and clear it with resetBackend().
 */

import type { Config } from "../config.js";
import { ValidationError } from "../errors.js";
import { GeminiRestBackend } from "./gemini.js";
import type { FileSearchBackend } from "./types.js";

let backend: FileSearchBackend | undefined;

export function createBackend(config: Config): FileSearchBackend {
  if (!config.gemini.api_key) {
    throw new ValidationError("gemini.api_key is not configured (set GEMINI_API_KEY)");
  }
  return new GeminiRestBackend({
    api_key: config.gemini.api_key,
    base_url: config.gemini.base_url,
    upload_base_url: config.gemini.upload_base_url,
    request_timeout_ms: config.timeouts.request_ms,
    upload_timeout_ms: config.timeouts.upload_ms,
  });
}

/**
 * Return the shared backend, creating it from config on first call.
 */
export function getBackend(config: Config): FileSearchBackend {
  if (!backend) {
    backend = createBackend(config);
    console.log("[backend] Gemini file search client initialized");
  }
  return backend;
}

/** Install a specific backend, replacing any existing one. */
export function setBackend(instance: FileSearchBackend): void {
  backend = instance;
}

export function resetBackend(): void {
  backend = undefined;
}
