/**
 * Library entry point. The CLI (cli.ts) is the usual way in; these exports
 * let another host embed the tools or drive the orchestrators directly.
 */

export { startServer, type RunningServer } from "./app.js";
export { createServer, dispatchToolCall, listTools, serveHttp, serveStdio } from "./server.js";
export { loadConfig, resolveDataDir, type Config } from "./config.js";
export { createAppLogger, installConsoleLogging, type AppLogger, type LogLevel } from "./logger.js";

export * from "./errors.js";
export { withRetry, retryDelayMs, DEFAULT_RETRY_POLICY, type RetryPolicy, type RetryOptions } from "./retry.js";
export { paginate, collectAll, type Page, type ListPage } from "./pagination.js";
export { normalize, normalizeObject, type JsonValue, type JsonObject } from "./normalize.js";

export { adaptResponse, type ResponseKind, type ResponseViews } from "./backend/adapters.js";
export { GeminiRestBackend, type GeminiBackendConfig } from "./backend/gemini.js";
export { createBackend, getBackend, resetBackend, setBackend } from "./backend/client.js";
export type { FileSearchBackend } from "./backend/types.js";

export * from "./file-search/index.js";
export { createTools, createToolsFromConfig, toolContextFromConfig } from "./tools/index.js";
export type { FileSearchTool, ToolContext, ToolResult } from "./tools/index.js";
