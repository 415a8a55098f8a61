#!/usr/bin/env node
// Load .env if present (needed when running as an installed npm binary)
try { process.loadEnvFile(".env"); } catch { /* not present, fine */ }

/**
 * CLI. `file-search-tools` (no args) or `file-search-tools serve` starts the
 * MCP server on stdio. See `file-search-tools help` for the rest.
 */

import { resolveDataDir } from "./config.js";
import { listSupportedFormats } from "./file-search/operations.js";
import { SERVER_NAME, VERSION } from "./version.js";

// ---------------------------------------------------------------------------
// Arg parsing helpers
// ---------------------------------------------------------------------------

const argv = process.argv.slice(2);

function flag(name: string): boolean {
  return argv.includes(name);
}

function opt(name: string, fallback?: string): string | undefined {
  const idx = argv.indexOf(name);
  return idx !== -1 ? argv[idx + 1] : fallback;
}

function positional(index: number): string | undefined {
  const nonFlags = argv.filter((a, i) => !a.startsWith("--") && !argv[i - 1]?.startsWith("--"));
  return nonFlags[index];
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function cmdServe(): Promise<void> {
  const { startServer } = await import("./app.js");
  const httpArg = opt("--http");
  let httpPort: number | undefined;
  if (httpArg !== undefined) {
    httpPort = Number(httpArg);
    if (!Number.isInteger(httpPort) || httpPort < 0 || httpPort > 65535) {
      console.error(`Invalid --http port: ${httpArg}`);
      process.exit(1);
    }
  }
  const running = await startServer(opt("--config"), { httpPort, httpHost: opt("--host") });

  const onSignal = (): void => {
    running.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("Shutdown failed:", error);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

function cmdFormats(): void {
  const { supported_mime_types, note } = listSupportedFormats();
  for (const [category, types] of Object.entries(supported_mime_types)) {
    console.log(`\n${category}`);
    for (const type of types) {
      console.log(`  ${type}`);
    }
  }
  console.log(`\n${note}`);
}

function showHelp(): void {
  console.log(`
${SERVER_NAME} ${VERSION}: document store tools for grounded search, served over MCP

Usage:
  ${SERVER_NAME}                Start the MCP server on stdio
  ${SERVER_NAME} serve          Same as above (explicit)
  ${SERVER_NAME} <command>      Run a command

Commands:
  serve [--config <path>] [--http <port> [--host <addr>]]
    Start the server on stdio, or on Streamable HTTP at /mcp with --http
    (GET /health for liveness; host defaults to 127.0.0.1). Config defaults
    to <data dir>/config.yml; without one, defaults apply and GEMINI_API_KEY
    supplies the API key.

  formats
    List the MIME types the backend indexes.

  version
    Show version number.

  help
    Show this help text.

Global options:
  --data-dir <path>  Data directory (default: ${resolveDataDir()})
`);
}

// ---------------------------------------------------------------------------
// Main dispatcher
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const dataDir = opt("--data-dir");
  if (dataDir) process.env.FILE_SEARCH_DATA_DIR = dataDir;

  if (flag("--version") || flag("-v")) {
    console.log(VERSION);
    return;
  }

  if (flag("--help") || flag("-h")) {
    showHelp();
    return;
  }

  const command = positional(0);

  switch (command) {
    case undefined:
    case "serve":
      await cmdServe();
      return;
    case "formats":
      cmdFormats();
      return;
    case "version":
      console.log(VERSION);
      return;
    case "help":
      showHelp();
      return;
    default:
      console.error(`Unknown command: ${command}`);
      console.error(`Run '${SERVER_NAME} help' for usage.`);
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("Fatal:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
