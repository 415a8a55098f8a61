/**
 * Server startup: config, logging, backend, tools, then stdio or HTTP.
 */

import { resetBackend } from "./backend/client.js";
import { ensureDataDirs, loadConfig } from "./config.js";
import { createAppLogger, installConsoleLogging } from "./logger.js";
import { serveHttp, serveStdio } from "./server.js";
import { createToolsFromConfig } from "./tools/index.js";
import { SERVER_NAME, VERSION } from "./version.js";

export interface RunningServer {
  stop(): Promise<void>;
}

export interface StartOptions {
  /** Serve Streamable HTTP on this port instead of stdio. */
  httpPort?: number;
  httpHost?: string;
}

export async function startServer(configPath?: string, options: StartOptions = {}): Promise<RunningServer> {
  // Keep stdout clean for the protocol from the first line on.
  installConsoleLogging();

  const config = loadConfig(configPath);
  ensureDataDirs(config);
  const restoreConsole = installConsoleLogging({
    level: config.logging.level,
    logger: config.logging.file ? createAppLogger(config.data_dir) : undefined,
  });

  console.log(`${SERVER_NAME} ${VERSION} starting`);
  console.log(`Data directory: ${config.data_dir}`);
  console.log(`Default model: ${config.gemini.default_model}`);

  const tools = createToolsFromConfig(config);
  const info = { name: SERVER_NAME, version: VERSION };
  const server =
    options.httpPort === undefined
      ? await serveStdio(tools, info)
      : await serveHttp(tools, info, { port: options.httpPort, host: options.httpHost });

  return {
    async stop(): Promise<void> {
      await server.close();
      resetBackend();
      console.log("Server stopped");
      restoreConsole();
    },
  };
}
