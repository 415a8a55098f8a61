/**
 * MCP host over stdio or Streamable HTTP. Lists the tools and dispatches calls to them; every
 * outcome, including unknown tools and bad arguments, goes back as a tool
 * result rather than a protocol error.
 *
 * stdout belongs to the protocol. Logging goes to stderr (see logger.ts).
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from "node:http";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { ValidationError } from "./errors.js";
import { toolError, type FileSearchTool, type ToolResult } from "./tools/index.js";

export interface ServerInfo {
  name: string;
  version: string;
}

export interface ToolListing {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export function listTools(tools: FileSearchTool[]): ToolListing[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    inputSchema: {
      type: "object",
      properties: tool.parameters.properties,
      ...(tool.parameters.required ? { required: tool.parameters.required } : {}),
    },
  }));
}

/**
 * Run one call against the registry. Never throws.
 */
export async function dispatchToolCall(
  tools: FileSearchTool[],
  name: string,
  args: unknown,
  callId = name,
): Promise<ToolResult> {
  const tool = tools.find((t) => t.name === name);
  if (!tool) {
    console.warn(`[server] Unknown tool requested: ${name}`);
    return toolError(
      new ValidationError(`Unknown tool "${name}". Available: ${tools.map((t) => t.name).join(", ")}`),
    );
  }

  const startedAt = Date.now();
  const result = await tool.execute(callId, args);
  console.debug(`[server] ${name} ${result.details.ok ? "ok" : "failed"} in ${Date.now() - startedAt}ms`);
  return result;
}

export function createServer(tools: FileSearchTool[], info: ServerInfo): Server {
  const server = new Server(info, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listTools(tools),
  }));

  let calls = 0;
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    calls++;
    const result = await dispatchToolCall(
      tools,
      request.params.name,
      request.params.arguments,
      `${request.params.name}#${calls}`,
    );
    return {
      content: result.content,
      structuredContent: result.details,
      isError: result.isError ?? false,
    };
  });

  return server;
}

/** Connect to stdio and serve until the transport closes. */
export async function serveStdio(tools: FileSearchTool[], info: ServerInfo): Promise<Server> {
  const server = createServer(tools, info);
  await server.connect(new StdioServerTransport());
  console.log(`[server] ${info.name} ${info.version} listening on stdio with ${tools.length} tools`);
  return server;
}

export interface HttpOptions {
  port: number;
  host?: string;
  /** MCP endpoint. Defaults to /mcp. */
  path?: string;
}

export interface HttpHandle {
  port: number;
  close(): Promise<void>;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

/**
 * Serve over stateless Streamable HTTP. Each POST gets its own server and
 * transport; GET /health reports liveness.
 */
export async function serveHttp(
  tools: FileSearchTool[],
  info: ServerInfo,
  options: HttpOptions,
): Promise<HttpHandle> {
  const host = options.host ?? "127.0.0.1";
  const mcpPath = options.path ?? "/mcp";

  const handleMcp = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const server = createServer(tools, info);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        console.warn(`[server] Failed to release request transport: ${String(error)}`);
      });
    });
    await server.connect(transport);
    await transport.handleRequest(req, res);
  };

  const httpServer = createHttpServer((req, res) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? host}`);

    if (req.method === "GET" && (url.pathname === "/health" || url.pathname === "/")) {
      sendJson(res, 200, { status: "healthy", name: info.name, version: info.version, tools: tools.length });
      return;
    }

    if (url.pathname === mcpPath) {
      handleMcp(req, res).catch((error: unknown) => {
        console.error(`[server] MCP request failed: ${String(error)}`);
        if (!res.headersSent) {
          sendJson(res, 500, {
            jsonrpc: "2.0",
            error: { code: -32603, message: "Internal server error" },
            id: null,
          });
        }
      });
      return;
    }

    sendJson(res, 404, { error: `Not found: ${url.pathname}` });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port;
  console.log(`[server] ${info.name} ${info.version} listening on http://${host}:${port}${mcpPath} with ${tools.length} tools`);

  return {
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
        httpServer.closeAllConnections();
      }),
  };
}
