/**
 * Tool registry. Tool names and argument shapes are the stable contract
 * with the host; everything behind them may change.
 */

import { getBackend } from "../backend/client.js";
import type { Config } from "../config.js";
import { toolContextFromConfig, type ToolContext } from "./context.js";
import { createDocumentTools } from "./document-tools.js";
import { createSearchTool } from "./search-tool.js";
import { createStoreTools } from "./store-tools.js";
import type { FileSearchTool } from "./types.js";
import { createUtilTools } from "./util-tools.js";

export type { ToolContext } from "./context.js";
export { toolContextFromConfig } from "./context.js";
export { toolError, toolSuccess } from "./result.js";
export type { FileSearchTool, ToolDetails, ToolErrorInfo, ToolResult } from "./types.js";

export function createTools(ctx: ToolContext): FileSearchTool[] {
  const tools = [
    ...createStoreTools(ctx),
    ...createDocumentTools(ctx),
    createSearchTool(ctx),
    ...createUtilTools(ctx),
  ];

  const names = new Set<string>();
  for (const tool of tools) {
    if (names.has(tool.name)) {
      throw new Error(`Duplicate tool name: ${tool.name}`);
    }
    names.add(tool.name);
  }
  return tools;
}

/** Tools wired to the shared backend built from config. */
export function createToolsFromConfig(config: Config): FileSearchTool[] {
  return createTools(toolContextFromConfig(config, getBackend(config)));
}
