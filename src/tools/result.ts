/**
 * Shared helpers for building ToolResult objects and defining tools.
 */

import type { Static, TObject, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { classifyError, PartialFailureError, ValidationError } from "../errors.js";
import { normalize, type JsonObject, type JsonValue } from "../normalize.js";
import type { FileSearchTool, ToolErrorInfo, ToolResult } from "./types.js";

/**
 * Build a failure ToolResult from a caught error.
 *
 * @param prefix  Optional prefix for the displayed message, e.g. "Failed to upload file".
 *                The raw error message is always stored separately in details.
 */
export function toolError(error: unknown, prefix?: string): ToolResult {
  const classified = classifyError(error);
  const info: ToolErrorInfo = {
    kind: classified.kind,
    message: classified.message,
    retryable: classified.retryable,
  };
  if (classified.attempts !== undefined) info.attempts = classified.attempts;

  if (classified instanceof PartialFailureError) {
    const details: JsonObject = {
      deleted_document_name: classified.deletedDocumentName,
      store_name: classified.storeName,
    };
    if (classified.details !== undefined) details.cause = normalize(classified.details);
    info.details = details;
  } else if (classified.details !== undefined) {
    info.details = normalize(classified.details);
  }

  const displayMsg = prefix ? `${prefix}: ${classified.message}` : classified.message;
  return {
    content: [{ type: "text", text: JSON.stringify({ error: displayMsg, kind: info.kind, retryable: info.retryable }) }],
    details: { ok: false, error: info },
    isError: true,
  };
}

/**
 * Build a success ToolResult with a JSON payload.
 */
export function toolSuccess(data: unknown): ToolResult {
  const normalized: JsonValue = normalize(data);
  return {
    content: [{ type: "text", text: JSON.stringify(normalized, null, 2) }],
    details: { ok: true, data: normalized },
  };
}

/**
 * Check tool arguments against a schema. Missing arguments count as {}.
 */
export function parseArgs<T extends TSchema>(schema: T, args: unknown): Static<T> {
  const value = args ?? {};
  if (Value.Check(schema, value)) return value;

  const problems = [...Value.Errors(schema, value)]
    .slice(0, 5)
    .map((e) => `${e.path || "/"}: ${e.message}`);
  throw new ValidationError(`Invalid arguments: ${problems.join("; ")}`);
}

export interface ToolDefinition<T extends TObject> {
  name: string;
  description: string;
  parameters: T;
  /** Prefix for error messages, e.g. "Failed to upload file". */
  failure: string;
  run(params: Static<T>): Promise<unknown>;
}

/**
 * Wrap a typed handler as a FileSearchTool: validate, run, and turn both
 * outcomes into a ToolResult.
 */
export function defineTool<T extends TObject>(definition: ToolDefinition<T>): FileSearchTool {
  return {
    name: definition.name,
    label: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    async execute(_toolCallId: string, args: unknown): Promise<ToolResult> {
      try {
        const params = parseArgs(definition.parameters, args);
        return toolSuccess(await definition.run(params));
      } catch (error) {
        const result = toolError(error, definition.failure);
        if (!result.details.ok) {
          console.warn(`[tools] ${definition.name} failed (${result.details.error.kind}): ${result.details.error.message}`);
        }
        return result;
      }
    },
  };
}
