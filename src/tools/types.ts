import type { TObject } from "@sinclair/typebox";
import type { ErrorKind } from "../errors.js";
import type { JsonValue } from "../normalize.js";

export interface ToolTextContent {
  type: "text";
  text: string;
}

export interface ToolErrorInfo {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  /** Present when the retry policy gave up. */
  attempts?: number;
  details?: JsonValue;
}

export type ToolDetails =
  | { ok: true; data: JsonValue }
  | { ok: false; error: ToolErrorInfo };

export interface ToolResult {
  content: ToolTextContent[];
  details: ToolDetails;
  isError?: boolean;
}

/**
 * A callable operation. Arguments arrive unchecked and are validated against
 * `parameters` inside execute; failures come back as results, never throws.
 */
export interface FileSearchTool {
  name: string;
  label: string;
  description: string;
  parameters: TObject;
  execute(toolCallId: string, args: unknown): Promise<ToolResult>;
}
