/**
 * Resource model for file search stores, documents and long-running
 * operations, plus the state rules that govern them.
 *
 * Field names are snake_case because these objects are returned to the tool
 * host as-is (after normalization).
 */

import type { JsonObject, JsonValue } from "../normalize.js";

export const DOCUMENT_STATES = ["PROCESSING", "ACTIVE", "FAILED", "UNKNOWN"] as const;
export type DocumentState = (typeof DOCUMENT_STATES)[number];

export interface DocumentCounts {
  /** active + processing + failed. */
  total: number;
  active: number;
  processing: number;
  failed: number;
}

export interface Store {
  name: string;
  display_name: string;
  counts: DocumentCounts;
  size_bytes: number;
  create_time?: string;
  update_time?: string;
}

/** Exactly one value variant is set per entry. */
export type CustomMetadataEntry =
  | { key: string; string_value: string }
  | { key: string; numeric_value: number }
  | { key: string; string_list_value: string[] };

export interface Document {
  name: string;
  display_name: string;
  state: DocumentState;
  size_bytes?: number;
  mime_type?: string;
  custom_metadata: CustomMetadataEntry[];
  create_time?: string;
  update_time?: string;
}

export interface OperationError {
  code?: number;
  message: string;
  details: JsonValue[];
}

export interface Operation {
  name: string;
  done: boolean;
  error?: OperationError;
  response?: JsonObject;
  metadata?: JsonObject;
  /** Resulting document, when the backend reports one. */
  document_name?: string;
}

export interface Citation {
  source: string;
  snippet: string;
  metadata: JsonObject;
}

export interface SearchResult {
  answer_text: string;
  citations: Citation[];
  grounding_metadata: JsonValue;
  used_stores: string[];
  model: string;
}

export interface WhiteSpaceChunkingConfig {
  max_tokens_per_chunk?: number;
  max_overlap_tokens?: number;
}

export interface ChunkingConfig {
  white_space_config?: WhiteSpaceChunkingConfig;
  [key: string]: unknown;
}

// ---------------------------------------------------------------------------
// Document states
// ---------------------------------------------------------------------------

/** Map the backend's state enum onto ours. */
export function toDocumentState(raw: string | undefined): DocumentState {
  switch (raw) {
    case "STATE_PENDING":
    case "PROCESSING":
      return "PROCESSING";
    case "STATE_ACTIVE":
    case "ACTIVE":
      return "ACTIVE";
    case "STATE_FAILED":
    case "FAILED":
      return "FAILED";
    default:
      return "UNKNOWN";
  }
}

// ---------------------------------------------------------------------------
// Operation lifecycle
// ---------------------------------------------------------------------------

export type OperationPhase = "pending" | "succeeded" | "failed";

export function operationPhase(operation: Pick<Operation, "done" | "error">): OperationPhase {
  if (!operation.done) return "pending";
  return operation.error ? "failed" : "succeeded";
}
