/**
 * Response adapters. Backend payloads arrive as camelCase REST JSON, as
 * snake_case objects from other clients, or as class instances; nothing
 * outside this file inspects them directly. Each response family gets a
 * fixed accessor interface, selected by an explicit tag, and every accessor
 * returns an optional value.
 */

import type { CustomMetadataEntry } from "../file-search/model.js";

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Raw {
  return isRecord(value) ? value : {};
}

/** First present field among the given spellings. */
function field(raw: Raw, ...keys: string[]): unknown {
  for (const key of keys) {
    if (raw[key] !== undefined && raw[key] !== null) return raw[key];
  }
  return undefined;
}

function str(raw: Raw, ...keys: string[]): string | undefined {
  const value = field(raw, ...keys);
  return typeof value === "string" ? value : undefined;
}

/** Numbers may arrive as strings (int64 fields are JSON strings). */
function num(raw: Raw, ...keys: string[]): number | undefined {
  const value = field(raw, ...keys);
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
}

function bool(raw: Raw, ...keys: string[]): boolean | undefined {
  const value = field(raw, ...keys);
  return typeof value === "boolean" ? value : undefined;
}

function list(raw: Raw, ...keys: string[]): unknown[] | undefined {
  const value = field(raw, ...keys);
  return Array.isArray(value) ? value : undefined;
}

/** Timestamps may be strings or Date objects. */
function time(raw: Raw, ...keys: string[]): string | undefined {
  const value = field(raw, ...keys);
  if (typeof value === "string") return value;
  if (value instanceof Date && !Number.isNaN(value.getTime())) return value.toISOString();
  return undefined;
}

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

export interface StoreView {
  readonly kind: "store";
  name(): string | undefined;
  displayName(): string | undefined;
  activeDocumentsCount(): number | undefined;
  pendingDocumentsCount(): number | undefined;
  failedDocumentsCount(): number | undefined;
  sizeBytes(): number | undefined;
  createTime(): string | undefined;
  updateTime(): string | undefined;
}

export interface DocumentView {
  readonly kind: "document";
  name(): string | undefined;
  displayName(): string | undefined;
  state(): string | undefined;
  sizeBytes(): number | undefined;
  mimeType(): string | undefined;
  customMetadata(): CustomMetadataEntry[] | undefined;
  createTime(): string | undefined;
  updateTime(): string | undefined;
}

export interface OperationErrorView {
  code?: number;
  message?: string;
  details?: unknown[];
}

export interface OperationView {
  readonly kind: "operation";
  name(): string | undefined;
  done(): boolean | undefined;
  error(): OperationErrorView | undefined;
  response(): unknown;
  metadata(): unknown;
  /** Resulting document name from the response or the metadata. */
  documentName(): string | undefined;
}

export interface GroundingChunkView {
  title(): string | undefined;
  uri(): string | undefined;
  text(): string | undefined;
  /** The chunk as received, for normalization into citation metadata. */
  raw(): unknown;
}

export interface CandidateView {
  /** Text of each text-bearing part, in order. */
  textParts(): string[] | undefined;
  groundingMetadata(): unknown;
  groundingChunks(): GroundingChunkView[] | undefined;
}

export interface GenerateView {
  readonly kind: "generate";
  firstCandidate(): CandidateView | undefined;
  modelVersion(): string | undefined;
}

export interface ResponseViews {
  store: StoreView;
  document: DocumentView;
  operation: OperationView;
  generate: GenerateView;
}

export type ResponseKind = keyof ResponseViews;

// ---------------------------------------------------------------------------
// Adapters
// ---------------------------------------------------------------------------

function adaptStore(input: unknown): StoreView {
  const raw = asRecord(input);
  return {
    kind: "store",
    name: () => str(raw, "name"),
    displayName: () => str(raw, "displayName", "display_name"),
    activeDocumentsCount: () => num(raw, "activeDocumentsCount", "active_documents_count"),
    pendingDocumentsCount: () => num(raw, "pendingDocumentsCount", "pending_documents_count"),
    failedDocumentsCount: () => num(raw, "failedDocumentsCount", "failed_documents_count"),
    sizeBytes: () => num(raw, "sizeBytes", "size_bytes"),
    createTime: () => time(raw, "createTime", "create_time"),
    updateTime: () => time(raw, "updateTime", "update_time"),
  };
}

function adaptMetadataEntry(input: unknown): CustomMetadataEntry | undefined {
  const raw = asRecord(input);
  const key = str(raw, "key");
  if (!key) return undefined;

  const stringValue = str(raw, "stringValue", "string_value");
  if (stringValue !== undefined) return { key, string_value: stringValue };

  const numericValue = num(raw, "numericValue", "numeric_value");
  if (numericValue !== undefined) return { key, numeric_value: numericValue };

  const listValue = field(raw, "stringListValue", "string_list_value");
  // REST wraps the list as { values: [...] }; other clients send a bare list.
  const values = Array.isArray(listValue) ? listValue : list(asRecord(listValue), "values");
  if (values) {
    return { key, string_list_value: values.filter((v): v is string => typeof v === "string") };
  }
  return undefined;
}

function adaptDocument(input: unknown): DocumentView {
  const raw = asRecord(input);
  return {
    kind: "document",
    name: () => str(raw, "name"),
    displayName: () => str(raw, "displayName", "display_name"),
    state: () => str(raw, "state"),
    sizeBytes: () => num(raw, "sizeBytes", "size_bytes"),
    mimeType: () => str(raw, "mimeType", "mime_type"),
    customMetadata: () => {
      const entries = list(raw, "customMetadata", "custom_metadata");
      if (!entries) return undefined;
      return entries
        .map(adaptMetadataEntry)
        .filter((entry): entry is CustomMetadataEntry => entry !== undefined);
    },
    createTime: () => time(raw, "createTime", "create_time"),
    updateTime: () => time(raw, "updateTime", "update_time"),
  };
}

function adaptOperation(input: unknown): OperationView {
  const raw = asRecord(input);
  return {
    kind: "operation",
    name: () => str(raw, "name"),
    done: () => bool(raw, "done"),
    error: () => {
      const error = field(raw, "error");
      if (!isRecord(error)) return undefined;
      return {
        code: num(error, "code"),
        message: str(error, "message"),
        details: list(error, "details"),
      };
    },
    response: () => field(raw, "response"),
    metadata: () => field(raw, "metadata"),
    documentName: () =>
      str(asRecord(field(raw, "response")), "documentName", "document_name") ??
      str(asRecord(field(raw, "metadata")), "documentName", "document_name"),
  };
}

function adaptGroundingChunk(input: unknown): GroundingChunkView {
  const raw = asRecord(input);
  const context = asRecord(field(raw, "retrievedContext", "retrieved_context"));
  return {
    title: () => str(context, "title") ?? str(raw, "title", "documentName", "document_name"),
    uri: () => str(context, "uri") ?? str(raw, "uri"),
    text: () => str(context, "text") ?? str(raw, "text", "content"),
    raw: () => input,
  };
}

function adaptCandidate(input: unknown): CandidateView {
  const raw = asRecord(input);
  const grounding = () => field(raw, "groundingMetadata", "grounding_metadata");
  return {
    textParts: () => {
      const parts = list(asRecord(field(raw, "content")), "parts");
      if (!parts) return undefined;
      return parts
        .map((part) => str(asRecord(part), "text"))
        .filter((text): text is string => text !== undefined);
    },
    groundingMetadata: grounding,
    groundingChunks: () => {
      const chunks = list(asRecord(grounding()), "groundingChunks", "grounding_chunks");
      return chunks?.map(adaptGroundingChunk);
    },
  };
}

function adaptGenerate(input: unknown): GenerateView {
  const raw = asRecord(input);
  return {
    kind: "generate",
    firstCandidate: () => {
      const candidates = list(raw, "candidates");
      return candidates && candidates.length > 0 ? adaptCandidate(candidates[0]) : undefined;
    },
    modelVersion: () => str(raw, "modelVersion", "model_version"),
  };
}

const ADAPTERS: { [K in ResponseKind]: (raw: unknown) => ResponseViews[K] } = {
  store: adaptStore,
  document: adaptDocument,
  operation: adaptOperation,
  generate: adaptGenerate,
};

export function adaptResponse<K extends ResponseKind>(kind: K, raw: unknown): ResponseViews[K] {
  return ADAPTERS[kind](raw);
}
