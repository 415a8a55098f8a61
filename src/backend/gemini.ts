/**
 * Gemini File Search backend over the REST API (v1beta).
 *
 * Endpoints used here:
 *   POST   /fileSearchStores                          create store
 *   GET    /fileSearchStores?pageSize&pageToken       list stores
 *   GET    /<store>                                   get store
 *   DELETE /<store>?force                             delete store
 *   POST   /upload/v1beta/<store>:uploadToFileSearchStore   multipart upload
 *   POST   /<store>:importFile                        import a Files API file
 *   GET    /<store>/documents?pageSize&pageToken      list documents
 *   GET    /<document>                                get document
 *   DELETE /<document>?force                          delete document
 *   GET    /<operation>                               poll operation
 *   POST   /models/<model>:generateContent            grounded generation
 *
 * Metadata and list calls use the short request timeout; uploads and
 * generation use the long one. Every failure is rethrown as a classified
 * FileSearchError.
 */

import { randomUUID } from "node:crypto";
import axios from "axios";
import { classifyError } from "../errors.js";
import type { ChunkingConfig, CustomMetadataEntry } from "../file-search/model.js";
import type { Page } from "../pagination.js";
import {
  adaptResponse,
  type DocumentView,
  type GenerateView,
  type OperationView,
  type StoreView,
} from "./adapters.js";
import type { FileSearchBackend, GenerateRequest, ImportRequest, UploadRequest } from "./types.js";

export interface GeminiBackendConfig {
  api_key: string;
  /** e.g. https://generativelanguage.googleapis.com/v1beta */
  base_url: string;
  /** e.g. https://generativelanguage.googleapis.com/upload/v1beta */
  upload_base_url: string;
  request_timeout_ms: number;
  upload_timeout_ms: number;
}

export const DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
export const DEFAULT_UPLOAD_BASE_URL = "https://generativelanguage.googleapis.com/upload/v1beta";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toWireMetadata(entries: CustomMetadataEntry[]): Array<Record<string, unknown>> {
  return entries.map((entry) => {
    if ("string_value" in entry) return { key: entry.key, stringValue: entry.string_value };
    if ("numeric_value" in entry) return { key: entry.key, numericValue: entry.numeric_value };
    return { key: entry.key, stringListValue: { values: entry.string_list_value } };
  });
}

function snakeToCamel(key: string): string {
  return key.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

/** Chunking config keys are snake_case on our side, camelCase on the wire. */
function toWireChunking(config: ChunkingConfig): Record<string, unknown> {
  const convert = (value: unknown): unknown => {
    if (!isRecord(value)) return value;
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[snakeToCamel(key)] = convert(entry);
    }
    return result;
  };
  const converted = convert(config);
  return isRecord(converted) ? converted : {};
}

function ingestionBody(request: {
  customMetadata?: CustomMetadataEntry[];
  chunkingConfig?: ChunkingConfig;
}): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  if (request.customMetadata && request.customMetadata.length > 0) {
    body.customMetadata = toWireMetadata(request.customMetadata);
  }
  if (request.chunkingConfig) {
    body.chunkingConfig = toWireChunking(request.chunkingConfig);
  }
  return body;
}

/**
 * Build a multipart/related body: a JSON metadata part followed by the file.
 */
export function buildMultipartBody(
  metadata: Record<string, unknown>,
  bytes: Buffer,
  mimeType: string,
  boundary: string,
): Buffer {
  const head =
    `--${boundary}\r\n` +
    "Content-Type: application/json; charset=UTF-8\r\n\r\n" +
    `${JSON.stringify(metadata)}\r\n` +
    `--${boundary}\r\n` +
    `Content-Type: ${mimeType}\r\n\r\n`;
  const tail = `\r\n--${boundary}--\r\n`;
  return Buffer.concat([Buffer.from(head, "utf-8"), bytes, Buffer.from(tail, "utf-8")]);
}

function pageOf<T>(data: unknown, itemsKey: string, adapt: (raw: unknown) => T): Page<T> {
  const body = isRecord(data) ? data : {};
  const rawItems = body[itemsKey];
  const items = Array.isArray(rawItems) ? rawItems.map(adapt) : [];
  const token = body.nextPageToken;
  return {
    items,
    nextPageToken: typeof token === "string" && token ? token : undefined,
  };
}

export class GeminiRestBackend implements FileSearchBackend {
  private readonly baseUrl: string;
  private readonly uploadBaseUrl: string;

  constructor(private readonly config: GeminiBackendConfig) {
    this.baseUrl = config.base_url.replace(/\/$/, "");
    this.uploadBaseUrl = config.upload_base_url.replace(/\/$/, "");
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    return { "x-goog-api-key": this.config.api_key, ...extra };
  }

  private async request<T>(label: string, send: () => Promise<{ data: unknown }>, adapt: (data: unknown) => T): Promise<T> {
    try {
      const response = await send();
      return adapt(response.data);
    } catch (error) {
      const classified = classifyError(error);
      console.debug(`[gemini] ${label} failed (${classified.kind}): ${classified.message}`);
      throw classified;
    }
  }

  async createStore(displayName?: string): Promise<StoreView> {
    const body = displayName ? { displayName } : {};
    return this.request(
      "createStore",
      () => axios.post<unknown>(`${this.baseUrl}/fileSearchStores`, body, {
        headers: this.headers(),
        timeout: this.config.request_timeout_ms,
      }),
      (data) => adaptResponse("store", data),
    );
  }

  async listStores(pageSize: number, pageToken?: string): Promise<Page<StoreView>> {
    return this.request(
      "listStores",
      () => axios.get<unknown>(`${this.baseUrl}/fileSearchStores`, {
        headers: this.headers(),
        params: { pageSize, ...(pageToken ? { pageToken } : {}) },
        timeout: this.config.request_timeout_ms,
      }),
      (data) => pageOf(data, "fileSearchStores", (raw) => adaptResponse("store", raw)),
    );
  }

  async getStore(name: string): Promise<StoreView> {
    return this.request(
      "getStore",
      () => axios.get<unknown>(`${this.baseUrl}/${name}`, {
        headers: this.headers(),
        timeout: this.config.request_timeout_ms,
      }),
      (data) => adaptResponse("store", data),
    );
  }

  async deleteStore(name: string, force: boolean): Promise<void> {
    await this.request(
      "deleteStore",
      () => axios.delete<unknown>(`${this.baseUrl}/${name}`, {
        headers: this.headers(),
        params: { force },
        timeout: this.config.request_timeout_ms,
      }),
      () => undefined,
    );
  }

  async uploadToStore(storeName: string, request: UploadRequest): Promise<OperationView> {
    const mimeType = request.mimeType ?? "application/octet-stream";
    const metadata: Record<string, unknown> = { ...ingestionBody(request) };
    if (request.displayName) metadata.displayName = request.displayName;
    if (request.mimeType) metadata.mimeType = request.mimeType;

    const boundary = `file-search-${randomUUID()}`;
    const body = buildMultipartBody(metadata, request.bytes, mimeType, boundary);

    return this.request(
      "uploadToStore",
      () => axios.post<unknown>(`${this.uploadBaseUrl}/${storeName}:uploadToFileSearchStore`, body, {
        headers: this.headers({
          "Content-Type": `multipart/related; boundary=${boundary}`,
          "X-Goog-Upload-Protocol": "multipart",
        }),
        params: { uploadType: "multipart" },
        timeout: this.config.upload_timeout_ms,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
      }),
      (data) => adaptResponse("operation", data),
    );
  }

  async importFile(storeName: string, request: ImportRequest): Promise<OperationView> {
    const body = { fileName: request.fileName, ...ingestionBody(request) };
    return this.request(
      "importFile",
      () => axios.post<unknown>(`${this.baseUrl}/${storeName}:importFile`, body, {
        headers: this.headers(),
        timeout: this.config.request_timeout_ms,
      }),
      (data) => adaptResponse("operation", data),
    );
  }

  async listDocuments(storeName: string, pageSize: number, pageToken?: string): Promise<Page<DocumentView>> {
    return this.request(
      "listDocuments",
      () => axios.get<unknown>(`${this.baseUrl}/${storeName}/documents`, {
        headers: this.headers(),
        params: { pageSize, ...(pageToken ? { pageToken } : {}) },
        timeout: this.config.request_timeout_ms,
      }),
      (data) => pageOf(data, "documents", (raw) => adaptResponse("document", raw)),
    );
  }

  async getDocument(name: string): Promise<DocumentView> {
    return this.request(
      "getDocument",
      () => axios.get<unknown>(`${this.baseUrl}/${name}`, {
        headers: this.headers(),
        timeout: this.config.request_timeout_ms,
      }),
      (data) => adaptResponse("document", data),
    );
  }

  async deleteDocument(name: string, force: boolean): Promise<void> {
    await this.request(
      "deleteDocument",
      () => axios.delete<unknown>(`${this.baseUrl}/${name}`, {
        headers: this.headers(),
        params: { force },
        timeout: this.config.request_timeout_ms,
      }),
      () => undefined,
    );
  }

  async getOperation(name: string): Promise<OperationView> {
    return this.request(
      "getOperation",
      () => axios.get<unknown>(`${this.baseUrl}/${name}`, {
        headers: this.headers(),
        timeout: this.config.request_timeout_ms,
      }),
      (data) => adaptResponse("operation", data),
    );
  }

  async generateContent(request: GenerateRequest): Promise<GenerateView> {
    const fileSearch: Record<string, unknown> = { fileSearchStoreNames: request.storeNames };
    if (request.metadataFilter) fileSearch.metadataFilter = request.metadataFilter;

    const generationConfig: Record<string, unknown> = {};
    if (request.maxOutputTokens !== undefined) generationConfig.maxOutputTokens = request.maxOutputTokens;
    if (request.temperature !== undefined) generationConfig.temperature = request.temperature;

    const body: Record<string, unknown> = {
      contents: [{ role: "user", parts: [{ text: request.query }] }],
      tools: [{ fileSearch }],
    };
    if (Object.keys(generationConfig).length > 0) body.generationConfig = generationConfig;

    const model = request.model.startsWith("models/") ? request.model : `models/${request.model}`;
    return this.request(
      "generateContent",
      () => axios.post<unknown>(`${this.baseUrl}/${model}:generateContent`, body, {
        headers: this.headers(),
        timeout: this.config.upload_timeout_ms,
      }),
      (data) => adaptResponse("generate", data),
    );
  }
}
