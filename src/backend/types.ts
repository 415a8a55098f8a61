/**
 * FileSearchBackend: the transport primitives the orchestration layer runs
 * on. Implementations return adapter views, never raw payloads, and throw
 * classified FileSearchErrors.
 */

import type { ChunkingConfig, CustomMetadataEntry } from "../file-search/model.js";
import type { Page } from "../pagination.js";
import type { DocumentView, GenerateView, OperationView, StoreView } from "./adapters.js";

export interface UploadRequest {
  bytes: Buffer;
  displayName?: string;
  mimeType?: string;
  customMetadata?: CustomMetadataEntry[];
  chunkingConfig?: ChunkingConfig;
}

export interface ImportRequest {
  /** Files API resource name, e.g. "files/abc123". */
  fileName: string;
  customMetadata?: CustomMetadataEntry[];
  chunkingConfig?: ChunkingConfig;
}

export interface GenerateRequest {
  model: string;
  query: string;
  storeNames: string[];
  metadataFilter?: string;
  maxOutputTokens?: number;
  temperature?: number;
}

export interface FileSearchBackend {
  createStore(displayName?: string): Promise<StoreView>;
  listStores(pageSize: number, pageToken?: string): Promise<Page<StoreView>>;
  getStore(name: string): Promise<StoreView>;
  /** Without force, fails with FailedPreconditionError while documents remain. */
  deleteStore(name: string, force: boolean): Promise<void>;

  /** Upload raw bytes into a store. Returns the ingestion operation. */
  uploadToStore(storeName: string, request: UploadRequest): Promise<OperationView>;
  /** Import a file already uploaded through the Files API. */
  importFile(storeName: string, request: ImportRequest): Promise<OperationView>;
  listDocuments(storeName: string, pageSize: number, pageToken?: string): Promise<Page<DocumentView>>;
  getDocument(name: string): Promise<DocumentView>;
  deleteDocument(name: string, force: boolean): Promise<void>;

  getOperation(name: string): Promise<OperationView>;
  generateContent(request: GenerateRequest): Promise<GenerateView>;
}
