/**
 * Document ingestion and management, including the metadata update that
 * the backend cannot do in place.
 */

import type { FileSearchBackend } from "../backend/types.js";
import { classifyError, errorMessage, NotFoundError, PartialFailureError, ValidationError } from "../errors.js";
import { checkPageSize, DEFAULT_PAGE_SIZE } from "../pagination.js";
import { withRetry, type RetryOptions } from "../retry.js";
import { toDocument, toOperation } from "./convert.js";
import { inferMimeType, isSupportedMimeType } from "./formats.js";
import {
  buildChunkingConfig,
  decodeFileBytes,
  MAX_CUSTOM_METADATA_ENTRIES,
  validateCustomMetadata,
  validateDisplayName,
} from "./metadata.js";
import type { Document } from "./model.js";
import { assertResourceName, isDocumentOfStore, storeNameFromDocumentName } from "./names.js";
import type { DeleteResult, ListInput } from "./stores.js";

export interface IngestLimits {
  max_file_size_mb: number;
  max_custom_metadata: number;
}

export const DEFAULT_INGEST_LIMITS: IngestLimits = {
  max_file_size_mb: 100,
  max_custom_metadata: MAX_CUSTOM_METADATA_ENTRIES,
};

export interface IngestOptions {
  retry?: RetryOptions;
  limits?: IngestLimits;
}

export interface UploadFileInput {
  store_name: string;
  file_bytes_base64: string;
  display_name?: string;
  /** Inferred from display_name's extension when omitted. */
  mime_type?: string;
  chunking_config?: unknown;
  custom_metadata?: unknown;
}

export interface UploadFileResult {
  operation_name: string;
  document_name?: string;
}

export interface ImportFileInput {
  store_name: string;
  /** Files API resource, e.g. "files/abc123". */
  file_name: string;
  chunking_config?: unknown;
  custom_metadata?: unknown;
}

export interface ImportFileResult {
  operation_name: string;
}

export interface ListDocumentsInput extends ListInput {
  store_name: string;
}

export interface DocumentListing {
  documents: Document[];
  next_page_token?: string;
}

export interface UpdateMetadataInput {
  document_name: string;
  new_custom_metadata: unknown;
  /** The original file, re-uploaded after the delete. */
  original_file_bytes_base64: string;
  /** Must name the store in document_name, which is used when omitted. */
  store_name?: string;
  display_name?: string;
  mime_type?: string;
  chunking_config?: unknown;
}

export interface UpdateMetadataResult {
  operation_name: string;
  new_document_name?: string;
  previous_document_name: string;
  store_name: string;
}

export async function uploadFile(
  backend: FileSearchBackend,
  input: UploadFileInput,
  options: IngestOptions = {},
): Promise<UploadFileResult> {
  const limits = options.limits ?? DEFAULT_INGEST_LIMITS;
  assertResourceName(input.store_name, "store_name");
  validateDisplayName(input.display_name);
  const customMetadata = validateCustomMetadata(input.custom_metadata, limits.max_custom_metadata);
  const chunkingConfig = buildChunkingConfig(input.chunking_config);
  const bytes = decodeFileBytes(input.file_bytes_base64, limits.max_file_size_mb);
  const mimeType = input.mime_type || inferMimeType(input.display_name);
  if (mimeType && !isSupportedMimeType(mimeType)) {
    console.warn(`[documents] ${mimeType} is not a listed format; uploading anyway`);
  }

  console.log(
    `[documents] Uploading ${(bytes.length / 1024 / 1024).toFixed(2)} MB to ${input.store_name}` +
    (mimeType ? ` as ${mimeType}` : ""),
  );

  const view = await withRetry(
    () => backend.uploadToStore(input.store_name, {
      bytes,
      displayName: input.display_name,
      mimeType,
      customMetadata,
      chunkingConfig,
    }),
    { ...options.retry, label: "upload_file" },
  );
  const operation = toOperation(view);
  console.log(`[documents] Upload operation started: ${operation.name}`);
  return {
    operation_name: operation.name,
    ...(operation.document_name ? { document_name: operation.document_name } : {}),
  };
}

export async function importFile(
  backend: FileSearchBackend,
  input: ImportFileInput,
  options: IngestOptions = {},
): Promise<ImportFileResult> {
  const limits = options.limits ?? DEFAULT_INGEST_LIMITS;
  assertResourceName(input.store_name, "store_name");
  assertResourceName(input.file_name, "file_name");
  const customMetadata = validateCustomMetadata(input.custom_metadata, limits.max_custom_metadata);
  const chunkingConfig = buildChunkingConfig(input.chunking_config);

  const view = await withRetry(
    () => backend.importFile(input.store_name, {
      fileName: input.file_name,
      customMetadata,
      chunkingConfig,
    }),
    { ...options.retry, label: "import_file" },
  );
  const operation = toOperation(view);
  console.log(`[documents] Import of ${input.file_name} started: ${operation.name}`);
  return { operation_name: operation.name };
}

/** One page of documents. Follow next_page_token for the rest. */
export async function listDocuments(
  backend: FileSearchBackend,
  input: ListDocumentsInput,
): Promise<DocumentListing> {
  assertResourceName(input.store_name, "store_name");
  checkPageSize(input.page_size);
  const page = await backend.listDocuments(
    input.store_name,
    input.page_size ?? DEFAULT_PAGE_SIZE,
    input.page_token || undefined,
  );
  return {
    documents: page.items.map(toDocument),
    ...(page.nextPageToken ? { next_page_token: page.nextPageToken } : {}),
  };
}

export async function getDocument(backend: FileSearchBackend, name: string): Promise<Document> {
  assertResourceName(name, "document_name");
  storeNameFromDocumentName(name);
  return toDocument(await backend.getDocument(name));
}

export async function deleteDocument(
  backend: FileSearchBackend,
  name: string,
  force = false,
): Promise<DeleteResult> {
  assertResourceName(name, "document_name");
  storeNameFromDocumentName(name);
  await backend.deleteDocument(name, force);
  console.log(`[documents] Deleted ${name}`);
  return { deleted: true, name };
}

/**
 * Forced delete ahead of a re-upload. A transient failure leaves the delete
 * outcome open, so the document is looked up again: gone means the delete
 * went through, still there means nothing was lost and the error stands.
 * When even the lookup fails the outcome stays unknown, reported as a
 * partial failure so the caller keeps the bytes.
 */
async function deleteForReupload(
  backend: FileSearchBackend,
  documentName: string,
  storeName: string,
): Promise<void> {
  try {
    await backend.deleteDocument(documentName, true);
    return;
  } catch (error) {
    const cause = classifyError(error);
    if (!cause.retryable) throw cause;

    console.warn(`[documents] Delete of ${documentName} failed (${cause.kind}); checking whether it went through`);
    try {
      await backend.getDocument(documentName);
    } catch (lookupError) {
      if (classifyError(lookupError) instanceof NotFoundError) {
        console.log(`[documents] ${documentName} is gone; continuing with the re-upload`);
        return;
      }
      throw new PartialFailureError(
        `Delete of ${documentName} may have gone through: ${errorMessage(cause)}. ` +
        "Check whether the document still exists before uploading it again.",
        { deletedDocumentName: documentName, storeName },
        { cause, details: { kind: cause.kind, delete_outcome: "unknown" } },
      );
    }
    throw cause;
  }
}

/**
 * Replace a document's custom metadata by deleting it and uploading the
 * original bytes again with the new entries.
 *
 * All input is validated and the bytes decoded before the delete. If the
 * upload fails after the delete went through, the document is gone and a
 * PartialFailureError names what was lost. There is no rollback.
 */
export async function updateDocumentMetadata(
  backend: FileSearchBackend,
  input: UpdateMetadataInput,
  options: IngestOptions = {},
): Promise<UpdateMetadataResult> {
  const limits = options.limits ?? DEFAULT_INGEST_LIMITS;
  const documentName = input.document_name;
  assertResourceName(documentName, "document_name");

  const customMetadata = validateCustomMetadata(input.new_custom_metadata, limits.max_custom_metadata);
  const chunkingConfig = buildChunkingConfig(input.chunking_config);
  validateDisplayName(input.display_name);
  if (!input.original_file_bytes_base64) {
    throw new ValidationError(
      "original_file_bytes_base64 is required: metadata is updated by deleting and re-uploading the file",
    );
  }
  const bytes = decodeFileBytes(
    input.original_file_bytes_base64,
    limits.max_file_size_mb,
    "original_file_bytes_base64",
  );
  const storeName = storeNameFromDocumentName(documentName);
  if (input.store_name && !isDocumentOfStore(documentName, input.store_name)) {
    throw new ValidationError(
      `Document ${documentName} belongs to ${storeName}, not ${input.store_name}; ` +
      "metadata updates re-upload into the same store",
    );
  }

  const existing = toDocument(await backend.getDocument(documentName));
  const displayName = input.display_name || existing.display_name || undefined;
  const mimeType = input.mime_type || existing.mime_type || inferMimeType(displayName);

  console.log(`[documents] Updating metadata of ${documentName}: deleting and re-uploading`);
  await deleteForReupload(backend, documentName, storeName);

  try {
    const view = await withRetry(
      () => backend.uploadToStore(storeName, {
        bytes,
        displayName,
        mimeType,
        customMetadata,
        chunkingConfig,
      }),
      { ...options.retry, label: "update_document_metadata" },
    );
    const operation = toOperation(view);
    console.log(`[documents] Re-upload of ${documentName} started: ${operation.name}`);
    return {
      operation_name: operation.name,
      ...(operation.document_name ? { new_document_name: operation.document_name } : {}),
      previous_document_name: documentName,
      store_name: storeName,
    };
  } catch (error) {
    const cause = classifyError(error);
    console.error(
      `[documents] ${documentName} was deleted but re-upload to ${storeName} failed: ${errorMessage(cause)}`,
    );
    throw new PartialFailureError(
      `Document ${documentName} was deleted but re-upload failed: ${errorMessage(cause)}. ` +
      "Upload the file again to restore it.",
      { deletedDocumentName: documentName, storeName },
      { cause, details: { kind: cause.kind, attempts: cause.attempts ?? 1 } },
    );
  }
}
