/**
 * Document tools: ingest files into a store and manage the resulting
 * documents. Ingestion returns an operation to poll with
 * get_operation_status; nothing here waits for indexing to finish.
 */

import { Type } from "@sinclair/typebox";
import {
  deleteDocument,
  getDocument,
  importFile,
  listDocuments,
  updateDocumentMetadata,
  uploadFile,
} from "../file-search/documents.js";
import type { ToolContext } from "./context.js";
import { defineTool } from "./result.js";
import { chunkingConfigSchema, customMetadataSchema, pageSizeSchema, pageTokenSchema } from "./schemas.js";
import type { FileSearchTool } from "./types.js";

const uploadSchema = Type.Object({
  store_name: Type.String({ description: "Target store resource name" }),
  file_bytes_base64: Type.String({ description: "File content, base64-encoded (at most 100 MB decoded)" }),
  display_name: Type.Optional(Type.String({ description: "Document name; its extension is used to guess the MIME type" })),
  mime_type: Type.Optional(Type.String({ description: "MIME type, e.g. application/pdf" })),
  chunking_config: Type.Optional(chunkingConfigSchema),
  custom_metadata: Type.Optional(customMetadataSchema),
});

const importSchema = Type.Object({
  store_name: Type.String({ description: "Target store resource name" }),
  file_name: Type.String({ description: "Files API resource name, e.g. files/abc123" }),
  chunking_config: Type.Optional(chunkingConfigSchema),
  custom_metadata: Type.Optional(customMetadataSchema),
});

const listSchema = Type.Object({
  store_name: Type.String({ description: "Store resource name" }),
  page_size: Type.Optional(pageSizeSchema),
  page_token: Type.Optional(pageTokenSchema),
});

const documentNameSchema = Type.Object({
  document_name: Type.String({ description: "Document resource name, e.g. fileSearchStores/s1/documents/d1" }),
});

const deleteSchema = Type.Object({
  document_name: Type.String({ description: "Document resource name" }),
  force: Type.Optional(Type.Boolean({ description: "Also delete the document's chunks. Default: false" })),
});

const updateMetadataSchema = Type.Object({
  document_name: Type.String({ description: "Document to replace" }),
  new_custom_metadata: customMetadataSchema,
  original_file_bytes_base64: Type.String({ description: "The document's original file, base64-encoded" }),
  store_name: Type.Optional(Type.String({ description: "Must match the store in document_name; defaults to it" })),
  display_name: Type.Optional(Type.String({ description: "Defaults to the existing display name" })),
  mime_type: Type.Optional(Type.String({ description: "Defaults to the existing MIME type" })),
  chunking_config: Type.Optional(chunkingConfigSchema),
});

export function createDocumentTools(ctx: ToolContext): FileSearchTool[] {
  const ingest = { retry: ctx.retry, limits: ctx.limits };

  return [
    defineTool({
      name: "upload_file",
      description:
        "Upload a file into a store for indexing. Returns an operation name; " +
        "poll it with get_operation_status until done.",
      parameters: uploadSchema,
      failure: "Failed to upload file",
      run: (params) => uploadFile(ctx.backend, params, ingest),
    }),
    defineTool({
      name: "import_file",
      description: "Import a file already uploaded through the Files API into a store.",
      parameters: importSchema,
      failure: "Failed to import file",
      run: (params) => importFile(ctx.backend, params, ingest),
    }),
    defineTool({
      name: "list_documents",
      description: "List the documents in a store, one page at a time.",
      parameters: listSchema,
      failure: "Failed to list documents",
      run: (params) => listDocuments(ctx.backend, params),
    }),
    defineTool({
      name: "get_document",
      description: "Get a document's state, size, MIME type and custom metadata.",
      parameters: documentNameSchema,
      failure: "Failed to get document",
      run: ({ document_name }) => getDocument(ctx.backend, document_name),
    }),
    defineTool({
      name: "delete_document",
      description: "Delete a document from its store.",
      parameters: deleteSchema,
      failure: "Failed to delete document",
      run: ({ document_name, force }) => deleteDocument(ctx.backend, document_name, force ?? false),
    }),
    defineTool({
      name: "update_document_metadata",
      description:
        "Replace a document's custom metadata. The backend cannot edit metadata in place, " +
        "so the document is deleted and the original file uploaded again; the new document " +
        "gets a new name. If the re-upload fails the document stays deleted and the error " +
        "kind is partial_failure.",
      parameters: updateMetadataSchema,
      failure: "Failed to update document metadata",
      run: (params) => updateDocumentMetadata(ctx.backend, params, ingest),
    }),
  ];
}
