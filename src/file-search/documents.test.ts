/**
 * Tests for document ingestion and the delete-and-reupload metadata update.
 * Uses a mock FileSearchBackend; views are built from REST-shaped payloads.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { adaptResponse } from "../backend/adapters.js";
import type { FileSearchBackend } from "../backend/types.js";
import {
  NotFoundError,
  PartialFailureError,
  TransientBackendError,
  ValidationError,
} from "../errors.js";
import {
  deleteDocument,
  getDocument,
  importFile,
  listDocuments,
  updateDocumentMetadata,
  uploadFile,
} from "./documents.js";

const STORE = "fileSearchStores/s1";
const DOC = "fileSearchStores/s1/documents/d1";
const FILE_B64 = Buffer.from("hello world").toString("base64");

const noSleep = async (_ms: number): Promise<void> => {};
const retry = { sleep: noSleep };

function makeBackend(overrides: Partial<FileSearchBackend> = {}): FileSearchBackend {
  return {
    createStore: vi.fn(),
    listStores: vi.fn(),
    getStore: vi.fn(),
    deleteStore: vi.fn(),
    uploadToStore: vi.fn().mockResolvedValue(adaptResponse("operation", {
      name: `${STORE}/upload/operations/op1`,
      response: { documentName: `${STORE}/documents/d2` },
    })),
    importFile: vi.fn().mockResolvedValue(adaptResponse("operation", { name: `${STORE}/operations/op2` })),
    listDocuments: vi.fn(),
    getDocument: vi.fn().mockResolvedValue(adaptResponse("document", {
      name: DOC,
      displayName: "report.pdf",
      mimeType: "application/pdf",
      state: "STATE_ACTIVE",
    })),
    deleteDocument: vi.fn().mockResolvedValue(undefined),
    getOperation: vi.fn(),
    generateContent: vi.fn(),
    ...overrides,
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("uploadFile", () => {
  it("decodes the bytes and infers the MIME type from the display name", async () => {
    const backend = makeBackend();

    const result = await uploadFile(backend, {
      store_name: STORE,
      file_bytes_base64: FILE_B64,
      display_name: "notes.md",
      custom_metadata: [{ key: "author", string_value: "kim" }],
    }, { retry });

    expect(result).toEqual({
      operation_name: `${STORE}/upload/operations/op1`,
      document_name: `${STORE}/documents/d2`,
    });
    expect(backend.uploadToStore).toHaveBeenCalledWith(STORE, {
      bytes: Buffer.from("hello world"),
      displayName: "notes.md",
      mimeType: "text/markdown",
      customMetadata: [{ key: "author", string_value: "kim" }],
      chunkingConfig: undefined,
    });
  });

  it("rejects invalid metadata before calling the backend", async () => {
    const backend = makeBackend();
    const entries = Array.from({ length: 21 }, (_, i) => ({ key: `k${i}`, string_value: "v" }));

    await expect(uploadFile(backend, { store_name: STORE, file_bytes_base64: FILE_B64, custom_metadata: entries }))
      .rejects.toBeInstanceOf(ValidationError);
    expect(backend.uploadToStore).not.toHaveBeenCalled();
  });

  it("enforces the configured size limit", async () => {
    const backend = makeBackend();
    const big = Buffer.alloc(1024 * 1024 + 1).toString("base64");

    await expect(uploadFile(backend, { store_name: STORE, file_bytes_base64: big }, {
      limits: { max_file_size_mb: 1, max_custom_metadata: 20 },
    })).rejects.toThrow("exceeds 1 MB limit");
    expect(backend.uploadToStore).not.toHaveBeenCalled();
  });

  it("warns about an unlisted MIME type but uploads it", async () => {
    const backend = makeBackend();

    await uploadFile(backend, {
      store_name: STORE,
      file_bytes_base64: FILE_B64,
      display_name: "photo.png",
      mime_type: "image/png",
    }, { retry });

    expect(console.warn).toHaveBeenCalledWith("[documents] image/png is not a listed format; uploading anyway");
    expect(backend.uploadToStore).toHaveBeenCalledTimes(1);
  });

  it("retries a transient failure", async () => {
    const uploadToStore = vi.fn()
      .mockRejectedValueOnce(new TransientBackendError("503"))
      .mockResolvedValue(adaptResponse("operation", { name: "op9" }));
    const backend = makeBackend({ uploadToStore });

    const result = await uploadFile(backend, { store_name: STORE, file_bytes_base64: FILE_B64 }, { retry });

    expect(result).toEqual({ operation_name: "op9" });
    expect(uploadToStore).toHaveBeenCalledTimes(2);
  });
});

describe("importFile", () => {
  it("passes the file name and returns the operation", async () => {
    const backend = makeBackend();

    const result = await importFile(backend, {
      store_name: STORE,
      file_name: "files/f1",
      chunking_config: { white_space_config: { max_tokens_per_chunk: 100 } },
    }, { retry });

    expect(result).toEqual({ operation_name: `${STORE}/operations/op2` });
    expect(backend.importFile).toHaveBeenCalledWith(STORE, {
      fileName: "files/f1",
      customMetadata: [],
      chunkingConfig: { white_space_config: { max_tokens_per_chunk: 100 } },
    });
  });
});

describe("listDocuments / getDocument / deleteDocument", () => {
  it("maps a page of documents", async () => {
    const backend = makeBackend({
      listDocuments: vi.fn().mockResolvedValue({
        items: [adaptResponse("document", { name: DOC, state: "STATE_PENDING", sizeBytes: "10" })],
        nextPageToken: "next",
      }),
    });

    const result = await listDocuments(backend, { store_name: STORE, page_size: 5 });

    expect(backend.listDocuments).toHaveBeenCalledWith(STORE, 5, undefined);
    expect(result.next_page_token).toBe("next");
    expect(result.documents[0]).toEqual({
      name: DOC,
      display_name: "",
      state: "PROCESSING",
      size_bytes: 10,
      mime_type: undefined,
      custom_metadata: [],
      create_time: undefined,
      update_time: undefined,
    });
  });

  it("reads a document", async () => {
    const doc = await getDocument(makeBackend(), DOC);
    expect(doc.display_name).toBe("report.pdf");
    expect(doc.state).toBe("ACTIVE");
  });

  it("rejects a malformed document name without calling the backend", async () => {
    const backend = makeBackend();
    await expect(deleteDocument(backend, "s1/d1")).rejects.toBeInstanceOf(ValidationError);
    expect(backend.deleteDocument).not.toHaveBeenCalled();
  });

  it("deletes without force by default", async () => {
    const backend = makeBackend();
    expect(await deleteDocument(backend, DOC)).toEqual({ deleted: true, name: DOC });
    expect(backend.deleteDocument).toHaveBeenCalledWith(DOC, false);
  });
});

describe("updateDocumentMetadata", () => {
  const input = {
    document_name: DOC,
    new_custom_metadata: [{ key: "year", numeric_value: 2025 }],
    original_file_bytes_base64: FILE_B64,
  };

  it("reads, deletes with force, then re-uploads with inherited fields", async () => {
    const backend = makeBackend();

    const result = await updateDocumentMetadata(backend, input, { retry });

    expect(result).toEqual({
      operation_name: `${STORE}/upload/operations/op1`,
      new_document_name: `${STORE}/documents/d2`,
      previous_document_name: DOC,
      store_name: STORE,
    });
    expect(backend.deleteDocument).toHaveBeenCalledWith(DOC, true);
    expect(backend.uploadToStore).toHaveBeenCalledWith(STORE, {
      bytes: Buffer.from("hello world"),
      displayName: "report.pdf",
      mimeType: "application/pdf",
      customMetadata: [{ key: "year", numeric_value: 2025 }],
      chunkingConfig: undefined,
    });
  });

  it("fails before any delete when the store cannot be derived", async () => {
    const backend = makeBackend();

    await expect(updateDocumentMetadata(backend, { ...input, document_name: "s1/d1" }))
      .rejects.toBeInstanceOf(ValidationError);
    expect(backend.getDocument).not.toHaveBeenCalled();
    expect(backend.deleteDocument).not.toHaveBeenCalled();
  });

  it("fails before any delete when the bytes are missing", async () => {
    const backend = makeBackend();

    await expect(updateDocumentMetadata(backend, { ...input, original_file_bytes_base64: "" }))
      .rejects.toThrow("original_file_bytes_base64 is required");
    expect(backend.deleteDocument).not.toHaveBeenCalled();
  });

  it("fails before any delete on invalid metadata", async () => {
    const backend = makeBackend();

    await expect(updateDocumentMetadata(backend, {
      ...input,
      new_custom_metadata: [{ key: "x", string_value: "a", numeric_value: 1 }],
    })).rejects.toBeInstanceOf(ValidationError);
    expect(backend.deleteDocument).not.toHaveBeenCalled();
  });

  it("deletes nothing when the document does not exist", async () => {
    const backend = makeBackend({ getDocument: vi.fn().mockRejectedValue(new NotFoundError("no such document")) });

    await expect(updateDocumentMetadata(backend, input)).rejects.toBeInstanceOf(NotFoundError);
    expect(backend.deleteDocument).not.toHaveBeenCalled();
  });

  it("reports a partial failure when the re-upload fails after the delete", async () => {
    const backend = makeBackend({
      uploadToStore: vi.fn().mockRejectedValue(new TransientBackendError("unavailable")),
    });

    const error = await updateDocumentMetadata(backend, input, { retry }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PartialFailureError);
    const partial = error as PartialFailureError;
    expect(partial.deletedDocumentName).toBe(DOC);
    expect(partial.storeName).toBe(STORE);
    expect(partial.cause).toBeInstanceOf(TransientBackendError);
    expect(partial.details).toEqual({ kind: "transient", attempts: 3 });
    expect(backend.uploadToStore).toHaveBeenCalledTimes(3);
  });

  it("accepts an explicit store name that owns the document", async () => {
    const backend = makeBackend();

    const result = await updateDocumentMetadata(backend, { ...input, store_name: STORE }, { retry });

    expect(result.store_name).toBe(STORE);
    expect(backend.uploadToStore).toHaveBeenCalledWith(STORE, expect.anything());
  });

  it("rejects an explicit store name that does not own the document", async () => {
    const backend = makeBackend();

    await expect(updateDocumentMetadata(backend, { ...input, store_name: "fileSearchStores/other" }, { retry }))
      .rejects.toThrow(
        `Document ${DOC} belongs to ${STORE}, not fileSearchStores/other; metadata updates re-upload into the same store`,
      );
    expect(backend.getDocument).not.toHaveBeenCalled();
    expect(backend.deleteDocument).not.toHaveBeenCalled();
    expect(backend.uploadToStore).not.toHaveBeenCalled();
  });

  it("rejects a document name without a store even when a store is given", async () => {
    const backend = makeBackend();

    await expect(updateDocumentMetadata(backend, { ...input, document_name: "s1/d1", store_name: STORE }))
      .rejects.toBeInstanceOf(ValidationError);
    expect(backend.getDocument).not.toHaveBeenCalled();
    expect(backend.deleteDocument).not.toHaveBeenCalled();
  });

  describe("when the delete times out", () => {
    const timeout = () => new TransientBackendError("timeout of 30000ms exceeded");

    it("re-uploads when the document turns out to be gone", async () => {
      const getDocumentMock = vi.fn()
        .mockResolvedValueOnce(adaptResponse("document", { name: DOC, displayName: "report.pdf", mimeType: "application/pdf" }))
        .mockRejectedValueOnce(new NotFoundError("no such document"));
      const backend = makeBackend({
        getDocument: getDocumentMock,
        deleteDocument: vi.fn().mockRejectedValue(timeout()),
      });

      const result = await updateDocumentMetadata(backend, input, { retry });

      expect(result.operation_name).toBe(`${STORE}/upload/operations/op1`);
      expect(getDocumentMock).toHaveBeenCalledTimes(2);
      expect(backend.uploadToStore).toHaveBeenCalledTimes(1);
    });

    it("keeps the transient error when the document still exists", async () => {
      const backend = makeBackend({ deleteDocument: vi.fn().mockRejectedValue(timeout()) });

      const error = await updateDocumentMetadata(backend, input, { retry }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientBackendError);
      expect(backend.getDocument).toHaveBeenCalledTimes(2);
      expect(backend.uploadToStore).not.toHaveBeenCalled();
    });

    it("reports a partial failure when the outcome cannot be checked", async () => {
      const getDocumentMock = vi.fn()
        .mockResolvedValueOnce(adaptResponse("document", { name: DOC }))
        .mockRejectedValueOnce(new TransientBackendError("connection reset"));
      const backend = makeBackend({
        getDocument: getDocumentMock,
        deleteDocument: vi.fn().mockRejectedValue(timeout()),
      });

      const error = await updateDocumentMetadata(backend, input, { retry }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PartialFailureError);
      const partial = error as PartialFailureError;
      expect(partial.deletedDocumentName).toBe(DOC);
      expect(partial.storeName).toBe(STORE);
      expect(partial.retryable).toBe(false);
      expect(partial.details).toEqual({ kind: "transient", delete_outcome: "unknown" });
      expect(backend.uploadToStore).not.toHaveBeenCalled();
    });

    it("does not look again after a non-transient delete failure", async () => {
      const backend = makeBackend({
        deleteDocument: vi.fn().mockRejectedValue(new NotFoundError("already deleted")),
      });

      await expect(updateDocumentMetadata(backend, input, { retry })).rejects.toBeInstanceOf(NotFoundError);
      expect(backend.getDocument).toHaveBeenCalledTimes(1);
      expect(backend.uploadToStore).not.toHaveBeenCalled();
    });
  });
});
