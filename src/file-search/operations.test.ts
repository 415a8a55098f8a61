import { describe, it, expect, vi } from "vitest";
import { adaptResponse } from "../backend/adapters.js";
import type { FileSearchBackend } from "../backend/types.js";
import { getOperationStatus, listSupportedFormats } from "./operations.js";

function makeBackend(operation: unknown): FileSearchBackend {
  return {
    createStore: vi.fn(),
    listStores: vi.fn(),
    getStore: vi.fn(),
    deleteStore: vi.fn(),
    uploadToStore: vi.fn(),
    importFile: vi.fn(),
    listDocuments: vi.fn(),
    getDocument: vi.fn(),
    deleteDocument: vi.fn(),
    getOperation: vi.fn().mockResolvedValue(adaptResponse("operation", operation)),
    generateContent: vi.fn(),
  };
}

describe("getOperationStatus", () => {
  it("reports a running operation as pending", async () => {
    const status = await getOperationStatus(makeBackend({ name: "op1" }), "op1");
    expect(status).toEqual({ name: "op1", done: false, phase: "pending" });
  });

  it("reports the resulting document once done", async () => {
    const status = await getOperationStatus(makeBackend({
      name: "op1",
      done: true,
      response: { "@type": "type.googleapis.com/UploadToFileSearchStoreResponse", documentName: "s/documents/d" },
    }), "op1");

    expect(status.phase).toBe("succeeded");
    expect(status.document_name).toBe("s/documents/d");
    expect(status.response).toEqual({
      "@type": "type.googleapis.com/UploadToFileSearchStoreResponse",
      documentName: "s/documents/d",
    });
  });

  it("reports a failed operation with its error", async () => {
    const status = await getOperationStatus(makeBackend({
      name: "op1",
      done: true,
      error: { code: 3, message: "Unsupported MIME type" },
    }), "op1");

    expect(status.phase).toBe("failed");
    expect(status.error).toEqual({ code: 3, message: "Unsupported MIME type", details: [] });
  });
});

describe("listSupportedFormats", () => {
  it("groups MIME types by category", () => {
    const { supported_mime_types } = listSupportedFormats();
    expect(Object.keys(supported_mime_types)).toEqual([
      "documents",
      "text_and_code",
      "spreadsheets",
      "presentations",
      "archives",
    ]);
    expect(supported_mime_types.documents).toContain("application/pdf");
  });
});
