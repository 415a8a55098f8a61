import { describe, it, expect, vi, beforeEach } from "vitest";
import { adaptResponse } from "../backend/adapters.js";
import type { FileSearchBackend } from "../backend/types.js";
import { FailedPreconditionError, TransientBackendError, ValidationError } from "../errors.js";
import { createStore, deleteStore, getStore, listStores } from "./stores.js";

const storePayload = {
  name: "fileSearchStores/abc",
  displayName: "Manuals",
  activeDocumentsCount: "3",
  pendingDocumentsCount: "1",
  failedDocumentsCount: "1",
  sizeBytes: "4096",
};

function makeBackend(overrides: Partial<FileSearchBackend> = {}): FileSearchBackend {
  return {
    createStore: vi.fn().mockResolvedValue(adaptResponse("store", storePayload)),
    listStores: vi.fn().mockResolvedValue({ items: [adaptResponse("store", storePayload)] }),
    getStore: vi.fn().mockResolvedValue(adaptResponse("store", storePayload)),
    deleteStore: vi.fn().mockResolvedValue(undefined),
    uploadToStore: vi.fn(),
    importFile: vi.fn(),
    listDocuments: vi.fn(),
    getDocument: vi.fn(),
    deleteDocument: vi.fn(),
    getOperation: vi.fn(),
    generateContent: vi.fn(),
    ...overrides,
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("createStore", () => {
  it("returns the store with totals computed from the counts", async () => {
    const backend = makeBackend();

    const store = await createStore(backend, { display_name: "Manuals" });

    expect(backend.createStore).toHaveBeenCalledWith("Manuals");
    expect(store).toEqual({
      name: "fileSearchStores/abc",
      display_name: "Manuals",
      counts: { total: 5, active: 3, processing: 1, failed: 1 },
      size_bytes: 4096,
      create_time: undefined,
      update_time: undefined,
    });
  });

  it("rejects a display name over 512 characters", async () => {
    const backend = makeBackend();
    await expect(createStore(backend, { display_name: "x".repeat(513) })).rejects.toBeInstanceOf(ValidationError);
    expect(backend.createStore).not.toHaveBeenCalled();
  });

  it("retries transient failures", async () => {
    const createStoreMock = vi.fn()
      .mockRejectedValueOnce(new TransientBackendError("503"))
      .mockResolvedValue(adaptResponse("store", storePayload));

    await createStore(makeBackend({ createStore: createStoreMock }), {}, { sleep: async () => {} });

    expect(createStoreMock).toHaveBeenCalledTimes(2);
  });
});

describe("listStores", () => {
  it("uses the default page size and omits an absent token", async () => {
    const backend = makeBackend();

    const result = await listStores(backend);

    expect(backend.listStores).toHaveBeenCalledWith(100, undefined);
    expect(result.stores).toHaveLength(1);
    expect(result).not.toHaveProperty("next_page_token");
  });

  it("rejects a non-positive page size", async () => {
    await expect(listStores(makeBackend(), { page_size: 0 })).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("getStore / deleteStore", () => {
  it("gets a store by name", async () => {
    const store = await getStore(makeBackend(), "fileSearchStores/abc");
    expect(store.counts.total).toBe(5);
  });

  it("deletes without force by default", async () => {
    const backend = makeBackend();
    expect(await deleteStore(backend, "fileSearchStores/abc")).toEqual({ deleted: true, name: "fileSearchStores/abc" });
    expect(backend.deleteStore).toHaveBeenCalledWith("fileSearchStores/abc", false);
  });

  it("surfaces the not-empty refusal", async () => {
    const backend = makeBackend({
      deleteStore: vi.fn().mockRejectedValue(new FailedPreconditionError("store is not empty")),
    });
    await expect(deleteStore(backend, "fileSearchStores/abc")).rejects.toBeInstanceOf(FailedPreconditionError);
  });
});
