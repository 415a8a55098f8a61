import { describe, it, expect, vi, beforeEach } from "vitest";
import { adaptResponse, type DocumentView } from "../backend/adapters.js";
import type { FileSearchBackend } from "../backend/types.js";
import type { Page } from "../pagination.js";
import { getStoreStatistics } from "./statistics.js";

const STORE = "fileSearchStores/s1";

/** Serves `docs` in pages, honoring the requested page size. */
function pagedListing(docs: unknown[]) {
  return vi.fn(async (_store: string, pageSize: number, pageToken?: string): Promise<Page<DocumentView>> => {
    const start = pageToken ? Number(pageToken) : 0;
    const end = Math.min(start + pageSize, docs.length);
    return {
      items: docs.slice(start, end).map((d) => adaptResponse("document", d)),
      nextPageToken: end < docs.length ? String(end) : undefined,
    };
  });
}

function makeBackend(listDocuments: FileSearchBackend["listDocuments"], storePayload: unknown = {}): FileSearchBackend {
  return {
    createStore: vi.fn(),
    listStores: vi.fn(),
    getStore: vi.fn().mockResolvedValue(adaptResponse("store", storePayload)),
    deleteStore: vi.fn(),
    uploadToStore: vi.fn(),
    importFile: vi.fn(),
    listDocuments,
    getDocument: vi.fn(),
    deleteDocument: vi.fn(),
    getOperation: vi.fn(),
    generateContent: vi.fn(),
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("getStoreStatistics", () => {
  it("walks 250 documents in 3 pages of 100", async () => {
    const docs = Array.from({ length: 250 }, (_, i) => ({
      name: `${STORE}/documents/d${i}`,
      state: "STATE_ACTIVE",
      sizeBytes: "10",
    }));
    const listDocuments = pagedListing(docs);

    const stats = await getStoreStatistics(makeBackend(listDocuments), STORE);

    expect(listDocuments).toHaveBeenCalledTimes(3);
    expect(listDocuments.mock.calls.map((call) => call[1])).toEqual([100, 100, 100]);
    expect(stats).toEqual({
      store_name: STORE,
      document_count: 250,
      total_size_bytes: 2500,
      states_breakdown: { ACTIVE: 250 },
      pages: 3,
    });
  });

  it("counts missing sizes as zero and missing states as UNKNOWN", async () => {
    const listDocuments = pagedListing([
      { name: "a", state: "STATE_ACTIVE", sizeBytes: "100" },
      { name: "b", state: "STATE_PENDING" },
      { name: "c", state: "STATE_FAILED", sizeBytes: 5 },
      { name: "d" },
    ]);

    const stats = await getStoreStatistics(makeBackend(listDocuments), STORE);

    expect(stats.total_size_bytes).toBe(105);
    expect(stats.states_breakdown).toEqual({ ACTIVE: 1, PROCESSING: 1, FAILED: 1, UNKNOWN: 1 });
    expect(stats.pages).toBe(1);
  });

  it("reports an empty store", async () => {
    const stats = await getStoreStatistics(makeBackend(pagedListing([])), STORE);
    expect(stats).toEqual({
      store_name: STORE,
      document_count: 0,
      total_size_bytes: 0,
      states_breakdown: {},
      pages: 1,
    });
  });

  it("compares the tally with the store's reported counts", async () => {
    const listDocuments = pagedListing([
      { name: "a", state: "STATE_ACTIVE" },
      { name: "b", state: "STATE_ACTIVE" },
    ]);
    const backend = makeBackend(listDocuments, { activeDocumentsCount: "3" });

    const stats = await getStoreStatistics(backend, STORE, { verifyCounts: true });

    expect(stats.reported_counts).toEqual({ total: 3, active: 3, processing: 0, failed: 0 });
    expect(stats.counts_consistent).toBe(false);
  });

  it("agrees when the counts match", async () => {
    const listDocuments = pagedListing([{ name: "a", state: "STATE_PENDING" }]);
    const backend = makeBackend(listDocuments, { pendingDocumentsCount: "1" });

    const stats = await getStoreStatistics(backend, STORE, { verifyCounts: true });

    expect(stats.counts_consistent).toBe(true);
  });
});
