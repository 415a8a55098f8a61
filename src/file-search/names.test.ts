import { describe, it, expect } from "vitest";
import { ValidationError } from "../errors.js";
import { assertResourceName, isDocumentOfStore, storeNameFromDocumentName } from "./names.js";

describe("storeNameFromDocumentName", () => {
  it("splits at the first /documents/", () => {
    expect(storeNameFromDocumentName("stores/s1/documents/d1")).toBe("stores/s1");
    expect(storeNameFromDocumentName("fileSearchStores/abc/documents/doc-1")).toBe("fileSearchStores/abc");
  });

  it("rejects a name without the separator", () => {
    expect(() => storeNameFromDocumentName("s1/d1")).toThrow(ValidationError);
    expect(() => storeNameFromDocumentName("s1/d1")).toThrow(
      'Invalid document name "s1/d1": expected <store>/documents/<document_id>',
    );
  });

  it("rejects an empty store or document part", () => {
    expect(() => storeNameFromDocumentName("/documents/d1")).toThrow(ValidationError);
    expect(() => storeNameFromDocumentName("stores/s1/documents/")).toThrow(ValidationError);
  });
});

describe("isDocumentOfStore", () => {
  it("matches only documents directly under the store", () => {
    expect(isDocumentOfStore("fileSearchStores/a/documents/d", "fileSearchStores/a")).toBe(true);
    expect(isDocumentOfStore("fileSearchStores/ab/documents/d", "fileSearchStores/a")).toBe(false);
  });
});

describe("assertResourceName", () => {
  it("rejects empty names and relative segments", () => {
    expect(() => assertResourceName("", "store_name")).toThrow("store_name must not be empty");
    expect(() => assertResourceName("fileSearchStores/../x", "store_name")).toThrow(ValidationError);
    expect(() => assertResourceName("fileSearchStores/abc", "store_name")).not.toThrow();
  });
});
