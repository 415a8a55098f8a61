/**
 * Store lifecycle: create, list, get, delete.
 */

import type { FileSearchBackend } from "../backend/types.js";
import { checkPageSize, DEFAULT_PAGE_SIZE } from "../pagination.js";
import { withRetry, type RetryOptions } from "../retry.js";
import { toStore } from "./convert.js";
import { validateDisplayName } from "./metadata.js";
import type { Store } from "./model.js";
import { assertResourceName } from "./names.js";

export interface CreateStoreInput {
  display_name?: string;
}

export interface ListInput {
  page_size?: number;
  page_token?: string;
}

export interface StoreListing {
  stores: Store[];
  next_page_token?: string;
}

export interface DeleteResult {
  deleted: true;
  name: string;
}

export async function createStore(
  backend: FileSearchBackend,
  input: CreateStoreInput,
  retry: RetryOptions = {},
): Promise<Store> {
  validateDisplayName(input.display_name);
  const view = await withRetry(() => backend.createStore(input.display_name), {
    ...retry,
    label: "create_store",
  });
  const store = toStore(view);
  console.log(`[stores] Created ${store.name}`);
  return store;
}

/** One page of stores. Follow next_page_token for the rest. */
export async function listStores(backend: FileSearchBackend, input: ListInput = {}): Promise<StoreListing> {
  checkPageSize(input.page_size);
  const page = await backend.listStores(input.page_size ?? DEFAULT_PAGE_SIZE, input.page_token || undefined);
  return {
    stores: page.items.map(toStore),
    ...(page.nextPageToken ? { next_page_token: page.nextPageToken } : {}),
  };
}

export async function getStore(backend: FileSearchBackend, name: string): Promise<Store> {
  assertResourceName(name, "store_name");
  return toStore(await backend.getStore(name));
}

/**
 * Delete a store. Without force the backend refuses while documents
 * remain (FailedPreconditionError).
 */
export async function deleteStore(
  backend: FileSearchBackend,
  name: string,
  force = false,
): Promise<DeleteResult> {
  assertResourceName(name, "store_name");
  await backend.deleteStore(name, force);
  console.log(`[stores] Deleted ${name}${force ? " (forced)" : ""}`);
  return { deleted: true, name };
}
