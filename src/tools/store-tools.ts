/**
 * Store tools: create, list, inspect and delete file search stores.
 */

import { Type } from "@sinclair/typebox";
import { createStore, deleteStore, getStore, listStores } from "../file-search/stores.js";
import type { ToolContext } from "./context.js";
import { defineTool } from "./result.js";
import { pageSizeSchema, pageTokenSchema } from "./schemas.js";
import type { FileSearchTool } from "./types.js";

const createSchema = Type.Object({
  display_name: Type.Optional(Type.String({ description: "Human-readable name, at most 512 characters" })),
});

const listSchema = Type.Object({
  page_size: Type.Optional(pageSizeSchema),
  page_token: Type.Optional(pageTokenSchema),
});

const storeNameSchema = Type.Object({
  store_name: Type.String({ description: "Store resource name, e.g. fileSearchStores/abc123" }),
});

const deleteSchema = Type.Object({
  store_name: Type.String({ description: "Store resource name" }),
  force: Type.Optional(Type.Boolean({ description: "Also delete the documents it contains. Default: false" })),
});

export function createStoreTools(ctx: ToolContext): FileSearchTool[] {
  return [
    defineTool({
      name: "create_store",
      description: "Create an empty file search store. Returns its resource name.",
      parameters: createSchema,
      failure: "Failed to create store",
      run: (params) => createStore(ctx.backend, params, ctx.retry),
    }),
    defineTool({
      name: "list_stores",
      description: "List file search stores, one page at a time.",
      parameters: listSchema,
      failure: "Failed to list stores",
      run: (params) => listStores(ctx.backend, params),
    }),
    defineTool({
      name: "get_store",
      description: "Get a store's display name, document counts and size.",
      parameters: storeNameSchema,
      failure: "Failed to get store",
      run: ({ store_name }) => getStore(ctx.backend, store_name),
    }),
    defineTool({
      name: "delete_store",
      description:
        "Delete a store. Fails while it still holds documents unless force is true, " +
        "in which case the documents are deleted with it.",
      parameters: deleteSchema,
      failure: "Failed to delete store",
      run: ({ store_name, force }) => deleteStore(ctx.backend, store_name, force ?? false),
    }),
  ];
}
