import { Type } from "@sinclair/typebox";
import { searchDocuments } from "../file-search/search.js";
import type { ToolContext } from "./context.js";
import { defineTool } from "./result.js";
import type { FileSearchTool } from "./types.js";

const searchSchema = Type.Object({
  query: Type.String({ description: "Question or search request in natural language" }),
  store_names: Type.Array(Type.String(), { description: "Stores to search, 1 to 5" }),
  model: Type.Optional(Type.String({ description: "Model id. Defaults to the configured model" })),
  metadata_filter: Type.Optional(
    Type.String({ description: 'Filter over custom metadata, e.g. author = "kim" AND year > 2020' }),
  ),
  max_output_tokens: Type.Optional(Type.Integer({ minimum: 1 })),
  temperature: Type.Optional(Type.Number({ minimum: 0, maximum: 2 })),
});

export function createSearchTool(ctx: ToolContext): FileSearchTool {
  return defineTool({
    name: "search_documents",
    description:
      "Answer a query from the documents in one or more stores. Returns the answer text " +
      "and citations (source and snippet) for the passages it was grounded on.",
    parameters: searchSchema,
    failure: "Search failed",
    run: (params) => searchDocuments(ctx.backend, params, ctx.search),
  });
}
