import { Type } from "@sinclair/typebox";
import { getOperationStatus, listSupportedFormats } from "../file-search/operations.js";
import { getStoreStatistics } from "../file-search/statistics.js";
import type { ToolContext } from "./context.js";
import { defineTool } from "./result.js";
import type { FileSearchTool } from "./types.js";

const operationSchema = Type.Object({
  operation_name: Type.String({ description: "Operation name returned by upload_file or import_file" }),
});

const statisticsSchema = Type.Object({
  store_name: Type.String({ description: "Store resource name" }),
  verify_counts: Type.Optional(
    Type.Boolean({ description: "Compare the listing with the counts the store reports. Default: false" }),
  ),
});

export function createUtilTools(ctx: ToolContext): FileSearchTool[] {
  return [
    defineTool({
      name: "get_operation_status",
      description: "Check an ingestion operation. phase is pending, succeeded or failed.",
      parameters: operationSchema,
      failure: "Failed to get operation status",
      run: ({ operation_name }) => getOperationStatus(ctx.backend, operation_name),
    }),
    defineTool({
      name: "list_supported_formats",
      description: "List the MIME types the file search backend indexes, grouped by category.",
      parameters: Type.Object({}),
      failure: "Failed to list formats",
      run: async () => listSupportedFormats(),
    }),
    defineTool({
      name: "get_store_statistics",
      description:
        "Count a store's documents by state and total their size. Walks every page of the " +
        "document listing, so it is slow on large stores.",
      parameters: statisticsSchema,
      failure: "Failed to get store statistics",
      run: ({ store_name, verify_counts }) =>
        getStoreStatistics(ctx.backend, store_name, {
          pageSize: ctx.statisticsPageSize,
          verifyCounts: verify_counts ?? false,
        }),
    }),
  ];
}
