import type { FileSearchBackend } from "../backend/types.js";
import { retryPolicyFromConfig, type Config } from "../config.js";
import type { IngestLimits } from "../file-search/documents.js";
import type { SearchDefaults } from "../file-search/search.js";
import type { RetryOptions } from "../retry.js";

/** Everything a tool handler needs besides its arguments. */
export interface ToolContext {
  backend: FileSearchBackend;
  retry: RetryOptions;
  limits: IngestLimits;
  search: SearchDefaults;
  statisticsPageSize: number;
}

export function toolContextFromConfig(config: Config, backend: FileSearchBackend): ToolContext {
  return {
    backend,
    retry: { policy: retryPolicyFromConfig(config) },
    limits: {
      max_file_size_mb: config.limits.max_file_size_mb,
      max_custom_metadata: config.limits.max_custom_metadata,
    },
    search: {
      model: config.gemini.default_model,
      max_stores_per_query: config.limits.max_stores_per_query,
    },
    statisticsPageSize: config.statistics.page_size,
  };
}
