/**
 * Grounded search across one or more stores.
 */

import type { GroundingChunkView } from "../backend/adapters.js";
import type { FileSearchBackend } from "../backend/types.js";
import { ValidationError } from "../errors.js";
import { isJsonObject, normalize, normalizeObject } from "../normalize.js";
import type { Citation, SearchResult } from "./model.js";
import { assertResourceName } from "./names.js";

export interface SearchInput {
  query: string;
  store_names: string[];
  model?: string;
  /** AIP-160 filter over custom metadata, e.g. `author = "kim"`. */
  metadata_filter?: string;
  max_output_tokens?: number;
  temperature?: number;
}

export interface SearchDefaults {
  model: string;
  max_stores_per_query: number;
}

export const DEFAULT_SEARCH: SearchDefaults = {
  model: "gemini-2.5-flash",
  max_stores_per_query: 5,
};

function checkInput(input: SearchInput, maxStores: number): void {
  if (!input.query || !input.query.trim()) {
    throw new ValidationError("query must not be empty");
  }
  if (input.store_names.length === 0) {
    throw new ValidationError("store_names must name at least one store");
  }
  if (input.store_names.length > maxStores) {
    throw new ValidationError(
      `store_names has ${input.store_names.length} stores; at most ${maxStores} can be searched at once`,
    );
  }
  for (const name of input.store_names) {
    assertResourceName(name, "store_names entry");
  }
  if (input.max_output_tokens !== undefined
    && (!Number.isInteger(input.max_output_tokens) || input.max_output_tokens <= 0)) {
    throw new ValidationError("max_output_tokens must be a positive integer");
  }
  if (input.temperature !== undefined && !(input.temperature >= 0 && input.temperature <= 2)) {
    throw new ValidationError("temperature must be between 0 and 2");
  }
}

/** Citation metadata is the chunk as received, minus the snippet text. */
export function toCitation(chunk: GroundingChunkView): Citation {
  const metadata = normalizeObject(chunk.raw());
  for (const key of ["retrievedContext", "retrieved_context"]) {
    const context = metadata[key];
    if (isJsonObject(context)) delete context.text;
  }
  delete metadata.text;

  return {
    source: chunk.title() || chunk.uri() || "unknown",
    snippet: chunk.text() ?? "",
    metadata,
  };
}

export async function searchDocuments(
  backend: FileSearchBackend,
  input: SearchInput,
  defaults: SearchDefaults = DEFAULT_SEARCH,
): Promise<SearchResult> {
  const maxStores = Math.min(defaults.max_stores_per_query, DEFAULT_SEARCH.max_stores_per_query);
  checkInput(input, maxStores);
  const model = input.model || defaults.model;

  console.log(`[search] Querying ${input.store_names.length} store(s) with ${model}`);
  const response = await backend.generateContent({
    model,
    query: input.query,
    storeNames: input.store_names,
    metadataFilter: input.metadata_filter || undefined,
    maxOutputTokens: input.max_output_tokens,
    temperature: input.temperature,
  });

  const candidate = response.firstCandidate();
  const answerText = (candidate?.textParts() ?? []).join("");
  const groundingRaw = candidate?.groundingMetadata();
  const citations = (candidate?.groundingChunks() ?? []).map(toCitation);

  console.log(`[search] Answer with ${citations.length} citation(s)`);
  return {
    answer_text: answerText,
    citations,
    grounding_metadata: groundingRaw === undefined ? null : normalize(groundingRaw),
    used_stores: [...input.store_names],
    model: response.modelVersion() ?? model,
  };
}
