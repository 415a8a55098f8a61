/**
 * Argument shapes shared by several tools.
 */

import { Type } from "@sinclair/typebox";

// Entry shape only; the entry count and the one-variant rule are checked by
// validateCustomMetadata so the messages name the offending key.
export const customMetadataSchema = Type.Array(
  Type.Object({
    key: Type.String({ description: "Metadata key" }),
    string_value: Type.Optional(Type.String()),
    numeric_value: Type.Optional(Type.Number()),
    string_list_value: Type.Optional(Type.Array(Type.String())),
  }),
  {
    description:
      "Up to 20 entries. Each sets exactly one of string_value, numeric_value, string_list_value.",
  },
);

export const chunkingConfigSchema = Type.Object(
  {
    white_space_config: Type.Optional(
      Type.Object({
        max_tokens_per_chunk: Type.Optional(Type.Integer({ minimum: 0 })),
        max_overlap_tokens: Type.Optional(Type.Integer({ minimum: 0 })),
      }),
    ),
  },
  { description: "Chunking settings. Omit for the backend default." },
);

export const pageSizeSchema = Type.Integer({ minimum: 1, description: "Maximum items per page" });

export const pageTokenSchema = Type.String({ description: "next_page_token from a previous call" });
