/**
 * Input checks shared by upload, import and metadata update: custom metadata
 * shape, chunking config, and the file bytes themselves. All of these run
 * before any network call.
 */

import { ValidationError } from "../errors.js";
import type { ChunkingConfig, CustomMetadataEntry, WhiteSpaceChunkingConfig } from "./model.js";

export const MAX_CUSTOM_METADATA_ENTRIES = 20;

const VALUE_VARIANTS = ["string_value", "numeric_value", "string_list_value"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate caller-supplied custom metadata. Each entry needs a non-empty key
 * and exactly one of string_value, numeric_value, string_list_value.
 */
export function validateCustomMetadata(
  raw: unknown,
  maxEntries: number = MAX_CUSTOM_METADATA_ENTRIES,
): CustomMetadataEntry[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    throw new ValidationError("custom_metadata must be a list of entries");
  }
  if (raw.length > maxEntries) {
    throw new ValidationError(
      `custom_metadata has ${raw.length} entries; at most ${maxEntries} are allowed per document`,
    );
  }

  return raw.map((entry: unknown, index: number): CustomMetadataEntry => {
    if (!isRecord(entry)) {
      throw new ValidationError(`custom_metadata[${index}] must be an object`);
    }
    const { key } = entry;
    if (typeof key !== "string" || !key.trim()) {
      throw new ValidationError(`custom_metadata[${index}] must have a non-empty "key"`);
    }

    const present = VALUE_VARIANTS.filter((variant) => entry[variant] !== undefined && entry[variant] !== null);
    if (present.length !== 1) {
      throw new ValidationError(
        `Metadata entry "${key}" must set exactly one of ${VALUE_VARIANTS.join(", ")} ` +
        `(found ${present.length === 0 ? "none" : present.join(", ")})`,
      );
    }

    const variant = present[0];
    const value = entry[variant];
    switch (variant) {
      case "string_value":
        if (typeof value !== "string") {
          throw new ValidationError(`Metadata entry "${key}": string_value must be a string`);
        }
        return { key, string_value: value };
      case "numeric_value":
        if (typeof value !== "number" || !Number.isFinite(value)) {
          throw new ValidationError(`Metadata entry "${key}": numeric_value must be a finite number`);
        }
        return { key, numeric_value: value };
      case "string_list_value":
        if (!Array.isArray(value) || !value.every((item: unknown) => typeof item === "string")) {
          throw new ValidationError(`Metadata entry "${key}": string_list_value must be a list of strings`);
        }
        return { key, string_list_value: value.map(String) };
    }
  });
}

/**
 * Chunking config as passed on to the backend. An empty config means
 * "backend default" and yields undefined.
 */
export function buildChunkingConfig(raw: unknown): ChunkingConfig | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!isRecord(raw)) {
    throw new ValidationError("chunking_config must be an object");
  }
  if (Object.keys(raw).length === 0) return undefined;

  const whiteSpace = raw.white_space_config;
  if (whiteSpace === undefined) {
    const passthrough: ChunkingConfig = {};
    for (const [key, value] of Object.entries(raw)) {
      passthrough[key] = value;
    }
    return passthrough;
  }
  if (!isRecord(whiteSpace)) {
    throw new ValidationError("chunking_config.white_space_config must be an object");
  }

  const whiteSpaceConfig: WhiteSpaceChunkingConfig = {};
  for (const field of ["max_tokens_per_chunk", "max_overlap_tokens"] as const) {
    const value = whiteSpace[field];
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      throw new ValidationError(`chunking_config.white_space_config.${field} must be a non-negative integer`);
    }
    whiteSpaceConfig[field] = value;
  }
  return { white_space_config: whiteSpaceConfig };
}

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode base64 file bytes and enforce the size limit.
 */
export function decodeFileBytes(base64: unknown, maxSizeMb: number, field = "file_bytes_base64"): Buffer {
  if (typeof base64 !== "string" || !base64.trim()) {
    throw new ValidationError(`${field} is required and must not be empty`);
  }
  const compact = base64.replace(/\s+/g, "");
  if (compact.length % 4 === 1 || !BASE64_RE.test(compact)) {
    throw new ValidationError(`${field} is not valid base64`);
  }

  const bytes = Buffer.from(compact, "base64");
  if (bytes.length === 0) {
    throw new ValidationError(`${field} decodes to zero bytes`);
  }

  const maxBytes = maxSizeMb * 1024 * 1024;
  if (bytes.length > maxBytes) {
    const sizeMb = (bytes.length / 1024 / 1024).toFixed(2);
    throw new ValidationError(`File size (${sizeMb} MB) exceeds ${maxSizeMb} MB limit`);
  }
  return bytes;
}

export const MAX_DISPLAY_NAME_LENGTH = 512;

export function validateDisplayName(displayName: string | undefined): void {
  if (displayName !== undefined && displayName.length > MAX_DISPLAY_NAME_LENGTH) {
    throw new ValidationError(`display_name must be <= ${MAX_DISPLAY_NAME_LENGTH} characters`);
  }
}
