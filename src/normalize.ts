/**
 * Response normalizer: turns whatever the backend or a caller hands us into a
 * JSON-safe value for the tool host.
 *
 * Rules, applied recursively:
 *   - null/undefined → null; strings and booleans pass through; finite
 *     numbers pass through, NaN/Infinity become null; bigint becomes a
 *     decimal string
 *   - arrays and Sets map element-wise
 *   - plain objects and Maps recurse per value (undefined values are dropped)
 *   - Dates become ISO strings, binary data becomes base64
 *   - objects with toJSON() are normalized from its result
 *   - Errors become { name, message }
 *   - other class instances are projected to their own enumerable fields,
 *     skipping names that start with "_" and function-valued fields
 *   - anything left (functions, symbols, opaque instances with no public
 *     fields) becomes String(value). This is lossy on purpose: the caller
 *     gets a readable rendering instead of a dropped value.
 *
 * A reference cycle is cut with the string "[Circular]".
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

const CIRCULAR = "[Circular]";

export function normalize(value: unknown): JsonValue {
  return normalizeValue(value, new WeakSet<object>());
}

/**
 * Normalize and require an object result. Non-object values are wrapped as
 * { value }.
 */
export function normalizeObject(value: unknown): JsonObject {
  const normalized = normalize(value);
  if (isJsonObject(normalized)) return normalized;
  return { value: normalized };
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

function toBase64(view: ArrayBufferView | ArrayBuffer): string {
  if (view instanceof ArrayBuffer) return Buffer.from(view).toString("base64");
  return Buffer.from(view.buffer, view.byteOffset, view.byteLength).toString("base64");
}

function normalizeEntries(
  entries: Iterable<[string, unknown]>,
  seen: WeakSet<object>,
  skip: (key: string, value: unknown) => boolean = () => false,
): JsonObject {
  const result: JsonObject = {};
  for (const [key, entry] of entries) {
    if (entry === undefined || skip(key, entry)) continue;
    result[key] = normalizeValue(entry, seen);
  }
  return result;
}

function normalizeValue(value: unknown, seen: WeakSet<object>): JsonValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "bigint":
      return value.toString();
    case "function":
    case "symbol":
      return String(value);
    default:
      break;
  }

  if (typeof value !== "object") return String(value);

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (value instanceof ArrayBuffer || ArrayBuffer.isView(value)) {
    return toBase64(value);
  }

  // Only values on the current path count; a shared (non-cyclic) reference
  // is normalized each time it appears.
  if (seen.has(value)) return CIRCULAR;
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => normalizeValue(item, seen));
    }
    if (value instanceof Set) {
      return [...value].map((item: unknown) => normalizeValue(item, seen));
    }
    if (value instanceof Map) {
      const entries: Array<[string, unknown]> = [...value.entries()].map(
        ([key, entry]: [unknown, unknown]) => [String(key), entry],
      );
      return normalizeEntries(entries, seen);
    }
    if ("toJSON" in value && typeof value.toJSON === "function") {
      const json: unknown = value.toJSON();
      return json === value ? String(value) : normalizeValue(json, seen);
    }
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    if (isPlainObject(value)) {
      return normalizeEntries(Object.entries(value), seen);
    }

    // Typed instance: project its public fields.
    const publicEntries = Object.entries(value).filter(
      ([key, entry]) => !key.startsWith("_") && typeof entry !== "function",
    );
    if (publicEntries.length === 0 && value.toString !== Object.prototype.toString) {
      return String(value);
    }
    return normalizeEntries(publicEntries, seen);
  } finally {
    seen.delete(value);
  }
}
