import { stripSigil } from "../parser/parameters.js";

/**
 * Copy of a row or parameter map without the excluded fields.
 * Keys are compared case-insensitively with any placeholder sigil removed.
 */
export function omitFields(
  values: Readonly<Record<string, unknown>>,
  excludeFields: readonly string[],
): Record<string, unknown> {
  if (excludeFields.length === 0) return { ...values };

  const excluded = new Set(excludeFields.map((field) => stripSigil(field).toLowerCase()));
  const filtered: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (!excluded.has(stripSigil(key).toLowerCase())) {
      filtered[key] = value;
    }
  }
  return filtered;
}

/**
 * Safely serialize a value for storage
 * Handles dates, bigints, buffers and other special types
 */
export function safeSerialize(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === "bigint") {
    return value.toString();
  }

  if (Buffer.isBuffer(value)) {
    return value.toString("base64");
  }

  if (typeof value === "object") {
    if (Array.isArray(value)) {
      return value.map(safeSerialize);
    }

    const serialized: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      serialized[key] = safeSerialize(val);
    }
    return serialized;
  }

  return value;
}
