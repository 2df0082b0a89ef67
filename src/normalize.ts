import { isJsonObject } from "./models.js";

/** Top-level shapes a feed response is known to arrive in. */
export type ResponseShape =
  | { kind: "keyed"; items: unknown }
  | { kind: "object"; value: Record<string, unknown> }
  | { kind: "array"; items: unknown[] }
  | { kind: "other" };

export interface NormalizeOptions {
  /** Treat an object without the extraction key as a single item (station feed). */
  wrapBareObject?: boolean;
}

export function classifyShape(raw: unknown, extractionKey: string): ResponseShape {
  if (isJsonObject(raw)) {
    return extractionKey in raw
      ? { kind: "keyed", items: raw[extractionKey] }
      : { kind: "object", value: raw };
  }
  if (Array.isArray(raw)) {
    return { kind: "array", items: raw };
  }
  return { kind: "other" };
}

/**
 * Extracts the item list from a decoded feed response. Never throws: shapes it
 * cannot read yield no items.
 */
export function normalize(
  raw: unknown,
  extractionKey: string,
  options: NormalizeOptions = {},
): unknown[] {
  const shape = classifyShape(raw, extractionKey);

  switch (shape.kind) {
    case "keyed":
      return Array.isArray(shape.items) ? shape.items : [];
    case "object":
      return options.wrapBareObject ? [shape.value] : [];
    case "array":
      return shape.items;
    case "other":
      return [];
  }
}
