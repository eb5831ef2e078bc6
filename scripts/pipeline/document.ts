/**
 * Decode raw results.json bytes into a JsonValue tree.
 *
 * The tree only lives long enough to be normalized; nothing past the
 * normalizer sees it.
 */

import { MalformedDocument, errorMessage } from "./errors";
import type { JsonMap, JsonValue } from "./types";

function toJsonValue(value: unknown, path: string): JsonValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => toJsonValue(item, `${path}[${i}]`));
  }
  if (typeof value === "object") {
    // fromEntries defines "__proto__" as an own key instead of setting the prototype
    const map: JsonMap = Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        toJsonValue(item, `${path}.${key}`),
      ]),
    );
    return map;
  }
  throw new MalformedDocument(`Unsupported value at ${path}`);
}

export function parseDocument(raw: Buffer | string): JsonValue {
  const text = typeof raw === "string" ? raw : raw.toString("utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new MalformedDocument(`Invalid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return toJsonValue(parsed, "$");
}

// ---------- Narrowing helpers ----------

export function isJsonMap(value: JsonValue | undefined): value is JsonMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonList(
  value: JsonValue | undefined,
): value is JsonValue[] {
  return Array.isArray(value);
}
