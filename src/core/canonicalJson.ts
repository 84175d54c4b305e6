import { createHash } from "crypto";
import type { JsonPrimitive, JsonValue } from "./json.js";

/** JSON as parsers hand it over: optional fields may be present but undefined. */
export type JsonInput = JsonPrimitive | undefined | readonly JsonInput[] | { readonly [key: string]: JsonInput };

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export function sha256Prefixed(data: string | Buffer): `sha256:${string}` {
  return `sha256:${sha256Hex(data)}` as const;
}

function isJsonArray(value: JsonInput): value is readonly JsonInput[] {
  return Array.isArray(value);
}

/** Sorts object keys, drops undefined fields and maps non-finite numbers and -0. */
export function canonicalizeJson(value: JsonInput): JsonValue | undefined {
  if (value === undefined || value === null) return value;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    if (Object.is(value, -0)) return 0;
    return value;
  }

  if (typeof value === "string" || typeof value === "boolean") return value;

  if (isJsonArray(value)) return value.map((v) => canonicalizeJson(v) ?? null);

  const out: { [key: string]: JsonValue } = {};
  for (const key of Object.keys(value).sort()) {
    const c = canonicalizeJson(value[key]);
    if (c !== undefined) out[key] = c;
  }
  return out;
}

export function stableJsonStringify(value: JsonInput): string {
  return JSON.stringify(canonicalizeJson(value) ?? null);
}

/** Hash of a task descriptor, stable across key order. */
export function paramsHash(value: JsonInput): `sha256:${string}` {
  return sha256Prefixed(stableJsonStringify(value));
}
