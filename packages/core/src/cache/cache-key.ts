import { createHash } from "node:crypto";
import type { AICapability } from "@modelmux/ai-providers";

/**
 * Every dimension that distinguishes two cacheable requests.
 * Two requests share a key only when all of them match.
 */
export interface CacheKeyInput {
  provider: string;
  capability: AICapability;
  /** Prompt text, or the rendered envelope */
  content: string;
  /** Voice for speech, model otherwise */
  selector?: string;
  language?: string;
  /** Output format, e.g. "mp3" or "png" */
  format?: string;
  /** Remaining parameters that change the artifact */
  extras?: Record<string, unknown>;
}

/** The value `JSON.stringify` would serialize: the result of `toJSON()` when present. */
function jsonValue(value: unknown): unknown {
  if (typeof value === "object" && value !== null) {
    const toJSON: unknown = Reflect.get(value, "toJSON");
    if (typeof toJSON === "function") {
      const serialized: unknown = toJSON.call(value);
      return serialized;
    }
  }
  return value;
}

/** JSON with object keys sorted at every depth. */
export function canonicalJson(input: unknown): string {
  const value = jsonValue(input);
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item === undefined ? null : item)).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value ?? null);
}

/** SHA-256 hex digest identifying a cacheable request. */
export function computeCacheKey(input: CacheKeyInput): string {
  const tuple = [
    input.provider,
    input.capability,
    input.selector ?? null,
    input.language ?? null,
    input.format ?? null,
    input.extras ?? {},
    input.content,
  ];
  return createHash("sha256").update(canonicalJson(tuple)).digest("hex");
}
