/**
 * @modelmux/core - configuration, content cache, dispatcher and facade
 */

export { AI, buildEnvelope } from "./AI.js";
export type { CallOptions, SpeakOptions, ListOptions, ModelList, ProviderSummary, AIStats } from "./AI.js";
export { createModelmux, buildProviders } from "./modelmux.js";
export type { ModelmuxOptions } from "./modelmux.js";

export { RetryableDispatcher } from "./dispatcher/RetryableDispatcher.js";
export type { DispatcherOptions } from "./dispatcher/RetryableDispatcher.js";
export type { AIResponse, InvokeRequest, ProviderStats, Candidate } from "./dispatcher/types.js";

export { ContentCache, LIST_CACHE_TTL_MS } from "./cache/ContentCache.js";
export type {
  ContentCacheOptions,
  CacheEntry,
  CacheWrite,
  CacheClearResult,
  CacheStats,
} from "./cache/ContentCache.js";
export { MemoryCache } from "./cache/MemoryCache.js";
export { computeCacheKey, canonicalJson } from "./cache/cache-key.js";
export type { CacheKeyInput } from "./cache/cache-key.js";

export * from "./config/index.js";
