/**
 * AI Providers - pluggable provider system for modelmux
 *
 * Providers, registry, credential pool and response normalizer. The
 * orchestration layer (dispatcher, cache, configuration) lives in
 * @modelmux/core.
 */

// Interface and registry
export * from "./interface/index.js";
export { createDefaultRegistry, BUILTIN_MODEL_PREFIXES } from "./default-registry.js";

// Infrastructure
export { ApiKeyPool } from "./keys/ApiKeyPool.js";
export type { ApiKeyStatus, ApiKeyPoolOptions, ApiKeyPoolStats } from "./keys/ApiKeyPool.js";
export {
  extractJsonBlock,
  extractBalanced,
  findBalancedCandidates,
  tryParseObject,
  isPlainObject,
  stringField,
} from "./normalizer/json-extract.js";
export type { ExtractedJson } from "./normalizer/json-extract.js";
export { createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";

// Individual providers
export { OpenAIProvider, openaiModelPriority } from "./openai/OpenAIProvider.js";
export { GeminiProvider, geminiModelPriority } from "./gemini/GeminiProvider.js";
export { GrokProvider, grokModelPriority } from "./grok/GrokProvider.js";
export { LocalSpeechProvider } from "./local/LocalSpeechProvider.js";
export type { SpeechEngine, SynthesizeOptions, ListenOptions } from "./local/speech-engine.js";
