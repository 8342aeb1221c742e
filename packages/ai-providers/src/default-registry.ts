import { ProviderRegistry } from "./interface/registry.js";
import { OpenAIProvider } from "./openai/OpenAIProvider.js";
import { GeminiProvider } from "./gemini/GeminiProvider.js";
import { GrokProvider } from "./grok/GrokProvider.js";
import { LocalSpeechProvider } from "./local/LocalSpeechProvider.js";

/** Model prefixes claimed by each built-in provider. */
export const BUILTIN_MODEL_PREFIXES: Readonly<Record<string, readonly string[]>> = {
  openai: ["gpt-", "o1", "o3", "o4", "dall-e", "tts-", "whisper", "gpt-image"],
  gemini: ["gemini-", "imagen-"],
  grok: ["grok-"],
  "local-speech": ["local-"],
};

/**
 * Registry with every built-in provider registered, in a fixed order.
 */
export function createDefaultRegistry(): ProviderRegistry {
  const registry = new ProviderRegistry();
  registry.register("openai", (id, config, deps) => new OpenAIProvider(id, config, deps), [...BUILTIN_MODEL_PREFIXES.openai]);
  registry.register("gemini", (id, config, deps) => new GeminiProvider(id, config, deps), [...BUILTIN_MODEL_PREFIXES.gemini]);
  registry.register("grok", (id, config, deps) => new GrokProvider(id, config, deps), [...BUILTIN_MODEL_PREFIXES.grok]);
  registry.register(
    "local-speech",
    (id, config, deps) => new LocalSpeechProvider(id, config, deps),
    [...BUILTIN_MODEL_PREFIXES["local-speech"]]
  );
  return registry;
}
