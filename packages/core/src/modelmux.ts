import {
  createDefaultRegistry,
  createLogger,
  setLogLevel,
  type AIProvider,
  type ProviderRegistry,
  type SpeechEngine,
} from "@modelmux/ai-providers";
import { AI } from "./AI.js";
import { ContentCache } from "./cache/ContentCache.js";
import { DEFAULT_CACHE_DIR, loadConfig } from "./config/index.js";
import { toProviderConfig, type ModelmuxConfig } from "./config/schema.js";
import { RetryableDispatcher } from "./dispatcher/RetryableDispatcher.js";

const log = createLogger("modelmux");

export interface ModelmuxOptions {
  /** Ready configuration; skips loading from disk */
  config?: ModelmuxConfig;
  /** Config file to load when `config` is not given */
  configPath?: string;
  /** Environment for API keys; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Registry to build providers from; defaults to the built-in one */
  registry?: ProviderRegistry;
  /** Engine for the local speech provider */
  speechEngine?: SpeechEngine;
  /** Delay function between retries, for tests */
  sleep?: (ms: number) => Promise<void>;
}

/** Instantiate every configured provider that has a registered constructor. */
export function buildProviders(
  config: ModelmuxConfig,
  registry: ProviderRegistry,
  speechEngine?: SpeechEngine
): AIProvider[] {
  const providers: AIProvider[] = [];

  for (const [id, settings] of Object.entries(config.aiProviders)) {
    if (!registry.isRegistered(id)) {
      log.warn(`No provider registered for "${id}"; skipping`);
      continue;
    }
    if (settings.modelPrefixes.length > 0) {
      registry.addModelPrefixes(id, settings.modelPrefixes);
    }
    providers.push(
      registry.build(id, toProviderConfig(settings), {
        keyCooldownMs: config.globalSettings.keyCooldownMs,
        speechEngine,
      })
    );
  }

  return providers;
}

/**
 * Wire configuration, providers, cache and dispatcher into an {@link AI}.
 * Everything is constructed here once and passed down explicitly.
 */
export async function createModelmux(options: ModelmuxOptions = {}): Promise<AI> {
  const config = options.config ?? (await loadConfig(options.configPath, { env: options.env }));
  const { globalSettings } = config;
  setLogLevel(globalSettings.logLevel);

  const registry = options.registry ?? createDefaultRegistry();
  const providers = buildProviders(config, registry, options.speechEngine);

  const cache = new ContentCache({
    directory: globalSettings.cache.directory ?? DEFAULT_CACHE_DIR,
    enabled: globalSettings.cache.enabled,
    capabilities: globalSettings.cache.capabilities,
    memoryTtlMs: globalSettings.cache.memoryTtlMinutes * 60_000,
    memoryMaxEntries: globalSettings.cache.memoryMaxEntries,
    diskTtlMs:
      globalSettings.cache.diskTtlHours !== undefined ? globalSettings.cache.diskTtlHours * 3_600_000 : undefined,
  });

  const dispatcher = new RetryableDispatcher({
    providers,
    registry,
    preferences: config.capabilityPreferences,
    cache,
    maxRetries: globalSettings.maxRetries,
    retryDelayMs: globalSettings.retryDelayMs,
    sleep: options.sleep,
  });

  log.debug(`Ready with ${providers.filter((p) => p.isConfigured()).length}/${providers.length} providers configured`);
  return new AI(dispatcher, cache);
}
