import { createHash } from "node:crypto";
import {
  CredentialsExhaustedError,
  InvalidModelError,
  NoProviderAvailableError,
  ProviderRequestError,
  RequestCancelledError,
  TransientBackendError,
  UnknownProviderError,
  createLogger,
  extractJsonBlock,
  imageExtension,
  isAIProviderError,
  stringField,
  type AICapability,
  type AIProviderError,
  type AIProvider,
  type CapabilityParams,
  type ProviderRegistry,
  type ProviderResponse,
} from "@modelmux/ai-providers";
import type { ContentCache, CacheEntry } from "../cache/ContentCache.js";
import { canonicalJson, computeCacheKey } from "../cache/cache-key.js";
import type { CapabilityPreference } from "../config/schema.js";
import type { AIResponse, Candidate, InvokeRequest, ProviderStats } from "./types.js";

const log = createLogger("dispatcher");

export interface DispatcherOptions {
  /** Built providers, in configuration order */
  providers: readonly AIProvider[];
  registry: ProviderRegistry;
  preferences?: Partial<Record<AICapability, CapabilityPreference>>;
  cache?: ContentCache;
  /** Attempts per provider when it has no key pool */
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

interface StatsSlot {
  successes: number;
  failures: number;
  totalLatencyMs: number;
  lastError?: string;
}

interface PlannedCall {
  provider: AIProvider;
  model: string;
}

/** Capabilities whose text may carry an embedded JSON payload. */
function wantsExtraction(capability: AICapability, params?: CapabilityParams): boolean {
  if (capability === "image-generation" || capability === "image-analysis") return true;
  return capability === "text-generation" && params?.kind === "text" && params.expectJson;
}

/** Errors after which the next provider in the chain is tried. */
function shouldFailOver(error: unknown): boolean {
  if (!isAIProviderError(error)) return false;
  switch (error.code) {
    case "CREDENTIALS_EXHAUSTED":
    case "UNSUPPORTED_INPUT_SHAPE":
    case "PROVIDER_REQUEST":
    case "TRANSIENT_BACKEND":
    case "MALFORMED_RESPONSE":
      return true;
    default:
      return false;
  }
}

/** Errors from outside the taxonomy become request failures, keeping the original as `cause`. */
function asProviderError(providerId: string, error: unknown): AIProviderError {
  if (isAIProviderError(error)) return error;
  return new ProviderRequestError(providerId, `${providerId} failed: ${errorText(error)}`, undefined, {
    cause: error,
  });
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Capability router.
 *
 * Builds a deterministic candidate chain, consults the cache, then walks
 * the chain: transient failures rotate credentials on the same provider,
 * exhausted credentials and unsupported inputs move to the next provider,
 * and an unknown model aborts at once.
 */
export class RetryableDispatcher {
  private readonly providers: Map<string, AIProvider>;
  private readonly stats = new Map<string, StatsSlot>();
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly options: DispatcherOptions) {
    this.providers = new Map(options.providers.map((p) => [p.id, p]));
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? Date.now;
  }

  getProvider(id: string): AIProvider | undefined {
    return this.providers.get(id);
  }

  listProviders(): AIProvider[] {
    return [...this.providers.values()];
  }

  /**
   * Providers to try for `request`, in order, with the model each will use.
   *
   * Order: explicit provider, owner of an explicit model, the capability's
   * primary and fallbacks, then every other provider in configuration order.
   * Unconfigured providers and those lacking the capability are skipped.
   *
   * @throws UnknownProviderError when an explicit provider is not configured at all
   * @throws InvalidModelError when the explicit model is not served by its provider
   */
  plan(request: InvokeRequest): Candidate[] {
    return this.planCalls(request).map(({ provider, model }) => ({ providerId: provider.id, model }));
  }

  /**
   * Run a capability call end to end.
   *
   * @throws NoProviderAvailableError when no provider can serve the capability
   * @throws RequestCancelledError when the signal fires before a dispatch
   * @throws InvalidModelError immediately, without trying other providers
   * @throws the last provider's error when every candidate failed
   */
  async invoke(request: InvokeRequest): Promise<AIResponse> {
    this.throwIfCancelled(request.signal);
    const calls = this.planCalls(request);
    if (calls.length === 0) {
      throw new NoProviderAvailableError(request.capability);
    }

    const cache = request.useCache === false ? undefined : this.options.cache;
    const cacheable = cache?.isCacheable(request.capability) ?? false;
    const keys = new Map<string, string>();

    if (cache && cacheable) {
      for (const call of calls) {
        const key = this.cacheKey(request, call);
        keys.set(call.provider.id, key);
        const hit = await cache.get(key, request.capability);
        if (hit) {
          log.debug(`cache hit for ${request.capability} via ${hit.provider}`);
          return this.fromCache(hit, request);
        }
      }
    }

    let lastError: unknown;
    for (const call of calls) {
      const { provider, model } = call;
      try {
        const response = await this.callProvider(request, call);

        let filePath: string | undefined;
        if (cache && cacheable) {
          const entry = await cache.put(keys.get(provider.id) ?? this.cacheKey(request, call), request.capability, {
            provider: provider.id,
            model,
            response,
            extension: this.extensionFor(request.params),
          });
          filePath = entry?.filePath;
        }

        return {
          ...this.normalize(request, response),
          capability: request.capability,
          provider: provider.id,
          model,
          fromCache: false,
          filePath,
        };
      } catch (error) {
        if (!shouldFailOver(error)) throw error;
        lastError = error;
        log.warn(`${provider.id} failed for ${request.capability}: ${errorText(error)}`);
      }
    }

    throw lastError ?? new NoProviderAvailableError(request.capability);
  }

  /** Per-provider counters since construction. */
  getStats(): Record<string, ProviderStats> {
    const snapshot: Record<string, ProviderStats> = {};
    for (const [id, slot] of this.stats) {
      snapshot[id] = {
        successes: slot.successes,
        failures: slot.failures,
        averageLatencyMs: slot.successes > 0 ? Math.round(slot.totalLatencyMs / slot.successes) : 0,
        lastError: slot.lastError,
      };
    }
    return snapshot;
  }

  private planCalls(request: InvokeRequest): PlannedCall[] {
    const { capability } = request;

    if (request.provider && !this.providers.has(request.provider)) {
      throw new UnknownProviderError(request.provider);
    }

    const owner = request.model && !request.provider ? this.options.registry.resolveOwner(request.model) : undefined;
    const preference = this.options.preferences?.[capability];
    const order = [
      request.provider,
      owner,
      preference?.primary,
      ...(preference?.fallbacks ?? []),
      ...this.providers.keys(),
    ];

    const seen = new Set<string>();
    const usable: AIProvider[] = [];
    for (const id of order) {
      if (!id || seen.has(id)) continue;
      seen.add(id);
      const provider = this.providers.get(id);
      if (!provider) continue;
      if (!provider.isConfigured() || !provider.supportsCapability(capability)) {
        if (id === request.provider) {
          log.warn(`Requested provider ${id} cannot serve ${capability}; trying others`);
        }
        continue;
      }
      usable.push(provider);
    }

    // The explicit model belongs to the explicit provider, its owner, or failing both the first candidate
    const modelTarget = request.model ? (request.provider ?? owner ?? usable[0]?.id) : undefined;

    const calls: PlannedCall[] = [];
    for (const provider of usable) {
      if (request.model && provider.id === modelTarget) {
        if (!provider.supportsModel(capability, request.model)) {
          throw new InvalidModelError(request.model, provider.id);
        }
        calls.push({ provider, model: request.model });
        continue;
      }
      const model = provider.getDefaultModel(capability);
      if (!model) {
        log.debug(`${provider.id} has no default model for ${capability}`);
        continue;
      }
      calls.push({ provider, model });
    }
    return calls;
  }

  /**
   * Call one provider, retrying transient failures. With a key pool each
   * retry uses the next key and the pool bounds the attempts; without one
   * `maxRetries` does.
   */
  private async callProvider(request: InvokeRequest, call: PlannedCall): Promise<ProviderResponse> {
    const { provider, model } = call;
    const pool = provider.credentials;
    let attempt = 0;

    for (;;) {
      this.throwIfCancelled(request.signal);
      attempt++;
      const started = this.now();

      let response: ProviderResponse;
      try {
        response = await provider.sendMessage(request.envelope, request.capability, {
          model,
          attachment: request.attachment,
          voice: request.voice,
          params: request.params,
        });
        if (response.error) {
          throw new ProviderRequestError(provider.id, response.error);
        }
        if (request.capability === "image-generation" && !response.imageBase64) {
          throw new ProviderRequestError(provider.id, `${provider.id} returned no image`);
        }
      } catch (caught) {
        const error = asProviderError(provider.id, caught);
        this.recordFailure(provider.id, error);
        if (!(error instanceof TransientBackendError)) throw error;

        if (pool) {
          if (!pool.hasAvailable()) {
            throw new CredentialsExhaustedError(provider.id);
          }
        } else if (attempt >= this.maxRetries) {
          throw error;
        }

        log.info(`${provider.id}: ${error.reason}, retrying (attempt ${attempt + 1})`);
        await this.sleep(this.retryDelayMs);
        continue;
      }

      this.recordSuccess(provider.id, this.now() - started);
      return response;
    }
  }

  private normalize(request: InvokeRequest, response: ProviderResponse): ProviderResponse & {
    structured?: Record<string, unknown>;
    unstructured?: boolean;
  } {
    if (!response.text || !wantsExtraction(request.capability, request.params)) {
      return { ...response };
    }

    const extracted = extractJsonBlock(response.text);
    if (extracted.kind === "raw") {
      return { ...response, unstructured: true };
    }

    const { value } = extracted;
    return {
      ...response,
      text: stringField(value, "response") ?? response.text,
      revisedPrompt: stringField(value, "description") ?? response.revisedPrompt,
      structured: value,
    };
  }

  private fromCache(entry: CacheEntry, request: InvokeRequest): AIResponse {
    return {
      ...this.normalize(request, entry.response),
      capability: request.capability,
      provider: entry.provider,
      model: entry.model,
      fromCache: true,
      filePath: entry.filePath,
    };
  }

  /**
   * Cache key over everything that shapes the artifact. The request time
   * is left out so identical requests made later still hit.
   */
  private cacheKey(request: InvokeRequest, call: PlannedCall): string {
    const { provider, model } = call;
    const { history, envelope } = provider.processHistory(request.envelope);
    const { params } = request;

    const voice =
      request.capability === "audio-generation"
        ? request.voice && provider.isValidVoice(request.voice)
          ? request.voice
          : provider.getDefaultVoice()
        : undefined;
    const language = params?.kind === "audio" || params?.kind === "transcription" ? params.language : undefined;
    const format = params?.kind === "audio" || params?.kind === "image" ? params.format : undefined;
    const attachment = request.attachment
      ? createHash("sha256").update(request.attachment.base64).digest("hex")
      : undefined;

    return computeCacheKey({
      provider: provider.id,
      capability: request.capability,
      selector: voice ?? model,
      language,
      format,
      extras: { model, params, attachment },
      // Instructions are ordered: keep them as rendered rather than sorted.
      content: canonicalJson({
        context: envelope.context,
        instructions: JSON.stringify(envelope.instructions),
        history,
      }),
    });
  }

  private extensionFor(params?: CapabilityParams): string | undefined {
    if (params?.kind === "audio") return params.format;
    if (params?.kind === "image") return imageExtension(params.format);
    return undefined;
  }

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new RequestCancelledError();
    }
  }

  private slot(id: string): StatsSlot {
    let slot = this.stats.get(id);
    if (!slot) {
      slot = { successes: 0, failures: 0, totalLatencyMs: 0 };
      this.stats.set(id, slot);
    }
    return slot;
  }

  private recordSuccess(id: string, latencyMs: number): void {
    const slot = this.slot(id);
    slot.successes++;
    slot.totalLatencyMs += latencyMs;
  }

  private recordFailure(id: string, error: unknown): void {
    const slot = this.slot(id);
    slot.failures++;
    slot.lastError = errorText(error);
  }
}
