import {
  UnknownProviderError,
  audioParams,
  createLogger,
  imageParams,
  textParams,
  transcriptionParams,
  type AICapability,
  type AIProvider,
  type Attachment,
  type AudioParamsInput,
  type CapabilityParams,
  type ImageParamsInput,
  type RequestEnvelope,
  type TextParamsInput,
  type TranscriptionParamsInput,
  type VoiceInfo,
} from "@modelmux/ai-providers";
import type { CacheClearResult, CacheStats, ContentCache } from "./cache/ContentCache.js";
import type { RetryableDispatcher } from "./dispatcher/RetryableDispatcher.js";
import type { AIResponse, ProviderStats } from "./dispatcher/types.js";

const log = createLogger("ai");

/** Options shared by every capability call. */
export interface CallOptions {
  provider?: string;
  model?: string;
  /** Context, instructions and prior turns; the new message is appended */
  envelope?: Partial<RequestEnvelope>;
  signal?: AbortSignal;
  useCache?: boolean;
}

export interface SpeakOptions extends CallOptions {
  voice?: string;
  params?: AudioParamsInput;
}

export interface ListOptions {
  /** Skip the persistent list cache */
  refresh?: boolean;
}

export interface ModelList {
  models: string[];
  source: "cache" | "api" | "config";
}

export interface ProviderSummary {
  id: string;
  displayName: string;
  capabilities: readonly AICapability[];
  configured: boolean;
  /** Usable keys / total keys, for providers with a key pool */
  keys?: { active: number; total: number };
}

export interface AIStats {
  providers: Record<string, ProviderStats>;
  cache?: CacheStats;
}

/**
 * Capability-oriented entry point.
 *
 * Each method builds an envelope and hands it to the dispatcher; no
 * capability logic lives here.
 */
export class AI {
  constructor(
    private readonly dispatcher: RetryableDispatcher,
    private readonly cache?: ContentCache
  ) {}

  /** Generate text in reply to `message`. */
  async text(message: string, options: CallOptions & { params?: TextParamsInput } = {}): Promise<AIResponse> {
    return this.generate("text-generation", message, options, textParams(options.params));
  }

  /** Generate an image from `prompt`. The result carries `imageBase64` and, when cached, `filePath`. */
  async image(prompt: string, options: CallOptions & { params?: ImageParamsInput } = {}): Promise<AIResponse> {
    return this.generate("image-generation", prompt, options, imageParams(options.params));
  }

  /** Describe or answer questions about an image. */
  async analyzeImage(
    image: Attachment,
    prompt: string,
    options: CallOptions & { params?: TextParamsInput } = {}
  ): Promise<AIResponse> {
    return this.generate("image-analysis", prompt, options, textParams(options.params), image);
  }

  /** Synthesize speech for `text`. */
  async speak(text: string, options: SpeakOptions = {}): Promise<AIResponse> {
    return this.dispatcher.invoke({
      capability: "audio-generation",
      envelope: buildEnvelope(text, options.envelope),
      provider: options.provider,
      model: options.model,
      voice: options.voice,
      params: audioParams(options.params),
      signal: options.signal,
      useCache: options.useCache,
    });
  }

  /**
   * Transcribe an audio file, or capture from a microphone when `audio`
   * is omitted and the params ask for it.
   */
  async transcribe(
    audio: Attachment | undefined,
    options: CallOptions & { params?: TranscriptionParamsInput } = {}
  ): Promise<AIResponse> {
    return this.generate("audio-transcription", "", options, transcriptionParams(options.params), audio);
  }

  /** Universal call for any capability with explicit parameters. */
  async generate(
    capability: AICapability,
    message: string,
    options: CallOptions = {},
    params?: CapabilityParams,
    attachment?: Attachment
  ): Promise<AIResponse> {
    return this.dispatcher.invoke({
      capability,
      envelope: buildEnvelope(message, options.envelope),
      provider: options.provider,
      model: options.model,
      attachment,
      params,
      signal: options.signal,
      useCache: options.useCache,
    });
  }

  /**
   * Models for a provider: the cached list, else a fresh listing ranked
   * by the provider, else the configured models.
   */
  async listModels(providerId: string, options: ListOptions = {}): Promise<ModelList> {
    const provider = this.requireProvider(providerId);

    if (!options.refresh) {
      const cached = await this.cache?.getModels(providerId);
      if (cached && cached.length > 0) {
        return { models: cached, source: "cache" };
      }
    }

    if (provider.isConfigured()) {
      const fetched = await provider.fetchModelsFromAPI();
      if (fetched && fetched.length > 0) {
        await this.cache?.saveModels(providerId, fetched);
        return { models: fetched, source: "api" };
      }
    }

    const configured = Object.values(provider.descriptor.availableModels).flatMap((models) => models ?? []);
    const models = [...new Set(configured)].sort((a, b) => provider.compareModels(a, b));
    log.debug(`${providerId}: using ${models.length} configured models`);
    return { models, source: "config" };
  }

  async getVoices(providerId: string, options: ListOptions = {}): Promise<VoiceInfo[]> {
    const provider = this.requireProvider(providerId);

    if (!options.refresh) {
      const cached = await this.cache?.getVoices(providerId);
      if (cached && cached.length > 0) return cached;
    }

    const voices = await provider.getAvailableVoices();
    if (voices.length > 0) {
      await this.cache?.saveVoices(providerId, voices);
    }
    return voices;
  }

  providers(): ProviderSummary[] {
    return this.dispatcher.listProviders().map((provider) => {
      const summary: ProviderSummary = {
        id: provider.id,
        displayName: provider.descriptor.displayName,
        capabilities: provider.descriptor.capabilities,
        configured: provider.isConfigured(),
      };
      if (provider.credentials) {
        const stats = provider.credentials.stats();
        summary.keys = { active: stats.active, total: stats.total };
      }
      return summary;
    });
  }

  /** Remove cached artifacts for one capability, or all of them. */
  async clearCache(capability?: AICapability): Promise<CacheClearResult> {
    return this.cache ? this.cache.clear(capability) : { disk: 0, memory: 0 };
  }

  /** Remove cached model and voice lists. */
  async clearModelCache(): Promise<number> {
    return this.cache ? this.cache.clearModels() : 0;
  }

  async stats(): Promise<AIStats> {
    return {
      providers: this.dispatcher.getStats(),
      cache: await this.cache?.stats(),
    };
  }

  /** Release cache timers. */
  dispose(): void {
    this.cache?.dispose();
  }

  private requireProvider(providerId: string): AIProvider {
    const provider = this.dispatcher.getProvider(providerId);
    if (!provider) {
      throw new UnknownProviderError(providerId);
    }
    return provider;
  }
}

/**
 * Envelope for a new message: prior turns from `base`, then the message
 * as a user turn. An empty message adds no turn.
 */
export function buildEnvelope(message: string, base: Partial<RequestEnvelope> = {}): RequestEnvelope {
  const history = [...(base.history ?? [])];
  if (message) {
    history.push({ role: "user", content: message });
  }
  return {
    context: base.context ?? {},
    instructions: base.instructions ?? {},
    history,
    dateTime: base.dateTime ?? new Date().toISOString(),
  };
}
