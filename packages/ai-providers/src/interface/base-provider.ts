import type {
  AICapability,
  AIProvider,
  ConversationTurn,
  ProviderConfig,
  ProviderDescriptor,
  ProviderResponse,
  RequestEnvelope,
  SendMessageOptions,
  VoiceGender,
  VoiceInfo,
} from "./types.js";
import type { ProviderDeps } from "./registry.js";
import {
  CredentialsExhaustedError,
  MalformedResponseError,
  TransientBackendError,
  classifyHttpFailure,
} from "./errors.js";
import { ApiKeyPool } from "../keys/ApiKeyPool.js";
import { createLogger, type Logger } from "../utils/logger.js";

export interface BaseProviderOptions {
  /** Capabilities this backend implements; intersected with configuration */
  capabilities: readonly AICapability[];
  /** Used when configuration gives no base URL */
  defaultBaseUrl: string;
  /** Whether requests need an API key from the pool */
  requiresApiKey: boolean;
}

/** Request options with plain-object headers, so auth headers can be merged. */
export type ProviderRequestInit = Omit<RequestInit, "headers"> & {
  headers?: Record<string, string>;
};

const ROLES: ReadonlySet<string> = new Set(["system", "user", "assistant"]);

function isConversationTurn(value: unknown): value is ConversationTurn {
  if (typeof value !== "object" || value === null) return false;
  const role: unknown = Reflect.get(value, "role");
  const content: unknown = Reflect.get(value, "content");
  return typeof role === "string" && ROLES.has(role) && typeof content === "string";
}

function withoutHistory(record: Record<string, unknown>): Record<string, unknown> {
  const { history: _history, ...rest } = record;
  return rest;
}

/**
 * Shared plumbing for HTTP providers: configuration queries, credential
 * rotation, history extraction and classified `fetch` calls.
 */
export abstract class BaseProvider implements AIProvider {
  readonly descriptor: ProviderDescriptor;
  readonly credentials?: ApiKeyPool;
  protected readonly log: Logger;
  protected readonly baseUrl: string;
  private readonly requiresApiKey: boolean;

  constructor(
    readonly id: string,
    protected readonly config: ProviderConfig,
    deps: ProviderDeps,
    options: BaseProviderOptions
  ) {
    this.log = createLogger(id);
    this.baseUrl = (config.apiSettings.baseUrl ?? options.defaultBaseUrl).replace(/\/+$/, "");
    this.requiresApiKey = options.requiresApiKey;

    if (options.requiresApiKey) {
      this.credentials = new ApiKeyPool(id, config.apiSettings.apiKeys, {
        cooldownMs: deps.keyCooldownMs,
      });
    }

    const capabilities = config.capabilities.filter((c) => options.capabilities.includes(c));
    const defaultModels: Partial<Record<AICapability, string>> = {};
    for (const capability of capabilities) {
      const model = config.defaults[capability] ?? config.models[capability]?.[0];
      if (model) defaultModels[capability] = model;
    }

    this.descriptor = {
      id,
      displayName: config.displayName,
      capabilities,
      defaultModels,
      availableModels: config.models,
      rateLimits: config.rateLimits,
      requiredCredentialKeys: config.apiSettings.apiKeyEnv ? [config.apiSettings.apiKeyEnv] : [],
    };
  }

  isConfigured(): boolean {
    if (!this.config.enabled) return false;
    return this.requiresApiKey ? (this.credentials?.size ?? 0) > 0 : true;
  }

  supportsCapability(capability: AICapability): boolean {
    return this.descriptor.capabilities.includes(capability);
  }

  getDefaultModel(capability: AICapability): string | undefined {
    return this.descriptor.defaultModels[capability];
  }

  supportsModel(capability: AICapability, model: string): boolean {
    if (!this.supportsCapability(capability)) return false;
    if (this.config.models[capability]?.includes(model)) return true;
    const name = model.toLowerCase();
    return this.config.modelPrefixes.some((prefix) => name.startsWith(prefix.toLowerCase()));
  }

  abstract compareModels(a: string, b: string): number;

  /** Raw model ids from the backend's listing endpoint. */
  protected abstract listRemoteModels(): Promise<string[]>;

  async fetchModelsFromAPI(): Promise<string[] | null> {
    try {
      const models = await this.listRemoteModels();
      const prefixes = this.config.modelPrefixes.map((p) => p.toLowerCase());
      const owned = prefixes.length > 0
        ? models.filter((m) => prefixes.some((p) => m.toLowerCase().startsWith(p)))
        : models;
      return [...new Set(owned)].sort((a, b) => this.compareModels(a, b));
    } catch (error) {
      this.log.warn(`Model list refresh failed: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  processHistory(envelope: RequestEnvelope): {
    history: ConversationTurn[];
    envelope: RequestEnvelope;
  } {
    const embedded = [envelope.context.history, envelope.instructions.history].find(
      (value): value is unknown[] => Array.isArray(value)
    );
    const history = envelope.history ?? embedded?.filter(isConversationTurn) ?? [];

    return {
      history: [...history],
      envelope: {
        context: withoutHistory(envelope.context),
        instructions: withoutHistory(envelope.instructions),
        dateTime: envelope.dateTime,
      },
    };
  }

  abstract sendMessage(
    envelope: RequestEnvelope,
    capability: AICapability,
    options?: SendMessageOptions
  ): Promise<ProviderResponse>;

  async getAvailableVoices(): Promise<VoiceInfo[]> {
    return [];
  }

  isValidVoice(_name: string): boolean {
    return false;
  }

  getVoiceGender(_name: string): VoiceGender {
    return "neutral";
  }

  getDefaultVoice(): string | undefined {
    return this.config.defaultVoice;
  }

  /**
   * Voice for a synthesis request: the requested one if valid, else the
   * configured default, else the backend's own default.
   */
  protected resolveVoice(requested?: string): string | undefined {
    if (requested && this.isValidVoice(requested)) {
      return requested;
    }
    if (requested) {
      this.log.warn(`Unknown voice "${requested}", using default`);
    }
    return this.getDefaultVoice();
  }

  /** Response for a capability this provider does not implement. */
  protected unsupported(capability: AICapability): ProviderResponse {
    return {
      text: "",
      error: `${this.config.displayName} does not support ${capability}`,
    };
  }

  /** Auth headers for `apiKey`; bearer token unless overridden. */
  protected buildAuthHeaders(apiKey: string): Record<string, string> {
    return { Authorization: `Bearer ${apiKey}` };
  }

  protected endpoint(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  /**
   * Perform an authenticated request.
   *
   * Failures are classified; a transient failure marks the key this
   * request was sent with, so the next attempt uses another one.
   *
   * @throws CredentialsExhaustedError when no key is left
   * @throws TransientBackendError on 429, 5xx, rejected keys and network faults
   * @throws ProviderRequestError on other non-2xx statuses
   */
  protected async request(path: string, init: ProviderRequestInit = {}): Promise<Response> {
    let authHeaders: Record<string, string> = {};
    let apiKey: string | undefined;
    if (this.credentials) {
      apiKey = this.credentials.next();
      authHeaders = this.buildAuthHeaders(apiKey);
    } else if (this.requiresApiKey) {
      throw new CredentialsExhaustedError(this.id);
    }

    let response: Response;
    try {
      response = await fetch(this.endpoint(path), {
        ...init,
        headers: { ...authHeaders, ...init.headers },
      });
    } catch (error) {
      if (apiKey !== undefined) this.credentials?.markExhausted(apiKey, "network error");
      throw new TransientBackendError(
        this.id,
        "network",
        `${this.id} request failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error }
      );
    }

    if (!response.ok) {
      const body = await response.text();
      const failure = classifyHttpFailure(this.id, response.status, body);
      this.log.warn(failure.message);
      if (failure instanceof TransientBackendError && apiKey !== undefined) {
        if (failure.reason === "credential-rejected") {
          this.credentials?.markFailed(apiKey, `HTTP ${response.status}`);
        } else {
          this.credentials?.markExhausted(apiKey, `HTTP ${response.status}`);
        }
      }
      throw failure;
    }

    return response;
  }

  protected async postJson<T>(path: string, body: unknown): Promise<T> {
    const response = await this.request(path, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    return this.readJson<T>(response);
  }

  protected async getJson<T>(path: string): Promise<T> {
    return this.readJson<T>(await this.request(path, { method: "GET" }));
  }

  protected async readJson<T>(response: Response): Promise<T> {
    try {
      return (await response.json()) as T;
    } catch {
      throw new MalformedResponseError(this.id, `${this.id} returned a body that is not JSON`);
    }
  }
}
