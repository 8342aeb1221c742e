import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { resolve } from "node:path";
import { tmpdir } from "node:os";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import {
  CredentialsExhaustedError,
  GrokProvider,
  InvalidModelError,
  NoProviderAvailableError,
  ProviderRegistry,
  ProviderRequestError,
  RequestCancelledError,
  TransientBackendError,
  UnknownProviderError,
  UnsupportedInputShapeError,
  defineProviderConfig,
  textParams,
  type AICapability,
  type AIProvider,
  type ConversationTurn,
  type ProviderDescriptor,
  type ProviderResponse,
  type RequestEnvelope,
  type SendMessageOptions,
  type VoiceInfo,
} from "@modelmux/ai-providers";
import { header, stubFetch, textResponse, jsonResponse } from "@modelmux/ai-providers/testing";
import { RetryableDispatcher, type DispatcherOptions } from "./RetryableDispatcher.js";
import { ContentCache } from "../cache/ContentCache.js";

interface FakeOptions {
  capabilities?: AICapability[];
  configured?: boolean;
  models?: string[];
}

/** Provider double answering from a queue; an Error in the queue is thrown. */
class FakeProvider implements AIProvider {
  readonly descriptor: ProviderDescriptor;
  readonly calls: Array<{ capability: AICapability; options?: SendMessageOptions }> = [];
  private readonly capabilities: AICapability[];
  private readonly models: string[];

  constructor(
    readonly id: string,
    private readonly queue: Array<ProviderResponse | Error>,
    private readonly fake: FakeOptions = {}
  ) {
    this.capabilities = fake.capabilities ?? ["text-generation"];
    this.models = fake.models ?? [`${id}-default`];
    this.descriptor = {
      id,
      displayName: id,
      capabilities: this.capabilities,
      defaultModels: Object.fromEntries(this.capabilities.map((c) => [c, this.models[0]])),
      availableModels: {},
      rateLimits: {},
      requiredCredentialKeys: [],
    };
  }

  isConfigured(): boolean {
    return this.fake.configured ?? true;
  }

  supportsCapability(capability: AICapability): boolean {
    return this.capabilities.includes(capability);
  }

  getDefaultModel(capability: AICapability): string | undefined {
    return this.supportsCapability(capability) ? this.models[0] : undefined;
  }

  supportsModel(_capability: AICapability, model: string): boolean {
    return this.models.includes(model);
  }

  async fetchModelsFromAPI(): Promise<string[] | null> {
    return null;
  }

  compareModels(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
  }

  processHistory(envelope: RequestEnvelope): { history: ConversationTurn[]; envelope: RequestEnvelope } {
    return {
      history: envelope.history ?? [],
      envelope: { context: envelope.context, instructions: envelope.instructions, dateTime: envelope.dateTime },
    };
  }

  async sendMessage(
    _envelope: RequestEnvelope,
    capability: AICapability,
    options?: SendMessageOptions
  ): Promise<ProviderResponse> {
    this.calls.push({ capability, options });
    const next = this.queue.shift();
    if (!next) throw new Error(`${this.id}: unexpected call`);
    if (next instanceof Error) throw next;
    return next;
  }

  async getAvailableVoices(): Promise<VoiceInfo[]> {
    return [];
  }

  isValidVoice(): boolean {
    return false;
  }

  getVoiceGender(): "neutral" {
    return "neutral";
  }

  getDefaultVoice(): string | undefined {
    return undefined;
  }
}

const envelope: RequestEnvelope = {
  context: {},
  instructions: {},
  history: [{ role: "user", content: "Hello" }],
};

function createDispatcher(providers: AIProvider[], overrides: Partial<DispatcherOptions> = {}): RetryableDispatcher {
  const registry = new ProviderRegistry();
  for (const provider of providers) {
    registry.register(provider.id, () => provider, [`${provider.id}-`]);
  }
  return new RetryableDispatcher({
    providers,
    registry,
    sleep: async () => {},
    ...overrides,
  });
}

function transient(id: string): TransientBackendError {
  return new TransientBackendError(id, "server-error", `${id} API error (503): busy`, 503);
}

describe("RetryableDispatcher", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("candidate planning", () => {
    it("orders explicit provider, primary, fallbacks, then configuration order", () => {
      const providers = ["a", "b", "c", "d"].map((id) => new FakeProvider(id, []));
      const dispatcher = createDispatcher(providers, {
        preferences: { "text-generation": { primary: "c", fallbacks: ["a"] } },
      });

      expect(dispatcher.plan({ capability: "text-generation", envelope, provider: "d" })).toEqual([
        { providerId: "d", model: "d-default" },
        { providerId: "c", model: "c-default" },
        { providerId: "a", model: "a-default" },
        { providerId: "b", model: "b-default" },
      ]);
    });

    it("skips unconfigured providers and those lacking the capability", () => {
      const dispatcher = createDispatcher([
        new FakeProvider("a", [], { configured: false }),
        new FakeProvider("b", [], { capabilities: ["audio-generation"] }),
        new FakeProvider("c", []),
      ]);

      expect(dispatcher.plan({ capability: "text-generation", envelope })).toEqual([
        { providerId: "c", model: "c-default" },
      ]);
    });

    it("routes an explicit model to its owner and keeps defaults elsewhere", () => {
      const dispatcher = createDispatcher([
        new FakeProvider("a", []),
        new FakeProvider("b", [], { models: ["b-default", "b-large"] }),
      ]);

      expect(dispatcher.plan({ capability: "text-generation", envelope, model: "b-large" })).toEqual([
        { providerId: "b", model: "b-large" },
        { providerId: "a", model: "a-default" },
      ]);
    });

    it("is deterministic", () => {
      const dispatcher = createDispatcher([new FakeProvider("a", []), new FakeProvider("b", [])]);
      const request = { capability: "text-generation" as const, envelope };

      expect(dispatcher.plan(request)).toEqual(dispatcher.plan(request));
    });

    it("rejects an explicit provider that is not configured", () => {
      const dispatcher = createDispatcher([new FakeProvider("a", [])]);

      expect(() => dispatcher.plan({ capability: "text-generation", envelope, provider: "zz" })).toThrow(
        UnknownProviderError
      );
    });
  });

  it("fails with InvalidModelError without calling any provider", async () => {
    const a = new FakeProvider("a", [{ text: "unused" }]);
    const dispatcher = createDispatcher([a]);

    const attempt = dispatcher.invoke({ capability: "text-generation", envelope, provider: "a", model: "a-huge" });

    await expect(attempt).rejects.toBeInstanceOf(InvalidModelError);
    expect(a.calls).toHaveLength(0);
  });

  it("raises NoProviderAvailableError when nothing serves the capability", async () => {
    const dispatcher = createDispatcher([new FakeProvider("a", [])]);

    await expect(dispatcher.invoke({ capability: "image-generation", envelope })).rejects.toBeInstanceOf(
      NoProviderAvailableError
    );
  });

  it("surfaces CredentialsExhaustedError after exactly one attempt per key", async () => {
    const calls = stubFetch(
      textResponse("slow down", 429),
      textResponse("slow down", 429),
      textResponse("slow down", 429)
    );
    const grok = new GrokProvider(
      "grok",
      defineProviderConfig({
        displayName: "Grok",
        capabilities: ["text-generation"],
        apiSettings: { apiKeys: ["test-key-1", "test-key-2", "test-key-3"] },
        models: { "text-generation": ["grok-4"] },
      })
    );
    const dispatcher = createDispatcher([grok]);

    const attempt = dispatcher.invoke({ capability: "text-generation", envelope });

    await expect(attempt).rejects.toBeInstanceOf(CredentialsExhaustedError);
    expect(calls).toHaveLength(3);
    expect(calls.map((call) => header(call, "authorization"))).toEqual([
      "Bearer test-key-1",
      "Bearer test-key-2",
      "Bearer test-key-3",
    ]);
  });

  it("rotates to the next key and succeeds", async () => {
    stubFetch(textResponse("busy", 503), jsonResponse({ id: "c9", choices: [{ message: { content: "Hi there" } }] }));
    const grok = new GrokProvider(
      "grok",
      defineProviderConfig({
        displayName: "Grok",
        capabilities: ["text-generation"],
        apiSettings: { apiKeys: ["test-key-1", "test-key-2"] },
        models: { "text-generation": ["grok-4"] },
      })
    );
    const sleep = vi.fn(async () => {});
    const dispatcher = createDispatcher([grok], { sleep, retryDelayMs: 250 });

    const response = await dispatcher.invoke({ capability: "text-generation", envelope });

    expect(response).toEqual({
      text: "Hi there",
      seed: "c9",
      capability: "text-generation",
      provider: "grok",
      model: "grok-4",
      fromCache: false,
      filePath: undefined,
    });
    expect(sleep).toHaveBeenCalledWith(250);
    expect(grok.credentials?.stats()).toMatchObject({ total: 2, active: 1, exhausted: 1 });
  });

  it("bounds retries by maxRetries without a key pool, then fails over", async () => {
    const a = new FakeProvider("a", [transient("a"), transient("a")]);
    const b = new FakeProvider("b", [{ text: "from b" }]);
    const dispatcher = createDispatcher([a, b], { maxRetries: 2 });

    const response = await dispatcher.invoke({ capability: "text-generation", envelope });

    expect(a.calls).toHaveLength(2);
    expect(response.provider).toBe("b");
    expect(response.text).toBe("from b");
  });

  it("tries the next provider on an unsupported input shape", async () => {
    const mic = new FakeProvider("mic", [new UnsupportedInputShapeError("mic", "mic: microphone only")], {
      capabilities: ["audio-transcription"],
    });
    const cloud = new FakeProvider("cloud", [{ text: "transcribed words" }], { capabilities: ["audio-transcription"] });
    const dispatcher = createDispatcher([cloud, mic], {
      preferences: { "audio-transcription": { primary: "mic", fallbacks: ["cloud"] } },
    });

    const response = await dispatcher.invoke({
      capability: "audio-transcription",
      envelope,
      attachment: { base64: "AQID", mimeType: "audio/wav" },
    });

    expect(response.text).toBe("transcribed words");
    expect(response.provider).toBe("cloud");
    expect(mic.calls).toHaveLength(1);
  });

  it("fails over when a provider answers with an error or without an image", async () => {
    const a = new FakeProvider("a", [{ text: "" }], { capabilities: ["image-generation"] });
    const b = new FakeProvider("b", [{ text: "", error: "b does not support image-generation" }], {
      capabilities: ["image-generation"],
    });
    const c = new FakeProvider("c", [{ text: "A fox", imageBase64: "UE5H" }], { capabilities: ["image-generation"] });
    const dispatcher = createDispatcher([a, b, c], { now: () => 0 });

    const response = await dispatcher.invoke({ capability: "image-generation", envelope });

    expect(response.provider).toBe("c");
    expect(response.imageBase64).toBe("UE5H");
    expect(dispatcher.getStats()).toEqual({
      a: { successes: 0, failures: 1, averageLatencyMs: 0, lastError: "a returned no image" },
      b: { successes: 0, failures: 1, averageLatencyMs: 0, lastError: "b does not support image-generation" },
      c: { successes: 1, failures: 0, averageLatencyMs: 0, lastError: undefined },
    });
  });

  it("reports foreign exceptions as request failures and fails over", async () => {
    const fault = new SyntaxError("Unexpected token < in JSON");
    const a = new FakeProvider("a", [fault]);
    const b = new FakeProvider("b", [{ text: "from b" }]);
    const dispatcher = createDispatcher([a, b]);

    const response = await dispatcher.invoke({ capability: "text-generation", envelope });

    expect(response).toMatchObject({ text: "from b", provider: "b" });
    expect(dispatcher.getStats().a).toMatchObject({
      failures: 1,
      lastError: "a failed: Unexpected token < in JSON",
    });
  });

  it("never surfaces a foreign exception type", async () => {
    const fault = new Error("engine crashed");
    const dispatcher = createDispatcher([new FakeProvider("a", [fault])]);

    const attempt = dispatcher.invoke({ capability: "text-generation", envelope });

    await expect(attempt).rejects.toBeInstanceOf(ProviderRequestError);
    await expect(attempt).rejects.toMatchObject({ code: "PROVIDER_REQUEST", providerId: "a", cause: fault });
  });

  it("rethrows the last error when every candidate fails", async () => {
    const a = new FakeProvider("a", [new UnsupportedInputShapeError("a", "a: no files")]);
    const b = new FakeProvider("b", [new CredentialsExhaustedError("b")]);
    const dispatcher = createDispatcher([a, b]);

    await expect(dispatcher.invoke({ capability: "text-generation", envelope })).rejects.toBeInstanceOf(
      CredentialsExhaustedError
    );
  });

  it("does not dispatch a cancelled request", async () => {
    const a = new FakeProvider("a", [{ text: "unused" }]);
    const dispatcher = createDispatcher([a]);
    const controller = new AbortController();
    controller.abort();

    const attempt = dispatcher.invoke({ capability: "text-generation", envelope, signal: controller.signal });

    await expect(attempt).rejects.toBeInstanceOf(RequestCancelledError);
    expect(a.calls).toHaveLength(0);
  });

  it("extracts embedded JSON when asked to", async () => {
    const a = new FakeProvider("a", [
      { text: 'Here you go:\n```json\n{"description": "a summary", "response": "the answer"}\n```' },
    ]);
    const dispatcher = createDispatcher([a]);

    const response = await dispatcher.invoke({
      capability: "text-generation",
      envelope,
      params: textParams({ expectJson: true }),
    });

    expect(response.text).toBe("the answer");
    expect(response.revisedPrompt).toBe("a summary");
    expect(response.structured).toEqual({ description: "a summary", response: "the answer" });
  });

  it("flags text without JSON as unstructured", async () => {
    const a = new FakeProvider("a", [{ text: "no json here" }]);
    const dispatcher = createDispatcher([a]);

    const response = await dispatcher.invoke({
      capability: "text-generation",
      envelope,
      params: textParams({ expectJson: true }),
    });

    expect(response.text).toBe("no json here");
    expect(response.unstructured).toBe(true);
  });

  describe("with a content cache", () => {
    const CACHE_DIR = resolve(tmpdir(), `modelmux-dispatch-test-${Date.now()}`);
    let cache: ContentCache;

    beforeEach(async () => {
      await rm(CACHE_DIR, { recursive: true, force: true });
      cache = new ContentCache({
        directory: CACHE_DIR,
        capabilities: ["text-generation", "audio-generation"],
        memoryTtlMs: 60_000,
        memoryMaxEntries: 10,
      });
    });

    afterEach(async () => {
      cache.dispose();
      await rm(CACHE_DIR, { recursive: true, force: true });
    });

    it("serves a repeated request from the cache", async () => {
      const a = new FakeProvider("a", [{ text: "cached answer" }]);
      const dispatcher = createDispatcher([a], { cache });

      const first = await dispatcher.invoke({ capability: "text-generation", envelope });
      const second = await dispatcher.invoke({ capability: "text-generation", envelope });

      expect(a.calls).toHaveLength(1);
      expect(first.fromCache).toBe(false);
      expect(first.filePath).toMatch(/\/text\/[0-9a-f]{64}\.txt$/);
      expect(second).toMatchObject({ text: "cached answer", fromCache: true, provider: "a", model: "a-default" });
      expect(second.filePath).toBe(first.filePath);
    });

    it("ignores the request time when computing the key", async () => {
      const a = new FakeProvider("a", [{ text: "once" }]);
      const dispatcher = createDispatcher([a], { cache });

      await dispatcher.invoke({ capability: "text-generation", envelope: { ...envelope, dateTime: "2026-01-01T00:00:00Z" } });
      const again = await dispatcher.invoke({
        capability: "text-generation",
        envelope: { ...envelope, dateTime: "2026-01-02T00:00:00Z" },
      });

      expect(again.fromCache).toBe(true);
    });

    it("misses when a dated context value differs", async () => {
      const a = new FakeProvider("a", [{ text: "answer for 2024" }, { text: "answer for 2025" }]);
      const dispatcher = createDispatcher([a], { cache });

      await dispatcher.invoke({
        capability: "text-generation",
        envelope: { ...envelope, context: { deadline: new Date("2024-01-01T00:00:00.000Z") } },
      });
      const later = await dispatcher.invoke({
        capability: "text-generation",
        envelope: { ...envelope, context: { deadline: new Date("2025-06-01T00:00:00.000Z") } },
      });

      expect(later).toMatchObject({ text: "answer for 2025", fromCache: false });
    });

    it("keys on instruction order but not on context key order", async () => {
      const a = new FakeProvider("a", [{ text: "formal first" }, { text: "short first" }]);
      const dispatcher = createDispatcher([a], { cache });

      await dispatcher.invoke({
        capability: "text-generation",
        envelope: { ...envelope, context: { user: "u1", plan: "pro" }, instructions: { tone: "formal", length: "short" } },
      });
      const reordered = await dispatcher.invoke({
        capability: "text-generation",
        envelope: { ...envelope, context: { plan: "pro", user: "u1" }, instructions: { length: "short", tone: "formal" } },
      });
      const sameInstructions = await dispatcher.invoke({
        capability: "text-generation",
        envelope: { ...envelope, context: { plan: "pro", user: "u1" }, instructions: { tone: "formal", length: "short" } },
      });

      expect(reordered).toMatchObject({ text: "short first", fromCache: false });
      expect(sameInstructions).toMatchObject({ text: "formal first", fromCache: true });
    });

    it("still answers when the cache directory cannot be written", async () => {
      await mkdir(CACHE_DIR, { recursive: true });
      await writeFile(resolve(CACHE_DIR, "audio"), "not a directory");
      const a = new FakeProvider("a", [{ text: "Hello", audioBase64: "AQID" }], { capabilities: ["audio-generation"] });
      const dispatcher = createDispatcher([a], { cache });

      const response = await dispatcher.invoke({ capability: "audio-generation", envelope });

      expect(a.calls).toHaveLength(1);
      expect(response).toMatchObject({ text: "Hello", audioBase64: "AQID", provider: "a", fromCache: false });
      expect(response.filePath).toBeUndefined();
      expect(await readFile(resolve(CACHE_DIR, "audio"), "utf-8")).toBe("not a directory");
    });

    it("misses when the history differs", async () => {
      const a = new FakeProvider("a", [{ text: "one" }, { text: "two" }]);
      const dispatcher = createDispatcher([a], { cache });

      await dispatcher.invoke({ capability: "text-generation", envelope });
      const other = await dispatcher.invoke({
        capability: "text-generation",
        envelope: { ...envelope, history: [{ role: "user", content: "Goodbye" }] },
      });

      expect(other).toMatchObject({ text: "two", fromCache: false });
    });

    it("bypasses the cache when asked", async () => {
      const a = new FakeProvider("a", [{ text: "one" }, { text: "two" }]);
      const dispatcher = createDispatcher([a], { cache });

      await dispatcher.invoke({ capability: "text-generation", envelope });
      const fresh = await dispatcher.invoke({ capability: "text-generation", envelope, useCache: false });

      expect(fresh).toMatchObject({ text: "two", fromCache: false, filePath: undefined });
    });

    it("does not cache capabilities outside the configured set", async () => {
      const a = new FakeProvider("a", [{ text: "first" }, { text: "second" }], { capabilities: ["image-analysis"] });
      const dispatcher = createDispatcher([a], { cache });
      const request = {
        capability: "image-analysis" as const,
        envelope,
        attachment: { base64: "QUJD", mimeType: "image/png" },
      };

      await dispatcher.invoke(request);
      const second = await dispatcher.invoke(request);

      expect(second).toMatchObject({ text: "second", fromCache: false, unstructured: true });
    });
  });
});
