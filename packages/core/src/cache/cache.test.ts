import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { resolve, join } from "node:path";
import { tmpdir } from "node:os";
import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { computeCacheKey, canonicalJson, type CacheKeyInput } from "./cache-key.js";
import { MemoryCache } from "./MemoryCache.js";
import { ContentCache, LIST_CACHE_TTL_MS, type ContentCacheOptions } from "./ContentCache.js";

const base: CacheKeyInput = {
  provider: "openai",
  capability: "audio-generation",
  content: "Hello",
  selector: "sage",
  language: "en-US",
  format: "mp3",
};

describe("computeCacheKey", () => {
  it("is deterministic", () => {
    expect(computeCacheKey({ ...base })).toBe(computeCacheKey({ ...base }));
    expect(computeCacheKey(base)).toMatch(/^[0-9a-f]{64}$/);
  });

  it.each([
    ["voice", { selector: "ash" }],
    ["language", { language: "es-ES" }],
    ["provider", { provider: "local-speech" }],
    ["format", { format: "m4a" }],
  ])("changes with the %s", (_name, change) => {
    expect(computeCacheKey({ ...base, ...change })).not.toBe(computeCacheKey(base));
  });

  it("ignores the key order of extras", () => {
    const a = computeCacheKey({ ...base, extras: { speed: 1, emotion: "calm" } });
    const b = computeCacheKey({ ...base, extras: { emotion: "calm", speed: 1 } });

    expect(a).toBe(b);
  });

  it("does not confuse fields that concatenate to the same text", () => {
    const a = computeCacheKey({ ...base, selector: "ab", language: "c" });
    const b = computeCacheKey({ ...base, selector: "a", language: "bc" });

    expect(a).not.toBe(b);
  });

  it("serializes canonically", () => {
    expect(canonicalJson({ b: [1, undefined], a: { d: 1, c: null }, e: undefined })).toBe(
      '{"a":{"c":null,"d":1},"b":[1,null]}'
    );
  });

  it("serializes values through toJSON like JSON.stringify", () => {
    expect(canonicalJson({ deadline: new Date("2024-01-01T00:00:00.000Z") })).toBe(
      '{"deadline":"2024-01-01T00:00:00.000Z"}'
    );
    expect(canonicalJson({ deadline: new Date("2024-01-01T00:00:00.000Z") })).not.toBe(
      canonicalJson({ deadline: new Date("2025-06-01T00:00:00.000Z") })
    );
  });
});

describe("MemoryCache", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("expires entries after the TTL", () => {
    vi.useFakeTimers();
    const cache = new MemoryCache<string>({ ttlMs: 1000, maxEntries: 10 });
    cache.set("a", "one");

    vi.advanceTimersByTime(999);
    expect(cache.get("a")).toBe("one");
    vi.advanceTimersByTime(1);
    expect(cache.get("a")).toBeUndefined();
  });

  it("evicts the least recently used entry", () => {
    const cache = new MemoryCache<number>({ ttlMs: 60_000, maxEntries: 2 });
    cache.set("a", 1);
    cache.set("b", 2);
    cache.get("a");
    cache.set("c", 3);

    expect(cache.has("a")).toBe(true);
    expect(cache.has("b")).toBe(false);
    expect(cache.has("c")).toBe(true);
    cache.clear();
  });

  it("deletes by predicate", () => {
    const cache = new MemoryCache<number>({ ttlMs: 60_000, maxEntries: 10 });
    cache.set("a", 1);
    cache.set("b", 2);
    cache.set("c", 3);

    expect(cache.deleteWhere((value) => value % 2 === 1)).toBe(2);
    expect(cache.size).toBe(1);
    cache.clear();
  });
});

describe("ContentCache", () => {
  const TEST_DIR = resolve(tmpdir(), `modelmux-cache-test-${Date.now()}`);
  let clock = 1_000_000;
  let cache: ContentCache;

  function createCache(overrides: Partial<ContentCacheOptions> = {}): ContentCache {
    return new ContentCache({
      directory: TEST_DIR,
      capabilities: ["text-generation", "image-generation", "audio-generation"],
      memoryTtlMs: 60_000,
      memoryMaxEntries: 100,
      now: () => clock,
      ...overrides,
    });
  }

  beforeEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
    clock = 1_000_000;
    cache = createCache();
  });

  afterEach(async () => {
    cache.dispose();
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  it("writes audio under audio/<hash>.<format> with metadata", async () => {
    const entry = await cache.put("k1", "audio-generation", {
      provider: "openai",
      model: "gpt-4o-mini-tts",
      response: { text: "Hello", audioBase64: "AQID" },
      extension: "wav",
    });

    expect(entry?.filePath).toBe(join(TEST_DIR, "audio", "k1.wav"));
    expect(await readFile(join(TEST_DIR, "audio", "k1.wav"))).toEqual(Buffer.from([1, 2, 3]));
    expect(JSON.parse(await readFile(join(TEST_DIR, "audio", "k1.meta.json"), "utf-8"))).toEqual({
      provider: "openai",
      model: "gpt-4o-mini-tts",
      extension: "wav",
      size: 3,
      createdAt: 1_000_000,
      response: { text: "Hello" },
    });
  });

  it("reads back from disk when the memory tier is empty", async () => {
    await cache.put("k2", "image-generation", {
      provider: "gemini",
      model: "gemini-2.5-flash-image",
      response: { text: "A bay", revisedPrompt: "A calm bay", imageBase64: "UE5H", imageMimeType: "image/jpeg" },
    });

    const fresh = createCache();
    const entry = await fresh.get("k2", "image-generation");
    fresh.dispose();

    expect(entry).toEqual({
      key: "k2",
      capability: "image-generation",
      provider: "gemini",
      model: "gemini-2.5-flash-image",
      response: { text: "A bay", revisedPrompt: "A calm bay", imageBase64: "UE5H", imageMimeType: "image/jpeg" },
      filePath: join(TEST_DIR, "images", "k2.jpg"),
      size: 3,
      createdAt: 1_000_000,
    });
  });

  it("serves memory hits without touching disk", async () => {
    await cache.put("k3", "text-generation", { provider: "grok", model: "grok-4", response: { text: "Hi" } });
    await rm(TEST_DIR, { recursive: true, force: true });

    const entry = await cache.get("k3", "text-generation");
    expect(entry?.response.text).toBe("Hi");
  });

  it("skips capabilities that are not cached", async () => {
    const entry = await cache.put("k4", "audio-transcription", {
      provider: "openai",
      model: "whisper-1",
      response: { text: "words" },
    });

    expect(entry).toBeUndefined();
    expect(await cache.get("k4", "audio-transcription")).toBeUndefined();
    expect(createCache({ enabled: false }).isCacheable("text-generation")).toBe(false);
  });

  it("does not store responses without a payload", async () => {
    const entry = await cache.put("k5", "audio-generation", {
      provider: "openai",
      model: "tts-1",
      response: { text: "Hello" },
    });

    expect(entry).toBeUndefined();
  });

  it("removes zero-length artifacts and reports a miss", async () => {
    await mkdir(join(TEST_DIR, "audio"), { recursive: true });
    await writeFile(join(TEST_DIR, "audio", "k6.mp3"), Buffer.alloc(0));
    await writeFile(
      join(TEST_DIR, "audio", "k6.meta.json"),
      JSON.stringify({ provider: "openai", model: "tts-1", extension: "mp3", size: 0, createdAt: 1, response: { text: "" } })
    );

    expect(await cache.get("k6", "audio-generation")).toBeUndefined();
    expect(await readdir(join(TEST_DIR, "audio"))).toEqual([]);
  });

  it("treats disk entries past diskTtl as misses", async () => {
    const ttlCache = createCache({ diskTtlMs: 1000 });
    await ttlCache.put("k7", "text-generation", { provider: "grok", model: "grok-4", response: { text: "Hi" } });
    ttlCache.dispose();

    clock += 1001;
    const later = createCache({ diskTtlMs: 1000 });
    expect(await later.get("k7", "text-generation")).toBeUndefined();
    later.dispose();
  });

  it("treats corrupt metadata as a miss", async () => {
    await mkdir(join(TEST_DIR, "text"), { recursive: true });
    await writeFile(join(TEST_DIR, "text", "k8.meta.json"), "{not json");

    expect(await cache.get("k8", "text-generation")).toBeUndefined();
  });

  it("clears one capability or everything", async () => {
    await cache.put("a", "text-generation", { provider: "grok", model: "grok-4", response: { text: "Hi" } });
    await cache.put("b", "audio-generation", { provider: "openai", model: "tts-1", response: { text: "x", audioBase64: "AQID" } });

    expect(await cache.clear("audio-generation")).toEqual({ disk: 1, memory: 1 });
    expect(await cache.get("b", "audio-generation")).toBeUndefined();
    expect(await cache.stats()).toEqual({ memoryEntries: 1, disk: { "text-generation": { entries: 1, bytes: 2 } } });

    expect(await cache.clear()).toEqual({ disk: 1, memory: 1 });
    expect(await cache.stats()).toEqual({ memoryEntries: 0, disk: {} });
  });

  it("keeps model lists for a week", async () => {
    await cache.saveModels("openai", ["gpt-5", "gpt-4.1"]);
    expect(await cache.getModels("openai")).toEqual(["gpt-5", "gpt-4.1"]);

    clock += LIST_CACHE_TTL_MS + 1;
    expect(await cache.getModels("openai")).toBeUndefined();
  });

  it("stores voice lists and clears both lists", async () => {
    await cache.saveVoices("openai", [{ id: "sage", name: "sage", language: "multilingual", gender: "female" }]);
    await cache.saveModels("gemini", ["gemini-2.5-flash"]);

    expect(await cache.getVoices("openai")).toEqual([
      { id: "sage", name: "sage", language: "multilingual", gender: "female" },
    ]);
    expect(await cache.clearModels()).toBe(2);
    expect(await cache.getModels("gemini")).toBeUndefined();
  });
});
