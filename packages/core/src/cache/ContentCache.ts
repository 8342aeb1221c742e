import { mkdir, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import {
  AI_CAPABILITIES,
  CacheIOError,
  createLogger,
  type AICapability,
  type ProviderResponse,
  type VoiceInfo,
} from "@modelmux/ai-providers";
import { MemoryCache } from "./MemoryCache.js";

const log = createLogger("cache");

/** Subdirectory per cacheable capability. Realtime sessions are never cached. */
const CAPABILITY_DIRS: Partial<Record<AICapability, string>> = {
  "text-generation": "text",
  "image-generation": "images",
  "image-analysis": "analysis",
  "audio-generation": "audio",
  "audio-transcription": "transcriptions",
};

const MODELS_DIR = "models";
const VOICES_DIR = "voices";
const META_SUFFIX = ".meta.json";

/** Model and voice lists are refreshed after a week. */
export const LIST_CACHE_TTL_MS = 7 * 24 * 60 * 60 * 1000;

const StoredResponseSchema = z.object({
  text: z.string(),
  seed: z.string().optional(),
  revisedPrompt: z.string().optional(),
  imageMimeType: z.string().optional(),
});

const EntryMetaSchema = z.object({
  provider: z.string(),
  model: z.string(),
  extension: z.string().min(1),
  size: z.number().int().nonnegative(),
  createdAt: z.number(),
  response: StoredResponseSchema,
});

const ModelListSchema = z.object({
  provider: z.string(),
  timestamp: z.number(),
  models: z.array(z.string()),
});

const VoiceListSchema = z.object({
  provider: z.string(),
  timestamp: z.number(),
  voices: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      language: z.string(),
      gender: z.enum(["male", "female", "neutral"]),
      description: z.string().optional(),
    })
  ),
});

export interface ContentCacheOptions {
  /** Cache root directory */
  directory: string;
  enabled?: boolean;
  /** Capabilities whose results are stored */
  capabilities: readonly AICapability[];
  memoryTtlMs: number;
  memoryMaxEntries: number;
  /** Disk entries older than this are misses; unset keeps them until cleared */
  diskTtlMs?: number;
  now?: () => number;
}

/** A stored artifact with the response it was produced from. */
export interface CacheEntry {
  key: string;
  capability: AICapability;
  provider: string;
  model: string;
  response: ProviderResponse;
  /** Persisted artifact (audio, image or text file) */
  filePath: string;
  size: number;
  createdAt: number;
}

export interface CacheWrite {
  provider: string;
  model: string;
  response: ProviderResponse;
  /** File extension for binary artifacts, without the dot */
  extension?: string;
}

export interface CacheClearResult {
  disk: number;
  memory: number;
}

export interface CacheStats {
  memoryEntries: number;
  disk: Partial<Record<AICapability, { entries: number; bytes: number }>>;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Parsed JSON, or undefined when `raw` is not JSON. */
function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

const MIME_EXTENSIONS: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/webp": "webp",
  "image/gif": "gif",
};

/**
 * Payload written to disk for a capability: binary for images and speech,
 * UTF-8 text for everything else.
 */
function artifactFor(
  capability: AICapability,
  write: CacheWrite
): { data: Buffer; extension: string } | undefined {
  const { response } = write;
  if (capability === "audio-generation") {
    if (!response.audioBase64) return undefined;
    return { data: Buffer.from(response.audioBase64, "base64"), extension: write.extension ?? "mp3" };
  }
  if (capability === "image-generation") {
    if (!response.imageBase64) return undefined;
    const fromMime = response.imageMimeType ? MIME_EXTENSIONS[response.imageMimeType] : undefined;
    return { data: Buffer.from(response.imageBase64, "base64"), extension: fromMime ?? write.extension ?? "png" };
  }
  if (!response.text) return undefined;
  return { data: Buffer.from(response.text, "utf-8"), extension: "txt" };
}

/**
 * Two-tier content-addressable cache.
 *
 * Lookups go memory, then disk. Writes go disk first, then memory, and a
 * failed disk write leaves both tiers untouched. Disk failures are logged
 * as {@link CacheIOError} and count as misses.
 */
export class ContentCache {
  private readonly memory: MemoryCache<CacheEntry>;
  private readonly now: () => number;

  constructor(private readonly options: ContentCacheOptions) {
    this.memory = new MemoryCache<CacheEntry>({
      ttlMs: options.memoryTtlMs,
      maxEntries: options.memoryMaxEntries,
    });
    this.now = options.now ?? Date.now;
  }

  get directory(): string {
    return this.options.directory;
  }

  isCacheable(capability: AICapability): boolean {
    return (
      (this.options.enabled ?? true) &&
      CAPABILITY_DIRS[capability] !== undefined &&
      this.options.capabilities.includes(capability)
    );
  }

  async get(key: string, capability: AICapability): Promise<CacheEntry | undefined> {
    if (!this.isCacheable(capability)) return undefined;

    const cached = this.memory.get(key);
    if (cached) {
      log.debug(`memory hit ${key.slice(0, 12)}`);
      return cached;
    }

    try {
      const entry = await this.readFromDisk(key, capability);
      if (entry) {
        log.debug(`disk hit ${key.slice(0, 12)}`);
        this.memory.set(key, entry);
      } else {
        log.debug(`miss ${key.slice(0, 12)}`);
      }
      return entry;
    } catch (error) {
      const failure = new CacheIOError(this.dirFor(capability), `Cache read failed (${errorText(error)})`, {
        cause: error,
      });
      log.warn(failure.message);
      return undefined;
    }
  }

  /**
   * Store a fresh response. Returns the entry, or undefined when the
   * capability is not cached, there is nothing to store, or the disk
   * write failed.
   */
  async put(key: string, capability: AICapability, write: CacheWrite): Promise<CacheEntry | undefined> {
    if (!this.isCacheable(capability)) return undefined;
    const artifact = artifactFor(capability, write);
    if (!artifact) return undefined;

    const dir = this.dirFor(capability);
    const filePath = join(dir, `${key}.${artifact.extension}`);
    const createdAt = this.now();
    const meta: z.infer<typeof EntryMetaSchema> = {
      provider: write.provider,
      model: write.model,
      extension: artifact.extension,
      size: artifact.data.length,
      createdAt,
      response: {
        text: write.response.text,
        seed: write.response.seed,
        revisedPrompt: write.response.revisedPrompt,
        imageMimeType: write.response.imageMimeType,
      },
    };

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(filePath, artifact.data);
      await writeFile(join(dir, `${key}${META_SUFFIX}`), JSON.stringify(meta), "utf-8");
    } catch (error) {
      const failure = new CacheIOError(filePath, `Cache write failed (${errorText(error)})`, { cause: error });
      log.warn(failure.message);
      return undefined;
    }

    const entry: CacheEntry = {
      key,
      capability,
      provider: write.provider,
      model: write.model,
      response: { ...write.response },
      filePath,
      size: artifact.data.length,
      createdAt,
    };
    this.memory.set(key, entry);
    return entry;
  }

  /** Remove stored entries for one capability, or all of them. */
  async clear(capability?: AICapability): Promise<CacheClearResult> {
    const capabilities = capability ? [capability] : this.cachedCapabilities();
    let disk = 0;

    for (const cap of capabilities) {
      const dir = CAPABILITY_DIRS[cap];
      if (!dir) continue;
      disk += await this.removeDirectory(join(this.options.directory, dir), (name) => name.endsWith(META_SUFFIX));
    }

    const memory = capability
      ? this.memory.deleteWhere((entry) => entry.capability === capability)
      : this.memory.deleteWhere(() => true);

    log.info(`Cleared ${disk} disk and ${memory} memory entries`);
    return { disk, memory };
  }

  /** Remove cached model and voice lists. */
  async clearModels(): Promise<number> {
    const models = await this.removeDirectory(join(this.options.directory, MODELS_DIR), () => true);
    const voices = await this.removeDirectory(join(this.options.directory, VOICES_DIR), () => true);
    return models + voices;
  }

  async stats(): Promise<CacheStats> {
    const disk: CacheStats["disk"] = {};

    for (const capability of this.cachedCapabilities()) {
      const dir = CAPABILITY_DIRS[capability];
      if (!dir) continue;
      const path = join(this.options.directory, dir);
      let names: string[];
      try {
        names = await readdir(path);
      } catch (error) {
        if (isNotFound(error)) continue;
        throw new CacheIOError(path, "Cache directory unreadable", { cause: error });
      }

      let bytes = 0;
      for (const name of names) {
        if (name.endsWith(META_SUFFIX)) continue;
        bytes += (await stat(join(path, name))).size;
      }
      disk[capability] = { entries: names.filter((n) => n.endsWith(META_SUFFIX)).length, bytes };
    }

    return { memoryEntries: this.memory.size, disk };
  }

  /** Cached model list for a provider, unless missing or older than a week. */
  async getModels(provider: string): Promise<string[] | undefined> {
    const stored = await this.readList(this.listPath(MODELS_DIR, provider, "models"), ModelListSchema);
    return stored?.models;
  }

  async saveModels(provider: string, models: readonly string[]): Promise<void> {
    await this.writeList(this.listPath(MODELS_DIR, provider, "models"), {
      provider,
      timestamp: this.now(),
      models: [...models],
    });
  }

  async getVoices(provider: string): Promise<VoiceInfo[] | undefined> {
    const stored = await this.readList(this.listPath(VOICES_DIR, provider, "voices"), VoiceListSchema);
    return stored?.voices;
  }

  async saveVoices(provider: string, voices: readonly VoiceInfo[]): Promise<void> {
    await this.writeList(this.listPath(VOICES_DIR, provider, "voices"), {
      provider,
      timestamp: this.now(),
      voices: [...voices],
    });
  }

  /** Drop the memory tier and cancel its timers. */
  dispose(): void {
    this.memory.clear();
  }

  private cachedCapabilities(): AICapability[] {
    return AI_CAPABILITIES.filter((capability) => CAPABILITY_DIRS[capability] !== undefined);
  }

  private dirFor(capability: AICapability): string {
    return join(this.options.directory, CAPABILITY_DIRS[capability] ?? "misc");
  }

  private async readFromDisk(key: string, capability: AICapability): Promise<CacheEntry | undefined> {
    const dir = this.dirFor(capability);
    const metaPath = join(dir, `${key}${META_SUFFIX}`);

    let rawMeta: string;
    try {
      rawMeta = await readFile(metaPath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }

    const parsed = EntryMetaSchema.safeParse(parseJson(rawMeta));
    if (!parsed.success) {
      log.warn(`Discarding unreadable cache metadata: ${metaPath}`);
      await this.removeEntry(dir, key);
      return undefined;
    }
    const meta = parsed.data;
    const filePath = join(dir, `${key}.${meta.extension}`);

    if (this.options.diskTtlMs !== undefined && this.now() - meta.createdAt > this.options.diskTtlMs) {
      log.debug(`expired ${key.slice(0, 12)}`);
      await this.removeEntry(dir, key, meta.extension);
      return undefined;
    }

    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (error) {
      if (!isNotFound(error)) throw error;
      await this.removeEntry(dir, key);
      return undefined;
    }

    if (data.length === 0) {
      log.warn(`Removing empty cache file: ${filePath}`);
      await this.removeEntry(dir, key, meta.extension);
      return undefined;
    }

    const response: ProviderResponse = { ...meta.response };
    if (capability === "audio-generation") {
      response.audioBase64 = data.toString("base64");
    } else if (capability === "image-generation") {
      response.imageBase64 = data.toString("base64");
    } else {
      response.text = data.toString("utf-8");
    }

    return {
      key,
      capability,
      provider: meta.provider,
      model: meta.model,
      response,
      filePath,
      size: data.length,
      createdAt: meta.createdAt,
    };
  }

  private async removeEntry(dir: string, key: string, extension?: string): Promise<void> {
    await rm(join(dir, `${key}${META_SUFFIX}`), { force: true });
    if (extension) {
      await rm(join(dir, `${key}.${extension}`), { force: true });
    }
  }

  /** Delete a directory, returning how many of its files matched `count`. */
  private async removeDirectory(path: string, count: (name: string) => boolean): Promise<number> {
    let names: string[];
    try {
      names = await readdir(path);
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw new CacheIOError(path, "Cache directory unreadable", { cause: error });
    }
    await rm(path, { recursive: true, force: true });
    return names.filter(count).length;
  }

  private listPath(dir: string, provider: string, kind: string): string {
    return join(this.options.directory, dir, `${provider}_${kind}.json`);
  }

  private async readList<T extends { timestamp: number }>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T | undefined> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (error) {
      if (!isNotFound(error)) {
        log.warn(new CacheIOError(path, `List cache read failed (${errorText(error)})`).message);
      }
      return undefined;
    }

    const parsed = schema.safeParse(parseJson(raw));
    if (!parsed.success) {
      log.warn(`Ignoring corrupt list cache: ${path}`);
      return undefined;
    }
    if (this.now() - parsed.data.timestamp > LIST_CACHE_TTL_MS) {
      log.debug(`List cache expired: ${path}`);
      return undefined;
    }
    return parsed.data;
  }

  private async writeList(path: string, document: unknown): Promise<void> {
    try {
      await mkdir(join(path, ".."), { recursive: true });
      await writeFile(path, JSON.stringify(document, null, 2), "utf-8");
    } catch (error) {
      log.warn(new CacheIOError(path, `List cache write failed (${errorText(error)})`).message);
    }
  }
}
