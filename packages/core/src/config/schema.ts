/**
 * Configuration schema for modelmux
 * Stored at ~/.modelmux/config.yaml, merged over createDefaultConfig()
 */

import { z } from "zod";
import { AI_CAPABILITIES, type AICapability, type ProviderConfig } from "@modelmux/ai-providers";

const CapabilitySchema = z.enum([
  "text-generation",
  "image-generation",
  "image-analysis",
  "audio-generation",
  "audio-transcription",
  "realtime-conversation",
]);

/** Per-capability record; keys must be known capabilities. */
function capabilityRecord<T extends z.ZodTypeAny>(value: T) {
  return z.record(z.string(), value).superRefine((record, ctx) => {
    for (const key of Object.keys(record)) {
      if (!CapabilitySchema.safeParse(key).success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown capability "${key}"`, path: [key] });
      }
    }
  });
}

const RateLimitSchema = z.object({
  requestsPerMinute: z.number().int().positive().optional(),
  tokensPerMinute: z.number().int().positive().optional(),
});

export const ProviderSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  displayName: z.string().min(1),
  description: z.string().default(""),
  capabilities: z.array(CapabilitySchema).default([]),
  apiSettings: z
    .object({
      baseUrl: z.string().url().optional(),
      apiKeyEnv: z.string().optional(),
      apiKeys: z.array(z.string()).default([]),
    })
    .default({}),
  models: capabilityRecord(z.array(z.string())).default({}),
  defaults: capabilityRecord(z.string()).default({}),
  voices: z.array(z.string()).default([]),
  defaultVoice: z.string().optional(),
  modelPrefixes: z.array(z.string()).default([]),
  rateLimits: capabilityRecord(RateLimitSchema).default({}),
  configuration: z
    .object({
      maxOutputTokens: z.number().int().positive().optional(),
      temperature: z.number().min(0).max(2).optional(),
    })
    .default({}),
});

const CacheSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  /** Cache root; defaults to ~/.modelmux/cache */
  directory: z.string().optional(),
  memoryTtlMinutes: z.number().positive().default(30),
  memoryMaxEntries: z.number().int().positive().default(1000),
  /** Disk entries older than this are treated as misses and removed */
  diskTtlHours: z.number().positive().optional(),
  capabilities: z
    .array(CapabilitySchema)
    .default(["text-generation", "image-generation", "audio-generation"]),
});

const GlobalSettingsSchema = z.object({
  /** Attempts for providers without a key pool */
  maxRetries: z.number().int().min(1).default(3),
  retryDelayMs: z.number().int().min(0).default(500),
  keyCooldownMs: z.number().int().min(0).default(60_000),
  logLevel: z.enum(["off", "error", "warn", "info", "debug"]).default("warn"),
  cache: CacheSettingsSchema.default({}),
});

const PreferenceSchema = z.object({
  primary: z.string(),
  fallbacks: z.array(z.string()).default([]),
});

export const ModelmuxConfigSchema = z.object({
  version: z.string().default("1.0.0"),
  globalSettings: GlobalSettingsSchema.default({}),
  aiProviders: z.record(z.string(), ProviderSettingsSchema).default({}),
  capabilityPreferences: capabilityRecord(PreferenceSchema).default({}),
});

export type ModelmuxConfig = z.infer<typeof ModelmuxConfigSchema>;
export type ModelmuxConfigInput = z.input<typeof ModelmuxConfigSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;
export type CacheSettings = z.infer<typeof CacheSettingsSchema>;
export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>;
export type CapabilityPreference = z.infer<typeof PreferenceSchema>;

function pickCapabilities<T>(record: Record<string, T>): Partial<Record<AICapability, T>> {
  const result: Partial<Record<AICapability, T>> = {};
  for (const capability of AI_CAPABILITIES) {
    const value = record[capability];
    if (value !== undefined) {
      result[capability] = value;
    }
  }
  return result;
}

/** Typed provider configuration for the provider constructors. */
export function toProviderConfig(settings: ProviderSettings): ProviderConfig {
  return {
    ...settings,
    models: pickCapabilities(settings.models),
    defaults: pickCapabilities(settings.defaults),
    rateLimits: pickCapabilities(settings.rateLimits),
  };
}

/**
 * Built-in defaults; a user config file is merged over this.
 * No provider ships with keys: they come from the file or the environment.
 */
export function createDefaultConfig(): ModelmuxConfigInput {
  return {
    version: "1.0.0",
    globalSettings: {
      maxRetries: 3,
      retryDelayMs: 500,
      keyCooldownMs: 60_000,
      logLevel: "warn",
      cache: {
        enabled: true,
        memoryTtlMinutes: 30,
        memoryMaxEntries: 1000,
        capabilities: ["text-generation", "image-generation", "audio-generation"],
      },
    },
    aiProviders: {
      openai: {
        displayName: "OpenAI",
        description: "GPT text, image generation, speech and transcription",
        capabilities: [
          "text-generation",
          "image-generation",
          "image-analysis",
          "audio-generation",
          "audio-transcription",
          "realtime-conversation",
        ],
        apiSettings: { baseUrl: "https://api.openai.com/v1", apiKeyEnv: "OPENAI_API_KEY" },
        models: {
          "text-generation": ["gpt-4.1-mini", "gpt-4.1", "gpt-5", "gpt-4o"],
          "image-generation": ["gpt-4.1-mini", "gpt-4.1"],
          "image-analysis": ["gpt-4.1-mini", "gpt-4o"],
          "audio-generation": ["gpt-4o-mini-tts", "tts-1", "tts-1-hd"],
          "audio-transcription": ["gpt-4o-mini-transcribe", "gpt-4o-transcribe", "whisper-1"],
          "realtime-conversation": ["gpt-realtime"],
        },
        defaults: {
          "text-generation": "gpt-4.1-mini",
          "image-generation": "gpt-4.1-mini",
          "image-analysis": "gpt-4.1-mini",
          "audio-generation": "gpt-4o-mini-tts",
          "audio-transcription": "gpt-4o-mini-transcribe",
          "realtime-conversation": "gpt-realtime",
        },
        defaultVoice: "sage",
        modelPrefixes: ["gpt-", "o1", "o3", "o4", "tts-", "whisper"],
        rateLimits: { "text-generation": { requestsPerMinute: 500 } },
      },
      gemini: {
        displayName: "Gemini",
        description: "Google Gemini text, image generation and vision",
        capabilities: ["text-generation", "image-generation", "image-analysis"],
        apiSettings: {
          baseUrl: "https://generativelanguage.googleapis.com/v1beta",
          apiKeyEnv: "GEMINI_API_KEY",
        },
        models: {
          "text-generation": ["gemini-2.5-flash", "gemini-2.5-pro"],
          "image-generation": ["gemini-2.5-flash-image"],
          "image-analysis": ["gemini-2.5-flash"],
        },
        defaults: {
          "text-generation": "gemini-2.5-flash",
          "image-generation": "gemini-2.5-flash-image",
          "image-analysis": "gemini-2.5-flash",
        },
        modelPrefixes: ["gemini-"],
      },
      grok: {
        displayName: "Grok",
        description: "xAI Grok text and vision",
        capabilities: ["text-generation", "image-analysis"],
        apiSettings: { baseUrl: "https://api.x.ai/v1", apiKeyEnv: "XAI_API_KEY" },
        models: {
          "text-generation": ["grok-4", "grok-3-mini"],
          "image-analysis": ["grok-4"],
        },
        defaults: { "text-generation": "grok-4", "image-analysis": "grok-4" },
        modelPrefixes: ["grok-"],
      },
      "local-speech": {
        enabled: false,
        displayName: "Local speech",
        description: "On-device synthesis and microphone transcription",
        capabilities: ["audio-generation", "audio-transcription"],
        models: { "audio-generation": ["local-tts"], "audio-transcription": ["local-stt"] },
        modelPrefixes: ["local-"],
      },
    },
    capabilityPreferences: {
      "text-generation": { primary: "openai", fallbacks: ["gemini", "grok"] },
      "image-generation": { primary: "openai", fallbacks: ["gemini"] },
      "image-analysis": { primary: "openai", fallbacks: ["gemini", "grok"] },
      "audio-generation": { primary: "openai", fallbacks: ["local-speech"] },
      "audio-transcription": { primary: "openai", fallbacks: ["local-speech"] },
      "realtime-conversation": { primary: "openai", fallbacks: [] },
    },
  };
}
