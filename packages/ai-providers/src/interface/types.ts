import type { ApiKeyPool } from "../keys/ApiKeyPool.js";

/**
 * @module types
 * @description Shared types for the AI provider system.
 *
 * Defines the capability union, the request envelope passed to providers,
 * per-capability parameter sets, provider responses and the core
 * {@link AIProvider} contract every backend implements.
 */

/**
 * Capabilities that an AI provider can declare support for.
 *
 * Drives which request builder a provider uses and which cache policy
 * the dispatcher applies.
 */
export type AICapability =
  | "text-generation"
  | "image-generation"
  | "image-analysis"
  | "audio-generation"
  | "audio-transcription"
  | "realtime-conversation";

/** Every capability, in declaration order. */
export const AI_CAPABILITIES: readonly AICapability[] = [
  "text-generation",
  "image-generation",
  "image-analysis",
  "audio-generation",
  "audio-transcription",
  "realtime-conversation",
];

/** Narrow an arbitrary string to a known capability. */
export function isCapability(value: string): value is AICapability {
  return AI_CAPABILITIES.some((capability) => capability === value);
}

/**
 * A single turn in a conversation history.
 */
export interface ConversationTurn {
  role: "system" | "user" | "assistant";
  content: string;
}

/**
 * Binary payload attached to a request (image for analysis/editing,
 * audio for transcription).
 */
export interface Attachment {
  /** Base64 payload, without a data URI prefix */
  base64: string;
  /** Declared MIME type, e.g. `image/png`, `audio/wav` */
  mimeType: string;
}

/**
 * Structured request handed to a provider.
 *
 * `instructions` is serialized in insertion order. `history` must never
 * also appear inside `context` or `instructions`; see
 * {@link AIProvider.processHistory}.
 */
export interface RequestEnvelope {
  /** Free-form task metadata (user profile, session data, ...) */
  context: Record<string, unknown>;
  /** Behavioural directives */
  instructions: Record<string, unknown>;
  /** Conversation turns, oldest first */
  history?: ConversationTurn[];
  /** ISO timestamp the request was built at */
  dateTime?: string;
}

/** Parameters for text generation and image analysis. */
export interface TextParams {
  kind: "text";
  temperature?: number;
  maxOutputTokens?: number;
  /** Ask the normalizer to extract an embedded JSON payload */
  expectJson: boolean;
}

export type ImageAspectRatio = "square" | "portrait" | "landscape" | "auto";

/** Parameters for image generation. */
export interface ImageParams {
  kind: "image";
  aspectRatio: ImageAspectRatio;
  quality?: "low" | "medium" | "high" | "auto";
  format: "png" | "jpeg" | "webp";
  background?: "opaque" | "transparent" | "auto";
  fidelity?: "low" | "high";
  /** Source image for edits, raw base64 or data URI */
  sourceImageBase64?: string;
}

export type AudioFormat = "mp3" | "wav" | "m4a" | "opus" | "aac" | "flac" | "pcm";

/** Parameters for text-to-speech. */
export interface AudioParams {
  kind: "audio";
  format: AudioFormat;
  speed: number;
  language?: string;
  accent?: string;
  emotion?: string;
  pitch?: number;
}

/** Parameters for speech-to-text. */
export interface TranscriptionParams {
  kind: "transcription";
  language?: string;
  /** Transcribe the attached file, or capture from a microphone */
  inputShape: "file" | "microphone";
}

/** Tagged parameter set; `kind` identifies the capability family. */
export type CapabilityParams = TextParams | ImageParams | AudioParams | TranscriptionParams;

/**
 * Options for a single {@link AIProvider.sendMessage} call.
 */
export interface SendMessageOptions {
  /** Model to use; falls back to the provider default for the capability */
  model?: string;
  /** Image or audio payload */
  attachment?: Attachment;
  /** Voice for audio generation */
  voice?: string;
  /** Capability-specific parameters */
  params?: CapabilityParams;
}

/**
 * Canonical output of one backend call.
 *
 * Providers return semantic fields and MAY return raw binary payloads as
 * base64; persisting those is the dispatcher's job.
 */
export interface ProviderResponse {
  /** Response text (narrative, transcript, or echo of synthesized text) */
  text: string;
  /** Generation seed or response identifier */
  seed?: string;
  /** Revised prompt or description reported by an image backend */
  revisedPrompt?: string;
  /** Image payload, base64 */
  imageBase64?: string;
  /** MIME type of `imageBase64` */
  imageMimeType?: string;
  /** Audio payload, base64 */
  audioBase64?: string;
  /** Descriptive error when the provider could not serve the request */
  error?: string;
}

/** Gender reported for a TTS voice. */
export type VoiceGender = "male" | "female" | "neutral";

/** A TTS voice offered by a provider. */
export interface VoiceInfo {
  id: string;
  name: string;
  language: string;
  gender: VoiceGender;
  description?: string;
}

/** Per-capability rate limits declared in configuration. */
export interface RateLimit {
  requestsPerMinute?: number;
  tokensPerMinute?: number;
}

/**
 * Configuration a provider instance is built from.
 *
 * Immutable once constructed; owned by the registry's caller.
 */
export interface ProviderConfig {
  enabled: boolean;
  displayName: string;
  description: string;
  capabilities: AICapability[];
  apiSettings: {
    /** Base URL of the backend */
    baseUrl?: string;
    /** Environment variable the keys were read from */
    apiKeyEnv?: string;
    /** Credential pool, in rotation order */
    apiKeys: string[];
  };
  /** Available models per capability */
  models: Partial<Record<AICapability, string[]>>;
  /** Default model per capability */
  defaults: Partial<Record<AICapability, string>>;
  voices: string[];
  defaultVoice?: string;
  modelPrefixes: string[];
  rateLimits: Partial<Record<AICapability, RateLimit>>;
  configuration: {
    maxOutputTokens?: number;
    temperature?: number;
  };
}

/**
 * Immutable description of a provider, derived from its configuration.
 */
export interface ProviderDescriptor {
  id: string;
  displayName: string;
  capabilities: readonly AICapability[];
  defaultModels: Partial<Record<AICapability, string>>;
  availableModels: Partial<Record<AICapability, readonly string[]>>;
  rateLimits: Partial<Record<AICapability, RateLimit>>;
  /** Names of the credentials the provider needs (env variable names) */
  requiredCredentialKeys: readonly string[];
}

/**
 * Main contract every backend implements.
 *
 * Capability dispatch is a switch owned by each provider, so the
 * dispatcher never branches on backend details.
 */
export interface AIProvider {
  /** Unique identifier for this provider */
  readonly id: string;
  /** Static description built from configuration */
  readonly descriptor: ProviderDescriptor;
  /** Credential pool, for providers that authenticate with API keys */
  readonly credentials?: ApiKeyPool;

  /** Whether the provider has what it needs to accept requests */
  isConfigured(): boolean;

  supportsCapability(capability: AICapability): boolean;
  getDefaultModel(capability: AICapability): string | undefined;
  /** Whether `model` is a model this provider can serve for `capability` */
  supportsModel(capability: AICapability, model: string): boolean;

  /**
   * Refresh the model list from the backend.
   * @returns Models ranked by {@link compareModels}, or `null` on any failure.
   */
  fetchModelsFromAPI(): Promise<string[] | null>;

  /** Provider-specific total order over model ids; best first. */
  compareModels(a: string, b: string): number;

  /**
   * Extract conversation turns once.
   * @returns The history and a copy of the envelope guaranteed not to carry it.
   */
  processHistory(envelope: RequestEnvelope): {
    history: ConversationTurn[];
    envelope: RequestEnvelope;
  };

  /**
   * Single entry point for every capability.
   *
   * Unsupported capabilities resolve with `error` set. Throws only the
   * error kinds that must steer the dispatcher (transient failures,
   * exhausted credentials, unsupported input shapes, rejected requests).
   */
  sendMessage(
    envelope: RequestEnvelope,
    capability: AICapability,
    options?: SendMessageOptions
  ): Promise<ProviderResponse>;

  getAvailableVoices(): Promise<VoiceInfo[]>;
  isValidVoice(name: string): boolean;
  getVoiceGender(name: string): VoiceGender;
  /** Voice used when none is requested */
  getDefaultVoice(): string | undefined;
}
