import type {
  AICapability,
  AudioParams,
  ProviderConfig,
  ProviderResponse,
  RequestEnvelope,
  SendMessageOptions,
  VoiceGender,
  VoiceInfo,
} from "../interface/types.js";
import type { ProviderDeps } from "../interface/registry.js";
import type { SpeechEngine } from "./speech-engine.js";
import { BaseProvider } from "../interface/base-provider.js";
import { InvalidModelError, UnsupportedInputShapeError } from "../interface/errors.js";
import { lastUserMessage } from "../interface/envelope.js";
import { audioParams as defaultAudioParams } from "../interface/params.js";

/**
 * Speech synthesis and microphone transcription on the local device.
 *
 * Transcription captures live audio only; requests that carry a
 * recorded file are refused so the dispatcher can route them elsewhere.
 */
export class LocalSpeechProvider extends BaseProvider {
  private readonly engine?: SpeechEngine;
  private knownVoices: VoiceInfo[] = [];

  constructor(id: string, config: ProviderConfig, deps: ProviderDeps = {}) {
    super(id, config, deps, {
      capabilities: ["audio-generation", "audio-transcription"],
      defaultBaseUrl: "local://speech",
      requiresApiKey: false,
    });
    this.engine = deps.speechEngine;
  }

  isConfigured(): boolean {
    return this.config.enabled && this.engine !== undefined;
  }

  async sendMessage(
    envelope: RequestEnvelope,
    capability: AICapability,
    options: SendMessageOptions = {}
  ): Promise<ProviderResponse> {
    if (!this.supportsCapability(capability)) {
      return this.unsupported(capability);
    }
    if (!this.engine) {
      return { text: "", error: `${this.config.displayName} has no speech engine` };
    }

    const model = options.model ?? this.getDefaultModel(capability);
    if (model && !this.supportsModel(capability, model)) {
      throw new InvalidModelError(model, this.id);
    }

    const { history } = this.processHistory(envelope);

    if (capability === "audio-generation") {
      const text = lastUserMessage(history);
      if (!text) {
        return { text: "", error: "No text provided for speech synthesis" };
      }
      const params: AudioParams = options.params?.kind === "audio" ? options.params : defaultAudioParams();
      const { audioBase64 } = await this.engine.synthesize(text, {
        voice: this.resolveVoice(options.voice),
        language: params.language,
        speed: params.speed,
        pitch: params.pitch,
        format: params.format,
      });
      return { text, audioBase64 };
    }

    if (capability === "audio-transcription") {
      const params = options.params?.kind === "transcription" ? options.params : undefined;
      if (options.attachment || params?.inputShape === "file") {
        throw new UnsupportedInputShapeError(this.id, "Local transcription only captures from the microphone");
      }
      const transcript = await this.engine.listen({ language: params?.language });
      return { text: transcript };
    }

    return this.unsupported(capability);
  }

  protected async listRemoteModels(): Promise<string[]> {
    return Object.values(this.config.models).flatMap((models) => models ?? []);
  }

  compareModels(a: string, b: string): number {
    return a === b ? 0 : a < b ? -1 : 1;
  }

  async getAvailableVoices(): Promise<VoiceInfo[]> {
    if (!this.engine) return [];
    this.knownVoices = await this.engine.voices();
    return this.knownVoices;
  }

  isValidVoice(name: string): boolean {
    return this.config.voices.includes(name) || this.knownVoices.some((voice) => voice.id === name);
  }

  getVoiceGender(name: string): VoiceGender {
    return this.knownVoices.find((voice) => voice.id === name)?.gender ?? "neutral";
  }
}
