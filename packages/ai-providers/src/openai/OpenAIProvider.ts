import type {
  AICapability,
  AudioParams,
  ConversationTurn,
  ImageParams,
  ProviderConfig,
  ProviderResponse,
  RequestEnvelope,
  SendMessageOptions,
  TextParams,
  VoiceGender,
  VoiceInfo,
} from "../interface/types.js";
import type { ProviderDeps } from "../interface/registry.js";
import { BaseProvider } from "../interface/base-provider.js";
import { InvalidModelError, UnsupportedInputShapeError } from "../interface/errors.js";
import { lastUserMessage, renderPrompt, toDataUri } from "../interface/envelope.js";
import { audioParams as defaultAudioParams, imageParams as defaultImageParams, imageMimeType } from "../interface/params.js";

const OPENAI_VOICES: ReadonlyArray<{ id: string; gender: VoiceGender }> = [
  { id: "sage", gender: "female" },
  { id: "alloy", gender: "female" },
  { id: "ash", gender: "male" },
  { id: "ballad", gender: "female" },
  { id: "coral", gender: "female" },
  { id: "echo", gender: "male" },
  { id: "fable", gender: "female" },
  { id: "onyx", gender: "male" },
  { id: "nova", gender: "female" },
  { id: "shimmer", gender: "female" },
  { id: "verse", gender: "male" },
  { id: "cedar", gender: "male" },
  { id: "marin", gender: "female" },
];

const IMAGE_SIZES: Record<ImageParams["aspectRatio"], string> = {
  square: "1024x1024",
  portrait: "1024x1536",
  landscape: "1536x1024",
  auto: "1024x1024",
};

type InputContent =
  | { type: "input_text"; text: string }
  | { type: "input_image"; image_url: string };

interface ResponsesOutputItem {
  type?: string;
  id?: string;
  result?: string;
  revised_prompt?: string;
  content?: Array<{ type?: string; text?: string }>;
}

interface ResponsesBody {
  id?: string;
  output_text?: string;
  output?: ResponsesOutputItem[];
}

/**
 * OpenAI provider over the Responses API, speech and transcription
 * endpoints. Serves every capability.
 */
export class OpenAIProvider extends BaseProvider {
  constructor(id: string, config: ProviderConfig, deps: ProviderDeps = {}) {
    super(id, config, deps, {
      capabilities: [
        "text-generation",
        "image-generation",
        "image-analysis",
        "audio-generation",
        "audio-transcription",
        "realtime-conversation",
      ],
      defaultBaseUrl: "https://api.openai.com/v1",
      requiresApiKey: true,
    });
  }

  async sendMessage(
    envelope: RequestEnvelope,
    capability: AICapability,
    options: SendMessageOptions = {}
  ): Promise<ProviderResponse> {
    if (!this.supportsCapability(capability)) {
      return this.unsupported(capability);
    }

    const model = this.selectModel(capability, options.model);
    const { history, envelope: stripped } = this.processHistory(envelope);

    switch (capability) {
      case "text-generation":
      case "image-analysis":
        return this.sendText(stripped, history, model, options);
      case "image-generation":
        return this.sendImageGeneration(stripped, history, model, options);
      case "audio-generation":
        return this.sendSpeech(history, model, options);
      case "audio-transcription":
        return this.sendTranscription(stripped, model, options);
      case "realtime-conversation":
        return this.describeRealtimeSession(history, model, options.voice);
    }
  }

  private selectModel(capability: AICapability, requested?: string): string {
    const model = requested ?? this.getDefaultModel(capability);
    if (!model || !this.supportsModel(capability, model)) {
      throw new InvalidModelError(model ?? "(none)", this.id);
    }
    return model;
  }

  private async sendText(
    envelope: RequestEnvelope,
    history: ConversationTurn[],
    model: string,
    options: SendMessageOptions
  ): Promise<ProviderResponse> {
    const prompt = renderPrompt(envelope, history);
    const params: TextParams | undefined = options.params?.kind === "text" ? options.params : undefined;

    const body: Record<string, unknown> = { model };
    if (options.attachment) {
      body.input = [
        {
          role: "user",
          content: [
            { type: "input_text", text: prompt },
            { type: "input_image", image_url: toDataUri(options.attachment.base64, options.attachment.mimeType) },
          ] satisfies InputContent[],
        },
      ];
    } else {
      body.input = prompt;
    }

    const temperature = params?.temperature ?? this.config.configuration.temperature;
    const maxOutputTokens = params?.maxOutputTokens ?? this.config.configuration.maxOutputTokens;
    if (temperature !== undefined) body.temperature = temperature;
    if (maxOutputTokens !== undefined) body.max_output_tokens = maxOutputTokens;

    const data = await this.postJson<ResponsesBody>("/responses", body);
    return this.parseResponses(data);
  }

  private async sendImageGeneration(
    envelope: RequestEnvelope,
    history: ConversationTurn[],
    model: string,
    options: SendMessageOptions
  ): Promise<ProviderResponse> {
    const prompt = lastUserMessage(history);
    if (!prompt) {
      return { text: "", error: "No prompt provided for image generation" };
    }

    const params = options.params?.kind === "image" ? options.params : defaultImageParams();
    const content: InputContent[] = [{ type: "input_text", text: renderPrompt(envelope, history) }];
    const source = params.sourceImageBase64 ?? options.attachment?.base64;
    if (source) {
      content.push({ type: "input_image", image_url: toDataUri(source, options.attachment?.mimeType ?? "image/png") });
    }

    const tool: Record<string, unknown> = {
      type: "image_generation",
      moderation: "low",
      input_fidelity: params.fidelity ?? "low",
      background: params.background ?? "opaque",
      output_format: params.format,
      size: IMAGE_SIZES[params.aspectRatio],
    };
    if (params.quality) tool.quality = params.quality;

    const data = await this.postJson<ResponsesBody>("/responses", {
      model,
      input: [{ role: "user", content }],
      tools: [tool],
    });

    const response = this.parseResponses(data);
    if (response.imageBase64) {
      response.imageMimeType = imageMimeType(params.format);
    }
    return response;
  }

  private parseResponses(data: ResponsesBody): ProviderResponse {
    if (typeof data.output_text === "string") {
      return { text: data.output_text, seed: data.id };
    }

    let text = "";
    let imageBase64: string | undefined;
    let imageId: string | undefined;
    let revisedPrompt: string | undefined;

    for (const item of data.output ?? []) {
      if (item.type === "image_generation_call") {
        imageBase64 = imageBase64 ?? item.result;
        imageId = imageId ?? item.id;
        revisedPrompt = revisedPrompt ?? item.revised_prompt;
      } else if (item.type === "message") {
        for (const part of item.content ?? []) {
          if (!text.trim() && part.type === "output_text" && part.text) {
            text = part.text;
          }
        }
      }
    }

    return {
      text,
      seed: imageId ?? data.id,
      revisedPrompt: revisedPrompt?.trim() || undefined,
      imageBase64,
    };
  }

  private async sendSpeech(
    history: ConversationTurn[],
    model: string,
    options: SendMessageOptions
  ): Promise<ProviderResponse> {
    const text = lastUserMessage(history);
    if (!text) {
      return { text: "", error: "No text provided for speech synthesis" };
    }

    const params: AudioParams = options.params?.kind === "audio" ? options.params : defaultAudioParams();
    const payload: Record<string, unknown> = {
      model,
      input: text,
      voice: this.resolveVoice(options.voice),
      speed: params.speed,
      response_format: params.format,
    };

    const instructions = [params.accent, params.emotion].filter((part) => part && part.trim()).join(". ");
    if (instructions) payload.instructions = instructions;
    if (params.language) payload.language = params.language;

    const response = await this.request("/audio/speech", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
    });
    const audio = Buffer.from(await response.arrayBuffer());

    return { text, audioBase64: audio.toString("base64") };
  }

  private async sendTranscription(
    envelope: RequestEnvelope,
    model: string,
    options: SendMessageOptions
  ): Promise<ProviderResponse> {
    const params = options.params?.kind === "transcription" ? options.params : undefined;
    const attachment = options.attachment;
    if (!attachment || params?.inputShape === "microphone") {
      throw new UnsupportedInputShapeError(this.id, "OpenAI transcription needs an audio file; microphone capture is not available");
    }

    const form = new FormData();
    const extension = attachment.mimeType.split("/")[1] ?? "wav";
    form.append("file", new Blob([new Uint8Array(Buffer.from(attachment.base64, "base64"))], { type: attachment.mimeType }), `audio.${extension}`);
    form.append("model", model);
    if (params?.language) form.append("language", params.language);

    const prompt = renderPrompt({ ...envelope, dateTime: undefined }, []);
    if (prompt) form.append("prompt", prompt);

    const response = await this.request("/audio/transcriptions", { method: "POST", body: form });
    const data = await this.readJson<{ text?: string }>(response);

    return { text: data.text ?? "" };
  }

  private describeRealtimeSession(history: ConversationTurn[], model: string, voice?: string): ProviderResponse {
    return {
      text: JSON.stringify({
        provider: this.id,
        model,
        voice: this.resolveVoice(voice),
        historyLength: history.length,
      }),
    };
  }

  protected async listRemoteModels(): Promise<string[]> {
    const data = await this.getJson<{ data?: Array<{ id?: string }> }>("/models");
    return (data.data ?? []).flatMap((entry) => (entry.id ? [entry.id] : []));
  }

  /**
   * Newest flagship families first: gpt-5, gpt-4.1, gpt-4o, gpt-4,
   * gpt-3.5, realtime, then everything else. Ties by reverse name.
   */
  compareModels(a: string, b: string): number {
    const diff = openaiModelPriority(a) - openaiModelPriority(b);
    if (diff !== 0) return diff;
    return a === b ? 0 : a < b ? 1 : -1;
  }

  async getAvailableVoices(): Promise<VoiceInfo[]> {
    return OPENAI_VOICES.map((voice) => ({
      id: voice.id,
      name: voice.id,
      language: "en",
      gender: voice.gender,
    }));
  }

  isValidVoice(name: string): boolean {
    return OPENAI_VOICES.some((voice) => voice.id === name.toLowerCase());
  }

  getVoiceGender(name: string): VoiceGender {
    return OPENAI_VOICES.find((voice) => voice.id === name.toLowerCase())?.gender ?? "neutral";
  }

  getDefaultVoice(): string {
    return this.config.defaultVoice ?? "sage";
  }
}

export function openaiModelPriority(model: string): number {
  const m = model.toLowerCase();
  if (m === "gpt-5") return 1;
  if (m.startsWith("gpt-5")) return 2;
  if (m === "gpt-4.1") return 3;
  if (m.startsWith("gpt-4.1")) return 4;
  if (m.startsWith("gpt-4o")) return 5;
  if (m.startsWith("gpt-4")) return 6;
  if (m.startsWith("gpt-3.5")) return 7;
  if (m.includes("realtime")) return 8;
  return 99;
}
