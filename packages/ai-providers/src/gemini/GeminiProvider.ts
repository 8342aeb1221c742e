import type {
  AICapability,
  ConversationTurn,
  ImageParams,
  ProviderConfig,
  ProviderResponse,
  RequestEnvelope,
  SendMessageOptions,
} from "../interface/types.js";
import type { ProviderDeps } from "../interface/registry.js";
import { BaseProvider } from "../interface/base-provider.js";
import { InvalidModelError, MalformedResponseError } from "../interface/errors.js";
import { lastUserMessage, renderPreamble, stripDataUri } from "../interface/envelope.js";
import { imageParams as defaultImageParams } from "../interface/params.js";

const ASPECT_RATIOS: Record<ImageParams["aspectRatio"], string> = {
  square: "1:1",
  portrait: "2:3",
  landscape: "3:2",
  auto: "1:1",
};

type GeminiPart =
  | { text: string }
  | { inline_data: { mime_type: string; data: string } };

interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

interface GenerateContentBody {
  responseId?: string;
  candidates?: Array<{
    content?: {
      parts?: Array<{
        text?: string;
        thought?: boolean;
        inlineData?: { mimeType: string; data: string };
      }>;
    };
  }>;
}

/**
 * Google Gemini provider using generateContent for text, image analysis
 * and image generation.
 */
export class GeminiProvider extends BaseProvider {
  constructor(id: string, config: ProviderConfig, deps: ProviderDeps = {}) {
    super(id, config, deps, {
      capabilities: ["text-generation", "image-generation", "image-analysis"],
      defaultBaseUrl: "https://generativelanguage.googleapis.com/v1beta",
      requiresApiKey: true,
    });
  }

  protected buildAuthHeaders(apiKey: string): Record<string, string> {
    return { "x-goog-api-key": apiKey };
  }

  async sendMessage(
    envelope: RequestEnvelope,
    capability: AICapability,
    options: SendMessageOptions = {}
  ): Promise<ProviderResponse> {
    if (!this.supportsCapability(capability)) {
      return this.unsupported(capability);
    }

    const model = options.model ?? this.getDefaultModel(capability);
    if (!model || !this.supportsModel(capability, model)) {
      throw new InvalidModelError(model ?? "(none)", this.id);
    }

    const { history, envelope: stripped } = this.processHistory(envelope);

    switch (capability) {
      case "text-generation":
      case "image-analysis":
        return this.sendText(stripped, history, model, options);
      case "image-generation":
        return this.sendImageGeneration(stripped, history, model, options);
      default:
        return this.unsupported(capability);
    }
  }

  private buildContents(history: ConversationTurn[], options: SendMessageOptions): GeminiContent[] {
    const turns = history.filter((turn) => turn.role !== "system");
    const contents: GeminiContent[] = turns.map((turn) => ({
      role: turn.role === "assistant" ? "model" : "user",
      parts: [{ text: turn.content }],
    }));

    if (contents.length === 0) {
      contents.push({ role: "user", parts: [{ text: "" }] });
    }

    // Attachments ride on the last turn
    if (options.attachment) {
      const { base64, mimeType } = stripDataUri(options.attachment.base64);
      contents[contents.length - 1].parts.push({
        inline_data: { mime_type: mimeType ?? options.attachment.mimeType, data: base64 },
      });
    }
    return contents;
  }

  private systemInstruction(envelope: RequestEnvelope, history: ConversationTurn[]): string {
    const system = history.filter((turn) => turn.role === "system").map((turn) => turn.content);
    return [renderPreamble(envelope), ...system].filter(Boolean).join("\n\n");
  }

  private async sendText(
    envelope: RequestEnvelope,
    history: ConversationTurn[],
    model: string,
    options: SendMessageOptions
  ): Promise<ProviderResponse> {
    const params = options.params?.kind === "text" ? options.params : undefined;
    const generationConfig: Record<string, unknown> = {
      temperature: params?.temperature ?? this.config.configuration.temperature ?? 0.7,
    };
    const maxOutputTokens = params?.maxOutputTokens ?? this.config.configuration.maxOutputTokens;
    if (maxOutputTokens !== undefined) generationConfig.maxOutputTokens = maxOutputTokens;

    const payload: Record<string, unknown> = {
      contents: this.buildContents(history, options),
      generationConfig,
    };
    const system = this.systemInstruction(envelope, history);
    if (system) {
      payload.systemInstruction = { parts: [{ text: system }] };
    }

    const data = await this.postJson<GenerateContentBody>(`/models/${model}:generateContent`, payload);
    const parts = data.candidates?.[0]?.content?.parts;
    if (!parts) {
      throw new MalformedResponseError(this.id, "Gemini response has no candidates");
    }

    const text = parts
      .filter((part) => !part.thought && typeof part.text === "string")
      .map((part) => part.text)
      .join("");
    return { text, seed: data.responseId };
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
    const preamble = renderPreamble(envelope);
    const parts: GeminiPart[] = [{ text: preamble ? `${preamble}\n\n${prompt}` : prompt }];
    const source = params.sourceImageBase64 ?? options.attachment?.base64;
    if (source) {
      const { base64, mimeType } = stripDataUri(source);
      parts.push({ inline_data: { mime_type: mimeType ?? options.attachment?.mimeType ?? "image/png", data: base64 } });
    }

    const data = await this.postJson<GenerateContentBody>(`/models/${model}:generateContent`, {
      contents: [{ role: "user", parts }],
      generationConfig: {
        responseModalities: ["TEXT", "IMAGE"],
        imageConfig: { aspectRatio: ASPECT_RATIOS[params.aspectRatio] },
      },
    });

    let text = "";
    let image: { data: string; mimeType: string } | undefined;
    // Thought parts are the model's intermediate drafts
    for (const part of data.candidates?.[0]?.content?.parts ?? []) {
      if (part.thought) continue;
      if (part.inlineData && !image) {
        image = part.inlineData;
      } else if (part.text) {
        text += part.text;
      }
    }

    return {
      text,
      seed: data.responseId,
      revisedPrompt: text.trim() || undefined,
      imageBase64: image?.data,
      imageMimeType: image?.mimeType,
    };
  }

  protected async listRemoteModels(): Promise<string[]> {
    const data = await this.getJson<{ models?: Array<{ name?: string }> }>("/models");
    return (data.models ?? []).flatMap((model) => (model.name ? [model.name.replace(/^models\//, "")] : []));
  }

  /**
   * Experimental builds first, then flash, pro and nano tiers.
   */
  compareModels(a: string, b: string): number {
    const diff = geminiModelPriority(a) - geminiModelPriority(b);
    if (diff !== 0) return diff;
    return a === b ? 0 : a < b ? 1 : -1;
  }
}

export function geminiModelPriority(model: string): number {
  const m = model.toLowerCase();
  if (m.includes("experimental") || m.includes("-exp")) return 1;
  if (m.includes("flash")) return 2;
  if (m.includes("pro")) return 3;
  if (m.includes("nano")) return 4;
  return 99;
}
