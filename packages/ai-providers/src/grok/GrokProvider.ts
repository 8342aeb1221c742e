import type {
  AICapability,
  ConversationTurn,
  ProviderConfig,
  ProviderResponse,
  RequestEnvelope,
  SendMessageOptions,
} from "../interface/types.js";
import type { ProviderDeps } from "../interface/registry.js";
import { BaseProvider } from "../interface/base-provider.js";
import { InvalidModelError, MalformedResponseError } from "../interface/errors.js";
import { renderPreamble, toDataUri } from "../interface/envelope.js";

type ChatContent =
  | string
  | Array<{ type: "text"; text: string } | { type: "image_url"; image_url: { url: string; detail: "high" } }>;

interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: ChatContent;
}

interface ChatCompletionBody {
  id?: string;
  choices?: Array<{ message?: { content?: string | null } }>;
}

/**
 * xAI Grok provider over the chat-completions API. Text and image
 * analysis only.
 */
export class GrokProvider extends BaseProvider {
  constructor(id: string, config: ProviderConfig, deps: ProviderDeps = {}) {
    super(id, config, deps, {
      capabilities: ["text-generation", "image-analysis"],
      defaultBaseUrl: "https://api.x.ai/v1",
      requiresApiKey: true,
    });
  }

  async sendMessage(
    envelope: RequestEnvelope,
    capability: AICapability,
    options: SendMessageOptions = {}
  ): Promise<ProviderResponse> {
    if (capability !== "text-generation" && capability !== "image-analysis") {
      return this.unsupported(capability);
    }
    if (!this.supportsCapability(capability)) {
      return this.unsupported(capability);
    }

    const model = options.model ?? this.getDefaultModel(capability);
    if (!model || !this.supportsModel(capability, model)) {
      throw new InvalidModelError(model ?? "(none)", this.id);
    }

    const { history, envelope: stripped } = this.processHistory(envelope);
    const params = options.params?.kind === "text" ? options.params : undefined;

    const body: Record<string, unknown> = {
      model,
      messages: this.buildMessages(stripped, history, options),
      temperature: params?.temperature ?? this.config.configuration.temperature ?? 0.7,
    };
    const maxTokens = params?.maxOutputTokens ?? this.config.configuration.maxOutputTokens;
    if (maxTokens !== undefined) body.max_tokens = maxTokens;

    const data = await this.postJson<ChatCompletionBody>("/chat/completions", body);
    const content = data.choices?.[0]?.message?.content;
    if (typeof content !== "string") {
      throw new MalformedResponseError(this.id, "Grok response has no message content");
    }
    return { text: content, seed: data.id };
  }

  private buildMessages(
    envelope: RequestEnvelope,
    history: ConversationTurn[],
    options: SendMessageOptions
  ): ChatMessage[] {
    const messages: ChatMessage[] = [];
    const preamble = renderPreamble(envelope);
    if (preamble) {
      messages.push({ role: "system", content: preamble });
    }
    messages.push(...history.map((turn) => ({ role: turn.role, content: turn.content })));

    if (options.attachment) {
      const image = {
        type: "image_url" as const,
        image_url: { url: toDataUri(options.attachment.base64, options.attachment.mimeType), detail: "high" as const },
      };
      const last = messages[messages.length - 1];
      if (last && last.role === "user" && typeof last.content === "string") {
        last.content = [{ type: "text", text: last.content }, image];
      } else {
        messages.push({ role: "user", content: [image] });
      }
    }
    return messages;
  }

  protected async listRemoteModels(): Promise<string[]> {
    const data = await this.getJson<{ data?: Array<{ id?: string }> }>("/models");
    return (data.data ?? []).flatMap((entry) => (entry.id ? [entry.id] : []));
  }

  /**
   * Beta, latest and preview builds first; deprecated models last.
   */
  compareModels(a: string, b: string): number {
    const diff = grokModelPriority(a) - grokModelPriority(b);
    if (diff !== 0) return diff;
    return a === b ? 0 : a < b ? 1 : -1;
  }
}

export function grokModelPriority(model: string): number {
  const m = model.toLowerCase();
  if (m.includes("deprecated")) return 100;
  if (m.includes("beta")) return 1;
  if (m.includes("latest")) return 2;
  if (m.includes("preview")) return 3;
  return 99;
}
