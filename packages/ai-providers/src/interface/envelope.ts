import type { ConversationTurn, RequestEnvelope } from "./types.js";

function isEmpty(record: Record<string, unknown>): boolean {
  return Object.keys(record).length === 0;
}

/**
 * System-style preamble built from context, instructions and timestamp.
 * Instructions keep their insertion order.
 */
export function renderPreamble(envelope: RequestEnvelope): string {
  const parts: string[] = [];
  if (!isEmpty(envelope.context)) {
    parts.push(`Context: ${JSON.stringify(envelope.context)}`);
  }
  if (!isEmpty(envelope.instructions)) {
    parts.push(`Instructions: ${JSON.stringify(envelope.instructions)}`);
  }
  if (envelope.dateTime) {
    parts.push(`Date: ${envelope.dateTime}`);
  }
  return parts.join("\n");
}

/** Flatten an envelope and its history into a single prompt string. */
export function renderPrompt(envelope: RequestEnvelope, history: readonly ConversationTurn[]): string {
  const parts: string[] = [];
  const preamble = renderPreamble(envelope);
  if (preamble) parts.push(preamble);
  for (const turn of history) {
    parts.push(`${turn.role}: ${turn.content}`);
  }
  return parts.join("\n\n");
}

/** Content of the last user turn, or "" when there is none. */
export function lastUserMessage(history: readonly ConversationTurn[]): string {
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i].role === "user") {
      return history[i].content;
    }
  }
  return "";
}

/** `data:` URI for a base64 payload; already-prefixed values pass through. */
export function toDataUri(base64: string, mimeType: string): string {
  return base64.startsWith("data:") ? base64 : `data:${mimeType};base64,${base64}`;
}

/** Strip a `data:...;base64,` prefix if present. */
export function stripDataUri(value: string): { base64: string; mimeType?: string } {
  const match = /^data:([^;,]+)(?:;[^,]*)?,(.*)$/s.exec(value);
  if (!match) return { base64: value };
  return { base64: match[2], mimeType: match[1] };
}
