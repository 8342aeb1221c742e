/**
 * Best-effort extraction of a JSON object embedded in model output.
 *
 * Models often answer with narrative text around a JSON payload, inside a
 * fenced code block or inline. {@link extractJsonBlock} never throws: when
 * nothing parses it hands the text back tagged as raw.
 */

export type ExtractedJson =
  | { kind: "structured"; value: Record<string, unknown> }
  | { kind: "raw"; raw: string };

const FENCE_PATTERN = /```[a-zA-Z]*\s*([\s\S]*?)```/g;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse `candidate` as a JSON object, decoding once more when the first
 * pass yields a string (double-encoded payloads).
 */
export function tryParseObject(candidate: string): Record<string, unknown> | undefined {
  let decoded: unknown;
  try {
    decoded = JSON.parse(candidate.trim());
  } catch {
    return undefined;
  }

  if (typeof decoded === "string") {
    try {
      decoded = JSON.parse(decoded);
    } catch {
      return undefined;
    }
  }

  return isPlainObject(decoded) ? decoded : undefined;
}

/**
 * Balanced `{...}` substring starting at `start`, or undefined if the
 * braces never close. Braces inside string literals are ignored.
 */
export function extractBalanced(text: string, start: number): string | undefined {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return undefined;
}

/** Every balanced candidate in `text`, longest first. */
export function findBalancedCandidates(text: string): string[] {
  const candidates: string[] = [];
  for (let i = text.indexOf("{"); i !== -1; i = text.indexOf("{", i + 1)) {
    const candidate = extractBalanced(text, i);
    if (candidate) {
      candidates.push(candidate);
    }
  }
  // Stable sort keeps earlier candidates first among equal lengths
  return candidates.sort((a, b) => b.length - a.length);
}

function firstParsable(candidates: string[]): Record<string, unknown> | undefined {
  for (const candidate of candidates) {
    const parsed = tryParseObject(candidate);
    if (parsed) return parsed;
  }
  return undefined;
}

export function extractJsonBlock(text: string): ExtractedJson {
  const cleaned = text.trim();

  const whole = tryParseObject(cleaned);
  if (whole) {
    return { kind: "structured", value: whole };
  }

  for (const match of cleaned.matchAll(FENCE_PATTERN)) {
    const interior = match[1];
    const parsed = tryParseObject(interior) ?? firstParsable(findBalancedCandidates(interior));
    if (parsed) {
      return { kind: "structured", value: parsed };
    }
  }

  const balanced = firstParsable(findBalancedCandidates(cleaned));
  if (balanced) {
    return { kind: "structured", value: balanced };
  }

  const first = cleaned.indexOf("{");
  const last = cleaned.lastIndexOf("}");
  if (first !== -1 && last > first) {
    const span = tryParseObject(cleaned.slice(first, last + 1));
    if (span) {
      return { kind: "structured", value: span };
    }
  }

  return { kind: "raw", raw: cleaned };
}

/** Read a string field from an extracted object. */
export function stringField(value: Record<string, unknown>, key: string): string | undefined {
  const field = value[key];
  return typeof field === "string" ? field : undefined;
}
