import { extname } from "node:path";
import { InvalidArgumentError, type Command } from "commander";
import chalk from "chalk";
import type { Ora } from "ora";
import {
  AI_CAPABILITIES,
  isAIProviderError,
  isCapability,
  type AICapability,
} from "@modelmux/ai-providers";
import { createModelmux, type AI, type AIResponse, type ProviderSummary } from "@modelmux/core";

export type GlobalOptions = {
  config?: string;
};

const MIME_TYPES: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  webp: "image/webp",
  gif: "image/gif",
  mp3: "audio/mpeg",
  wav: "audio/wav",
  m4a: "audio/mp4",
  ogg: "audio/ogg",
  webm: "audio/webm",
  flac: "audio/flac",
};

/** Open the facade using the `--config` given to the root program. */
export async function openModelmux(command: Command): Promise<AI> {
  const { config } = command.optsWithGlobals<GlobalOptions>();
  return createModelmux({ configPath: config });
}

/** Commander argument parser for capability names. */
export function parseCapability(value: string): AICapability {
  if (!isCapability(value)) {
    throw new InvalidArgumentError(`Expected one of: ${AI_CAPABILITIES.join(", ")}`);
  }
  return value;
}

/** Commander option parser for numeric values. */
export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

/**
 * MIME type for a media file, by extension. `kind` restricts the result
 * to `image/*` or `audio/*`.
 */
export function mimeTypeFor(path: string, kind: "image" | "audio"): string {
  const extension = extname(path).slice(1).toLowerCase();
  const mimeType = MIME_TYPES[extension];
  if (!mimeType || !mimeType.startsWith(`${kind}/`)) {
    const supported = Object.keys(MIME_TYPES).filter((ext) => MIME_TYPES[ext].startsWith(`${kind}/`));
    throw new InvalidArgumentError(`Unsupported ${kind} file "${path}". Supported: ${supported.join(", ")}`);
  }
  return mimeType;
}

export function defaultOutputPath(prefix: string, extension: string, now: Date = new Date()): string {
  return `${prefix}-${now.getTime()}.${extension}`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function describeKeys(summary: ProviderSummary): string {
  if (!summary.keys) {
    return "not required";
  }
  const { active, total } = summary.keys;
  if (total === 0) {
    return "none";
  }
  return `${active}/${total} available`;
}

/** One-line origin of a response: provider, model and whether it was cached. */
export function describeOrigin(response: AIResponse): string {
  const origin = `${response.provider} · ${response.model}`;
  return response.fromCache ? `${origin} · cached` : origin;
}

/**
 * Stop the spinner, print the failure and exit. Provider errors show
 * their code; anything else is printed in full.
 */
export function reportFailure(spinner: Ora | undefined, message: string, error: unknown): never {
  if (spinner) {
    spinner.fail(chalk.red(message));
  } else {
    console.error(chalk.red(message));
  }

  if (isAIProviderError(error)) {
    console.error(chalk.dim(`  ${error.code}:`), error.message);
  } else {
    console.error(error);
  }
  process.exit(1);
}
