import { z } from "zod";
import type { AudioParams, ImageParams, TextParams, TranscriptionParams } from "./types.js";

/**
 * Capability parameter sets, validated when built.
 *
 * Each builder applies defaults and throws a ZodError on invalid input, so
 * a parameter object that reaches a provider is always well formed.
 */

const TextParamsSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  expectJson: z.boolean().default(false),
});

const ImageParamsSchema = z.object({
  aspectRatio: z.enum(["square", "portrait", "landscape", "auto"]).default("square"),
  quality: z.enum(["low", "medium", "high", "auto"]).optional(),
  format: z.enum(["png", "jpeg", "webp"]).default("png"),
  background: z.enum(["opaque", "transparent", "auto"]).optional(),
  fidelity: z.enum(["low", "high"]).optional(),
  sourceImageBase64: z.string().min(1).optional(),
});

const AudioParamsSchema = z.object({
  format: z.enum(["mp3", "wav", "m4a", "opus", "aac", "flac", "pcm"]).default("mp3"),
  speed: z.number().min(0.25).max(4).default(1),
  language: z.string().min(2).optional(),
  accent: z.string().optional(),
  emotion: z.string().optional(),
  pitch: z.number().min(0.5).max(2).optional(),
});

const TranscriptionParamsSchema = z.object({
  language: z.string().min(2).optional(),
  inputShape: z.enum(["file", "microphone"]).default("file"),
});

export type TextParamsInput = z.input<typeof TextParamsSchema>;
export type ImageParamsInput = z.input<typeof ImageParamsSchema>;
export type AudioParamsInput = z.input<typeof AudioParamsSchema>;
export type TranscriptionParamsInput = z.input<typeof TranscriptionParamsSchema>;

export function textParams(input: TextParamsInput = {}): TextParams {
  return { kind: "text", ...TextParamsSchema.parse(input) };
}

export function imageParams(input: ImageParamsInput = {}): ImageParams {
  return { kind: "image", ...ImageParamsSchema.parse(input) };
}

export function audioParams(input: AudioParamsInput = {}): AudioParams {
  return { kind: "audio", ...AudioParamsSchema.parse(input) };
}

export function transcriptionParams(input: TranscriptionParamsInput = {}): TranscriptionParams {
  return { kind: "transcription", ...TranscriptionParamsSchema.parse(input) };
}

/** File extension for an image output format. */
export function imageExtension(format: ImageParams["format"]): string {
  return format === "jpeg" ? "jpg" : format;
}

export function imageMimeType(format: ImageParams["format"]): string {
  return `image/${format}`;
}
