import type { AudioFormat, VoiceInfo } from "../interface/types.js";

export interface SynthesizeOptions {
  voice?: string;
  language?: string;
  speed: number;
  pitch?: number;
  format: AudioFormat;
}

export interface ListenOptions {
  language?: string;
  /** Upper bound on capture time */
  timeoutMs?: number;
}

/**
 * On-device speech backend (system TTS voices and microphone capture).
 * Hosts supply an implementation; none ships with this package.
 */
export interface SpeechEngine {
  /** Synthesize `text`, returning the encoded audio as base64. */
  synthesize(text: string, options: SynthesizeOptions): Promise<{ audioBase64: string }>;
  /** Capture speech from the microphone and return its transcript. */
  listen(options: ListenOptions): Promise<string>;
  voices(): Promise<VoiceInfo[]>;
}
