import { describe, it, expect, vi } from "vitest";
import { LocalSpeechProvider } from "./LocalSpeechProvider.js";
import { defineProviderConfig } from "../interface/provider-config.js";
import { audioParams, transcriptionParams } from "../interface/params.js";
import { UnsupportedInputShapeError } from "../interface/errors.js";
import type { SpeechEngine } from "./speech-engine.js";

const config = defineProviderConfig({
  displayName: "Local speech",
  capabilities: ["audio-generation", "audio-transcription"],
  models: { "audio-generation": ["local-tts"], "audio-transcription": ["local-stt"] },
  voices: ["en-US-default"],
  modelPrefixes: ["local-"],
});

function createEngine() {
  return {
    synthesize: vi.fn(async () => ({ audioBase64: "UENN" })),
    listen: vi.fn(async () => "turn on the lights"),
    voices: vi.fn(async () => [{ id: "es-ES-x", name: "Lucia", language: "es-ES", gender: "female" as const }]),
  } satisfies SpeechEngine;
}

describe("LocalSpeechProvider", () => {
  it("is not configured without a speech engine", async () => {
    const provider = new LocalSpeechProvider("local-speech", config);

    expect(provider.isConfigured()).toBe(false);
    expect(provider.credentials).toBeUndefined();
    const response = await provider.sendMessage({ context: {}, instructions: {} }, "audio-generation");
    expect(response).toEqual({ text: "", error: "Local speech has no speech engine" });
  });

  it("synthesizes through the engine", async () => {
    const engine = createEngine();
    const provider = new LocalSpeechProvider("local-speech", config, { speechEngine: engine });

    const response = await provider.sendMessage(
      { context: {}, instructions: {}, history: [{ role: "user", content: "Good morning" }] },
      "audio-generation",
      { voice: "en-US-default", params: audioParams({ language: "en-US" }) }
    );

    expect(provider.isConfigured()).toBe(true);
    expect(response).toEqual({ text: "Good morning", audioBase64: "UENN" });
    expect(engine.synthesize).toHaveBeenCalledWith("Good morning", {
      voice: "en-US-default",
      language: "en-US",
      speed: 1,
      pitch: undefined,
      format: "mp3",
    });
  });

  it("refuses file transcription", async () => {
    const provider = new LocalSpeechProvider("local-speech", config, { speechEngine: createEngine() });

    const attempt = provider.sendMessage({ context: {}, instructions: {} }, "audio-transcription", {
      attachment: { base64: "AQID", mimeType: "audio/wav" },
    });
    await expect(attempt).rejects.toBeInstanceOf(UnsupportedInputShapeError);
  });

  it("transcribes from the microphone", async () => {
    const engine = createEngine();
    const provider = new LocalSpeechProvider("local-speech", config, { speechEngine: engine });

    const response = await provider.sendMessage({ context: {}, instructions: {} }, "audio-transcription", {
      params: transcriptionParams({ inputShape: "microphone", language: "es" }),
    });

    expect(response).toEqual({ text: "turn on the lights" });
    expect(engine.listen).toHaveBeenCalledWith({ language: "es" });
  });

  it("learns engine voices once listed", async () => {
    const provider = new LocalSpeechProvider("local-speech", config, { speechEngine: createEngine() });

    expect(provider.isValidVoice("es-ES-x")).toBe(false);
    await provider.getAvailableVoices();
    expect(provider.isValidVoice("es-ES-x")).toBe(true);
    expect(provider.getVoiceGender("es-ES-x")).toBe("female");
  });
});
