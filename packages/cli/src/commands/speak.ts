import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import chalk from "chalk";
import ora from "ora";
import type { AudioFormat } from "@modelmux/ai-providers";
import { defaultOutputPath, describeOrigin, openModelmux, parseNumber, reportFailure } from "../utils/cli.js";

interface SpeakCommandOptions {
  provider?: string;
  model?: string;
  voice?: string;
  format: AudioFormat;
  speed?: number;
  language?: string;
  output?: string;
  cache: boolean;
}

export const speakCommand = new Command("speak")
  .description("Synthesize speech from text")
  .argument("<text>", "Text to speak")
  .option("-p, --provider <id>", "Provider to try first")
  .option("-m, --model <model>", "Model to use")
  .option("-v, --voice <voice>", "Voice id (see `mux voices <provider>`)")
  .option("-f, --format <format>", "Audio format: mp3, wav, m4a, opus, aac, flac, pcm", "mp3")
  .option("--speed <n>", "Playback speed (0.25-4)", parseNumber)
  .option("-l, --language <code>", "Language code, e.g. en or de")
  .option("-o, --output <path>", "Output file (default: speech-<timestamp>.<format>)")
  .option("--no-cache", "Skip the content cache")
  .action(async (text: string, options: SpeakCommandOptions, command: Command) => {
    const spinner = ora("Synthesizing speech...").start();

    try {
      const ai = await openModelmux(command);
      const response = await ai.speak(text, {
        provider: options.provider,
        model: options.model,
        voice: options.voice,
        useCache: options.cache,
        params: { format: options.format, speed: options.speed, language: options.language },
      });
      ai.dispose();

      const output = resolve(options.output ?? defaultOutputPath("speech", options.format));
      await writeFile(output, Buffer.from(response.audioBase64 ?? "", "base64"));

      spinner.succeed(chalk.green("Speech synthesized"));
      console.log(chalk.dim("  Saved to:"), output);
      console.log(chalk.dim("  Source:"), describeOrigin(response));
    } catch (error) {
      reportFailure(spinner, "Speech synthesis failed", error);
    }
  });
