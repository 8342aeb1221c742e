import { Command } from "commander";
import { readFile } from "node:fs/promises";
import chalk from "chalk";
import ora from "ora";
import type { Attachment } from "@modelmux/ai-providers";
import { describeOrigin, mimeTypeFor, openModelmux, reportFailure } from "../utils/cli.js";

interface TranscribeOptions {
  provider?: string;
  model?: string;
  language?: string;
  mic?: boolean;
}

export const transcribeCommand = new Command("transcribe")
  .description("Transcribe an audio file, or the microphone with --mic")
  .argument("[file]", "Audio file (mp3, wav, m4a, ogg, webm, flac)")
  .option("-p, --provider <id>", "Provider to try first")
  .option("-m, --model <model>", "Model to use")
  .option("-l, --language <code>", "Spoken language code")
  .option("--mic", "Listen on the microphone (local speech engine only)")
  .action(async (file: string | undefined, options: TranscribeOptions, command: Command) => {
    if (!file && !options.mic) {
      command.error("Provide an audio file or --mic");
    }

    const spinner = ora(options.mic ? "Listening..." : "Transcribing...").start();

    try {
      let audio: Attachment | undefined;
      if (file) {
        const data = await readFile(file);
        audio = { base64: data.toString("base64"), mimeType: mimeTypeFor(file, "audio") };
      }

      const ai = await openModelmux(command);
      const response = await ai.transcribe(audio, {
        provider: options.provider,
        model: options.model,
        params: { language: options.language, inputShape: audio ? "file" : "microphone" },
      });
      ai.dispose();

      spinner.succeed(chalk.dim(describeOrigin(response)));
      console.log(response.text);
    } catch (error) {
      reportFailure(spinner, "Transcription failed", error);
    }
  });
