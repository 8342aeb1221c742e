import { Command } from "commander";
import { readFile } from "node:fs/promises";
import chalk from "chalk";
import ora from "ora";
import { describeOrigin, mimeTypeFor, openModelmux, reportFailure } from "../utils/cli.js";

interface AnalyzeOptions {
  provider?: string;
  model?: string;
  json?: boolean;
}

export const analyzeCommand = new Command("analyze")
  .description("Describe an image or answer a question about it")
  .argument("<image>", "Image file (png, jpg, webp, gif)")
  .argument("[prompt]", "Question about the image", "Describe this image.")
  .option("-p, --provider <id>", "Provider to try first")
  .option("-m, --model <model>", "Model to use")
  .option("--json", "Ask for a JSON reply and print the extracted object")
  .action(async (image: string, prompt: string, options: AnalyzeOptions, command: Command) => {
    const spinner = ora("Analyzing image...").start();

    try {
      const data = await readFile(image);
      const ai = await openModelmux(command);
      const response = await ai.analyzeImage(
        { base64: data.toString("base64"), mimeType: mimeTypeFor(image, "image") },
        prompt,
        { provider: options.provider, model: options.model, params: { expectJson: options.json ?? false } }
      );
      ai.dispose();

      spinner.succeed(chalk.dim(describeOrigin(response)));
      console.log(options.json && response.structured ? JSON.stringify(response.structured, null, 2) : response.text);
    } catch (error) {
      reportFailure(spinner, "Image analysis failed", error);
    }
  });
