import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import chalk from "chalk";
import ora from "ora";
import { imageExtension, type ImageParamsInput } from "@modelmux/ai-providers";
import { defaultOutputPath, describeOrigin, openModelmux, reportFailure } from "../utils/cli.js";

interface ImageOptions {
  provider?: string;
  model?: string;
  output?: string;
  aspect: NonNullable<ImageParamsInput["aspectRatio"]>;
  format: NonNullable<ImageParamsInput["format"]>;
  quality?: ImageParamsInput["quality"];
  cache: boolean;
}

export const imageCommand = new Command("image")
  .description("Generate an image from a prompt")
  .argument("<prompt>", "Image description")
  .option("-p, --provider <id>", "Provider to try first")
  .option("-m, --model <model>", "Model to use")
  .option("-o, --output <path>", "Output file (default: image-<timestamp>.<format>)")
  .option("-a, --aspect <ratio>", "Aspect ratio: square, portrait, landscape, auto", "square")
  .option("-f, --format <format>", "Image format: png, jpeg, webp", "png")
  .option("-q, --quality <quality>", "Quality: low, medium, high, auto")
  .option("--no-cache", "Skip the content cache")
  .action(async (prompt: string, options: ImageOptions, command: Command) => {
    const spinner = ora("Generating image...").start();

    try {
      const ai = await openModelmux(command);
      const response = await ai.image(prompt, {
        provider: options.provider,
        model: options.model,
        useCache: options.cache,
        params: { aspectRatio: options.aspect, format: options.format, quality: options.quality },
      });
      ai.dispose();

      const output = resolve(options.output ?? defaultOutputPath("image", imageExtension(options.format)));
      await writeFile(output, Buffer.from(response.imageBase64 ?? "", "base64"));

      spinner.succeed(chalk.green("Image generated"));
      console.log(chalk.dim("  Saved to:"), output);
      console.log(chalk.dim("  Source:"), describeOrigin(response));
      if (response.revisedPrompt) {
        console.log(chalk.dim("  Revised prompt:"), response.revisedPrompt);
      }
    } catch (error) {
      reportFailure(spinner, "Image generation failed", error);
    }
  });
