import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { describeOrigin, openModelmux, parseNumber, reportFailure } from "../utils/cli.js";

interface AskOptions {
  provider?: string;
  model?: string;
  system?: string;
  temperature?: number;
  maxTokens?: number;
  json?: boolean;
  cache: boolean;
}

export const askCommand = new Command("ask")
  .description("Generate text for a prompt")
  .argument("<message>", "Prompt to send")
  .option("-p, --provider <id>", "Provider to try first")
  .option("-m, --model <model>", "Model to use")
  .option("-s, --system <instructions>", "Instructions for the model")
  .option("-t, --temperature <n>", "Sampling temperature (0-2)", parseNumber)
  .option("--max-tokens <n>", "Maximum output tokens", parseNumber)
  .option("--json", "Extract a JSON object from the reply and print it")
  .option("--no-cache", "Skip the content cache")
  .action(async (message: string, options: AskOptions, command: Command) => {
    const spinner = ora("Thinking...").start();

    try {
      const ai = await openModelmux(command);
      const response = await ai.text(message, {
        provider: options.provider,
        model: options.model,
        envelope: options.system ? { instructions: { system: options.system } } : undefined,
        useCache: options.cache,
        params: {
          temperature: options.temperature,
          maxOutputTokens: options.maxTokens,
          expectJson: options.json ?? false,
        },
      });
      ai.dispose();

      spinner.succeed(chalk.dim(describeOrigin(response)));
      if (options.json && response.structured) {
        console.log(JSON.stringify(response.structured, null, 2));
      } else {
        if (options.json) {
          console.error(chalk.yellow("No JSON object found in the reply; printing it as text"));
        }
        console.log(response.text);
      }
    } catch (error) {
      reportFailure(spinner, "Text generation failed", error);
    }
  });
