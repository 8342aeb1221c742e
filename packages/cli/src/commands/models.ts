import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { openModelmux, reportFailure } from "../utils/cli.js";

interface ListCommandOptions {
  refresh?: boolean;
}

export const modelsCommand = new Command("models")
  .description("List the models a provider offers, best first")
  .argument("<provider>", "Provider id (see `mux providers`)")
  .option("-r, --refresh", "Ignore the cached list and query the provider")
  .action(async (providerId: string, options: ListCommandOptions, command: Command) => {
    const spinner = ora(`Listing ${providerId} models...`).start();

    try {
      const ai = await openModelmux(command);
      const { models, source } = await ai.listModels(providerId, { refresh: options.refresh });
      ai.dispose();

      spinner.succeed(chalk.green(`${models.length} models`) + chalk.dim(` (from ${source})`));
      for (const model of models) {
        console.log(`  ${model}`);
      }
    } catch (error) {
      reportFailure(spinner, `Failed to list ${providerId} models`, error);
    }
  });

export const voicesCommand = new Command("voices")
  .description("List the text-to-speech voices a provider offers")
  .argument("<provider>", "Provider id")
  .option("-r, --refresh", "Ignore the cached list and query the provider")
  .action(async (providerId: string, options: ListCommandOptions, command: Command) => {
    const spinner = ora(`Listing ${providerId} voices...`).start();

    try {
      const ai = await openModelmux(command);
      const voices = await ai.getVoices(providerId, { refresh: options.refresh });
      ai.dispose();

      spinner.succeed(chalk.green(`${voices.length} voices`));
      for (const voice of voices) {
        const details = [voice.language, voice.gender, voice.description].filter(Boolean).join(", ");
        console.log(`  ${chalk.bold(voice.id)} ${chalk.dim(`${voice.name} · ${details}`)}`);
      }
    } catch (error) {
      reportFailure(spinner, `Failed to list ${providerId} voices`, error);
    }
  });
