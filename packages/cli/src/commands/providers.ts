import { Command } from "commander";
import chalk from "chalk";
import { describeKeys, openModelmux, reportFailure } from "../utils/cli.js";

export const providersCommand = new Command("providers")
  .description("List AI providers, their capabilities and key status")
  .action(async (_options: object, command: Command) => {
    try {
      const ai = await openModelmux(command);

      console.log();
      console.log(chalk.bold.cyan("AI Providers"));
      console.log(chalk.dim("─".repeat(60)));

      for (const provider of ai.providers()) {
        const status = provider.configured ? chalk.green("●") : chalk.dim("○");
        console.log(`${status} ${chalk.bold(provider.displayName)} ${chalk.dim(`(${provider.id})`)}`);
        console.log(chalk.dim("    Capabilities:"), provider.capabilities.join(", "));
        console.log(chalk.dim("    Keys:"), describeKeys(provider));
      }

      console.log();
      console.log(chalk.dim("● configured  ○ missing credentials or disabled"));
      ai.dispose();
    } catch (error) {
      reportFailure(undefined, "Failed to load providers", error);
    }
  });
