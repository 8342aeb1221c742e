import { Command } from "commander";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import chalk from "chalk";
import { CONFIG_PATH, createDefaultConfig, saveConfig } from "@modelmux/core";
import { reportFailure, type GlobalOptions } from "../utils/cli.js";

export const initCommand = new Command("init")
  .description("Write a config file with the built-in provider defaults")
  .option("-f, --force", "Overwrite an existing config file")
  .action(async (options: { force?: boolean }, command: Command) => {
    const { config } = command.optsWithGlobals<GlobalOptions>();
    const path = config !== undefined ? resolve(config) : CONFIG_PATH;

    if (existsSync(path) && !options.force) {
      console.log(chalk.yellow(`Config already exists: ${path}`));
      console.log(chalk.dim("Use --force to overwrite it."));
      return;
    }

    try {
      await saveConfig(createDefaultConfig(), path);
      console.log(chalk.green("Config written"));
      console.log(chalk.dim("  Path:"), path);
      console.log(chalk.dim("  Set API keys in the environment, e.g. OPENAI_API_KEY, or under apiSettings.apiKeys."));
    } catch (error) {
      reportFailure(undefined, "Failed to write config", error);
    }
  });
