import { Command } from "commander";
import { analyzeCommand } from "./commands/analyze.js";
import { askCommand } from "./commands/ask.js";
import { cacheCommand } from "./commands/cache.js";
import { imageCommand } from "./commands/image.js";
import { initCommand } from "./commands/init.js";
import { modelsCommand, voicesCommand } from "./commands/models.js";
import { providersCommand } from "./commands/providers.js";
import { speakCommand } from "./commands/speak.js";
import { transcribeCommand } from "./commands/transcribe.js";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("mux")
    .description("modelmux - one command line for many AI providers")
    .version(VERSION)
    .option("-c, --config <path>", "Config file (default: ~/.modelmux/config.yaml)");

  program.addCommand(initCommand);
  program.addCommand(providersCommand);
  program.addCommand(modelsCommand);
  program.addCommand(voicesCommand);
  program.addCommand(askCommand);
  program.addCommand(imageCommand);
  program.addCommand(analyzeCommand);
  program.addCommand(speakCommand);
  program.addCommand(transcribeCommand);
  program.addCommand(cacheCommand);

  return program;
}
