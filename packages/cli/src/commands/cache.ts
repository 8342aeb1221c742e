import { Command } from "commander";
import chalk from "chalk";
import type { AICapability } from "@modelmux/ai-providers";
import { formatBytes, openModelmux, parseCapability, reportFailure } from "../utils/cli.js";

export const cacheCommand = new Command("cache").description("Inspect and clear the content cache");

cacheCommand
  .command("clear")
  .description("Remove cached responses for one capability, or all of them")
  .argument("[capability]", "Capability, e.g. audio-generation", parseCapability)
  .option("--models", "Also remove cached model and voice lists")
  .action(async (capability: AICapability | undefined, options: { models?: boolean }, command: Command) => {
    try {
      const ai = await openModelmux(command);
      const { disk, memory } = await ai.clearCache(capability);
      console.log(chalk.green(`Removed ${disk} cached ${disk === 1 ? "entry" : "entries"}`));
      if (memory > disk) {
        console.log(chalk.dim(`  (${memory} in memory)`));
      }
      if (options.models) {
        const lists = await ai.clearModelCache();
        console.log(chalk.green(`Removed ${lists} model/voice ${lists === 1 ? "list" : "lists"}`));
      }
      ai.dispose();
    } catch (error) {
      reportFailure(undefined, "Failed to clear cache", error);
    }
  });

cacheCommand
  .command("stats")
  .description("Show cache usage per capability")
  .action(async (_options: object, command: Command) => {
    try {
      const ai = await openModelmux(command);
      const { cache } = await ai.stats();
      ai.dispose();

      console.log();
      console.log(chalk.bold.cyan("Content cache"));
      console.log(chalk.dim("─".repeat(40)));
      const capabilities = Object.entries(cache?.disk ?? {});
      if (capabilities.length === 0) {
        console.log(chalk.dim("  empty"));
      }
      for (const [capability, usage] of capabilities) {
        console.log(`  ${capability.padEnd(22)} ${String(usage.entries).padStart(5)}  ${formatBytes(usage.bytes)}`);
      }
    } catch (error) {
      reportFailure(undefined, "Failed to read cache stats", error);
    }
  });
