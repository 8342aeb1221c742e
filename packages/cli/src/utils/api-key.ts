import { resolve } from "node:path";
import { config } from "dotenv";
import { CONFIG_DIR } from "@modelmux/core";

/**
 * Load environment variables from .env files.
 * Priority: CWD .env (project-scoped) > ~/.modelmux/.env (user-wide)
 * Later loads don't override earlier values, so CWD takes precedence,
 * and variables already set in the shell win over both.
 */
export function loadEnv(cwd: string = process.cwd(), configDir: string = CONFIG_DIR): string[] {
  const paths = [resolve(cwd, ".env")];
  const userEnv = resolve(configDir, ".env");
  if (userEnv !== paths[0]) {
    paths.push(userEnv);
  }

  const loaded: string[] = [];
  for (const path of paths) {
    const result = config({ path, debug: false });
    if (!result.error) {
      loaded.push(path);
    }
  }
  return loaded;
}
