/**
 * Configuration loader/saver for modelmux
 * Config stored at ~/.modelmux/config.yaml
 */

import { resolve } from "node:path";
import { homedir } from "node:os";
import { readFile, writeFile, mkdir, access } from "node:fs/promises";
import { parse, stringify } from "yaml";
import { ConfigError, createLogger } from "@modelmux/ai-providers";
import {
  ModelmuxConfigSchema,
  createDefaultConfig,
  type ModelmuxConfig,
  type ModelmuxConfigInput,
} from "./schema.js";

const log = createLogger("config");

/** Config directory path */
export const CONFIG_DIR = resolve(homedir(), ".modelmux");

/** Config file path */
export const CONFIG_PATH = resolve(CONFIG_DIR, "config.yaml");

/** Default cache root when the config names none */
export const DEFAULT_CACHE_DIR = resolve(CONFIG_DIR, "cache");

export interface LoadConfigOptions {
  /** Environment to read API keys from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Merge `override` into `base`; nested objects merge, arrays and scalars replace. */
export function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined || value === null) continue;
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? mergeConfig(current, value) : value;
  }
  return merged;
}

function splitKeys(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}

/**
 * Append keys found in the environment to each provider's pool.
 * `<ENV>` holds one key, `<ENV>S` a comma-separated list.
 */
export function applyEnvironmentKeys(config: ModelmuxConfig, env: NodeJS.ProcessEnv): ModelmuxConfig {
  const aiProviders: ModelmuxConfig["aiProviders"] = {};

  for (const [id, provider] of Object.entries(config.aiProviders)) {
    const envName = provider.apiSettings.apiKeyEnv;
    if (!envName) {
      aiProviders[id] = provider;
      continue;
    }

    const fromEnv = [...splitKeys(env[envName]), ...splitKeys(env[`${envName}S`])];
    const keys = [...new Set([...provider.apiSettings.apiKeys.map((k) => k.trim()), ...fromEnv])].filter(
      (key) => key.length > 0
    );
    if (fromEnv.length > 0) {
      log.debug(`${id}: ${fromEnv.length} key(s) from ${envName}`);
    }
    aiProviders[id] = { ...provider, apiSettings: { ...provider.apiSettings, apiKeys: keys } };
  }

  return { ...config, aiProviders };
}

/**
 * Validate a raw (already merged) configuration object.
 * @throws ConfigError listing every schema issue
 */
export function parseConfig(raw: unknown, source = "configuration"): ModelmuxConfig {
  const result = ModelmuxConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid ${source}:\n${issues}`);
  }
  return result.data;
}

async function readUserConfig(path: string, required: boolean): Promise<Record<string, unknown>> {
  try {
    await access(path);
  } catch (error) {
    if (required) {
      throw new ConfigError(`Config file not found: ${path}`, { cause: error });
    }
    return {};
  }

  const content = await readFile(path, "utf-8");
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    throw new ConfigError(`Config file is not valid YAML: ${path}`, { cause: error });
  }

  if (document === null || document === undefined) return {};
  if (!isRecord(document)) {
    throw new ConfigError(`Config file must contain a mapping: ${path}`);
  }
  return document;
}

/**
 * Load configuration.
 *
 * With an explicit path the file must exist; otherwise ~/.modelmux/config.yaml
 * is used when present. The file is merged over the built-in defaults,
 * environment keys are appended, and the result is validated.
 */
export async function loadConfig(path?: string, options: LoadConfigOptions = {}): Promise<ModelmuxConfig> {
  const file = path !== undefined ? resolve(path) : CONFIG_PATH;
  const user = await readUserConfig(file, path !== undefined);
  const defaults: Record<string, unknown> = { ...createDefaultConfig() };
  const config = parseConfig(mergeConfig(defaults, user), file);
  return applyEnvironmentKeys(config, options.env ?? process.env);
}

/**
 * Save configuration to ~/.modelmux/config.yaml (or `path`).
 */
export async function saveConfig(config: ModelmuxConfigInput, path: string = CONFIG_PATH): Promise<void> {
  await mkdir(resolve(path, ".."), { recursive: true });

  const content = stringify(config, {
    indent: 2,
    lineWidth: 0, // Don't wrap lines
  });

  await writeFile(path, content, "utf-8");
}

// Re-export types
export type {
  ModelmuxConfig,
  ModelmuxConfigInput,
  ProviderSettings,
  CacheSettings,
  GlobalSettings,
  CapabilityPreference,
} from "./schema.js";
export {
  ModelmuxConfigSchema,
  createDefaultConfig,
  toProviderConfig,
} from "./schema.js";
