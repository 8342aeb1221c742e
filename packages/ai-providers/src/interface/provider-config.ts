import type { ProviderConfig } from "./types.js";

export type ProviderConfigInput = Partial<Omit<ProviderConfig, "apiSettings" | "configuration">> & {
  apiSettings?: Partial<ProviderConfig["apiSettings"]>;
  configuration?: ProviderConfig["configuration"];
};

/**
 * Complete a partial provider configuration with empty defaults.
 * Handy for programmatic setups that skip the YAML loader.
 */
export function defineProviderConfig(input: ProviderConfigInput = {}): ProviderConfig {
  return {
    enabled: input.enabled ?? true,
    displayName: input.displayName ?? "Provider",
    description: input.description ?? "",
    capabilities: input.capabilities ?? [],
    apiSettings: {
      baseUrl: input.apiSettings?.baseUrl,
      apiKeyEnv: input.apiSettings?.apiKeyEnv,
      apiKeys: input.apiSettings?.apiKeys ?? [],
    },
    models: input.models ?? {},
    defaults: input.defaults ?? {},
    voices: input.voices ?? [],
    defaultVoice: input.defaultVoice,
    modelPrefixes: input.modelPrefixes ?? [],
    rateLimits: input.rateLimits ?? {},
    configuration: input.configuration ?? {},
  };
}
