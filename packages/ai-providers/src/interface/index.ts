/**
 * @module interface
 * @description Provider contract, shared types, error taxonomy and registry.
 *
 * Every backend implements {@link AIProvider}; HTTP backends extend
 * {@link BaseProvider}. The {@link ProviderRegistry} maps provider ids to
 * constructors and model names to their owning provider.
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./params.js";
export * from "./envelope.js";
export * from "./registry.js";
export * from "./base-provider.js";
export * from "./provider-config.js";
