import type { AIProvider, ProviderConfig } from "./types.js";
import type { SpeechEngine } from "../local/speech-engine.js";
import { UnknownProviderError } from "./errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("registry");

/**
 * Collaborators a provider may need beyond its configuration.
 */
export interface ProviderDeps {
  /** Cooldown before a rate-limited key is retried */
  keyCooldownMs?: number;
  /** On-device speech engine for local providers */
  speechEngine?: SpeechEngine;
}

/** Builds a provider instance from its configuration. */
export type ProviderConstructor = (id: string, config: ProviderConfig, deps: ProviderDeps) => AIProvider;

interface Registration {
  create: ProviderConstructor;
  modelPrefixes: string[];
}

/**
 * Directory of provider constructors and the model prefixes each owns.
 *
 * Populated at startup and read-only afterwards. Instances are built on
 * demand by {@link build}; the registry never caches them.
 */
export class ProviderRegistry {
  private registrations: Map<string, Registration> = new Map();

  /**
   * Register a constructor under `id`. Re-registering replaces the
   * constructor; prefixes are replaced only when given.
   */
  register(id: string, create: ProviderConstructor, modelPrefixes?: string[]): void {
    const existing = this.registrations.get(id);
    if (existing) {
      log.debug(`Provider "${id}" already registered. Replacing constructor.`);
    }
    this.registrations.set(id, {
      create,
      modelPrefixes: (modelPrefixes ?? existing?.modelPrefixes ?? []).map((p) => p.toLowerCase()),
    });
  }

  /** Add prefixes to an existing registration (e.g. from configuration). */
  addModelPrefixes(id: string, prefixes: string[]): void {
    const registration = this.registrations.get(id);
    if (!registration) {
      throw new UnknownProviderError(id);
    }
    for (const prefix of prefixes.map((p) => p.toLowerCase())) {
      if (!registration.modelPrefixes.includes(prefix)) {
        registration.modelPrefixes.push(prefix);
      }
    }
  }

  isRegistered(id: string): boolean {
    return this.registrations.has(id);
  }

  registeredIds(): string[] {
    return Array.from(this.registrations.keys());
  }

  getModelPrefixes(id: string): readonly string[] {
    return this.registrations.get(id)?.modelPrefixes ?? [];
  }

  /**
   * Instantiate the provider registered under `id`.
   * @throws UnknownProviderError if `id` was never registered
   */
  build(id: string, config: ProviderConfig, deps: ProviderDeps = {}): AIProvider {
    const registration = this.registrations.get(id);
    if (!registration) {
      throw new UnknownProviderError(id);
    }
    return registration.create(id, config, deps);
  }

  /**
   * Provider id owning `model`, by prefix. The longest matching prefix
   * wins; on equal length the earliest registration wins.
   */
  resolveOwner(model: string): string | undefined {
    const name = model.toLowerCase();
    let owner: string | undefined;
    let bestLength = 0;

    for (const [id, registration] of this.registrations) {
      for (const prefix of registration.modelPrefixes) {
        if (prefix.length > bestLength && name.startsWith(prefix)) {
          owner = id;
          bestLength = prefix.length;
        }
      }
    }

    return owner;
  }
}
