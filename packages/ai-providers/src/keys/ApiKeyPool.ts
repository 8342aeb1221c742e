import { CredentialsExhaustedError } from "../interface/errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("keys");

/**
 * Status of a key in the pool.
 *
 * `exhausted` keys (rate limited, server trouble) come back after the
 * cooldown; `failed` keys (rejected credential) stay out until `reset()`.
 */
export type ApiKeyStatus = "active" | "exhausted" | "failed";

interface KeyState {
  key: string;
  index: number;
  status: ApiKeyStatus;
  failureCount: number;
  lastError?: string;
  exhaustedAt?: number;
}

export interface ApiKeyPoolOptions {
  /** Time after which an exhausted key is usable again. Default: 60s */
  cooldownMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

export interface ApiKeyPoolStats {
  total: number;
  active: number;
  exhausted: number;
  failed: number;
  currentIndex: number;
}

/**
 * Ordered credential pool for one provider.
 *
 * The current key stays in use until it is marked; marking moves the
 * cursor to the next usable key in order, wrapping around.
 */
export class ApiKeyPool {
  private readonly keys: KeyState[];
  private cursor = 0;
  private readonly cooldownMs: number;
  private readonly now: () => number;

  constructor(
    readonly providerId: string,
    keys: readonly string[],
    options: ApiKeyPoolOptions = {}
  ) {
    const unique = [...new Set(keys.map((k) => k.trim()).filter((k) => k.length > 0))];
    this.keys = unique.map((key, index) => ({ key, index, status: "active", failureCount: 0 }));
    this.cooldownMs = options.cooldownMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.keys.length;
  }

  /**
   * Return the key to use for the next request.
   * @throws CredentialsExhaustedError when no key is usable
   */
  next(): string {
    const index = this.findUsable();
    if (index === undefined) {
      throw new CredentialsExhaustedError(this.providerId);
    }
    this.cursor = index;
    return this.keys[index].key;
  }

  /** Whether `next()` would currently succeed. */
  hasAvailable(): boolean {
    return this.findUsable() !== undefined;
  }

  /** Mark the current key as rate limited and rotate. */
  markCurrentExhausted(reason = "Rate limit exceeded"): void {
    const state = this.keys[this.cursor];
    if (state) this.markExhausted(state.key, reason);
  }

  /** Mark the current key as rejected and rotate. */
  markCurrentFailed(reason: string): void {
    const state = this.keys[this.cursor];
    if (state) this.markFailed(state.key, reason);
  }

  /**
   * Mark `key` as rate limited. The cursor only moves when it still
   * points at `key`, so a late failure never burns a key it did not use.
   */
  markExhausted(key: string, reason = "Rate limit exceeded"): void {
    const state = this.stateOf(key);
    if (!state) return;
    if (state.status !== "failed") {
      state.status = "exhausted";
      state.exhaustedAt = this.now();
    }
    state.lastError = reason;
    state.failureCount++;
    log.info(`${this.providerId} key #${state.index} exhausted (${reason}), rotating`);
    this.advanceFrom(state.index);
  }

  /** Mark `key` as rejected; it stays out until `reset()`. */
  markFailed(key: string, reason: string): void {
    const state = this.stateOf(key);
    if (!state) return;
    state.status = "failed";
    state.exhaustedAt = undefined;
    state.lastError = reason;
    state.failureCount++;
    log.warn(`${this.providerId} key #${state.index} failed: ${reason}`);
    this.advanceFrom(state.index);
  }

  /** Reactivate every key and rewind to the first. */
  reset(): void {
    for (const state of this.keys) {
      state.status = "active";
      state.failureCount = 0;
      state.lastError = undefined;
      state.exhaustedAt = undefined;
    }
    this.cursor = 0;
  }

  stats(): ApiKeyPoolStats {
    this.recoverCooledDown();
    return {
      total: this.keys.length,
      active: this.keys.filter((k) => k.status === "active").length,
      exhausted: this.keys.filter((k) => k.status === "exhausted").length,
      failed: this.keys.filter((k) => k.status === "failed").length,
      currentIndex: this.cursor,
    };
  }

  private stateOf(key: string): KeyState | undefined {
    return this.keys.find((state) => state.key === key);
  }

  private advanceFrom(index: number): void {
    if (this.cursor === index && this.keys.length > 0) {
      this.cursor = (index + 1) % this.keys.length;
    }
  }

  private recoverCooledDown(): void {
    const now = this.now();
    for (const state of this.keys) {
      if (state.status === "exhausted" && state.exhaustedAt !== undefined && now - state.exhaustedAt >= this.cooldownMs) {
        state.status = "active";
        state.exhaustedAt = undefined;
      }
    }
  }

  private findUsable(): number | undefined {
    this.recoverCooledDown();
    for (let offset = 0; offset < this.keys.length; offset++) {
      const index = (this.cursor + offset) % this.keys.length;
      if (this.keys[index].status === "active") {
        return index;
      }
    }
    return undefined;
  }
}
