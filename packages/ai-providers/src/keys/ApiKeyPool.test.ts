import { describe, it, expect } from "vitest";
import { ApiKeyPool } from "./ApiKeyPool.js";
import { CredentialsExhaustedError } from "../interface/errors.js";

describe("ApiKeyPool", () => {
  it("keeps returning the current key until it is marked", () => {
    const pool = new ApiKeyPool("openai", ["key-a", "key-b"]);

    expect(pool.next()).toBe("key-a");
    expect(pool.next()).toBe("key-a");
  });

  it("drops blank and duplicate keys", () => {
    const pool = new ApiKeyPool("openai", ["key-a", " ", "key-a", " key-b "]);

    expect(pool.size).toBe(2);
  });

  it("rotates to the next key when the current one is exhausted", () => {
    const pool = new ApiKeyPool("openai", ["key-a", "key-b", "key-c"]);
    pool.next();
    pool.markCurrentExhausted();

    expect(pool.next()).toBe("key-b");
  });

  it("throws CredentialsExhaustedError once every key is used up", () => {
    const pool = new ApiKeyPool("openai", ["key-a", "key-b"]);
    pool.next();
    pool.markCurrentExhausted();
    pool.next();
    pool.markCurrentFailed("invalid key");

    expect(pool.hasAvailable()).toBe(false);
    expect(() => pool.next()).toThrow(CredentialsExhaustedError);
  });

  it("marks the key a request used, not the one the cursor moved to", () => {
    const pool = new ApiKeyPool("openai", ["key-a", "key-b"]);
    const first = pool.next();
    const second = pool.next();

    pool.markExhausted(first);
    pool.markExhausted(second);

    expect(pool.stats()).toEqual({ total: 2, active: 1, exhausted: 1, failed: 0, currentIndex: 1 });
    expect(pool.next()).toBe("key-b");
  });

  it("keeps a rejected key failed when a rate limit for it arrives later", () => {
    const pool = new ApiKeyPool("openai", ["key-a", "key-b"]);
    pool.markFailed("key-a", "HTTP 401");
    pool.markExhausted("key-a");

    expect(pool.stats()).toMatchObject({ active: 1, exhausted: 0, failed: 1 });
  });

  it("throws immediately for an empty pool", () => {
    const pool = new ApiKeyPool("gemini", []);

    expect(() => pool.next()).toThrow(CredentialsExhaustedError);
  });

  it("recovers exhausted keys after the cooldown but not failed ones", () => {
    let clock = 1_000;
    const pool = new ApiKeyPool("openai", ["key-a", "key-b"], {
      cooldownMs: 500,
      now: () => clock,
    });
    pool.next();
    pool.markCurrentExhausted();
    pool.next();
    pool.markCurrentFailed("revoked");

    expect(pool.hasAvailable()).toBe(false);

    clock += 500;
    expect(pool.next()).toBe("key-a");
    expect(pool.stats()).toEqual({
      total: 2,
      active: 1,
      exhausted: 0,
      failed: 1,
      currentIndex: 0,
    });
  });

  it("reactivates every key on reset", () => {
    const pool = new ApiKeyPool("openai", ["key-a", "key-b"]);
    pool.next();
    pool.markCurrentFailed("revoked");
    pool.next();
    pool.markCurrentFailed("revoked");

    pool.reset();

    expect(pool.next()).toBe("key-a");
    expect(pool.stats().active).toBe(2);
  });
});
