import type { CacheStore } from "../cache/CacheStore.js";
import { createLogger } from "../logging/logger.js";
import type { IdentifierHasher } from "../security/pii.js";

const log = createLogger("rate-limit");

export type RateLimitConfig = {
  tokens: number;
  windowSeconds: number;
};

/**
 * Fixed-window counter per caller identity. The identity is hashed before it
 * becomes part of a store key. When the store is unreachable the request is
 * let through.
 */
export class RateLimiter {
  constructor(
    private readonly store: CacheStore,
    private readonly config: RateLimitConfig,
    private readonly hashIdentifier: IdentifierHasher
  ) {}

  get windowSeconds(): number {
    return this.config.windowSeconds;
  }

  async tryAcquire(identity: string): Promise<boolean> {
    const key = `ratelimit:${this.hashIdentifier(identity)}`;
    try {
      const count = await this.store.increment(key, this.config.windowSeconds * 1000);
      return count <= this.config.tokens;
    } catch (err) {
      log.warn("rate limit store unavailable; allowing request", { store: this.store.name, error: err });
      return true;
    }
  }
}
