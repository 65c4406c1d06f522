import type { Redis } from "ioredis";
import type { CacheStore } from "./CacheStore.js";

/** Shared store on Redis; expiry is native (PX), so nothing is swept here. */
export class RedisStore implements CacheStore {
  readonly name = "redis";

  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.redis.set(key, value, "PX", ttlMs);
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const res = await this.redis.set(key, value, "PX", ttlMs, "NX");
    return res === "OK";
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async increment(key: string, windowMs: number): Promise<number> {
    const n = await this.redis.incr(key);
    if (n === 1) await this.redis.pexpire(key, windowMs);
    return n;
  }
}
