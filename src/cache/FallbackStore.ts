import { createLogger } from "../logging/logger.js";
import type { CacheStore } from "./CacheStore.js";
import { MemoryStore } from "./MemoryStore.js";

const log = createLogger("cache");

/**
 * Routes every call to `primary`; when the primary throws, the same call is
 * answered by the process-local store and a warning is logged. A store
 * outage therefore never reaches the request.
 */
export class FallbackStore implements CacheStore {
  readonly name: string;

  constructor(
    private readonly primary: CacheStore,
    private readonly local: CacheStore = new MemoryStore()
  ) {
    this.name = `${primary.name}+${local.name}`;
  }

  // Keys carry query text, so only the operation name is logged.
  private async run<T>(op: string, fn: (s: CacheStore) => Promise<T>): Promise<T> {
    try {
      return await fn(this.primary);
    } catch (err) {
      log.warn(`${this.primary.name} ${op} failed, using ${this.local.name} store`, { error: err });
      return fn(this.local);
    }
  }

  get(key: string) {
    return this.run("get", s => s.get(key));
  }

  set(key: string, value: string, ttlMs: number) {
    return this.run("set", s => s.set(key, value, ttlMs));
  }

  setIfAbsent(key: string, value: string, ttlMs: number) {
    return this.run("setIfAbsent", s => s.setIfAbsent(key, value, ttlMs));
  }

  // Values written during an outage live in the local store; drop them too.
  async delete(key: string) {
    await this.local.delete(key);
    return this.run("delete", s => s.delete(key));
  }

  increment(key: string, windowMs: number) {
    return this.run("increment", s => s.increment(key, windowMs));
  }
}
