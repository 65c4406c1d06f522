import { systemClock, type CacheStore, type Clock } from "./CacheStore.js";

type Entry = { value: string; expiresAt: number };

/** Process-lifetime store. Expiry is lazy: checked when a key is read. */
export class MemoryStore implements CacheStore {
  readonly name = "memory";
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: Clock = systemClock) {}

  private live(key: string): Entry | undefined {
    const e = this.entries.get(key);
    if (!e) return undefined;
    if (e.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return e;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key)) return false;
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    return true;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async increment(key: string, windowMs: number): Promise<number> {
    const e = this.live(key);
    if (!e) {
      this.entries.set(key, { value: "1", expiresAt: this.now() + windowMs });
      return 1;
    }
    const n = (parseInt(e.value, 10) || 0) + 1;
    e.value = String(n);
    return n;
  }

  get size(): number {
    return this.entries.size;
  }
}
