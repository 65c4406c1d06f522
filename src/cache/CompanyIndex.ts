import type { CacheStore } from "./CacheStore.js";

function indexKey(companyHash: string): string {
  return `company:${companyHash}`;
}

function parseKeys(raw: string | null): string[] {
  if (!raw) return [];
  try {
    const v: unknown = JSON.parse(raw);
    return Array.isArray(v) ? v.filter((k): k is string => typeof k === "string") : [];
  } catch {
    return [];
  }
}

/**
 * Hashed company id -> cache keys holding a profile of that company, so a
 * forget request can evict every cached copy. Appends are read-modify-write;
 * concurrent appends for one company are last-writer-wins.
 */
export class CompanyIndex {
  constructor(private readonly store: CacheStore) {}

  async add(companyHash: string, cacheKey: string, ttlMs: number): Promise<void> {
    const key = indexKey(companyHash);
    const keys = parseKeys(await this.store.get(key));
    if (!keys.includes(cacheKey)) keys.push(cacheKey);
    await this.store.set(key, JSON.stringify(keys), ttlMs);
  }

  async keysFor(companyHash: string): Promise<string[]> {
    return parseKeys(await this.store.get(indexKey(companyHash)));
  }

  /** Deletes every indexed entry and the index itself; returns how many entries were dropped. */
  async evict(companyHash: string): Promise<number> {
    const keys = await this.keysFor(companyHash);
    for (const k of keys) await this.store.delete(k);
    await this.store.delete(indexKey(companyHash));
    return keys.length;
  }
}
