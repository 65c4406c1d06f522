/**
 * Key/value store shared across requests. Values are opaque strings; all
 * cross-request mutation goes through `setIfAbsent` and `increment`, which
 * implementations must make atomic.
 */
export interface CacheStore {
  readonly name: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  /** Returns false when the key already holds a live value. */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  delete(key: string): Promise<void>;
  /** Increments a counter; the first increment arms an expiry of `windowMs`. */
  increment(key: string, windowMs: number): Promise<number>;
}

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
