import { v4 as uuidv4 } from "uuid";
import { createLogger } from "../logging/logger.js";
import type { CacheStore } from "./CacheStore.js";

const log = createLogger("cache");

// cache: read from the store (possibly written by another process); loaded: this
// call ran the loader; shared: joined a load already running in this process.
export type LoadSource = "cache" | "loaded" | "shared";

export type Loaded<T> = { value: T; source: LoadSource };

export type SingleFlightOptions = {
  // How long a store-level marker may be held before another process takes over.
  lockTtlMs: number;
  pollIntervalMs?: number;
};

function sleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms));
}

function abortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const e = new Error("The operation was aborted");
  e.name = "AbortError";
  return e;
}

/** Waits on `p` until it settles or `signal` fires. Never cancels `p` itself. */
function abortable<T>(p: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return p;
  if (signal.aborted) return Promise.reject(abortError(signal));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    p.then(
      (v) => { signal.removeEventListener("abort", onAbort); resolve(v); },
      (e: unknown) => { signal.removeEventListener("abort", onAbort); reject(e); }
    );
  });
}

/**
 * JSON cache over a CacheStore with single-flight loads.
 *
 * Within a process, concurrent callers for the same key share one promise.
 * Across processes, the loader runs only while holding a `lock:<key>` marker
 * taken with setIfAbsent; everyone else polls for the value or for the marker
 * to disappear. A failed load clears both markers, so the next caller retries.
 */
export class SingleFlightCache<T> {
  private readonly inflight = new Map<string, Promise<Loaded<T>>>();
  private readonly pollIntervalMs: number;

  constructor(
    private readonly store: CacheStore,
    private readonly options: SingleFlightOptions
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 50;
  }

  async get(key: string): Promise<T | null> {
    const raw = await this.store.get(key);
    if (raw === null) return null;
    try {
      const value: T = JSON.parse(raw);
      return value;
    } catch (err) {
      log.warn("dropping unreadable cache entry", { error: err });
      await this.store.delete(key);
      return null;
    }
  }

  async set(key: string, value: T, ttlMs: number): Promise<void> {
    await this.store.set(key, JSON.stringify(value), ttlMs);
  }

  async delete(key: string): Promise<void> {
    await this.store.delete(key);
  }

  /**
   * Returns the cached value for `key`, or runs `loader` once for all
   * concurrent callers and caches its result for `ttlMs`. An aborted
   * `signal` rejects this caller's wait only; the shared load carries on.
   */
  getOrLoad(key: string, ttlMs: number, loader: () => Promise<T>, signal?: AbortSignal): Promise<Loaded<T>> {
    const pending = this.inflight.get(key);
    if (pending) {
      // Each waiter gets its own copy; the leader keeps the original.
      const joined = pending.then((r): Loaded<T> => ({
        value: structuredClone(r.value),
        source: r.source === "cache" ? "cache" : "shared"
      }));
      return abortable(joined, signal);
    }

    const p = this.load(key, ttlMs, loader).finally(() => this.inflight.delete(key));
    this.inflight.set(key, p);
    return abortable(p, signal);
  }

  get inflightCount(): number {
    return this.inflight.size;
  }

  private async load(key: string, ttlMs: number, loader: () => Promise<T>): Promise<Loaded<T>> {
    const cached = await this.get(key);
    if (cached !== null) return { value: cached, source: "cache" };

    const lockKey = `lock:${key}`;
    const token = uuidv4();

    for (;;) {
      if (await this.store.setIfAbsent(lockKey, token, this.options.lockTtlMs)) {
        try {
          // The previous holder may have stored the value just before we took the marker.
          const stored = await this.get(key);
          if (stored !== null) return { value: stored, source: "cache" };

          const value = await loader();
          try {
            await this.set(key, value, ttlMs);
          } catch (err) {
            log.warn("cache write failed; returning uncached result", { error: err });
          }
          return { value, source: "loaded" };
        } finally {
          await this.store.delete(lockKey).catch((err: unknown) => log.warn("could not clear load marker", { error: err }));
        }
      }

      // Another process is loading this key.
      await sleep(this.pollIntervalMs);
      const v = await this.get(key);
      if (v !== null) return { value: v, source: "cache" };
    }
  }
}
