import { Redis } from "ioredis";
import { KvkRegistryAdapter } from "./adapters/KvkRegistryAdapter.js";
import { OpenSanctionsAdapter } from "./adapters/OpenSanctionsAdapter.js";
import type { RegistryAdapter, RegistrySearchHit } from "./adapters/RegistryAdapter.js";
import type { SanctionsAdapter } from "./adapters/SanctionsAdapter.js";
import type { CacheStore } from "./cache/CacheStore.js";
import { CompanyIndex } from "./cache/CompanyIndex.js";
import { FallbackStore } from "./cache/FallbackStore.js";
import { MemoryStore } from "./cache/MemoryStore.js";
import { RedisStore } from "./cache/RedisStore.js";
import { SingleFlightCache } from "./cache/SingleFlightCache.js";
import type { AppConfig } from "./config/env.js";
import { WeightedRiskScorer, type RiskScorer } from "./domain/scoring.js";
import type { ProfileResult } from "./domain/types.js";
import { InlineForgetQueue, type ForgetQueue } from "./jobs/forgetCompany.worker.js";
import { BullForgetQueue, createForgetQueue } from "./jobs/queues.js";
import { createLogger } from "./logging/logger.js";
import { Orchestrator } from "./orchestrator/Orchestrator.js";
import { RateLimiter } from "./ratelimit/RateLimiter.js";
import { createIdentifierHasher, type IdentifierHasher } from "./security/pii.js";

const log = createLogger("app");

export const VERSION = "0.1.0";

/**
 * BullMQ needs connections that retry forever; the cache and rate limiter
 * need commands that fail fast so the fallback paths kick in.
 */
export function createRedis(url: string, purpose: "store" | "queue"): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: purpose === "queue" ? null : 1,
    commandTimeout: purpose === "queue" ? undefined : 1000,
    connectTimeout: 5000,
    retryStrategy: (times) => Math.min(times * 50, 2000)
  });
  redis.on("error", (err) => log.warn("redis connection error", { purpose, error: err }));
  return redis;
}

export type AppOverrides = {
  store?: CacheStore;
  registries?: Record<string, RegistryAdapter>;
  sanctions?: SanctionsAdapter;
  scorer?: RiskScorer;
  forgetQueue?: ForgetQueue;
};

export type App = {
  orchestrator: Orchestrator;
  rateLimiter: RateLimiter;
  forgetQueue: ForgetQueue;
  hashIdentifier: IdentifierHasher;
  store: CacheStore;
  close(): Promise<void>;
};

/**
 * Wires every component from one config object. With a Redis URL the cache
 * and rate limiter share Redis (cache falling back to memory); without one
 * everything is process-local and forget jobs run inline.
 */
export function createApp(config: AppConfig, overrides: AppOverrides = {}): App {
  const hashIdentifier = createIdentifierHasher(config.piiHashKey);
  const redis = !overrides.store && config.redisUrl ? createRedis(config.redisUrl, "store") : null;
  const queueRedis = redis && config.redisUrl && !overrides.forgetQueue ? createRedis(config.redisUrl, "queue") : null;

  // The rate limiter talks to the shared store directly so an outage fails open.
  const sharedStore: CacheStore = overrides.store ?? (redis ? new RedisStore(redis) : new MemoryStore());
  const cacheStore: CacheStore = redis ? new FallbackStore(sharedStore) : sharedStore;

  const companyIndex = new CompanyIndex(cacheStore);
  const singleFlight = { lockTtlMs: config.cache.lockTtlMs };

  let bullQueue: BullForgetQueue | null = null;
  let forgetQueue: ForgetQueue;
  if (overrides.forgetQueue) forgetQueue = overrides.forgetQueue;
  else if (queueRedis) forgetQueue = bullQueue = new BullForgetQueue(createForgetQueue(queueRedis));
  else forgetQueue = new InlineForgetQueue(companyIndex);

  const orchestrator = new Orchestrator({
    registries: overrides.registries ?? { NL: new KvkRegistryAdapter(config.kvk) },
    sanctions: overrides.sanctions ?? new OpenSanctionsAdapter(config.openSanctions),
    scorer: overrides.scorer ?? new WeightedRiskScorer(),
    profiles: new SingleFlightCache<ProfileResult>(cacheStore, singleFlight),
    searches: new SingleFlightCache<RegistrySearchHit[]>(cacheStore, singleFlight),
    companyIndex,
    hashIdentifier,
    profileTtlSeconds: config.cache.profileTtlSeconds,
    searchTtlSeconds: config.cache.searchTtlSeconds
  });

  return {
    orchestrator,
    rateLimiter: new RateLimiter(sharedStore, config.rateLimit, hashIdentifier),
    forgetQueue,
    hashIdentifier,
    store: cacheStore,
    async close() {
      if (bullQueue) await bullQueue.close();
      if (queueRedis) await queueRedis.quit();
      if (redis) await redis.quit();
    }
  };
}
