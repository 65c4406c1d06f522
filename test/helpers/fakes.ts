import { vi } from "vitest";
import type { RegistryProfile, RegistrySearchFilters, RegistrySearchHit } from "../../src/adapters/RegistryAdapter.js";
import type { SanctionsEntity, SanctionsSearchOptions } from "../../src/adapters/SanctionsAdapter.js";
import type { CacheStore } from "../../src/cache/CacheStore.js";
import { CompanyIndex } from "../../src/cache/CompanyIndex.js";
import { MemoryStore } from "../../src/cache/MemoryStore.js";
import { SingleFlightCache } from "../../src/cache/SingleFlightCache.js";
import { WeightedRiskScorer } from "../../src/domain/scoring.js";
import type { ProfileResult } from "../../src/domain/types.js";
import { Orchestrator } from "../../src/orchestrator/Orchestrator.js";
import { createIdentifierHasher } from "../../src/security/pii.js";

export const FIXED_NOW = new Date("2026-01-15T09:30:00.000Z");

export function hit(id: string, name: string): RegistrySearchHit {
  return { id, name, status: "active", address: "Voorbeeldstraat 12, 1011AB, Amsterdam", legalForm: null };
}

export function registryProfile(id: string): RegistryProfile {
  return {
    id,
    name: "Voorbeeld Handel B.V.",
    status: "active",
    address: "Voorbeeldstraat 12 1011AB Amsterdam",
    legalForm: "Besloten Vennootschap",
    vatNumber: null,
    tradeNames: ["Voorbeeld"],
    sbiCodes: [{ code: "4690", description: "Groothandel", primary: true }],
    foundedOn: "2010-01-15"
  };
}

export function entity(id: string, caption: string, topics: string[] = []): SanctionsEntity {
  return {
    id,
    score: 0.9,
    caption,
    schema: "Company",
    properties: { name: [caption], topics, country: ["xx"] },
    datasets: ["test_list"]
  };
}

export function fakeRegistry() {
  return {
    name: "kvk",
    search: vi.fn(async (_name: string, _filters?: RegistrySearchFilters): Promise<RegistrySearchHit[]> => []),
    getProfileById: vi.fn(async (id: string): Promise<RegistryProfile> => registryProfile(id))
  };
}

export function fakeSanctions() {
  return {
    name: "opensanctions",
    search: vi.fn(async (_name: string, _options?: SanctionsSearchOptions): Promise<SanctionsEntity[]> => [])
  };
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (v: T) => void;
  reject: (e: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (v: T) => void = () => undefined;
  let reject: (e: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function buildOrchestrator(store: CacheStore = new MemoryStore()) {
  const registry = fakeRegistry();
  const sanctions = fakeSanctions();
  const hashIdentifier = createIdentifierHasher("test-secret");
  const orchestrator = new Orchestrator({
    registries: { NL: registry },
    sanctions,
    scorer: new WeightedRiskScorer(),
    profiles: new SingleFlightCache<ProfileResult>(store, { lockTtlMs: 1000, pollIntervalMs: 5 }),
    searches: new SingleFlightCache<RegistrySearchHit[]>(store, { lockTtlMs: 1000, pollIntervalMs: 5 }),
    companyIndex: new CompanyIndex(store),
    hashIdentifier,
    profileTtlSeconds: 86400,
    searchTtlSeconds: 900,
    now: () => FIXED_NOW
  });
  return { orchestrator, store, registry, sanctions, hashIdentifier };
}

/** A store whose every call fails, standing in for an unreachable Redis. */
export function brokenStore(): CacheStore {
  const down = async (): Promise<never> => {
    throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
  };
  return { name: "redis", get: down, set: down, setIfAbsent: down, delete: down, increment: down };
}

/** Manually advanced clock for TTL tests. */
export function manualClock(start = 0) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    }
  };
}
