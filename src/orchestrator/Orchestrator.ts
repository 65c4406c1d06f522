import { NotFoundError } from "../adapters/errors.js";
import type { RegistryAdapter, RegistryProfile, RegistrySearchHit } from "../adapters/RegistryAdapter.js";
import type { SanctionsAdapter, SanctionsEntity } from "../adapters/SanctionsAdapter.js";
import { AuditBuilder, cacheHitAudit } from "../audit/AuditBuilder.js";
import type { CompanyIndex } from "../cache/CompanyIndex.js";
import type { SingleFlightCache } from "../cache/SingleFlightCache.js";
import { buildQuery, compactIdentifier, normalize, profileCacheKey, registrationId, searchCacheKey, type Query, type QueryInput } from "../domain/normalize.js";
import { NO_AUXILIARY_SIGNALS, riskLevel, type RiskScorer } from "../domain/scoring.js";
import {
  emptyProfile,
  emptySanctions,
  type BasicChecks,
  type CompanyProfile,
  type CountryCode,
  type ProfileResult,
  type SanctionsMatch,
  type SanctionsScreening,
  type SanctionsSection,
  type Section
} from "../domain/types.js";
import { ValidationError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import type { IdentifierHasher } from "../security/pii.js";
import { settle, type Outcome } from "./outcome.js";

const log = createLogger("orchestrator");

const SANCTIONS_SCHEMA = "LegalEntity";
const SANCTIONS_LIMIT = 10;

export type OrchestratorDeps = {
  // Keyed by upper-case country code.
  registries: Record<CountryCode, RegistryAdapter>;
  sanctions: SanctionsAdapter;
  scorer: RiskScorer;
  profiles: SingleFlightCache<ProfileResult>;
  searches: SingleFlightCache<RegistrySearchHit[]>;
  companyIndex: CompanyIndex;
  hashIdentifier: IdentifierHasher;
  profileTtlSeconds: number;
  searchTtlSeconds: number;
  now?: () => Date;
};

export type RegistrySearchParams = {
  limit: number;
  city?: string;
};

export type ScreeningParams = {
  schema?: string;
  limit?: number;
};

export type CallOptions = {
  // Cancels this caller's wait only; a shared upstream load keeps running.
  signal?: AbortSignal;
};

type RegistryLookup =
  | { kind: "profile"; profile: RegistryProfile }
  | { kind: "not_found" }
  | { kind: "search"; hits: RegistrySearchHit[] }
  | { kind: "unsupported" };

function toMatch(source: string, e: SanctionsEntity): SanctionsMatch {
  return {
    source,
    entityId: e.id,
    confidence: e.score,
    matchedName: e.caption,
    raw: {
      schema: e.schema,
      topics: e.properties.topics,
      countries: e.properties.country,
      datasets: e.datasets
    }
  };
}

function fromRegistryHit(company: CompanyProfile, hit: RegistrySearchHit): void {
  company.name = hit.name || null;
  company.registrationNumber = hit.id;
  company.status = hit.status;
  company.registeredAddress = hit.address;
  company.legalForm = hit.legalForm;
}

export class Orchestrator {
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  registryFor(country: CountryCode): RegistryAdapter | undefined {
    return Object.prototype.hasOwnProperty.call(this.deps.registries, country)
      ? this.deps.registries[country]
      : undefined;
  }

  /**
   * Best-effort company profile. Registry and sanctions are queried
   * concurrently; a failing source leaves its section at defaults and is
   * listed in `degraded`, it never fails the call. Results, degraded ones
   * included, are cached under the profile TTL.
   */
  async getCompanyProfile(input: QueryInput | Query, options: CallOptions = {}): Promise<ProfileResult> {
    const query = "raw" in input ? input : buildQuery(input);
    const key = profileCacheKey(query);

    const { value, source } = await this.deps.profiles.getOrLoad(
      key,
      this.deps.profileTtlSeconds * 1000,
      () => this.assemble(query, key),
      options.signal
    );

    // Values read from the store, ours or another process's, cost no upstream call.
    if (source === "cache") {
      log.debug("profile cache hit", { key: this.deps.hashIdentifier(key) });
      return { ...value, audit: cacheHitAudit() };
    }
    return value;
  }

  private async assemble(query: Query, key: string): Promise<ProfileResult> {
    const audit = new AuditBuilder();
    const company = emptyProfile(query.country);
    const basicChecks: BasicChecks = { vatValid: null, regVerified: false, lastDataPull: this.now().toISOString() };
    let sanctions: SanctionsSection = emptySanctions();
    const degraded: Section[] = [];

    const [registryOutcome, sanctionsOutcome] = await Promise.all([
      settle(() => this.lookupRegistry(query)),
      settle(() => this.deps.sanctions.search(query.normalizedName, { schema: SANCTIONS_SCHEMA, limit: SANCTIONS_LIMIT }))
    ]);

    this.mergeRegistry(registryOutcome, company, basicChecks, audit, degraded);

    if (sanctionsOutcome.status === "ok") {
      const matches = sanctionsOutcome.value.map(e => toMatch(this.deps.sanctions.name, e));
      sanctions = { hitsCount: matches.length, matches };
      audit.addSource("sanctions").recordCall("sanctions", { resultCount: matches.length });
    } else {
      audit.recordDegraded("sanctions", sanctionsOutcome.kind);
      degraded.push("sanctions");
      log.warn("sanctions source degraded", { kind: sanctionsOutcome.kind, error: sanctionsOutcome.error });
    }

    const riskScore = this.deps.scorer.score(company, sanctions, NO_AUXILIARY_SIGNALS);
    const result: ProfileResult = { company, basicChecks, sanctions, riskScore, audit: audit.toRecord(), degraded };

    if (company.registrationNumber) {
      // Lets a forget request find this entry; losing the index only delays eviction to TTL.
      await this.deps.companyIndex
        .add(this.deps.hashIdentifier(compactIdentifier(company.registrationNumber)), key, this.deps.profileTtlSeconds * 1000)
        .catch((err: unknown) => log.warn("company index write failed", { error: err }));
    }

    log.info("profile assembled", {
      key: this.deps.hashIdentifier(key),
      degraded,
      audit: audit.toLogView()
    });
    return result;
  }

  private async lookupRegistry(query: Query): Promise<RegistryLookup> {
    const registry = this.registryFor(query.country);
    if (!registry) return { kind: "unsupported" };

    if (query.isRegistrationNumber && query.premium) {
      try {
        return { kind: "profile", profile: await registry.getProfileById(registrationId(query)) };
      } catch (err) {
        if (err instanceof NotFoundError) return { kind: "not_found" };
        throw err;
      }
    }

    return { kind: "search", hits: await registry.search(query.normalizedName) };
  }

  private mergeRegistry(
    outcome: Outcome<RegistryLookup>,
    company: CompanyProfile,
    checks: BasicChecks,
    audit: AuditBuilder,
    degraded: Section[]
  ): void {
    if (outcome.status === "degraded") {
      audit.recordDegraded("registry", outcome.kind);
      degraded.push("registry");
      log.warn("registry source degraded", { kind: outcome.kind, error: outcome.error });
      return;
    }

    const lookup = outcome.value;
    switch (lookup.kind) {
      case "unsupported":
        audit.addSource("registry:unsupported_country");
        return;
      case "not_found":
        audit.recordCall("registry_profile", { fetched: false, notFound: true });
        return;
      case "profile": {
        const p = lookup.profile;
        fromRegistryHit(company, p);
        company.vatNumber = p.vatNumber;
        company.sbiCodes = p.sbiCodes;
        checks.regVerified = true;
        audit.addSource(`registry:profile:${p.id}`).recordCall("registry_profile", { fetched: true });
        return;
      }
      case "search": {
        const n = lookup.hits.length;
        audit.recordCall("registry_search", { resultCount: n, ambiguous: n > 1 });
        if (n === 1) {
          fromRegistryHit(company, lookup.hits[0]);
          checks.regVerified = true;
          audit.addSource(`registry:search:${lookup.hits[0].id}`);
        } else {
          // Never pick among several candidates.
          audit.addSource(`registry:search:unresolved:${n}`);
        }
        return;
      }
    }
  }

  /** Free-text registry search, cached under the short search TTL. */
  async searchRegistry(
    country: string,
    name: string,
    params: RegistrySearchParams,
    options: CallOptions = {}
  ): Promise<RegistrySearchHit[]> {
    const q = buildQuery({ country, query: name });
    const registry = this.registryFor(q.country);
    if (!registry) throw new ValidationError(`Unsupported country: ${q.country}`);
    if (!q.normalizedName) return [];

    const { limit } = params;
    const city = params.city?.trim() || undefined;
    const { value } = await this.deps.searches.getOrLoad(
      searchCacheKey(q.country, q.normalizedName, limit, city),
      this.deps.searchTtlSeconds * 1000,
      () => registry.search(q.normalizedName, city ? { limit, city } : { limit }),
      options.signal
    );
    return value;
  }

  /**
   * Sanctions screening of a bare name, without a registry lookup. Adapter
   * errors propagate: there is no other section to fall back on.
   */
  async screenSanctions(name: string, params: ScreeningParams = {}): Promise<SanctionsScreening> {
    const query = normalize(name).normalizedName;
    if (!query) throw new ValidationError("Name to screen is empty");

    const entities = await this.deps.sanctions.search(query, {
      schema: params.schema ?? SANCTIONS_SCHEMA,
      limit: params.limit ?? SANCTIONS_LIMIT
    });
    const matches = entities.map(e => toMatch(this.deps.sanctions.name, e));
    const riskScore = this.deps.scorer.scoreSanctions({ hitsCount: matches.length, matches });

    log.info("sanctions screened", { matches: matches.length, score: riskScore.score });
    return {
      query,
      totalMatches: matches.length,
      matches,
      riskScore,
      riskLevel: riskLevel(riskScore.score),
      checkedAt: this.now().toISOString()
    };
  }

  /** Direct registry lookup. Unlike getCompanyProfile, NotFound and upstream errors propagate. */
  async getRegistryProfile(country: string, id: string): Promise<RegistryProfile> {
    const q = buildQuery({ country, query: id });
    const registry = this.registryFor(q.country);
    if (!registry) throw new ValidationError(`Unsupported country: ${q.country}`);
    return registry.getProfileById(registrationId(q));
  }
}
