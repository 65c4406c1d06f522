import { z } from "zod";
import type { AdapterConfig } from "../config/env.js";
import type { CompanyStatus, SbiCode } from "../domain/types.js";
import { NotFoundError, UpstreamError } from "./errors.js";
import { getJson, type FetchLike } from "./http.js";
import type { RegistryAdapter, RegistryProfile, RegistrySearchFilters, RegistrySearchHit } from "./RegistryAdapter.js";

const SOURCE = "kvk";

const kvkAddress = z.object({
  volledigAdres: z.string().optional(),
  straatnaam: z.string().optional(),
  huisnummer: z.union([z.number(), z.string()]).optional(),
  postcode: z.string().optional(),
  plaats: z.string().optional(),
  land: z.string().optional()
});

const searchResponse = z.object({
  resultaten: z.array(z.object({
    kvkNummer: z.string(),
    naam: z.string().optional(),
    handelsnaam: z.string().optional(),
    type: z.string().optional(),
    actief: z.string().optional(),
    adres: z.object({ binnenlandsAdres: kvkAddress.optional() }).optional()
  })).default([])
});

const basisprofielResponse = z.object({
  kvkNummer: z.string(),
  naam: z.string().optional(),
  statutaireNaam: z.string().optional(),
  handelsnamen: z.array(z.object({ naam: z.string() })).default([]),
  sbiActiviteiten: z.array(z.object({
    sbiCode: z.string(),
    sbiOmschrijving: z.string().optional(),
    indHoofdactiviteit: z.string().optional()
  })).default([]),
  materieleRegistratie: z.object({
    datumAanvang: z.string().optional(),
    datumEinde: z.string().optional()
  }).optional(),
  _embedded: z.object({
    hoofdvestiging: z.object({ adressen: z.array(kvkAddress).default([]) }).optional(),
    eigenaar: z.object({ rechtsvorm: z.string().optional(), uitgebreideRechtsvorm: z.string().optional() }).optional()
  }).optional()
});

type KvkAddress = z.infer<typeof kvkAddress>;

function formatAddress(a?: KvkAddress): string | null {
  if (!a) return null;
  if (a.volledigAdres) return a.volledigAdres.replace(/\s+/g, " ").trim();
  const street = [a.straatnaam, a.huisnummer].filter(x => x !== undefined && x !== "").join(" ");
  const parts = [street, a.postcode, a.plaats].filter(Boolean);
  return parts.length ? parts.join(", ") : null;
}

function statusFromActief(actief?: string): CompanyStatus {
  if (!actief) return "unknown";
  return actief.toLowerCase() === "ja" ? "active" : "inactive";
}

// KvK dates come as yyyymmdd.
function isoDate(d?: string): string | null {
  if (!d || !/^\d{8}$/.test(d)) return null;
  return `${d.slice(0, 4)}-${d.slice(4, 6)}-${d.slice(6, 8)}`;
}

function parse<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): z.infer<S> {
  const r = schema.safeParse(body);
  if (!r.success) throw new UpstreamError(SOURCE, 200, `Unexpected ${what} payload: ${r.error.issues[0]?.message ?? "invalid"}`);
  return r.data;
}

/** Dutch Chamber of Commerce (KvK) registry. */
export class KvkRegistryAdapter implements RegistryAdapter {
  readonly name = SOURCE;

  constructor(
    private readonly config: AdapterConfig,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  private request(path: string, params: Record<string, string | number> = {}): Promise<unknown> {
    const url = new URL(`${this.config.baseUrl.replace(/\/$/, "")}${path}`);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, String(v));
    return getJson({
      source: SOURCE,
      url: url.toString(),
      headers: { apikey: this.config.apiKey },
      timeoutMs: this.config.timeoutMs,
      fetchImpl: this.fetchImpl
    });
  }

  async search(name: string, filters: RegistrySearchFilters = {}): Promise<RegistrySearchHit[]> {
    const params: Record<string, string | number> = {
      naam: name,
      resultatenPerPagina: Math.min(filters.limit ?? 10, 100)
    };
    if (filters.city) params.plaats = filters.city;

    let payload: unknown;
    try {
      payload = await this.request("/v2/zoeken", params);
    } catch (err) {
      // KvK answers 404 for a search without results; a free-text search is never "not found".
      if (err instanceof NotFoundError) return [];
      throw err;
    }

    const body = parse(searchResponse, payload, "search");
    return body.resultaten.map(r => ({
      id: r.kvkNummer,
      name: r.naam ?? r.handelsnaam ?? "",
      status: statusFromActief(r.actief),
      address: formatAddress(r.adres?.binnenlandsAdres),
      legalForm: null
    }));
  }

  async getProfileById(id: string): Promise<RegistryProfile> {
    const bp = parse(basisprofielResponse, await this.request(`/v1/basisprofielen/${encodeURIComponent(id)}`), "basisprofiel");
    const owner = bp._embedded?.eigenaar;
    const sbiCodes: SbiCode[] = bp.sbiActiviteiten.map(s => ({
      code: s.sbiCode,
      description: s.sbiOmschrijving ?? null,
      primary: (s.indHoofdactiviteit ?? "").toLowerCase() === "ja"
    }));

    return {
      id: bp.kvkNummer,
      name: bp.naam ?? bp.statutaireNaam ?? "",
      status: bp.materieleRegistratie?.datumEinde ? "dissolved" : "active",
      address: formatAddress(bp._embedded?.hoofdvestiging?.adressen[0]),
      legalForm: owner?.uitgebreideRechtsvorm ?? owner?.rechtsvorm ?? null,
      // The basisprofiel carries no VAT number; callers leave it unset.
      vatNumber: null,
      tradeNames: bp.handelsnamen.map(h => h.naam),
      sbiCodes,
      foundedOn: isoDate(bp.materieleRegistratie?.datumAanvang)
    };
  }
}
