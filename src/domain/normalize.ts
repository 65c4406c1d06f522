import type { CountryCode } from "./types.js";

export type NormalizedQuery = {
  isRegistrationNumber: boolean;
  isVatNumber: boolean;
  normalizedName: string;
};

export type Query = Readonly<NormalizedQuery & {
  raw: string;
  country: CountryCode;
  premium: boolean;
  includeHistory: boolean;
}>;

export type QueryInput = {
  query: string;
  country: string;
  premium?: boolean;
  includeHistory?: boolean;
};

function stripWhitespace(s: string): string {
  return s.replace(/\s+/g, "");
}

function isDigits(s: string): boolean {
  return /^\d+$/.test(s);
}

// Flags are computed independently; both may be false, neither suppresses the other.
export function normalize(raw: string): NormalizedQuery {
  const q = (raw ?? "").trim();
  const compact = stripWhitespace(q);
  return {
    isRegistrationNumber: isDigits(compact),
    isVatNumber: q.length > 2 && /^[a-zA-Z]{2}$/.test(q.slice(0, 2)) && isDigits(stripWhitespace(q.slice(2))),
    normalizedName: q.toLowerCase()
  };
}

export function normalizeCountry(country: string): CountryCode {
  return (country ?? "").trim().toUpperCase();
}

export function buildQuery(input: QueryInput): Query {
  const raw = (input.query ?? "").trim();
  return Object.freeze({
    ...normalize(raw),
    raw,
    country: normalizeCountry(input.country),
    premium: Boolean(input.premium),
    includeHistory: Boolean(input.includeHistory)
  });
}

/** Registration numbers are looked up, hashed and indexed without the spaces people type into them. */
export function compactIdentifier(id: string): string {
  return stripWhitespace((id ?? "").trim());
}

export function registrationId(query: Query): string {
  return compactIdentifier(query.raw);
}

export function profileCacheKey(query: Query): string {
  return `profile:${query.country}:${query.normalizedName}:${query.premium ? "premium" : "basic"}`;
}

export function searchCacheKey(country: CountryCode, name: string, limit: number, city?: string): string {
  const base = `search:${normalizeCountry(country)}:${normalize(name).normalizedName}:${limit}`;
  const place = normalize(city ?? "").normalizedName;
  return place ? `${base}:city:${place}` : base;
}
