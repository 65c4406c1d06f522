import { z } from "zod";
import type { AdapterConfig } from "../config/env.js";
import { UpstreamError } from "./errors.js";
import { getJson, type FetchLike } from "./http.js";
import type { SanctionsAdapter, SanctionsEntity, SanctionsSearchOptions } from "./SanctionsAdapter.js";

const SOURCE = "opensanctions";

// Used when the search endpoint does not score a result.
const DEFAULT_SCORE = 0.8;

const strings = z.array(z.string()).default([]);

const searchResponse = z.object({
  results: z.array(z.object({
    id: z.string(),
    caption: z.string().default(""),
    schema: z.string().optional(),
    score: z.number().optional(),
    datasets: strings,
    properties: z.object({
      name: strings,
      topics: strings,
      country: strings
    }).default({})
  })).default([])
});

function clamp01(n: number): number {
  return Math.max(0, Math.min(1, n));
}

export class OpenSanctionsAdapter implements SanctionsAdapter {
  readonly name = SOURCE;

  constructor(
    private readonly config: AdapterConfig & { dataset: string },
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async search(name: string, options: SanctionsSearchOptions = {}): Promise<SanctionsEntity[]> {
    const url = new URL(`${this.config.baseUrl.replace(/\/$/, "")}/search/${encodeURIComponent(this.config.dataset)}`);
    url.searchParams.set("q", name);
    url.searchParams.set("schema", options.schema ?? "LegalEntity");
    url.searchParams.set("limit", String(options.limit ?? 10));
    if (options.datasets?.length) url.searchParams.set("datasets", options.datasets.join(","));

    const body = await getJson({
      source: SOURCE,
      url: url.toString(),
      headers: { Authorization: `Bearer ${this.config.apiKey}` },
      timeoutMs: this.config.timeoutMs,
      fetchImpl: this.fetchImpl
    });

    const parsed = searchResponse.safeParse(body);
    if (!parsed.success) throw new UpstreamError(SOURCE, 200, "Unexpected search payload");

    return parsed.data.results.map(r => ({
      id: r.id,
      score: clamp01(r.score ?? DEFAULT_SCORE),
      caption: r.caption || r.properties.name[0] || "Unknown",
      schema: r.schema ?? null,
      properties: r.properties,
      datasets: r.datasets
    }));
  }
}
