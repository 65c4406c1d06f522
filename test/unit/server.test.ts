import type http from "http";
import { afterEach, describe, expect, it } from "vitest";
import { NotFoundError, UpstreamTimeoutError } from "../../src/adapters/errors.js";
import { createApp, VERSION } from "../../src/app.js";
import { CompanyIndex } from "../../src/cache/CompanyIndex.js";
import { MemoryStore } from "../../src/cache/MemoryStore.js";
import { loadConfig } from "../../src/config/env.js";
import { createServer } from "../../src/http/server.js";
import { InlineForgetQueue } from "../../src/jobs/forgetCompany.worker.js";
import { setLogLevel } from "../../src/logging/logger.js";
import { fakeRegistry, fakeSanctions, hit } from "../helpers/fakes.js";

const API_KEY = "test-key";
const ADMIN_KEY = "test-admin-key";

let server: http.Server | null = null;

async function start(env: Record<string, string> = {}) {
  const config = loadConfig({ PII_HASH_KEY: "test-secret", KVK_API_KEY: "test-key", OPENSANCTIONS_API_KEY: "test-key", ...env });
  const store = new MemoryStore();
  const registry = fakeRegistry();
  const sanctions = fakeSanctions();
  const forgetQueue = new InlineForgetQueue(new CompanyIndex(store));
  const app = createApp(config, { store, registries: { NL: registry }, sanctions, forgetQueue });

  const s = createServer({
    orchestrator: app.orchestrator,
    rateLimiter: app.rateLimiter,
    forgetQueue: app.forgetQueue,
    hashIdentifier: app.hashIdentifier,
    apiKeys: [API_KEY],
    adminApiKeys: [ADMIN_KEY],
    version: VERSION
  });
  server = s;
  await new Promise<void>((resolve) => s.listen(0, "127.0.0.1", resolve));
  const address = s.address();
  if (!address || typeof address === "string") throw new Error("server is not listening on a TCP port");
  return { base: `http://127.0.0.1:${address.port}`, app, store, registry, sanctions, forgetQueue };
}

function post(url: string, body: unknown, key: string | null = API_KEY): Promise<Response> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (key) headers["X-API-Key"] = key;
  return fetch(url, { method: "POST", headers, body: typeof body === "string" ? body : JSON.stringify(body) });
}

function get(url: string, key: string | null = API_KEY): Promise<Response> {
  return fetch(url, { headers: key ? { "X-API-Key": key } : {} });
}

describe("HTTP server", () => {
  setLogLevel("error");

  afterEach(async () => {
    const s = server;
    server = null;
    if (!s) return;
    s.closeAllConnections();
    await new Promise<void>((resolve) => s.close(() => resolve()));
  });

  it("reports health without a key", async () => {
    const { base } = await start();
    const res = await get(`${base}/health`, null);

    expect(res.status).toBe(200);
    expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    expect(await res.json()).toMatchObject({ status: "healthy", version: VERSION });
  });

  it("names the service at the root", async () => {
    const { base } = await start();
    expect(await (await get(`${base}/`, null)).json()).toEqual({ name: "compliance-profile-service", version: VERSION });
  });

  it("rejects a missing or unknown API key", async () => {
    const { base, registry } = await start();

    const missing = await post(`${base}/profile`, { country: "NL", query: "Voorbeeld" }, null);
    const wrong = await post(`${base}/profile`, { country: "NL", query: "Voorbeeld" }, "test-wrong-key");

    expect(missing.status).toBe(401);
    expect(await missing.json()).toEqual({ error: "unauthorized", message: "Invalid API key" });
    expect(wrong.status).toBe(401);
    expect(registry.search).not.toHaveBeenCalled();
  });

  it("returns a profile", async () => {
    const { base, registry } = await start();
    registry.search.mockResolvedValue([hit("68750110", "Voorbeeld Handel B.V.")]);

    const res = await post(`${base}/profile`, { country: "nl", query: "Voorbeeld Handel" });

    expect(res.status).toBe(200);
    expect(registry.search).toHaveBeenCalledWith("voorbeeld handel");
    expect(await res.json()).toMatchObject({
      company: { registrationNumber: "68750110", country: "NL" },
      basicChecks: { regVerified: true },
      degraded: []
    });
  });

  it("validates the body", async () => {
    const { base } = await start();

    const badCountry = await post(`${base}/profile`, { country: "Netherlands", query: "x" });
    expect(badCountry.status).toBe(400);
    expect(await badCountry.json()).toEqual({
      error: "invalid_request",
      message: "Invalid request",
      issues: ["country: country must be a two-letter code"]
    });

    const notJson = await post(`${base}/profile`, "{");
    expect(notJson.status).toBe(400);
    expect(await notJson.json()).toMatchObject({ message: "Request body is not valid JSON" });
  });

  it("limits requests per key", async () => {
    const { base } = await start({ RATE_LIMIT_TOKENS: "2", RATE_LIMIT_WINDOW_SECONDS: "60" });

    expect((await post(`${base}/profile`, { country: "NL", query: "a" })).status).toBe(200);
    expect((await post(`${base}/profile`, { country: "NL", query: "b" })).status).toBe(200);
    const limited = await post(`${base}/profile`, { country: "NL", query: "c" });

    expect(limited.status).toBe(429);
    expect(limited.headers.get("retry-after")).toBe("60");
    expect(await limited.json()).toEqual({ error: "too_many_requests", message: "Too many requests" });
  });

  it("searches the registry", async () => {
    const { base, registry } = await start();
    registry.search.mockResolvedValue([hit("68750110", "Voorbeeld Handel B.V.")]);

    const res = await get(`${base}/search?country=NL&query=Voorbeeld&limit=5`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ query: "Voorbeeld", count: 1, results: [hit("68750110", "Voorbeeld Handel B.V.")] });
    expect(registry.search).toHaveBeenCalledWith("voorbeeld", { limit: 5 });
  });

  it("filters the search by city", async () => {
    const { base, registry } = await start();

    const res = await get(`${base}/search?country=NL&query=Voorbeeld&city=Amsterdam`);

    expect(res.status).toBe(200);
    expect(registry.search).toHaveBeenCalledWith("voorbeeld", { limit: 10, city: "Amsterdam" });
  });

  it("rejects a search for an unsupported country", async () => {
    const { base } = await start();
    const res = await get(`${base}/search?country=BE&query=Voorbeeld`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "invalid_request", message: "Unsupported country: BE", issues: [] });
  });

  it("maps direct lookup errors to HTTP statuses", async () => {
    const { base, registry } = await start();

    const ok = await get(`${base}/companies/NL/68750110`);
    expect(ok.status).toBe(200);
    expect(await ok.json()).toMatchObject({ id: "68750110", legalForm: "Besloten Vennootschap" });

    registry.getProfileById.mockRejectedValueOnce(new NotFoundError("kvk", "Resource not found"));
    const missing = await get(`${base}/companies/NL/99999999`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "not_found", message: "Company not found" });

    registry.getProfileById.mockRejectedValueOnce(new UpstreamTimeoutError("kvk", 30000));
    const slow = await get(`${base}/companies/NL/68750110`);
    expect(slow.status).toBe(504);
    expect(await slow.json()).toEqual({ error: "upstream_unavailable", source: "kvk", kind: "timeout" });
  });

  it("screens a name against sanctions", async () => {
    const { base, sanctions } = await start();

    const res = await get(`${base}/sanctions/screen?name=Voorbeeld%20Handel`);

    expect(res.status).toBe(200);
    expect(sanctions.search).toHaveBeenCalledWith("voorbeeld handel", { schema: "LegalEntity", limit: 10 });
    expect(await res.json()).toMatchObject({
      query: "voorbeeld handel",
      totalMatches: 0,
      matches: [],
      riskScore: { score: 0, reasons: ["no-risk-indicators"] },
      riskLevel: "low"
    });
  });

  it("requires a key and a name to screen", async () => {
    const { base, sanctions } = await start();

    expect((await get(`${base}/sanctions/screen?name=Voorbeeld`, null)).status).toBe(401);
    const missing = await get(`${base}/sanctions/screen`);
    expect(missing.status).toBe(400);
    expect(await missing.json()).toMatchObject({ error: "invalid_request", issues: ["name: Required"] });
    expect(sanctions.search).not.toHaveBeenCalled();
  });

  it("answers unknown routes with 404", async () => {
    const { base } = await start();
    const res = await get(`${base}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not_found", message: "No route for GET /nope" });
  });

  it("queues a forget request for admins and evicts the cached profile", async () => {
    const { base, app, store, registry, forgetQueue } = await start();
    registry.search.mockResolvedValue([hit("68750110", "Voorbeeld Handel B.V.")]);
    await post(`${base}/profile`, { country: "NL", query: "Voorbeeld Handel" });
    expect(await store.get("profile:NL:voorbeeld handel:basic")).not.toBeNull();

    const denied = await post(`${base}/forget`, { companyId: "68750110" });
    expect(denied.status).toBe(401);
    expect(await denied.json()).toEqual({ error: "unauthorized", message: "Admin API key required" });

    // Spaces typed into the number do not change which company is forgotten.
    const res = await post(`${base}/forget`, { companyId: " 6875 0110 " }, ADMIN_KEY);
    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({ status: "queued", jobId: `forget-${app.hashIdentifier("68750110")}` });

    await forgetQueue.drain();
    expect(await store.get("profile:NL:voorbeeld handel:basic")).toBeNull();
  });
});
