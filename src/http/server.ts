import http from "http";
import { timingSafeEqual } from "crypto";
import { v4 as uuidv4 } from "uuid";
import { AdapterError, NotFoundError } from "../adapters/errors.js";
import { compactIdentifier } from "../domain/normalize.js";
import { NotFoundHttpError, RateLimitExceededError, UnauthorizedError, ValidationError } from "../errors.js";
import type { ForgetQueue } from "../jobs/forgetCompany.worker.js";
import { createLogger } from "../logging/logger.js";
import type { Orchestrator } from "../orchestrator/Orchestrator.js";
import type { RateLimiter } from "../ratelimit/RateLimiter.js";
import type { IdentifierHasher } from "../security/pii.js";
import { forgetRequestSchema, parseOrThrow, profileRequestSchema, screenParamsSchema, searchParamsSchema } from "./schemas.js";

const log = createLogger("http");

const MAX_BODY_BYTES = 64 * 1024;
const API_KEY_HEADER = "x-api-key";

export type ServerDeps = {
  orchestrator: Orchestrator;
  rateLimiter: RateLimiter;
  forgetQueue: ForgetQueue;
  hashIdentifier: IdentifierHasher;
  // Empty: the API is open.
  apiKeys: string[];
  // Empty: /forget is disabled.
  adminApiKeys: string[];
  version: string;
};

type Ctx = {
  req: http.IncomingMessage;
  url: URL;
  signal: AbortSignal;
  apiKey: string | null;
};

type Reply = { status: number; body: unknown; headers?: Record<string, string> };

function keyMatches(allowed: string[], candidate: string | null): boolean {
  if (!candidate) return false;
  const c = Buffer.from(candidate);
  let ok = false;
  for (const k of allowed) {
    const b = Buffer.from(k);
    if (b.length === c.length && timingSafeEqual(b, c)) ok = true;
  }
  return ok;
}

function headerValue(req: http.IncomingMessage, name: string): string | null {
  const v = req.headers[name];
  if (Array.isArray(v)) return v[0] ?? null;
  return v ?? null;
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new ValidationError("Request body too large");
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString("utf8");
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("Request body is not valid JSON");
  }
}

function decodeSegment(s: string): string {
  try {
    return decodeURIComponent(s);
  } catch {
    throw new ValidationError("Malformed path segment");
  }
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

function errorReply(err: unknown): Reply {
  if (err instanceof ValidationError) return { status: 400, body: { error: "invalid_request", message: err.message, issues: err.issues } };
  if (err instanceof UnauthorizedError) return { status: 401, body: { error: "unauthorized", message: err.message } };
  if (err instanceof NotFoundHttpError) return { status: 404, body: { error: "not_found", message: err.message } };
  if (err instanceof RateLimitExceededError) {
    return {
      status: 429,
      body: { error: "too_many_requests", message: err.message },
      headers: { "Retry-After": String(err.retryAfterSeconds) }
    };
  }
  // Only direct lookups and screening let adapter errors through.
  if (err instanceof NotFoundError) return { status: 404, body: { error: "not_found", message: "Company not found" } };
  if (err instanceof AdapterError) {
    const status = err.kind === "timeout" ? 504 : err.kind === "rate_limited" ? 503 : 502;
    return { status, body: { error: "upstream_unavailable", source: err.source, kind: err.kind } };
  }
  return { status: 500, body: { error: "internal_error" } };
}

export function createServer(deps: ServerDeps): http.Server {
  const startedAt = new Date().toISOString();

  async function limit(ctx: Ctx): Promise<void> {
    const identity = ctx.apiKey ?? ctx.req.socket.remoteAddress ?? "anonymous";
    if (!(await deps.rateLimiter.tryAcquire(identity))) {
      throw new RateLimitExceededError(deps.rateLimiter.windowSeconds);
    }
  }

  function authenticate(ctx: Ctx): void {
    if (deps.apiKeys.length && !keyMatches(deps.apiKeys, ctx.apiKey)) throw new UnauthorizedError();
  }

  async function route(ctx: Ctx): Promise<Reply> {
    const { req, url } = ctx;
    const path = url.pathname.replace(/\/+$/, "") || "/";

    if (req.method === "GET" && path === "/") {
      return { status: 200, body: { name: "compliance-profile-service", version: deps.version } };
    }
    if (req.method === "GET" && path === "/health") {
      return { status: 200, body: { status: "healthy", version: deps.version, startedAt, timestamp: new Date().toISOString() } };
    }

    if (req.method === "POST" && path === "/profile") {
      authenticate(ctx);
      await limit(ctx);
      const body = parseOrThrow(profileRequestSchema, await readJson(req));
      const result = await deps.orchestrator.getCompanyProfile(body, { signal: ctx.signal });
      return { status: 200, body: result };
    }

    if (req.method === "GET" && path === "/search") {
      authenticate(ctx);
      await limit(ctx);
      const params = parseOrThrow(searchParamsSchema, Object.fromEntries(url.searchParams));
      const results = await deps.orchestrator.searchRegistry(
        params.country,
        params.query,
        { limit: params.limit, city: params.city },
        { signal: ctx.signal }
      );
      return { status: 200, body: { query: params.query, count: results.length, results } };
    }

    if (req.method === "GET" && path === "/sanctions/screen") {
      authenticate(ctx);
      await limit(ctx);
      const params = parseOrThrow(screenParamsSchema, Object.fromEntries(url.searchParams));
      const screening = await deps.orchestrator.screenSanctions(params.name, { schema: params.schema, limit: params.limit });
      return { status: 200, body: screening };
    }

    const companyMatch = /^\/companies\/([^/]+)\/([^/]+)$/.exec(path);
    if (req.method === "GET" && companyMatch) {
      authenticate(ctx);
      await limit(ctx);
      const profile = await deps.orchestrator.getRegistryProfile(
        decodeSegment(companyMatch[1]),
        decodeSegment(companyMatch[2])
      );
      return { status: 200, body: profile };
    }

    if (req.method === "POST" && path === "/forget") {
      if (!deps.adminApiKeys.length || !keyMatches(deps.adminApiKeys, ctx.apiKey)) throw new UnauthorizedError("Admin API key required");
      const { companyId } = parseOrThrow(forgetRequestSchema, await readJson(req));
      const companyHash = deps.hashIdentifier(compactIdentifier(companyId));
      const jobId = await deps.forgetQueue.enqueue(companyHash);
      log.info("forget enqueued", { companyHash, jobId });
      return { status: 202, body: { status: "queued", jobId } };
    }

    throw new NotFoundHttpError(`No route for ${req.method ?? "?"} ${path}`);
  }

  return http.createServer((req, res) => {
    const requestId = uuidv4();
    const ctrl = new AbortController();
    // Client went away before we answered: stop waiting on its behalf.
    res.on("close", () => {
      if (!res.writableEnded) ctrl.abort();
    });

    const ctx: Ctx = {
      req,
      url: new URL(req.url ?? "/", "http://localhost"),
      signal: ctrl.signal,
      apiKey: headerValue(req, API_KEY_HEADER)
    };

    const send = (reply: Reply) => {
      if (res.writableEnded || res.destroyed) return;
      res.writeHead(reply.status, { "Content-Type": "application/json", "X-Request-Id": requestId, ...reply.headers });
      res.end(JSON.stringify(reply.body));
    };

    route(ctx).then(send, (err: unknown) => {
      if (isAbort(err) && ctrl.signal.aborted) {
        log.debug("client disconnected", { requestId });
        return;
      }
      const reply = errorReply(err);
      if (reply.status >= 500) log.error("request failed", { requestId, path: ctx.url.pathname, error: err });
      send(reply);
    }).catch((err: unknown) => log.error("could not write response", { requestId, error: err }));
  });
}
