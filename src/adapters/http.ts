import { RateLimitedError, NotFoundError, UpstreamError, UpstreamTimeoutError } from "./errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type JsonRequest = {
  source: string;
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
  fetchImpl: FetchLike;
};

/**
 * GET a JSON document with a hard timeout and map HTTP failures onto the
 * adapter error taxonomy. Never retries; that is the caller's call.
 */
export async function getJson(req: JsonRequest): Promise<unknown> {
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), req.timeoutMs);

  try {
    let res: Response;
    try {
      res = await req.fetchImpl(req.url, {
        method: "GET",
        headers: { Accept: "application/json", ...req.headers },
        signal: ctrl.signal
      });
    } catch (e) {
      if (ctrl.signal.aborted) throw new UpstreamTimeoutError(req.source, req.timeoutMs);
      throw new UpstreamError(req.source, 0, `HTTP error: ${e instanceof Error ? e.message : String(e)}`);
    }

    if (res.status === 404) throw new NotFoundError(req.source, `Resource not found: ${new URL(req.url).pathname}`);
    if (res.status === 429) throw new RateLimitedError(req.source, `${req.source} rate limit exceeded`);
    if (!res.ok) throw new UpstreamError(req.source, res.status, `${req.source} ${res.status}: ${await res.text()}`);

    try {
      return await res.json();
    } catch {
      if (ctrl.signal.aborted) throw new UpstreamTimeoutError(req.source, req.timeoutMs);
      throw new UpstreamError(req.source, res.status, `${req.source} returned invalid JSON`);
    }
  } finally {
    clearTimeout(t);
  }
}
