import type { ErrorKind } from "../domain/types.js";

/** Base of the error taxonomy every source adapter speaks. */
export abstract class AdapterError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(public readonly source: string, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AdapterError {
  readonly kind = "not_found" as const;
}

export class RateLimitedError extends AdapterError {
  readonly kind = "rate_limited" as const;
}

export class UpstreamError extends AdapterError {
  readonly kind = "upstream" as const;

  constructor(source: string, public readonly code: number, message: string) {
    super(source, message);
  }
}

export class UpstreamTimeoutError extends AdapterError {
  readonly kind = "timeout" as const;

  constructor(source: string, public readonly timeoutMs: number) {
    super(source, `Request timeout after ${timeoutMs}ms`);
  }
}

/** Maps anything an adapter call threw onto the taxonomy. */
export function errorKindOf(err: unknown): ErrorKind {
  return err instanceof AdapterError ? err.kind : "upstream";
}
