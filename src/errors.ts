/** Missing or malformed configuration. Thrown once at startup, never per request. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The caller spent its request budget for the current window. */
export class RateLimitExceededError extends Error {
  constructor(public readonly retryAfterSeconds: number) {
    super("Too many requests");
    this.name = "RateLimitExceededError";
  }
}

export class ValidationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = "ValidationError";
  }
}

export class UnauthorizedError extends Error {
  constructor(message = "Invalid API key") {
    super(message);
    this.name = "UnauthorizedError";
  }
}

export class NotFoundHttpError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundHttpError";
  }
}
