import { createHmac } from "crypto";

export const REDACTED = "[REDACTED]";

// Order matters: emails and VAT ids go before the digit-run pattern, which would otherwise eat their digits.
const PII_PATTERNS: RegExp[] = [
  /[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+/g, // email
  /\b[A-Z]{2}\s*\d{8,}\b/g, // VAT-style identifier
  /\+?\d[\d\-\s]{6,}\d/g // phone, or any long digit run such as a registry id
];

export function redact(text: string): string {
  if (!text) return text;
  let out = text;
  for (const re of PII_PATTERNS) out = out.replace(re, REDACTED);
  return out;
}

/** Deep copy of `value` with every string passed through `redact`. */
export function redactValue(value: unknown): unknown {
  if (typeof value === "string") return redact(value);
  if (Array.isArray(value)) return value.map(redactValue);
  if (value instanceof Error) return { name: value.name, message: redact(value.message) };
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = redactValue(v);
    return out;
  }
  return value;
}

export type IdentifierHasher = (value: string) => string;

/**
 * Keyed, deterministic hash for putting identifiers in logs and keys
 * without exposing the raw value.
 */
export function createIdentifierHasher(secret: string): IdentifierHasher {
  return (value: string) => {
    if (!value) return "";
    return createHmac("sha256", secret).update(value, "utf8").digest("hex");
  };
}
