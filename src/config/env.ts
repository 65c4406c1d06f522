import dotenv from "dotenv";
import { ConfigurationError } from "../errors.js";

export type Env = Record<string, string | undefined>;

export type AdapterConfig = {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
};

export type AppConfig = {
  port: number;
  // Null keeps everything in the process-local store.
  redisUrl: string | null;
  cache: {
    searchTtlSeconds: number;
    profileTtlSeconds: number;
    lockTtlMs: number;
  };
  rateLimit: {
    tokens: number;
    windowSeconds: number;
  };
  piiHashKey: string;
  apiKeys: string[];
  adminApiKeys: string[];
  kvk: AdapterConfig;
  openSanctions: AdapterConfig & { dataset: string };
  logLevel: string;
};

function req(env: Env, name: string): string {
  const v = env[name];
  if (!v) throw new ConfigurationError(`Missing env var: ${name}`);
  return v;
}

function int(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const n = parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 0) throw new ConfigurationError(`Env var ${name} must be a non-negative integer, got "${raw}"`);
  return n;
}

function list(env: Env, name: string): string[] {
  return (env[name] || "").split(",").map(k => k.trim()).filter(Boolean);
}

export function loadConfig(env: Env): AppConfig {
  return {
    port: int(env, "PORT", 8000),
    redisUrl: env.REDIS_URL || null,
    cache: {
      searchTtlSeconds: int(env, "CACHE_TTL_SEARCH", 900),
      profileTtlSeconds: int(env, "CACHE_TTL_PROFILE", 86400),
      lockTtlMs: int(env, "CACHE_LOCK_TTL_MS", 30000)
    },
    rateLimit: {
      tokens: int(env, "RATE_LIMIT_TOKENS", 60),
      windowSeconds: int(env, "RATE_LIMIT_WINDOW_SECONDS", 60)
    },
    piiHashKey: req(env, "PII_HASH_KEY"),
    apiKeys: list(env, "API_KEYS"),
    adminApiKeys: list(env, "ADMIN_API_KEYS"),
    kvk: {
      baseUrl: env.KVK_BASE_URL || "https://api.kvk.nl/test/api",
      apiKey: req(env, "KVK_API_KEY"),
      timeoutMs: int(env, "KVK_TIMEOUT_MS", 30000)
    },
    openSanctions: {
      baseUrl: env.OPENSANCTIONS_BASE_URL || "https://api.opensanctions.org",
      apiKey: req(env, "OPENSANCTIONS_API_KEY"),
      timeoutMs: int(env, "OPENSANCTIONS_TIMEOUT_MS", 30000),
      dataset: env.OPENSANCTIONS_DATASET || "default"
    },
    logLevel: env.LOG_LEVEL || "info"
  };
}

/** Entry points only: reads `.env` into the process environment, then builds the config. */
export function loadConfigFromProcess(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
