import "dotenv/config";
import { readFileSync } from "fs";
import { isAbsolute, join } from "path";
import type { Config, Place } from "./types.js";
import { ConfigurationError } from "./errors.js";
import { ROOT_DIR } from "./data.js";
import { createRetryPolicy, type RetryPolicy } from "./retry.js";

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, key: string): string {
  const val = env[key];
  if (!val) throw new ConfigurationError(`Missing required env var: ${key}`);
  return val;
}

function envInt(env: Env, key: string, fallback: number): number {
  const val = env[key];
  if (!val) return fallback;
  const n = Number(val);
  if (!Number.isInteger(n)) throw new ConfigurationError(`Invalid integer for ${key}: ${val}`);
  return n;
}

function envIntMin(env: Env, key: string, fallback: number, min: number): number {
  const n = envInt(env, key, fallback);
  if (n < min) {
    throw new ConfigurationError(`${key} must be >= ${min}, got ${n}`);
  }
  return n;
}

function envBool(env: Env, key: string, fallback: boolean): boolean {
  const val = env[key]?.toLowerCase();
  if (!val) return fallback;
  return val === "true" || val === "1";
}

function resolvePath(path: string): string {
  return isAbsolute(path) ? path : join(ROOT_DIR, path);
}

export function loadConfig(env: Env = process.env): Config {
  // An explicitly empty GCS_CREDENTIALS_PATH selects Application Default Credentials.
  const credentials = env.GCS_CREDENTIALS_PATH ?? "service-account.json";

  const config: Config = {
    openaqApiKey: requireEnv(env, "OPENAQ_API_KEY"),
    openaqBaseUrl: env.BASE_OPENAQ_URL || "https://api.openaq.org/v3",
    localitiesPerPlace: envIntMin(env, "NUMBER_OF_LOCALITIES_PER_PLACE", 3, 1),
    placesFile: resolvePath(env.PLACES_FILE || "config/places.json"),
    dataOutputDir: resolvePath(env.DATA_OUTPUT_DIR || "data_in"),
    gcsBucketName: env.GCS_BUCKET_NAME || undefined,
    gcsCredentialsPath: credentials ? resolvePath(credentials) : undefined,
    bigqueryEnabled: envBool(env, "BIGQUERY_ENABLED", false),
    bigqueryProjectId: env.BIGQUERY_PROJECT_ID || undefined,
    bigqueryDatasetId: env.BIGQUERY_DATASET_ID || "air_quality",
    bigqueryTableId: env.BIGQUERY_TABLE_ID || "measurements",
    apiMaxRetries: envIntMin(env, "API_MAX_RETRIES", 3, 0),
    apiBaseDelayMs: envIntMin(env, "API_BASE_DELAY_MS", 1000, 1),
    apiMaxDelayMs: envIntMin(env, "API_MAX_DELAY_MS", 60_000, 1),
    apiTimeoutMs: envIntMin(env, "API_TIMEOUT_MS", 30_000, 1),
  };

  // Fail at startup rather than on the first retry.
  apiRetryPolicy(config);
  return config;
}

export function apiRetryPolicy(config: Config): RetryPolicy {
  return createRetryPolicy({
    maxRetries: config.apiMaxRetries,
    baseDelayMs: config.apiBaseDelayMs,
    maxDelayMs: config.apiMaxDelayMs,
  });
}

function parsePlace(raw: unknown, index: number): Place {
  if (typeof raw !== "object" || raw === null) {
    throw new ConfigurationError(`places[${index}] must be an object`);
  }
  const countryIso = "countryIso" in raw ? raw.countryIso : undefined;
  const cityAliases = "cityAliases" in raw ? raw.cityAliases : undefined;

  if (typeof countryIso !== "string" || !/^[A-Za-z]{2}$/.test(countryIso)) {
    throw new ConfigurationError(`places[${index}].countryIso must be a two-letter ISO code`);
  }
  const list: unknown[] = Array.isArray(cityAliases) ? cityAliases : [];
  const aliases = list.filter((a): a is string => typeof a === "string" && a.length > 0);
  if (aliases.length === 0 || aliases.length !== list.length) {
    throw new ConfigurationError(`places[${index}].cityAliases must be a non-empty list of names`);
  }

  return { countryIso: countryIso.toUpperCase(), cityAliases: aliases };
}

export function loadPlaces(file: string): Place[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read places file ${file}`, { cause: err });
  }
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ConfigurationError(`Places file ${file} must contain a non-empty array`);
  }
  return raw.map(parsePlace);
}
