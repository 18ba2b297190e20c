import type { PageFailurePolicy, ShapeMismatchPolicy } from "./types";
import { ConfigError } from "./utils/errors";

export type ScrapeConfig = {
  listingUrl: string;
  pageBaseUrl: string;
  offsets: number[];
  delayMs: number;
  timeoutMs: number;
  shapePolicy: ShapeMismatchPolicy;
  failurePolicy: PageFailurePolicy;
  binsPerDecade: number;
};

const LISTING_URL = "http://www.ipaidabribe.com/reports/paid";
const PAGE_BASE_URL = `${LISTING_URL}?page=`;
const OFFSETS = [0, 10, 20, 30, 40];
const DELAY_MS = 2000; // between page requests
const TIMEOUT_MS = 10000;

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigError(`${key} must be a number >= ${min}, got "${raw}"`);
  }
  return value;
}

function readOffsets(env: Env): number[] {
  const raw = env.SCRAPE_OFFSETS;
  if (!raw) return OFFSETS;
  const offsets = raw.split(",").map((part) => Number(part.trim()));
  if (offsets.some((n) => !Number.isInteger(n) || n < 0)) {
    throw new ConfigError(`SCRAPE_OFFSETS must be a comma list of non-negative integers, got "${raw}"`);
  }
  return offsets;
}

function readChoice<T extends string>(env: Env, key: string, choices: readonly T[], fallback: T): T {
  const raw = env[key];
  if (!raw) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new ConfigError(`${key} must be one of ${choices.join(", ")}, got "${raw}"`);
  }
  return match;
}

export function loadConfig(env: Env = process.env): ScrapeConfig {
  return {
    listingUrl: env.BRIBE_LISTING_URL || LISTING_URL,
    pageBaseUrl: env.BRIBE_PAGE_BASE_URL || PAGE_BASE_URL,
    offsets: readOffsets(env),
    delayMs: readNumber(env, "SCRAPE_DELAY_MS", DELAY_MS),
    timeoutMs: readNumber(env, "SCRAPE_TIMEOUT_MS", TIMEOUT_MS, 1),
    shapePolicy: readChoice(env, "SHAPE_MISMATCH_POLICY", ["truncate", "error"] as const, "error"),
    failurePolicy: readChoice(env, "PAGE_FAILURE_POLICY", ["abort", "continue"] as const, "abort"),
    binsPerDecade: readNumber(env, "HISTOGRAM_BINS_PER_DECADE", 1, 1),
  };
}

// Guards the scrape endpoint; the function must not run without one
export function loadCronSecret(env: Env = process.env): string {
  const secret = env.CRON_SECRET_TOKEN;
  if (!secret) {
    throw new ConfigError("CRON_SECRET_TOKEN is not configured");
  }
  return secret;
}
