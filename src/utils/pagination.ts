import type {
  BribeReport,
  PageFailurePolicy,
  PageOutcome,
  ReportSelectors,
  ShapeMismatchPolicy,
} from "../types";
import { fetchHtml as defaultFetchHtml, type FetchHtml } from "./fetcher";
import { scrapeFromHtml } from "./scraper";

export type Sleep = (ms: number) => Promise<void>;

export type PageProgress = {
  index: number;
  total: number;
  outcome: PageOutcome;
};

export type ScrapePagesOptions = {
  baseUrl: string;
  offsets: number[];
  delayMs: number;
  firstPageUrl?: string;
  selectors?: ReportSelectors;
  shapePolicy?: ShapeMismatchPolicy;
  failurePolicy?: PageFailurePolicy;
  fetchHtml?: FetchHtml;
  sleep?: Sleep;
  onProgress?: (progress: PageProgress) => void;
};

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function logProgress({ index, total, outcome }: PageProgress) {
  if (outcome.ok) {
    const missing = outcome.rows.filter((r) => r.amount === null).length;
    console.info(`[scraper] page ${index + 1}/${total}: ${outcome.rows.length} reports from ${outcome.url}`);
    if (missing) {
      console.warn(`[scraper] page ${index + 1}/${total}: ${missing} amounts could not be parsed`);
    }
  } else {
    console.error(`[scraper] page ${index + 1}/${total} failed: ${outcome.error.message}`);
  }
}

// The listing's first page lives at the bare URL; later pages append the offset
export function buildPageUrl(baseUrl: string, offset: number, index: number, firstPageUrl?: string) {
  if (index === 0 && firstPageUrl) return firstPageUrl;
  return `${baseUrl}${offset}`;
}

export async function scrapePages(options: ScrapePagesOptions): Promise<PageOutcome[]> {
  const {
    baseUrl,
    offsets,
    delayMs,
    firstPageUrl,
    failurePolicy = "abort",
    fetchHtml = defaultFetchHtml,
    sleep: pause = sleep,
    onProgress = logProgress,
  } = options;

  const outcomes: PageOutcome[] = [];

  for (const [index, offset] of offsets.entries()) {
    if (index > 0) {
      await pause(delayMs);
    }

    const url = buildPageUrl(baseUrl, offset, index, firstPageUrl);
    let outcome: PageOutcome;
    try {
      const html = await fetchHtml(url);
      const rows = scrapeFromHtml(html, {
        selectors: options.selectors,
        shapePolicy: options.shapePolicy,
      });
      outcome = { ok: true, url, offset, rows };
    } catch (error) {
      if (failurePolicy === "abort") throw error;
      outcome = {
        ok: false,
        url,
        offset,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }

    outcomes.push(outcome);
    onProgress({ index, total: offsets.length, outcome });
  }

  return outcomes;
}

/**
 * Tables of the pages that succeeded, in page order. Under the "continue" policy a failed
 * page has no entry, so positions no longer line up with `offsets`; use `scrapePages` when
 * the offset of each table matters.
 */
export async function scrapeAll(
  baseUrl: string,
  offsets: number[],
  delayMs: number,
  options: Omit<ScrapePagesOptions, "baseUrl" | "offsets" | "delayMs"> = {},
): Promise<BribeReport[][]> {
  const outcomes = await scrapePages({ ...options, baseUrl, offsets, delayMs });
  const tables: BribeReport[][] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) tables.push(outcome.rows);
  }
  return tables;
}
