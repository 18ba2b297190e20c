import type { ScrapeConfig } from "./config";
import type { BribeReport, ScrapeReport } from "./types";
import { fetchHtml, type FetchHtml } from "./utils/fetcher";
import { scrapePages, type PageProgress, type Sleep } from "./utils/pagination";
import { summarize } from "./utils/stats";
import { assemble } from "./utils/table";

export type PipelineDeps = {
  fetchHtml?: FetchHtml;
  sleep?: Sleep;
  onProgress?: (progress: PageProgress) => void;
};

// fetch -> extract -> normalize -> accumulate -> aggregate, once per call
export async function runScrape(config: ScrapeConfig, deps: PipelineDeps = {}): Promise<ScrapeReport> {
  const outcomes = await scrapePages({
    baseUrl: config.pageBaseUrl,
    firstPageUrl: config.listingUrl,
    offsets: config.offsets,
    delayMs: config.delayMs,
    shapePolicy: config.shapePolicy,
    failurePolicy: config.failurePolicy,
    fetchHtml: deps.fetchHtml ?? ((url) => fetchHtml(url, { timeoutMs: config.timeoutMs })),
    sleep: deps.sleep,
    onProgress: deps.onProgress,
  });

  const tables: BribeReport[][] = [];
  const failures: ScrapeReport["failures"] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      tables.push(outcome.rows);
    } else {
      failures.push({ url: outcome.url, message: outcome.error.message });
    }
  }

  const rows = assemble(tables);
  return {
    rows,
    summary: summarize(rows, { binsPerDecade: config.binsPerDecade }),
    pagesScraped: tables.length,
    failures,
  };
}
