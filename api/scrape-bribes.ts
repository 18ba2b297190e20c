import type { VercelRequest, VercelResponse } from "@vercel/node";
import { loadConfig, loadCronSecret, type ScrapeConfig } from "../src/config";
import { runScrape } from "../src/pipeline";
import { checkBearerToken } from "../src/utils/auth";
import { errorMessage } from "../src/utils/errors";
import type { ScrapeReport } from "../src/types";

type ScrapeRequest = {
  method?: string;
  headers: Record<string, string | string[] | undefined>;
};

type JsonReply = {
  status(code: number): { json(body: unknown): unknown };
};

export async function handleScrape(req: ScrapeRequest, res: JsonReply) {
  let secret: string;
  let config: ScrapeConfig;
  try {
    secret = loadCronSecret();
    config = loadConfig();
  } catch (error) {
    const message = errorMessage(error, "Invalid configuration");
    console.error(`[scraper] ${message}`);
    return res.status(500).json({ error: message });
  }

  const auth = checkBearerToken(req.headers, secret);
  if (!auth.authorized) {
    return res.status(401).json({ error: auth.message });
  }

  if (req.method !== "POST" && req.method !== "GET") {
    return res.status(405).json({ error: "Method not allowed" });
  }

  const started = Date.now();

  let report: ScrapeReport;
  try {
    report = await runScrape(config);
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[scraper] run failed: ${message}`);
    return res.status(500).json({ error: message });
  }

  return res.status(200).json({
    ok: true,
    rowCount: report.rows.length,
    pagesScraped: report.pagesScraped,
    failures: report.failures,
    overall: report.summary.overall,
    byDepartment: report.summary.byDepartment,
    histogram: report.summary.histogram,
    scrapeDurationMs: Date.now() - started,
  });
}

export default function handler(req: VercelRequest, res: VercelResponse) {
  return handleScrape(req, res);
}
