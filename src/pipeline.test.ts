import { describe, expect, it, vi } from "vitest";
import { loadConfig } from "./config";
import { runScrape } from "./pipeline";
import { NetworkError } from "./utils/errors";

const LISTING = "https://reports.test/paid";
const BASE = "https://reports.test/paid?page=";

const reports = (...items: [string, string, string][]) =>
  items
    .map(
      ([amount, transaction, department]) =>
        `<article><p class="heading-3"><a>${transaction}</a></p><p class="paid-amount"><span>${amount}</span></p><p class="department"><span class="name"><a>${department}</a></span></p></article>`,
    )
    .join("");

const PAGES: Record<string, string> = {
  [LISTING]: reports(
    ["Paid INR 1,000\r\n 1 day ago", "Birth Certificate", "Municipal"],
    ["Paid INR 3,000\r\n 2 days ago", "Passport", "Police"],
    ["Paid INR unknown", "Khata", "Municipal"],
  ),
  [`${BASE}10`]: reports(
    ["Paid INR 500", "Driving Licence", "Transport"],
    ["Paid INR 2,000", "Passport Verification", "Police"],
    ["Paid INR 1,500", "Encroachment", "Municipal"],
  ),
};

const fetchPage = async (url: string) => {
  const html = PAGES[url];
  if (html === undefined) throw new NetworkError("Fetch failed with status 500", url, { status: 500 });
  return html;
};

const config = (env: Record<string, string> = {}) =>
  loadConfig({
    BRIBE_LISTING_URL: LISTING,
    BRIBE_PAGE_BASE_URL: BASE,
    SCRAPE_OFFSETS: "0,10",
    SCRAPE_DELAY_MS: "2000",
    ...env,
  });

describe("runScrape", () => {
  it("assembles every page in order and summarizes the amounts", async () => {
    const sleep = vi.fn(async () => {});

    const report = await runScrape(config(), { fetchHtml: fetchPage, sleep, onProgress: vi.fn() });

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(report.pagesScraped).toBe(2);
    expect(report.failures).toEqual([]);
    expect(report.rows.map((r) => r.transaction)).toEqual([
      "Birth Certificate",
      "Passport",
      "Khata",
      "Driving Licence",
      "Passport Verification",
      "Encroachment",
    ]);
    expect(report.rows[2].amount).toBeNull();

    expect(report.summary.overall).toEqual({
      count: 5,
      mean: 1600,
      std: expect.any(Number),
      min: 500,
      q1: 1000,
      median: 1500,
      q3: 2000,
      max: 3000,
    });
    expect(report.summary.byDepartment).toEqual([
      { department: "Police", meanAmount: 2500, count: 2 },
      { department: "Municipal", meanAmount: 1250, count: 2 },
      { department: "Transport", meanAmount: 500, count: 1 },
    ]);
    expect(report.summary.histogram).toEqual([{ lower: 100, upper: 1000, count: 1 }, { lower: 1000, upper: 10000, count: 4 }]);
  });

  it("aborts on a failed page by default", async () => {
    await expect(
      runScrape(config({ SCRAPE_OFFSETS: "0,20" }), {
        fetchHtml: fetchPage,
        sleep: async () => {},
        onProgress: vi.fn(),
      }),
    ).rejects.toThrow("Fetch failed with status 500");
  });

  it("records failed pages when configured to continue", async () => {
    const report = await runScrape(config({ SCRAPE_OFFSETS: "0,20,10", PAGE_FAILURE_POLICY: "continue" }), {
      fetchHtml: fetchPage,
      sleep: async () => {},
      onProgress: vi.fn(),
    });

    expect(report.pagesScraped).toBe(2);
    expect(report.rows).toHaveLength(6);
    expect(report.failures).toEqual([{ url: `${BASE}20`, message: "Fetch failed with status 500" }]);
  });
});
