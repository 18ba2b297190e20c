import { load } from "cheerio";
import type {
  BribeReport,
  ExtractedFields,
  ReportSelectors,
  ShapeMismatchPolicy,
} from "../types";
import { normalizeAmount } from "./amount";
import { ShapeMismatchError } from "./errors";

export const DEFAULT_SELECTORS: ReportSelectors = {
  amount: ".paid-amount span",
  transaction: ".heading-3 a",
  department: ".department .name a",
};

// Text is kept verbatim; the amount cleanup happens in normalizeAmount
export function extractFields(
  html: string,
  selectors: ReportSelectors = DEFAULT_SELECTORS,
): ExtractedFields {
  const $ = load(html);
  const textsOf = (selector: string) =>
    $(selector)
      .map((_, el) => $(el).text())
      .get();

  return {
    amounts: textsOf(selectors.amount),
    transactions: textsOf(selectors.transaction),
    departments: textsOf(selectors.department),
  };
}

export function zipFields(
  fields: ExtractedFields,
  policy: ShapeMismatchPolicy = "error",
): BribeReport[] {
  const { amounts, transactions, departments } = fields;
  const length = Math.min(amounts.length, transactions.length, departments.length);
  const aligned = length === amounts.length && length === transactions.length && length === departments.length;

  if (!aligned && policy === "error") {
    throw new ShapeMismatchError({
      amounts: amounts.length,
      transactions: transactions.length,
      departments: departments.length,
    });
  }

  const rows: BribeReport[] = [];
  for (let i = 0; i < length; i++) {
    rows.push({
      amount: normalizeAmount(amounts[i]),
      transaction: transactions[i],
      department: departments[i],
    });
  }
  return rows;
}

// Parse one listing page into report rows
export function scrapeFromHtml(
  html: string,
  options: { selectors?: ReportSelectors; shapePolicy?: ShapeMismatchPolicy } = {},
): BribeReport[] {
  const fields = extractFields(html, options.selectors);
  return zipFields(fields, options.shapePolicy);
}
