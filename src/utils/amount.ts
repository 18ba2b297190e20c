import { ParseError } from "./errors";

const AMOUNT_PREFIX = "Paid INR ";
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

// "Paid INR 12,000\r\n 2 days ago" -> 12000. The HTML parser turns CRLF into LF,
// so the trailing "x days ago" text is cut at the first line break of either kind.
export function parseAmount(raw: string): number {
  const cleaned = raw
    .replace(AMOUNT_PREFIX, "")
    .trimStart()
    .replace(/[\r\n][\s\S]*$/, "")
    .replace(/,/g, "")
    .trim();

  if (!DECIMAL.test(cleaned)) {
    throw new ParseError(raw);
  }
  const value = Number.parseFloat(cleaned);
  if (!Number.isFinite(value)) {
    throw new ParseError(raw);
  }
  return value;
}

export function normalizeAmount(raw: string): number | null {
  try {
    return parseAmount(raw);
  } catch (error) {
    if (error instanceof ParseError) return null;
    throw error;
  }
}
