export class NetworkError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "NetworkError";
    this.url = url;
    this.status = options?.status;
  }
}

export class ShapeMismatchError extends Error {
  readonly lengths: { amounts: number; transactions: number; departments: number };

  constructor(lengths: { amounts: number; transactions: number; departments: number }) {
    super(
      `Selector results differ in length (amounts=${lengths.amounts}, transactions=${lengths.transactions}, departments=${lengths.departments})`,
    );
    this.name = "ShapeMismatchError";
    this.lengths = lengths;
  }
}

export class ParseError extends Error {
  readonly raw: string;

  constructor(raw: string) {
    super(`Could not parse amount from ${JSON.stringify(raw)}`);
    this.name = "ParseError";
    this.raw = raw;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown, fallback = "Unknown scrape error"): string {
  return error instanceof Error ? error.message : fallback;
}
