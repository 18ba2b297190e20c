import { NetworkError } from "./errors";

export type FetchHtml = (url: string) => Promise<string>;

const DEFAULT_TIMEOUT_MS = 10000;

export async function fetchHtml(
  url: string,
  options: { timeoutMs?: number } = {},
): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  try {
    let res: Response;
    try {
      res = await fetch(url, { signal: controller.signal });
    } catch (error) {
      const reason = controller.signal.aborted
        ? "timed out"
        : error instanceof Error
          ? error.message
          : "request failed";
      throw new NetworkError(`Fetch of ${url} failed: ${reason}`, url, { cause: error });
    }

    if (!res.ok) {
      throw new NetworkError(`Fetch failed with status ${res.status}`, url, { status: res.status });
    }

    return await res.text();
  } finally {
    clearTimeout(timeout);
  }
}
