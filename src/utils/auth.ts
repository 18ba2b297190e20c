type RequestHeaders = Record<string, string | string[] | undefined>;

export type BearerCheck =
  | { authorized: true }
  | { authorized: false; message: string };

// Node lower-cases incoming header names
export function readBearerToken(headers: RequestHeaders): string | null | undefined {
  const header = headers.authorization;
  const value = Array.isArray(header) ? header[0] : header;
  if (value === undefined) return undefined;
  const match = /^Bearer\s+(\S+)$/.exec(value.trim());
  return match ? match[1] : null;
}

export function checkBearerToken(headers: RequestHeaders, secret: string): BearerCheck {
  const token = readBearerToken(headers);
  if (token === undefined) return { authorized: false, message: "Missing Authorization header" };
  if (token === null) return { authorized: false, message: "Expected a Bearer token" };
  if (token !== secret) return { authorized: false, message: "Invalid token" };
  return { authorized: true };
}
