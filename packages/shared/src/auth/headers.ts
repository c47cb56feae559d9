export const SERVICE_AUTH_HEADER = "x-service-token";
export const CALLER_HEADER = "x-caller-address";
export const IDEMPOTENCY_HEADER = "idempotency-key";

function firstString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    return typeof first === "string" ? first : null;
  }
  return null;
}

/** Reads a single trimmed header value; repeated headers resolve to the first string. */
export function readHeaderValue(value: unknown): string | null {
  const raw = firstString(value);
  if (raw === null) return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function normalizeServiceAuthToken(token: string | undefined | null): string | null {
  if (typeof token !== "string") return null;
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function buildServiceAuthHeaders(
  token: string | undefined | null,
): Record<string, string> {
  const normalized = normalizeServiceAuthToken(token);
  if (!normalized) return {};
  return { [SERVICE_AUTH_HEADER]: normalized };
}

/** With no expected token configured every caller passes. */
export function isServiceAuthAuthorized(
  providedHeader: unknown,
  expectedToken: string | undefined | null,
): boolean {
  const expected = normalizeServiceAuthToken(expectedToken);
  if (!expected) return true;

  if (Array.isArray(providedHeader)) {
    return providedHeader.some((value) => value === expected);
  }
  return typeof providedHeader === "string" && providedHeader === expected;
}
