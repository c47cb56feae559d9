export interface HttpResult {
  ok: boolean;
  status: number;          // 0 when the peer could not be reached
  data?: unknown;
  error?: string;
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export async function requestJson(
  url: string,
  init: RequestInit,
  timeoutMs = 5000,
): Promise<HttpResult> {
  let response: Response;
  try {
    response = await fetch(url, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    return {
      ok: false,
      status: 0,
      error: error instanceof Error ? error.message : String(error),
    };
  }

  const contentType = response.headers.get("content-type") || "";
  if (!contentType.includes("application/json")) {
    return { ok: response.ok, status: response.status };
  }

  try {
    return { ok: response.ok, status: response.status, data: await response.json() };
  } catch (error) {
    return {
      ok: false,
      status: response.status,
      error: `invalid JSON body: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}
