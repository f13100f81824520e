/**
 * HTTP helpers — thin wrappers around native fetch for ledger nodes.
 *
 * Multi-endpoint support:
 *   fetchWithRotation() tries each base URL in order, rotating on network
 *   errors (connection refused, timeout, DNS failure). 4xx/5xx responses
 *   from a reachable node are NOT retried: the request was delivered and
 *   may have been applied.
 */

/** Timeout for each individual fetch attempt (ms). */
const FETCH_TIMEOUT_MS = 30_000;

/** A reachable node answered with a non-2xx status. */
export class LedgerHttpError extends Error {
  constructor(
    readonly status: number,
    /** Ledger error code from the `{error}` body, when there is one. */
    readonly code: string | null,
    message: string,
  ) {
    super(message);
    this.name = "LedgerHttpError";
  }
}

function isNetworkError(err: unknown): boolean {
  if (err instanceof TypeError) return true; // fetch() network errors are TypeError
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    return (
      msg.includes("econnrefused") ||
      msg.includes("enotfound") ||
      msg.includes("etimedout") ||
      msg.includes("econnreset") ||
      msg.includes("fetch failed") ||
      msg.includes("abort")
    );
  }
  return false;
}

/**
 * Try a request against multiple base URLs with rotation.
 * On network error the next endpoint is tried; anything else propagates.
 */
export async function fetchWithRotation(
  baseUrls: string[],
  buildRequest: (baseUrl: string) => { url: string; init?: RequestInit },
): Promise<Response> {
  if (baseUrls.length === 0) {
    throw new Error("No endpoints configured");
  }

  const errors: Array<{ url: string; error: string }> = [];

  for (const base of baseUrls) {
    const { url, init } = buildRequest(base);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);
    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (err) {
      if (!isNetworkError(err)) throw err;
      errors.push({ url, error: err instanceof Error ? err.message : String(err) });
    } finally {
      clearTimeout(timeout);
    }
  }

  const detail = errors.map((e) => `  ${e.url}: ${e.error}`).join("\n");
  throw new Error(`All ${baseUrls.length} endpoint(s) unreachable:\n${detail}`);
}

async function toError(method: string, path: string, res: Response): Promise<LedgerHttpError> {
  const text = await res.text().catch(() => "");
  let code: string | null = null;
  try {
    const body: unknown = JSON.parse(text);
    if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
      code = body.error;
    }
  } catch {
    code = null; // non-JSON body
  }
  return new LedgerHttpError(res.status, code, `${method} ${path} → ${res.status}: ${text}`);
}

function callerHeaders(caller?: string): Record<string, string> {
  return caller ? { "x-caller": caller } : {};
}

/** JSON GET with rotation. Throws LedgerHttpError on non-2xx. */
export async function httpGet<T>(baseUrls: string[], path: string): Promise<T> {
  const res = await fetchWithRotation(baseUrls, (base) => ({ url: `${base}${path}` }));
  if (!res.ok) throw await toError("GET", path, res);
  return res.json() as Promise<T>;
}

/** JSON POST with rotation, identified by x-caller. */
export async function httpPost<T>(
  baseUrls: string[],
  path: string,
  body: unknown,
  caller?: string,
): Promise<T> {
  const res = await fetchWithRotation(baseUrls, (base) => ({
    url: `${base}${path}`,
    init:
      body === undefined
        ? { method: "POST", headers: callerHeaders(caller) }
        : {
            method: "POST",
            headers: { "content-type": "application/json", ...callerHeaders(caller) },
            body: JSON.stringify(body),
          },
  }));
  if (!res.ok) throw await toError("POST", path, res);
  return res.json() as Promise<T>;
}
