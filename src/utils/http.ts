/**
 * Outgoing HTTP helpers
 */

export class RequestTimeoutError extends Error {
  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Request to ${url} timed out after ${timeoutMs} ms`, options);
    this.name = "RequestTimeoutError";
  }
}

/**
 * fetch() that gives up after timeoutMs.
 *
 * @throws RequestTimeoutError when the timeout fires first
 * @example
 * const response = await fetchWithTimeout("https://hub.example/api/datasets/user/data/auth-check", { method: "GET" }, 200);
 */
export async function fetchWithTimeout(url: string, options: RequestInit, timeoutMs: number): Promise<Response> {
  const signal = AbortSignal.timeout(timeoutMs);
  try {
    return await fetch(url, { ...options, signal });
  } catch (error) {
    if (signal.aborted) {
      throw new RequestTimeoutError(url, timeoutMs, { cause: error });
    }
    throw error;
  }
}

/**
 * Fills the single %s placeholder of a path template. The value is inserted literally.
 *
 * @example
 * formatPath("/api/datasets/%s/auth-check", "user/data"); // "/api/datasets/user/data/auth-check"
 */
export function formatPath(template: string, value: string): string {
  return template.replace("%s", () => value);
}
