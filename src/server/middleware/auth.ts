/**
 * Admin API key check. The admin routes are only mounted when ADMIN_API_KEY is set.
 */

import { createHash, timingSafeEqual } from "crypto";
import { createMiddleware } from "hono/factory";
import { SECURITY_CONSTANTS } from "../../config/constants.ts";

const HEADER = SECURITY_CONSTANTS.AUTH_HEADER_NAME;

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

/**
 * Constant-time comparison of the SHA-256 digests of both keys
 */
export function isValidApiKey(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

export function createAuthMiddleware(apiKey: string, bypassPaths: readonly string[] = []) {
  return createMiddleware(async (c, next) => {
    if (bypassPaths.includes(c.req.path)) {
      await next();
      return;
    }

    const provided = c.req.header(HEADER);
    if (!provided) {
      c.header("X-Error-Code", "AuthenticationRequired");
      return c.json({ error: "Authentication required", message: `Missing ${HEADER} header` }, 401);
    }
    if (!isValidApiKey(provided, apiKey)) {
      c.header("X-Error-Code", "InvalidApiKey");
      return c.json({ error: "Invalid API key" }, 403);
    }

    await next();
  });
}
