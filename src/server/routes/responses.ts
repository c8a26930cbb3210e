/**
 * Response helpers shared by the route modules
 */

import type { Context } from "hono";
import { env } from "../../config/env.ts";
import { createLogger } from "../../core/logger.ts";
import { ApiError } from "../../datasets/errors.ts";
import { metricsCollector } from "../../metrics/collector.ts";

const log = createLogger("http");

/**
 * Creates a structured error response with helpful details.
 * Avoids exposing internal error messages in production.
 */
export function createErrorResponse(
  baseMessage: string,
  error: unknown,
  includeDetails = env.nodeEnv !== "production"
): { error: string; details?: string } {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const response: { error: string; details?: string } = {
    error: baseMessage,
  };

  if (includeDetails && errorMessage) {
    response.details = errorMessage;
  }

  return response;
}

/**
 * Successful responses are cached longer than errors and incomplete responses
 */
export function setCacheControl(c: Context, complete: boolean): void {
  const maxAge = complete ? env.maxAgeLongSeconds : env.maxAgeShortSeconds;
  c.header("Cache-Control", `public, max-age=${maxAge}`);
}

/**
 * Turns an error into its JSON response: ApiErrors keep their status and
 * code, anything else is logged and becomes a 500.
 */
export function respondWithError(c: Context, error: unknown) {
  setCacheControl(c, false);

  if (error instanceof ApiError) {
    c.header("X-Error-Code", error.code);
    metricsCollector.recordError(error.code);
    return c.json(error.toBody(), error.status);
  }

  log.error(`Unexpected error on ${c.req.method} ${c.req.path}`, error);
  c.header("X-Error-Code", "UnexpectedError");
  metricsCollector.recordError("UnexpectedError");
  return c.json(createErrorResponse("Unexpected error.", error), 500);
}
