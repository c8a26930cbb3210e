/**
 * Access check for gated and private datasets, delegated to the Hub
 */

import { env } from "../config/env.ts";
import { createLogger } from "../core/logger.ts";
import { fetchWithTimeout, formatPath } from "../utils/http.ts";
import {
  AuthCheckHubRequestError,
  ExternalAuthenticatedError,
  ExternalUnauthenticatedError,
} from "./errors.ts";

const log = createLogger("auth");

export interface AuthCheckOptions {
  hfEndpoint: string;
  /** Path with a %s placeholder for the dataset; empty disables the check */
  hfAuthPath: string;
  timeoutMs: number;
}

const BEARER_PATTERN = /^Bearer\s+\S+$/i;

export function defaultAuthCheckOptions(): AuthCheckOptions {
  return {
    hfEndpoint: env.hfEndpoint,
    hfAuthPath: env.hfAuthPath,
    timeoutMs: env.hfTimeoutMs,
  };
}

/**
 * Resolves when the request may read the dataset; throws an ApiError otherwise.
 * The caller's Authorization header is forwarded as-is.
 */
export async function authCheck(
  dataset: string,
  authorization: string | undefined,
  options: AuthCheckOptions = defaultAuthCheckOptions()
): Promise<void> {
  if (!options.hfAuthPath) return;

  if (authorization !== undefined && !BEARER_PATTERN.test(authorization.trim())) {
    throw new ExternalUnauthenticatedError();
  }

  const url = `${options.hfEndpoint}${formatPath(options.hfAuthPath, dataset)}`;
  const headers: Record<string, string> = {};
  if (authorization !== undefined) {
    headers["Authorization"] = authorization;
  }

  let response: Response;
  try {
    response = await fetchWithTimeout(url, { method: "GET", headers }, options.timeoutMs);
  } catch (error) {
    log.warn("Auth check request to the Hub failed", { dataset, error: String(error) });
    throw new AuthCheckHubRequestError(
      "Authentication check on the Hugging Face Hub failed or timed out. Please try again later, it's a temporary internal issue.",
      error
    );
  }

  switch (response.status) {
    case 200:
      return;
    case 401:
      throw new ExternalUnauthenticatedError();
    case 403:
    case 404:
      throw new ExternalAuthenticatedError();
    default:
      throw new AuthCheckHubRequestError(
        `Authentication check on the Hugging Face Hub returned an unexpected status code: ${response.status}.`
      );
  }
}
