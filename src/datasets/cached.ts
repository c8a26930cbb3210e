/**
 * Reading worker-computed artifacts out of the cache store
 */

import type { z } from "zod";
import { getBestResponse, type CachedResponse } from "../db/repository.ts";
import { CachedResponseError, PreviousStepFormatError, ResponseNotFoundError } from "./errors.ts";

export function parseContent<S extends z.ZodTypeAny>(schema: S, content: unknown): z.output<S> {
  const result = schema.safeParse(content);
  if (!result.success) {
    throw new PreviousStepFormatError(result.error);
  }
  return result.data;
}

/**
 * Best cached response among `kinds`. Throws ResponseNotFoundError when none
 * exists and CachedResponseError when the best one is an error.
 */
export function getSuccessfulResponse(
  kinds: readonly string[],
  dataset: string,
  config: string | null = null,
  split: string | null = null
): CachedResponse {
  const response = getBestResponse(kinds, dataset, config, split);
  if (!response) {
    throw new ResponseNotFoundError();
  }
  if (response.httpStatus !== 200) {
    throw new CachedResponseError(response.httpStatus, response.errorCode, response.content);
  }
  return response;
}

export function getSuccessfulContent<S extends z.ZodTypeAny>(
  schema: S,
  kinds: readonly string[],
  dataset: string,
  config: string | null = null,
  split: string | null = null
): z.output<S> {
  return parseContent(schema, getSuccessfulResponse(kinds, dataset, config, split).content);
}
