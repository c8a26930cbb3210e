/**
 * Errors surfaced by the datasets API. Each carries the HTTP status and the
 * code sent in the X-Error-Code header.
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";
import { isRecord } from "../utils/validation.ts";

export interface ErrorBody {
  error: string;
  [key: string]: unknown;
}

export class ApiError extends Error {
  readonly status: ContentfulStatusCode;
  readonly code: string;

  constructor(message: string, status: ContentfulStatusCode, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.status = status;
    this.code = code;
  }

  toBody(): ErrorBody {
    return { error: this.message };
  }
}

export class MissingRequiredParameterError extends ApiError {
  constructor(message: string) {
    super(message, 422, "MissingRequiredParameter");
  }
}

export class InvalidParameterError extends ApiError {
  constructor(message: string) {
    super(message, 422, "InvalidParameter");
  }
}

export class ResponseNotFoundError extends ApiError {
  constructor() {
    super("Not found.", 404, "ResponseNotFound");
  }
}

export class ExternalUnauthenticatedError extends ApiError {
  constructor() {
    super(
      "The dataset does not exist, or is not accessible without authentication (private or gated). Please check the spelling of the dataset name or retry with authentication.",
      401,
      "ExternalUnauthenticatedError"
    );
  }
}

export class ExternalAuthenticatedError extends ApiError {
  constructor() {
    super(
      "The dataset does not exist, or is not accessible with the current credentials (private or gated). Please check the spelling of the dataset name or retry with other authentication credentials.",
      404,
      "ExternalAuthenticatedError"
    );
  }
}

export class AuthCheckHubRequestError extends ApiError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, "AuthCheckHubRequestError", { cause });
  }
}

export class PreviousStepFormatError extends ApiError {
  constructor(cause?: unknown) {
    super("Previous step did not return the expected content.", 500, "PreviousStepFormatError", { cause });
  }
}

export class FeatureNotSupportedError extends ApiError {
  constructor(message: string) {
    super(message, 400, "FeatureNotSupported");
  }
}

export class NoSupportedFeaturesError extends ApiError {
  constructor() {
    super("No columns for statistics computation found.", 501, "NoSupportedFeaturesError");
  }
}

function isContentfulStatus(status: number): status is ContentfulStatusCode {
  return Number.isInteger(status) && status >= 200 && status <= 599 && ![204, 205, 304].includes(status);
}

/**
 * An error response computed by a worker and stored in the cache,
 * served back with its original status, code and content.
 */
export class CachedResponseError extends ApiError {
  private readonly content: unknown;

  constructor(httpStatus: number, errorCode: string | null, content: unknown) {
    const message = isRecord(content) && typeof content.error === "string" ? content.error : "Unexpected error.";
    super(message, isContentfulStatus(httpStatus) ? httpStatus : 500, errorCode ?? "UnexpectedError");
    this.content = content;
  }

  override toBody(): ErrorBody {
    if (isRecord(this.content)) {
      return { ...this.content, error: this.message };
    }
    return { error: this.message };
  }
}
