import {
  APICallError,
  LoadAPIKeyError,
  RetryError,
  UnsupportedFunctionalityError,
} from "ai";
import type { BackendErrorKind } from "../errors";

export type FailureKind = Exclude<BackendErrorKind, "fallback_exhausted">;

export interface ClassifiedFailure {
  kind: FailureKind;
  message: string;
  statusCode?: number;
  cause: unknown;
}

const RESPONSES_PATH = /\/responses(\?|$)/;
const MISSING_METHOD = /is not a function/;
const NETWORK_ERROR_NAMES = new Set(["AbortError", "TimeoutError"]);

/**
 * Decide what a failed provider call means for the caller. Only
 * `capability_mismatch` lets the invoker move on to the next strategy.
 */
export function classifyBackendError(err: unknown): ClassifiedFailure {
  // The SDK wraps retried failures; the last attempt carries the real cause
  const error = RetryError.isInstance(err) ? err.lastError : err;
  const message = error instanceof Error ? error.message : String(error);

  if (UnsupportedFunctionalityError.isInstance(error)) {
    return { kind: "capability_mismatch", message, cause: error };
  }

  if (error instanceof TypeError && MISSING_METHOD.test(message)) {
    return { kind: "capability_mismatch", message, cause: error };
  }

  if (LoadAPIKeyError.isInstance(error)) {
    return { kind: "auth", message, cause: error };
  }

  if (APICallError.isInstance(error)) {
    return classifyApiCallError(error);
  }

  if (error instanceof Error && NETWORK_ERROR_NAMES.has(error.name)) {
    return { kind: "transport", message, cause: error };
  }

  return { kind: "unknown", message, cause: error };
}

function classifyApiCallError(error: APICallError): ClassifiedFailure {
  const { statusCode, message } = error;
  const base = { message, statusCode, cause: error };

  // No response at all: DNS, refused connection, proxy, timeout
  if (statusCode === undefined) {
    return { ...base, kind: "transport" };
  }
  if (statusCode === 401 || statusCode === 403) {
    return { ...base, kind: "auth" };
  }
  if (statusCode === 429) {
    return { ...base, kind: "rate_limit" };
  }
  if ((statusCode === 404 || statusCode === 405) && RESPONSES_PATH.test(error.url)) {
    return { ...base, kind: "capability_mismatch" };
  }
  return { ...base, kind: "unknown" };
}
