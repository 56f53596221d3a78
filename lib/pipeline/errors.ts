/**
 * Error taxonomy for the notes pipeline.
 *
 * Stage errors (extraction, validation, backend) are internal; the
 * orchestrator converts every one of them into a PipelineError whose
 * category is what callers branch on.
 */

export type ExtractionFailureReason = "unreadable" | "encrypted";

export class ExtractionError extends Error {
  constructor(
    public readonly reason: ExtractionFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

export type ValidationFailureReason = "unknown_style" | "invalid_field";

export class ValidationError extends Error {
  constructor(
    public readonly reason: ValidationFailureReason,
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export type BackendErrorKind =
  | "auth"
  | "capability_mismatch"
  | "rate_limit"
  | "transport"
  | "unknown"
  | "fallback_exhausted";

export class BackendError extends Error {
  readonly statusCode?: number;

  constructor(
    public readonly kind: BackendErrorKind,
    message: string,
    options: { statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "BackendError";
    this.statusCode = options.statusCode;
  }
}

export type PipelineErrorCategory =
  | "invalid_input"
  | "no_extractable_text"
  | "auth"
  | "rate_limited"
  | "backend_failure"
  | "capability_fallback_exhausted";

export class PipelineError extends Error {
  constructor(
    public readonly category: PipelineErrorCategory,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

const HTTP_STATUS: Record<PipelineErrorCategory, number> = {
  invalid_input: 400,
  auth: 401,
  no_extractable_text: 422,
  rate_limited: 429,
  backend_failure: 502,
  capability_fallback_exhausted: 503,
};

export function httpStatusFor(category: PipelineErrorCategory): number {
  return HTTP_STATUS[category];
}
