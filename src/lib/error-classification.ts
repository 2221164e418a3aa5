/**
 * Error Classification
 *
 * Classifies failures of external collaborators (popularity index,
 * bibliometric lookup, LLM inference, embeddings) so a tier miss can record
 * why it missed, and separates them from persistence failures, which are the
 * only errors allowed to propagate out of a scoring job.
 *
 * @module error-classification
 */

export type ExternalService = "popularity_index" | "bibliometrics" | "llm" | "embeddings";

export type ErrorCategory =
  | "provider_outage"
  | "rate_limit"
  | "input_error"
  | "timeout"
  | "persistence"
  | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  service: ExternalService | null;
  message: string;
  retriable: boolean;
};

/**
 * Non-success HTTP response from an external service.
 */
export class ExternalServiceError extends Error {
  constructor(
    public readonly service: ExternalService,
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "ExternalServiceError";
  }
}

/**
 * Failure of the domain trust store. Unlike tier misses this is not
 * recovered locally; the job owner marks the job failed.
 */
export class PersistenceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "PersistenceError";
  }
}

const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [/timeout/i, /timed?\s*out/i, /AbortError/i, /ETIMEDOUT/i, /ECONNRESET/i];

function statusOf(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  return typeof status === "number" ? status : null;
}

function categoryForStatus(status: number): ErrorCategory | null {
  if (status === 429 || status === 529 || status === 503) return "rate_limit";
  if (status === 401 || status === 403) return "provider_outage";
  if (status >= 500) return "provider_outage";
  if (status >= 400) return "input_error";
  return null;
}

/**
 * Classify an error. `service` names the collaborator that was being called
 * when the caller knows it; ExternalServiceError carries its own.
 */
export function classifyError(error: unknown, service: ExternalService | null = null): ClassifiedError {
  if (error instanceof PersistenceError) {
    return { category: "persistence", service: null, message: error.message, retriable: false };
  }

  if (error instanceof ExternalServiceError) {
    const category = categoryForStatus(error.status) ?? "unknown";
    return {
      category,
      service: error.service,
      message: error.message,
      retriable: category === "rate_limit" || error.status >= 500,
    };
  }

  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "timeout", service, message: msg, retriable: true };
  }

  if (AUTH_PATTERNS.some((p) => p.test(msg))) {
    return { category: "provider_outage", service, message: msg, retriable: false };
  }

  if (RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "rate_limit", service, message: msg, retriable: true };
  }

  // AI SDK errors carry the HTTP status on the error object
  const status = statusOf(error);
  if (status !== null) {
    const category = categoryForStatus(status);
    if (category) {
      return { category, service, message: msg, retriable: category === "rate_limit" };
    }
  }

  return { category: "unknown", service, message: msg, retriable: false };
}
