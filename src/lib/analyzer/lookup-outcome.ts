import { classifyError, type ErrorCategory, type ExternalService } from "../error-classification";

/**
 * Why an external lookup produced no usable value.
 * Error categories come from classifyError; the rest describe replies.
 */
export type MissReason = ErrorCategory | "not_configured" | "no_data" | "invalid_response";

/**
 * Result of one call to an external collaborator. Failures are values,
 * never exceptions, so a tier cascade can fall through explicitly.
 */
export type LookupOutcome<T> =
  | { kind: "hit"; value: T }
  | { kind: "miss"; reason: MissReason; detail?: string };

export function hit<T>(value: T): LookupOutcome<T> {
  return { kind: "hit", value };
}

export function miss<T>(reason: MissReason, detail?: string): LookupOutcome<T> {
  return detail === undefined ? { kind: "miss", reason } : { kind: "miss", reason, detail };
}

/**
 * Turn a thrown error into a classified miss.
 */
export function missFromError<T>(error: unknown, service: ExternalService): LookupOutcome<T> {
  const classified = classifyError(error, service);
  return miss(classified.category, classified.message);
}

export function describeMiss(outcome: { reason: MissReason; detail?: string }): string {
  return outcome.detail ? `${outcome.reason}: ${outcome.detail}` : outcome.reason;
}
