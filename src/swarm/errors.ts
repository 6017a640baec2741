export type SwarmErrorKind =
  | "DuplicateBackendError"
  | "UnknownBackendError"
  | "NoBackendAvailableError"
  | "LimiterTimeoutError"
  | "TransientCallError"
  | "PermanentCallError"
  | "BatchTimeoutError"
  | "NoBackendsRegisteredError"
  | "BatchValidationError";

export abstract class SwarmError extends Error {
  abstract readonly kind: SwarmErrorKind;

  constructor(
    readonly code: string,
    message: string,
    readonly meta: Record<string, unknown> = {}
  ) {
    super(message);
  }
}

export class DuplicateBackendError extends SwarmError {
  readonly kind = "DuplicateBackendError";

  constructor(readonly backendId: string) {
    super("DUPLICATE_BACKEND", `Backend "${backendId}" is already registered.`, { backendId });
    this.name = "DuplicateBackendError";
  }
}

export class UnknownBackendError extends SwarmError {
  readonly kind = "UnknownBackendError";

  constructor(readonly backendId: string) {
    super("UNKNOWN_BACKEND", `Backend "${backendId}" is not registered.`, { backendId });
    this.name = "UnknownBackendError";
  }
}

export class NoBackendAvailableError extends SwarmError {
  readonly kind = "NoBackendAvailableError";

  constructor(candidateIds: readonly string[]) {
    super("NO_BACKEND_AVAILABLE", "No healthy or degraded backend is eligible for this task.", { candidateIds });
    this.name = "NoBackendAvailableError";
  }
}

export class LimiterTimeoutError extends SwarmError {
  readonly kind = "LimiterTimeoutError";

  constructor(
    readonly backendId: string,
    readonly waitedMs: number
  ) {
    super("LIMITER_TIMEOUT", `Timed out after ${waitedMs}ms waiting for capacity on backend "${backendId}".`, {
      backendId,
      waitedMs,
    });
    this.name = "LimiterTimeoutError";
  }
}

export class BatchTimeoutError extends SwarmError {
  readonly kind = "BatchTimeoutError";

  constructor(
    readonly deadlineMs: number,
    readonly outcomeUnknown = false
  ) {
    super(
      "BATCH_TIMEOUT",
      outcomeUnknown
        ? `Batch deadline of ${deadlineMs}ms elapsed while the remote call was in flight; outcome unknown.`
        : `Batch deadline of ${deadlineMs}ms elapsed before the task completed.`,
      { deadlineMs, outcomeUnknown }
    );
    this.name = "BatchTimeoutError";
  }
}

export class NoBackendsRegisteredError extends SwarmError {
  readonly kind = "NoBackendsRegisteredError";

  constructor() {
    super("NO_BACKENDS_REGISTERED", "No backends are registered; the batch cannot be dispatched.");
    this.name = "NoBackendsRegisteredError";
  }
}

export class BatchValidationError extends SwarmError {
  readonly kind = "BatchValidationError";

  constructor(message: string, meta: Record<string, unknown> = {}) {
    super("BATCH_INVALID", message, meta);
    this.name = "BatchValidationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
