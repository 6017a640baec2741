import { SwarmError } from "../swarm/errors";

export type BackendHealthStatus = "healthy" | "degraded" | "unavailable";

export type TaskPayload = Record<string, unknown>;

export type BackendOutput = {
  content: string;
  finishReason: string | null;
  model: string | null;
};

export type BackendCallContext = {
  requestId: string;
  taskId: string;
  timeoutMs: number;
  signal: AbortSignal;
};

export interface BackendClient {
  readonly kind: string;
  invoke(ctx: BackendCallContext, payload: TaskPayload): Promise<BackendOutput>;
}

export type BackendCredential = {
  header: string;
  secret: string;
};

export type BackendDefinition = {
  id: string;
  endpoint: string;
  credential: BackendCredential;
  maxConcurrent: number;
  maxRequestsPerSecond: number;
  deployment: string | null;
  client: BackendClient;
};

/** Read-only view of a registered backend, stamped with its health at the time of the read. */
export type Backend = Readonly<BackendDefinition> & {
  readonly health: BackendHealthStatus;
};

export type BackendCallErrorCode =
  | "AUTH"
  | "TIMEOUT"
  | "UNAVAILABLE"
  | "RATE_LIMITED"
  | "CONNECTION"
  | "BAD_REQUEST"
  | "BAD_RESPONSE"
  | "UNKNOWN";

export class BackendCallError extends SwarmError {
  constructor(
    code: BackendCallErrorCode,
    message: string,
    readonly retryable: boolean,
    meta: Record<string, unknown> = {}
  ) {
    super(code, message, meta);
    this.name = "BackendCallError";
  }

  get kind(): "TransientCallError" | "PermanentCallError" {
    return this.retryable ? "TransientCallError" : "PermanentCallError";
  }
}

const TRANSIENT_CAUSE_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "EPIPE", "ETIMEDOUT", "EAI_AGAIN", "UND_ERR_SOCKET"]);

function causeCode(error: Error): string | null {
  const cause = error.cause;
  if (cause && typeof cause === "object" && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return null;
}

export function classifyHttpStatus(status: number, detail: string): BackendCallError {
  const message = `Backend responded ${status}${detail ? `: ${detail}` : ""}`;
  const meta = { status };
  if (status === 408) return new BackendCallError("TIMEOUT", message, true, meta);
  if (status === 429) return new BackendCallError("RATE_LIMITED", message, true, meta);
  if (status >= 500) return new BackendCallError("UNAVAILABLE", message, true, meta);
  if (status === 401 || status === 403) return new BackendCallError("AUTH", message, false, meta);
  return new BackendCallError("BAD_REQUEST", message, false, meta);
}

export function classifyBackendError(error: unknown): BackendCallError {
  if (error instanceof BackendCallError) return error;
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return new BackendCallError("TIMEOUT", message, true);
    }
    const code = causeCode(error);
    if (code && TRANSIENT_CAUSE_CODES.has(code)) {
      return new BackendCallError("CONNECTION", message, true, { cause: code });
    }
  }
  if (/timeout|timed out/i.test(message)) return new BackendCallError("TIMEOUT", message, true);
  if (/econnreset|econnrefused|socket hang up|fetch failed|connection reset/i.test(message)) {
    return new BackendCallError("CONNECTION", message, true);
  }
  if (/401|403|unauthor|forbidden/i.test(message)) return new BackendCallError("AUTH", message, false);
  if (/429|rate limit/i.test(message)) return new BackendCallError("RATE_LIMITED", message, true);
  if (/5\d\d|unavailable/i.test(message)) return new BackendCallError("UNAVAILABLE", message, true);
  if (/malformed|invalid|parse/i.test(message)) return new BackendCallError("BAD_RESPONSE", message, false);
  return new BackendCallError("UNKNOWN", message, false);
}
