import { classifyBackendError, type BackendOutput, type TaskPayload } from "../backends/types";
import { SwarmError, type SwarmErrorKind } from "./errors";

export type TaskStatus = "pending" | "dispatched" | "succeeded" | "failed";

export type Task = {
  id: string;
  payload: TaskPayload;
  submittedAt: string;
  status: TaskStatus;
};

export type TaskSubmission = {
  id?: string;
  payload: TaskPayload;
};

export type TaskError = {
  kind: SwarmErrorKind;
  code: string;
  message: string;
  outcomeUnknown?: boolean;
};

export type TaskResult = {
  taskId: string;
  status: "succeeded" | "failed";
  output: BackendOutput | null;
  error: TaskError | null;
  backendId: string | null;
  latencyMs: number;
  retryCount: number;
  attempts: number;
};

export type BatchStatus = "succeeded" | "partial" | "failed";

export type BatchOutcome = {
  batchId: string;
  status: BatchStatus;
  results: TaskResult[];
  byTaskId: Map<string, TaskResult>;
  summary: {
    total: number;
    succeeded: number;
    failed: number;
    timedOut: number;
  };
  durationMs: number;
};

export function toTaskError(error: unknown): TaskError {
  const swarmError = error instanceof SwarmError ? error : classifyBackendError(error);
  const outcomeUnknown = swarmError.meta.outcomeUnknown === true;
  return {
    kind: swarmError.kind,
    code: swarmError.code,
    message: swarmError.message,
    ...(outcomeUnknown ? { outcomeUnknown } : {}),
  };
}

export function batchStatusOf(results: readonly TaskResult[]): BatchStatus {
  const failed = results.filter((result) => result.status === "failed").length;
  if (failed === 0) return "succeeded";
  return failed === results.length ? "failed" : "partial";
}
