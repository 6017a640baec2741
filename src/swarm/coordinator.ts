import crypto from "node:crypto";
import { setMaxListeners } from "node:events";
import type { Logger } from "../config/logger";
import type { BackendRegistry } from "../backends/registry";
import { emptyProgress, type Dispatcher, type DispatchProgress } from "../dispatch/dispatcher";
import { BatchTimeoutError, BatchValidationError, NoBackendsRegisteredError, errorMessage } from "./errors";
import { batchStatusOf, toTaskError, type BatchOutcome, type Task, type TaskResult, type TaskSubmission } from "./models";

export type SwarmCoordinatorConfig = {
  maxParallel: number;
  batchDeadlineMs: number;
  maxBatchSize: number;
};

export type SwarmCoordinatorContext = {
  registry: BackendRegistry;
  dispatcher: Dispatcher;
  logger: Logger;
  config: SwarmCoordinatorConfig;
};

export type SubmitOptions = {
  deadlineMs?: number;
  requestId?: string;
};

export class SwarmCoordinator {
  constructor(private readonly context: SwarmCoordinatorContext) {}

  /**
   * Fans a batch out over at most `maxParallel` workers and resolves once
   * every task is terminal or the deadline fires, whichever comes first.
   * Only whole-batch problems throw; per-task failures land in `results`.
   */
  async submit(batch: readonly TaskSubmission[], options: SubmitOptions = {}): Promise<BatchOutcome> {
    const { registry, dispatcher, config } = this.context;
    if (registry.size === 0) throw new NoBackendsRegisteredError();
    if (batch.length > config.maxBatchSize) {
      throw new BatchValidationError(`Batch of ${batch.length} tasks exceeds the limit of ${config.maxBatchSize}.`, {
        size: batch.length,
        maxBatchSize: config.maxBatchSize,
      });
    }

    const submittedAt = new Date().toISOString();
    const tasks: Task[] = batch.map((submission) => ({
      id: submission.id ?? crypto.randomUUID(),
      payload: submission.payload,
      submittedAt,
      status: "pending",
    }));
    const seen = new Set<string>();
    for (const task of tasks) {
      if (seen.has(task.id)) {
        throw new BatchValidationError(`Task id "${task.id}" appears more than once in the batch.`, { taskId: task.id });
      }
      seen.add(task.id);
    }

    const batchId = crypto.randomUUID();
    const requestId = options.requestId ?? batchId;
    const deadlineMs = Math.max(1, options.deadlineMs ?? config.batchDeadlineMs);
    const log = this.context.logger.child({ requestId, batchId });
    const startedAt = Date.now();
    const candidates = registry.ids();
    log.info("swarm_batch_started", { size: tasks.length, deadlineMs, candidates: candidates.length });

    const results = new Map<string, TaskResult>();
    const progress = new Map<string, DispatchProgress>();
    const controller = new AbortController();
    // Each worker holds at most one listener (limiter wait or backoff sleep).
    setMaxListeners(Math.max(1, config.maxParallel) + 1, controller.signal);
    let settled = false;
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (!controller.signal.aborted && cursor < tasks.length) {
        const task = tasks[cursor];
        cursor += 1;
        const taskProgress = emptyProgress();
        progress.set(task.id, taskProgress);
        const result = await dispatcher.dispatch(task, candidates, {
          signal: controller.signal,
          requestId,
          progress: taskProgress,
        });
        if (!settled) results.set(task.id, result);
      }
    };

    const workerCount = Math.min(Math.max(1, config.maxParallel), tasks.length);
    const allDone = Promise.all(Array.from({ length: workerCount }, () => worker())).then(() => "done" as const);
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"deadline">((resolve) => {
      timer = setTimeout(() => resolve("deadline"), deadlineMs);
    });

    let winner: "done" | "deadline";
    try {
      winner = await Promise.race([allDone, deadline]);
    } finally {
      clearTimeout(timer);
    }

    settled = true;
    if (winner === "deadline") {
      controller.abort(new BatchTimeoutError(deadlineMs));
      // In-flight calls keep running; their late results are dropped here.
      allDone.catch((error: unknown) => {
        log.error("swarm_batch_worker_error", { message: errorMessage(error) });
      });
      log.warn("swarm_batch_deadline", {
        deadlineMs,
        unfinished: tasks.length - results.size,
        inFlight: tasks.filter((task) => !results.has(task.id) && task.status === "dispatched").length,
      });
    }

    const ordered = tasks.map(
      (task) => results.get(task.id) ?? this.timedOut(task, deadlineMs, startedAt, progress.get(task.id) ?? emptyProgress())
    );
    const outcome: BatchOutcome = {
      batchId,
      status: batchStatusOf(ordered),
      results: ordered,
      byTaskId: new Map(ordered.map((result) => [result.taskId, result])),
      summary: {
        total: ordered.length,
        succeeded: ordered.filter((result) => result.status === "succeeded").length,
        failed: ordered.filter((result) => result.status === "failed").length,
        timedOut: ordered.filter((result) => result.error?.kind === "BatchTimeoutError").length,
      },
      durationMs: Date.now() - startedAt,
    };
    log.info("swarm_batch_completed", { status: outcome.status, ...outcome.summary, durationMs: outcome.durationMs });
    return outcome;
  }

  private timedOut(task: Task, deadlineMs: number, startedAt: number, progress: DispatchProgress): TaskResult {
    const inFlight = task.status === "dispatched";
    if (!inFlight) task.status = "failed";
    return {
      taskId: task.id,
      status: "failed",
      output: null,
      error: toTaskError(new BatchTimeoutError(deadlineMs, inFlight)),
      backendId: progress.backendId,
      latencyMs: Date.now() - startedAt,
      retryCount: progress.retryCount,
      attempts: progress.attempts,
    };
  }
}
