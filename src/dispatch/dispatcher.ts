import crypto from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../config/logger";
import type { BackendRegistry } from "../backends/registry";
import { BackendCallError, classifyBackendError, type Backend, type BackendOutput } from "../backends/types";
import type { Lease, Limiter } from "../limiter/limiter";
import { LimiterTimeoutError, NoBackendAvailableError } from "../swarm/errors";
import { toTaskError, type Task, type TaskResult } from "../swarm/models";
import { computeRetryDelay, normalizeRetryOptions, type RetryOptions, type RetryPolicy } from "./retry";

export type DispatcherOptions = {
  retry?: RetryOptions;
  callTimeoutMs?: number;
  acquireTimeoutMs?: number;
  random?: () => number;
};

export type DispatchOptions = {
  requestId?: string;
  /** Cancels limiter waits and backoff sleeps. A remote call already in flight is left to its own deadline. */
  signal?: AbortSignal;
  /** Updated in place as attempts start, so a caller can report progress for a task it stops waiting on. */
  progress?: DispatchProgress;
};

export type DispatchProgress = {
  attempts: number;
  retryCount: number;
  backendId: string | null;
};

export function emptyProgress(): DispatchProgress {
  return { attempts: 0, retryCount: 0, backendId: null };
}

type AttemptState = {
  startedAt: number;
  progress: DispatchProgress;
  lastError: unknown;
};

function rotate<T>(items: readonly T[], offset: number): T[] {
  if (items.length === 0) return [];
  const start = offset % items.length;
  return [...items.slice(start), ...items.slice(0, start)];
}

export class Dispatcher {
  private cursor = 0;
  private readonly policy: RetryPolicy;
  private readonly callTimeoutMs: number;
  private readonly acquireTimeoutMs: number | undefined;
  private readonly random: () => number;

  constructor(
    private readonly registry: BackendRegistry,
    private readonly limiter: Limiter,
    private readonly logger: Logger,
    options: DispatcherOptions = {}
  ) {
    this.policy = normalizeRetryOptions(options.retry);
    this.callTimeoutMs = Math.max(1, options.callTimeoutMs ?? 60_000);
    this.acquireTimeoutMs = options.acquireTimeoutMs;
    this.random = options.random ?? Math.random;
  }

  get retryPolicy(): RetryPolicy {
    return { ...this.policy };
  }

  /**
   * Healthy candidates first, rotated by a shared round-robin pointer, then
   * degraded ones as fallback. Unavailable backends never appear.
   */
  selectOrder(candidateIds: readonly string[]): Backend[] {
    const eligible = this.eligible(candidateIds);
    const offset = this.cursor;
    this.cursor = (this.cursor + 1) % Number.MAX_SAFE_INTEGER;
    return [
      ...rotate(
        eligible.filter((backend) => backend.health === "healthy"),
        offset
      ),
      ...rotate(
        eligible.filter((backend) => backend.health === "degraded"),
        offset
      ),
    ];
  }

  /**
   * Candidates are backend ids; health is re-read from the registry on every
   * attempt, so a backend that recovers mid-task becomes selectable again.
   */
  async dispatch(task: Task, candidateIds: readonly string[], options: DispatchOptions = {}): Promise<TaskResult> {
    const requestId = options.requestId ?? crypto.randomUUID();
    const { signal } = options;
    const log = this.logger.child({ requestId, taskId: task.id });
    const state: AttemptState = {
      startedAt: Date.now(),
      progress: options.progress ?? emptyProgress(),
      lastError: null,
    };
    const { progress } = state;

    for (let attempt = 0; attempt < this.policy.maxAttempts; attempt += 1) {
      if (signal?.aborted) return this.settleFailed(task, state, signal.reason, log);

      const order = this.selectOrder(candidateIds);
      if (order.length === 0) {
        return this.settleFailed(task, state, new NoBackendAvailableError(candidateIds), log);
      }

      const acquired = await this.acquireFirst(order, task, signal, log);
      if (signal?.aborted) {
        if (acquired.lease) this.limiter.release(acquired.lease);
        return this.settleFailed(task, state, signal.reason, log);
      }
      if (!acquired.lease || !acquired.backend) {
        return this.settleFailed(task, state, acquired.error, log);
      }

      const { lease, backend } = acquired;
      if (progress.attempts > 0) progress.retryCount += 1;
      progress.attempts += 1;
      progress.backendId = backend.id;
      task.status = "dispatched";
      log.debug("dispatch_attempt", { backendId: backend.id, attempt: attempt + 1, health: backend.health });

      let output: BackendOutput;
      try {
        output = await this.callWithDeadline(backend, task, requestId);
      } catch (error) {
        this.limiter.release(lease);
        const callError = classifyBackendError(error);
        state.lastError = callError;

        if (!callError.retryable) {
          return this.settleFailed(task, state, callError, log);
        }

        const health = this.registry.recordFailure(backend.id);
        task.status = "pending";
        if (attempt + 1 >= this.policy.maxAttempts) break;
        if (this.eligible(candidateIds).length === 0) {
          return this.settleFailed(task, state, new NoBackendAvailableError(candidateIds), log);
        }

        const delayMs = computeRetryDelay(this.policy, attempt, this.random);
        log.warn("dispatch_retry_delay", {
          backendId: backend.id,
          attempt: attempt + 1,
          delayMs,
          code: callError.code,
          backendHealth: health,
          message: callError.message,
        });
        try {
          await sleep(delayMs, undefined, { signal });
        } catch {
          return this.settleFailed(task, state, signal?.reason, log);
        }
        continue;
      }

      this.limiter.release(lease);
      this.registry.recordSuccess(backend.id);
      task.status = "succeeded";
      const result: TaskResult = {
        taskId: task.id,
        status: "succeeded",
        output,
        error: null,
        backendId: backend.id,
        latencyMs: Date.now() - state.startedAt,
        retryCount: progress.retryCount,
        attempts: progress.attempts,
      };
      log.info("dispatch_succeeded", {
        backendId: backend.id,
        latencyMs: result.latencyMs,
        retryCount: result.retryCount,
      });
      return result;
    }

    return this.settleFailed(task, state, state.lastError, log);
  }

  private eligible(candidateIds: readonly string[]): Backend[] {
    const allowed = new Set(candidateIds);
    return this.registry.list((backend) => allowed.has(backend.id));
  }

  private async acquireFirst(
    order: Backend[],
    task: Task,
    signal: AbortSignal | undefined,
    log: Logger
  ): Promise<{ lease: Lease | null; backend: Backend | null; error: unknown }> {
    let lastError: unknown = new NoBackendAvailableError(order.map((backend) => backend.id));
    for (const candidate of order) {
      let lease: Lease;
      try {
        lease = await this.limiter.acquire(candidate.id, task.id, { signal, timeoutMs: this.acquireTimeoutMs });
      } catch (error) {
        if (signal?.aborted) return { lease: null, backend: null, error: signal.reason };
        lastError = error;
        if (error instanceof LimiterTimeoutError) {
          log.warn("dispatch_limiter_timeout", { backendId: candidate.id, waitedMs: error.waitedMs });
        }
        continue;
      }
      const current = this.registry.get(candidate.id);
      if (!current || current.health === "unavailable") {
        // Went down while this task was queued on its limiter.
        this.limiter.release(lease);
        lastError = new NoBackendAvailableError([candidate.id]);
        continue;
      }
      return { lease, backend: current, error: null };
    }
    return { lease: null, backend: null, error: lastError };
  }

  private async callWithDeadline(backend: Backend, task: Task, requestId: string): Promise<BackendOutput> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new BackendCallError("TIMEOUT", `Backend call exceeded ${this.callTimeoutMs}ms deadline.`, true, {
          backendId: backend.id,
        });
        controller.abort(error);
        reject(error);
      }, this.callTimeoutMs);
    });
    try {
      return await Promise.race([
        backend.client.invoke(
          { requestId, taskId: task.id, timeoutMs: this.callTimeoutMs, signal: controller.signal },
          task.payload
        ),
        deadline,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private settleFailed(task: Task, { startedAt, progress }: AttemptState, error: unknown, log: Logger): TaskResult {
    task.status = "failed";
    const taskError = toTaskError(error ?? new NoBackendAvailableError([]));
    const result: TaskResult = {
      taskId: task.id,
      status: "failed",
      output: null,
      error: taskError,
      backendId: progress.backendId,
      latencyMs: Date.now() - startedAt,
      retryCount: progress.retryCount,
      attempts: progress.attempts,
    };
    log.warn("dispatch_failed", {
      backendId: progress.backendId,
      kind: taskError.kind,
      code: taskError.code,
      message: taskError.message,
      retryCount: progress.retryCount,
      attempts: progress.attempts,
    });
    return result;
  }
}
