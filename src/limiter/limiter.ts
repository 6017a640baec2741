import crypto from "node:crypto";
import type { Logger } from "../config/logger";
import { LimiterTimeoutError, UnknownBackendError } from "../swarm/errors";
import { TokenBucket } from "./tokenBucket";

export type Lease = {
  readonly id: string;
  readonly backendId: string;
  readonly taskId: string;
  readonly acquiredAt: number;
};

export type BackendLimits = {
  maxConcurrent: number;
  maxRequestsPerSecond: number;
};

/** What the limiter needs from the registry: configured limits and the current concurrency cap. */
export interface CapacitySource {
  get(backendId: string): BackendLimits | null;
  effectiveConcurrency(backendId: string): number;
}

export type LimiterOptions = {
  acquireTimeoutMs?: number;
  refillIntervalMs?: number;
  clock?: () => number;
};

export type AcquireOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type LimiterStats = {
  backendId: string;
  outstanding: number;
  waiting: number;
  tokens: number;
};

type Waiter = {
  taskId: string;
  resolve: (lease: Lease) => void;
  reject: (error: unknown) => void;
  cleanup: () => void;
};

type Gate = {
  backendId: string;
  maxConcurrent: number;
  bucket: TokenBucket;
  outstanding: Map<string, Lease>;
  waiters: Waiter[];
  wakeTimer: NodeJS.Timeout | null;
};

export class Limiter {
  private readonly gates = new Map<string, Gate>();
  private readonly acquireTimeoutMs: number;
  private readonly refillIntervalMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly capacity: CapacitySource,
    private readonly logger: Logger,
    options: LimiterOptions = {}
  ) {
    this.acquireTimeoutMs = Math.max(1, options.acquireTimeoutMs ?? 5_000);
    this.refillIntervalMs = Math.max(1, options.refillIntervalMs ?? 100);
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Waits until the backend has both a free concurrency slot and a rate token.
   * Rejects with LimiterTimeoutError once `timeoutMs` passes, or with the
   * signal's reason when the caller aborts first.
   */
  acquire(backendId: string, taskId: string, options: AcquireOptions = {}): Promise<Lease> {
    let gate: Gate;
    try {
      gate = this.gateFor(backendId);
    } catch (error) {
      return Promise.reject(error);
    }
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    const timeoutMs = Math.max(1, options.timeoutMs ?? this.acquireTimeoutMs);

    return new Promise<Lease>((resolve, reject) => {
      const removeWaiter = (): void => {
        const index = gate.waiters.indexOf(waiter);
        if (index >= 0) gate.waiters.splice(index, 1);
      };
      const onAbort = (): void => {
        waiter.cleanup();
        removeWaiter();
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        waiter.cleanup();
        removeWaiter();
        this.logger.warn("limiter_acquire_timeout", { backendId, taskId, timeoutMs });
        reject(new LimiterTimeoutError(backendId, timeoutMs));
      }, timeoutMs);
      const waiter: Waiter = {
        taskId,
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      gate.waiters.push(waiter);
      this.pump(gate);
    });
  }

  /** Idempotent: releasing an unknown or already-released lease returns false. */
  release(lease: Lease): boolean {
    const gate = this.gates.get(lease.backendId);
    if (!gate || !gate.outstanding.delete(lease.id)) {
      this.logger.debug("limiter_release_ignored", { backendId: lease.backendId, leaseId: lease.id });
      return false;
    }
    this.pump(gate);
    return true;
  }

  outstanding(backendId: string): number {
    return this.gates.get(backendId)?.outstanding.size ?? 0;
  }

  stats(): LimiterStats[] {
    const now = this.clock();
    return [...this.gates.values()].map((gate) => ({
      backendId: gate.backendId,
      outstanding: gate.outstanding.size,
      waiting: gate.waiters.length,
      tokens: Math.floor(gate.bucket.available(now) * 100) / 100,
    }));
  }

  /** Rejects every waiter and stops wake timers; outstanding leases stay releasable. */
  close(): void {
    for (const gate of this.gates.values()) {
      if (gate.wakeTimer) {
        clearTimeout(gate.wakeTimer);
        gate.wakeTimer = null;
      }
      const waiters = gate.waiters.splice(0);
      for (const waiter of waiters) {
        waiter.cleanup();
        waiter.reject(new Error("Limiter closed."));
      }
    }
  }

  private gateFor(backendId: string): Gate {
    const existing = this.gates.get(backendId);
    if (existing) return existing;
    const limits = this.capacity.get(backendId);
    if (!limits) throw new UnknownBackendError(backendId);
    const gate: Gate = {
      backendId,
      maxConcurrent: limits.maxConcurrent,
      bucket: new TokenBucket(limits.maxRequestsPerSecond, this.refillIntervalMs, this.clock()),
      outstanding: new Map(),
      waiters: [],
      wakeTimer: null,
    };
    this.gates.set(backendId, gate);
    return gate;
  }

  private pump(gate: Gate): void {
    while (gate.waiters.length > 0) {
      const limit = Math.min(gate.maxConcurrent, this.capacity.effectiveConcurrency(gate.backendId));
      if (gate.outstanding.size >= limit) return;

      const now = this.clock();
      if (!gate.bucket.tryTake(now)) {
        this.scheduleWake(gate, gate.bucket.msUntilToken(now));
        return;
      }

      const waiter = gate.waiters.shift();
      if (!waiter) return;
      waiter.cleanup();
      const lease: Lease = { id: crypto.randomUUID(), backendId: gate.backendId, taskId: waiter.taskId, acquiredAt: now };
      gate.outstanding.set(lease.id, lease);
      waiter.resolve(lease);
    }
  }

  private scheduleWake(gate: Gate, delayMs: number): void {
    if (gate.wakeTimer) return;
    gate.wakeTimer = setTimeout(() => {
      gate.wakeTimer = null;
      this.pump(gate);
    }, Math.max(1, delayMs));
  }
}
