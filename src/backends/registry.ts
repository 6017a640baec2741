import type { Logger } from "../config/logger";
import { DuplicateBackendError, UnknownBackendError } from "../swarm/errors";
import { BackendHealthMachine, normalizeHealthPolicy, type HealthPolicy, type HealthSnapshot } from "./health";
import type { Backend, BackendDefinition, BackendHealthStatus } from "./types";

export type BackendRegistryOptions = {
  health?: Partial<HealthPolicy>;
  clock?: () => number;
};

export type BackendStatus = {
  id: string;
  endpoint: string;
  kind: string;
  deployment: string | null;
  maxConcurrent: number;
  maxRequestsPerSecond: number;
  effectiveConcurrency: number;
  health: HealthSnapshot;
};

type BackendRecord = {
  definition: BackendDefinition;
  health: BackendHealthMachine;
};

/**
 * Owns every configured backend and its health. Reads and writes are
 * synchronous, so each call is a single-writer critical section per backend.
 */
export class BackendRegistry {
  private readonly records = new Map<string, BackendRecord>();
  private readonly policy: HealthPolicy;
  private readonly clock: () => number;

  constructor(
    private readonly logger: Logger,
    options: BackendRegistryOptions = {}
  ) {
    this.policy = normalizeHealthPolicy(options.health);
    this.clock = options.clock ?? Date.now;
  }

  get size(): number {
    return this.records.size;
  }

  register(definition: BackendDefinition): Backend {
    if (this.records.has(definition.id)) {
      throw new DuplicateBackendError(definition.id);
    }
    if (!Number.isInteger(definition.maxConcurrent) || definition.maxConcurrent < 1) {
      throw new RangeError(`Backend "${definition.id}" maxConcurrent must be a positive integer.`);
    }
    if (!(definition.maxRequestsPerSecond > 0)) {
      throw new RangeError(`Backend "${definition.id}" maxRequestsPerSecond must be positive.`);
    }
    const health = new BackendHealthMachine(this.policy, (transition) => {
      const log = transition.to === "healthy" ? this.logger.info : this.logger.warn;
      log("backend_health_transition", { backendId: definition.id, ...transition });
    });
    const record: BackendRecord = { definition, health };
    this.records.set(definition.id, record);
    this.logger.info("backend_registered", {
      backendId: definition.id,
      endpoint: definition.endpoint,
      kind: definition.client.kind,
      maxConcurrent: definition.maxConcurrent,
      maxRequestsPerSecond: definition.maxRequestsPerSecond,
    });
    return this.view(record);
  }

  /** Every registered id in registration order, whatever its health. */
  ids(): string[] {
    return [...this.records.keys()];
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  get(id: string): Backend | null {
    const record = this.records.get(id);
    return record ? this.view(record) : null;
  }

  /** Selectable backends (anything not `unavailable`) in registration order. */
  list(predicate: (backend: Backend) => boolean = () => true): Backend[] {
    const now = this.clock();
    const output: Backend[] = [];
    for (const record of this.records.values()) {
      if (!record.health.isSelectable(now)) continue;
      const backend = this.view(record, now);
      if (predicate(backend)) output.push(backend);
    }
    return output;
  }

  markHealth(id: string, status: BackendHealthStatus): boolean {
    const accepted = this.require(id).health.mark(status, this.clock());
    if (!accepted) {
      this.logger.warn("backend_health_mark_refused", { backendId: id, requested: status, reason: "cooldown_active" });
    }
    return accepted;
  }

  recordSuccess(id: string): BackendHealthStatus {
    return this.require(id).health.recordSuccess(this.clock());
  }

  recordFailure(id: string): BackendHealthStatus {
    return this.require(id).health.recordFailure(this.clock());
  }

  effectiveConcurrency(id: string): number {
    const record = this.require(id);
    return record.health.effectiveConcurrency(record.definition.maxConcurrent, this.clock());
  }

  snapshot(): BackendStatus[] {
    const now = this.clock();
    return [...this.records.values()].map(({ definition, health }) => ({
      id: definition.id,
      endpoint: definition.endpoint,
      kind: definition.client.kind,
      deployment: definition.deployment,
      maxConcurrent: definition.maxConcurrent,
      maxRequestsPerSecond: definition.maxRequestsPerSecond,
      effectiveConcurrency: health.effectiveConcurrency(definition.maxConcurrent, now),
      health: health.snapshot(now),
    }));
  }

  private require(id: string): BackendRecord {
    const record = this.records.get(id);
    if (!record) throw new UnknownBackendError(id);
    return record;
  }

  private view(record: BackendRecord, now = this.clock()): Backend {
    return { ...record.definition, health: record.health.current(now) };
  }
}
