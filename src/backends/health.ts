import type { BackendHealthStatus } from "./types";

export type HealthPolicy = {
  degradeAfterFailures: number;
  unavailableAfterFailures: number;
  cooldownMs: number;
  recoverySuccesses: number;
  probationConcurrency: number;
};

export const DEFAULT_HEALTH_POLICY: HealthPolicy = {
  degradeAfterFailures: 2,
  unavailableAfterFailures: 5,
  cooldownMs: 30_000,
  recoverySuccesses: 3,
  probationConcurrency: 1,
};

export function normalizeHealthPolicy(input: Partial<HealthPolicy> | undefined): HealthPolicy {
  const degradeAfterFailures = Math.max(1, input?.degradeAfterFailures ?? DEFAULT_HEALTH_POLICY.degradeAfterFailures);
  return {
    degradeAfterFailures,
    unavailableAfterFailures: Math.max(
      degradeAfterFailures,
      input?.unavailableAfterFailures ?? DEFAULT_HEALTH_POLICY.unavailableAfterFailures
    ),
    cooldownMs: Math.max(0, input?.cooldownMs ?? DEFAULT_HEALTH_POLICY.cooldownMs),
    recoverySuccesses: Math.max(1, input?.recoverySuccesses ?? DEFAULT_HEALTH_POLICY.recoverySuccesses),
    probationConcurrency: Math.max(1, input?.probationConcurrency ?? DEFAULT_HEALTH_POLICY.probationConcurrency),
  };
}

export type HealthSnapshot = {
  status: BackendHealthStatus;
  probation: boolean;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  cooldownUntil: string | null;
  lastTransitionAt: string | null;
};

export type HealthTransition = {
  from: BackendHealthStatus;
  to: BackendHealthStatus;
  reason: "failures" | "probation_failure" | "cooldown_elapsed" | "recovered" | "manual";
};

/**
 * healthy → degraded → unavailable → degraded (probation) → healthy.
 *
 * While unavailable, nothing but another `unavailable` mark can move the
 * backend until `cooldownMs` has passed. Outcomes of calls that were issued
 * before the backend went down are ignored during the cool-down.
 */
export class BackendHealthMachine {
  private status: BackendHealthStatus = "healthy";
  private probation = false;
  private consecutiveFailures = 0;
  private consecutiveSuccesses = 0;
  private cooldownUntilMs: number | null = null;
  private lastTransitionAtMs: number | null = null;

  constructor(
    private readonly policy: HealthPolicy,
    private readonly onTransition: (transition: HealthTransition) => void = () => {}
  ) {}

  current(now: number): BackendHealthStatus {
    this.refresh(now);
    return this.status;
  }

  isSelectable(now: number): boolean {
    return this.current(now) !== "unavailable";
  }

  effectiveConcurrency(maxConcurrent: number, now: number): number {
    if (this.current(now) === "degraded") return Math.min(maxConcurrent, this.policy.probationConcurrency);
    return maxConcurrent;
  }

  recordSuccess(now: number): BackendHealthStatus {
    this.refresh(now);
    if (this.status === "unavailable") return this.status;
    this.consecutiveFailures = 0;
    this.consecutiveSuccesses += 1;
    if (this.status === "degraded" && this.consecutiveSuccesses >= this.policy.recoverySuccesses) {
      this.transition("healthy", "recovered", now);
    }
    return this.status;
  }

  recordFailure(now: number): BackendHealthStatus {
    this.refresh(now);
    if (this.status === "unavailable") return this.status;
    this.consecutiveSuccesses = 0;
    this.consecutiveFailures += 1;
    if (this.probation) {
      this.enterUnavailable("probation_failure", now);
    } else if (this.consecutiveFailures >= this.policy.unavailableAfterFailures) {
      this.enterUnavailable("failures", now);
    } else if (this.status === "healthy" && this.consecutiveFailures >= this.policy.degradeAfterFailures) {
      this.transition("degraded", "failures", now);
    }
    return this.status;
  }

  /** Returns false when the request is refused because the cool-down is still running. */
  mark(target: BackendHealthStatus, now: number): boolean {
    this.refresh(now);
    if (target === "unavailable") {
      this.enterUnavailable("manual", now);
      return true;
    }
    if (this.status === "unavailable") return false;
    this.consecutiveFailures = 0;
    this.consecutiveSuccesses = 0;
    this.probation = false;
    if (this.status !== target) this.transition(target, "manual", now);
    return true;
  }

  snapshot(now: number): HealthSnapshot {
    this.refresh(now);
    return {
      status: this.status,
      probation: this.probation,
      consecutiveFailures: this.consecutiveFailures,
      consecutiveSuccesses: this.consecutiveSuccesses,
      cooldownUntil: this.cooldownUntilMs === null ? null : new Date(this.cooldownUntilMs).toISOString(),
      lastTransitionAt: this.lastTransitionAtMs === null ? null : new Date(this.lastTransitionAtMs).toISOString(),
    };
  }

  private refresh(now: number): void {
    if (this.status !== "unavailable" || this.cooldownUntilMs === null) return;
    if (now < this.cooldownUntilMs) return;
    this.cooldownUntilMs = null;
    this.consecutiveFailures = 0;
    this.consecutiveSuccesses = 0;
    this.probation = true;
    this.transition("degraded", "cooldown_elapsed", now);
  }

  private enterUnavailable(reason: HealthTransition["reason"], now: number): void {
    this.cooldownUntilMs = now + this.policy.cooldownMs;
    this.probation = false;
    this.consecutiveSuccesses = 0;
    if (this.status !== "unavailable") this.transition("unavailable", reason, now);
  }

  private transition(to: BackendHealthStatus, reason: HealthTransition["reason"], now: number): void {
    const from = this.status;
    this.status = to;
    this.lastTransitionAtMs = now;
    if (to === "healthy") this.probation = false;
    this.onTransition({ from, to, reason });
  }
}
