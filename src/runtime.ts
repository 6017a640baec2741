import { resolveBackendConfigs, type NeoCoreEnv } from "./config/env";
import type { Logger } from "./config/logger";
import { createAzureBackend, type FetchLike } from "./backends/azureOpenAiClient";
import { BackendRegistry } from "./backends/registry";
import { Dispatcher } from "./dispatch/dispatcher";
import { maxTotalBackoffMs } from "./dispatch/retry";
import { Limiter } from "./limiter/limiter";
import { SwarmCoordinator } from "./swarm/coordinator";
import { DecisionSwarm, advisorsFromEnv } from "./swarm/decision";

export type SwarmRuntime = {
  registry: BackendRegistry;
  limiter: Limiter;
  dispatcher: Dispatcher;
  coordinator: SwarmCoordinator;
  decisionSwarm: DecisionSwarm;
};

/** Wires registry, limiter, dispatcher, coordinator and decision swarm from one env read. */
export function buildSwarmRuntime(
  env: NeoCoreEnv,
  logger: Logger,
  options: { fetchImpl?: FetchLike; monarchMaxCompletionTokens?: number } = {}
): SwarmRuntime {
  const registry = new BackendRegistry(logger, {
    health: {
      degradeAfterFailures: env.NEOCORE_HEALTH_DEGRADE_AFTER_FAILURES,
      unavailableAfterFailures: env.NEOCORE_HEALTH_UNAVAILABLE_AFTER_FAILURES,
      cooldownMs: env.NEOCORE_HEALTH_COOLDOWN_MS,
      recoverySuccesses: env.NEOCORE_HEALTH_RECOVERY_SUCCESSES,
      probationConcurrency: env.NEOCORE_HEALTH_PROBATION_CONCURRENCY,
    },
  });
  for (const config of resolveBackendConfigs(env)) {
    registry.register(
      createAzureBackend(config, {
        fetchImpl: options.fetchImpl,
        maxCompletionTokens: env.NEOCORE_ADVISOR_MAX_COMPLETION_TOKENS,
      })
    );
  }
  if (registry.size === 0) {
    logger.warn("neocore_no_backends_configured", {
      hint: "Set AZURE_AOAI_ENDPOINT or NEOCORE_BACKENDS; swarm routes answer 503 until then.",
    });
  }

  const limiter = new Limiter(registry, logger, {
    acquireTimeoutMs: env.NEOCORE_LIMITER_ACQUIRE_TIMEOUT_MS,
    refillIntervalMs: env.NEOCORE_LIMITER_REFILL_INTERVAL_MS,
  });
  const dispatcher = new Dispatcher(registry, limiter, logger, {
    callTimeoutMs: env.NEOCORE_CALL_TIMEOUT_MS,
    retry: {
      maxAttempts: env.NEOCORE_DISPATCH_MAX_ATTEMPTS,
      baseDelayMs: env.NEOCORE_DISPATCH_BASE_DELAY_MS,
      maxDelayMs: env.NEOCORE_DISPATCH_MAX_DELAY_MS,
      jitterMs: env.NEOCORE_DISPATCH_JITTER_MS,
    },
  });

  const worstBackoffMs = maxTotalBackoffMs(dispatcher.retryPolicy);
  if (worstBackoffMs >= env.NEOCORE_BATCH_DEADLINE_MS) {
    logger.warn("neocore_batch_deadline_below_backoff", {
      batchDeadlineMs: env.NEOCORE_BATCH_DEADLINE_MS,
      worstBackoffMs,
    });
  }

  const coordinator = new SwarmCoordinator({
    registry,
    dispatcher,
    logger,
    config: {
      maxParallel: env.NEOCORE_SWARM_MAX_PARALLEL,
      batchDeadlineMs: env.NEOCORE_BATCH_DEADLINE_MS,
      maxBatchSize: env.NEOCORE_BATCH_MAX_TASKS,
    },
  });
  const decisionSwarm = new DecisionSwarm({
    coordinator,
    logger,
    advisors: advisorsFromEnv(env),
    monarchDeployment: env.AZURE_AOAI_MODEL_MONARCH,
    maxCompletionTokens: env.NEOCORE_ADVISOR_MAX_COMPLETION_TOKENS,
    monarchMaxCompletionTokens: options.monarchMaxCompletionTokens,
  });

  return { registry, limiter, dispatcher, coordinator, decisionSwarm };
}
