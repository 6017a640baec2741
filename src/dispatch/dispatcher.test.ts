import test from "node:test";
import assert from "node:assert/strict";
import { Dispatcher, type DispatcherOptions, type DispatchProgress } from "./dispatcher";
import type { HealthPolicy } from "../backends/health";
import { BackendRegistry } from "../backends/registry";
import { BackendCallError, type BackendDefinition } from "../backends/types";
import { delay, fakeBackend, FakeBackendClient, okOutput, silentLogger } from "../backends/testing/fakeBackend";
import { Limiter } from "../limiter/limiter";
import { BatchTimeoutError } from "../swarm/errors";
import type { Task } from "../swarm/models";

const FAST_RETRY = { baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 };

function makeTask(id: string): Task {
  return { id, payload: { prompt: `prompt for ${id}` }, submittedAt: new Date().toISOString(), status: "pending" };
}

function setup(definitions: BackendDefinition[], options: DispatcherOptions = {}, health: Partial<HealthPolicy> = {}) {
  const registry = new BackendRegistry(silentLogger, { health });
  for (const definition of definitions) registry.register(definition);
  const limiter = new Limiter(registry, silentLogger, { acquireTimeoutMs: 1_000, refillIntervalMs: 10 });
  const dispatcher = new Dispatcher(registry, limiter, silentLogger, {
    callTimeoutMs: 1_000,
    ...options,
    retry: { ...FAST_RETRY, ...options.retry },
  });
  return { registry, limiter, dispatcher };
}

function transient(message = "upstream 503"): BackendCallError {
  return new BackendCallError("UNAVAILABLE", message, true);
}

test("a backend with limit 1 never runs two calls at once", async () => {
  const client = new FakeBackendClient(async (ctx) => {
    await delay(25);
    return okOutput(`done ${ctx.taskId}`);
  });
  const { registry, limiter, dispatcher } = setup([fakeBackend("b1", client, { maxConcurrent: 1 })]);
  const candidates = registry.ids();

  const results = await Promise.all([
    dispatcher.dispatch(makeTask("t1"), candidates),
    dispatcher.dispatch(makeTask("t2"), candidates),
  ]);

  assert.deepEqual(
    results.map((result) => result.status),
    ["succeeded", "succeeded"]
  );
  assert.equal(client.maxInFlight, 1);
  assert.equal(limiter.outstanding("b1"), 0);
});

test("a permanent failure is not retried", async () => {
  const client = new FakeBackendClient(async () => {
    throw new BackendCallError("AUTH", "Backend responded 401", false);
  });
  const { registry, dispatcher } = setup([fakeBackend("b1", client)]);
  const task = makeTask("t1");

  const result = await dispatcher.dispatch(task, registry.ids());

  assert.equal(result.status, "failed");
  assert.equal(result.error?.kind, "PermanentCallError");
  assert.equal(result.error?.code, "AUTH");
  assert.equal(result.retryCount, 0);
  assert.equal(result.attempts, 1);
  assert.equal(client.calls.length, 1);
  assert.equal(task.status, "failed");
  assert.equal(registry.get("b1")?.health, "healthy");
});

test("three transient failures then success reports three retries", async () => {
  const client = new FakeBackendClient(async (_ctx, _payload, callIndex) => {
    if (callIndex < 3) throw transient();
    return okOutput("finally");
  });
  const { registry, limiter, dispatcher } = setup([fakeBackend("b1", client)], { retry: { maxAttempts: 5 } });
  const task = makeTask("t1");

  const result = await dispatcher.dispatch(task, registry.ids());

  assert.equal(result.status, "succeeded");
  assert.equal(result.output?.content, "finally");
  assert.equal(result.backendId, "b1");
  assert.equal(result.retryCount, 3);
  assert.equal(result.attempts, 4);
  assert.equal(result.error, null);
  assert.equal(task.status, "succeeded");
  assert.equal(limiter.outstanding("b1"), 0);
});

test("transient failures fail the task once attempts run out", async () => {
  const client = new FakeBackendClient(async () => {
    throw transient("upstream 502");
  });
  const { registry, dispatcher } = setup([fakeBackend("b1", client)], { retry: { maxAttempts: 3 } });

  const result = await dispatcher.dispatch(makeTask("t1"), registry.ids());

  assert.equal(result.status, "failed");
  assert.equal(result.error?.kind, "TransientCallError");
  assert.equal(result.error?.message, "upstream 502");
  assert.equal(result.retryCount, 2);
  assert.equal(result.attempts, 3);
  assert.equal(client.calls.length, 3);
  assert.equal(registry.get("b1")?.health, "degraded");
});

test("fails with NoBackendAvailableError when every candidate is unavailable", async () => {
  const client = new FakeBackendClient();
  const { registry, dispatcher } = setup([fakeBackend("b1", client)]);
  const candidates = registry.ids();
  registry.markHealth("b1", "unavailable");

  const result = await dispatcher.dispatch(makeTask("t1"), candidates);

  assert.equal(result.status, "failed");
  assert.equal(result.error?.kind, "NoBackendAvailableError");
  assert.equal(result.attempts, 0);
  assert.equal(result.backendId, null);
  assert.equal(client.calls.length, 0);
});

test("unavailable backends are never selected", async () => {
  const down = new FakeBackendClient();
  const up = new FakeBackendClient();
  const { registry, dispatcher } = setup([fakeBackend("b1", down), fakeBackend("b2", up)]);
  const candidates = registry.ids();
  registry.markHealth("b1", "unavailable");

  const results = await Promise.all(
    ["t1", "t2", "t3", "t4"].map((id) => dispatcher.dispatch(makeTask(id), candidates))
  );

  assert.deepEqual(
    results.map((result) => result.backendId),
    ["b2", "b2", "b2", "b2"]
  );
  assert.equal(down.calls.length, 0);
  assert.equal(up.calls.length, 4);
});

test("sequential tasks rotate across healthy backends", async () => {
  const { registry, dispatcher } = setup([fakeBackend("b1"), fakeBackend("b2")]);
  const candidates = registry.ids();
  const used: Array<string | null> = [];
  for (const id of ["t1", "t2", "t3", "t4"]) {
    used.push((await dispatcher.dispatch(makeTask(id), candidates)).backendId);
  }
  assert.deepEqual(used, ["b1", "b2", "b1", "b2"]);
});

test("healthy backends are preferred over degraded ones", async () => {
  const { registry, dispatcher } = setup([fakeBackend("b1"), fakeBackend("b2")]);
  registry.markHealth("b1", "degraded");
  const order = dispatcher.selectOrder(["b1", "b2"]);
  assert.deepEqual(
    order.map((backend) => backend.id),
    ["b2", "b1"]
  );
});

test("a limiter timeout moves on to the next candidate", async () => {
  const { registry, limiter, dispatcher } = setup(
    [fakeBackend("b1", undefined, { maxConcurrent: 1 }), fakeBackend("b2")],
    { acquireTimeoutMs: 20 }
  );
  const held = await limiter.acquire("b1", "holder");

  const result = await dispatcher.dispatch(makeTask("t1"), registry.ids());

  assert.equal(result.status, "succeeded");
  assert.equal(result.backendId, "b2");
  limiter.release(held);
});

test("a limiter timeout on every candidate fails the task without a call", async () => {
  const client = new FakeBackendClient();
  const { registry, limiter, dispatcher } = setup([fakeBackend("b1", client, { maxConcurrent: 1 })], {
    acquireTimeoutMs: 20,
  });
  const held = await limiter.acquire("b1", "holder");

  const result = await dispatcher.dispatch(makeTask("t1"), registry.ids());

  assert.equal(result.status, "failed");
  assert.equal(result.error?.kind, "LimiterTimeoutError");
  assert.equal(result.attempts, 0);
  assert.equal(client.calls.length, 0);
  limiter.release(held);
});

test("a call that outlives its deadline fails as a transient timeout", async () => {
  const client = new FakeBackendClient(
    (ctx) =>
      new Promise((_, reject) => {
        ctx.signal.addEventListener("abort", () => reject(ctx.signal.reason));
      })
  );
  const { registry, limiter, dispatcher } = setup([fakeBackend("b1", client)], {
    callTimeoutMs: 20,
    retry: { maxAttempts: 1 },
  });

  const result = await dispatcher.dispatch(makeTask("t1"), registry.ids());

  assert.equal(result.status, "failed");
  assert.equal(result.error?.kind, "TransientCallError");
  assert.equal(result.error?.code, "TIMEOUT");
  assert.equal(limiter.outstanding("b1"), 0);
});

test("aborting during backoff fails the task with the abort reason", async () => {
  const client = new FakeBackendClient(async () => {
    throw transient();
  });
  const { registry, dispatcher } = setup([fakeBackend("b1", client)], {
    retry: { maxAttempts: 5, baseDelayMs: 1_000, maxDelayMs: 1_000 },
  });
  const controller = new AbortController();
  setTimeout(() => controller.abort(new BatchTimeoutError(30)), 30);

  const result = await dispatcher.dispatch(makeTask("t1"), registry.ids(), { signal: controller.signal });

  assert.equal(result.status, "failed");
  assert.equal(result.error?.kind, "BatchTimeoutError");
  assert.equal(result.retryCount, 0);
  assert.equal(result.attempts, 1);
  assert.equal(client.calls.length, 1);
});

test("retries stop without a backoff once the only backend becomes unavailable", async () => {
  const client = new FakeBackendClient(async () => {
    throw transient();
  });
  const { registry, limiter, dispatcher } = setup(
    [fakeBackend("b1", client)],
    { retry: { maxAttempts: 5, baseDelayMs: 10, maxDelayMs: 10 } },
    { degradeAfterFailures: 1, unavailableAfterFailures: 2 }
  );

  const result = await dispatcher.dispatch(makeTask("t1"), registry.ids());

  assert.equal(result.status, "failed");
  assert.equal(result.error?.kind, "NoBackendAvailableError");
  assert.equal(client.calls.length, 2);
  assert.equal(result.attempts, 2);
  assert.equal(result.retryCount, 1);
  assert.equal(result.backendId, "b1");
  assert.equal(registry.get("b1")?.health, "unavailable");
  assert.equal(limiter.outstanding("b1"), 0);
});

test("progress passed in is kept current across attempts", async () => {
  const client = new FakeBackendClient(async (_ctx, _payload, callIndex) => {
    if (callIndex < 2) throw transient();
    return okOutput("third time");
  });
  const { registry, dispatcher } = setup([fakeBackend("b1", client)], { retry: { maxAttempts: 4 } });
  const progress: DispatchProgress = { attempts: 0, retryCount: 0, backendId: null };

  const result = await dispatcher.dispatch(makeTask("t1"), registry.ids(), { progress });

  assert.equal(result.status, "succeeded");
  assert.deepEqual(progress, { attempts: 3, retryCount: 2, backendId: "b1" });
});
