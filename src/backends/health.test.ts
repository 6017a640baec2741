import test from "node:test";
import assert from "node:assert/strict";
import { BackendHealthMachine, normalizeHealthPolicy, type HealthTransition } from "./health";

const policy = normalizeHealthPolicy({
  degradeAfterFailures: 2,
  unavailableAfterFailures: 4,
  cooldownMs: 1_000,
  recoverySuccesses: 2,
  probationConcurrency: 1,
});

test("failures degrade then take the backend down", () => {
  const machine = new BackendHealthMachine(policy);
  assert.equal(machine.recordFailure(0), "healthy");
  assert.equal(machine.recordFailure(1), "degraded");
  assert.equal(machine.recordSuccess(2), "degraded");
  assert.equal(machine.snapshot(2).consecutiveFailures, 0);

  machine.recordFailure(3);
  machine.recordFailure(4);
  machine.recordFailure(5);
  assert.equal(machine.recordFailure(6), "unavailable");
  assert.equal(machine.snapshot(6).cooldownUntil, new Date(1_006).toISOString());
});

test("unavailable backend is not selectable until the cool-down elapses", () => {
  const machine = new BackendHealthMachine(policy);
  machine.mark("unavailable", 0);
  for (const now of [0, 250, 500, 999]) {
    assert.equal(machine.isSelectable(now), false, `selectable at ${now}`);
  }
  assert.equal(machine.isSelectable(1_000), true);
  assert.equal(machine.current(1_000), "degraded");
  assert.equal(machine.snapshot(1_000).probation, true);
});

test("probation recovers to healthy after consecutive successes", () => {
  const machine = new BackendHealthMachine(policy);
  machine.mark("unavailable", 0);
  assert.equal(machine.recordSuccess(1_001), "degraded");
  assert.equal(machine.recordSuccess(1_002), "healthy");
  assert.equal(machine.snapshot(1_002).probation, false);
});

test("a failure on probation returns the backend to unavailable", () => {
  const machine = new BackendHealthMachine(policy);
  machine.mark("unavailable", 0);
  assert.equal(machine.recordFailure(1_010), "unavailable");
  assert.equal(machine.current(2_009), "unavailable");
  assert.equal(machine.current(2_010), "degraded");
});

test("outcomes reported during the cool-down are ignored", () => {
  const machine = new BackendHealthMachine(policy);
  machine.mark("unavailable", 0);
  assert.equal(machine.recordSuccess(10), "unavailable");
  assert.equal(machine.recordFailure(20), "unavailable");
  assert.equal(machine.snapshot(20).cooldownUntil, new Date(1_000).toISOString());
});

test("manual marks are refused inside the cool-down window", () => {
  const machine = new BackendHealthMachine(policy);
  assert.equal(machine.mark("unavailable", 0), true);
  assert.equal(machine.mark("healthy", 500), false);
  assert.equal(machine.mark("degraded", 999), false);
  assert.equal(machine.current(999), "unavailable");
  assert.equal(machine.mark("healthy", 1_000), true);
  assert.equal(machine.current(1_000), "healthy");
});

test("degraded backends are capped to probation concurrency", () => {
  const machine = new BackendHealthMachine(policy);
  assert.equal(machine.effectiveConcurrency(5, 0), 5);
  machine.mark("degraded", 0);
  assert.equal(machine.effectiveConcurrency(5, 0), 1);
});

test("transitions are reported in order", () => {
  const transitions: HealthTransition[] = [];
  const machine = new BackendHealthMachine(policy, (transition) => transitions.push(transition));
  machine.recordFailure(0);
  machine.recordFailure(0);
  machine.mark("unavailable", 0);
  machine.current(1_000);
  machine.recordSuccess(1_001);
  machine.recordSuccess(1_002);

  assert.deepEqual(
    transitions.map((t) => `${t.from}>${t.to}:${t.reason}`),
    [
      "healthy>degraded:failures",
      "degraded>unavailable:manual",
      "unavailable>degraded:cooldown_elapsed",
      "degraded>healthy:recovered",
    ]
  );
});
