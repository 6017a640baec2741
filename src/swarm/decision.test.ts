import test from "node:test";
import assert from "node:assert/strict";
import {
  DecisionSwarm,
  extractJsonObject,
  parseAdvisorAnswer,
  parseMonarchAnswer,
  toDecisionWire,
  type AdvisorDefinition,
  type DecisionStage,
} from "./decision";
import { SwarmCoordinator } from "./coordinator";
import { ChatTaskPayloadSchema, type ChatTaskPayload } from "../backends/azureOpenAiClient";
import { BackendRegistry } from "../backends/registry";
import { BackendCallError } from "../backends/types";
import { fakeBackend, FakeBackendClient, okOutput, silentLogger } from "../backends/testing/fakeBackend";
import { Dispatcher } from "../dispatch/dispatcher";
import { Limiter } from "../limiter/limiter";

const ADVISORS: AdvisorDefinition[] = [
  { name: "Builder", deployment: "dep-builder", lens: "Ship it." },
  { name: "Skeptic", deployment: "dep-skeptic", lens: "Doubt it." },
  { name: "Optimizer", deployment: "dep-optimizer", lens: "Trim it." },
  { name: "UserAdvocate", deployment: "dep-user", lens: "Ask users." },
];

type Reply = (payload: ChatTaskPayload, advisor: string | null) => string;

function speaker(payload: ChatTaskPayload): string | null {
  const match = /^You are (\w+),/.exec(payload.messages[0].content);
  return match ? match[1] : null;
}

function setup(reply: Reply) {
  const client = new FakeBackendClient(async (_ctx, raw) => {
    const payload = ChatTaskPayloadSchema.parse(raw);
    return okOutput(reply(payload, speaker(payload)));
  });
  const registry = new BackendRegistry(silentLogger);
  registry.register(fakeBackend("b1", client));
  const limiter = new Limiter(registry, silentLogger, { refillIntervalMs: 10 });
  const dispatcher = new Dispatcher(registry, limiter, silentLogger, { retry: { maxAttempts: 1 } });
  const coordinator = new SwarmCoordinator({
    registry,
    dispatcher,
    logger: silentLogger,
    config: { maxParallel: 4, batchDeadlineMs: 5_000, maxBatchSize: 10 },
  });
  const swarm = new DecisionSwarm({
    coordinator,
    logger: silentLogger,
    advisors: ADVISORS,
    monarchDeployment: "dep-monarch",
    maxCompletionTokens: 600,
  });
  return { client, swarm };
}

const standardReply: Reply = (payload, advisor) => {
  if (advisor === null) {
    return JSON.stringify({
      decision: "Ship the MVP",
      rationale: "Balances speed and safety",
      dissent_summary: "Skeptic wants auth hardening",
      next_actions: ["deploy", "review auth"],
    });
  }
  if (payload.messages.length === 3) {
    return JSON.stringify({ summary: `${advisor} revised`, recommendation: `${advisor} final` });
  }
  return JSON.stringify({ summary: `${advisor} first`, risks: [`${advisor} risk`], recommendation: `${advisor} plan` });
};

test("extractJsonObject reads plain, fenced and embedded objects", () => {
  assert.deepEqual(extractJsonObject('{"a":1}'), { a: 1 });
  assert.deepEqual(extractJsonObject('Sure! ```json\n{"summary":"x"}\n``` Hope that helps.'), { summary: "x" });
  assert.equal(extractJsonObject("[1,2]"), null);
  assert.equal(extractJsonObject("no json here"), null);
});

test("parseAdvisorAnswer falls back to the raw text and to earlier values", () => {
  assert.deepEqual(parseAdvisorAnswer("  Just build it.  "), {
    summary: "Just build it.",
    risks: [],
    recommendation: "N/A",
  });
  const previous = { summary: "old", risks: ["r1"], recommendation: "old plan" };
  assert.deepEqual(parseAdvisorAnswer('{"summary":"new","risks":["a",2]}', previous), {
    summary: "new",
    risks: ["a", "2"],
    recommendation: "old plan",
  });
});

test("parseMonarchAnswer treats non-JSON output as the decision", () => {
  assert.deepEqual(parseMonarchAnswer("Go with option B."), {
    decision: "Go with option B.",
    rationale: "",
    dissentSummary: "",
    nextActions: [],
  });
});

test("runs two advisor passes and a monarch synthesis", async () => {
  const { client, swarm } = setup(standardReply);
  const stages: DecisionStage[] = [];

  const outcome = await swarm.decide(
    { question: "Which database?", threadId: "thread-7" },
    { requestId: "req-42", onStage: (stage) => void stages.push(stage) }
  );

  assert.equal(outcome.status, "ok");
  assert.equal(outcome.requestId, "req-42");
  assert.equal(outcome.threadId, "thread-7");
  assert.deepEqual(stages, ["pass1", "pass2", "monarch"]);
  assert.equal(client.calls.length, 9);
  assert.deepEqual(outcome.advisors[0], {
    name: "Builder",
    model: "dep-builder",
    summary: "Builder revised",
    risks: ["Builder risk"],
    recommendation: "Builder final",
  });
  assert.deepEqual(
    outcome.advisors.map((opinion) => opinion.name),
    ["Builder", "Skeptic", "Optimizer", "UserAdvocate"]
  );
  assert.equal(outcome.monarch?.decision, "Ship the MVP");
  assert.deepEqual(outcome.monarch?.nextActions, ["deploy", "review auth"]);

  const revision = client.calls
    .map((call) => ChatTaskPayloadSchema.parse(call.payload))
    .find((payload) => payload.messages.length === 3 && speaker(payload) === "Skeptic");
  assert.ok(revision);
  assert.equal(revision.deployment, "dep-skeptic");
  assert.deepEqual(
    JSON.parse(revision.messages[2].content).peer_arguments.map((peer: { name: string }) => peer.name),
    ["Builder", "Optimizer", "UserAdvocate"]
  );
});

test("a failing advisor is reported in place and the rest continue", async () => {
  const { client, swarm } = setup((payload, advisor) => {
    if (advisor === "Skeptic") throw new BackendCallError("BAD_REQUEST", "Backend responded 400: content filtered", false);
    return standardReply(payload, advisor);
  });

  const outcome = await swarm.decide({ question: "Which queue?" });

  assert.equal(outcome.status, "partial");
  assert.equal(client.calls.length, 4 + 3 + 1);
  const skeptic = outcome.advisors[1];
  assert.equal(skeptic.summary, "");
  assert.equal(skeptic.error, "PermanentCallError: Backend responded 400: content filtered");
  assert.equal(outcome.advisors[2].summary, "Optimizer revised");

  const monarchCall = ChatTaskPayloadSchema.parse(client.calls[client.calls.length - 1].payload);
  assert.equal(monarchCall.deployment, "dep-monarch");
  assert.deepEqual(
    JSON.parse(monarchCall.messages[1].content).advisors.map((row: { name: string }) => row.name),
    ["Builder", "Optimizer", "UserAdvocate"]
  );
  assert.equal(outcome.monarch?.error, undefined);
});

test("monarch failure keeps advisor output and marks the decision partial", async () => {
  const { swarm } = setup((payload, advisor) => {
    if (advisor === null) throw new BackendCallError("AUTH", "Backend responded 401", false);
    return standardReply(payload, advisor);
  });

  const outcome = await swarm.decide({ question: "Which cache?" });
  const wire = toDecisionWire(outcome);

  assert.equal(outcome.status, "partial");
  assert.deepEqual(wire.monarch, {
    decision: "",
    rationale: "",
    dissent_summary: "",
    next_actions: [],
    error: "PermanentCallError: Backend responded 401",
  });
  assert.equal(wire.status, "partial");
  assert.equal(wire.thread_id, null);
});

test("no monarch call is made when every advisor fails", async () => {
  const { client, swarm } = setup(() => {
    throw new BackendCallError("AUTH", "Backend responded 403", false);
  });

  const outcome = await swarm.decide({ question: "Anything?" });

  assert.equal(client.calls.length, 4);
  assert.equal(outcome.monarch?.error, "No advisor produced a position to synthesize.");
  assert.ok(outcome.advisors.every((opinion) => opinion.error !== undefined));
});
