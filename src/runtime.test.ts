import test from "node:test";
import assert from "node:assert/strict";
import { readEnv } from "./config/env";
import { buildSwarmRuntime } from "./runtime";
import { silentLogger } from "./backends/testing/fakeBackend";
import type { FetchLike } from "./backends/azureOpenAiClient";

test("registers the primary backend and the configured extras", () => {
  const env = readEnv({
    AZURE_AOAI_ENDPOINT: "https://primary.example.test",
    AZURE_AOAI_API_KEY: "test-secret",
    AZURE_AOAI_API_VERSION: "2024-10-21",
    NEOCORE_BACKENDS: JSON.stringify([
      { id: "secondary", endpoint: "https://secondary.example.test", apiKey: "test-secret-2", maxConcurrent: 2 },
    ]),
  });

  const runtime = buildSwarmRuntime(env, silentLogger);

  assert.deepEqual(
    runtime.registry.snapshot().map((backend) => [backend.id, backend.kind, backend.maxConcurrent]),
    [
      ["azure-primary", "azure-openai", 4],
      ["secondary", "azure-openai", 2],
    ]
  );
  assert.equal(runtime.dispatcher.retryPolicy.maxAttempts, 4);
});

test("decision requests reach the configured deployment through the injected fetch", async () => {
  const urls: string[] = [];
  const fetchImpl: FetchLike = async (url) => {
    urls.push(url);
    return new Response(
      JSON.stringify({ choices: [{ finish_reason: "stop", message: { content: '{"summary":"ok","decision":"ok"}' } }] }),
      { status: 200 }
    );
  };
  const env = readEnv({
    AZURE_AOAI_ENDPOINT: "https://primary.example.test",
    AZURE_AOAI_API_KEY: "test-secret",
    AZURE_AOAI_API_VERSION: "2024-10-21",
    AZURE_AOAI_MODEL_MONARCH: "monarch-dep",
    NEOCORE_BACKEND_MAX_RPS: "1000",
  });

  const outcome = await buildSwarmRuntime(env, silentLogger, { fetchImpl }).decisionSwarm.decide({ question: "Why?" });

  assert.equal(outcome.status, "ok");
  assert.equal(urls.length, 9);
  assert.equal(
    urls[urls.length - 1],
    "https://primary.example.test/openai/deployments/monarch-dep/chat/completions?api-version=2024-10-21"
  );
  assert.ok(urls.slice(0, 4).some((url) => url.includes("/deployments/gpt-4.1/")));
});
