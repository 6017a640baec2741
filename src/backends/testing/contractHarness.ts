import assert from "node:assert/strict";
import { BackendCallError, type BackendClient } from "../types";

function context(requestId: string) {
  return { requestId, taskId: `${requestId}-task`, timeoutMs: 5_000, signal: new AbortController().signal };
}

/** Behaviour every chat-completion backend client must share. */
export async function runChatBackendContract(client: BackendClient): Promise<void> {
  assert.ok(typeof client.kind === "string" && client.kind.length > 0);

  const output = await client.invoke(context("contract-ok"), {
    messages: [{ role: "user", content: "Reply with exactly: contract ok" }],
  });
  assert.equal(typeof output.content, "string");
  assert.ok(output.finishReason === null || typeof output.finishReason === "string");
  assert.ok(output.model === null || typeof output.model === "string");

  await assert.rejects(
    () => client.invoke(context("contract-empty"), { messages: [] }),
    (error: unknown) => error instanceof BackendCallError && error.code === "BAD_REQUEST" && !error.retryable
  );

  await assert.rejects(
    () => client.invoke(context("contract-shape"), { prompt: "not a chat payload" }),
    (error: unknown) => error instanceof BackendCallError && error.kind === "PermanentCallError"
  );
}
