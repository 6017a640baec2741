import crypto from "node:crypto";
import type { BackendRegistry } from "./registry";
import { classifyBackendError } from "./types";

export const PROBE_PROMPT = "Reply with exactly: connection successful";

export type ProbeRow = {
  backendId: string;
  deployment: string | null;
  ok: boolean;
  latencyMs: number;
  finishReason: string | null;
  content: string | null;
  error: string | null;
};

/**
 * One direct call per registered backend, bypassing limiter and health
 * bookkeeping so an operator can check credentials and deployments.
 */
export async function probeBackends(
  registry: BackendRegistry,
  options: { fallbackDeployment: string; timeoutMs?: number; maxCompletionTokens?: number }
): Promise<ProbeRow[]> {
  const timeoutMs = options.timeoutMs ?? 30_000;
  const ids = registry.snapshot().map((status) => status.id);
  const rows: ProbeRow[] = [];
  for (const id of ids) {
    const backend = registry.get(id);
    if (!backend) continue;
    const deployment = backend.deployment ?? options.fallbackDeployment;
    const started = Date.now();
    try {
      const output = await backend.client.invoke(
        {
          requestId: crypto.randomUUID(),
          taskId: `probe-${id}`,
          timeoutMs,
          signal: AbortSignal.timeout(timeoutMs),
        },
        {
          deployment,
          messages: [{ role: "user", content: PROBE_PROMPT }],
          maxCompletionTokens: options.maxCompletionTokens ?? 200,
        }
      );
      rows.push({
        backendId: id,
        deployment,
        ok: true,
        latencyMs: Date.now() - started,
        finishReason: output.finishReason,
        content: output.content,
        error: null,
      });
    } catch (error) {
      const classified = classifyBackendError(error);
      rows.push({
        backendId: id,
        deployment,
        ok: false,
        latencyMs: Date.now() - started,
        finishReason: null,
        content: null,
        error: `${classified.code}: ${classified.message}`,
      });
    }
  }
  return rows;
}

export function renderProbeTable(rows: ProbeRow[]): string {
  const header = ["backend", "deployment", "status", "latency", "detail"];
  const body = rows.map((row) => [
    row.backendId,
    row.deployment ?? "-",
    row.ok ? "ok" : "FAIL",
    `${row.latencyMs}ms`,
    row.ok ? JSON.stringify(row.content) : (row.error ?? ""),
  ]);
  const widths = header.map((cell, index) => Math.max(cell.length, ...body.map((cells) => cells[index].length)));
  const line = (cells: string[]) => cells.map((cell, index) => cell.padEnd(widths[index])).join("  ").trimEnd();
  return [line(header), ...body.map(line)].join("\n");
}
