import { readEnv } from "../config/env";
import { createLogger } from "../config/logger";
import { probeBackends, renderProbeTable } from "../backends/probe";
import { buildSwarmRuntime } from "../runtime";

function arg(name: string, fallback: string | undefined = undefined): string | undefined {
  const prefix = `--${name}=`;
  const prefixed = process.argv.find((entry) => entry.startsWith(prefix));
  if (!prefixed) return fallback;
  return prefixed.slice(prefix.length);
}

async function run(): Promise<void> {
  const outputMode = arg("output", "table") === "json" ? "json" : "table";
  const env = readEnv();
  const logger = createLogger(env.NEOCORE_LOG_LEVEL, (line) => {
    process.stderr.write(line);
  });
  const { registry } = buildSwarmRuntime(env, logger);

  if (registry.size === 0) {
    process.stderr.write("No backends configured. Set AZURE_AOAI_ENDPOINT, AZURE_AOAI_API_KEY and AZURE_AOAI_API_VERSION.\n");
    process.exitCode = 1;
    return;
  }

  const rows = await probeBackends(registry, {
    fallbackDeployment: env.AZURE_AOAI_MODEL_MONARCH,
    timeoutMs: env.NEOCORE_CALL_TIMEOUT_MS,
  });
  if (outputMode === "json") {
    process.stdout.write(`${JSON.stringify({ ok: rows.every((row) => row.ok), rows }, null, 2)}\n`);
  } else {
    process.stdout.write(`${renderProbeTable(rows)}\n`);
  }
  if (!rows.every((row) => row.ok)) process.exitCode = 1;
}

void run().catch((error) => {
  process.stderr.write(`smoketest fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
