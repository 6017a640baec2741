import fs from "node:fs/promises";
import { readEnv } from "../config/env";
import { createLogger } from "../config/logger";
import { toDecisionWire, type DecisionOutcome, type DecisionStage } from "../swarm/decision";
import { buildSwarmRuntime } from "../runtime";

const STAGE_LABELS: Record<DecisionStage, string> = {
  pass1: "initial positions",
  pass2: "adversarial revision",
  monarch: "monarch synthesis",
};

async function writePartial(outFile: string, stage: DecisionStage | "started", body: Record<string, unknown>): Promise<void> {
  try {
    await fs.writeFile(outFile, `${JSON.stringify({ stage, ...body }, null, 2)}\n`, "utf8");
  } catch (error) {
    process.stderr.write(`    could not write ${outFile}: ${error instanceof Error ? error.message : String(error)}\n`);
  }
}

function stageLine(stage: DecisionStage, outcome: DecisionOutcome): string {
  if (stage === "monarch") {
    return outcome.monarch?.error ? `    ✗ Monarch ERROR: ${outcome.monarch.error}` : "    ✓ Monarch done";
  }
  return outcome.advisors
    .map((opinion) =>
      opinion.error ? `    ✗ ${opinion.name} ERROR: ${opinion.error}` : `    ✓ ${opinion.name} (${opinion.model}) done`
    )
    .join("\n");
}

async function run(): Promise<void> {
  const question = process.argv.slice(2).join(" ").trim();
  if (!question) {
    process.stderr.write('Usage:\n  npm run decide -- "Your question here"\n');
    process.exitCode = 1;
    return;
  }

  const outFile = process.env.SWARM_OUTFILE?.trim() || "swarm_last.json";
  const env = readEnv();
  const logger = createLogger(env.NEOCORE_LOG_LEVEL === "debug" ? "debug" : "warn", (line) => {
    process.stderr.write(line);
  });
  const { registry, decisionSwarm, limiter } = buildSwarmRuntime(env, logger, { monarchMaxCompletionTokens: 500 });
  if (registry.size === 0) {
    process.stderr.write("No backends configured. Set AZURE_AOAI_ENDPOINT, AZURE_AOAI_API_KEY and AZURE_AOAI_API_VERSION.\n");
    process.exitCode = 1;
    return;
  }

  const startedAt = new Date().toISOString();
  await writePartial(outFile, "started", { question, started_at: startedAt });
  const stages: DecisionStage[] = ["pass1", "pass2", "monarch"];

  try {
    process.stdout.write(`[1/${stages.length}] ${STAGE_LABELS.pass1}...\n`);
    const outcome = await decisionSwarm.decide(
      { question },
      {
        onStage: async (stage, partial) => {
          process.stdout.write(`${stageLine(stage, partial)}\n`);
          await writePartial(outFile, stage, { question, started_at: startedAt, ...toDecisionWire(partial) });
          const next = stages.indexOf(stage) + 1;
          if (next < stages.length) {
            process.stdout.write(`[${next + 1}/${stages.length}] ${STAGE_LABELS[stages[next]]}...\n`);
          }
        },
      }
    );
    const finished = { question, started_at: startedAt, finished_at: new Date().toISOString(), ...toDecisionWire(outcome) };
    await writePartial(outFile, "monarch", finished);
    process.stdout.write(`\nSaved: ${outFile}\n${JSON.stringify(finished, null, 2)}\n`);
    if (outcome.status !== "ok") process.exitCode = 2;
  } finally {
    limiter.close();
  }
}

void run().catch((error) => {
  process.stderr.write(`decide fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
