import crypto from "node:crypto";
import type { NeoCoreEnv } from "../config/env";
import type { Logger } from "../config/logger";
import type { ChatMessage, ChatTaskPayload } from "../backends/azureOpenAiClient";
import type { SwarmCoordinator } from "./coordinator";
import type { BatchOutcome, TaskResult } from "./models";

export type AdvisorDefinition = {
  name: string;
  deployment: string;
  lens: string;
};

export type DecisionRequest = {
  question: string;
  threadId?: string | null;
  userId?: string | null;
  context?: string | null;
};

export type AdvisorOpinion = {
  name: string;
  model: string;
  summary: string;
  risks: string[];
  recommendation: string;
  error?: string;
};

export type MonarchVerdict = {
  decision: string;
  rationale: string;
  dissentSummary: string;
  nextActions: string[];
  error?: string;
};

export type DecisionStage = "pass1" | "pass2" | "monarch";

export type DecisionOutcome = {
  status: "ok" | "partial";
  requestId: string;
  threadId: string | null;
  timingMs: number;
  advisors: AdvisorOpinion[];
  monarch: MonarchVerdict | null;
};

export type DecisionSwarmOptions = {
  coordinator: SwarmCoordinator;
  logger: Logger;
  advisors: AdvisorDefinition[];
  monarchDeployment: string;
  maxCompletionTokens: number;
  monarchMaxCompletionTokens?: number;
};

export type DecideOptions = {
  requestId?: string;
  /** Called after each stage with the outcome so far. */
  onStage?: (stage: DecisionStage, partial: DecisionOutcome) => void | Promise<void>;
};

type AdvisorModelKey =
  | "AZURE_AOAI_MODEL_BUILDER"
  | "AZURE_AOAI_MODEL_SKEPTIC"
  | "AZURE_AOAI_MODEL_OPTIMIZER"
  | "AZURE_AOAI_MODEL_USER";

const ADVISOR_LENSES: ReadonlyArray<{ name: string; envKey: AdvisorModelKey; lens: string }> = [
  {
    name: "Builder",
    envKey: "AZURE_AOAI_MODEL_BUILDER",
    lens: "Your lens: ship fast, favour a pragmatic MVP, bias to action. Treat clean and honest code as a duty and argue for building the thing now.",
  },
  {
    name: "Skeptic",
    envKey: "AZURE_AOAI_MODEL_SKEPTIC",
    lens: "Your lens: security, failure modes and compliance. Look for every weakness and treat each new feature as a possible breach until proven otherwise.",
  },
  {
    name: "Optimizer",
    envKey: "AZURE_AOAI_MODEL_OPTIMIZER",
    lens: "Your lens: cost, latency, architectural efficiency and operational simplicity. Cut whatever slows the system down.",
  },
  {
    name: "UserAdvocate",
    envKey: "AZURE_AOAI_MODEL_USER",
    lens: "Your lens: UX clarity, trust, user value and less friction. Users are ends, never means; push back on anything manipulative.",
  },
];

const REVISION_LENS = "Re-evaluate your position after reviewing the other advisors. Defend or revise it.";

export function advisorsFromEnv(env: NeoCoreEnv): AdvisorDefinition[] {
  return ADVISOR_LENSES.map(({ name, envKey, lens }) => ({ name, lens, deployment: env[envKey] }));
}

export function advisorMessages(
  advisor: Pick<AdvisorDefinition, "name">,
  lens: string,
  request: DecisionRequest,
  peers: Array<{ name: string; summary: string; recommendation: string }> = []
): ChatMessage[] {
  const system = [
    `You are ${advisor.name}, an advisor in a multi-agent decision swarm.`,
    lens,
    "",
    "Be opinionated and internally consistent, and defend your worldview.",
    "Return STRICT JSON only, in this shape:",
    '{"summary": string, "risks": [string], "recommendation": string}',
  ].join("\n");
  const question = request.context ? `${request.question}\n\nContext:\n${request.context}` : request.question;
  const messages: ChatMessage[] = [
    { role: "system", content: system },
    { role: "user", content: question },
  ];
  if (peers.length > 0) {
    messages.push({ role: "assistant", content: JSON.stringify({ peer_arguments: peers }) });
  }
  return messages;
}

export function monarchMessages(request: DecisionRequest, advisors: AdvisorOpinion[]): ChatMessage[] {
  const system = [
    "You are Aristotle-Monarch, the final authority of the swarm.",
    "Weigh every advisor position and resolve their contradictions into a decisive, actionable conclusion.",
    "Return STRICT JSON only, in this shape:",
    '{"decision": string, "rationale": string, "dissent_summary": string, "next_actions": [string]}',
  ].join("\n");
  return [
    { role: "system", content: system },
    {
      role: "user",
      content: JSON.stringify({
        question: request.question,
        context: request.context ?? null,
        advisors: advisors.map(({ name, model, summary, risks, recommendation }) => ({
          name,
          model,
          summary,
          risks,
          recommendation,
        })),
      }),
    },
  ];
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

/** Parses model output as a JSON object, falling back to the outermost `{...}` embedded in prose. */
export function extractJsonObject(text: string): Record<string, unknown> | null {
  const attempts = [text.trim()];
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start >= 0 && end > start) attempts.push(text.slice(start, end + 1));
  for (const candidate of attempts) {
    try {
      const record = asRecord(JSON.parse(candidate));
      if (record) return record;
    } catch {
      continue;
    }
  }
  return null;
}

function stringField(row: Record<string, unknown>, key: string): string | undefined {
  const value = row[key];
  return typeof value === "string" ? value : undefined;
}

function stringList(row: Record<string, unknown>, key: string): string[] | undefined {
  const value = row[key];
  if (!Array.isArray(value)) return undefined;
  return value.map((entry) => (typeof entry === "string" ? entry : JSON.stringify(entry)));
}

type AdvisorFields = Pick<AdvisorOpinion, "summary" | "risks" | "recommendation">;

export function parseAdvisorAnswer(text: string, previous: AdvisorFields | null = null): AdvisorFields {
  const row = extractJsonObject(text);
  if (!row) {
    return {
      summary: text.trim(),
      risks: previous?.risks ?? [],
      recommendation: previous?.recommendation ?? "N/A",
    };
  }
  return {
    summary: stringField(row, "summary") ?? previous?.summary ?? "",
    risks: stringList(row, "risks") ?? previous?.risks ?? [],
    recommendation: stringField(row, "recommendation") ?? previous?.recommendation ?? "",
  };
}

export function parseMonarchAnswer(text: string): MonarchVerdict {
  const row = extractJsonObject(text);
  if (!row) {
    return { decision: text.trim(), rationale: "", dissentSummary: "", nextActions: [] };
  }
  return {
    decision: stringField(row, "decision") ?? "",
    rationale: stringField(row, "rationale") ?? "",
    dissentSummary: stringField(row, "dissent_summary") ?? "",
    nextActions: stringList(row, "next_actions") ?? [],
  };
}

function failureMessage(result: TaskResult | undefined): string {
  if (!result) return "No result was produced for this call.";
  return result.error ? `${result.error.kind}: ${result.error.message}` : "Call failed.";
}

function taskId(stage: DecisionStage, name: string): string {
  return `${stage}:${name}`;
}

/**
 * Two advisor passes and a monarch synthesis, each stage one batch through
 * the coordinator. A failed call is reported in place and the deliberation
 * carries on with whoever answered.
 */
export class DecisionSwarm {
  constructor(private readonly options: DecisionSwarmOptions) {}

  async decide(request: DecisionRequest, decideOptions: DecideOptions = {}): Promise<DecisionOutcome> {
    const startedAt = Date.now();
    const requestId = decideOptions.requestId ?? crypto.randomUUID();
    const log = this.options.logger.child({ requestId, threadId: request.threadId ?? null });
    const outcome: DecisionOutcome = {
      status: "ok",
      requestId,
      threadId: request.threadId ?? null,
      timingMs: 0,
      advisors: [],
      monarch: null,
    };
    const report = async (stage: DecisionStage): Promise<void> => {
      outcome.timingMs = Date.now() - startedAt;
      outcome.status = this.hasErrors(outcome) ? "partial" : "ok";
      await decideOptions.onStage?.(stage, outcome);
    };

    log.info("decision_started", { advisors: this.options.advisors.length, userId: request.userId ?? null });

    const pass1 = await this.runBatch(
      "pass1",
      this.options.advisors.map((advisor) => ({
        name: advisor.name,
        payload: this.chatPayload(advisor.deployment, advisorMessages(advisor, advisor.lens, request)),
      })),
      requestId
    );
    outcome.advisors = this.options.advisors.map((advisor) => {
      const result = pass1.byTaskId.get(taskId("pass1", advisor.name));
      if (result?.status !== "succeeded" || !result.output) {
        return {
          name: advisor.name,
          model: advisor.deployment,
          summary: "",
          risks: [],
          recommendation: "",
          error: failureMessage(result),
        };
      }
      return { name: advisor.name, model: advisor.deployment, ...parseAdvisorAnswer(result.output.content) };
    });
    await report("pass1");

    const answered = outcome.advisors.filter((opinion) => opinion.error === undefined);
    if (answered.length > 0) {
      const pass2 = await this.runBatch(
        "pass2",
        answered.map((opinion) => ({
          name: opinion.name,
          payload: this.chatPayload(
            opinion.model,
            advisorMessages(
              opinion,
              REVISION_LENS,
              request,
              answered
                .filter((peer) => peer.name !== opinion.name)
                .map(({ name, summary, recommendation }) => ({ name, summary, recommendation }))
            )
          ),
        })),
        requestId
      );
      outcome.advisors = outcome.advisors.map((opinion) => {
        if (opinion.error !== undefined) return opinion;
        const result = pass2.byTaskId.get(taskId("pass2", opinion.name));
        if (result?.status !== "succeeded" || !result.output) {
          return { ...opinion, error: `Revision failed; keeping first position. ${failureMessage(result)}` };
        }
        return { ...opinion, ...parseAdvisorAnswer(result.output.content, opinion) };
      });
    }
    await report("pass2");

    const positions = outcome.advisors.filter((opinion) => opinion.summary || opinion.recommendation);
    if (positions.length === 0) {
      outcome.monarch = {
        decision: "",
        rationale: "",
        dissentSummary: "",
        nextActions: [],
        error: "No advisor produced a position to synthesize.",
      };
    } else {
      const verdict = await this.runBatch(
        "monarch",
        [
          {
            name: "Monarch",
            payload: this.chatPayload(
              this.options.monarchDeployment,
              monarchMessages(request, positions),
              this.options.monarchMaxCompletionTokens
            ),
          },
        ],
        requestId
      );
      const result = verdict.byTaskId.get(taskId("monarch", "Monarch"));
      outcome.monarch =
        result?.status === "succeeded" && result.output
          ? parseMonarchAnswer(result.output.content)
          : { decision: "", rationale: "", dissentSummary: "", nextActions: [], error: failureMessage(result) };
    }
    await report("monarch");

    log.info("decision_completed", {
      status: outcome.status,
      timingMs: outcome.timingMs,
      failedAdvisors: outcome.advisors.filter((opinion) => opinion.error !== undefined).map((opinion) => opinion.name),
      monarchFailed: outcome.monarch?.error !== undefined,
    });
    return outcome;
  }

  private chatPayload(deployment: string, messages: ChatMessage[], maxCompletionTokens?: number): ChatTaskPayload {
    return { deployment, messages, maxCompletionTokens: maxCompletionTokens ?? this.options.maxCompletionTokens };
  }

  private async runBatch(
    stage: DecisionStage,
    calls: Array<{ name: string; payload: ChatTaskPayload }>,
    requestId: string
  ): Promise<BatchOutcome> {
    const outcome = await this.options.coordinator.submit(
      calls.map(({ name, payload }) => ({ id: taskId(stage, name), payload })),
      { requestId }
    );
    this.options.logger.debug("decision_stage_completed", {
      requestId,
      stage,
      status: outcome.status,
      durationMs: outcome.durationMs,
    });
    return outcome;
  }

  private hasErrors(outcome: DecisionOutcome): boolean {
    return outcome.advisors.some((opinion) => opinion.error !== undefined) || outcome.monarch?.error !== undefined;
  }
}

/** Snake-case response body for `POST /swarm/decide`. */
export function toDecisionWire(outcome: DecisionOutcome): Record<string, unknown> {
  return {
    status: outcome.status,
    request_id: outcome.requestId,
    thread_id: outcome.threadId,
    timing_ms: outcome.timingMs,
    advisors: outcome.advisors.map((opinion) => ({
      name: opinion.name,
      model: opinion.model,
      summary: opinion.summary,
      risks: opinion.risks,
      recommendation: opinion.recommendation,
      ...(opinion.error !== undefined ? { error: opinion.error } : {}),
    })),
    monarch: outcome.monarch
      ? {
          decision: outcome.monarch.decision,
          rationale: outcome.monarch.rationale,
          dissent_summary: outcome.monarch.dissentSummary,
          next_actions: outcome.monarch.nextActions,
          ...(outcome.monarch.error !== undefined ? { error: outcome.monarch.error } : {}),
        }
      : null,
  };
}
