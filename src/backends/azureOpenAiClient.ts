import { z } from "zod";
import type { BackendConfig } from "../config/env";
import {
  BackendCallError,
  classifyBackendError,
  classifyHttpStatus,
  type BackendCallContext,
  type BackendClient,
  type BackendCredential,
  type BackendDefinition,
  type BackendOutput,
  type TaskPayload,
} from "./types";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export const ChatMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

/** Task payload understood by chat-completion backends. */
export const ChatTaskPayloadSchema = z.object({
  deployment: z.string().trim().min(1).optional(),
  messages: z.array(ChatMessageSchema).min(1),
  maxCompletionTokens: z.number().int().min(1).max(32_000).optional(),
});

export type ChatTaskPayload = z.infer<typeof ChatTaskPayloadSchema>;

const CompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullable().optional(),
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

const ErrorBodySchema = z.object({
  error: z.object({
    code: z.string().nullable().optional(),
    message: z.string().optional(),
  }),
});

const DEFAULT_MAX_COMPLETION_TOKENS = 600;
const MAX_DETAIL_LENGTH = 300;

export type AzureOpenAiClientOptions = {
  endpoint: string;
  credential: BackendCredential;
  apiVersion: string;
  defaultDeployment?: string | null;
  maxCompletionTokens?: number;
  fetchImpl?: FetchLike;
};

function errorDetail(text: string): string {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const { code, message } = parsed.data.error;
      return [code, message].filter(Boolean).join(": ");
    }
  } catch {
    // plain-text error body
  }
  return text.trim().slice(0, MAX_DETAIL_LENGTH);
}

export class AzureOpenAiClient implements BackendClient {
  readonly kind = "azure-openai";
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: AzureOpenAiClientOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  completionsUrl(deployment: string): string {
    const version = encodeURIComponent(this.options.apiVersion);
    return `${this.endpoint}/openai/deployments/${encodeURIComponent(deployment)}/chat/completions?api-version=${version}`;
  }

  async invoke(ctx: BackendCallContext, payload: TaskPayload): Promise<BackendOutput> {
    const parsed = ChatTaskPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "payload"}: ${i.message}`).join("; ");
      throw new BackendCallError("BAD_REQUEST", `Invalid chat payload: ${issues}`, false);
    }
    const deployment = parsed.data.deployment ?? this.options.defaultDeployment;
    if (!deployment) {
      throw new BackendCallError("BAD_REQUEST", "Chat payload names no deployment and the backend has no default.", false);
    }

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await this.fetchImpl(this.completionsUrl(deployment), {
        method: "POST",
        headers: {
          [this.options.credential.header]: this.options.credential.secret,
          "content-type": "application/json",
          "x-request-id": ctx.requestId,
        },
        body: JSON.stringify({
          messages: parsed.data.messages,
          max_completion_tokens:
            parsed.data.maxCompletionTokens ?? this.options.maxCompletionTokens ?? DEFAULT_MAX_COMPLETION_TOKENS,
        }),
        signal: ctx.signal,
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      throw classifyBackendError(error);
    }

    if (!ok) throw classifyHttpStatus(status, errorDetail(text));

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new BackendCallError("BAD_RESPONSE", "Malformed completion response: body is not JSON.", false, { status });
    }
    const errorBody = ErrorBodySchema.safeParse(body);
    if (errorBody.success) {
      throw new BackendCallError("BAD_RESPONSE", `Completion returned an error: ${errorDetail(text)}`, false, { status });
    }
    const completion = CompletionResponseSchema.safeParse(body);
    if (!completion.success) {
      throw new BackendCallError("BAD_RESPONSE", "Malformed completion response: missing choices[0].message.", false, {
        status,
      });
    }
    const [choice] = completion.data.choices;
    return {
      content: choice.message.content ?? "",
      finishReason: choice.finish_reason ?? null,
      model: completion.data.model ?? deployment,
    };
  }
}

export function createAzureBackend(
  config: BackendConfig,
  options: { fetchImpl?: FetchLike; maxCompletionTokens?: number } = {}
): BackendDefinition {
  const credential: BackendCredential = { header: "api-key", secret: config.apiKey };
  return {
    id: config.id,
    endpoint: config.endpoint,
    credential,
    maxConcurrent: config.maxConcurrent,
    maxRequestsPerSecond: config.maxRequestsPerSecond,
    deployment: config.deployment,
    client: new AzureOpenAiClient({
      endpoint: config.endpoint,
      credential,
      apiVersion: config.apiVersion,
      defaultDeployment: config.deployment,
      maxCompletionTokens: options.maxCompletionTokens,
      fetchImpl: options.fetchImpl,
    }),
  };
}
