import http from "node:http";
import { URL } from "node:url";
import crypto from "node:crypto";
import { z } from "zod";
import type { Logger } from "../config/logger";
import type { BackendRegistry } from "../backends/registry";
import type { Limiter } from "../limiter/limiter";
import type { SwarmCoordinator } from "../swarm/coordinator";
import { toDecisionWire, type DecisionSwarm } from "../swarm/decision";
import { BatchValidationError, NoBackendsRegisteredError, errorMessage } from "../swarm/errors";
import type { BatchStatus } from "../swarm/models";

const SERVICE_NAME = "neo-core-swarm-api";
const MAX_BODY_BYTES = 1_000_000;

function withSecurityHeaders(headers: Record<string, string>): Record<string, string> {
  return {
    "x-content-type-options": "nosniff",
    "x-frame-options": "DENY",
    "cache-control": "no-store",
    ...headers,
  };
}

class RequestBodyError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = "RequestBodyError";
  }
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    size += buffer.length;
    if (size > MAX_BODY_BYTES) throw new RequestBodyError(413, "Request body too large.");
    chunks.push(buffer);
  }
  if (!chunks.length) return {};
  try {
    return JSON.parse(Buffer.concat(chunks).toString("utf8"));
  } catch {
    throw new RequestBodyError(400, "Request body must be valid JSON.");
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value[0]) return value[0];
  return undefined;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}

const BatchRequestSchema = z.object({
  tasks: z.array(
    z.object({
      id: z.string().trim().min(1).max(200).optional(),
      payload: z.record(z.unknown()),
    })
  ),
  deadlineMs: z.number().int().min(1).max(3_600_000).optional(),
});

const DecideRequestSchema = z.object({
  question: z.string().trim().min(1, { message: "question must not be empty" }),
  thread_id: z.string().nullish(),
  user_id: z.string().nullish(),
  context: z.string().nullish(),
  preferences: z.record(z.unknown()).nullish(),
});

const BATCH_HTTP_STATUS: Record<BatchStatus, number> = {
  succeeded: 200,
  partial: 207,
  failed: 502,
};

export type HttpServerParams = {
  host: string;
  port: number;
  logger: Logger;
  registry: BackendRegistry;
  limiter: Limiter;
  coordinator: SwarmCoordinator;
  decisionSwarm: DecisionSwarm;
  apiKey?: string;
  allowedOrigins?: string[];
};

export function startHttpServer(params: HttpServerParams): http.Server {
  const { host, port, logger, registry, limiter, coordinator, decisionSwarm, apiKey, allowedOrigins = [] } = params;

  const isOriginAllowed = (origin: string | null): boolean => {
    if (!origin) return true;
    return allowedOrigins.includes("*") || allowedOrigins.includes(origin);
  };

  const corsHeadersFor = (origin: string | null): Record<string, string> => {
    if (!origin || !isOriginAllowed(origin)) return {};
    return {
      "access-control-allow-origin": origin,
      "access-control-allow-credentials": "true",
      "access-control-allow-headers": "content-type, x-api-key, x-request-id",
      "access-control-allow-methods": "GET,POST,OPTIONS",
      "access-control-max-age": "600",
      vary: "Origin",
    };
  };

  const checkApiKey = (req: http.IncomingMessage): { ok: true } | { ok: false; statusCode: number; message: string } => {
    if (!apiKey || apiKey.trim().length === 0) {
      return { ok: false, statusCode: 500, message: "Server misconfigured: missing NEOCORE_API_KEY" };
    }
    const provided = firstHeader(req.headers["x-api-key"]);
    if (!provided || provided !== apiKey) {
      return { ok: false, statusCode: 401, message: "Unauthorized" };
    }
    return { ok: true };
  };

  const server = http.createServer(async (req, res) => {
    const incomingId = firstHeader(req.headers["x-request-id"])?.trim();
    const requestId = incomingId && incomingId.length <= 128 ? incomingId : crypto.randomUUID();
    const startedAt = Date.now();
    const method = req.method ?? "GET";
    let path = req.url ?? "/";
    const originHeader = req.headers.origin ?? null;
    const corsHeaders = corsHeadersFor(originHeader);
    let statusCode = 500;

    const sendJson = (code: number, body: unknown): void => {
      statusCode = code;
      res.writeHead(
        code,
        withSecurityHeaders({ "content-type": "application/json", ...corsHeaders, "x-request-id": requestId })
      );
      res.end(JSON.stringify(body));
    };

    try {
      let url: URL;
      try {
        url = new URL(req.url ?? "/", `http://${host}:${port}`);
      } catch {
        sendJson(400, { ok: false, message: "Malformed request target" });
        return;
      }
      path = url.pathname;

      if (method === "OPTIONS") {
        statusCode = isOriginAllowed(originHeader) ? 204 : 403;
        res.writeHead(statusCode, withSecurityHeaders({ ...corsHeaders, "x-request-id": requestId }));
        res.end();
        return;
      }

      if (method === "GET" && url.pathname === "/health") {
        sendJson(200, { status: "ok" });
        return;
      }

      if (method === "GET" && url.pathname === "/healthz") {
        sendJson(200, { ok: true, service: SERVICE_NAME, at: new Date().toISOString() });
        return;
      }

      if (method === "GET" && url.pathname === "/readyz") {
        const registered = registry.size;
        const selectable = registry.list().length;
        const ok = registered > 0 && selectable > 0;
        sendJson(ok ? 200 : 503, {
          ok,
          checks: { backends: { registered, selectable } },
          at: new Date().toISOString(),
        });
        return;
      }

      if (method === "GET" && url.pathname === "/api/backends") {
        const auth = checkApiKey(req);
        if (!auth.ok) {
          sendJson(auth.statusCode, { ok: false, message: auth.message });
          return;
        }
        sendJson(200, { ok: true, backends: registry.snapshot(), limiter: limiter.stats() });
        return;
      }

      if (method === "POST" && url.pathname === "/swarm/batch") {
        const auth = checkApiKey(req);
        if (!auth.ok) {
          sendJson(auth.statusCode, { ok: false, message: auth.message });
          return;
        }
        const parsed = BatchRequestSchema.safeParse(await readJsonBody(req));
        if (!parsed.success) {
          sendJson(400, { ok: false, message: describeIssues(parsed.error) });
          return;
        }
        const outcome = await coordinator.submit(parsed.data.tasks, {
          deadlineMs: parsed.data.deadlineMs,
          requestId,
        });
        sendJson(BATCH_HTTP_STATUS[outcome.status], {
          ok: outcome.status === "succeeded",
          batchId: outcome.batchId,
          status: outcome.status,
          summary: outcome.summary,
          durationMs: outcome.durationMs,
          results: outcome.results,
        });
        return;
      }

      if (method === "POST" && url.pathname === "/swarm/decide") {
        const auth = checkApiKey(req);
        if (!auth.ok) {
          sendJson(auth.statusCode, { ok: false, message: auth.message });
          return;
        }
        const parsed = DecideRequestSchema.safeParse(await readJsonBody(req));
        if (!parsed.success) {
          sendJson(400, { ok: false, message: describeIssues(parsed.error) });
          return;
        }
        const outcome = await decisionSwarm.decide(
          {
            question: parsed.data.question,
            threadId: parsed.data.thread_id ?? null,
            userId: parsed.data.user_id ?? null,
            context: parsed.data.context ?? null,
          },
          { requestId }
        );
        sendJson(outcome.status === "ok" ? 200 : 207, toDecisionWire(outcome));
        return;
      }

      sendJson(404, { ok: false, message: "Not found" });
    } catch (error) {
      if (error instanceof RequestBodyError) {
        sendJson(error.statusCode, { ok: false, message: error.message });
        return;
      }
      if (error instanceof BatchValidationError) {
        sendJson(400, { ok: false, code: error.code, message: error.message });
        return;
      }
      if (error instanceof NoBackendsRegisteredError) {
        sendJson(503, { ok: false, code: error.code, message: error.message });
        return;
      }
      logger.error("neocore_http_handler_error", {
        requestId,
        method,
        path,
        message: errorMessage(error),
      });
      sendJson(500, { ok: false, message: "Internal server error" });
    } finally {
      logger.info("neocore_http_request", {
        requestId,
        method,
        path,
        statusCode,
        durationMs: Date.now() - startedAt,
      });
    }
  });

  server.listen(port, host, () => {
    logger.info("neocore_http_listening", { host, port });
  });

  return server;
}
