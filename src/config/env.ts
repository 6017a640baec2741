import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const PLACEHOLDER_MATCHERS = [
  /change-?me/i,
  /todo/i,
  /placeholder/i,
  /replace[_-]?with/i,
  /^\s*<.*>\s*$/,
  /\$\{[^}]+\}/,
];

const RUNTIME_ENFORCED_SENSITIVE_VARS = new Set(["NEOCORE_API_KEY", "AZURE_AOAI_API_KEY"]);

const requiredString = (field: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${field} must not be empty` });

const CsvFromString = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean)
  )
  .pipe(z.array(z.string()));

const deploymentName = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => value || fallback);

export const BackendConfigSchema = z.object({
  id: requiredString("id"),
  endpoint: z.string().trim().url(),
  apiKey: requiredString("apiKey"),
  apiVersion: z.string().trim().min(1).optional(),
  deployment: z.string().trim().min(1).optional(),
  maxConcurrent: z.number().int().min(1).max(256).optional(),
  maxRequestsPerSecond: z.number().min(0.1).max(10_000).optional(),
});

export type BackendConfigInput = z.infer<typeof BackendConfigSchema>;

const BackendListFromJson = z
  .string()
  .transform((value, ctx): unknown => {
    if (!value.trim()) return [];
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON array of backend definitions" });
      return z.NEVER;
    }
  })
  .pipe(z.array(BackendConfigSchema));

const EnvSchema = z.object({
  NEOCORE_HOST: requiredString("NEOCORE_HOST").default("127.0.0.1"),
  NEOCORE_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  NEOCORE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  NEOCORE_API_KEY: z.string().optional(),
  NEOCORE_ALLOWED_ORIGINS: CsvFromString.default(""),

  AZURE_AOAI_ENDPOINT: z.string().trim().default(""),
  AZURE_AOAI_API_KEY: z.string().optional(),
  AZURE_AOAI_API_VERSION: z.string().trim().default(""),
  AZURE_AOAI_DEPLOYMENT: z.string().trim().optional(),
  NEOCORE_BACKENDS: BackendListFromJson.default(""),
  NEOCORE_BACKEND_MAX_CONCURRENT: z.coerce.number().int().min(1).max(256).default(4),
  NEOCORE_BACKEND_MAX_RPS: z.coerce.number().min(0.1).max(10_000).default(5),

  NEOCORE_LIMITER_ACQUIRE_TIMEOUT_MS: z.coerce.number().int().min(10).max(300_000).default(5_000),
  NEOCORE_LIMITER_REFILL_INTERVAL_MS: z.coerce.number().int().min(10).max(60_000).default(100),

  NEOCORE_CALL_TIMEOUT_MS: z.coerce.number().int().min(100).max(600_000).default(60_000),
  NEOCORE_DISPATCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(25).default(4),
  NEOCORE_DISPATCH_BASE_DELAY_MS: z.coerce.number().int().min(1).max(60_000).default(250),
  NEOCORE_DISPATCH_MAX_DELAY_MS: z.coerce.number().int().min(1).max(300_000).default(4_000),
  NEOCORE_DISPATCH_JITTER_MS: z.coerce.number().int().min(0).max(60_000).default(100),

  NEOCORE_HEALTH_DEGRADE_AFTER_FAILURES: z.coerce.number().int().min(1).max(100).default(2),
  NEOCORE_HEALTH_UNAVAILABLE_AFTER_FAILURES: z.coerce.number().int().min(1).max(100).default(5),
  NEOCORE_HEALTH_COOLDOWN_MS: z.coerce.number().int().min(100).max(3_600_000).default(30_000),
  NEOCORE_HEALTH_RECOVERY_SUCCESSES: z.coerce.number().int().min(1).max(100).default(3),
  NEOCORE_HEALTH_PROBATION_CONCURRENCY: z.coerce.number().int().min(1).max(256).default(1),

  NEOCORE_SWARM_MAX_PARALLEL: z.coerce.number().int().min(1).max(256).default(8),
  NEOCORE_BATCH_DEADLINE_MS: z.coerce.number().int().min(100).max(3_600_000).default(120_000),
  NEOCORE_BATCH_MAX_TASKS: z.coerce.number().int().min(1).max(10_000).default(100),

  AZURE_AOAI_MODEL_BUILDER: deploymentName("gpt-4.1-mini"),
  AZURE_AOAI_MODEL_SKEPTIC: deploymentName("gpt-4.1-mini"),
  AZURE_AOAI_MODEL_OPTIMIZER: deploymentName("gpt-4.1-mini"),
  AZURE_AOAI_MODEL_USER: deploymentName("gpt-4.1"),
  AZURE_AOAI_MODEL_MONARCH: deploymentName("gpt-4.1-mini"),
  NEOCORE_ADVISOR_MAX_COMPLETION_TOKENS: z.coerce.number().int().min(16).max(32_000).default(600),
});

export type NeoCoreEnv = z.infer<typeof EnvSchema>;

export type BackendConfig = {
  id: string;
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  deployment: string | null;
  maxConcurrent: number;
  maxRequestsPerSecond: number;
};

function hasPlaceholderValue(value: string): boolean {
  return PLACEHOLDER_MATCHERS.some((pattern) => pattern.test(value));
}

function validateConnectivityConfig(env: NeoCoreEnv): string[] {
  const errors: string[] = [];

  if (env.AZURE_AOAI_ENDPOINT) {
    try {
      new URL(env.AZURE_AOAI_ENDPOINT);
    } catch {
      errors.push("AZURE_AOAI_ENDPOINT must be a valid URL");
    }
    if (!env.AZURE_AOAI_API_KEY?.trim()) {
      errors.push("AZURE_AOAI_API_KEY is required when AZURE_AOAI_ENDPOINT is set");
    }
    if (!env.AZURE_AOAI_API_VERSION) {
      errors.push("AZURE_AOAI_API_VERSION is required when AZURE_AOAI_ENDPOINT is set");
    }
  }

  const seen = new Set<string>(env.AZURE_AOAI_ENDPOINT ? ["azure-primary"] : []);
  for (const backend of env.NEOCORE_BACKENDS) {
    if (seen.has(backend.id)) {
      errors.push(`NEOCORE_BACKENDS contains duplicate backend id "${backend.id}"`);
    }
    seen.add(backend.id);
    if (!backend.apiVersion && !env.AZURE_AOAI_API_VERSION) {
      errors.push(`NEOCORE_BACKENDS backend "${backend.id}" needs apiVersion or AZURE_AOAI_API_VERSION`);
    }
  }

  if (env.NEOCORE_HEALTH_UNAVAILABLE_AFTER_FAILURES < env.NEOCORE_HEALTH_DEGRADE_AFTER_FAILURES) {
    errors.push("NEOCORE_HEALTH_UNAVAILABLE_AFTER_FAILURES must be >= NEOCORE_HEALTH_DEGRADE_AFTER_FAILURES");
  }
  if (env.NEOCORE_DISPATCH_MAX_DELAY_MS < env.NEOCORE_DISPATCH_BASE_DELAY_MS) {
    errors.push("NEOCORE_DISPATCH_MAX_DELAY_MS must be >= NEOCORE_DISPATCH_BASE_DELAY_MS");
  }

  return errors;
}

function validateRuntimeSecretValues(env: NeoCoreEnv): string[] {
  const issues: string[] = [];

  for (const name of RUNTIME_ENFORCED_SENSITIVE_VARS) {
    const value = name === "NEOCORE_API_KEY" ? env.NEOCORE_API_KEY : env.AZURE_AOAI_API_KEY;
    if (typeof value !== "string") continue;
    if (!hasPlaceholderValue(value)) continue;
    issues.push(`${name} is configured with a placeholder value; set a concrete secret before runtime startup.`);
  }

  for (const backend of env.NEOCORE_BACKENDS) {
    if (hasPlaceholderValue(backend.apiKey)) {
      issues.push(`NEOCORE_BACKENDS backend "${backend.id}" has a placeholder apiKey.`);
    }
  }

  return issues;
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): NeoCoreEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid neo-core env: ${message}`);
  }
  const env = parsed.data;
  const connectivityIssues = validateConnectivityConfig(env);
  if (connectivityIssues.length > 0) {
    throw new Error(`Invalid neo-core env connectivity: ${connectivityIssues.join("; ")}`);
  }
  const runtimeSecretIssues = validateRuntimeSecretValues(env);
  if (runtimeSecretIssues.length > 0) {
    throw new Error(`Invalid neo-core env values: ${runtimeSecretIssues.join("; ")}`);
  }
  return env;
}

/** Flattens the primary Azure backend and `NEOCORE_BACKENDS` into one list with defaults applied. */
export function resolveBackendConfigs(env: NeoCoreEnv): BackendConfig[] {
  const configs: BackendConfig[] = [];
  if (env.AZURE_AOAI_ENDPOINT && env.AZURE_AOAI_API_KEY) {
    configs.push({
      id: "azure-primary",
      endpoint: env.AZURE_AOAI_ENDPOINT,
      apiKey: env.AZURE_AOAI_API_KEY,
      apiVersion: env.AZURE_AOAI_API_VERSION,
      deployment: env.AZURE_AOAI_DEPLOYMENT || null,
      maxConcurrent: env.NEOCORE_BACKEND_MAX_CONCURRENT,
      maxRequestsPerSecond: env.NEOCORE_BACKEND_MAX_RPS,
    });
  }
  for (const backend of env.NEOCORE_BACKENDS) {
    configs.push({
      id: backend.id,
      endpoint: backend.endpoint,
      apiKey: backend.apiKey,
      apiVersion: backend.apiVersion ?? env.AZURE_AOAI_API_VERSION,
      deployment: backend.deployment ?? null,
      maxConcurrent: backend.maxConcurrent ?? env.NEOCORE_BACKEND_MAX_CONCURRENT,
      maxRequestsPerSecond: backend.maxRequestsPerSecond ?? env.NEOCORE_BACKEND_MAX_RPS,
    });
  }
  return configs;
}

export function redactEnvForLogs(env: NeoCoreEnv): Record<string, string | number | boolean | null> {
  return {
    NEOCORE_HOST: env.NEOCORE_HOST,
    NEOCORE_PORT: env.NEOCORE_PORT,
    NEOCORE_LOG_LEVEL: env.NEOCORE_LOG_LEVEL,
    NEOCORE_API_KEY: env.NEOCORE_API_KEY ? "[set]" : null,
    NEOCORE_ALLOWED_ORIGINS: env.NEOCORE_ALLOWED_ORIGINS.join(","),
    AZURE_AOAI_ENDPOINT: env.AZURE_AOAI_ENDPOINT || null,
    AZURE_AOAI_API_KEY: env.AZURE_AOAI_API_KEY ? "[set]" : null,
    AZURE_AOAI_API_VERSION: env.AZURE_AOAI_API_VERSION || null,
    AZURE_AOAI_DEPLOYMENT: env.AZURE_AOAI_DEPLOYMENT ?? null,
    NEOCORE_BACKENDS: env.NEOCORE_BACKENDS.map((backend) => `${backend.id}@${backend.endpoint}`).join(","),
    NEOCORE_BACKEND_MAX_CONCURRENT: env.NEOCORE_BACKEND_MAX_CONCURRENT,
    NEOCORE_BACKEND_MAX_RPS: env.NEOCORE_BACKEND_MAX_RPS,
    NEOCORE_LIMITER_ACQUIRE_TIMEOUT_MS: env.NEOCORE_LIMITER_ACQUIRE_TIMEOUT_MS,
    NEOCORE_LIMITER_REFILL_INTERVAL_MS: env.NEOCORE_LIMITER_REFILL_INTERVAL_MS,
    NEOCORE_CALL_TIMEOUT_MS: env.NEOCORE_CALL_TIMEOUT_MS,
    NEOCORE_DISPATCH_MAX_ATTEMPTS: env.NEOCORE_DISPATCH_MAX_ATTEMPTS,
    NEOCORE_DISPATCH_BASE_DELAY_MS: env.NEOCORE_DISPATCH_BASE_DELAY_MS,
    NEOCORE_DISPATCH_MAX_DELAY_MS: env.NEOCORE_DISPATCH_MAX_DELAY_MS,
    NEOCORE_DISPATCH_JITTER_MS: env.NEOCORE_DISPATCH_JITTER_MS,
    NEOCORE_HEALTH_DEGRADE_AFTER_FAILURES: env.NEOCORE_HEALTH_DEGRADE_AFTER_FAILURES,
    NEOCORE_HEALTH_UNAVAILABLE_AFTER_FAILURES: env.NEOCORE_HEALTH_UNAVAILABLE_AFTER_FAILURES,
    NEOCORE_HEALTH_COOLDOWN_MS: env.NEOCORE_HEALTH_COOLDOWN_MS,
    NEOCORE_HEALTH_RECOVERY_SUCCESSES: env.NEOCORE_HEALTH_RECOVERY_SUCCESSES,
    NEOCORE_HEALTH_PROBATION_CONCURRENCY: env.NEOCORE_HEALTH_PROBATION_CONCURRENCY,
    NEOCORE_SWARM_MAX_PARALLEL: env.NEOCORE_SWARM_MAX_PARALLEL,
    NEOCORE_BATCH_DEADLINE_MS: env.NEOCORE_BATCH_DEADLINE_MS,
    NEOCORE_BATCH_MAX_TASKS: env.NEOCORE_BATCH_MAX_TASKS,
    AZURE_AOAI_MODEL_BUILDER: env.AZURE_AOAI_MODEL_BUILDER,
    AZURE_AOAI_MODEL_SKEPTIC: env.AZURE_AOAI_MODEL_SKEPTIC,
    AZURE_AOAI_MODEL_OPTIMIZER: env.AZURE_AOAI_MODEL_OPTIMIZER,
    AZURE_AOAI_MODEL_USER: env.AZURE_AOAI_MODEL_USER,
    AZURE_AOAI_MODEL_MONARCH: env.AZURE_AOAI_MODEL_MONARCH,
    NEOCORE_ADVISOR_MAX_COMPLETION_TOKENS: env.NEOCORE_ADVISOR_MAX_COMPLETION_TOKENS,
  };
}
