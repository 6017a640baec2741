import { readEnv, redactEnvForLogs } from "./config/env";
import { createLogger } from "./config/logger";
import { startHttpServer } from "./http/server";
import { buildSwarmRuntime } from "./runtime";

async function main(): Promise<void> {
  const env = readEnv();
  const logger = createLogger(env.NEOCORE_LOG_LEVEL);

  logger.info("neocore_boot", { env: redactEnvForLogs(env) });

  const runtime = buildSwarmRuntime(env, logger);
  const server = startHttpServer({
    host: env.NEOCORE_HOST,
    port: env.NEOCORE_PORT,
    logger,
    registry: runtime.registry,
    limiter: runtime.limiter,
    coordinator: runtime.coordinator,
    decisionSwarm: runtime.decisionSwarm,
    apiKey: env.NEOCORE_API_KEY,
    allowedOrigins: env.NEOCORE_ALLOWED_ORIGINS,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string, exitCode = 0): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("neocore_shutdown_start", { signal });

    runtime.limiter.close();
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) reject(error);
          else resolve();
        });
      });
    } catch (error) {
      logger.error("neocore_shutdown_failed", { message: error instanceof Error ? error.message : String(error) });
      process.exitCode = 1;
      return;
    }
    logger.info("neocore_shutdown_complete", {});
    process.exitCode = exitCode;
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("uncaughtException", (error) => {
    logger.error("neocore_uncaught_exception", {
      message: error.message,
      stack: error.stack ?? null,
    });
    void shutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("neocore_unhandled_rejection", {
      message: reason instanceof Error ? reason.message : String(reason),
    });
    void shutdown("unhandledRejection", 1);
  });
}

void main().catch((error) => {
  process.stderr.write(`neo-core fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
