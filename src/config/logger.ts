export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  child: (bindings: LogMeta) => Logger;
};

export type LogSink = (line: string) => void;

const REDACT_KEYS = ["password", "secret", "token", "authorization", "apikey", "api_key", "api-key", "credential"];

function levelWeight(level: LogLevel): number {
  switch (level) {
    case "debug":
      return 10;
    case "info":
      return 20;
    case "warn":
      return 30;
    case "error":
      return 40;
  }
}

function shouldRedactKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return REDACT_KEYS.some((candidate) => normalized.includes(candidate));
}

export function sanitize(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (Array.isArray(value)) return value.map((entry) => sanitize(entry));
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (typeof value !== "object") return value;

  const output: Record<string, unknown> = {};
  for (const [key, innerValue] of Object.entries(value)) {
    output[key] = shouldRedactKey(key) ? "[redacted]" : sanitize(innerValue);
  }
  return output;
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line);
};

export function createLogger(level: LogLevel = "info", sink: LogSink = stdoutSink, bindings: LogMeta = {}): Logger {
  const threshold = levelWeight(level);

  const write = (lvl: LogLevel, msg: string, meta?: LogMeta) => {
    if (levelWeight(lvl) < threshold) return;
    const merged = meta ? { ...bindings, ...meta } : bindings;
    const payload = {
      at: new Date().toISOString(),
      level: lvl,
      msg,
      ...(Object.keys(merged).length > 0 ? { meta: sanitize(merged) } : {}),
    };
    // One JSON object per line.
    sink(`${JSON.stringify(payload)}\n`);
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    child: (childBindings) => createLogger(level, sink, { ...bindings, ...childBindings }),
  };
}
