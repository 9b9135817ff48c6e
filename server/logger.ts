import { AsyncLocalStorage } from "async_hooks";

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  jobId?: string;
  taskToken?: string;
  pluginKind?: string;
  pluginName?: string;
  userId?: string;
  orgId?: string;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  source: string;
  context: LogContext;
}

export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

const MIN_LEVEL: LogLevel = isLogLevel(process.env.LOG_LEVEL)
  ? process.env.LOG_LEVEL
  : process.env.NODE_ENV === "development" || process.env.NODE_ENV === "test"
    ? "debug"
    : "info";

const REDACT_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /("?\bpassword"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?\bsecret"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?\btoken"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?\bauthorization"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?\bapiKey"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?\bapi_key"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?\bapi_key_name"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?\bx-api-key"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?\bdatabaseUrl"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /("?\bDATABASE_URL"?\s*[:=]\s*)"[^"]*"/gi, replacement: '$1"[REDACTED]"' },
  { pattern: /postgres(ql)?:\/\/[^\s"]+/gi, replacement: "postgres://[REDACTED]" },
  { pattern: /Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, replacement: "Bearer [REDACTED]" },
];

export function redact(input: string): string {
  let result = input;
  for (const { pattern, replacement } of REDACT_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, replacement);
  }
  return result;
}

const contextStore = new AsyncLocalStorage<LogContext>();

export function currentContext(): LogContext {
  return contextStore.getStore() ?? {};
}

function emit(level: LogLevel, source: string, message: string, extra?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[MIN_LEVEL]) return;

  const ctx = { ...currentContext(), ...extra };

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message: redact(message),
    source,
    context: ctx,
  };

  const serialized = redact(JSON.stringify(entry));

  if (level === "error" || level === "warn") {
    process.stderr.write(serialized + "\n");
  } else {
    process.stdout.write(serialized + "\n");
  }
}

function createChild(source: string): Logger {
  return {
    debug(message, extra) {
      emit("debug", source, message, extra);
    },
    info(message, extra) {
      emit("info", source, message, extra);
    },
    warn(message, extra) {
      emit("warn", source, message, extra);
    },
    error(message, extra) {
      emit("error", source, message, extra);
    },
  };
}

export const logger = {
  child: createChild,

  debug(message: string, extra?: Record<string, unknown>) {
    emit("debug", "app", message, extra);
  },
  info(message: string, extra?: Record<string, unknown>) {
    emit("info", "app", message, extra);
  },
  warn(message: string, extra?: Record<string, unknown>) {
    emit("warn", "app", message, extra);
  },
  error(message: string, extra?: Record<string, unknown>) {
    emit("error", "app", message, extra);
  },
};

export function withJobContext<T>(jobId: string, fn: () => T): T {
  return contextStore.run({ ...currentContext(), jobId }, fn);
}

export function withTaskContext<T>(
  taskToken: string,
  jobId: string,
  fn: () => T,
  extra: Pick<LogContext, "pluginKind" | "pluginName"> = {},
): T {
  return contextStore.run({ ...currentContext(), jobId, taskToken, ...extra }, fn);
}
