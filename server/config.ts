import { z } from "zod";
import { fileURLToPath } from "url";
import { logger } from "./logger";

const nodeEnvSchema = z.enum(["development", "staging", "uat", "production", "test"]).default("development");

const DEFAULT_MANIFEST_PATH = fileURLToPath(new URL("./plugins/manifest.json", import.meta.url));

const queueList = z
  .string()
  .default("default,long")
  .transform((raw) =>
    raw
      .split(",")
      .map((q) => q.trim())
      .filter((q) => q.length > 0),
  )
  .pipe(z.array(z.string().regex(/^[\w.-]+$/, "queue names may only contain letters, digits, '.', '_' and '-'")).min(1));

const configSchema = z
  .object({
    nodeEnv: nodeEnvSchema,

    databaseUrl: z.string().min(1, "DATABASE_URL is required"),

    queues: z.object({
      valid: queueList,
      default: z.string().min(1).default("default"),
      prefix: z.string().optional(),
    }),

    tasks: z.object({
      defaultSoftTimeLimit: z.coerce.number().int().positive().default(60),
      stageTransitionSoftTimeLimit: z.coerce.number().int().positive().default(10),
      maxAttempts: z.coerce.number().int().positive().default(3),
    }),

    worker: z.object({
      pollIntervalMs: z.coerce.number().int().positive().default(5000),
      maxConcurrent: z.coerce.number().int().positive().default(4),
      visibilityTimeoutMs: z.coerce.number().int().positive().default(120_000),
    }),

    manifestPath: z.string().min(1).default(DEFAULT_MANIFEST_PATH),
  })
  .refine((cfg) => cfg.queues.valid.includes(cfg.queues.default), {
    message: "DEFAULT_QUEUE must be one of TASK_QUEUES",
    path: ["queues", "default"],
  });

export type AppConfig = z.infer<typeof configSchema>;
export type QueueSettings = AppConfig["queues"];

export type ConfigParseResult = { success: true; config: AppConfig } | { success: false; errors: string[] };

export function parseConfig(env: NodeJS.ProcessEnv): ConfigParseResult {
  const raw = {
    nodeEnv: env.NODE_ENV,
    databaseUrl: env.DATABASE_URL,
    queues: {
      valid: env.TASK_QUEUES,
      default: env.DEFAULT_QUEUE,
      prefix: env.QUEUE_PREFIX || undefined,
    },
    tasks: {
      defaultSoftTimeLimit: env.PLUGIN_SOFT_TIME_LIMIT,
      stageTransitionSoftTimeLimit: env.STAGE_TRANSITION_SOFT_TIME_LIMIT,
      maxAttempts: env.TASK_MAX_ATTEMPTS,
    },
    worker: {
      pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
      maxConcurrent: env.WORKER_MAX_CONCURRENT,
      visibilityTimeoutMs: env.WORKER_VISIBILITY_TIMEOUT_MS,
    },
    manifestPath: env.PLUGIN_MANIFEST_PATH || undefined,
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }
  return { success: true, config: result.data };
}

let cached: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cached) return cached;

  const result = parseConfig(process.env);
  if (!result.success) {
    const errors = result.errors.map((e) => `  - ${e}`);
    logger.child("config").error(`\n[Config] Fatal: invalid configuration.\n${errors.join("\n")}\n`);
    process.exit(1);
  }

  const cfg = result.config;
  if (cfg.worker.visibilityTimeoutMs <= cfg.tasks.defaultSoftTimeLimit * 1000) {
    logger
      .child("config")
      .warn("WORKER_VISIBILITY_TIMEOUT_MS is not above PLUGIN_SOFT_TIME_LIMIT; long plugin runs may be reaped while still running");
  }

  cached = cfg;
  return cfg;
}

/**
 * ┌──────────────────────────────────┬──────────┬───────────────────────────────────────┐
 * │ Variable                         │ Required │ Description                           │
 * ├──────────────────────────────────┼──────────┼───────────────────────────────────────┤
 * │ DATABASE_URL                     │ Yes      │ PostgreSQL connection string          │
 * │ NODE_ENV                         │ No       │ development|staging|uat|production    │
 * │ TASK_QUEUES                      │ No       │ Valid queues (default "default,long") │
 * │ DEFAULT_QUEUE                    │ No       │ Fallback queue (default "default")    │
 * │ QUEUE_PREFIX                     │ No       │ Prefix for physical queue names       │
 * │ PLUGIN_SOFT_TIME_LIMIT           │ No       │ Seconds, manifest default (60)        │
 * │ STAGE_TRANSITION_SOFT_TIME_LIMIT │ No       │ Seconds for status tasks (10)         │
 * │ TASK_MAX_ATTEMPTS                │ No       │ Worker retries per task (3)           │
 * │ WORKER_POLL_INTERVAL_MS          │ No       │ Queue poll interval (5000)            │
 * │ WORKER_MAX_CONCURRENT            │ No       │ Tasks run in parallel (4)             │
 * │ WORKER_VISIBILITY_TIMEOUT_MS     │ No       │ Lease length before reaping (120000)  │
 * │ PLUGIN_MANIFEST_PATH             │ No       │ Plugin manifest JSON                  │
 * │ LOG_LEVEL                        │ No       │ debug|info|warn|error                 │
 * └──────────────────────────────────┴──────────┴───────────────────────────────────────┘
 */
