import { randomBytes } from "crypto";
import { sql, type SQL } from "drizzle-orm";
import { z } from "zod";
import { TASK_TARGETS, type TaskTarget } from "@shared/schema";
import type { AppConfig } from "../config";
import { errorMessage } from "../errors";
import { logger } from "../logger";
import type { Submitter, TaskOutcome, TaskReport } from "../tasks/submitter";
import type { TaskDescriptor } from "../tasks/task-descriptor";
import { startSpan } from "../tracing";

const log = logger.child("task-queue");

const HEARTBEAT_INTERVAL_MS = 30_000;
const STALE_TASK_REAPER_INTERVAL_MS = 60_000;
const MAX_BACKOFF_MS = 60_000;

export interface ClaimedTask {
  id: string;
  token: string;
  jobId: string;
  target: TaskTarget;
  args: Record<string, unknown>;
  queue: string;
  softTimeLimit: number;
  attempts: number;
  maxAttempts: number;
}

export interface HandlerResult {
  outcome: TaskOutcome;
  result?: unknown;
  error?: string;
}

/**
 * Executes one claimed task. Throwing means an infrastructure fault and the
 * task is retried; a plugin failure is returned as a failed outcome.
 */
export interface TaskHandler {
  handle(task: ClaimedTask, signal: AbortSignal): Promise<HandlerResult>;
}

export type CompletionCallback = (report: TaskReport) => Promise<void>;

const claimedRowSchema = z
  .object({
    id: z.string(),
    token: z.string(),
    job_id: z.string(),
    target: z.enum(TASK_TARGETS),
    args: z.record(z.unknown()),
    queue: z.string(),
    soft_time_limit: z.coerce.number(),
    attempts: z.coerce.number(),
    max_attempts: z.coerce.number(),
  })
  .transform((row): ClaimedTask => ({
    id: row.id,
    token: row.token,
    jobId: row.job_id,
    target: row.target,
    args: row.args,
    queue: row.queue,
    softTimeLimit: row.soft_time_limit,
    attempts: row.attempts,
    maxAttempts: row.max_attempts,
  }));

const reapedRowSchema = z.object({
  token: z.string(),
  job_id: z.string(),
  target: z.enum(TASK_TARGETS),
  status: z.string(),
});

export function backoffMs(attempts: number): number {
  return Math.min(MAX_BACKOFF_MS, 1000 * Math.pow(2, attempts));
}

/** The part of the drizzle database the queue runs its statements through. */
export interface TaskQueueDatabase {
  execute(query: SQL): PromiseLike<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
}

export interface TaskQueueOptions {
  /** Physical queue names this worker consumes. */
  queues: string[];
  tasks: Pick<AppConfig["tasks"], "maxAttempts">;
  worker: AppConfig["worker"];
}

/**
 * PostgreSQL-backed task queue. A task is claimable once every token in its
 * `dependencies` belongs to a task in a terminal state.
 */
export class PgTaskQueue implements Submitter {
  readonly workerId = `worker-${randomBytes(8).toString("hex")}`;

  private running = false;
  private pollTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private reaperTimer: NodeJS.Timeout | null = null;
  private readonly active = new Set<string>();
  private handler: TaskHandler | null = null;
  private onFinished: CompletionCallback | null = null;

  constructor(
    private readonly db: TaskQueueDatabase,
    private readonly options: TaskQueueOptions,
  ) {}

  async submit(descriptor: TaskDescriptor): Promise<void> {
    await this.db.execute(sql`
      INSERT INTO task_queue
        (token, job_id, target, args, linkage, queue, soft_time_limit, dependencies, message_group_id, max_attempts)
      VALUES (
        ${descriptor.token},
        ${descriptor.jobId},
        ${descriptor.target},
        ${JSON.stringify(descriptor.args)}::jsonb,
        ${JSON.stringify(descriptor.linkage)}::jsonb,
        ${descriptor.queue},
        ${descriptor.softTimeLimit},
        ${sql.param([...descriptor.dependencies])}::text[],
        ${descriptor.messageGroupId},
        ${this.options.tasks.maxAttempts}
      )
      ON CONFLICT (token) DO NOTHING
    `);
    log.debug("Task queued", {
      token: descriptor.token,
      target: descriptor.target,
      queue: descriptor.queue,
      dependencies: descriptor.dependencies.length,
    });
  }

  start(handler: TaskHandler, onFinished: CompletionCallback): void {
    if (this.running) return;
    this.running = true;
    this.handler = handler;
    this.onFinished = onFinished;

    const { pollIntervalMs, maxConcurrent } = this.options.worker;
    log.info(`Started worker ${this.workerId}, polling every ${pollIntervalMs}ms, max concurrency ${maxConcurrent}`, {
      queues: this.options.queues,
    });

    this.pollTimer = setInterval(() => {
      this.claimAndRun().catch((err) => log.error("Poll error", { error: errorMessage(err) }));
    }, pollIntervalMs);

    this.heartbeatTimer = setInterval(() => {
      this.runHeartbeats().catch((err) => log.error("Heartbeat sweep error", { error: errorMessage(err) }));
    }, HEARTBEAT_INTERVAL_MS);

    this.reaperTimer = setInterval(() => {
      this.reapStaleTasks().catch((err) => log.error("Reaper sweep error", { error: errorMessage(err) }));
    }, STALE_TASK_REAPER_INTERVAL_MS);
  }

  stop(): void {
    this.running = false;
    for (const timer of [this.pollTimer, this.heartbeatTimer, this.reaperTimer]) {
      if (timer) clearInterval(timer);
    }
    this.pollTimer = null;
    this.heartbeatTimer = null;
    this.reaperTimer = null;
    log.info(`Stopped worker ${this.workerId}`);
  }

  /**
   * Claims one task and runs it to completion. Resolves false when the worker
   * is stopped, saturated, or nothing is claimable.
   */
  async claimAndRun(): Promise<boolean> {
    if (!this.running || this.active.size >= this.options.worker.maxConcurrent) return false;
    const task = await this.claimNext();
    if (!task) return false;

    this.active.add(task.id);
    try {
      await this.process(task);
    } catch (err) {
      log.error(`Task ${task.token} crashed the worker loop`, { error: errorMessage(err) });
    } finally {
      this.active.delete(task.id);
    }
    return true;
  }

  private async claimNext(): Promise<ClaimedTask | undefined> {
    const lockedUntil = new Date(Date.now() + this.options.worker.visibilityTimeoutMs);
    const queues: SQL = sql.join(
      this.options.queues.map((q) => sql`${q}`),
      sql`, `,
    );
    const result = await this.db.execute(sql`
      UPDATE task_queue
      SET status = 'running',
          started_at = NOW(),
          attempts = attempts + 1,
          locked_by = ${this.workerId},
          locked_until = ${lockedUntil}
      WHERE id = (
        SELECT t.id FROM task_queue t
        WHERE t.status = 'pending'
          AND t.run_at <= NOW()
          AND t.queue IN (${queues})
          AND NOT EXISTS (
            SELECT 1 FROM task_queue d
            WHERE d.token = ANY(t.dependencies)
              AND d.status NOT IN ('completed', 'failed')
          )
        ORDER BY t.run_at ASC
        LIMIT 1
        FOR UPDATE SKIP LOCKED
      )
      RETURNING id, token, job_id, target, args, queue, soft_time_limit, attempts, max_attempts
    `);
    const [row] = result.rows;
    if (!row) return undefined;
    return claimedRowSchema.parse(row);
  }

  private async extendLease(id: string): Promise<boolean> {
    const lockedUntil = new Date(Date.now() + this.options.worker.visibilityTimeoutMs);
    const result = await this.db.execute(sql`
      UPDATE task_queue
      SET locked_until = ${lockedUntil}
      WHERE id = ${id} AND locked_by = ${this.workerId} AND status = 'running'
    `);
    return (result.rowCount ?? 0) > 0;
  }

  private async runHeartbeats(): Promise<void> {
    for (const id of Array.from(this.active)) {
      try {
        if (!(await this.extendLease(id))) {
          log.warn(`Heartbeat failed for task ${id}, lease lost`);
          this.active.delete(id);
        }
      } catch (err) {
        log.error(`Heartbeat error for task ${id}`, { error: errorMessage(err) });
      }
    }
  }

  private async reapStaleTasks(): Promise<void> {
    const result = await this.db.execute(sql`
      UPDATE task_queue
      SET status = CASE WHEN attempts >= max_attempts THEN 'failed' ELSE 'pending' END,
          locked_by = NULL,
          locked_until = NULL,
          last_error = CASE WHEN attempts >= max_attempts THEN 'Lease expired, max attempts exhausted' ELSE 'Lease expired, returned to queue' END,
          completed_at = CASE WHEN attempts >= max_attempts THEN NOW() ELSE completed_at END
      WHERE status = 'running'
        AND locked_until IS NOT NULL
        AND locked_until < NOW()
      RETURNING token, job_id, target, status
    `);
    const rows = result.rows.map((row) => reapedRowSchema.parse(row));
    const requeued = rows.filter((r) => r.status === "pending");
    const deadLettered = rows.filter((r) => r.status === "failed");
    if (requeued.length > 0) {
      log.warn(`Reaped ${requeued.length} stale tasks back to pending`, { tokens: requeued.map((r) => r.token) });
    }
    if (deadLettered.length > 0) {
      log.error(`Dead-lettered ${deadLettered.length} tasks, max attempts exhausted`, {
        tokens: deadLettered.map((r) => r.token),
      });
      for (const row of deadLettered) {
        await this.finish({
          token: row.token,
          jobId: row.job_id,
          target: row.target,
          outcome: "failure",
          error: "Lease expired, max attempts exhausted",
        });
      }
    }
  }

  private async process(task: ClaimedTask): Promise<void> {
    const handler = this.handler;
    if (!handler) return;

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`Soft time limit of ${task.softTimeLimit}s exceeded`)),
      task.softTimeLimit * 1000,
    );

    try {
      log.info(`Processing task ${task.token} (${task.target}) [worker=${this.workerId}]`);
      const handled = await startSpan("task-queue", `task:${task.target}`, () => handler.handle(task, controller.signal), {
        "task.token": task.token,
        "task.jobId": task.jobId,
        "task.attempt": task.attempts,
      });
      const stored = await this.settle(task, sql`
        status = 'completed',
        result = ${JSON.stringify(handled.result ?? null)}::jsonb,
        last_error = ${handled.error ?? null}
      `);
      if (!stored) {
        log.warn(`Lease lost for task ${task.token}, completed result discarded`);
        return;
      }
      await this.finish({
        token: task.token,
        jobId: task.jobId,
        target: task.target,
        outcome: handled.outcome,
        error: handled.error,
      });
    } catch (err) {
      await this.retryOrFail(task, errorMessage(err));
    } finally {
      clearTimeout(timer);
    }
  }

  private async retryOrFail(task: ClaimedTask, error: string): Promise<void> {
    if (task.attempts >= task.maxAttempts) {
      const stored = await this.settle(task, sql`status = 'failed', last_error = ${error}`);
      if (!stored) {
        log.warn(`Lease lost for task ${task.token}, failed update discarded`);
        return;
      }
      log.error(`Task ${task.token} failed permanently after ${task.attempts} attempts`, { error });
      await this.finish({ token: task.token, jobId: task.jobId, target: task.target, outcome: "failure", error });
      return;
    }

    const runAt = new Date(Date.now() + backoffMs(task.attempts));
    const result = await this.db.execute(sql`
      UPDATE task_queue
      SET status = 'pending',
          last_error = ${error},
          run_at = ${runAt},
          locked_by = NULL,
          locked_until = NULL
      WHERE id = ${task.id} AND locked_by = ${this.workerId}
    `);
    if ((result.rowCount ?? 0) === 0) {
      log.warn(`Lease lost for task ${task.token}, retry update discarded`);
    } else {
      log.warn(`Task ${task.token} failed, retrying at ${runAt.toISOString()}`, { error });
    }
  }

  private async settle(task: ClaimedTask, assignments: SQL): Promise<boolean> {
    const result = await this.db.execute(sql`
      UPDATE task_queue
      SET ${assignments},
          completed_at = NOW(),
          locked_by = NULL,
          locked_until = NULL
      WHERE id = ${task.id} AND locked_by = ${this.workerId}
    `);
    return (result.rowCount ?? 0) > 0;
  }

  private async finish(report: TaskReport): Promise<void> {
    const onFinished = this.onFinished;
    if (!onFinished) return;
    try {
      await onFinished(report);
    } catch (err) {
      log.error(`Completion callback failed for task ${report.token}`, { error: errorMessage(err) });
    }
  }
}
