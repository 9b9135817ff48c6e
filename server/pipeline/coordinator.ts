import type { Job, JobStatus, PluginKind, PluginReport, ReportStatus } from "@shared/schema";
import {
  InvalidStatusTransitionError,
  JobNotFoundError,
  ParameterNotConfiguredError,
  PluginNotRunnableError,
  StageSubmissionError,
  errorMessage,
  type PluginRef,
} from "../errors";
import { logger, withJobContext } from "../logger";
import type { ParameterResolver } from "../plugins/parameter-resolver";
import type { PluginConfigRegistry } from "../plugins/registry";
import {
  TLP_ORDER,
  pluginLabel,
  type JobContext,
  type PivotConfiguration,
  type PluginConfiguration,
} from "../plugins/types";
import type { TaskSignatureBuilder } from "../tasks/signature-builder";
import type { Submitter, TaskReport } from "../tasks/submitter";
import type { IStorage } from "../storage";
import type { PluginTaskDescriptor } from "../tasks/task-descriptor";
import { correlationId, startSpan } from "../tracing";
import {
  ACTIVE_STATUSES,
  STAGE_STATUSES,
  isTerminal,
  nextStage,
  sourcesOf,
  stageCompletedBy,
  statusRank,
  type Stage,
} from "./job-status";

const log = logger.child("pipeline");

export interface CoordinatorDeps {
  storage: IStorage;
  registry: PluginConfigRegistry;
  resolver: ParameterResolver;
  builder: TaskSignatureBuilder;
  submitter: Submitter;
}

export type StageEntry =
  | { outcome: "submitted"; stage: Stage; tokens: string[]; transitionToken: string; skipped: PluginRef[] }
  | { outcome: "failed"; stage: Stage; error: StageSubmissionError }
  | { outcome: "cancelled"; stage: Stage };

export type TransitionOutcome = "applied" | "skipped";

export interface StageCounts {
  pending: number;
  running: number;
  success: number;
  failed: number;
}

export interface JobProgress {
  jobId: string;
  status: JobStatus;
  reports: Record<PluginKind, StageCounts>;
  /** Stage tasks this process submitted that have not reported back yet. */
  awaiting: number;
  /** Failures among the current stage's tasks seen by this process. */
  failedTasks: number;
  errors: string[];
}

interface StageState {
  stage: Stage;
  pending: Set<string>;
  failures: number;
}

export function toJobContext(job: Job): JobContext {
  return {
    id: job.id,
    user: job.userId ? { id: job.userId } : null,
    observable: { name: job.observableName, classification: job.observableClassification },
    tlp: job.tlp,
    requestedPlugins: job.requestedPlugins,
    runtimeConfiguration: job.runtimeConfiguration,
    status: job.status,
  };
}

function countBy(reports: PluginReport[], kind: PluginKind, status: ReportStatus): number {
  return reports.filter((r) => r.pluginKind === kind && r.status === status).length;
}

/**
 * Drives a job through analyzers → connectors → visualizers. Each stage is
 * submitted as a set of plugin tasks plus one `set_job_status` task that
 * depends on all of them; the worker pool runs that task once the stage
 * has drained and calls back into {@link applyStageTransition}.
 *
 * The per-job stage state held here only feeds {@link progress}. Completion
 * reports reach whichever process claimed the task, so it never gates a
 * transition.
 */
export class JobPipelineCoordinator {
  private readonly stages = new Map<string, StageState>();

  constructor(private readonly deps: CoordinatorDeps) {}

  async start(jobId: string): Promise<StageEntry> {
    return withJobContext(jobId, async () => {
      const job = await this.move(jobId, "analyzers_running");
      log.info("Job started", { observable: job.observableName, classification: job.observableClassification });
      return this.enterStage(toJobContext(job), "analyzer");
    });
  }

  /** Starts up to `limit` pending jobs. A job another process started first is skipped. */
  async startPending(limit: number): Promise<StageEntry[]> {
    const entries: StageEntry[] = [];
    for (const job of await this.deps.storage.getPendingJobs(limit)) {
      try {
        entries.push(await this.start(job.id));
      } catch (err) {
        if (!(err instanceof InvalidStatusTransitionError)) throw err;
        log.debug("Job already started elsewhere", { jobId: job.id });
      }
    }
    return entries;
  }

  async onTaskFinished(report: TaskReport): Promise<void> {
    return withJobContext(report.jobId, () =>
      startSpan(
        "pipeline",
        "task_finished",
        async () => {
          if (report.outcome === "failure") {
            if (report.target === "set_job_status") {
              await this.fail(report.jobId, null, [report.error ?? "stage transition failed"]);
              return;
            }
            await this.deps.storage.appendJobError(report.jobId, report.error ?? `task ${report.token} failed`);
          }

          const state = this.stages.get(report.jobId);
          if (!state || !state.pending.delete(report.token)) {
            return;
          }
          if (report.outcome === "failure") {
            state.failures += 1;
            log.warn("Stage task failed", { stage: state.stage, token: report.token, error: report.error });
          }
        },
        { "job.id": report.jobId, "task.target": report.target, "task.outcome": report.outcome },
      ),
    );
  }

  /**
   * Runs when the transition task is claimed, which the task queue only does
   * once every dependency is terminal.
   */
  async applyStageTransition(jobId: string, targetStatus: JobStatus): Promise<TransitionOutcome> {
    return withJobContext(jobId, async () => {
      const stage = stageCompletedBy(targetStatus);
      if (!stage) {
        const job = await this.deps.storage.getJob(jobId);
        if (!job) throw new JobNotFoundError(jobId);
        throw new InvalidStatusTransitionError(jobId, job.status, targetStatus);
      }

      const updated = await this.deps.storage.transitionJobStatus(jobId, [STAGE_STATUSES[stage].running], targetStatus);
      if (!updated) {
        const job = await this.deps.storage.getJob(jobId);
        if (!job) throw new JobNotFoundError(jobId);
        if (statusRank(job.status) >= statusRank(targetStatus)) {
          if (isTerminal(job.status)) this.stages.delete(jobId);
          log.info("Stage transition skipped", { targetStatus, status: job.status });
          return "skipped";
        }
        throw new InvalidStatusTransitionError(jobId, job.status, targetStatus);
      }
      this.stages.delete(jobId);
      log.info("Stage completed", { stage, status: targetStatus });

      const ctx = toJobContext(updated);
      if (stage !== "visualizer") {
        await this.submitPivots(ctx, stage);
      }

      const next = nextStage(stage);
      if (!next) {
        await this.deps.storage.transitionJobStatus(jobId, [targetStatus], "completed", { finishedAt: new Date() });
        log.info("Job completed");
        return "applied";
      }

      const running = await this.deps.storage.transitionJobStatus(jobId, [targetStatus], STAGE_STATUSES[next].running);
      if (!running) {
        log.info("Job left the pipeline before the next stage", { stage: next });
        return "applied";
      }
      await this.enterStage(toJobContext(running), next);
      return "applied";
    });
  }

  /** Marks the job failed. Tasks already queued are left to the worker pool. */
  async cancel(jobId: string, reason: string): Promise<boolean> {
    return withJobContext(jobId, async () => {
      const updated = await this.deps.storage.transitionJobStatus(jobId, ACTIVE_STATUSES, "failed", { finishedAt: new Date() });
      this.stages.delete(jobId);
      if (!updated) {
        return false;
      }
      await this.deps.storage.appendJobError(jobId, reason);
      log.info("Job cancelled", { reason });
      return true;
    });
  }

  async progress(jobId: string): Promise<JobProgress> {
    const job = await this.deps.storage.getJob(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    const reports = await this.deps.storage.getPluginReports(jobId);

    const countsFor = (kind: PluginKind): StageCounts => ({
      pending: countBy(reports, kind, "pending"),
      running: countBy(reports, kind, "running"),
      success: countBy(reports, kind, "success"),
      failed: countBy(reports, kind, "failed"),
    });

    return {
      jobId,
      status: job.status,
      reports: {
        analyzer: countsFor("analyzer"),
        connector: countsFor("connector"),
        visualizer: countsFor("visualizer"),
        pivot: countsFor("pivot"),
      },
      awaiting: this.stages.get(jobId)?.pending.size ?? 0,
      failedTasks: this.stages.get(jobId)?.failures ?? 0,
      errors: job.errors,
    };
  }

  // ─── Stage entry ───────────────────────────────────────────────────────────

  private async enterStage(job: JobContext, stage: Stage): Promise<StageEntry> {
    return startSpan("pipeline", `enter_${stage}`, async () => {
      const { selected, skipped } = await this.selectPlugins(job, stage);

      const descriptors: PluginTaskDescriptor[] = [];
      for (const plugin of selected) {
        const descriptor = await this.buildFor(plugin, job);
        if (descriptor) descriptors.push(descriptor);
        else skipped.push({ kind: plugin.kind, name: plugin.name });
      }

      const current = await this.deps.storage.getJob(job.id);
      if (!current || current.status !== STAGE_STATUSES[stage].running) {
        log.info("Job left the stage before submission", { stage, status: current?.status });
        return { outcome: "cancelled", stage };
      }

      const state: StageState = {
        stage,
        pending: new Set(descriptors.map((d) => d.token)),
        failures: 0,
      };
      this.stages.set(job.id, state);

      const results = await Promise.allSettled(descriptors.map((d) => this.deps.submitter.submit(d)));
      const tokens: string[] = [];
      const causes: string[] = [];
      results.forEach((result, i) => {
        const descriptor = descriptors[i];
        if (result.status === "fulfilled") {
          tokens.push(descriptor.token);
        } else {
          state.pending.delete(descriptor.token);
          causes.push(`${descriptor.linkage.pluginName}: ${errorMessage(result.reason)}`);
        }
      });

      if (descriptors.length > 0 && tokens.length === 0) {
        return { outcome: "failed", stage, error: await this.fail(job.id, stage, causes) };
      }
      if (causes.length > 0) {
        log.warn("Some stage tasks could not be submitted", { stage, causes });
      }

      const transition = this.deps.builder.buildStageTransition(job, STAGE_STATUSES[stage].completed, tokens);
      try {
        await this.deps.submitter.submit(transition);
      } catch (err) {
        return { outcome: "failed", stage, error: await this.fail(job.id, stage, [...causes, `transition: ${errorMessage(err)}`]) };
      }

      log.info("Stage submitted", { stage, tasks: tokens.length, skipped: skipped.length, transition: transition.token });
      return { outcome: "submitted", stage, tokens, transitionToken: transition.token, skipped };
    });
  }

  private async selectPlugins(
    job: JobContext,
    stage: Stage,
  ): Promise<{ selected: PluginConfiguration[]; skipped: PluginRef[] }> {
    let candidates = this.deps.registry.list(stage);

    const requested = job.requestedPlugins?.[stage];
    if (requested) {
      const known = new Set(candidates.map((p) => p.name));
      const unknown = requested.filter((name) => !known.has(name));
      if (unknown.length > 0) {
        log.warn("Requested plugins are not registered", { stage, unknown });
      }
      candidates = candidates.filter((p) => requested.includes(p.name));
    }

    const analyzerFailures = stage === "connector" ? await this.analyzerFailures(job.id) : 0;

    const selected: PluginConfiguration[] = [];
    const skipped: PluginRef[] = [];
    for (const plugin of candidates) {
      const ref = { kind: plugin.kind, name: plugin.name };
      if (!this.accepts(plugin, job, analyzerFailures)) {
        skipped.push(ref);
        continue;
      }
      const check = await this.deps.registry.checkRunnable(plugin, job.user, job.runtimeConfiguration);
      if (!check.runnable) {
        log.info("Plugin not runnable, skipped", { plugin: pluginLabel(plugin), reasons: check.reasons });
        skipped.push(ref);
        continue;
      }
      selected.push(plugin);
    }
    return { selected, skipped };
  }

  private accepts(plugin: PluginConfiguration, job: JobContext, analyzerFailures: number): boolean {
    switch (plugin.kind) {
      case "analyzer":
        if (TLP_ORDER[job.tlp] > TLP_ORDER[plugin.maximumTlp]) return false;
        return plugin.type === "file"
          ? job.observable.classification === "file"
          : plugin.observableSupported.includes(job.observable.classification);
      case "connector":
        if (TLP_ORDER[job.tlp] > TLP_ORDER[plugin.maximumTlp]) return false;
        return plugin.runOnFailure || analyzerFailures === 0;
      case "visualizer":
      case "pivot":
        return true;
    }
  }

  private async analyzerFailures(jobId: string): Promise<number> {
    const reports = await this.deps.storage.getPluginReports(jobId);
    return countBy(reports, "analyzer", "failed");
  }

  private async buildFor(plugin: PluginConfiguration, job: JobContext): Promise<PluginTaskDescriptor | null> {
    try {
      const params = await this.deps.resolver.readParams(plugin, job);
      return await this.deps.builder.build(plugin, job, params);
    } catch (err) {
      if (err instanceof ParameterNotConfiguredError || err instanceof PluginNotRunnableError) {
        log.warn("Plugin became unrunnable while building its task", { plugin: pluginLabel(plugin), error: err.message });
        return null;
      }
      throw err;
    }
  }

  // ─── Pivots ────────────────────────────────────────────────────────────────

  private async submitPivots(job: JobContext, finished: "analyzer" | "connector"): Promise<void> {
    const reports = await this.deps.storage.getPluginReports(job.id);
    const succeeded = new Set(
      reports.filter((r) => r.status === "success").map((r) => `${r.pluginKind}:${r.pluginName}`),
    );
    const requested = job.requestedPlugins?.pivot;

    const pivots = this.deps.registry
      .list("pivot")
      .filter((p): p is PivotConfiguration => p.kind === "pivot")
      .filter((p) => !requested || requested.includes(p.name))
      .filter((p) => p.relatedConfigs.some((rc) => rc.kind === finished && succeeded.has(`${rc.kind}:${rc.name}`)));

    for (const pivot of pivots) {
      try {
        if (!(await this.deps.registry.isRunnable(pivot, job.user, job.runtimeConfiguration))) {
          log.info("Pivot not runnable, skipped", { plugin: pluginLabel(pivot) });
          continue;
        }
        const params = await this.deps.resolver.readParams(pivot, job);
        const descriptor = await this.deps.builder.buildPivot(pivot, job, params);
        await this.deps.submitter.submit(descriptor);
        log.info("Pivot submitted", { plugin: pluginLabel(pivot), token: descriptor.token });
      } catch (err) {
        log.error("Pivot submission failed", { plugin: pluginLabel(pivot), error: errorMessage(err) });
      }
    }
  }

  // ─── Failure ───────────────────────────────────────────────────────────────

  private async fail(jobId: string, stage: Stage | null, causes: string[]): Promise<StageSubmissionError> {
    const cid = correlationId();
    const job = await this.deps.storage.getJob(jobId);
    const failedStage: Stage = stage ?? this.stages.get(jobId)?.stage ?? stageOf(job?.status);
    const error = new StageSubmissionError(jobId, failedStage, cid, causes);

    log.error("Stage failed, job marked failed", { stage: failedStage, correlationId: cid, causes });
    this.stages.delete(jobId);
    const updated = await this.deps.storage.transitionJobStatus(jobId, sourcesOf("failed"), "failed", {
      correlationId: cid,
      finishedAt: new Date(),
    });
    if (updated) {
      await this.deps.storage.appendJobError(jobId, error.message);
    }
    return error;
  }

  private async move(jobId: string, to: JobStatus): Promise<Job> {
    const updated = await this.deps.storage.transitionJobStatus(jobId, sourcesOf(to), to);
    if (updated) return updated;
    const job = await this.deps.storage.getJob(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    throw new InvalidStatusTransitionError(jobId, job.status, to);
  }
}

function stageOf(status: JobStatus | undefined): Stage {
  switch (status) {
    case "connectors_running":
    case "connectors_completed":
      return "connector";
    case "visualizers_running":
    case "visualizers_completed":
      return "visualizer";
    default:
      return "analyzer";
  }
}
