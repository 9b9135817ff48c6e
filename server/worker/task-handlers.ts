import { z } from "zod";
import { JOB_STATUSES, PLUGIN_KINDS } from "@shared/schema";
import { JobNotFoundError, errorMessage } from "../errors";
import { logger, withTaskContext } from "../logger";
import type { EntryPointLoader, PriorReport } from "../plugins/entry-points";
import type { JobPipelineCoordinator } from "../pipeline/coordinator";
import { toJobContext } from "../pipeline/coordinator";
import type { IStorage } from "../storage";
import { startSpan } from "../tracing";
import type { ClaimedTask, HandlerResult, TaskHandler } from "./task-queue";

const log = logger.child("task-handlers");

const runPluginArgsSchema = z.object({
  jobId: z.string(),
  pluginKind: z.enum(PLUGIN_KINDS),
  pluginName: z.string(),
  entryPoint: z.string(),
  parameters: z.record(z.unknown()),
  relatedConfigs: z.array(z.object({ kind: z.enum(["analyzer", "connector"]), name: z.string() })).optional(),
});

const setJobStatusArgsSchema = z.object({
  jobId: z.string(),
  status: z.enum(JOB_STATUSES),
});

export interface TaskHandlerDeps {
  storage: IStorage;
  entryPoints: EntryPointLoader;
  coordinator: JobPipelineCoordinator;
}

function abortPromise(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    const fail = () => reject(signal.reason instanceof Error ? signal.reason : new Error("Task aborted"));
    if (signal.aborted) {
      fail();
      return;
    }
    signal.addEventListener("abort", fail, { once: true });
  });
}

/** Worker-side execution of `run_plugin` and `set_job_status` tasks. */
export class PipelineTaskHandler implements TaskHandler {
  constructor(private readonly deps: TaskHandlerDeps) {}

  async handle(task: ClaimedTask, signal: AbortSignal): Promise<HandlerResult> {
    switch (task.target) {
      case "run_plugin":
        return this.runPlugin(task, signal);
      case "set_job_status":
        return this.setJobStatus(task);
    }
  }

  async runPlugin(task: ClaimedTask, signal: AbortSignal): Promise<HandlerResult> {
    const args = runPluginArgsSchema.parse(task.args);
    const context = { pluginKind: args.pluginKind, pluginName: args.pluginName };

    return withTaskContext(task.token, args.jobId, async (): Promise<HandlerResult> => {
      const job = await this.deps.storage.getJob(args.jobId);
      if (!job) throw new JobNotFoundError(args.jobId);
      if (job.status === "failed") {
        log.info("Job already failed, plugin not run");
        return { outcome: "success", result: { skipped: true } };
      }

      await this.deps.storage.createPluginReport({
        jobId: args.jobId,
        pluginKind: args.pluginKind,
        pluginName: args.pluginName,
        taskId: task.token,
        status: "running",
      });

      // A pivot only reads the reports of the plugins it is related to.
      const related = args.pluginKind === "pivot" ? (args.relatedConfigs ?? []) : null;
      const reports: PriorReport[] = (await this.deps.storage.getPluginReports(args.jobId))
        .filter((r) => r.taskId !== task.token)
        .filter((r) => !related || related.some((rc) => rc.kind === r.pluginKind && rc.name === r.pluginName))
        .map((r) => ({ pluginKind: r.pluginKind, pluginName: r.pluginName, status: r.status, report: r.report }));

      try {
        const unit = this.deps.entryPoints.load(args.entryPoint);
        const observable = toJobContext(job).observable;
        const report = await startSpan(
          "worker",
          `run_plugin:${args.pluginName}`,
          () =>
            Promise.race([
              unit.run({ jobId: args.jobId, pluginName: args.pluginName, observable, parameters: args.parameters, reports, signal }),
              abortPromise(signal),
            ]),
          { "plugin.kind": args.pluginKind, "plugin.name": args.pluginName },
        );
        await this.deps.storage.updatePluginReport(task.token, { status: "success", report, endTime: new Date() });
        log.info("Plugin run succeeded");
        return { outcome: "success", result: { status: "success" } };
      } catch (err) {
        const message = errorMessage(err);
        await this.deps.storage.updatePluginReport(task.token, { status: "failed", errors: [message], endTime: new Date() });
        log.warn("Plugin run failed", { error: message });
        return { outcome: "failure", error: `${args.pluginKind}:${args.pluginName}: ${message}` };
      }
    }, context);
  }

  async setJobStatus(task: ClaimedTask): Promise<HandlerResult> {
    const args = setJobStatusArgsSchema.parse(task.args);
    return withTaskContext(task.token, args.jobId, async (): Promise<HandlerResult> => {
      const applied = await this.deps.coordinator.applyStageTransition(args.jobId, args.status);
      return { outcome: "success", result: { transition: applied, status: args.status } };
    });
  }
}
