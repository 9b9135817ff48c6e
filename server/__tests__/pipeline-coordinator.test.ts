import { describe, it, expect, vi, beforeEach } from "vitest";

const logs = vi.hoisted(() => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }));

vi.mock("../logger", () => ({
  logger: { ...logs, child: () => logs },
  withJobContext: (_jobId: string, fn: () => unknown) => fn(),
  withTaskContext: (_token: string, _jobId: string, fn: () => unknown) => fn(),
}));

/** Trace id seen inside each span the coordinator opens. */
const traced = vi.hoisted(() => {
  const spans: Array<{ operation: string; traceId: string | undefined }> = [];
  return spans;
});

vi.mock("../tracing", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../tracing")>();
  return {
    ...actual,
    startSpan: <T>(
      service: string,
      operation: string,
      fn: () => T,
      attributes?: Record<string, string | number | boolean>,
    ): T =>
      actual.startSpan(
        service,
        operation,
        () => {
          traced.push({ operation, traceId: actual.currentTraceId() });
          return fn();
        },
        attributes,
      ),
  };
});

import type { Job } from "@shared/schema";
import { buildDispatch, type Dispatch } from "../bootstrap";
import { InvalidStatusTransitionError, JobNotFoundError } from "../errors";
import { createJob, type JobInput } from "../pipeline/job-input";
import { StaticEntryPointRegistry } from "../plugins/entry-points";
import type { PluginTaskDescriptor, StageTransitionDescriptor } from "../tasks/task-descriptor";
import { RecordingSubmitter, TEST_CONFIG, seedPlugin, sequentialTokens } from "./helpers/fixtures";
import { MemoryStorage } from "./helpers/memory-storage";

describe("JobPipelineCoordinator", () => {
  let storage: MemoryStorage;
  let submitter: RecordingSubmitter;
  let dispatch: Dispatch;
  let entryPoints: StaticEntryPointRegistry;
  let reported: Set<string>;

  async function newJob(input: Partial<JobInput> = {}): Promise<Job> {
    return createJob(storage, { observableName: "example.com", observableClassification: "domain", ...input });
  }

  async function statusOf(jobId: string): Promise<Job> {
    const job = await storage.getJob(jobId);
    if (!job) throw new Error(`${jobId} missing`);
    return job;
  }

  function pluginTasks(): PluginTaskDescriptor[] {
    return submitter.submitted.filter((d): d is PluginTaskDescriptor => d.target === "run_plugin");
  }

  function transitions(): StageTransitionDescriptor[] {
    return submitter.submitted.filter((d): d is StageTransitionDescriptor => d.target === "set_job_status");
  }

  /** Reports every outstanding plugin task as successful, then runs the latest transition. */
  async function drainStage(jobId: string) {
    for (const task of pluginTasks()) {
      if (reported.has(task.token)) continue;
      reported.add(task.token);
      await dispatch.coordinator.onTaskFinished({ token: task.token, jobId, target: "run_plugin", outcome: "success" });
    }
    const latest = transitions().at(-1);
    if (!latest) throw new Error("no transition submitted");
    return dispatch.coordinator.applyStageTransition(jobId, latest.args.status);
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    traced.length = 0;
    storage = new MemoryStorage();
    submitter = new RecordingSubmitter();
    reported = new Set();
    entryPoints = new StaticEntryPointRegistry();

    await seedPlugin(storage, { kind: "analyzer", name: "Dns", options: { observableSupported: ["domain"], maximumTlp: "GREEN" } }, entryPoints);
    await seedPlugin(
      storage,
      {
        kind: "analyzer",
        name: "Keyed",
        options: { observableSupported: ["domain"] },
        parameters: [{ name: "token", required: true, isSecret: true }],
      },
      entryPoints,
    );
    await seedPlugin(
      storage,
      {
        kind: "analyzer",
        name: "Validin",
        options: { observableSupported: ["ip", "domain"] },
        parameters: [{ name: "api_key_name", required: true, isSecret: true }],
        defaults: { api_key_name: "test-secret" },
      },
      entryPoints,
    );
    await seedPlugin(storage, { kind: "analyzer", name: "Vulners", options: { observableSupported: ["generic"] } }, entryPoints);
    await seedPlugin(storage, { kind: "connector", name: "Notes", options: { maximumTlp: "RED" } }, entryPoints);
    await seedPlugin(storage, { kind: "connector", name: "Webhook", options: { maximumTlp: "RED", runOnFailure: false } }, entryPoints);
    await seedPlugin(storage, { kind: "visualizer", name: "Summary" }, entryPoints);
    await seedPlugin(
      storage,
      { kind: "pivot", name: "Hosts", options: { relatedConfigs: [{ kind: "analyzer", name: "Validin" }] } },
      entryPoints,
    );

    dispatch = buildDispatch({ storage, submitter, config: TEST_CONFIG, entryPoints, newToken: sequentialTokens() });
    await dispatch.registry.load();
  });

  describe("start", () => {
    it("submits the analyzer stage followed by a transition depending on every task", async () => {
      const job = await newJob();

      const entry = await dispatch.coordinator.start(job.id);

      expect(entry).toEqual({
        outcome: "submitted",
        stage: "analyzer",
        tokens: ["token-1", "token-2"],
        transitionToken: "token-3",
        skipped: [
          { kind: "analyzer", name: "Keyed" },
          { kind: "analyzer", name: "Vulners" },
        ],
      });
      expect(submitter.submitted.map((d) => d.token)).toEqual(["token-1", "token-2", "token-3"]);
      expect(pluginTasks().map((d) => d.args.pluginName)).toEqual(["Dns", "Validin"]);
      expect(transitions()).toHaveLength(1);
      expect(transitions()[0].dependencies).toEqual(["token-1", "token-2"]);
      expect(transitions()[0].args.status).toBe("analyzers_completed");
      expect((await statusOf(job.id)).status).toBe("analyzers_running");
    });

    it("submits the transition with no dependencies when no plugin applies", async () => {
      const job = await newJob({ observableName: "+15550100", observableClassification: "phone" });

      const entry = await dispatch.coordinator.start(job.id);

      expect(entry).toMatchObject({ outcome: "submitted", stage: "analyzer", tokens: [], transitionToken: "token-1" });
      expect(transitions()[0].dependencies).toEqual([]);
    });

    it("honours the requested plugins", async () => {
      const job = await newJob({ requestedPlugins: { analyzer: ["Validin", "Ghost"] } });

      await dispatch.coordinator.start(job.id);

      expect(pluginTasks().map((d) => d.args.pluginName)).toEqual(["Validin"]);
      expect(logs.warn).toHaveBeenCalledWith("Requested plugins are not registered", { stage: "analyzer", unknown: ["Ghost"] });
    });

    it("leaves out analyzers whose maximum TLP is below the job's", async () => {
      const job = await newJob({ tlp: "AMBER" });

      await dispatch.coordinator.start(job.id);

      expect(pluginTasks().map((d) => d.args.pluginName)).toEqual(["Validin"]);
    });

    it("uses runtime configuration to make a plugin runnable", async () => {
      const job = await newJob({ runtimeConfiguration: { Keyed: { token: "test-secret" } } });

      await dispatch.coordinator.start(job.id);

      expect(pluginTasks().map((d) => d.args.pluginName)).toEqual(["Dns", "Keyed", "Validin"]);
      expect(pluginTasks()[1].args.parameters).toEqual({ token: "test-secret" });
    });

    it("rejects a job that is not pending", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);

      await expect(dispatch.coordinator.start(job.id)).rejects.toBeInstanceOf(InvalidStatusTransitionError);
    });

    it("rejects an unknown job", async () => {
      await expect(dispatch.coordinator.start("job-missing")).rejects.toBeInstanceOf(JobNotFoundError);
    });
  });

  describe("startPending", () => {
    it("starts every pending job", async () => {
      const first = await newJob();
      const second = await newJob({ observableName: "example.org" });

      const entries = await dispatch.coordinator.startPending(10);

      expect(entries.map((e) => e.outcome)).toEqual(["submitted", "submitted"]);
      expect((await statusOf(first.id)).status).toBe("analyzers_running");
      expect((await statusOf(second.id)).status).toBe("analyzers_running");
      expect(await dispatch.coordinator.startPending(10)).toEqual([]);
    });

    it("skips a job another worker started first", async () => {
      const job = await newJob();
      const snapshot = await statusOf(job.id);
      await dispatch.coordinator.start(job.id);
      vi.spyOn(storage, "getPendingJobs").mockResolvedValue([snapshot]);

      expect(await dispatch.coordinator.startPending(10)).toEqual([]);
    });
  });

  describe("submission failures", () => {
    it("marks the job failed with a correlation id when no task could be submitted", async () => {
      submitter.rejectWhen = (d) => d.target === "run_plugin";
      const job = await newJob();

      const entry = await dispatch.coordinator.start(job.id);

      if (entry.outcome !== "failed") throw new Error(`expected failure, got ${entry.outcome}`);
      expect(entry.error.causes).toEqual([
        "Dns: queue unavailable for token-1",
        "Validin: queue unavailable for token-2",
      ]);
      const stored = await statusOf(job.id);
      expect(stored.status).toBe("failed");
      expect(stored.correlationId).toBe(entry.error.correlationId);
      expect(stored.errors).toEqual([`Job ${job.id} failed (correlation id ${entry.error.correlationId})`]);
      expect(stored.finishedAt).toBeInstanceOf(Date);
      expect(transitions()).toHaveLength(0);
    });

    it("continues with the tasks that were submitted", async () => {
      submitter.rejectWhen = (d) => d.token === "token-1";
      const job = await newJob();

      const entry = await dispatch.coordinator.start(job.id);

      expect(entry).toMatchObject({ outcome: "submitted", tokens: ["token-2"], transitionToken: "token-3" });
      expect(transitions()[0].dependencies).toEqual(["token-2"]);
      expect(logs.warn).toHaveBeenCalledWith("Some stage tasks could not be submitted", {
        stage: "analyzer",
        causes: ["Dns: queue unavailable for token-1"],
      });
      expect((await statusOf(job.id)).status).toBe("analyzers_running");
    });

    it("fails the job when the transition cannot be submitted", async () => {
      submitter.rejectWhen = (d) => d.target === "set_job_status";
      const job = await newJob();

      const entry = await dispatch.coordinator.start(job.id);

      if (entry.outcome !== "failed") throw new Error(`expected failure, got ${entry.outcome}`);
      expect(entry.error.causes).toEqual(["transition: queue unavailable for token-3"]);
      expect((await statusOf(job.id)).status).toBe("failed");
    });
  });

  describe("stage transitions", () => {
    it("walks the job through every stage to completion", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);

      expect(await drainStage(job.id)).toBe("applied");
      expect((await statusOf(job.id)).status).toBe("connectors_running");
      expect(pluginTasks().slice(2).map((d) => d.args.pluginName)).toEqual(["Notes", "Webhook"]);

      expect(await drainStage(job.id)).toBe("applied");
      expect((await statusOf(job.id)).status).toBe("visualizers_running");

      expect(await drainStage(job.id)).toBe("applied");
      const finished = await statusOf(job.id);
      expect(finished.status).toBe("completed");
      expect(finished.finishedAt).toBeInstanceOf(Date);

      expect(transitions().map((d) => d.args.status)).toEqual([
        "analyzers_completed",
        "connectors_completed",
        "visualizers_completed",
      ]);
      expect(pluginTasks().some((d) => d.args.pluginKind === "pivot")).toBe(false);
      expect((await dispatch.coordinator.progress(job.id)).awaiting).toBe(0);
    });

    it("applies the transition when its task runs, before this process saw the stage reports", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);

      expect(await dispatch.coordinator.applyStageTransition(job.id, "analyzers_completed")).toBe("applied");

      expect((await statusOf(job.id)).status).toBe("connectors_running");
    });

    it("advances a job whose stage tasks reported to another worker process", async () => {
      const other = buildDispatch({ storage, submitter, config: TEST_CONFIG, entryPoints, newToken: sequentialTokens() });
      await other.registry.load();
      const job = await newJob();
      await dispatch.coordinator.start(job.id);

      await other.coordinator.onTaskFinished({ token: "token-1", jobId: job.id, target: "run_plugin", outcome: "success" });
      await other.coordinator.onTaskFinished({ token: "token-2", jobId: job.id, target: "run_plugin", outcome: "success" });

      expect(await dispatch.coordinator.applyStageTransition(job.id, "analyzers_completed")).toBe("applied");
      expect((await statusOf(job.id)).status).toBe("connectors_running");
      expect(pluginTasks().slice(2).map((d) => d.args.pluginName)).toEqual(["Notes", "Webhook"]);
      expect((await dispatch.coordinator.progress(job.id)).awaiting).toBe(2);
      expect((await other.coordinator.progress(job.id)).awaiting).toBe(0);
    });

    it("skips a transition that was already applied", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);
      await drainStage(job.id);

      expect(await dispatch.coordinator.applyStageTransition(job.id, "analyzers_completed")).toBe("skipped");
      expect((await statusOf(job.id)).status).toBe("connectors_running");
    });

    it("refuses a transition that skips ahead", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);
      await dispatch.coordinator.onTaskFinished({ token: "token-1", jobId: job.id, target: "run_plugin", outcome: "success" });
      await dispatch.coordinator.onTaskFinished({ token: "token-2", jobId: job.id, target: "run_plugin", outcome: "success" });

      await expect(dispatch.coordinator.applyStageTransition(job.id, "connectors_completed")).rejects.toBeInstanceOf(
        InvalidStatusTransitionError,
      );
    });

    it("keeps the job running when a plugin task fails", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);

      await dispatch.coordinator.onTaskFinished({
        token: "token-1",
        jobId: job.id,
        target: "run_plugin",
        outcome: "failure",
        error: "analyzer:Dns: resolver timed out",
      });

      const stored = await statusOf(job.id);
      expect(stored.status).toBe("analyzers_running");
      expect(stored.errors).toEqual(["analyzer:Dns: resolver timed out"]);
      const progress = await dispatch.coordinator.progress(job.id);
      expect(progress.awaiting).toBe(1);
      expect(progress.failedTasks).toBe(1);
    });

    it("fails the job when its transition task fails", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);

      await dispatch.coordinator.onTaskFinished({
        token: "token-3",
        jobId: job.id,
        target: "set_job_status",
        outcome: "failure",
        error: "lease expired",
      });

      const stored = await statusOf(job.id);
      expect(stored.status).toBe("failed");
      expect(stored.errors).toEqual([`Job ${job.id} failed (correlation id ${stored.correlationId})`]);
    });

    it("uses the trace of the failed report as the job's correlation id", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);
      traced.length = 0;

      await dispatch.coordinator.onTaskFinished({
        token: "token-3",
        jobId: job.id,
        target: "set_job_status",
        outcome: "failure",
        error: "lease expired",
      });

      expect(traced.map((s) => s.operation)).toEqual(["task_finished"]);
      expect(traced[0].traceId).toMatch(/^[0-9a-f]{32}$/);
      expect((await statusOf(job.id)).correlationId).toBe(traced[0].traceId);
    });

    it("skips connectors that must not run after an analyzer failure", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);
      await storage.createPluginReport({
        jobId: job.id,
        pluginKind: "analyzer",
        pluginName: "Dns",
        taskId: "token-1",
        status: "failed",
      });

      await drainStage(job.id);

      expect(pluginTasks().slice(2).map((d) => d.args.pluginName)).toEqual(["Notes"]);
    });
  });

  describe("pivots", () => {
    it("submits a pivot once a related analyzer succeeded", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);
      await storage.createPluginReport({
        jobId: job.id,
        pluginKind: "analyzer",
        pluginName: "Validin",
        taskId: "token-2",
        status: "success",
      });

      await drainStage(job.id);

      const pivot = submitter.submitted[3];
      expect(pivot.token).toBe("token-4");
      expect(pivot.linkage).toEqual({ type: "plugin", stage: null, pluginKind: "pivot", pluginName: "Hosts" });
      expect(pivot.dependencies).toEqual([]);
      expect((await statusOf(job.id)).status).toBe("connectors_running");
    });

    it("does not hold up the pipeline when the pivot cannot be submitted", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);
      await storage.createPluginReport({
        jobId: job.id,
        pluginKind: "analyzer",
        pluginName: "Validin",
        taskId: "token-2",
        status: "success",
      });
      submitter.rejectWhen = (d) => d.linkage.type === "plugin" && d.linkage.pluginKind === "pivot";

      expect(await drainStage(job.id)).toBe("applied");

      expect(logs.error).toHaveBeenCalledWith("Pivot submission failed", {
        plugin: "pivot:Hosts",
        error: "queue unavailable for token-4",
      });
      expect((await statusOf(job.id)).status).toBe("connectors_running");
    });
  });

  describe("cancel", () => {
    it("marks an active job failed and records the reason", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);

      expect(await dispatch.coordinator.cancel(job.id, "cancelled by analyst")).toBe(true);

      const stored = await statusOf(job.id);
      expect(stored.status).toBe("failed");
      expect(stored.errors).toEqual(["cancelled by analyst"]);
      expect(await dispatch.coordinator.cancel(job.id, "again")).toBe(false);
      expect(await dispatch.coordinator.applyStageTransition(job.id, "analyzers_completed")).toBe("skipped");
    });
  });

  describe("progress", () => {
    it("counts reports per kind alongside the outstanding tasks", async () => {
      const job = await newJob();
      await dispatch.coordinator.start(job.id);
      await storage.createPluginReport({
        jobId: job.id,
        pluginKind: "analyzer",
        pluginName: "Dns",
        taskId: "token-1",
        status: "running",
      });

      const progress = await dispatch.coordinator.progress(job.id);

      expect(progress).toEqual({
        jobId: job.id,
        status: "analyzers_running",
        reports: {
          analyzer: { pending: 0, running: 1, success: 0, failed: 0 },
          connector: { pending: 0, running: 0, success: 0, failed: 0 },
          visualizer: { pending: 0, running: 0, success: 0, failed: 0 },
          pivot: { pending: 0, running: 0, success: 0, failed: 0 },
        },
        awaiting: 2,
        failedTasks: 0,
        errors: [],
      });
    });
  });
});
