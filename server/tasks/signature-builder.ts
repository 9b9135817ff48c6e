import { randomUUID } from "crypto";
import type { JobStatus } from "@shared/schema";
import type { AppConfig, QueueSettings } from "../config";
import { PluginNotRunnableError } from "../errors";
import { logger } from "../logger";
import { isValidQueue, queueName } from "../plugins/queues";
import type { PluginConfigRegistry } from "../plugins/registry";
import { pluginLabel, type JobContext, type PivotConfiguration, type PluginConfiguration, type ResolvedParams } from "../plugins/types";
import { freezeDescriptor, type PluginTaskDescriptor, type StageTransitionDescriptor } from "./task-descriptor";

const log = logger.child("signature-builder");

export interface SignatureBuilderDeps {
  registry: PluginConfigRegistry;
  queues: QueueSettings;
  tasks: Pick<AppConfig["tasks"], "stageTransitionSoftTimeLimit">;
  /** Token source; every call must return a value never returned before. */
  newToken?: () => string;
}

function paramsByName(params: ResolvedParams): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  params.forEach((value, parameter) => {
    out[parameter.name] = value;
  });
  return out;
}

export class TaskSignatureBuilder {
  private readonly newToken: () => string;

  constructor(private readonly deps: SignatureBuilderDeps) {
    this.newToken = deps.newToken ?? randomUUID;
  }

  /**
   * One descriptor per call, each with a fresh token. A retry is a new
   * attempt and goes through here again.
   */
  async build(plugin: PluginConfiguration, job: JobContext, resolvedParams: ResolvedParams): Promise<PluginTaskDescriptor> {
    const check = await this.deps.registry.checkRunnable(plugin, job.user, job.runtimeConfiguration);
    if (!check.runnable) {
      throw new PluginNotRunnableError({ kind: plugin.kind, name: plugin.name }, check.reasons);
    }

    let routingKey = plugin.routingKey;
    if (!isValidQueue(this.deps.queues, routingKey)) {
      log.warn("Plugin queue is no longer a configured queue, dispatching to the default queue", {
        plugin: pluginLabel(plugin),
        queue: routingKey,
        defaultQueue: this.deps.queues.default,
      });
      routingKey = this.deps.queues.default;
    }

    const token = this.newToken();
    const descriptor: PluginTaskDescriptor = {
      token,
      jobId: job.id,
      target: "run_plugin",
      args: {
        jobId: job.id,
        pluginKind: plugin.kind,
        pluginName: plugin.name,
        entryPoint: plugin.completeEntryPoint,
        parameters: paramsByName(resolvedParams),
        ...(plugin.kind === "pivot"
          ? { relatedConfigs: plugin.relatedConfigs.map((rc) => ({ kind: rc.kind, name: rc.name })) }
          : {}),
      },
      queue: queueName(this.deps.queues, routingKey),
      softTimeLimit: plugin.softTimeLimit,
      dependencies: [],
      messageGroupId: token,
      linkage: {
        type: "plugin",
        stage: plugin.kind === "pivot" ? null : plugin.kind,
        pluginKind: plugin.kind,
        pluginName: plugin.name,
      },
    };
    freezeDescriptor(descriptor);

    log.debug("Plugin task built", { plugin: pluginLabel(plugin), token, queue: descriptor.queue });
    return descriptor;
  }

  async buildPivot(plugin: PivotConfiguration, job: JobContext, resolvedParams: ResolvedParams): Promise<PluginTaskDescriptor> {
    return this.build(plugin, job, resolvedParams);
  }

  /** Its only effect, once every dependency has finished, is to move the job to `targetStatus`. */
  buildStageTransition(
    job: Pick<JobContext, "id">,
    targetStatus: JobStatus,
    dependencies: readonly string[],
  ): StageTransitionDescriptor {
    const token = this.newToken();
    const descriptor: StageTransitionDescriptor = {
      token,
      jobId: job.id,
      target: "set_job_status",
      args: { jobId: job.id, status: targetStatus },
      queue: queueName(this.deps.queues, this.deps.queues.default),
      softTimeLimit: this.deps.tasks.stageTransitionSoftTimeLimit,
      dependencies: [...new Set(dependencies)],
      messageGroupId: randomUUID(),
      linkage: { type: "stage_transition", targetStatus },
    };
    freezeDescriptor(descriptor);
    return descriptor;
  }
}
