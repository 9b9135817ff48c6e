import type { JobStatus, PluginKind, TaskTarget } from "@shared/schema";

export interface RelatedConfigRef {
  kind: "analyzer" | "connector";
  name: string;
}

export interface RunPluginArgs {
  jobId: string;
  pluginKind: PluginKind;
  pluginName: string;
  entryPoint: string;
  /** Resolved parameter values keyed by parameter name. */
  parameters: Readonly<Record<string, unknown>>;
  /** Pivots only: the plugins whose reports the pivot reads. */
  relatedConfigs?: readonly RelatedConfigRef[];
}

export interface SetJobStatusArgs {
  jobId: string;
  status: JobStatus;
}

interface DescriptorBase {
  readonly token: string;
  readonly jobId: string;
  readonly target: TaskTarget;
  readonly queue: string;
  /** Seconds. */
  readonly softTimeLimit: number;
  readonly dependencies: readonly string[];
  readonly messageGroupId: string;
}

export interface PluginTaskDescriptor extends DescriptorBase {
  readonly target: "run_plugin";
  readonly args: Readonly<RunPluginArgs>;
  readonly linkage: {
    readonly type: "plugin";
    /** Pipeline stage the task belongs to; null for pivots, which never gate a stage. */
    readonly stage: Exclude<PluginKind, "pivot"> | null;
    readonly pluginKind: PluginKind;
    readonly pluginName: string;
  };
}

export interface StageTransitionDescriptor extends DescriptorBase {
  readonly target: "set_job_status";
  readonly args: Readonly<SetJobStatusArgs>;
  readonly linkage: {
    readonly type: "stage_transition";
    readonly targetStatus: JobStatus;
  };
}

export type TaskDescriptor = PluginTaskDescriptor | StageTransitionDescriptor;

/** Freezes the descriptor and everything it carries. */
export function freezeDescriptor(descriptor: TaskDescriptor): void {
  Object.freeze(descriptor.args);
  Object.freeze(descriptor.linkage);
  Object.freeze(descriptor.dependencies);
  if (descriptor.target === "run_plugin") {
    Object.freeze(descriptor.args.parameters);
    if (descriptor.args.relatedConfigs) Object.freeze(descriptor.args.relatedConfigs);
  }
  Object.freeze(descriptor);
}
