import type { TaskTarget } from "@shared/schema";
import type { TaskDescriptor } from "./task-descriptor";

/** Hands descriptors to the worker pool. Resolves once the descriptor is durably queued. */
export interface Submitter {
  submit(descriptor: TaskDescriptor): Promise<void>;
}

export type TaskOutcome = "success" | "failure";

/** Completion callback payload, sent once per token when its task reaches a terminal state. */
export interface TaskReport {
  token: string;
  jobId: string;
  target: TaskTarget;
  outcome: TaskOutcome;
  error?: string;
}
