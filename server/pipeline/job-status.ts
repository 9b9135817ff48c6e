import type { JobStatus, PluginKind } from "@shared/schema";

export type Stage = Exclude<PluginKind, "pivot">;

export const STAGE_ORDER: readonly Stage[] = ["analyzer", "connector", "visualizer"];

export const STAGE_STATUSES: Record<Stage, { running: JobStatus; completed: JobStatus }> = {
  analyzer: { running: "analyzers_running", completed: "analyzers_completed" },
  connector: { running: "connectors_running", completed: "connectors_completed" },
  visualizer: { running: "visualizers_running", completed: "visualizers_completed" },
};

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ["analyzers_running", "failed"],
  analyzers_running: ["analyzers_completed", "failed"],
  analyzers_completed: ["connectors_running", "failed"],
  connectors_running: ["connectors_completed", "failed"],
  connectors_completed: ["visualizers_running", "failed"],
  visualizers_running: ["visualizers_completed", "failed"],
  visualizers_completed: ["completed", "failed"],
  completed: [],
  failed: [],
};

export const ACTIVE_STATUSES: readonly JobStatus[] = [
  "pending",
  "analyzers_running",
  "analyzers_completed",
  "connectors_running",
  "connectors_completed",
  "visualizers_running",
  "visualizers_completed",
];

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Statuses a job may be in for a move to `to` to be legal. */
export function sourcesOf(to: JobStatus): JobStatus[] {
  return ACTIVE_STATUSES.filter((from) => canTransition(from, to));
}

export function nextStage(stage: Stage): Stage | null {
  const i = STAGE_ORDER.indexOf(stage);
  return STAGE_ORDER[i + 1] ?? null;
}

/** The stage whose completion `status` records, if any. */
export function stageCompletedBy(status: JobStatus): Stage | null {
  return STAGE_ORDER.find((stage) => STAGE_STATUSES[stage].completed === status) ?? null;
}

/** Position in the pipeline, used to recognise a transition that was already applied. */
export function statusRank(status: JobStatus): number {
  if (status === "failed") return Number.MAX_SAFE_INTEGER;
  if (status === "completed") return ACTIVE_STATUSES.length;
  return ACTIVE_STATUSES.indexOf(status);
}
