import type { JobStatus, PluginKind } from "@shared/schema";

// ─── Canonical error codes ────────────────────────────────────────────────────

export const ERROR_CODES = {
  // Configuration
  PARAMETER_NOT_CONFIGURED: "PARAMETER_NOT_CONFIGURED",
  INVALID_PARAMETER_VALUE: "INVALID_PARAMETER_VALUE",
  ENTRY_POINT_NOT_FOUND: "ENTRY_POINT_NOT_FOUND",
  INVALID_PLUGIN_CONFIG: "INVALID_PLUGIN_CONFIG",
  PLUGIN_NOT_FOUND: "PLUGIN_NOT_FOUND",

  // Runnability
  PLUGIN_NOT_RUNNABLE: "PLUGIN_NOT_RUNNABLE",
  PLUGIN_DISABLED: "PLUGIN_DISABLED",
  PLUGIN_DISABLED_IN_ORGANIZATION: "PLUGIN_DISABLED_IN_ORGANIZATION",
  MISSING_PARAMETER: "MISSING_PARAMETER",

  // Pipeline
  INVALID_JOB: "INVALID_JOB",
  JOB_NOT_FOUND: "JOB_NOT_FOUND",
  INVALID_STATUS_TRANSITION: "INVALID_STATUS_TRANSITION",
  STAGE_SUBMISSION_FAILED: "STAGE_SUBMISSION_FAILED",

  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface ApiError {
  code: ErrorCode;
  message: string;
  field?: string;
  details?: unknown;
}

export interface PluginRef {
  kind: PluginKind;
  name: string;
}

export type RejectionReason =
  | { code: typeof ERROR_CODES.PLUGIN_DISABLED; plugin: string }
  | { code: typeof ERROR_CODES.PLUGIN_DISABLED_IN_ORGANIZATION; plugin: string; orgId: string }
  | { code: typeof ERROR_CODES.MISSING_PARAMETER; plugin: string; parameter: string };

export function describeRejection(reason: RejectionReason): string {
  switch (reason.code) {
    case ERROR_CODES.PLUGIN_DISABLED:
      return `Plugin ${reason.plugin} is disabled`;
    case ERROR_CODES.PLUGIN_DISABLED_IN_ORGANIZATION:
      return `Plugin ${reason.plugin} is disabled for organization ${reason.orgId}`;
    case ERROR_CODES.MISSING_PARAMETER:
      return `Plugin ${reason.plugin} has no value for required parameter ${reason.parameter}`;
  }
}

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }

  toApiError(): ApiError {
    return { code: this.code, message: this.message };
  }
}

export class ParameterNotConfiguredError extends PipelineError {
  constructor(
    readonly plugin: PluginRef,
    readonly parameter: string,
  ) {
    super(
      ERROR_CODES.PARAMETER_NOT_CONFIGURED,
      `Unable to find a valid value for parameter ${parameter} for configuration ${plugin.name}`,
    );
  }

  override toApiError(): ApiError {
    return { code: this.code, message: this.message, field: this.parameter, details: { plugin: this.plugin } };
  }
}

export class InvalidParameterValueError extends PipelineError {
  constructor(
    readonly parameter: string,
    readonly issues: string[],
  ) {
    super(ERROR_CODES.INVALID_PARAMETER_VALUE, `Invalid value for parameter ${parameter}: ${issues.join("; ")}`);
  }

  override toApiError(): ApiError {
    return { code: this.code, message: this.message, field: this.parameter, details: { issues: this.issues } };
  }
}

export class PluginNotRunnableError extends PipelineError {
  constructor(
    readonly plugin: PluginRef,
    readonly reasons: RejectionReason[],
  ) {
    super(
      ERROR_CODES.PLUGIN_NOT_RUNNABLE,
      `Unable to create signature, config ${plugin.name} is not runnable: ${reasons.map(describeRejection).join("; ")}`,
    );
  }

  override toApiError(): ApiError {
    return { code: this.code, message: this.message, details: { plugin: this.plugin, reasons: this.reasons } };
  }
}

export class PluginNotFoundError extends PipelineError {
  constructor(readonly plugin: PluginRef) {
    super(ERROR_CODES.PLUGIN_NOT_FOUND, `No ${plugin.kind} configuration named ${plugin.name}`);
  }
}

export class EntryPointNotFoundError extends PipelineError {
  constructor(readonly entryPoint: string) {
    super(ERROR_CODES.ENTRY_POINT_NOT_FOUND, `Entry point ${entryPoint} couldn't be loaded`);
  }
}

export class InvalidPluginConfigError extends PipelineError {
  constructor(
    readonly plugin: string,
    readonly issues: string[],
  ) {
    super(ERROR_CODES.INVALID_PLUGIN_CONFIG, `Plugin ${plugin} has an invalid configuration: ${issues.join("; ")}`);
  }

  override toApiError(): ApiError {
    return { code: this.code, message: this.message, details: { plugin: this.plugin, issues: this.issues } };
  }
}

export class InvalidJobError extends PipelineError {
  constructor(readonly issues: string[]) {
    super(ERROR_CODES.INVALID_JOB, `Invalid job submission: ${issues.join("; ")}`);
  }

  override toApiError(): ApiError {
    return { code: this.code, message: this.message, details: { issues: this.issues } };
  }
}

export class JobNotFoundError extends PipelineError {
  constructor(readonly jobId: string) {
    super(ERROR_CODES.JOB_NOT_FOUND, `Job ${jobId} not found`);
  }
}

export class InvalidStatusTransitionError extends PipelineError {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(ERROR_CODES.INVALID_STATUS_TRANSITION, `Job ${jobId} cannot move from ${from} to ${to}`);
  }
}

/** Surfaced to users as a generic failure; operators find the detail under the correlation id. */
export class StageSubmissionError extends PipelineError {
  constructor(
    readonly jobId: string,
    readonly stage: PluginKind,
    readonly correlationId: string,
    readonly causes: string[],
  ) {
    super(ERROR_CODES.STAGE_SUBMISSION_FAILED, `Job ${jobId} failed (correlation id ${correlationId})`);
  }

  override toApiError(): ApiError {
    return { code: this.code, message: this.message, details: { correlationId: this.correlationId } };
  }
}

export class InvariantViolation extends PipelineError {
  constructor(message: string) {
    super(ERROR_CODES.INTERNAL_ERROR, message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
