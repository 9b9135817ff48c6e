import type { PluginKind, ReportStatus } from "@shared/schema";
import { EntryPointNotFoundError } from "../errors";
import type { Observable } from "./types";

export const KIND_BASE_PATHS: Record<PluginKind, string> = {
  analyzer: "analyzers",
  connector: "connectors",
  visualizer: "visualizers",
  pivot: "pivots",
};

export function completeEntryPoint(kind: PluginKind, entryPoint: string): string {
  return `${KIND_BASE_PATHS[kind]}.${entryPoint}`;
}

export interface PriorReport {
  pluginKind: PluginKind;
  pluginName: string;
  status: ReportStatus;
  report: unknown;
}

export interface PluginRunContext {
  jobId: string;
  pluginName: string;
  observable: Observable;
  parameters: Readonly<Record<string, unknown>>;
  /** Reports of plugins that already ran for the job. */
  reports: readonly PriorReport[];
  signal: AbortSignal;
}

export interface EntryPointDescription {
  name: string;
  kind: PluginKind;
  description: string;
}

export interface Describable {
  readonly ref: string;
  describe(): EntryPointDescription;
}

export interface Runnable {
  run(ctx: PluginRunContext): Promise<unknown>;
}

export type ExecutionUnit = Runnable & Describable;

export interface EntryPointLoader {
  load(ref: string): ExecutionUnit;
}

export class StaticEntryPointRegistry implements EntryPointLoader {
  private readonly units = new Map<string, ExecutionUnit>();

  register(unit: ExecutionUnit): void {
    if (this.units.has(unit.ref)) {
      throw new Error(`Entry point "${unit.ref}" is already registered.`);
    }
    this.units.set(unit.ref, unit);
  }

  has(ref: string): boolean {
    return this.units.has(ref);
  }

  load(ref: string): ExecutionUnit {
    const unit = this.units.get(ref);
    if (!unit) {
      throw new EntryPointNotFoundError(ref);
    }
    return unit;
  }

  refs(): string[] {
    return Array.from(this.units.keys());
  }
}

export function httpRequest(url: string, options: {
  method?: string;
  headers?: Record<string, string>;
  body?: unknown;
  timeout?: number;
  signal?: AbortSignal;
}): Promise<{ status: number; data: unknown }> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeout || 30000);
  const onAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onAbort, { once: true });
  const cleanup = () => {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener("abort", onAbort);
  };
  return fetch(url, {
    method: options.method || "GET",
    headers: options.headers,
    body: options.body ? JSON.stringify(options.body) : undefined,
    signal: controller.signal,
  }).then(async (res) => {
    cleanup();
    const text = await res.text();
    let data: unknown;
    try { data = JSON.parse(text); } catch { data = text; }
    return { status: res.status, data };
  }).catch((err: Error) => {
    cleanup();
    if (err.name === "AbortError") throw new Error("Request timed out");
    throw err;
  });
}

export function expectOk(service: string, res: { status: number; data: unknown }): unknown {
  if (res.status >= 400) {
    throw new Error(`${service} returned ${res.status}`);
  }
  return res.data;
}
