import type { ParamType, PluginKind, PluginRuntimeConfig } from "@shared/schema";
import type { AppConfig } from "../../config";
import {
  KIND_BASE_PATHS,
  StaticEntryPointRegistry,
  type ExecutionUnit,
  type PluginRunContext,
} from "../../plugins/entry-points";
import type { TaskDescriptor } from "../../tasks/task-descriptor";
import type { Submitter } from "../../tasks/submitter";
import type { MemoryStorage } from "./memory-storage";

export const TEST_CONFIG: Pick<AppConfig, "queues" | "tasks"> = {
  queues: { valid: ["default", "long"], default: "default", prefix: undefined },
  tasks: { defaultSoftTimeLimit: 60, stageTransitionSoftTimeLimit: 10, maxAttempts: 3 },
};

/** Token source yielding token-1, token-2, ... */
export function sequentialTokens(): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `token-${n}`;
  };
}

export function fakeUnit(
  kind: PluginKind,
  entryPoint: string,
  run: (ctx: PluginRunContext) => Promise<unknown> = async () => ({ ok: true }),
): ExecutionUnit {
  return {
    ref: `${KIND_BASE_PATHS[kind]}.${entryPoint}`,
    describe: () => ({ name: entryPoint, kind, description: `test ${kind}` }),
    run,
  };
}

export class RecordingSubmitter implements Submitter {
  readonly submitted: TaskDescriptor[] = [];
  /** Descriptors matching this predicate are rejected. */
  rejectWhen: (descriptor: TaskDescriptor) => boolean = () => false;

  async submit(descriptor: TaskDescriptor): Promise<void> {
    if (this.rejectWhen(descriptor)) {
      throw new Error(`queue unavailable for ${descriptor.token}`);
    }
    this.submitted.push(descriptor);
  }
}

export interface PluginFixture {
  kind: PluginKind;
  name: string;
  entryPoint?: string;
  disabled?: boolean;
  config?: PluginRuntimeConfig;
  options?: Record<string, unknown>;
  parameters?: Array<{ name: string; type?: ParamType; required?: boolean; isSecret?: boolean }>;
  defaults?: Record<string, unknown>;
}

/**
 * Stores a plugin, its parameters and default values, and registers a unit
 * for its entry point when `entryPoints` is given.
 */
export async function seedPlugin(
  storage: MemoryStorage,
  fixture: PluginFixture,
  entryPoints?: StaticEntryPointRegistry,
): Promise<void> {
  const entryPoint = fixture.entryPoint ?? `${fixture.name.toLowerCase()}.${fixture.name}`;
  await storage.insertPluginConfigIfAbsent({
    kind: fixture.kind,
    name: fixture.name,
    disabled: fixture.disabled ?? false,
    entryPoint,
    config: fixture.config ?? { queue: "default", softTimeLimit: 60 },
    options: fixture.options ?? {},
  });

  for (const p of fixture.parameters ?? []) {
    const row = await storage.upsertParameter({
      pluginKind: fixture.kind,
      pluginName: fixture.name,
      name: p.name,
      type: p.type ?? "str",
      isSecret: p.isSecret ?? false,
      required: p.required ?? false,
    });
    if (fixture.defaults && p.name in fixture.defaults) {
      await storage.upsertParameterValue({
        parameterId: row.id,
        value: fixture.defaults[p.name],
        ownerId: null,
        forOrganization: false,
      });
    }
  }

  if (entryPoints) {
    const unit = fakeUnit(fixture.kind, entryPoint);
    if (!entryPoints.has(unit.ref)) entryPoints.register(unit);
  }
}

export function emptyEntryPoints(): StaticEntryPointRegistry {
  return new StaticEntryPointRegistry();
}
