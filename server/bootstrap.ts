import type { AppConfig } from "./config";
import { StorageIdentityDirectory, type IdentityDirectory } from "./identity";
import { JobPipelineCoordinator } from "./pipeline/coordinator";
import { registerBuiltinEntryPoints } from "./plugins/catalog";
import { StaticEntryPointRegistry, type EntryPointLoader } from "./plugins/entry-points";
import { ParameterResolver } from "./plugins/parameter-resolver";
import { ParameterStore } from "./plugins/parameter-store";
import { PluginConfigRegistry } from "./plugins/registry";
import type { IStorage } from "./storage";
import { TaskSignatureBuilder } from "./tasks/signature-builder";
import type { Submitter } from "./tasks/submitter";

export interface DispatchOptions {
  storage: IStorage;
  submitter: Submitter;
  config: Pick<AppConfig, "queues" | "tasks">;
  entryPoints?: EntryPointLoader;
  directory?: IdentityDirectory;
  newToken?: () => string;
}

export interface Dispatch {
  entryPoints: EntryPointLoader;
  store: ParameterStore;
  resolver: ParameterResolver;
  registry: PluginConfigRegistry;
  builder: TaskSignatureBuilder;
  coordinator: JobPipelineCoordinator;
}

export function defaultEntryPoints(): StaticEntryPointRegistry {
  const registry = new StaticEntryPointRegistry();
  registerBuiltinEntryPoints(registry);
  return registry;
}

/** Wires the dispatch core over the given storage and submitter. */
export function buildDispatch(options: DispatchOptions): Dispatch {
  const { storage, submitter, config } = options;
  const entryPoints = options.entryPoints ?? defaultEntryPoints();
  const directory = options.directory ?? new StorageIdentityDirectory(storage);

  const store = new ParameterStore(storage);
  const resolver = new ParameterResolver(store, directory);
  const registry = new PluginConfigRegistry({ storage, resolver, entryPoints, queues: config.queues });
  const builder = new TaskSignatureBuilder({
    registry,
    queues: config.queues,
    tasks: config.tasks,
    newToken: options.newToken,
  });
  const coordinator = new JobPipelineCoordinator({ storage, registry, resolver, builder, submitter });

  return { entryPoints, store, resolver, registry, builder, coordinator };
}
