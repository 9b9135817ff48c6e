import { z } from "zod";
import {
  OBSERVABLE_CLASSIFICATIONS,
  TLP_LEVELS,
  type PluginConfigRow,
  type PluginKind,
  type RuntimeConfiguration,
} from "@shared/schema";
import type { QueueSettings } from "../config";
import {
  ERROR_CODES,
  EntryPointNotFoundError,
  InvalidPluginConfigError,
  PluginNotFoundError,
  errorMessage,
  type RejectionReason,
} from "../errors";
import { logger } from "../logger";
import type { IStorage } from "../storage";
import { completeEntryPoint, type EntryPointLoader } from "./entry-points";
import type { ParameterResolver } from "./parameter-resolver";
import { isValidQueue, queueName } from "./queues";
import {
  pluginLabel,
  type Parameter,
  type PluginConfiguration,
  type UserRef,
} from "./types";

const log = logger.child("plugin-registry");

// ─── Record validation ───────────────────────────────────────────────────────

export const pluginNameSchema = z
  .string()
  .min(1)
  .max(100)
  .regex(/^\w+$/, "name may only contain letters, digits and underscores");

const runtimeConfigSchema = z.object({
  queue: z.string().min(1),
  softTimeLimit: z.number().int().positive(),
});

const analyzerOptionsSchema = z.object({
  type: z.enum(["observable", "file"]).default("observable"),
  observableSupported: z.array(z.enum(OBSERVABLE_CLASSIFICATIONS)).default([]),
  maximumTlp: z.enum(TLP_LEVELS).default("RED"),
});

const connectorOptionsSchema = z.object({
  maximumTlp: z.enum(TLP_LEVELS).default("CLEAR"),
  runOnFailure: z.boolean().default(true),
});

const pivotOptionsSchema = z.object({
  relatedConfigs: z
    .array(z.object({ kind: z.enum(["analyzer", "connector"]), name: pluginNameSchema }))
    .default([]),
});

function issuesOf(error: z.ZodError, prefix: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path].join(".");
    return `${path}: ${issue.message}`;
  });
}

/** A plugin as stored, before validation. */
export interface PluginRecord {
  kind: PluginKind;
  name: string;
  description: string;
  disabled: boolean;
  disabledInOrganizations: readonly string[];
  entryPoint: string;
  config: unknown;
  options: unknown;
  parameters: readonly Parameter[];
}

export interface RunnabilityCheck {
  runnable: boolean;
  reasons: RejectionReason[];
}

export interface LoadReport {
  registered: PluginConfiguration[];
  rejected: Array<{ kind: PluginKind; name: string; code: string; error: string }>;
}

export interface RegistryDeps {
  storage: IStorage;
  resolver: ParameterResolver;
  entryPoints: EntryPointLoader;
  queues: QueueSettings;
}

function registryKey(kind: PluginKind, name: string): string {
  return `${kind}:${name}`;
}

function toParameter(row: Parameter): Parameter {
  return {
    id: row.id,
    name: row.name,
    type: row.type,
    description: row.description,
    isSecret: row.isSecret,
    required: row.required,
    pluginKind: row.pluginKind,
    pluginName: row.pluginName,
  };
}

/**
 * Plugin configurations compiled into plain frozen structs. Queue, soft
 * time limit and the complete entry point are computed once at
 * registration; reads never touch storage.
 */
export class PluginConfigRegistry {
  private plugins = new Map<string, PluginConfiguration>();

  constructor(private readonly deps: RegistryDeps) {}

  // ─── Registration ────────────────────────────────────────────────────────

  register(record: PluginRecord): PluginConfiguration {
    const plugin = this.compile(record);
    this.plugins.set(registryKey(plugin.kind, plugin.name), plugin);
    log.info("Plugin registered", {
      plugin: pluginLabel(plugin),
      entryPoint: plugin.completeEntryPoint,
      queue: plugin.queue,
    });
    return plugin;
  }

  /** Registers every stored plugin. A rejected plugin never blocks the others. */
  async load(): Promise<LoadReport> {
    const rows = await this.deps.storage.getPluginConfigs();
    const next = new Map<string, PluginConfiguration>();
    const report: LoadReport = { registered: [], rejected: [] };

    for (const row of rows) {
      try {
        const plugin = this.compile(await this.recordFor(row));
        next.set(registryKey(plugin.kind, plugin.name), plugin);
        report.registered.push(plugin);
      } catch (err) {
        if (!(err instanceof EntryPointNotFoundError) && !(err instanceof InvalidPluginConfigError)) {
          throw err;
        }
        log.error("Plugin registration rejected", {
          plugin: registryKey(row.kind, row.name),
          code: err.code,
          error: err.message,
        });
        report.rejected.push({ kind: row.kind, name: row.name, code: err.code, error: err.message });
      }
    }

    this.plugins = next;
    log.info("Plugin registry loaded", {
      registered: report.registered.length,
      rejected: report.rejected.length,
    });
    return report;
  }

  /** Recomputes one struct from storage. Returns undefined when the plugin no longer exists. */
  async reload(kind: PluginKind, name: string): Promise<PluginConfiguration | undefined> {
    const key = registryKey(kind, name);
    const row = await this.deps.storage.getPluginConfig(kind, name);
    if (!row) {
      this.plugins.delete(key);
      return undefined;
    }
    try {
      return this.register(await this.recordFor(row));
    } catch (err) {
      this.plugins.delete(key);
      log.error("Plugin reload rejected", { plugin: key, error: errorMessage(err) });
      throw err;
    }
  }

  private async recordFor(row: PluginConfigRow): Promise<PluginRecord> {
    const [parameters, disabledInOrganizations] = await Promise.all([
      this.deps.storage.getParameters(row.kind, row.name),
      this.deps.storage.getDisabledOrganizations(row.kind, row.name),
    ]);
    return {
      kind: row.kind,
      name: row.name,
      description: row.description,
      disabled: row.disabled,
      disabledInOrganizations,
      entryPoint: row.entryPoint,
      config: row.config,
      options: row.options,
      parameters: parameters.map(toParameter),
    };
  }

  private compile(record: PluginRecord): PluginConfiguration {
    const label = registryKey(record.kind, record.name);
    const issues: string[] = [];

    const name = pluginNameSchema.safeParse(record.name);
    if (!name.success) issues.push(...issuesOf(name.error, "name"));

    const config = runtimeConfigSchema.safeParse(record.config);
    if (!config.success) issues.push(...issuesOf(config.error, "config"));

    const seen = new Set<string>();
    for (const parameter of record.parameters) {
      if (parameter.pluginKind !== record.kind || parameter.pluginName !== record.name) {
        issues.push(`parameters.${parameter.name}: owned by ${parameter.pluginKind}:${parameter.pluginName}`);
      }
      if (seen.has(parameter.name)) {
        issues.push(`parameters.${parameter.name}: declared twice`);
      }
      seen.add(parameter.name);
    }

    if (issues.length > 0 || !config.success) {
      throw new InvalidPluginConfigError(label, issues);
    }

    const complete = completeEntryPoint(record.kind, record.entryPoint);
    const unit = this.deps.entryPoints.load(complete);
    const described = unit.describe();
    if (described.kind !== record.kind) {
      throw new InvalidPluginConfigError(label, [
        `entryPoint: ${complete} implements a ${described.kind}, not a ${record.kind}`,
      ]);
    }

    let routingKey = config.data.queue;
    if (!isValidQueue(this.deps.queues, routingKey)) {
      log.warn("Plugin queue is not a configured queue, using the default queue", {
        plugin: label,
        queue: routingKey,
        defaultQueue: this.deps.queues.default,
      });
      routingKey = this.deps.queues.default;
    }

    const base = {
      name: record.name,
      description: record.description,
      disabled: record.disabled,
      disabledInOrganizations: new Set(record.disabledInOrganizations),
      entryPoint: record.entryPoint,
      completeEntryPoint: complete,
      routingKey,
      queue: queueName(this.deps.queues, routingKey),
      softTimeLimit: config.data.softTimeLimit,
      parameters: Object.freeze(record.parameters.map((p) => Object.freeze(toParameter(p)))),
    };

    return Object.freeze(this.withOptions(record, label, base));
  }

  private withOptions(
    record: PluginRecord,
    label: string,
    base: Omit<PluginConfiguration, "kind">,
  ): PluginConfiguration {
    switch (record.kind) {
      case "analyzer": {
        const options = analyzerOptionsSchema.safeParse(record.options ?? {});
        if (!options.success) throw new InvalidPluginConfigError(label, issuesOf(options.error, "options"));
        return {
          ...base,
          kind: "analyzer",
          type: options.data.type,
          observableSupported: Object.freeze(options.data.observableSupported),
          maximumTlp: options.data.maximumTlp,
        };
      }
      case "connector": {
        const options = connectorOptionsSchema.safeParse(record.options ?? {});
        if (!options.success) throw new InvalidPluginConfigError(label, issuesOf(options.error, "options"));
        return { ...base, kind: "connector", ...options.data };
      }
      case "visualizer":
        return { ...base, kind: "visualizer" };
      case "pivot": {
        const options = pivotOptionsSchema.safeParse(record.options ?? {});
        if (!options.success) throw new InvalidPluginConfigError(label, issuesOf(options.error, "options"));
        return { ...base, kind: "pivot", relatedConfigs: Object.freeze(options.data.relatedConfigs) };
      }
    }
  }

  // ─── Reads ───────────────────────────────────────────────────────────────

  get(kind: PluginKind, name: string): PluginConfiguration | undefined {
    return this.plugins.get(registryKey(kind, name));
  }

  require(kind: PluginKind, name: string): PluginConfiguration {
    const plugin = this.get(kind, name);
    if (!plugin) {
      throw new PluginNotFoundError({ kind, name });
    }
    return plugin;
  }

  list(kind?: PluginKind): PluginConfiguration[] {
    const all = Array.from(this.plugins.values());
    const filtered = kind ? all.filter((p) => p.kind === kind) : all;
    return filtered.sort((a, b) => a.name.localeCompare(b.name));
  }

  requiredParameters(plugin: PluginConfiguration): Parameter[] {
    return plugin.parameters.filter((p) => p.required);
  }

  secretParameters(plugin: PluginConfiguration): Parameter[] {
    return plugin.parameters.filter((p) => p.isSecret);
  }

  visibleParameters(plugin: PluginConfiguration): Parameter[] {
    return plugin.parameters.filter((p) => !p.isSecret);
  }

  // ─── Runnability ─────────────────────────────────────────────────────────

  async checkRunnable(
    plugin: PluginConfiguration,
    user: UserRef | null,
    runtimeConfiguration?: RuntimeConfiguration,
  ): Promise<RunnabilityCheck> {
    const label = pluginLabel(plugin);
    const reasons: RejectionReason[] = [];

    if (plugin.disabled) {
      reasons.push({ code: ERROR_CODES.PLUGIN_DISABLED, plugin: label });
    }

    const membership = await this.deps.resolver.membershipOf(user);
    if (membership && plugin.disabledInOrganizations.has(membership.orgId)) {
      reasons.push({ code: ERROR_CODES.PLUGIN_DISABLED_IN_ORGANIZATION, plugin: label, orgId: membership.orgId });
    }

    const missing = await this.deps.resolver.missingRequired(plugin, { user, runtimeConfiguration, membership });
    for (const parameter of missing) {
      reasons.push({ code: ERROR_CODES.MISSING_PARAMETER, plugin: label, parameter: parameter.name });
    }

    return { runnable: reasons.length === 0, reasons };
  }

  async isRunnable(
    plugin: PluginConfiguration,
    user: UserRef | null,
    runtimeConfiguration?: RuntimeConfiguration,
  ): Promise<boolean> {
    const check = await this.checkRunnable(plugin, user, runtimeConfiguration);
    return check.runnable;
  }

  async runnable(kind: PluginKind, user: UserRef | null): Promise<PluginConfiguration[]> {
    const plugins = this.list(kind);
    const checks = await Promise.all(plugins.map((plugin) => this.isRunnable(plugin, user)));
    return plugins.filter((_, i) => checks[i]);
  }

  // ─── Administration ──────────────────────────────────────────────────────

  async setDisabled(kind: PluginKind, name: string, disabled: boolean): Promise<PluginConfiguration | undefined> {
    const updated = await this.deps.storage.updatePluginConfig(kind, name, { disabled });
    if (!updated) {
      throw new PluginNotFoundError({ kind, name });
    }
    log.info(disabled ? "Plugin disabled" : "Plugin enabled", { plugin: registryKey(kind, name) });
    return this.reload(kind, name);
  }

  async setDisabledForOrganization(
    kind: PluginKind,
    name: string,
    orgId: string,
    disabled: boolean,
  ): Promise<PluginConfiguration | undefined> {
    if (!(await this.deps.storage.getPluginConfig(kind, name))) {
      throw new PluginNotFoundError({ kind, name });
    }
    await this.deps.storage.setDisabledForOrganization(kind, name, orgId, disabled);
    log.info(disabled ? "Plugin disabled for organization" : "Plugin enabled for organization", {
      plugin: registryKey(kind, name),
      orgId,
    });
    return this.reload(kind, name);
  }
}
