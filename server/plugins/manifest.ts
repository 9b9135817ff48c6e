import { readFile } from "fs/promises";
import { z } from "zod";
import { PARAM_TYPES, PLUGIN_KINDS } from "@shared/schema";
import type { AppConfig } from "../config";
import { InvalidPluginConfigError } from "../errors";
import { logger } from "../logger";
import type { IStorage } from "../storage";
import { validateParameterValue } from "./parameter-store";

const log = logger.child("plugin-manifest");

const manifestParameterSchema = z.object({
  name: z.string().min(1).max(50),
  type: z.enum(PARAM_TYPES),
  description: z.string().default(""),
  isSecret: z.boolean().default(false),
  required: z.boolean().default(false),
});

const manifestPluginSchema = z.object({
  kind: z.enum(PLUGIN_KINDS),
  name: z.string().min(1),
  description: z.string().default(""),
  disabled: z.boolean().default(false),
  entryPoint: z.string().min(1),
  config: z
    .object({
      queue: z.string().min(1).optional(),
      softTimeLimit: z.number().int().positive().optional(),
    })
    .default({}),
  options: z.record(z.unknown()).default({}),
  parameters: z.array(manifestParameterSchema).default([]),
  /** Default-scope values keyed by parameter name. */
  defaults: z.record(z.unknown()).default({}),
});

export const manifestSchema = z.object({
  plugins: z.array(manifestPluginSchema),
});

export type Manifest = z.infer<typeof manifestSchema>;
export type ManifestPlugin = z.infer<typeof manifestPluginSchema>;

export interface SeedDefaults {
  queue: string;
  softTimeLimit: number;
}

export interface SeedReport {
  plugins: number;
  /** Plugins that did not exist before this seed. */
  pluginsCreated: number;
  parameters: number;
  defaultsWritten: number;
}

export function seedDefaultsFrom(config: Pick<AppConfig, "queues" | "tasks">): SeedDefaults {
  return { queue: config.queues.default, softTimeLimit: config.tasks.defaultSoftTimeLimit };
}

export function parseManifest(raw: unknown): Manifest {
  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidPluginConfigError(
      "manifest",
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  for (const plugin of result.data.plugins) {
    const declared = new Set(plugin.parameters.map((p) => p.name));
    const unknown = Object.keys(plugin.defaults).filter((name) => !declared.has(name));
    if (unknown.length > 0) {
      throw new InvalidPluginConfigError(
        `${plugin.kind}:${plugin.name}`,
        unknown.map((name) => `defaults.${name}: no such parameter`),
      );
    }
  }
  return result.data;
}

export async function loadManifest(path: string): Promise<Manifest> {
  const text = await readFile(path, "utf8");
  return parseManifest(JSON.parse(text));
}

/**
 * Writes plugins and parameters from the manifest. Plugin configs and
 * default values are only written where none exists, so a plugin an
 * administrator disabled or re-queued, and values they changed, survive a
 * restart.
 */
export async function seedManifest(storage: IStorage, manifest: Manifest, defaults: SeedDefaults): Promise<SeedReport> {
  const report: SeedReport = { plugins: 0, pluginsCreated: 0, parameters: 0, defaultsWritten: 0 };

  for (const plugin of manifest.plugins) {
    const created = await storage.insertPluginConfigIfAbsent({
      kind: plugin.kind,
      name: plugin.name,
      description: plugin.description,
      disabled: plugin.disabled,
      entryPoint: plugin.entryPoint,
      config: {
        queue: plugin.config.queue ?? defaults.queue,
        softTimeLimit: plugin.config.softTimeLimit ?? defaults.softTimeLimit,
      },
      options: plugin.options,
    });
    report.plugins += 1;
    if (created) report.pluginsCreated += 1;

    for (const declared of plugin.parameters) {
      const parameter = await storage.upsertParameter({
        pluginKind: plugin.kind,
        pluginName: plugin.name,
        ...declared,
      });
      report.parameters += 1;

      if (!Object.prototype.hasOwnProperty.call(plugin.defaults, declared.name)) continue;
      const value = plugin.defaults[declared.name];
      validateParameterValue(parameter, value);

      const existing = await storage.findParameterValue(parameter.id, null, false);
      if (existing) continue;
      await storage.upsertParameterValue({ parameterId: parameter.id, value, ownerId: null, forOrganization: false });
      report.defaultsWritten += 1;
    }
  }

  log.info("Plugin manifest seeded", { ...report });
  return report;
}
