import type { RuntimeConfiguration } from "@shared/schema";
import { InvariantViolation, ParameterNotConfiguredError } from "../errors";
import type { IdentityDirectory } from "../identity";
import { logger } from "../logger";
import type { ParameterStore } from "./parameter-store";
import type {
  JobContext,
  Membership,
  Parameter,
  PluginConfiguration,
  ResolvedParameter,
  ResolvedParams,
  UserRef,
} from "./types";

const log = logger.child("parameter-resolver");

export interface ResolutionContext {
  user: UserRef | null;
  runtimeConfiguration?: RuntimeConfiguration;
  /** Pass a prefetched membership to avoid one directory lookup per parameter. */
  membership?: Membership | null;
}

function runtimeOverride(
  parameter: Parameter,
  runtimeConfiguration: RuntimeConfiguration | undefined,
): { found: true; value: unknown } | { found: false } {
  const forPlugin = runtimeConfiguration?.[parameter.pluginName];
  if (forPlugin && Object.prototype.hasOwnProperty.call(forPlugin, parameter.name)) {
    return { found: true, value: forPlugin[parameter.name] };
  }
  return { found: false };
}

function assertOwnedBy(parameter: Parameter, plugin: PluginConfiguration): void {
  if (parameter.pluginKind !== plugin.kind || parameter.pluginName !== plugin.name) {
    throw new InvariantViolation(
      `Parameter ${parameter.name} belongs to ${parameter.pluginKind}:${parameter.pluginName}, not ${plugin.kind}:${plugin.name}`,
    );
  }
}

/**
 * Precedence, first match wins:
 *   1. the job's runtime configuration
 *   2. the value owned by the user
 *   3. the value of the user's organization
 *   4. the default value
 */
export class ParameterResolver {
  constructor(
    private readonly store: ParameterStore,
    private readonly directory: IdentityDirectory,
  ) {}

  async membershipOf(user: UserRef | null): Promise<Membership | null> {
    return user ? this.directory.membershipOf(user.id) : null;
  }

  async resolve(parameter: Parameter, ctx: ResolutionContext): Promise<ResolvedParameter> {
    const override = runtimeOverride(parameter, ctx.runtimeConfiguration);
    if (override.found) {
      return this.resolved(parameter, override.value, "runtime");
    }

    if (ctx.user) {
      const own = await this.store.lookup(parameter, { type: "user", userId: ctx.user.id });
      if (own) {
        return this.resolved(parameter, own.value, "user");
      }

      const membership = ctx.membership !== undefined ? ctx.membership : await this.directory.membershipOf(ctx.user.id);
      if (membership) {
        const orgValue = await this.store.lookup(parameter, {
          type: "organization",
          orgId: membership.orgId,
          ownerId: membership.orgOwnerId,
        });
        if (orgValue) {
          return this.resolved(parameter, orgValue.value, "organization");
        }
      }
    }

    const fallback = await this.store.lookup(parameter, { type: "default" });
    if (fallback) {
      return this.resolved(parameter, fallback.value, "default");
    }

    throw new ParameterNotConfiguredError({ kind: parameter.pluginKind, name: parameter.pluginName }, parameter.name);
  }

  async tryResolve(parameter: Parameter, ctx: ResolutionContext): Promise<ResolvedParameter | null> {
    try {
      return await this.resolve(parameter, ctx);
    } catch (err) {
      if (err instanceof ParameterNotConfiguredError) {
        return null;
      }
      throw err;
    }
  }

  /**
   * Resolves every declared parameter of `plugin` once. A missing required
   * parameter raises; a missing optional one is left out of the result.
   */
  async resolveAll(plugin: PluginConfiguration, job: Pick<JobContext, "user" | "runtimeConfiguration">): Promise<ResolvedParameter[]> {
    for (const parameter of plugin.parameters) {
      assertOwnedBy(parameter, plugin);
    }

    const ctx: ResolutionContext = {
      user: job.user,
      runtimeConfiguration: job.runtimeConfiguration,
      membership: await this.membershipOf(job.user),
    };

    const results = await Promise.all(plugin.parameters.map((parameter) => this.tryResolve(parameter, ctx)));

    const resolved: ResolvedParameter[] = [];
    results.forEach((result, i) => {
      const parameter = plugin.parameters[i];
      if (result) {
        resolved.push(result);
      } else if (parameter.required) {
        throw new ParameterNotConfiguredError({ kind: plugin.kind, name: plugin.name }, parameter.name);
      } else {
        log.debug("Optional parameter has no value, omitted", { plugin: plugin.name, parameter: parameter.name });
      }
    });
    return resolved;
  }

  async readParams(plugin: PluginConfiguration, job: Pick<JobContext, "user" | "runtimeConfiguration">): Promise<ResolvedParams> {
    const resolved = await this.resolveAll(plugin, job);
    return new Map(resolved.map((r) => [r.parameter, r.value]));
  }

  /** Required parameters of `plugin` with no value reachable in `ctx`. */
  async missingRequired(plugin: PluginConfiguration, ctx: ResolutionContext): Promise<Parameter[]> {
    const required = plugin.parameters.filter((p) => p.required);
    if (required.length === 0) return [];

    const results = await Promise.all(required.map((parameter) => this.tryResolve(parameter, ctx)));
    return required.filter((_, i) => results[i] === null);
  }

  private resolved(parameter: Parameter, value: unknown, source: ResolvedParameter["source"]): ResolvedParameter {
    log.debug("Parameter resolved", {
      plugin: parameter.pluginName,
      parameter: parameter.name,
      source,
      ...(parameter.isSecret ? {} : { value }),
    });
    return { parameter, value, source };
  }
}
