import type {
  JobStatus,
  ObservableClassification,
  ParamType,
  PluginKind,
  RequestedPlugins,
  RuntimeConfiguration,
  TlpLevel,
} from "@shared/schema";

export interface Parameter {
  readonly id: string;
  readonly name: string;
  readonly type: ParamType;
  readonly description: string;
  readonly isSecret: boolean;
  readonly required: boolean;
  readonly pluginKind: PluginKind;
  readonly pluginName: string;
}

export type ParameterScope =
  | { readonly type: "user"; readonly userId: string }
  | { readonly type: "organization"; readonly orgId: string; readonly ownerId: string }
  | { readonly type: "default" };

export interface ParameterValue {
  readonly id: string;
  readonly parameterId: string;
  readonly value: unknown;
  readonly ownerId: string | null;
  readonly forOrganization: boolean;
  readonly updatedAt: Date | null;
}

export type ResolutionSource = "runtime" | "user" | "organization" | "default";

export interface ResolvedParameter {
  readonly parameter: Parameter;
  readonly value: unknown;
  readonly source: ResolutionSource;
}

export type ResolvedParams = ReadonlyMap<Parameter, unknown>;

interface BaseConfiguration {
  readonly name: string;
  readonly description: string;
  readonly disabled: boolean;
  readonly disabledInOrganizations: ReadonlySet<string>;
  readonly entryPoint: string;
  /** `<kind base path>.<entryPoint>`, the key the entry-point registry is indexed by. */
  readonly completeEntryPoint: string;
  /** Queue as configured, after registration-time fallback. */
  readonly routingKey: string;
  /** Physical queue name derived from the routing key. */
  readonly queue: string;
  readonly softTimeLimit: number;
  readonly parameters: readonly Parameter[];
}

export interface AnalyzerConfiguration extends BaseConfiguration {
  readonly kind: "analyzer";
  readonly type: "observable" | "file";
  readonly observableSupported: readonly ObservableClassification[];
  readonly maximumTlp: TlpLevel;
}

export interface ConnectorConfiguration extends BaseConfiguration {
  readonly kind: "connector";
  readonly maximumTlp: TlpLevel;
  readonly runOnFailure: boolean;
}

export interface VisualizerConfiguration extends BaseConfiguration {
  readonly kind: "visualizer";
}

export interface PivotConfiguration extends BaseConfiguration {
  readonly kind: "pivot";
  readonly relatedConfigs: ReadonlyArray<{ readonly kind: "analyzer" | "connector"; readonly name: string }>;
}

export type PluginConfiguration =
  | AnalyzerConfiguration
  | ConnectorConfiguration
  | VisualizerConfiguration
  | PivotConfiguration;

export interface UserRef {
  readonly id: string;
}

export interface Membership {
  readonly orgId: string;
  readonly orgOwnerId: string;
}

export interface Observable {
  readonly name: string;
  readonly classification: ObservableClassification;
}

/** The slice of a job the dispatch core reads. */
export interface JobContext {
  readonly id: string;
  readonly user: UserRef | null;
  readonly observable: Observable;
  readonly tlp: TlpLevel;
  readonly requestedPlugins: RequestedPlugins | null;
  readonly runtimeConfiguration: RuntimeConfiguration;
  readonly status: JobStatus;
}

export const TLP_ORDER: Record<TlpLevel, number> = {
  CLEAR: 0,
  GREEN: 1,
  AMBER: 2,
  RED: 3,
};

export function pluginLabel(plugin: { kind: PluginKind; name: string }): string {
  return `${plugin.kind}:${plugin.name}`;
}
