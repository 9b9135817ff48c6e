import { sql, relations } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  integer,
  timestamp,
  boolean,
  jsonb,
  index,
  primaryKey,
  unique,
} from "drizzle-orm/pg-core";
import { users, organizations } from "./models/auth";

export * from "./models/auth";

export const PLUGIN_KINDS = ["analyzer", "connector", "visualizer", "pivot"] as const;
export const PARAM_TYPES = ["str", "int", "float", "bool", "list", "dict"] as const;
export const OBSERVABLE_CLASSIFICATIONS = ["ip", "domain", "url", "hash", "generic", "phone", "file"] as const;
export const TLP_LEVELS = ["CLEAR", "GREEN", "AMBER", "RED"] as const;
export const JOB_STATUSES = [
  "pending",
  "analyzers_running",
  "analyzers_completed",
  "connectors_running",
  "connectors_completed",
  "visualizers_running",
  "visualizers_completed",
  "completed",
  "failed",
] as const;
export const REPORT_STATUSES = ["pending", "running", "success", "failed"] as const;
export const TASK_STATUSES = ["pending", "running", "completed", "failed"] as const;
export const TASK_TARGETS = ["run_plugin", "set_job_status"] as const;

export type PluginKind = (typeof PLUGIN_KINDS)[number];
export type ParamType = (typeof PARAM_TYPES)[number];
export type ObservableClassification = (typeof OBSERVABLE_CLASSIFICATIONS)[number];
export type TlpLevel = (typeof TLP_LEVELS)[number];
export type JobStatus = (typeof JOB_STATUSES)[number];
export type ReportStatus = (typeof REPORT_STATUSES)[number];
export type TaskStatus = (typeof TASK_STATUSES)[number];
export type TaskTarget = (typeof TASK_TARGETS)[number];

export interface PluginRuntimeConfig {
  queue: string;
  softTimeLimit: number;
}

/** plugin name -> parameter name -> value */
export type RuntimeConfiguration = Record<string, Record<string, unknown>>;

export type RequestedPlugins = Partial<Record<PluginKind, string[]>>;

export const pluginConfigs = pgTable("plugin_configs", {
  kind: text("kind").$type<PluginKind>().notNull(),
  name: varchar("name", { length: 100 }).notNull(),
  description: text("description").notNull().default(""),
  disabled: boolean("disabled").notNull().default(false),
  entryPoint: varchar("entry_point", { length: 120 }).notNull(),
  config: jsonb("config").$type<PluginRuntimeConfig>().notNull(),
  options: jsonb("options").$type<Record<string, unknown>>().notNull().default({}),
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
}, (table) => [
  primaryKey({ columns: [table.kind, table.name] }),
  index("idx_plugin_configs_disabled").on(table.disabled),
  index("idx_plugin_configs_entry_point").on(table.entryPoint, table.disabled),
]);

export const pluginOrgDisables = pgTable("plugin_org_disables", {
  pluginKind: text("plugin_kind").$type<PluginKind>().notNull(),
  pluginName: varchar("plugin_name", { length: 100 }).notNull(),
  orgId: varchar("org_id").notNull().references(() => organizations.id, { onDelete: "cascade" }),
  createdAt: timestamp("created_at").defaultNow(),
}, (table) => [
  primaryKey({ columns: [table.pluginKind, table.pluginName, table.orgId] }),
  index("idx_plugin_org_disables_org").on(table.orgId),
]);

// The owning configuration is a (kind, name) pair, so a parameter can only ever belong to one.
export const pluginParameters = pgTable("plugin_parameters", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  pluginKind: text("plugin_kind").$type<PluginKind>().notNull(),
  pluginName: varchar("plugin_name", { length: 100 }).notNull(),
  name: varchar("name", { length: 50 }).notNull(),
  type: text("type").$type<ParamType>().notNull(),
  description: text("description").notNull().default(""),
  isSecret: boolean("is_secret").notNull(),
  required: boolean("required").notNull(),
}, (table) => [
  unique("uq_plugin_parameters_owner_name").on(table.pluginKind, table.pluginName, table.name),
  index("idx_plugin_parameters_secret").on(table.pluginKind, table.pluginName, table.isSecret),
]);

export const parameterValues = pgTable("parameter_values", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  parameterId: varchar("parameter_id").notNull().references(() => pluginParameters.id, { onDelete: "cascade" }),
  value: jsonb("value").$type<unknown>().notNull(),
  ownerId: varchar("owner_id").references(() => users.id, { onDelete: "cascade" }),
  forOrganization: boolean("for_organization").notNull().default(false),
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
}, (table) => [
  unique("uq_parameter_values_scope").on(table.parameterId, table.ownerId, table.forOrganization).nullsNotDistinct(),
  index("idx_parameter_values_owner").on(table.ownerId),
]);

export const jobs = pgTable("jobs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").references(() => users.id),
  observableName: text("observable_name").notNull(),
  observableClassification: text("observable_classification").$type<ObservableClassification>().notNull(),
  tlp: text("tlp").$type<TlpLevel>().notNull().default("CLEAR"),
  requestedPlugins: jsonb("requested_plugins").$type<RequestedPlugins>(),
  runtimeConfiguration: jsonb("runtime_configuration").$type<RuntimeConfiguration>().notNull().default({}),
  status: text("status").$type<JobStatus>().notNull().default("pending"),
  errors: text("errors").array().notNull().default(sql`'{}'::text[]`),
  correlationId: varchar("correlation_id"),
  receivedAt: timestamp("received_at").defaultNow(),
  finishedAt: timestamp("finished_at"),
}, (table) => [
  index("idx_jobs_user").on(table.userId),
  index("idx_jobs_status").on(table.status),
]);

export const pluginReports = pgTable("plugin_reports", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  jobId: varchar("job_id").notNull().references(() => jobs.id, { onDelete: "cascade" }),
  pluginKind: text("plugin_kind").$type<PluginKind>().notNull(),
  pluginName: varchar("plugin_name", { length: 100 }).notNull(),
  taskId: varchar("task_id").notNull().unique(),
  status: text("status").$type<ReportStatus>().notNull(),
  report: jsonb("report").$type<unknown>(),
  errors: text("errors").array().notNull().default(sql`'{}'::text[]`),
  startTime: timestamp("start_time").defaultNow(),
  endTime: timestamp("end_time"),
}, (table) => [
  index("idx_plugin_reports_job").on(table.jobId),
  index("idx_plugin_reports_plugin").on(table.pluginKind, table.pluginName),
]);

export const taskQueue = pgTable("task_queue", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  token: varchar("token").notNull().unique(),
  jobId: varchar("job_id").notNull().references(() => jobs.id, { onDelete: "cascade" }),
  target: text("target").$type<TaskTarget>().notNull(),
  args: jsonb("args").$type<Record<string, unknown>>().notNull(),
  linkage: jsonb("linkage").$type<Record<string, unknown>>(),
  queue: varchar("queue").notNull(),
  softTimeLimit: integer("soft_time_limit").notNull(),
  dependencies: text("dependencies").array().notNull().default(sql`'{}'::text[]`),
  messageGroupId: varchar("message_group_id").notNull(),
  status: text("status").$type<TaskStatus>().notNull().default("pending"),
  result: jsonb("result").$type<unknown>(),
  attempts: integer("attempts").notNull().default(0),
  maxAttempts: integer("max_attempts").notNull().default(3),
  lastError: text("last_error"),
  runAt: timestamp("run_at").notNull().defaultNow(),
  lockedBy: varchar("locked_by"),
  lockedUntil: timestamp("locked_until"),
  startedAt: timestamp("started_at"),
  completedAt: timestamp("completed_at"),
  createdAt: timestamp("created_at").defaultNow(),
}, (table) => [
  index("idx_task_queue_claim").on(table.status, table.queue, table.runAt),
  index("idx_task_queue_job").on(table.jobId),
]);

// Relations
export const pluginParametersRelations = relations(pluginParameters, ({ many }) => ({
  values: many(parameterValues),
}));

export const parameterValuesRelations = relations(parameterValues, ({ one }) => ({
  parameter: one(pluginParameters, { fields: [parameterValues.parameterId], references: [pluginParameters.id] }),
  owner: one(users, { fields: [parameterValues.ownerId], references: [users.id] }),
}));

export const jobsRelations = relations(jobs, ({ one, many }) => ({
  user: one(users, { fields: [jobs.userId], references: [users.id] }),
  reports: many(pluginReports),
}));

export const pluginReportsRelations = relations(pluginReports, ({ one }) => ({
  job: one(jobs, { fields: [pluginReports.jobId], references: [jobs.id] }),
}));

// Types
export type PluginConfigRow = typeof pluginConfigs.$inferSelect;
export type InsertPluginConfig = typeof pluginConfigs.$inferInsert;
export type ParameterRow = typeof pluginParameters.$inferSelect;
export type InsertParameter = typeof pluginParameters.$inferInsert;
export type ParameterValueRow = typeof parameterValues.$inferSelect;
export type InsertParameterValue = typeof parameterValues.$inferInsert;
export type Job = typeof jobs.$inferSelect;
export type InsertJob = typeof jobs.$inferInsert;
export type PluginReport = typeof pluginReports.$inferSelect;
export type InsertPluginReport = typeof pluginReports.$inferInsert;
