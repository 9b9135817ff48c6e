import {
  type PluginKind, type JobStatus,
  type PluginConfigRow, type InsertPluginConfig, pluginConfigs,
  pluginOrgDisables,
  type ParameterRow, type InsertParameter, pluginParameters,
  type ParameterValueRow, parameterValues,
  type Job, type InsertJob, jobs,
  type PluginReport, type InsertPluginReport, pluginReports,
  memberships, organizations,
} from "@shared/schema";
import { db } from "./db";
import { and, asc, eq, inArray, isNull, sql } from "drizzle-orm";

export interface ParameterValueWrite {
  parameterId: string;
  value: unknown;
  ownerId: string | null;
  forOrganization: boolean;
}

export type PluginConfigUpdate = Partial<Pick<PluginConfigRow, "description" | "disabled" | "config" | "options" | "entryPoint">>;
export type PluginReportUpdate = Partial<Pick<PluginReport, "status" | "report" | "errors" | "startTime" | "endTime">>;
export type JobStatusUpdate = Partial<Pick<Job, "correlationId" | "finishedAt">>;

export interface IStorage {
  getPluginConfigs(kind?: PluginKind): Promise<PluginConfigRow[]>;
  getPluginConfig(kind: PluginKind, name: string): Promise<PluginConfigRow | undefined>;
  /** Inserts the plugin unless one of that kind and name exists; returns the new row. */
  insertPluginConfigIfAbsent(row: InsertPluginConfig): Promise<PluginConfigRow | undefined>;
  updatePluginConfig(kind: PluginKind, name: string, data: PluginConfigUpdate): Promise<PluginConfigRow | undefined>;
  getDisabledOrganizations(kind: PluginKind, name: string): Promise<string[]>;
  setDisabledForOrganization(kind: PluginKind, name: string, orgId: string, disabled: boolean): Promise<void>;

  getParameters(kind: PluginKind, pluginName: string): Promise<ParameterRow[]>;
  upsertParameter(row: InsertParameter): Promise<ParameterRow>;

  getParameterValues(parameterId: string): Promise<ParameterValueRow[]>;
  findParameterValue(parameterId: string, ownerId: string | null, forOrganization: boolean): Promise<ParameterValueRow | undefined>;
  upsertParameterValue(row: ParameterValueWrite): Promise<ParameterValueRow>;
  deleteParameterValue(parameterId: string, ownerId: string | null, forOrganization: boolean): Promise<boolean>;

  getMembership(userId: string): Promise<{ orgId: string; orgOwnerId: string } | undefined>;

  createJob(job: InsertJob): Promise<Job>;
  getJob(id: string): Promise<Job | undefined>;
  /** Oldest first. */
  getPendingJobs(limit: number): Promise<Job[]>;
  /** Compare-and-set: only moves the job when its current status is one of `from`. */
  transitionJobStatus(id: string, from: readonly JobStatus[], to: JobStatus, data?: JobStatusUpdate): Promise<Job | undefined>;
  appendJobError(id: string, message: string): Promise<void>;

  /** Idempotent per `taskId`: a redelivered task restarts its existing report. */
  createPluginReport(report: InsertPluginReport): Promise<PluginReport>;
  updatePluginReport(taskId: string, data: PluginReportUpdate): Promise<PluginReport | undefined>;
  getPluginReports(jobId: string): Promise<PluginReport[]>;
}

function ownerCondition(ownerId: string | null) {
  return ownerId === null ? isNull(parameterValues.ownerId) : eq(parameterValues.ownerId, ownerId);
}

export class DatabaseStorage implements IStorage {
  async getPluginConfigs(kind?: PluginKind): Promise<PluginConfigRow[]> {
    if (kind) {
      return db.select().from(pluginConfigs).where(eq(pluginConfigs.kind, kind)).orderBy(pluginConfigs.name, pluginConfigs.disabled);
    }
    return db.select().from(pluginConfigs).orderBy(pluginConfigs.kind, pluginConfigs.name);
  }

  async getPluginConfig(kind: PluginKind, name: string): Promise<PluginConfigRow | undefined> {
    const [row] = await db.select().from(pluginConfigs).where(and(eq(pluginConfigs.kind, kind), eq(pluginConfigs.name, name)));
    return row;
  }

  async insertPluginConfigIfAbsent(row: InsertPluginConfig): Promise<PluginConfigRow | undefined> {
    const [created] = await db
      .insert(pluginConfigs)
      .values(row)
      .onConflictDoNothing({ target: [pluginConfigs.kind, pluginConfigs.name] })
      .returning();
    return created;
  }

  async updatePluginConfig(kind: PluginKind, name: string, data: PluginConfigUpdate): Promise<PluginConfigRow | undefined> {
    const [updated] = await db
      .update(pluginConfigs)
      .set({ ...data, updatedAt: new Date() })
      .where(and(eq(pluginConfigs.kind, kind), eq(pluginConfigs.name, name)))
      .returning();
    return updated;
  }

  async getDisabledOrganizations(kind: PluginKind, name: string): Promise<string[]> {
    const rows = await db
      .select({ orgId: pluginOrgDisables.orgId })
      .from(pluginOrgDisables)
      .where(and(eq(pluginOrgDisables.pluginKind, kind), eq(pluginOrgDisables.pluginName, name)));
    return rows.map((r) => r.orgId);
  }

  async setDisabledForOrganization(kind: PluginKind, name: string, orgId: string, disabled: boolean): Promise<void> {
    if (disabled) {
      await db.insert(pluginOrgDisables).values({ pluginKind: kind, pluginName: name, orgId }).onConflictDoNothing();
      return;
    }
    await db
      .delete(pluginOrgDisables)
      .where(and(eq(pluginOrgDisables.pluginKind, kind), eq(pluginOrgDisables.pluginName, name), eq(pluginOrgDisables.orgId, orgId)));
  }

  async getParameters(kind: PluginKind, pluginName: string): Promise<ParameterRow[]> {
    return db
      .select()
      .from(pluginParameters)
      .where(and(eq(pluginParameters.pluginKind, kind), eq(pluginParameters.pluginName, pluginName)))
      .orderBy(pluginParameters.name);
  }

  async upsertParameter(row: InsertParameter): Promise<ParameterRow> {
    const [saved] = await db
      .insert(pluginParameters)
      .values(row)
      .onConflictDoUpdate({
        target: [pluginParameters.pluginKind, pluginParameters.pluginName, pluginParameters.name],
        set: { type: row.type, description: row.description, isSecret: row.isSecret, required: row.required },
      })
      .returning();
    return saved;
  }

  async getParameterValues(parameterId: string): Promise<ParameterValueRow[]> {
    return db.select().from(parameterValues).where(eq(parameterValues.parameterId, parameterId));
  }

  async findParameterValue(parameterId: string, ownerId: string | null, forOrganization: boolean): Promise<ParameterValueRow | undefined> {
    const [row] = await db
      .select()
      .from(parameterValues)
      .where(and(
        eq(parameterValues.parameterId, parameterId),
        ownerCondition(ownerId),
        eq(parameterValues.forOrganization, forOrganization),
      ));
    return row;
  }

  async upsertParameterValue(row: ParameterValueWrite): Promise<ParameterValueRow> {
    const [saved] = await db
      .insert(parameterValues)
      .values(row)
      .onConflictDoUpdate({
        target: [parameterValues.parameterId, parameterValues.ownerId, parameterValues.forOrganization],
        set: { value: row.value, updatedAt: new Date() },
      })
      .returning();
    return saved;
  }

  async deleteParameterValue(parameterId: string, ownerId: string | null, forOrganization: boolean): Promise<boolean> {
    const deleted = await db
      .delete(parameterValues)
      .where(and(
        eq(parameterValues.parameterId, parameterId),
        ownerCondition(ownerId),
        eq(parameterValues.forOrganization, forOrganization),
      ))
      .returning({ id: parameterValues.id });
    return deleted.length > 0;
  }

  async getMembership(userId: string): Promise<{ orgId: string; orgOwnerId: string } | undefined> {
    const [row] = await db
      .select({ orgId: memberships.orgId, orgOwnerId: organizations.ownerId })
      .from(memberships)
      .innerJoin(organizations, eq(memberships.orgId, organizations.id))
      .where(eq(memberships.userId, userId));
    return row;
  }

  async createJob(job: InsertJob): Promise<Job> {
    const [created] = await db.insert(jobs).values(job).returning();
    return created;
  }

  async getJob(id: string): Promise<Job | undefined> {
    const [job] = await db.select().from(jobs).where(eq(jobs.id, id));
    return job;
  }

  async getPendingJobs(limit: number): Promise<Job[]> {
    return db.select().from(jobs).where(eq(jobs.status, "pending")).orderBy(asc(jobs.receivedAt)).limit(limit);
  }

  async transitionJobStatus(id: string, from: readonly JobStatus[], to: JobStatus, data: JobStatusUpdate = {}): Promise<Job | undefined> {
    const [updated] = await db
      .update(jobs)
      .set({ ...data, status: to })
      .where(and(eq(jobs.id, id), inArray(jobs.status, [...from])))
      .returning();
    return updated;
  }

  async appendJobError(id: string, message: string): Promise<void> {
    await db
      .update(jobs)
      .set({ errors: sql`array_append(${jobs.errors}, ${message})` })
      .where(eq(jobs.id, id));
  }

  async createPluginReport(report: InsertPluginReport): Promise<PluginReport> {
    const [created] = await db
      .insert(pluginReports)
      .values(report)
      .onConflictDoUpdate({
        target: pluginReports.taskId,
        set: { status: report.status, startTime: new Date(), endTime: null },
      })
      .returning();
    return created;
  }

  async updatePluginReport(taskId: string, data: PluginReportUpdate): Promise<PluginReport | undefined> {
    const [updated] = await db.update(pluginReports).set(data).where(eq(pluginReports.taskId, taskId)).returning();
    return updated;
  }

  async getPluginReports(jobId: string): Promise<PluginReport[]> {
    return db.select().from(pluginReports).where(eq(pluginReports.jobId, jobId)).orderBy(pluginReports.startTime);
  }
}
