import { z } from "zod";
import { OBSERVABLE_CLASSIFICATIONS, TLP_LEVELS, type Job } from "@shared/schema";
import { InvalidJobError } from "../errors";
import type { IStorage } from "../storage";

const pluginNames = z.array(z.string().min(1)).optional();

export const jobInputSchema = z.object({
  userId: z.string().min(1).nullable().default(null),
  observableName: z.string().trim().min(1).max(512),
  observableClassification: z.enum(OBSERVABLE_CLASSIFICATIONS),
  tlp: z.enum(TLP_LEVELS).default("CLEAR"),
  requestedPlugins: z
    .object({
      analyzer: pluginNames,
      connector: pluginNames,
      visualizer: pluginNames,
      pivot: pluginNames,
    })
    .nullable()
    .default(null),
  runtimeConfiguration: z.record(z.record(z.unknown())).default({}),
});

export type JobInput = z.input<typeof jobInputSchema>;

/** Validates a submission, typically a `JobInput` from an untyped caller, and stores it as a pending job. */
export async function createJob(storage: IStorage, input: unknown): Promise<Job> {
  const result = jobInputSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidJobError(result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  return storage.createJob({ ...result.data, status: "pending" });
}
