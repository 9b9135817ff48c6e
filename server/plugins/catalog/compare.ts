import { z } from "zod";
import type { ExecutionUnit } from "../entry-points";

const paramsSchema = z.object({
  field_to_compare: z.string().min(1),
});

function readPath(value: unknown, path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (current === null || typeof current !== "object") return undefined;
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return current;
}

function collectValues(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (typeof value === "number" || typeof value === "boolean") return [String(value)];
  if (Array.isArray(value)) return value.flatMap(collectValues);
  return [];
}

/**
 * Extracts `field_to_compare` (a dotted path) from the successful reports the
 * pivot is related to. The surrounding application creates follow-up jobs
 * from `values` when `shouldPivot` is true.
 */
export const compareUnit: ExecutionUnit = {
  ref: "pivots.compare.Compare",

  describe() {
    return {
      name: "Compare",
      kind: "pivot",
      description: "Pivots on a field found in the reports of related plugins",
    };
  },

  async run(ctx) {
    const params = paramsSchema.parse(ctx.parameters);
    const path = params.field_to_compare.split(".");
    const values = new Set<string>();
    for (const report of ctx.reports) {
      if (report.status !== "success") continue;
      for (const v of collectValues(readPath(report.report, path))) {
        if (v !== ctx.observable.name) values.add(v);
      }
    }
    return { shouldPivot: values.size > 0, values: Array.from(values) };
  },
};
