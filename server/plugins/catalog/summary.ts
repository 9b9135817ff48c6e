import { z } from "zod";
import type { ReportStatus } from "@shared/schema";
import type { ExecutionUnit } from "../entry-points";

const paramsSchema = z.object({
  show_failed: z.boolean().default(true),
});

interface SummaryElement {
  plugin: string;
  kind: string;
  status: ReportStatus;
}

export const summaryUnit: ExecutionUnit = {
  ref: "visualizers.summary.Summary",

  describe() {
    return {
      name: "Summary",
      kind: "visualizer",
      description: "Groups the plugin reports of a job by outcome",
    };
  },

  async run(ctx) {
    const params = paramsSchema.parse(ctx.parameters);
    const elements: SummaryElement[] = ctx.reports
      .filter((r) => params.show_failed || r.status !== "failed")
      .map((r) => ({ plugin: r.pluginName, kind: r.pluginKind, status: r.status }));

    const counts: Partial<Record<ReportStatus, number>> = {};
    for (const el of elements) {
      counts[el.status] = (counts[el.status] ?? 0) + 1;
    }

    return {
      observable: ctx.observable.name,
      levels: [
        { level: 1, elements: [{ label: "Observable", value: ctx.observable.name }] },
        { level: 2, elements },
      ],
      counts,
    };
  },
};
