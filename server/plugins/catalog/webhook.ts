import { z } from "zod";
import type { ExecutionUnit } from "../entry-points";
import { expectOk, httpRequest } from "../entry-points";

const paramsSchema = z.object({
  url: z.string().url(),
  api_key_name: z.string().optional(),
  include_failed: z.boolean().default(false),
});

export const webhookUnit: ExecutionUnit = {
  ref: "connectors.webhook.Webhook",

  describe() {
    return {
      name: "Webhook",
      kind: "connector",
      description: "Forwards the analyzer reports of a job to an HTTP endpoint",
    };
  },

  async run(ctx) {
    const params = paramsSchema.parse(ctx.parameters);
    const reports = ctx.reports.filter(
      (r) => r.pluginKind === "analyzer" && (params.include_failed || r.status === "success"),
    );
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (params.api_key_name) {
      headers["X-Api-Key"] = params.api_key_name;
    }
    const res = await httpRequest(params.url, {
      method: "POST",
      headers,
      body: {
        jobId: ctx.jobId,
        observable: ctx.observable,
        reports: reports.map((r) => ({ plugin: r.pluginName, status: r.status, report: r.report })),
      },
      signal: ctx.signal,
    });
    expectOk("Webhook", res);
    return { delivered: true, status: res.status, reportCount: reports.length };
  },
};
