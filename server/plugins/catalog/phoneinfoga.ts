import { z } from "zod";
import type { ExecutionUnit } from "../entry-points";
import { expectOk, httpRequest } from "../entry-points";

const paramsSchema = z.object({
  url: z.string().url().default("http://phoneinfoga:5000"),
  scanner_name: z.enum(["local", "numverify", "googlecse", "ovh"]).default("local"),
});

export const phoneinfogaUnit: ExecutionUnit = {
  ref: "analyzers.phoneinfoga_scan.Phoneinfoga",

  describe() {
    return {
      name: "Phoneinfoga",
      kind: "analyzer",
      description: "Phone number scan through a self-hosted PhoneInfoga instance",
    };
  },

  async run(ctx) {
    const params = paramsSchema.parse(ctx.parameters);
    const res = await httpRequest(`${params.url}/api/v2/scanners/${params.scanner_name}/run`, {
      method: "POST",
      headers: { "Content-Type": "application/json", accept: "application/json" },
      body: { number: ctx.observable.name },
      signal: ctx.signal,
    });
    return expectOk("PhoneInfoga", res);
  },
};
