import { z } from "zod";
import type { ExecutionUnit } from "../entry-points";
import { expectOk, httpRequest } from "../entry-points";

const BASE_URL = "https://app.validin.com/api/axon";

const SCAN_CHOICES = [
  "all_records",
  "a_records",
  "aaaa_records",
  "ns_records",
  "ns_for",
  "ptr_records",
  "live_dns_query",
] as const;

const SCAN_PATHS: Record<(typeof SCAN_CHOICES)[number], string> = {
  all_records: "dns/history",
  a_records: "dns/history/A",
  aaaa_records: "dns/history/AAAA",
  ns_records: "dns/history/NS",
  ns_for: "dns/history/NS_FOR",
  ptr_records: "dns/hostname",
  live_dns_query: "dns/live",
};

const paramsSchema = z.object({
  api_key_name: z.string().min(1),
  scan_choice: z.enum(SCAN_CHOICES).default("all_records"),
});

export const validinUnit: ExecutionUnit = {
  ref: "analyzers.validin.Validin",

  describe() {
    return {
      name: "Validin",
      kind: "analyzer",
      description: "Historic and current DNS data for IP addresses and domains from Validin",
    };
  },

  async run(ctx) {
    const params = paramsSchema.parse(ctx.parameters);
    const target = ctx.observable.classification === "ip" ? "ip" : "domain";
    const url = `${BASE_URL}/${target}/${SCAN_PATHS[params.scan_choice]}/${encodeURIComponent(ctx.observable.name)}`;
    const res = await httpRequest(url, {
      headers: { Authorization: `BEARER ${params.api_key_name}` },
      signal: ctx.signal,
    });
    return expectOk("Validin", res);
  },
};
