import { z } from "zod";
import type { ExecutionUnit } from "../entry-points";
import { expectOk, httpRequest } from "../entry-points";

const BASE_URL = "https://vulners.com/api/v3";

const paramsSchema = z.object({
  api_key_name: z.string().min(1),
  score_AI: z.boolean().default(true),
  skip: z.number().int().nonnegative().default(0),
  size: z.number().int().positive().default(5),
});

export const vulnersUnit: ExecutionUnit = {
  ref: "analyzers.vulners.Vulners",

  describe() {
    return {
      name: "Vulners",
      kind: "analyzer",
      description: "AI scoring and vulnerability database search from the Vulners project",
    };
  },

  async run(ctx) {
    const params = paramsSchema.parse(ctx.parameters);
    const headers = { "Content-Type": "application/json" };

    if (params.score_AI) {
      const res = await httpRequest(`${BASE_URL}/ai/scoretext/`, {
        method: "POST",
        headers,
        body: { text: ctx.observable.name, apiKey: params.api_key_name },
        signal: ctx.signal,
      });
      return expectOk("Vulners", res);
    }

    const res = await httpRequest(`${BASE_URL}/search/lucene`, {
      method: "POST",
      headers,
      body: {
        query: ctx.observable.name,
        skip: params.skip,
        size: params.size,
        fields: ["id", "published", "description", "type", "title", "cvelist"],
        apiKey: params.api_key_name,
      },
      signal: ctx.signal,
    });
    return expectOk("Vulners", res);
  },
};
