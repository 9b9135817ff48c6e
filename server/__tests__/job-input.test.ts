import { describe, it, expect, beforeEach } from "vitest";
import { InvalidJobError } from "../errors";
import { createJob } from "../pipeline/job-input";
import { MemoryStorage } from "./helpers/memory-storage";

describe("createJob", () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  it("stores a pending job with defaults", async () => {
    const job = await createJob(storage, { observableName: "  example.com ", observableClassification: "domain" });

    expect(job).toMatchObject({
      userId: null,
      observableName: "example.com",
      observableClassification: "domain",
      tlp: "CLEAR",
      requestedPlugins: null,
      runtimeConfiguration: {},
      status: "pending",
      errors: [],
    });
    expect(storage.jobs.get(job.id)).toEqual(job);
  });

  it("keeps requested plugins and runtime configuration", async () => {
    const job = await createJob(storage, {
      userId: "user-1",
      observableName: "192.0.2.10",
      observableClassification: "ip",
      tlp: "AMBER",
      requestedPlugins: { analyzer: ["Validin"] },
      runtimeConfiguration: { Validin: { api_key_name: "test-secret" } },
    });

    expect(job.requestedPlugins).toEqual({ analyzer: ["Validin"] });
    expect(job.runtimeConfiguration).toEqual({ Validin: { api_key_name: "test-secret" } });
    expect(job.tlp).toBe("AMBER");
  });

  it("rejects an empty observable", async () => {
    await expect(createJob(storage, { observableName: "   ", observableClassification: "domain" })).rejects.toThrow(
      "Invalid job submission: observableName: String must contain at least 1 character(s)",
    );
  });

  it("rejects an unknown TLP", async () => {
    const attempt = createJob(storage, {
      observableName: "example.com",
      observableClassification: "domain",
      tlp: "PURPLE",
    });

    await expect(attempt).rejects.toBeInstanceOf(InvalidJobError);
    expect(storage.jobs.size).toBe(0);
  });
});
