import { describe, it, expect, vi, afterEach } from "vitest";
import type { ObservableClassification } from "@shared/schema";
import { defaultEntryPoints } from "../bootstrap";
import { compareUnit } from "../plugins/catalog/compare";
import { summaryUnit } from "../plugins/catalog/summary";
import { validinUnit } from "../plugins/catalog/validin";
import type { PluginRunContext, PriorReport } from "../plugins/entry-points";

function context(
  parameters: Record<string, unknown>,
  reports: PriorReport[] = [],
  observable: { name: string; classification: ObservableClassification } = { name: "example.com", classification: "domain" },
): PluginRunContext {
  return {
    jobId: "job-1",
    pluginName: "Test",
    observable,
    parameters,
    reports,
    signal: new AbortController().signal,
  };
}

describe("built-in entry points", () => {
  it("registers every bundled unit under its kind", () => {
    expect(defaultEntryPoints().refs().sort()).toEqual([
      "analyzers.phoneinfoga_scan.Phoneinfoga",
      "analyzers.validin.Validin",
      "analyzers.vulners.Vulners",
      "connectors.webhook.Webhook",
      "pivots.compare.Compare",
      "visualizers.summary.Summary",
    ]);
  });
});

describe("Compare pivot", () => {
  it("collects the field from successful related reports", async () => {
    const reports: PriorReport[] = [
      {
        pluginKind: "analyzer",
        pluginName: "Validin",
        status: "success",
        report: { records: { host: ["a.example.com", "example.com", "b.example.com", "a.example.com"] } },
      },
      {
        pluginKind: "analyzer",
        pluginName: "Validin",
        status: "failed",
        report: { records: { host: ["c.example.com"] } },
      },
    ];

    const result = await compareUnit.run(context({ field_to_compare: "records.host" }, reports));

    expect(result).toEqual({ shouldPivot: true, values: ["a.example.com", "b.example.com"] });
  });

  it("does not pivot when the field is absent", async () => {
    const reports: PriorReport[] = [
      { pluginKind: "analyzer", pluginName: "Validin", status: "success", report: { records: [] } },
    ];

    const result = await compareUnit.run(context({ field_to_compare: "records.host" }, reports));

    expect(result).toEqual({ shouldPivot: false, values: [] });
  });
});

describe("Summary visualizer", () => {
  const reports: PriorReport[] = [
    { pluginKind: "analyzer", pluginName: "Validin", status: "success", report: {} },
    { pluginKind: "analyzer", pluginName: "Vulners", status: "failed", report: null },
    { pluginKind: "connector", pluginName: "Webhook", status: "success", report: {} },
  ];

  it("counts reports by status", async () => {
    const result = await summaryUnit.run(context({}, reports));

    expect(result).toMatchObject({ observable: "example.com", counts: { success: 2, failed: 1 } });
  });

  it("can hide failed plugins", async () => {
    const result = await summaryUnit.run(context({ show_failed: false }, reports));

    expect(result).toMatchObject({
      counts: { success: 2 },
      levels: [
        { level: 1, elements: [{ label: "Observable", value: "example.com" }] },
        {
          level: 2,
          elements: [
            { plugin: "Validin", kind: "analyzer", status: "success" },
            { plugin: "Webhook", kind: "connector", status: "success" },
          ],
        },
      ],
    });
  });
});

describe("Validin analyzer", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("queries the history endpoint for the observable", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify({ records: { A: [] } }), { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await validinUnit.run(context({ api_key_name: "test-secret", scan_choice: "a_records" }));

    expect(result).toEqual({ records: { A: [] } });
    expect(fetchMock).toHaveBeenCalledWith(
      "https://app.validin.com/api/axon/domain/dns/history/A/example.com",
      expect.objectContaining({ method: "GET", headers: { Authorization: "BEARER test-secret" } }),
    );
  });

  it("uses the ip endpoints for ip observables", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response("{}", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    await validinUnit.run(context({ api_key_name: "test-secret" }, [], { name: "192.0.2.10", classification: "ip" }));

    expect(fetchMock).toHaveBeenCalledWith(
      "https://app.validin.com/api/axon/ip/dns/history/192.0.2.10",
      expect.objectContaining({ method: "GET" }),
    );
  });

  it("fails on an error status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("unauthorized", { status: 401 })));

    await expect(validinUnit.run(context({ api_key_name: "test-secret" }))).rejects.toThrow("Validin returned 401");
  });

  it("rejects an unknown scan choice", async () => {
    await expect(validinUnit.run(context({ api_key_name: "test-secret", scan_choice: "mx_records" }))).rejects.toThrow();
  });
});
