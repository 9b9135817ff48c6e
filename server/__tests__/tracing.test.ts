import { describe, it, expect, vi, beforeEach } from "vitest";

const logs = vi.hoisted(() => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }));

vi.mock("../logger", () => ({ logger: { ...logs, child: () => logs } }));

import { correlationId, currentTraceId, startSpan, stopTracingFlush } from "../tracing";

describe("tracing", () => {
  beforeEach(() => {
    stopTracingFlush();
    vi.clearAllMocks();
  });

  it("shares one trace id between nested spans", () => {
    const [outer, inner] = startSpan("pipeline", "enter_analyzer", () => [
      currentTraceId(),
      startSpan("worker", "run_plugin:Echo", () => correlationId()),
    ]);

    expect(outer).toMatch(/^[0-9a-f]{32}$/);
    expect(inner).toBe(outer);
  });

  it("hands out a fresh correlation id outside any span", () => {
    expect(currentTraceId()).toBeUndefined();
    expect(correlationId()).toMatch(/^[0-9a-f]{32}$/);
    expect(correlationId()).not.toBe(correlationId());
  });

  it("rethrows and reports a rejected span", async () => {
    const run = startSpan(
      "worker",
      "run_plugin:Echo",
      async () => {
        throw new Error("upstream returned 502");
      },
      { "plugin.name": "Echo" },
    );

    await expect(run).rejects.toThrow("upstream returned 502");
    stopTracingFlush();

    expect(logs.warn).toHaveBeenCalledWith("Trace flush: error spans", {
      total: 1,
      errors: 1,
      spans: [
        expect.objectContaining({
          operation: "worker.run_plugin:Echo",
          "plugin.name": "Echo",
          errorMessage: "upstream returned 502",
        }),
      ],
    });
  });

  it("passes attributes down to child spans", () => {
    expect(() =>
      startSpan(
        "pipeline",
        "enter_connector",
        () =>
          startSpan("worker", "run_plugin:Webhook", () => {
            throw new Error("refused");
          }),
        { "job.id": "job-1" },
      ),
    ).toThrow("refused");
    stopTracingFlush();

    expect(logs.warn).toHaveBeenCalledWith("Trace flush: error spans", {
      total: 2,
      errors: 2,
      spans: [
        expect.objectContaining({ operation: "worker.run_plugin:Webhook", "job.id": "job-1" }),
        expect.objectContaining({ operation: "pipeline.enter_connector", "job.id": "job-1" }),
      ],
    });
  });

  it("logs nothing when no span finished", () => {
    stopTracingFlush();

    expect(logs.debug).not.toHaveBeenCalled();
  });
});
