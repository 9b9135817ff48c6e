import { randomUUID } from "crypto";
import { AsyncLocalStorage } from "async_hooks";
import { logger } from "./logger";

const log = logger.child("tracing");

type SpanAttributes = Record<string, string | number | boolean>;

interface SpanContext {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  service: string;
  operation: string;
  startTime: number;
  attributes: SpanAttributes;
}

interface FinishedSpan {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  service: string;
  operation: string;
  durationMs: number;
  status: "ok" | "error";
  attributes: SpanAttributes;
}

const traceStore = new AsyncLocalStorage<SpanContext>();

const MAX_SPAN_BUFFER = 1000;
const FLUSH_INTERVAL_MS = 30_000;
const SLOW_SPAN_MS = 5000;
const spanBuffer: FinishedSpan[] = [];
let flushTimer: NodeJS.Timeout | null = null;

function generateId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 16);
}

function generateTraceId(): string {
  return randomUUID().replace(/-/g, "");
}

export function currentTraceId(): string | undefined {
  return traceStore.getStore()?.traceId;
}

/**
 * Id recorded on a job that the pipeline marks failed. Inside a span this is
 * the trace id, so the job row leads straight to the flushed spans.
 */
export function correlationId(): string {
  return currentTraceId() ?? generateTraceId();
}

export function startSpan<T>(service: string, operation: string, fn: () => T, attributes?: SpanAttributes): T {
  const parent = traceStore.getStore();
  const span: SpanContext = {
    traceId: parent?.traceId ?? generateTraceId(),
    spanId: generateId(),
    parentSpanId: parent?.spanId,
    service,
    operation,
    startTime: Date.now(),
    attributes: { ...parent?.attributes, ...attributes },
  };

  return traceStore.run(span, () => {
    try {
      const result = fn();
      if (result instanceof Promise) {
        return result.then(
          (val: unknown) => {
            finishSpan(span, "ok");
            return val;
          },
          (err: unknown) => {
            finishSpan(span, "error", err);
            throw err;
          },
        ) as T;
      }
      finishSpan(span, "ok");
      return result;
    } catch (err) {
      finishSpan(span, "error", err);
      throw err;
    }
  });
}

function finishSpan(span: SpanContext, status: "ok" | "error", error?: unknown): void {
  const finished: FinishedSpan = {
    traceId: span.traceId,
    spanId: span.spanId,
    parentSpanId: span.parentSpanId,
    service: span.service,
    operation: span.operation,
    durationMs: Date.now() - span.startTime,
    status,
    attributes: { ...span.attributes },
  };
  if (error) {
    finished.attributes.errorMessage = error instanceof Error ? error.message : String(error);
  }

  spanBuffer.push(finished);
  if (spanBuffer.length > MAX_SPAN_BUFFER) {
    spanBuffer.splice(0, spanBuffer.length - MAX_SPAN_BUFFER);
  }
}

function summarize(s: FinishedSpan) {
  return { traceId: s.traceId, operation: `${s.service}.${s.operation}`, durationMs: s.durationMs, ...s.attributes };
}

function flushSpans(): void {
  if (spanBuffer.length === 0) return;

  const batch = spanBuffer.splice(0, spanBuffer.length);
  const errorSpans = batch.filter((s) => s.status === "error");
  const slowSpans = batch.filter((s) => s.status === "ok" && s.durationMs > SLOW_SPAN_MS);

  if (errorSpans.length > 0) {
    log.warn("Trace flush: error spans", {
      total: batch.length,
      errors: errorSpans.length,
      spans: errorSpans.slice(0, 5).map(summarize),
    });
  }
  if (slowSpans.length > 0) {
    log.info("Trace flush: slow spans", { count: slowSpans.length, spans: slowSpans.slice(0, 5).map(summarize) });
  }
  log.debug("Trace flush", { spanCount: batch.length });
}

export function startTracingFlush(): void {
  if (flushTimer) return;
  flushTimer = setInterval(flushSpans, FLUSH_INTERVAL_MS);
  log.info("Tracing flush started", { intervalMs: FLUSH_INTERVAL_MS });
}

/** Stops the timer and flushes what is buffered. */
export function stopTracingFlush(): void {
  if (flushTimer) {
    clearInterval(flushTimer);
    flushTimer = null;
  }
  flushSpans();
}
