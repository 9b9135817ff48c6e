import { loadConfig } from "./config";
import { db, drainPool, checkPoolConnectivity } from "./db";
import { buildDispatch } from "./bootstrap";
import { logger } from "./logger";
import { loadManifest, seedDefaultsFrom, seedManifest } from "./plugins/manifest";
import { queueName } from "./plugins/queues";
import { DatabaseStorage } from "./storage";
import { startTracingFlush, stopTracingFlush } from "./tracing";
import { PipelineTaskHandler } from "./worker/task-handlers";
import { PgTaskQueue } from "./worker/task-queue";

const log = logger.child("main");

const JOB_INTAKE_BATCH = 10;

async function main(): Promise<void> {
  const config = loadConfig();

  const connectivity = await checkPoolConnectivity();
  if (!connectivity.connected) {
    throw new Error("Database is not reachable");
  }

  const storage = new DatabaseStorage();
  const queue = new PgTaskQueue(db, {
    queues: config.queues.valid.map((q) => queueName(config.queues, q)),
    tasks: config.tasks,
    worker: config.worker,
  });
  const dispatch = buildDispatch({ storage, submitter: queue, config });

  const manifest = await loadManifest(config.manifestPath);
  await seedManifest(storage, manifest, seedDefaultsFrom(config));

  const loaded = await dispatch.registry.load();
  for (const rejected of loaded.rejected) {
    log.warn(`Plugin ${rejected.kind}:${rejected.name} not registered`, { code: rejected.code, error: rejected.error });
  }

  const handler = new PipelineTaskHandler({
    storage,
    entryPoints: dispatch.entryPoints,
    coordinator: dispatch.coordinator,
  });
  queue.start(handler, (report) => dispatch.coordinator.onTaskFinished(report));
  const intake = setInterval(() => {
    dispatch.coordinator
      .startPending(JOB_INTAKE_BATCH)
      .catch((err: unknown) => log.error("Job intake failed", { error: err instanceof Error ? err.message : String(err) }));
  }, config.worker.pollIntervalMs);
  startTracingFlush();

  log.info("Dispatch worker ready", {
    plugins: loaded.registered.length,
    queues: config.queues.valid,
    latencyMs: connectivity.latencyMs,
  });

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      log.info(`Received ${signal}, starting graceful shutdown`);
      clearInterval(intake);
      queue.stop();
      stopTracingFlush();
      drainPool()
        .then(() => {
          log.info("Worker stopped and pool drained");
          process.exit(0);
        })
        .catch((err: unknown) => {
          log.error("Pool drain failed during shutdown", { error: String(err) });
          process.exit(1);
        });
      setTimeout(() => {
        log.warn("Forced shutdown after timeout");
        process.exit(1);
      }, 15_000).unref();
    });
  }
}

main().catch((err: unknown) => {
  log.error("Startup failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
