import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";
import { loadConfig } from "./config";
import { logger } from "./logger";

const log = logger.child("db-pool");
const { Pool } = pg;

const config = loadConfig();
const PRODUCTION_ENVS = new Set(["production", "staging", "uat"]);
const isProd = PRODUCTION_ENVS.has(config.nodeEnv);

// One connection per running task, plus the poll, heartbeat, reaper and intake loops.
const LOOP_CONNECTIONS = 4;

export const pool = new Pool({
  connectionString: config.databaseUrl,
  max: config.worker.maxConcurrent + LOOP_CONNECTIONS,
  min: 1,
  idleTimeoutMillis: isProd ? 30_000 : 10_000,
  connectionTimeoutMillis: 5_000,
  statement_timeout: 30_000,
  application_name: `plugin-dispatch-worker-${config.nodeEnv}`,
  allowExitOnIdle: !isProd,
});

pool.on("error", (err) => {
  log.error("Unexpected pool error on idle client", { error: String(err) });
});

export async function checkPoolConnectivity(): Promise<{ connected: boolean; latencyMs: number }> {
  const start = Date.now();
  try {
    await pool.query("SELECT 1");
    return { connected: true, latencyMs: Date.now() - start };
  } catch (err) {
    log.error("Pool connectivity check failed", {
      error: String(err),
      latencyMs: Date.now() - start,
    });
    return { connected: false, latencyMs: Date.now() - start };
  }
}

export async function drainPool(): Promise<void> {
  await pool.end();
  log.info("Connection pool drained", { waiting: pool.waitingCount });
}

export const db = drizzle(pool, { schema });
