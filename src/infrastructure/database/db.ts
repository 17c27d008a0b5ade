/**
 * PostgreSQL connection pool for the pgvector memory store.
 */
import type { AppConfig } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import { Pool } from "pg";

export function createPool(settings: AppConfig["vectorStore"]): Pool {
  const pool = new Pool({
    host: settings.host,
    port: settings.port,
    user: settings.user,
    password: settings.password,
    database: settings.database,
    max: settings.max,
    idleTimeoutMillis: settings.idleTimeoutMs,
    connectionTimeoutMillis: settings.connectionTimeoutMs,
    statement_timeout: settings.statementTimeoutMs,
  });

  pool.on("error", (err) => {
    logger.log("error", "PG_POOL_ERROR", { message: err.message });
  });

  return pool;
}
