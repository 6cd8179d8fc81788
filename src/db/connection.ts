import pg from "pg";
import { Kysely, PostgresDialect, sql } from "kysely";
import { env } from "../config/env.js";
import { createChildLogger } from "../config/logger.js";
import { PostgresScoringStore } from "./postgres-store.js";
import type { Database } from "./schemas/types.js";

const log = createChildLogger("db");

const pool = new pg.Pool({
  connectionString: env.DATABASE_URL,
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
});

pool.on("error", (err) => {
  log.error({ err }, "Unexpected pool error");
});

export const db = new Kysely<Database>({
  dialect: new PostgresDialect({ pool }),
});

export const scoringStore = new PostgresScoringStore(db);

export async function checkDbHealth(): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (err) {
    log.warn({ err }, "Database health check failed");
    return false;
  }
}

export async function closeDb(): Promise<void> {
  await db.destroy();
  log.info("Database connections closed");
}
