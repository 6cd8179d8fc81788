import { createServer } from "./api/server.js";
import { env } from "./config/env.js";
import { createChildLogger } from "./config/logger.js";
import { closeDb, scoringStore } from "./db/connection.js";
import { closeRedis } from "./config/queue.js";
import { registerWorkers } from "./jobs/index.js";
import { LeadScoringEngine } from "./services/scoring-engine.js";
import type { AutomationConfig } from "./services/scoring-automation.js";

const log = createChildLogger("main");

async function main() {
  log.info("Starting lead scoring service...");

  // Resolve the scoring profile once, bootstrapping it on first run
  const engine = await LeadScoringEngine.create(scoringStore);
  const automation: AutomationConfig = {
    autoAssignThreshold: env.AUTO_ASSIGN_THRESHOLD,
    qualifyThreshold: env.QUALIFY_THRESHOLD,
  };

  // Register BullMQ workers
  await registerWorkers({
    store: scoringStore,
    engine,
    automation,
    intervalMinutes: env.SCORING_AUTOMATION_INTERVAL_MINUTES,
  });

  // Start HTTP server
  const app = createServer({ store: scoringStore, engine, automation });
  const server = app.listen(env.PORT, () => {
    log.info({ port: env.PORT }, "Server listening");
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, "Shutting down...");
    server.close();
    await closeRedis();
    await closeDb();
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  log.fatal({ err }, "Failed to start");
  process.exit(1);
});
