import { createChildLogger } from "../config/logger.js";
import type { ScoringStore } from "../db/scoring-store.js";
import type { AutomationConfig } from "../services/scoring-automation.js";
import type { LeadScoringEngine } from "../services/scoring-engine.js";
import {
  registerScoringAutomationWorker,
  scheduleScoringAutomation,
} from "./scoring-automation.job.js";

const log = createChildLogger("jobs");

export interface WorkerDeps {
  store: ScoringStore;
  engine: LeadScoringEngine;
  automation: AutomationConfig;
  intervalMinutes: number;
}

export async function registerWorkers(deps: WorkerDeps): Promise<void> {
  log.info("Registering BullMQ workers...");

  registerScoringAutomationWorker(deps.store, deps.engine, deps.automation);

  // Schedule recurring jobs
  await scheduleScoringAutomation(deps.intervalMinutes);

  log.info("All workers registered");
}
