import { createQueue, createWorker } from "../config/queue.js";
import { createChildLogger } from "../config/logger.js";
import type { ScoringStore } from "../db/scoring-store.js";
import {
  runScoringAutomation,
  type AutomationConfig,
} from "../services/scoring-automation.js";
import type { LeadScoringEngine } from "../services/scoring-engine.js";

const log = createChildLogger("job:scoring-automation");

const AUTOMATION_QUEUE = "scoring-automation";
const queue = createQueue<Record<string, never>>(AUTOMATION_QUEUE);

export function registerScoringAutomationWorker(
  store: ScoringStore,
  engine: LeadScoringEngine,
  config: AutomationConfig
): void {
  createWorker<Record<string, never>>(AUTOMATION_QUEUE, async () => {
    log.info("Running scoring automation...");
    const summary = await runScoringAutomation(store, engine, config);
    log.info(summary, "Scoring automation job completed");
  });
}

/**
 * Schedule the automation pass every `intervalMinutes`
 */
export async function scheduleScoringAutomation(intervalMinutes: number): Promise<void> {
  // Remove existing repeatable jobs
  const existing = await queue.getRepeatableJobs();
  for (const job of existing) {
    await queue.removeRepeatableByKey(job.key);
  }

  await queue.add(
    "run-scoring-automation",
    {},
    {
      repeat: { every: intervalMinutes * 60 * 1000 },
      removeOnComplete: true,
    }
  );

  log.info({ intervalMinutes }, "Scoring automation scheduled");
}
