import { Router, type Request, type Response } from "express";
import { createChildLogger } from "../config/logger.js";
import type { ScoringStore } from "../db/scoring-store.js";
import {
  runScoringAutomation,
  type AutomationConfig,
} from "../services/scoring-automation.js";
import type { LeadScoringEngine } from "../services/scoring-engine.js";
import { sendError } from "./respond.js";

const log = createChildLogger("api:automation");

export function createAutomationRouter(
  store: ScoringStore,
  engine: LeadScoringEngine,
  config: AutomationConfig
): Router {
  const router = Router();

  /**
   * POST /api/automation/run — Run the full scoring automation pass now
   */
  router.post("/run", async (_req: Request, res: Response) => {
    try {
      const summary = await runScoringAutomation(store, engine, config);
      res.json({ data: summary });
    } catch (err) {
      sendError(res, err, log, "Scoring automation failed");
    }
  });

  return router;
}
