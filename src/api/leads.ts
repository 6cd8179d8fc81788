import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { createChildLogger } from "../config/logger.js";
import { NotFoundError } from "../errors.js";
import type { ScoringStore } from "../db/scoring-store.js";
import { logLeadActivity } from "../services/lead-activities.js";
import type { LeadScoringEngine } from "../services/scoring-engine.js";
import { sendError } from "./respond.js";

const log = createChildLogger("api:leads");

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).default(20),
});

const scoreBodySchema = z
  .object({
    reason: z.string().min(1).optional(),
  })
  .default({});

export function createLeadRouter(store: ScoringStore, engine: LeadScoringEngine): Router {
  const router = Router();

  async function requireLead(id: string) {
    const lead = await store.getLead(id);
    if (!lead) throw new NotFoundError("Lead", id);
    return lead;
  }

  /**
   * POST /api/leads/:id/score — Recalculate a lead's score
   */
  router.post("/:id/score", async (req: Request, res: Response) => {
    try {
      const parsed = scoreBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: "Validation failed", details: parsed.error.issues });
        return;
      }

      const lead = await requireLead(req.params.id);
      const breakdown = await engine.calculateLeadScore(lead, {
        reason: parsed.data.reason ?? "Manual recalculation",
        triggeredBy: "api",
      });
      res.json({ data: breakdown });
    } catch (err) {
      sendError(res, err, log, "Failed to score lead");
    }
  });

  /**
   * GET /api/leads/:id/score/explanation
   */
  router.get("/:id/score/explanation", async (req: Request, res: Response) => {
    try {
      const lead = await requireLead(req.params.id);
      res.json({ data: await engine.getScoreExplanation(lead) });
    } catch (err) {
      sendError(res, err, log, "Failed to explain lead score");
    }
  });

  /**
   * GET /api/leads/:id/score/history?limit=
   */
  router.get("/:id/score/history", async (req: Request, res: Response) => {
    try {
      const parsed = historyQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: "Validation failed", details: parsed.error.issues });
        return;
      }

      const lead = await requireLead(req.params.id);
      const history = await engine.getScoreHistory(lead.id, parsed.data.limit);
      res.json({ data: history, count: history.length });
    } catch (err) {
      sendError(res, err, log, "Failed to load score history");
    }
  });

  /**
   * POST /api/leads/:id/activities — Log an activity and re-score
   */
  router.post("/:id/activities", async (req: Request, res: Response) => {
    try {
      const result = await logLeadActivity(store, engine, req.params.id, req.body);
      res.status(201).json({ data: result });
    } catch (err) {
      sendError(res, err, log, "Failed to log activity");
    }
  });

  return router;
}
