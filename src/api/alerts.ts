import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { createChildLogger } from "../config/logger.js";
import type { ScoringStore } from "../db/scoring-store.js";
import {
  acknowledgeAlert,
  listAlerts,
  markAlertRead,
} from "../services/scoring-alerts.js";
import { sendError } from "./respond.js";

const log = createChildLogger("api:alerts");

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1")
  .optional();

const listQuerySchema = z.object({
  assigned_to: z.string().uuid().optional(),
  unread: booleanFlag,
  unacknowledged: booleanFlag,
  limit: z.coerce.number().int().positive().max(100).default(50),
});

const acknowledgeSchema = z.object({
  user_id: z.string().uuid(),
});

export function createAlertRouter(store: ScoringStore): Router {
  const router = Router();

  /**
   * GET /api/alerts — List scoring alerts
   */
  router.get("/", async (req: Request, res: Response) => {
    try {
      const parsed = listQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: "Validation failed", details: parsed.error.issues });
        return;
      }

      const { assigned_to, unread, unacknowledged, limit } = parsed.data;
      const alerts = await listAlerts(store, {
        assignedTo: assigned_to,
        unreadOnly: unread,
        unacknowledgedOnly: unacknowledged,
        limit,
      });
      res.json({ data: alerts, count: alerts.length });
    } catch (err) {
      sendError(res, err, log, "Failed to list alerts");
    }
  });

  router.post("/:id/read", async (req: Request, res: Response) => {
    try {
      res.json({ data: await markAlertRead(store, req.params.id) });
    } catch (err) {
      sendError(res, err, log, "Failed to mark alert as read");
    }
  });

  /**
   * POST /api/alerts/:id/acknowledge — First acknowledgement wins
   */
  router.post("/:id/acknowledge", async (req: Request, res: Response) => {
    try {
      const parsed = acknowledgeSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "Validation failed", details: parsed.error.issues });
        return;
      }

      const alert = await acknowledgeAlert(store, req.params.id, parsed.data.user_id);
      res.json({ data: alert });
    } catch (err) {
      sendError(res, err, log, "Failed to acknowledge alert");
    }
  });

  return router;
}
