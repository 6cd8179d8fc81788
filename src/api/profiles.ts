import { Router, type Request, type Response } from "express";
import { createChildLogger } from "../config/logger.js";
import type { ScoringStore } from "../db/scoring-store.js";
import type { LeadScoringEngine } from "../services/scoring-engine.js";
import {
  loadProfile,
  saveProfile,
  type ScoringProfile,
} from "../services/scoring-profiles.js";
import { sendError } from "./respond.js";

const log = createChildLogger("api:profiles");

function toResponse(scoring: ScoringProfile) {
  return {
    ...scoring.profile,
    criteria: scoring.criteria.map((c) => ({
      id: c.id,
      name: c.name,
      category: c.category,
      weight: c.weight,
      max_score: c.maxScore,
      weight_multiplier: c.weightMultiplier,
      is_active: c.isActive,
      is_enabled: c.isEnabled,
      rules: c.rules.length,
    })),
    configuration_issues: scoring.configurationIssues,
  };
}

export function createProfileRouter(store: ScoringStore, engine: LeadScoringEngine): Router {
  const router = Router();

  // A saved active default replaces the profile the engine scores with
  async function save(input: unknown) {
    const saved = await saveProfile(store, input);
    if (saved.is_default && saved.is_active) {
      await engine.reloadProfile();
    }
    return saved;
  }

  /**
   * GET /api/profiles/current — Profile the engine is scoring with
   */
  router.get("/current", (_req: Request, res: Response) => {
    res.json({ data: toResponse(engine.profile) });
  });

  router.get("/:id", async (req: Request, res: Response) => {
    try {
      res.json({ data: toResponse(await loadProfile(store, req.params.id)) });
    } catch (err) {
      sendError(res, err, log, "Failed to load scoring profile");
    }
  });

  /**
   * POST /api/profiles — Create a profile (thresholds 0..100)
   */
  router.post("/", async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      res.status(201).json({ data: await save(body) });
    } catch (err) {
      sendError(res, err, log, "Failed to create scoring profile");
    }
  });

  /**
   * PUT /api/profiles/:id — Update a profile; marking it default demotes the previous one
   */
  router.put("/:id", async (req: Request, res: Response) => {
    try {
      await loadProfile(store, req.params.id);
      const body: unknown = req.body;
      const input = typeof body === "object" && body !== null
        ? { ...body, id: req.params.id }
        : body;
      res.json({ data: await save(input) });
    } catch (err) {
      sendError(res, err, log, "Failed to update scoring profile");
    }
  });

  return router;
}
