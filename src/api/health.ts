import { Router } from "express";
import { checkDbHealth } from "../db/connection.js";
import { checkRedisHealth } from "../config/queue.js";
import type { LeadScoringEngine } from "../services/scoring-engine.js";

export function createHealthRouter(engine: LeadScoringEngine): Router {
  const router = Router();

  router.get("/", async (_req, res) => {
    const [dbOk, redisOk] = await Promise.all([
      checkDbHealth(),
      checkRedisHealth(),
    ]);

    const scoring = engine.profile;
    const status = dbOk && redisOk ? "healthy" : "degraded";

    res.status(status === "healthy" ? 200 : 503).json({
      status,
      timestamp: new Date().toISOString(),
      services: {
        database: dbOk ? "up" : "down",
        redis: redisOk ? "up" : "down",
      },
      scoring: {
        profile: scoring.profile.name,
        criteria: scoring.criteria.length,
        configurationIssues: scoring.configurationIssues.length,
      },
    });
  });

  return router;
}
