import express from "express";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { createChildLogger } from "../config/logger.js";
import { AppError } from "../errors.js";
import type { ScoringStore } from "../db/scoring-store.js";
import type { AutomationConfig } from "../services/scoring-automation.js";
import type { LeadScoringEngine } from "../services/scoring-engine.js";
import { createHealthRouter } from "./health.js";
import { createLeadRouter } from "./leads.js";
import { createAlertRouter } from "./alerts.js";
import { createAutomationRouter } from "./automation.js";
import { createProfileRouter } from "./profiles.js";

const log = createChildLogger("server");

export interface ServerDeps {
  store: ScoringStore;
  engine: LeadScoringEngine;
  automation: AutomationConfig;
}

export function createServer({ store, engine, automation }: ServerDeps) {
  const app = express();

  // Security
  app.use(helmet());
  app.use(cors());

  const apiLimiter = rateLimit({
    windowMs: 60_000,
    max: 300,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests" },
  });

  // Body parsing
  app.use(express.json({ limit: "1mb" }));

  // Request logging
  app.use((req, _res, next) => {
    log.debug({ method: req.method, url: req.url }, "Incoming request");
    next();
  });

  // Routes
  app.use("/health", createHealthRouter(engine));
  app.use("/api", apiLimiter);
  app.use("/api/leads", createLeadRouter(store, engine));
  app.use("/api/alerts", createAlertRouter(store));
  app.use("/api/automation", createAutomationRouter(store, engine, automation));
  app.use("/api/profiles", createProfileRouter(store, engine));

  // 404
  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Error handler
  app.use(
    (
      err: Error,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      if (err instanceof AppError) {
        res.status(err.statusCode).json({ error: err.message });
        return;
      }
      log.error({ err }, "Unhandled error");
      res.status(500).json({ error: "Internal server error" });
    }
  );

  return app;
}
