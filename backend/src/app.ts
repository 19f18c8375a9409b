import express from "express";
import type { RubricConfig } from "./eval/rubrics/types";
import type { ResultStore } from "./store/resultStore";
import type { StrategyRegistry } from "./services/evaluation/strategies";
import type { ScoringStrategyKind } from "./services/evaluation/types";
import type { SignalOptions } from "./services/signals/extractors";
import { requireAuth } from "./middlewares/auth";
import { evaluationsRouter } from "./routes/evaluations";
import { analyticsRouter } from "./routes/analytics";
import { personasRouter } from "./routes/personas";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler";

export type AppDependencies = {
  store: ResultStore;
  rubric: RubricConfig;
  strategies: StrategyRegistry;
  defaultStrategy: ScoringStrategyKind;
  signalOptions: SignalOptions;
  batch: { concurrency: number; timeoutMs: number };
  jwtSecret: string;
  allowedOrigins: string[];
};

export function parseAllowedOrigins(value: string | undefined): string[] {
  return (value ?? "http://localhost:3000")
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);
}

export function createApp(deps: AppDependencies) {
  const app = express();
  app.use(express.json({ limit: "5mb" }));

  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (origin && deps.allowedOrigins.includes(origin)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
    }
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
    if (req.method === "OPTIONS") {
      return res.sendStatus(204);
    }
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  const api = express.Router();
  api.use(requireAuth(deps.jwtSecret));
  api.use("/analytics", analyticsRouter(deps));
  api.use("/personas", personasRouter(deps));
  api.use(evaluationsRouter(deps));
  app.use("/api", api);
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
