import { Router } from "express";
import { z } from "zod";
import type { AppDependencies } from "../app";
import type { BatchEvaluationResponse } from "../../../packages/shared/src/types";
import { validateBody } from "../middlewares/validate";
import { HttpError } from "../utils/httpError";
import { ConversationInputSchema, normalizeConversationInput } from "../services/evaluation/conversationInput";
import { runEvaluationBatch } from "../services/evaluation";
import { resolveStrategy } from "../services/evaluation/strategies";
import { computeEvaluationStats } from "../services/analytics/statistics";

export const StrategySchema = z.enum(["heuristic", "delegated"]);

const EvaluateBodySchema = z.object({
  conversations: z.array(ConversationInputSchema),
  strategy: StrategySchema.optional()
});

export function evaluationsRouter(deps: AppDependencies) {
  const router = Router();

  router.post("/evaluate", validateBody(EvaluateBodySchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof EvaluateBodySchema> = req.body;
      const strategy = resolveStrategy(deps.strategies, body.strategy ?? deps.defaultStrategy);
      const conversations = body.conversations.map((raw, i) => normalizeConversationInput(raw, i + 1));
      const summary = await runEvaluationBatch(
        conversations,
        { strategy, rubric: deps.rubric, store: deps.store },
        { concurrency: deps.batch.concurrency, signal: AbortSignal.timeout(deps.batch.timeoutMs) }
      );
      const response: BatchEvaluationResponse = { success: true, ...summary };
      res.json(response);
    } catch (e) {
      next(e);
    }
  });

  router.get("/evaluations", async (_req, res, next) => {
    try {
      const evaluations = await deps.store.listEvaluations();
      res.json({ count: evaluations.length, evaluations });
    } catch (e) {
      next(e);
    }
  });

  router.get("/evaluations/:conversationId", async (req, res, next) => {
    try {
      const evaluation = await deps.store.getEvaluation(req.params.conversationId);
      if (!evaluation) {
        throw new HttpError(404, "Evaluation not found");
      }
      res.json(evaluation);
    } catch (e) {
      next(e);
    }
  });

  router.get("/stats", async (_req, res, next) => {
    try {
      const evaluations = await deps.store.listEvaluations();
      res.json(computeEvaluationStats(evaluations, deps.rubric.passThreshold));
    } catch (e) {
      next(e);
    }
  });

  return router;
}
