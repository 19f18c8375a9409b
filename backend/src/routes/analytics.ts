import { Router } from "express";
import { z } from "zod";
import type { AppDependencies } from "../app";
import type { AnalysisHistoryEntry } from "../../../packages/shared/src/types";
import { validateBody } from "../middlewares/validate";
import { HttpError } from "../utils/httpError";
import { ConversationInputSchema, normalizeConversationInput } from "../services/evaluation/conversationInput";
import { runAnalysis } from "../services/analytics/runAnalysis";

const TriggerBodySchema = z.object({
  conversations: z.array(ConversationInputSchema)
});

export function analyticsRouter(deps: AppDependencies) {
  const router = Router();

  router.post("/trigger", validateBody(TriggerBodySchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof TriggerBodySchema> = req.body;
      const conversations = body.conversations.map((raw, i) => normalizeConversationInput(raw, i + 1));
      const { analysis, failures } = await runAnalysis(conversations, deps.store, {
        signalOptions: deps.signalOptions
      });
      res.json({
        success: true,
        analysis_id: analysis.analysis_id,
        total_conversations: analysis.total_conversations_analyzed,
        failed: failures.length,
        failures
      });
    } catch (e) {
      next(e);
    }
  });

  router.get("/results", async (_req, res, next) => {
    try {
      const [latest] = await deps.store.listAnalyses();
      if (!latest) {
        throw new HttpError(404, "No analysis results found");
      }
      res.json(latest);
    } catch (e) {
      next(e);
    }
  });

  router.get("/results/:analysisId", async (req, res, next) => {
    try {
      const analysis = await deps.store.getAnalysis(req.params.analysisId);
      if (!analysis) {
        throw new HttpError(404, "Analysis not found");
      }
      res.json(analysis);
    } catch (e) {
      next(e);
    }
  });

  router.get("/history", async (_req, res, next) => {
    try {
      const history: AnalysisHistoryEntry[] = (await deps.store.listAnalyses()).map((a) => ({
        analysis_id: a.analysis_id,
        timestamp: a.timestamp,
        total_conversations: a.total_conversations_analyzed
      }));
      res.json({ history, count: history.length });
    } catch (e) {
      next(e);
    }
  });

  router.get("/conversations/sentiment", async (_req, res, next) => {
    try {
      const conversations = await deps.store.listConversationAnalytics();
      res.json({ count: conversations.length, conversations });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
