import { Router } from "express";
import { z } from "zod";
import type { AppDependencies } from "../app";
import type { PersonaRunResponse } from "../../../packages/shared/src/types";
import { validateBody } from "../middlewares/validate";
import { PERSONAS, buildPersonaConversations, summarizePersonaRun } from "../services/personas";
import { runEvaluationBatch } from "../services/evaluation";
import { resolveStrategy } from "../services/evaluation/strategies";
import { StrategySchema } from "./evaluations";

const RunBodySchema = z.object({
  personas: z.array(z.string().min(1)).optional(),
  strategy: StrategySchema.optional()
});

export function personasRouter(deps: AppDependencies) {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ count: PERSONAS.length, personas: PERSONAS });
  });

  router.post("/run", validateBody(RunBodySchema), async (req, res, next) => {
    try {
      const body: z.infer<typeof RunBodySchema> = req.body;
      const strategy = resolveStrategy(deps.strategies, body.strategy ?? deps.defaultStrategy);
      const conversations = buildPersonaConversations(body.personas);
      const summary = await runEvaluationBatch(
        conversations,
        { strategy, rubric: deps.rubric, store: deps.store },
        { concurrency: deps.batch.concurrency, signal: AbortSignal.timeout(deps.batch.timeoutMs) }
      );
      const response: PersonaRunResponse = {
        success: true,
        ...summary,
        persona_summary: summarizePersonaRun(conversations, summary.results)
      };
      console.log(
        `[personas] ${response.persona_summary.passed}/${response.persona_summary.total} passed, average ${response.persona_summary.average_score}`
      );
      res.json(response);
    } catch (e) {
      next(e);
    }
  });

  return router;
}
