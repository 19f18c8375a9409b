/**
 * Overall score and pass/fail from criterion scores. Weights come from the active rubric;
 * scores are converted to 0-100 and rounded to 2 decimals before weighting.
 */

import { z } from "zod";
import type { RubricConfig } from "../../eval/rubrics/types";
import type {
  ConversationRecord,
  CriterionScoreMap,
  CriterionScores,
  EvaluationDraft,
  ScoredConversation,
  ScoringStrategyKind
} from "./types";
import { CRITERION_NAMES, mapCriteria } from "./types";
import { InvalidCriterionScoresError } from "./errors";

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

const Unit = z.number().min(0).max(1);

const CriterionScoresSchema = z
  .object({
    intent_recognition: Unit,
    response_correctness: Unit,
    error_handling: Unit,
    tone_appropriateness: Unit,
    safety_compliance: Unit,
    conversation_flow: Unit
  })
  .strict();

/** Write-boundary check: every criterion present, nothing extra, all values in [0, 1]. */
export function assertCriterionScores(conversationId: string, scores: unknown): CriterionScores {
  const parsed = CriterionScoresSchema.safeParse(scores);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "scores"}: ${issue.message}`)
      .join("; ");
    throw new InvalidCriterionScoresError(conversationId, detail);
  }
  return parsed.data;
}

export function toDisplayScores(scores: CriterionScores): CriterionScoreMap {
  return mapCriteria((name) => round2(scores[name] * 100));
}

export function computeOverallScore(displayScores: CriterionScoreMap, rubric: RubricConfig): number {
  let overall = 0;
  for (const name of CRITERION_NAMES) {
    overall += displayScores[name] * rubric.criteria[name].weight;
  }
  return round2(overall);
}

export function aggregateEvaluation(
  conversation: ConversationRecord,
  scored: ScoredConversation,
  rubric: RubricConfig,
  strategy: ScoringStrategyKind
): EvaluationDraft {
  const scores = toDisplayScores(assertCriterionScores(conversation.id, scored.scores));
  const overall_score = computeOverallScore(scores, rubric);
  return {
    conversation_id: conversation.id,
    conversation_title: conversation.title,
    overall_score,
    scores,
    strengths: [...scored.strengths],
    improvements: [...scored.improvements],
    overall_assessment: scored.overall_assessment,
    passed: overall_score >= rubric.passThreshold,
    scoring_strategy: strategy
  };
}
