/**
 * Shared types for conversation evaluation (record → criterion scores → evaluation).
 * Strategies score on the 0-1 scale; stored and displayed evaluations use 0-100.
 */

import type {
  CriterionName,
  ScoringStrategyKind
} from "../../../../packages/shared/src/types";

export type {
  CriterionName,
  CriterionScoreMap,
  EvaluationDraft,
  EvaluationRecord,
  ScoringStrategyKind
} from "../../../../packages/shared/src/types";

export const CRITERION_NAMES = [
  "intent_recognition",
  "response_correctness",
  "error_handling",
  "tone_appropriateness",
  "safety_compliance",
  "conversation_flow"
] as const satisfies readonly CriterionName[];

/** One score per criterion, each in [0, 1]. */
export type CriterionScores = Record<CriterionName, number>;

export const DEFAULT_CONVERSATION_TITLE = "Untitled";

/** Present when the conversation is a single persona prompt and the agent's reply. */
export type SingleTurnContext = {
  user_input: string;
  agent_response: string;
  persona: string;
  intent: string;
  confidence: number;
};

export type ConversationRecord = {
  id: string;
  title: string;
  text: string;
  turn?: SingleTurnContext;
};

export type ScoredConversation = {
  scores: CriterionScores;
  overall_assessment: string;
  strengths: string[];
  improvements: string[];
  /** Set when a strategy substituted fallback scores. */
  fallback_reason: string | null;
};

export interface ScoringStrategy {
  readonly kind: ScoringStrategyKind;
  score(conversation: ConversationRecord): Promise<ScoredConversation>;
}

/** Build a per-criterion record from a function of the criterion name. */
export function mapCriteria<T>(fn: (name: CriterionName) => T): Record<CriterionName, T> {
  return {
    intent_recognition: fn("intent_recognition"),
    response_correctness: fn("response_correctness"),
    error_handling: fn("error_handling"),
    tone_appropriateness: fn("tone_appropriateness"),
    safety_compliance: fn("safety_compliance"),
    conversation_flow: fn("conversation_flow")
  };
}
