/**
 * Deterministic scoring from local text features. No external calls; never fails.
 * Criteria it cannot derive from the transcript get DEFAULT_HEURISTIC_SCORE.
 */

import type { RubricConfig } from "../../eval/rubrics/types";
import type {
  ConversationRecord,
  CriterionName,
  CriterionScores,
  ScoredConversation,
  ScoringStrategy
} from "./types";
import { CRITERION_NAMES, mapCriteria } from "./types";

export const DEFAULT_HEURISTIC_SCORE = 0.75;

const EMPATHETIC_PHRASES = ["happy", "understand", "help", "please", "thank you"];
const AGENT_LINE = /^\s*(agent|assistant|bot|nurse|receptionist)\s*:\s*/i;

const FEEDBACK: Record<CriterionName, { strength: string; improvement: string }> = {
  intent_recognition: {
    strength: "Caller intent identified with high confidence",
    improvement: "Confirm the caller's intent before answering"
  },
  response_correctness: {
    strength: "Responses carry substantive, actionable content",
    improvement: "Give fuller, more specific answers"
  },
  error_handling: {
    strength: "Offers help or clarification when the request is unclear",
    improvement: "Ask clarifying questions when the request is unclear"
  },
  tone_appropriateness: {
    strength: "Empathetic, courteous tone",
    improvement: "Use more empathetic and courteous language"
  },
  safety_compliance: {
    strength: "Safety expectations met",
    improvement: "Review escalation and safety guidance"
  },
  conversation_flow: {
    strength: "Conversation flows naturally",
    improvement: "Improve follow-up questions and information gathering"
  }
};

/** Agent side of the transcript: the single-turn response, else lines tagged as agent, else everything. */
export function agentText(conversation: ConversationRecord): string {
  if (conversation.turn) return conversation.turn.agent_response;
  const agentLines = conversation.text
    .split(/\r?\n/)
    .filter((line) => AGENT_LINE.test(line))
    .map((line) => line.replace(AGENT_LINE, "").trim());
  return agentLines.length > 0 ? agentLines.join(" ") : conversation.text;
}

export function computeHeuristicScores(conversation: ConversationRecord): CriterionScores {
  const response = agentText(conversation);
  const lower = response.toLowerCase();
  const empathyHits = EMPATHETIC_PHRASES.filter((p) => lower.includes(p)).length;

  return mapCriteria((name) => {
    switch (name) {
      case "intent_recognition":
        return conversation.turn
          ? Math.max(0, Math.min(1, conversation.turn.confidence))
          : DEFAULT_HEURISTIC_SCORE;
      case "response_correctness":
        return response.trim().length > 20 ? 0.9 : 0.6;
      case "error_handling":
        return lower.includes("understand") || lower.includes("help") ? 0.9 : 0.7;
      case "tone_appropriateness":
        return Math.min(empathyHits / EMPATHETIC_PHRASES.length + 0.5, 1);
      default:
        return DEFAULT_HEURISTIC_SCORE;
    }
  });
}

export class HeuristicScorer implements ScoringStrategy {
  readonly kind = "heuristic" as const;

  constructor(private readonly rubric: RubricConfig) {}

  async score(conversation: ConversationRecord): Promise<ScoredConversation> {
    const scores = computeHeuristicScores(conversation);
    const strengths: string[] = [];
    const improvements: string[] = [];
    for (const name of CRITERION_NAMES) {
      if (scores[name] >= this.rubric.criteria[name].threshold) {
        strengths.push(FEEDBACK[name].strength);
      } else {
        improvements.push(FEEDBACK[name].improvement);
      }
    }
    return {
      scores,
      overall_assessment: `Heuristic evaluation: ${strengths.length} of ${CRITERION_NAMES.length} criteria met their thresholds.`,
      strengths,
      improvements,
      fallback_reason: null
    };
  }
}
