import { describe, expect, test } from "vitest";
import {
  aggregateEvaluation,
  assertCriterionScores,
  computeOverallScore,
  round2,
  toDisplayScores
} from "../src/services/evaluation/aggregate";
import { InvalidCriterionScoresError } from "../src/services/evaluation/errors";
import { CRITERION_NAMES, type CriterionScores, type ScoredConversation } from "../src/services/evaluation/types";
import { conversation, testRubric } from "./helpers";

function scored(scores: CriterionScores): ScoredConversation {
  return { scores, overall_assessment: "", strengths: [], improvements: [], fallback_reason: null };
}

/** Park-Miller LCG so the property test is reproducible. */
function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
}

describe("aggregateEvaluation", () => {
  test("weighted overall score on the 0-100 scale", () => {
    const draft = aggregateEvaluation(
      conversation("c1", "text", "Refill"),
      scored({
        intent_recognition: 0.9,
        response_correctness: 0.85,
        error_handling: 0.8,
        tone_appropriateness: 0.9,
        safety_compliance: 0.85,
        conversation_flow: 0.8
      }),
      testRubric(),
      "delegated"
    );
    expect(draft.scores).toEqual({
      intent_recognition: 90,
      response_correctness: 85,
      error_handling: 80,
      tone_appropriateness: 90,
      safety_compliance: 85,
      conversation_flow: 80
    });
    expect(draft.overall_score).toBe(85.25);
    expect(draft.passed).toBe(true);
    expect(draft.conversation_title).toBe("Refill");
    expect(draft.scoring_strategy).toBe("delegated");
  });

  test("an overall score exactly at the threshold passes", () => {
    const all = Object.fromEntries(CRITERION_NAMES.map((name) => [name, 0.75]));
    const draft = aggregateEvaluation(conversation("c2", "text"), scored(assertCriterionScores("c2", all)), testRubric(), "heuristic");
    expect(draft.overall_score).toBe(75);
    expect(draft.passed).toBe(true);
  });

  test("below the threshold fails", () => {
    const all = Object.fromEntries(CRITERION_NAMES.map((name) => [name, 0.5]));
    const draft = aggregateEvaluation(conversation("c3", "text"), scored(assertCriterionScores("c3", all)), testRubric(), "heuristic");
    expect(draft.overall_score).toBe(50);
    expect(draft.passed).toBe(false);
  });

  test("overall equals the rounded weighted sum for random scores", () => {
    const rubric = testRubric();
    const random = seededRandom(20250101);
    for (let i = 0; i < 200; i++) {
      const scores = Object.fromEntries(CRITERION_NAMES.map((name) => [name, random()]));
      const draft = aggregateEvaluation(conversation(`r${i}`, "text"), scored(assertCriterionScores(`r${i}`, scores)), rubric, "heuristic");

      const expected = round2(
        CRITERION_NAMES.reduce((sum, name) => sum + draft.scores[name] * rubric.criteria[name].weight, 0)
      );
      expect(draft.overall_score).toBe(expected);
      expect(draft.overall_score).toBeGreaterThanOrEqual(0);
      expect(draft.overall_score).toBeLessThanOrEqual(100);
      expect(draft.passed).toBe(draft.overall_score >= rubric.passThreshold);
    }
  });

  test("display scores round to 2 decimals", () => {
    const display = toDisplayScores({
      intent_recognition: 0.1234,
      response_correctness: 1,
      error_handling: 0,
      tone_appropriateness: 0.5,
      safety_compliance: 0.999,
      conversation_flow: 0.3333
    });
    expect(display.intent_recognition).toBe(12.34);
    expect(display.safety_compliance).toBe(99.9);
    expect(display.conversation_flow).toBe(33.33);
    expect(computeOverallScore(display, testRubric())).toBeGreaterThan(0);
  });
});

describe("assertCriterionScores", () => {
  const valid = Object.fromEntries(CRITERION_NAMES.map((name) => [name, 0.8]));

  test("accepts a complete map", () => {
    expect(assertCriterionScores("c1", valid)).toEqual(valid);
  });

  test("rejects a missing criterion", () => {
    const { conversation_flow: _dropped, ...partial } = valid;
    expect(() => assertCriterionScores("c1", partial)).toThrow(InvalidCriterionScoresError);
  });

  test("rejects an unknown criterion", () => {
    expect(() => assertCriterionScores("c1", { ...valid, response_time: 0.5 })).toThrow(/Unrecognized key/);
  });

  test("rejects out-of-range values", () => {
    expect(() => assertCriterionScores("c1", { ...valid, safety_compliance: 1.2 })).toThrow(
      "Invalid criterion scores for c1: safety_compliance: Number must be less than or equal to 1"
    );
  });
});
