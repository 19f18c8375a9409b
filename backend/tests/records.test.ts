/**
 * Read-boundary leniency for stored rows (pg returns NUMERIC as text and timestamps as Date).
 */

import { describe, expect, test } from "vitest";
import {
  restoreAnalysisResult,
  restoreConversationAnalytics,
  restoreEvaluationRecord
} from "../src/store/records";
import { PersistenceError } from "../src/services/evaluation/errors";
import { aggregateEvaluation } from "../src/services/evaluation/aggregate";
import { HeuristicScorer } from "../src/services/evaluation/heuristicScorer";
import { BOOKING_TRANSCRIPT, conversation, testRubric } from "./helpers";

describe("restoreEvaluationRecord", () => {
  test("maps a current row", () => {
    const record = restoreEvaluationRecord(
      {
        conversation_id: "c1",
        conversation_title: "Booking",
        timestamp: new Date(Date.UTC(2025, 0, 1, 9, 30)),
        overall_score: "84.75",
        scores: {
          intent_recognition: 75,
          response_correctness: 90,
          error_handling: 90,
          tone_appropriateness: 100,
          safety_compliance: 75,
          conversation_flow: 75
        },
        strengths: ["Empathetic, courteous tone"],
        improvements: [],
        overall_assessment: "ok",
        passed: true,
        scoring_strategy: "heuristic"
      },
      75
    );
    expect(record.timestamp).toBe("2025-01-01T09:30:00.000Z");
    expect(record.overall_score).toBe(84.75);
    expect(record.scores.tone_appropriateness).toBe(100);
    expect(record.strengths).toEqual(["Empathetic, courteous tone"]);
  });

  test("lifts legacy flat criterion fields and defaults missing ones to 0", () => {
    const record = restoreEvaluationRecord(
      {
        conversation_id: 7,
        conversation_title: null,
        timestamp: "2024-11-05T10:00:00Z",
        overall_score: 81.5,
        intent_recognition: 90,
        response_correctness: "80"
      },
      75
    );
    expect(record.conversation_id).toBe("7");
    expect(record.conversation_title).toBe("Untitled");
    expect(record.scores).toEqual({
      intent_recognition: 90,
      response_correctness: 80,
      error_handling: 0,
      tone_appropriateness: 0,
      safety_compliance: 0,
      conversation_flow: 0
    });
    expect(record.passed).toBe(true);
    expect(record.scoring_strategy).toBe("heuristic");
    expect(record.strengths).toEqual([]);
  });

  test("parses scores stored as JSON text", () => {
    const record = restoreEvaluationRecord(
      { conversation_id: "c2", overall_score: 60, scores: '{"safety_compliance": 88}', strengths: '["a"]' },
      75
    );
    expect(record.scores.safety_compliance).toBe(88);
    expect(record.scores.intent_recognition).toBe(0);
    expect(record.strengths).toEqual(["a"]);
    expect(record.passed).toBe(false);
  });

  test("serialized record reads back with the same scores and overall", async () => {
    const rubric = testRubric();
    const record = conversation("c3", BOOKING_TRANSCRIPT);
    const draft = aggregateEvaluation(record, await new HeuristicScorer(rubric).score(record), rubric, "heuristic");
    const stored = JSON.parse(JSON.stringify({ ...draft, timestamp: "2025-01-01T00:00:00.000Z" }));
    const restored = restoreEvaluationRecord(stored, rubric.passThreshold);
    expect(restored.scores).toEqual(draft.scores);
    expect(restored.overall_score).toBeCloseTo(draft.overall_score, 2);
    expect(restored.passed).toBe(draft.passed);
  });
});

describe("restoreConversationAnalytics", () => {
  test("unknown labels fall back to neutral values", () => {
    const record = restoreConversationAnalytics({
      conversation_id: "c1",
      medical_sentiment: "-0.25",
      urgency_level: 0.5,
      dominant_emotion: "bored",
      complexity_score: 0.2,
      question_count: "2",
      sentiment_category: "Neutral",
      urgency_category: "Urgent",
      overall_evaluation_score: 64,
      timestamp: "2025-01-01T00:00:00.000Z"
    });
    expect(record.medical_sentiment).toBe(-0.25);
    expect(record.dominant_emotion).toBe("neutral");
    expect(record.urgency_category).toBe("Low");
    expect(record.question_count).toBe(2);
    expect(record.conversation_title).toBe("Untitled");
  });
});

describe("restoreAnalysisResult", () => {
  const metrics = {
    overall_stats: {
      total_conversations: 1,
      avg_sentiment: 0,
      avg_urgency: 0,
      avg_complexity: 0.1,
      avg_questions: 0
    },
    sentiment_distribution: { Neutral: 1 },
    emotion_distribution: { neutral: 1 },
    urgency_distribution: { Low: 1 },
    critical_conversations: 0,
    low_engagement: 0,
    sentiment_outliers: 0
  };

  test("parses JSON text columns", () => {
    const result = restoreAnalysisResult({
      analysis_id: "analysis_20250101_000000_abcdef",
      timestamp: new Date(Date.UTC(2025, 0, 1)),
      metrics: JSON.stringify(metrics),
      insights: "[]",
      total_conversations_analyzed: 1
    });
    expect(result.metrics).toEqual(metrics);
    expect(result.insights).toEqual([]);
    expect(result.timestamp).toBe("2025-01-01T00:00:00.000Z");
  });

  test("snapshots without engagement and outlier counts read back with zeros", () => {
    const older = {
      overall_stats: metrics.overall_stats,
      sentiment_distribution: metrics.sentiment_distribution,
      emotion_distribution: metrics.emotion_distribution,
      urgency_distribution: metrics.urgency_distribution,
      critical_conversations: 0
    };
    const result = restoreAnalysisResult({
      analysis_id: "analysis_20240101_000000_abcdef",
      metrics: older,
      insights: [],
      total_conversations_analyzed: 1
    });
    expect(result.metrics).toEqual({ ...older, low_engagement: 0, sentiment_outliers: 0 });
  });

  test("malformed metrics are a persistence error", () => {
    expect(() =>
      restoreAnalysisResult({ analysis_id: "bad", metrics: "{not json", insights: [], total_conversations_analyzed: 0 })
    ).toThrow(PersistenceError);
  });
});
