import { describe, expect, test } from "vitest";
import { runEvaluationBatch } from "../src/services/evaluation/batchProcessor";
import { HeuristicScorer } from "../src/services/evaluation/heuristicScorer";
import { mapCriteria, type ConversationRecord, type ScoringStrategy } from "../src/services/evaluation/types";
import { BOOKING_TRANSCRIPT, InMemoryResultStore, conversation, steppingClock, testRubric } from "./helpers";

function deps(store = new InMemoryResultStore(), strategy: ScoringStrategy = new HeuristicScorer(testRubric())) {
  return { strategy, rubric: testRubric(), store };
}

function delayedStrategy(delays: Record<string, number>): ScoringStrategy {
  return {
    kind: "heuristic",
    async score(record: ConversationRecord) {
      await new Promise((resolve) => setTimeout(resolve, delays[record.id] ?? 0));
      return {
        scores: mapCriteria(() => 0.8),
        overall_assessment: "",
        strengths: [],
        improvements: [],
        fallback_reason: null
      };
    }
  };
}

describe("runEvaluationBatch", () => {
  test("empty-text record is skipped, not failed", async () => {
    const summary = await runEvaluationBatch(
      [conversation("blank", "   "), conversation("c1", BOOKING_TRANSCRIPT)],
      deps()
    );
    expect(summary).toMatchObject({ submitted: 2, succeeded: 1, failed: 0, skipped: 1, cancelled: 0 });
    expect(summary.results.map((r) => r.conversation_id)).toEqual(["c1"]);
    expect(summary.failures).toEqual([]);
  });

  test("a batch with no non-empty records is an empty success", async () => {
    const summary = await runEvaluationBatch([conversation("a", ""), conversation("b", "\n")], deps());
    expect(summary).toEqual({
      submitted: 2,
      succeeded: 0,
      failed: 0,
      skipped: 2,
      cancelled: 0,
      results: [],
      failures: []
    });
  });

  test("persistence failure for one record does not abort the batch", async () => {
    const store = new InMemoryResultStore(steppingClock(), new Set(["c2"]));
    const summary = await runEvaluationBatch(
      [conversation("c1", BOOKING_TRANSCRIPT), conversation("c2", BOOKING_TRANSCRIPT), conversation("c3", "Agent: ok")],
      deps(store)
    );
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.failures).toEqual([
      { conversation_id: "c2", reason: "Failed to store evaluation c2: write rejected" }
    ]);
    expect(summary.results.map((r) => r.conversation_id)).toEqual(["c1", "c3"]);
    expect(await store.getEvaluation("c3")).toMatchObject({ overall_score: 66.75, passed: false });
  });

  test("scores outside [0, 1] are rejected for that record only", async () => {
    const invalid: ScoringStrategy = {
      kind: "delegated",
      async score() {
        return {
          scores: mapCriteria(() => 1.5),
          overall_assessment: "",
          strengths: [],
          improvements: [],
          fallback_reason: null
        };
      }
    };
    const summary = await runEvaluationBatch([conversation("c1", "text")], deps(undefined, invalid));
    expect(summary.failed).toBe(1);
    expect(summary.failures[0].reason).toMatch(/^Invalid criterion scores for c1: intent_recognition/);
  });

  test("results keep input order under concurrency", async () => {
    const summary = await runEvaluationBatch(
      [conversation("slow", "a"), conversation("fast", "b"), conversation("medium", "c")],
      deps(undefined, delayedStrategy({ slow: 30, fast: 0, medium: 10 })),
      { concurrency: 3 }
    );
    expect(summary.results.map((r) => r.conversation_id)).toEqual(["slow", "fast", "medium"]);
  });

  test("records not started before abort are cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const store = new InMemoryResultStore();
    const summary = await runEvaluationBatch(
      [conversation("c1", BOOKING_TRANSCRIPT), conversation("c2", BOOKING_TRANSCRIPT)],
      deps(store),
      { signal: controller.signal }
    );
    expect(summary).toMatchObject({ submitted: 2, succeeded: 0, cancelled: 2 });
    expect(store.evaluations.size).toBe(0);
  });

  test("already-persisted results stay when the batch is cancelled midway", async () => {
    const controller = new AbortController();
    const store = new InMemoryResultStore();
    const strategy: ScoringStrategy = {
      kind: "heuristic",
      async score(record) {
        controller.abort();
        return new HeuristicScorer(testRubric()).score(record);
      }
    };
    const summary = await runEvaluationBatch(
      [conversation("c1", BOOKING_TRANSCRIPT), conversation("c2", BOOKING_TRANSCRIPT)],
      deps(store, strategy),
      { concurrency: 1, signal: controller.signal }
    );
    expect(summary).toMatchObject({ succeeded: 1, cancelled: 1 });
    expect(await store.getEvaluation("c1")).not.toBeNull();
    expect(await store.getEvaluation("c2")).toBeNull();
  });
});
