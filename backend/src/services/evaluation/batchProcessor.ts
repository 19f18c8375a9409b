/**
 * Batch evaluation: score → aggregate → persist for each record through a bounded worker pool.
 * Blank transcripts are skipped, one record's failure never aborts the batch, and records not yet
 * started when the signal aborts are reported as cancelled. Already-persisted results stay.
 */

import Bottleneck from "bottleneck";
import type { RubricConfig } from "../../eval/rubrics/types";
import type { ResultStore } from "../../store/resultStore";
import type { BatchFailure, EvaluationRecord } from "../../../../packages/shared/src/types";
import type { ConversationRecord, ScoringStrategy } from "./types";
import { aggregateEvaluation } from "./aggregate";

export const DEFAULT_BATCH_CONCURRENCY = 4;

export type BatchDependencies = {
  strategy: ScoringStrategy;
  rubric: RubricConfig;
  store: ResultStore;
};

export type BatchOptions = {
  concurrency?: number;
  signal?: AbortSignal;
};

export type BatchSummary = {
  submitted: number;
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: number;
  /** Persisted results in input order. */
  results: EvaluationRecord[];
  failures: BatchFailure[];
};

type Outcome =
  | { status: "succeeded"; record: EvaluationRecord }
  | { status: "failed"; reason: string }
  | { status: "skipped" }
  | { status: "cancelled" };

async function evaluateOne(
  conversation: ConversationRecord,
  { strategy, rubric, store }: BatchDependencies,
  signal: AbortSignal | undefined
): Promise<Outcome> {
  if (signal?.aborted) return { status: "cancelled" };
  if (conversation.text.trim() === "") {
    console.warn(`[batch] Skipping ${conversation.id} (${conversation.title}): empty conversation text`);
    return { status: "skipped" };
  }

  try {
    const scored = await strategy.score(conversation);
    const draft = aggregateEvaluation(conversation, scored, rubric, strategy.kind);
    const record = await store.putEvaluation(draft);
    return { status: "succeeded", record };
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    console.error(`[batch] Failed to evaluate ${conversation.id}: ${reason}`);
    return { status: "failed", reason };
  }
}

export async function runEvaluationBatch(
  conversations: ConversationRecord[],
  deps: BatchDependencies,
  options: BatchOptions = {}
): Promise<BatchSummary> {
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);
  const limiter = new Bottleneck({ maxConcurrent: concurrency });
  console.log(
    `[batch] Evaluating ${conversations.length} conversation(s) with ${deps.strategy.kind} scoring (concurrency ${concurrency})`
  );

  const outcomes = await Promise.all(
    conversations.map((conversation) =>
      limiter.schedule(() => evaluateOne(conversation, deps, options.signal))
    )
  );

  const summary: BatchSummary = {
    submitted: conversations.length,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    cancelled: 0,
    results: [],
    failures: []
  };
  outcomes.forEach((outcome, i) => {
    switch (outcome.status) {
      case "succeeded":
        summary.succeeded++;
        summary.results.push(outcome.record);
        break;
      case "failed":
        summary.failed++;
        summary.failures.push({ conversation_id: conversations[i].id, reason: outcome.reason });
        break;
      case "skipped":
        summary.skipped++;
        break;
      case "cancelled":
        summary.cancelled++;
        break;
    }
  });

  if (summary.succeeded === 0 && summary.failed === 0 && summary.cancelled === 0) {
    console.log("[batch] No non-empty conversations to evaluate");
  }
  console.log(
    `[batch] Done: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped, ${summary.cancelled} cancelled`
  );
  return summary;
}
