/**
 * Result Store: durable home for evaluations, per-conversation analytics and analysis runs.
 * Writes are full-record upserts keyed by id; the store assigns evaluation timestamps.
 */

import type {
  AnalysisResultRecord,
  ConversationAnalyticsRecord,
  EvaluationDraft,
  EvaluationRecord
} from "../../../packages/shared/src/types";

export interface ResultStore {
  putEvaluation(draft: EvaluationDraft): Promise<EvaluationRecord>;
  getEvaluation(conversationId: string): Promise<EvaluationRecord | null>;
  listEvaluations(): Promise<EvaluationRecord[]>;

  /** Last writer wins per conversation_id; no cross-record atomicity. */
  putConversationAnalytics(record: ConversationAnalyticsRecord): Promise<void>;
  listConversationAnalytics(): Promise<ConversationAnalyticsRecord[]>;

  putAnalysis(result: AnalysisResultRecord): Promise<void>;
  getAnalysis(analysisId: string): Promise<AnalysisResultRecord | null>;
  listAnalyses(): Promise<AnalysisResultRecord[]>;
}

export function sortNewestFirst<T extends { timestamp: string }>(items: T[]): T[] {
  return [...items].sort((a, b) => (a.timestamp < b.timestamp ? 1 : a.timestamp > b.timestamp ? -1 : 0));
}
