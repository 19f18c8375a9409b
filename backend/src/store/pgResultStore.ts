import type { Pool } from "pg";
import type {
  AnalysisResultRecord,
  ConversationAnalyticsRecord,
  EvaluationDraft,
  EvaluationRecord
} from "../../../packages/shared/src/types";
import { PersistenceError } from "../services/evaluation/errors";
import type { ResultStore } from "./resultStore";
import { restoreAnalysisResult, restoreConversationAnalytics, restoreEvaluationRecord } from "./records";

const EVALUATION_COLUMNS = `conversation_id, conversation_title, evaluated_at AS timestamp, overall_score, scores,
  strengths, improvements, overall_assessment, passed, scoring_strategy`;

const ANALYTICS_COLUMNS = `conversation_id, conversation_title, medical_sentiment, urgency_level, dominant_emotion,
  complexity_score, question_count, sentiment_category, urgency_category, overall_evaluation_score,
  analyzed_at AS timestamp`;

const ANALYSIS_COLUMNS = `analysis_id, created_at AS timestamp, metrics, insights, total_conversations_analyzed`;

async function guarded<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof PersistenceError) throw e;
    throw new PersistenceError(`Failed to ${action}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

/** Postgres-backed ResultStore. Tables come from backend/migrations. */
export class PgResultStore implements ResultStore {
  constructor(private readonly pool: Pool, private readonly passThreshold: number) {}

  putEvaluation(draft: EvaluationDraft): Promise<EvaluationRecord> {
    return guarded(`store evaluation ${draft.conversation_id}`, async () => {
      const result = await this.pool.query(
        `INSERT INTO evaluation_results (conversation_id, conversation_title, evaluated_at, overall_score, scores,
           strengths, improvements, overall_assessment, passed, scoring_strategy)
         VALUES ($1, $2, NOW(), $3, $4::jsonb, $5::jsonb, $6::jsonb, $7, $8, $9)
         ON CONFLICT (conversation_id) DO UPDATE SET
           conversation_title = EXCLUDED.conversation_title,
           evaluated_at = EXCLUDED.evaluated_at,
           overall_score = EXCLUDED.overall_score,
           scores = EXCLUDED.scores,
           strengths = EXCLUDED.strengths,
           improvements = EXCLUDED.improvements,
           overall_assessment = EXCLUDED.overall_assessment,
           passed = EXCLUDED.passed,
           scoring_strategy = EXCLUDED.scoring_strategy
         RETURNING ${EVALUATION_COLUMNS}`,
        [
          draft.conversation_id,
          draft.conversation_title,
          draft.overall_score,
          JSON.stringify(draft.scores),
          JSON.stringify(draft.strengths),
          JSON.stringify(draft.improvements),
          draft.overall_assessment,
          draft.passed,
          draft.scoring_strategy
        ]
      );
      return restoreEvaluationRecord(result.rows[0], this.passThreshold);
    });
  }

  getEvaluation(conversationId: string): Promise<EvaluationRecord | null> {
    return guarded(`read evaluation ${conversationId}`, async () => {
      const result = await this.pool.query(
        `SELECT ${EVALUATION_COLUMNS} FROM evaluation_results WHERE conversation_id = $1`,
        [conversationId]
      );
      return result.rowCount === 1 ? restoreEvaluationRecord(result.rows[0], this.passThreshold) : null;
    });
  }

  listEvaluations(): Promise<EvaluationRecord[]> {
    return guarded("list evaluations", async () => {
      const result = await this.pool.query(
        `SELECT ${EVALUATION_COLUMNS} FROM evaluation_results ORDER BY evaluated_at DESC`
      );
      return result.rows.map((row) => restoreEvaluationRecord(row, this.passThreshold));
    });
  }

  putConversationAnalytics(record: ConversationAnalyticsRecord): Promise<void> {
    return guarded(`store analytics for ${record.conversation_id}`, async () => {
      await this.pool.query(
        `INSERT INTO conversation_analytics (conversation_id, conversation_title, medical_sentiment, urgency_level,
           dominant_emotion, complexity_score, question_count, sentiment_category, urgency_category,
           overall_evaluation_score, analyzed_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11::timestamptz)
         ON CONFLICT (conversation_id) DO UPDATE SET
           conversation_title = EXCLUDED.conversation_title,
           medical_sentiment = EXCLUDED.medical_sentiment,
           urgency_level = EXCLUDED.urgency_level,
           dominant_emotion = EXCLUDED.dominant_emotion,
           complexity_score = EXCLUDED.complexity_score,
           question_count = EXCLUDED.question_count,
           sentiment_category = EXCLUDED.sentiment_category,
           urgency_category = EXCLUDED.urgency_category,
           overall_evaluation_score = EXCLUDED.overall_evaluation_score,
           analyzed_at = EXCLUDED.analyzed_at`,
        [
          record.conversation_id,
          record.conversation_title,
          record.medical_sentiment,
          record.urgency_level,
          record.dominant_emotion,
          record.complexity_score,
          record.question_count,
          record.sentiment_category,
          record.urgency_category,
          record.overall_evaluation_score,
          record.timestamp
        ]
      );
    });
  }

  listConversationAnalytics(): Promise<ConversationAnalyticsRecord[]> {
    return guarded("list conversation analytics", async () => {
      const result = await this.pool.query(
        `SELECT ${ANALYTICS_COLUMNS} FROM conversation_analytics ORDER BY analyzed_at DESC`
      );
      return result.rows.map(restoreConversationAnalytics);
    });
  }

  putAnalysis(analysis: AnalysisResultRecord): Promise<void> {
    return guarded(`store analysis ${analysis.analysis_id}`, async () => {
      await this.pool.query(
        `INSERT INTO analysis_results (analysis_id, created_at, metrics, insights, total_conversations_analyzed)
         VALUES ($1, $2::timestamptz, $3::jsonb, $4::jsonb, $5)`,
        [
          analysis.analysis_id,
          analysis.timestamp,
          JSON.stringify(analysis.metrics),
          JSON.stringify(analysis.insights),
          analysis.total_conversations_analyzed
        ]
      );
    });
  }

  getAnalysis(analysisId: string): Promise<AnalysisResultRecord | null> {
    return guarded(`read analysis ${analysisId}`, async () => {
      const result = await this.pool.query(
        `SELECT ${ANALYSIS_COLUMNS} FROM analysis_results WHERE analysis_id = $1`,
        [analysisId]
      );
      return result.rowCount === 1 ? restoreAnalysisResult(result.rows[0]) : null;
    });
  }

  listAnalyses(): Promise<AnalysisResultRecord[]> {
    return guarded("list analyses", async () => {
      const result = await this.pool.query(
        `SELECT ${ANALYSIS_COLUMNS} FROM analysis_results ORDER BY created_at DESC`
      );
      return result.rows.map(restoreAnalysisResult);
    });
  }
}
