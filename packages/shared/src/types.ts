/**
 * Shared wire types for the evaluation API (batch evaluation, stored results, analytics).
 * Used by the backend and by the dashboard; scores on the wire are always on the 0-100 scale.
 */

export type CriterionName =
  | "intent_recognition"
  | "response_correctness"
  | "error_handling"
  | "tone_appropriateness"
  | "safety_compliance"
  | "conversation_flow";

export type CriterionScoreMap = Record<CriterionName, number>;

export type ScoringStrategyKind = "heuristic" | "delegated";

/** One evaluated conversation as produced by a batch run (before it is stored). */
export interface EvaluationDraft {
  conversation_id: string;
  conversation_title: string;
  overall_score: number;
  scores: CriterionScoreMap;
  strengths: string[];
  improvements: string[];
  overall_assessment: string;
  passed: boolean;
  scoring_strategy: ScoringStrategyKind;
}

/** Stored evaluation; `timestamp` is assigned by the store at write time. */
export interface EvaluationRecord extends EvaluationDraft {
  timestamp: string;
}

export interface BatchFailure {
  conversation_id: string;
  reason: string;
}

export interface BatchEvaluationResponse {
  success: boolean;
  submitted: number;
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: number;
  results: EvaluationRecord[];
  failures: BatchFailure[];
}

export interface CriterionSummary {
  mean: number;
  min: number;
  max: number;
}

export interface EvaluationStats {
  total_evaluations: number;
  average_score: number;
  /** Percentage of evaluations at or above the pass threshold. */
  pass_rate: number;
  pass_threshold: number;
  highest_score: number;
  lowest_score: number;
  criteria_averages: CriterionScoreMap;
  criteria: Record<CriterionName, CriterionSummary>;
}

export type SentimentCategory = "Positive" | "Negative" | "Neutral";
export type UrgencyCategory = "Critical" | "High" | "Medium" | "Low";
export type EmotionLabel =
  | "anxious"
  | "frustrated"
  | "grateful"
  | "confused"
  | "distressed"
  | "positive"
  | "negative"
  | "neutral";

export interface ConversationAnalyticsRecord {
  conversation_id: string;
  conversation_title: string;
  medical_sentiment: number;
  urgency_level: number;
  dominant_emotion: EmotionLabel;
  complexity_score: number;
  question_count: number;
  sentiment_category: SentimentCategory;
  urgency_category: UrgencyCategory;
  overall_evaluation_score: number;
  timestamp: string;
}

export interface AnalyticsMetrics {
  overall_stats: {
    total_conversations: number;
    avg_sentiment: number;
    avg_urgency: number;
    avg_complexity: number;
    avg_questions: number;
  };
  sentiment_distribution: Partial<Record<SentimentCategory, number>>;
  emotion_distribution: Partial<Record<EmotionLabel, number>>;
  urgency_distribution: Partial<Record<UrgencyCategory, number>>;
  /** Urgency above 0.6 with polarity below -0.3. */
  critical_conversations: number;
  /** More than five questions with complexity below 0.3. */
  low_engagement: number;
  /** Polarity more than two sample standard deviations from the mean. */
  sentiment_outliers: number;
}

export type InsightPriority = "critical" | "high" | "medium" | "low";
export type InsightType = "warning" | "alert" | "info" | "suggestion";

export interface AnalyticsInsight {
  type: InsightType;
  category: string;
  priority: InsightPriority;
  message: string;
}

export interface AnalysisResultRecord {
  analysis_id: string;
  timestamp: string;
  metrics: AnalyticsMetrics;
  insights: AnalyticsInsight[];
  total_conversations_analyzed: number;
}

export interface AnalysisHistoryEntry {
  analysis_id: string;
  timestamp: string;
  total_conversations: number;
}

export interface PersonaSummary {
  id: string;
  name: string;
  characteristics: string[];
  test_prompts: string[];
}

export interface PersonaRunSummary {
  total: number;
  passed: number;
  /** Percentage of evaluated prompts that passed. */
  pass_rate: number;
  average_score: number;
  /** Mean overall score per persona id, in catalogue order. */
  persona_averages: Record<string, number>;
}

export interface PersonaRunResponse extends BatchEvaluationResponse {
  persona_summary: PersonaRunSummary;
}
