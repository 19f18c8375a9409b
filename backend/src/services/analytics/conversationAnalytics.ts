/**
 * Per-conversation analytics records and the metrics rolled up from them.
 */

import type {
  AnalyticsMetrics,
  ConversationAnalyticsRecord
} from "../../../../packages/shared/src/types";
import type { ConversationRecord } from "../evaluation/types";
import type { SignalOptions } from "../signals/extractors";
import {
  DEFAULT_SIGNAL_OPTIONS,
  categorizeSentiment,
  categorizeUrgency,
  extractSignals
} from "../signals/extractors";

export const CRITICAL_URGENCY_THRESHOLD = 0.6;
export const CRITICAL_POLARITY_THRESHOLD = -0.3;
export const LOW_ENGAGEMENT_MIN_QUESTIONS = 5;
export const LOW_ENGAGEMENT_MAX_COMPLEXITY = 0.3;
export const OUTLIER_STDDEVS = 2;

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

/** 0-100: sentiment 30 pts, calm 30 pts, simplicity 20 pts, plus a 20 pt base. */
export function overallEvaluationScore(polarity: number, urgency: number, complexity: number): number {
  return Math.trunc(((polarity + 1) / 2) * 30 + (1 - urgency) * 30 + (1 - complexity) * 20 + 20);
}

export function analyzeConversation(
  conversation: ConversationRecord,
  timestamp: string,
  options: SignalOptions = DEFAULT_SIGNAL_OPTIONS
): ConversationAnalyticsRecord {
  const signals = extractSignals(conversation.text, options);
  return {
    conversation_id: conversation.id,
    conversation_title: conversation.title,
    medical_sentiment: round4(signals.polarity),
    urgency_level: round4(signals.urgency),
    dominant_emotion: signals.emotion,
    complexity_score: round4(signals.complexity),
    question_count: signals.question_count,
    sentiment_category: categorizeSentiment(signals.polarity),
    urgency_category: categorizeUrgency(signals.urgency),
    overall_evaluation_score: overallEvaluationScore(signals.polarity, signals.urgency, signals.complexity),
    timestamp
  };
}

function countBy<K extends string>(records: ConversationAnalyticsRecord[], key: (r: ConversationAnalyticsRecord) => K) {
  const counts: Partial<Record<K, number>> = {};
  for (const record of records) {
    const label = key(record);
    counts[label] = (counts[label] ?? 0) + 1;
  }
  return counts;
}

function average(records: ConversationAnalyticsRecord[], value: (r: ConversationAnalyticsRecord) => number): number {
  if (records.length === 0) return 0;
  return round4(records.reduce((sum, r) => sum + value(r), 0) / records.length);
}

/** Sample standard deviation; 0 below two values. */
function sampleStddev(values: number[], mean: number): number {
  if (values.length < 2) return 0;
  const squares = values.reduce((sum, v) => sum + (v - mean) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

/** Polarity further than OUTLIER_STDDEVS sample deviations from the batch mean. */
export function countSentimentOutliers(records: ConversationAnalyticsRecord[]): number {
  const polarities = records.map((r) => r.medical_sentiment);
  const mean = polarities.length === 0 ? 0 : polarities.reduce((sum, v) => sum + v, 0) / polarities.length;
  const band = OUTLIER_STDDEVS * sampleStddev(polarities, mean);
  return polarities.filter((p) => p > mean + band || p < mean - band).length;
}

export function computeAnalyticsMetrics(records: ConversationAnalyticsRecord[]): AnalyticsMetrics {
  return {
    overall_stats: {
      total_conversations: records.length,
      avg_sentiment: average(records, (r) => r.medical_sentiment),
      avg_urgency: average(records, (r) => r.urgency_level),
      avg_complexity: average(records, (r) => r.complexity_score),
      avg_questions: average(records, (r) => r.question_count)
    },
    sentiment_distribution: countBy(records, (r) => r.sentiment_category),
    emotion_distribution: countBy(records, (r) => r.dominant_emotion),
    urgency_distribution: countBy(records, (r) => r.urgency_category),
    critical_conversations: records.filter(
      (r) => r.urgency_level > CRITICAL_URGENCY_THRESHOLD && r.medical_sentiment < CRITICAL_POLARITY_THRESHOLD
    ).length,
    low_engagement: records.filter(
      (r) => r.question_count > LOW_ENGAGEMENT_MIN_QUESTIONS && r.complexity_score < LOW_ENGAGEMENT_MAX_COMPLEXITY
    ).length,
    sentiment_outliers: countSentimentOutliers(records)
  };
}
