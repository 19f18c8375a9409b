/**
 * Read-boundary mapping from stored rows to API records.
 * Historical evaluations are tolerated: missing criteria default to 0, legacy rows that kept
 * criterion scores as top-level fields are lifted into `scores`, and JSON kept as text is parsed.
 */

import { z } from "zod";
import type {
  AnalysisResultRecord,
  ConversationAnalyticsRecord,
  EmotionLabel,
  EvaluationRecord,
  SentimentCategory,
  UrgencyCategory
} from "../../../packages/shared/src/types";
import { DEFAULT_CONVERSATION_TITLE, mapCriteria } from "../services/evaluation/types";
import { PersistenceError } from "../services/evaluation/errors";

type Row = Record<string, unknown>;

const EMOTIONS = [
  "anxious",
  "frustrated",
  "grateful",
  "confused",
  "distressed",
  "positive",
  "negative",
  "neutral"
] as const satisfies readonly EmotionLabel[];
const SENTIMENTS = ["Positive", "Negative", "Neutral"] as const satisfies readonly SentimentCategory[];
const URGENCIES = ["Critical", "High", "Medium", "Low"] as const satisfies readonly UrgencyCategory[];

function toNumber(value: unknown): number {
  const n = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  return Number.isFinite(n) ? n : 0;
}

function toText(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

function toTimestamp(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return toText(value);
}

function toStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonText(value: unknown): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
}

function pick<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((a) => a === value) ?? fallback;
}

export function restoreEvaluationRecord(row: Row, passThreshold: number): EvaluationRecord {
  const stored = parseJsonText(row.scores);
  const source = isRow(stored) && Object.keys(stored).length > 0 ? stored : row;
  const overall_score = toNumber(row.overall_score);
  return {
    conversation_id: String(row.conversation_id ?? ""),
    conversation_title: toText(row.conversation_title, DEFAULT_CONVERSATION_TITLE),
    timestamp: toTimestamp(row.timestamp),
    overall_score,
    scores: mapCriteria((name) => toNumber(source[name])),
    strengths: toStringArray(parseJsonText(row.strengths)),
    improvements: toStringArray(parseJsonText(row.improvements)),
    overall_assessment: toText(row.overall_assessment),
    passed: typeof row.passed === "boolean" ? row.passed : overall_score >= passThreshold,
    scoring_strategy: row.scoring_strategy === "delegated" ? "delegated" : "heuristic"
  };
}

export function restoreConversationAnalytics(row: Row): ConversationAnalyticsRecord {
  return {
    conversation_id: String(row.conversation_id ?? ""),
    conversation_title: toText(row.conversation_title, DEFAULT_CONVERSATION_TITLE),
    medical_sentiment: toNumber(row.medical_sentiment),
    urgency_level: toNumber(row.urgency_level),
    dominant_emotion: pick(row.dominant_emotion, EMOTIONS, "neutral"),
    complexity_score: toNumber(row.complexity_score),
    question_count: Math.trunc(toNumber(row.question_count)),
    sentiment_category: pick(row.sentiment_category, SENTIMENTS, "Neutral"),
    urgency_category: pick(row.urgency_category, URGENCIES, "Low"),
    overall_evaluation_score: Math.trunc(toNumber(row.overall_evaluation_score)),
    timestamp: toTimestamp(row.timestamp)
  };
}

const CountsSchema = <T extends string>(keys: readonly [T, ...T[]]) => z.record(z.enum(keys), z.number());

export const AnalyticsMetricsSchema = z.object({
  overall_stats: z.object({
    total_conversations: z.number(),
    avg_sentiment: z.number(),
    avg_urgency: z.number(),
    avg_complexity: z.number(),
    avg_questions: z.number()
  }),
  sentiment_distribution: CountsSchema(SENTIMENTS),
  emotion_distribution: CountsSchema(EMOTIONS),
  urgency_distribution: CountsSchema(URGENCIES),
  critical_conversations: z.number(),
  // Absent from snapshots stored before these counts existed.
  low_engagement: z.number().default(0),
  sentiment_outliers: z.number().default(0)
});

export const InsightSchema = z.object({
  type: z.enum(["warning", "alert", "info", "suggestion"]),
  category: z.string(),
  priority: z.enum(["critical", "high", "medium", "low"]),
  message: z.string()
});

export function restoreAnalysisResult(row: Row): AnalysisResultRecord {
  const analysisId = String(row.analysis_id ?? "");
  const metrics = AnalyticsMetricsSchema.safeParse(parseJsonText(row.metrics));
  const insights = z.array(InsightSchema).safeParse(parseJsonText(row.insights));
  if (!metrics.success || !insights.success) {
    throw new PersistenceError(`Stored analysis ${analysisId} is malformed`);
  }
  return {
    analysis_id: analysisId,
    timestamp: toTimestamp(row.timestamp),
    metrics: metrics.data,
    insights: insights.data,
    total_conversations_analyzed: Math.trunc(toNumber(row.total_conversations_analyzed))
  };
}
