/**
 * Insight rules over analytics metrics. Every rule is evaluated independently, in this order;
 * rules that do not fire emit nothing.
 */

import type { AnalyticsInsight, AnalyticsMetrics } from "../../../../packages/shared/src/types";

type InsightRule = (metrics: AnalyticsMetrics, total: number) => AnalyticsInsight | null;

function pct(count: number | undefined, total: number): number {
  return ((count ?? 0) / total) * 100;
}

const RULES: InsightRule[] = [
  (metrics, total) => {
    const negative = pct(metrics.sentiment_distribution.Negative, total);
    return negative > 30
      ? {
          type: "warning",
          category: "sentiment",
          priority: "high",
          message: `${negative.toFixed(1)}% of conversations show negative sentiment. Consider staff training on empathetic communication.`
        }
      : null;
  },
  (metrics, total) => {
    const { Critical = 0, High = 0 } = metrics.urgency_distribution;
    const urgent = pct(Critical + High, total);
    return urgent > 20
      ? {
          type: "alert",
          category: "urgency",
          priority: "critical",
          message: `${urgent.toFixed(1)}% of conversations are urgent/critical. Review triage protocols.`
        }
      : null;
  },
  (metrics, total) => {
    const positive = pct(metrics.sentiment_distribution.Positive, total);
    return positive > 50
      ? {
          type: "info",
          category: "quality",
          priority: "low",
          message: `${positive.toFixed(1)}% of patients express positive sentiment. Patient satisfaction is strong.`
        }
      : null;
  },
  (metrics) =>
    metrics.overall_stats.avg_complexity > 0.7
      ? {
          type: "suggestion",
          category: "complexity",
          priority: "medium",
          message: "Conversations show high complexity. Consider simplifying medical terminology."
        }
      : null,
  (metrics) =>
    metrics.overall_stats.avg_sentiment < -0.2
      ? {
          type: "warning",
          category: "sentiment_trend",
          priority: "high",
          message: "Overall conversation sentiment is negative. Consider reviewing agent responses for empathy and understanding."
        }
      : null
];

export function generateInsights(metrics: AnalyticsMetrics): AnalyticsInsight[] {
  const total = metrics.overall_stats.total_conversations;
  if (total === 0) return [];
  return RULES.map((rule) => rule(metrics, total)).filter((insight): insight is AnalyticsInsight => insight !== null);
}
