/**
 * Aggregate statistics over stored evaluations. An empty set yields zeros, never NaN.
 */

import type {
  CriterionSummary,
  EvaluationRecord,
  EvaluationStats
} from "../../../../packages/shared/src/types";
import { mapCriteria } from "../evaluation/types";
import { round2 } from "../evaluation/aggregate";

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

// Stored sets can exceed the engine's argument limit, so no Math.min(...values).
function extent(values: number[]): { min: number; max: number } {
  if (values.length === 0) return { min: 0, max: 0 };
  return values.reduce(
    (acc, v) => ({ min: v < acc.min ? v : acc.min, max: v > acc.max ? v : acc.max }),
    { min: values[0], max: values[0] }
  );
}

function summarize(values: number[]): CriterionSummary {
  return { mean: round2(mean(values)), ...extent(values) };
}

export function computeEvaluationStats(records: EvaluationRecord[], passThreshold: number): EvaluationStats {
  const overall = records.map((r) => r.overall_score);
  const passedCount = overall.filter((score) => score >= passThreshold).length;
  const criteria = mapCriteria((name) => summarize(records.map((r) => r.scores[name])));
  const { min, max } = extent(overall);

  return {
    total_evaluations: records.length,
    average_score: round2(mean(overall)),
    pass_rate: records.length === 0 ? 0 : round2((passedCount / records.length) * 100),
    pass_threshold: passThreshold,
    highest_score: max,
    lowest_score: min,
    criteria_averages: mapCriteria((name) => criteria[name].mean),
    criteria
  };
}
