/**
 * Rubric config for conversation evaluation.
 *
 * To add a rubric: (1) add a file in this directory exporting a RubricConfig;
 * (2) register it in getRubricConfig() below by schemaVersion.
 * Weights must sum to 1.0; a rubric that does not is rejected before any conversation is scored.
 */

import { z } from "zod";
import type { CriterionName } from "../../services/evaluation/types";
import { CRITERION_NAMES } from "../../services/evaluation/types";
import { RubricConfigurationError } from "../../services/evaluation/errors";

export const WEIGHT_SUM_EPSILON = 1e-6;

export type CriterionConfig = {
  weight: number;
  /** Per-criterion cutoff on the 0-1 scale; informs strengths/improvements, not pass/fail. */
  threshold: number;
  description: string;
};

export type RubricConfig = {
  schemaVersion: string;
  /** Overall pass cutoff on the 0-100 scale. */
  passThreshold: number;
  criteria: Record<CriterionName, CriterionConfig>;
};

const CriterionConfigSchema = z.object({
  weight: z.number().gt(0).lte(1),
  threshold: z.number().min(0).max(1),
  description: z.string()
});

const RubricConfigSchema = z.object({
  schemaVersion: z.string().min(1),
  passThreshold: z.number().min(0).max(100),
  criteria: z
    .object({
      intent_recognition: CriterionConfigSchema,
      response_correctness: CriterionConfigSchema,
      error_handling: CriterionConfigSchema,
      tone_appropriateness: CriterionConfigSchema,
      safety_compliance: CriterionConfigSchema,
      conversation_flow: CriterionConfigSchema
    })
    .strict()
});

/** Validate an untrusted rubric (e.g. from JSON). Unknown criteria and bad weight sums are rejected. */
export function parseRubricConfig(input: unknown): RubricConfig {
  const parsed = RubricConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issueText = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new RubricConfigurationError(`Invalid rubric: ${issueText}`);
  }
  const rubric = parsed.data;
  const weightSum = CRITERION_NAMES.reduce((sum, name) => sum + rubric.criteria[name].weight, 0);
  if (Math.abs(weightSum - 1) > WEIGHT_SUM_EPSILON) {
    throw new RubricConfigurationError(
      `Rubric ${rubric.schemaVersion} weights sum to ${weightSum}, expected 1.0`
    );
  }
  return rubric;
}

import { VOICE_AGENT_V1_RUBRIC } from "./voice-agent-v1";

export function getRubricConfig(schemaVersion: string): RubricConfig | null {
  switch (schemaVersion) {
    case "voice-agent-v1":
      return parseRubricConfig(VOICE_AGENT_V1_RUBRIC);
    default:
      return null;
  }
}
