/**
 * Conversation evaluation: scoring strategies, aggregation and batch runs.
 * To add a rubric: add a file in backend/src/eval/rubrics/ and register it in getRubricConfig.
 */

export { HeuristicScorer } from "./heuristicScorer";
export { DelegatedScorer } from "./delegatedScorer";
export { createOpenAITextGenerator } from "./textGenerator";
export type { TextGenerator, TextGenerationRequest } from "./textGenerator";
export { runEvaluationBatch } from "./batchProcessor";
export type { BatchSummary } from "./batchProcessor";
export type { ScoringStrategy } from "./types";
