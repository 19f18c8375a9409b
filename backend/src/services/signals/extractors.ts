/**
 * Deterministic signal extraction from a conversation transcript (lexicon/keyword rules only).
 * Every extractor is total: empty or missing text yields the neutral value.
 */

import type {
  EmotionLabel,
  SentimentCategory,
  UrgencyCategory
} from "../../../../packages/shared/src/types";
import lexicons from "./lexicons.json";

export type ComplexityVariant = "readability" | "domain_density";
export type UrgencyVariant = "keyword" | "weighted";

export type SignalOptions = {
  complexity: ComplexityVariant;
  urgency: UrgencyVariant;
};

export const DEFAULT_SIGNAL_OPTIONS: SignalOptions = {
  complexity: "domain_density",
  urgency: "keyword"
};

export type SignalBundle = {
  polarity: number;
  urgency: number;
  emotion: EmotionLabel;
  complexity: number;
  question_count: number;
};

// First match wins; transcripts often hit several sets.
const EMOTION_PRECEDENCE = ["anxious", "frustrated", "grateful", "confused", "distressed"] as const;

function present(input: string | null | undefined): string | null {
  return input == null || input.trim() === "" ? null : input;
}

function tokenize(text: string): string[] {
  return text.trim().split(/\s+/).filter(Boolean);
}

function countTermHits(lower: string, terms: readonly string[]): number {
  return terms.filter((term) => lower.includes(term)).length;
}

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

/** (positive hits - negative hits) / word count, in [-1, 1]. */
export function extractPolarity(input: string | null | undefined): number {
  const text = present(input);
  if (text === null) return 0;
  const lower = text.toLowerCase();
  const positive = countTermHits(lower, lexicons.positive);
  const negative = countTermHits(lower, lexicons.negative);
  return clamp((positive - negative) / Math.max(tokenize(text).length, 1), -1, 1);
}

export function extractUrgency(
  input: string | null | undefined,
  variant: UrgencyVariant = DEFAULT_SIGNAL_OPTIONS.urgency
): number {
  const text = present(input);
  if (text === null) return 0;
  const hits = countTermHits(text.toLowerCase(), lexicons.urgency);
  if (variant === "keyword") {
    return Math.min(hits / 3, 1);
  }
  const exclamations = (text.match(/!/g) ?? []).length;
  const capsRatio = (text.match(/\p{Lu}/gu) ?? []).length / Math.max(text.length, 1);
  return clamp(hits * 0.6 + exclamations * 0.2 + capsRatio * 0.2, 0, 1);
}

export function extractEmotion(input: string | null | undefined, polarity?: number): EmotionLabel {
  const text = present(input);
  if (text === null) return "neutral";
  const lower = text.toLowerCase();
  for (const emotion of EMOTION_PRECEDENCE) {
    if (countTermHits(lower, lexicons.emotions[emotion]) > 0) return emotion;
  }
  const p = polarity ?? extractPolarity(text);
  if (p > 0) return "positive";
  if (p < 0) return "negative";
  return "neutral";
}

export function extractComplexity(
  input: string | null | undefined,
  variant: ComplexityVariant = DEFAULT_SIGNAL_OPTIONS.complexity
): number {
  const text = present(input);
  if (text === null) return 0;
  const words = tokenize(text);
  if (variant === "readability") {
    const avgWordLength = words.reduce((sum, w) => sum + w.length, 0) / words.length;
    const sentences = Math.max(text.split(/[.!?]/).filter((s) => s.trim() !== "").length, 1);
    const wordsPerSentence = words.length / sentences;
    return Math.min((avgWordLength / 10 + wordsPerSentence / 20) / 2, 1);
  }
  const sentenceMarks = (text.match(/[.!?]/g) ?? []).length;
  const domainHits = countTermHits(text.toLowerCase(), lexicons.domainTerms);
  return Math.min((words.length / 100 + sentenceMarks / 10 + domainHits / 5) / 3, 1);
}

export function countQuestions(input: string | null | undefined): number {
  const text = present(input);
  if (text === null) return 0;
  return (text.match(/\?/g) ?? []).length;
}

export function extractSignals(
  text: string | null | undefined,
  options: SignalOptions = DEFAULT_SIGNAL_OPTIONS
): SignalBundle {
  const polarity = extractPolarity(text);
  return {
    polarity,
    urgency: extractUrgency(text, options.urgency),
    emotion: extractEmotion(text, polarity),
    complexity: extractComplexity(text, options.complexity),
    question_count: countQuestions(text)
  };
}

// Boundaries are exclusive: exactly 0.3 is Neutral.
export function categorizeSentiment(polarity: number): SentimentCategory {
  if (polarity > 0.3) return "Positive";
  if (polarity < -0.3) return "Negative";
  return "Neutral";
}

export function categorizeUrgency(urgency: number): UrgencyCategory {
  if (urgency > 0.7) return "Critical";
  if (urgency > 0.4) return "High";
  if (urgency > 0.2) return "Medium";
  return "Low";
}
