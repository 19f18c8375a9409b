import jwt from "jsonwebtoken";
import type {
  AnalysisResultRecord,
  ConversationAnalyticsRecord,
  EvaluationDraft,
  EvaluationRecord
} from "../../packages/shared/src/types";
import type { ResultStore } from "../src/store/resultStore";
import { sortNewestFirst } from "../src/store/resultStore";
import { PersistenceError } from "../src/services/evaluation/errors";
import type { TextGenerator } from "../src/services/evaluation/textGenerator";
import type { ConversationRecord } from "../src/services/evaluation/types";
import { getRubricConfig, type RubricConfig } from "../src/eval/rubrics/types";

export const TEST_JWT_SECRET = "test-secret";

export function authHeader(): string {
  const token = jwt.sign({ sub: "user-1", email: "reviewer@example.com" }, TEST_JWT_SECRET, {
    algorithm: "HS256",
    expiresIn: "1h"
  });
  return `Bearer ${token}`;
}

export function testRubric(): RubricConfig {
  const rubric = getRubricConfig("voice-agent-v1");
  if (!rubric) throw new Error("voice-agent-v1 rubric missing");
  return rubric;
}

/** Clock that advances one second per call from 2025-01-01T00:00:00Z. */
export function steppingClock(start = Date.UTC(2025, 0, 1)): () => Date {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}

/** In-process ResultStore; ids in failOn make putEvaluation and putConversationAnalytics reject. */
export class InMemoryResultStore implements ResultStore {
  readonly evaluations = new Map<string, EvaluationRecord>();
  readonly analytics = new Map<string, ConversationAnalyticsRecord>();
  readonly analyses = new Map<string, AnalysisResultRecord>();

  constructor(
    private readonly clock: () => Date = steppingClock(),
    private readonly failOn: Set<string> = new Set()
  ) {}

  async putEvaluation(draft: EvaluationDraft): Promise<EvaluationRecord> {
    if (this.failOn.has(draft.conversation_id)) {
      throw new PersistenceError(`Failed to store evaluation ${draft.conversation_id}: write rejected`);
    }
    const record: EvaluationRecord = { ...draft, timestamp: this.clock().toISOString() };
    this.evaluations.set(record.conversation_id, record);
    return record;
  }

  async getEvaluation(conversationId: string): Promise<EvaluationRecord | null> {
    return this.evaluations.get(conversationId) ?? null;
  }

  async listEvaluations(): Promise<EvaluationRecord[]> {
    return sortNewestFirst([...this.evaluations.values()]);
  }

  async putConversationAnalytics(record: ConversationAnalyticsRecord): Promise<void> {
    if (this.failOn.has(record.conversation_id)) {
      throw new PersistenceError(`Failed to store analytics for ${record.conversation_id}: write rejected`);
    }
    this.analytics.set(record.conversation_id, record);
  }

  async listConversationAnalytics(): Promise<ConversationAnalyticsRecord[]> {
    return sortNewestFirst([...this.analytics.values()]);
  }

  async putAnalysis(result: AnalysisResultRecord): Promise<void> {
    this.analyses.set(result.analysis_id, result);
  }

  async getAnalysis(analysisId: string): Promise<AnalysisResultRecord | null> {
    return this.analyses.get(analysisId) ?? null;
  }

  async listAnalyses(): Promise<AnalysisResultRecord[]> {
    return sortNewestFirst([...this.analyses.values()]);
  }
}

export function stubGenerator(reply: string | (() => Promise<string>)): TextGenerator & { calls: number } {
  const generator = {
    calls: 0,
    async generate() {
      generator.calls++;
      return typeof reply === "string" ? reply : reply();
    }
  };
  return generator;
}

export function validDelegatedReply(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    intent_recognition: 0.9,
    response_correctness: 0.85,
    error_handling: 0.8,
    tone_appropriateness: 0.9,
    safety_compliance: 0.85,
    conversation_flow: 0.8,
    overall_assessment: "Clear and safe handling of the booking request.",
    strengths: ["Confirms the caller's need"],
    improvements: ["Offer a specific time slot"],
    ...overrides
  });
}

export function conversation(id: string, text: string, title = `Conversation ${id}`): ConversationRecord {
  return { id, title, text };
}

export const BOOKING_TRANSCRIPT =
  "User: I need to book an appointment\nAgent: I understand, I'd be happy to help. Please tell me a date, thank you.";
