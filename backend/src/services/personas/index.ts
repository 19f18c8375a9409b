/**
 * Test personas: each prompt runs through the reference agent and becomes a single-turn
 * ConversationRecord that either scoring strategy can evaluate.
 */

import { z } from "zod";
import type {
  EvaluationRecord,
  PersonaRunSummary,
  PersonaSummary
} from "../../../../packages/shared/src/types";
import { round2 } from "../evaluation/aggregate";
import type { ConversationRecord } from "../evaluation/types";
import { referenceAgentReply } from "./referenceAgent";
import catalogue from "./personas.json";

export { referenceAgentReply } from "./referenceAgent";
export type { AgentReply } from "./referenceAgent";

const PersonaSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  characteristics: z.array(z.string()),
  test_prompts: z.array(z.string().min(1)).min(1)
});

export const PERSONAS: PersonaSummary[] = z.array(PersonaSchema).parse(catalogue);

export class UnknownPersonaError extends Error {
  constructor(public personaIds: string[]) {
    super(`Unknown persona(s): ${personaIds.join(", ")}`);
    this.name = "UnknownPersonaError";
  }
}

export function selectPersonas(ids?: string[]): PersonaSummary[] {
  if (!ids || ids.length === 0) return PERSONAS;
  const unknown = ids.filter((id) => !PERSONAS.some((p) => p.id === id));
  if (unknown.length > 0) throw new UnknownPersonaError(unknown);
  return PERSONAS.filter((p) => ids.includes(p.id));
}

export function buildPersonaConversations(ids?: string[]): ConversationRecord[] {
  return selectPersonas(ids).flatMap((persona) =>
    persona.test_prompts.map((prompt, i): ConversationRecord => {
      const reply = referenceAgentReply(prompt);
      return {
        id: `persona_${persona.id}_${i + 1}`,
        title: `${persona.name} #${i + 1}`,
        text: `User: ${prompt}\nAgent: ${reply.response}`,
        turn: {
          user_input: prompt,
          agent_response: reply.response,
          persona: persona.id,
          intent: reply.intent,
          confidence: reply.confidence
        }
      };
    })
  );
}

/** Pass count and mean scores over the evaluated persona prompts, grouped by `turn.persona`. */
export function summarizePersonaRun(
  conversations: ConversationRecord[],
  results: EvaluationRecord[]
): PersonaRunSummary {
  const personaById = new Map(conversations.map((c) => [c.id, c.turn?.persona ?? "unknown"]));
  const byPersona = new Map<string, number[]>();
  for (const result of results) {
    const persona = personaById.get(result.conversation_id) ?? "unknown";
    byPersona.set(persona, [...(byPersona.get(persona) ?? []), result.overall_score]);
  }

  const mean = (scores: number[]) =>
    scores.length === 0 ? 0 : round2(scores.reduce((sum, s) => sum + s, 0) / scores.length);
  const passed = results.filter((r) => r.passed).length;

  return {
    total: results.length,
    passed,
    pass_rate: results.length === 0 ? 0 : round2((passed / results.length) * 100),
    average_score: mean(results.map((r) => r.overall_score)),
    persona_averages: Object.fromEntries([...byPersona].map(([persona, scores]) => [persona, mean(scores)]))
  };
}
