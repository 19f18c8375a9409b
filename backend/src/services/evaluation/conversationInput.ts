/**
 * Submitted rows → ConversationRecord. Accepts the export column aliases:
 * conversation_id | id, conversation_title | title, conversation | conversation_text | text.
 */

import { z } from "zod";
import type { ConversationRecord } from "./types";
import { DEFAULT_CONVERSATION_TITLE } from "./types";

const Scalar = z.union([z.string(), z.number()]).nullish();

export const ConversationInputSchema = z.object({
  conversation_id: Scalar,
  id: Scalar,
  conversation_title: Scalar,
  title: Scalar,
  conversation: Scalar,
  conversation_text: Scalar,
  text: Scalar
});

export type ConversationInput = z.infer<typeof ConversationInputSchema>;

function firstPresent(...values: unknown[]): string | null {
  for (const value of values) {
    if (typeof value === "number") return String(value);
    if (typeof value === "string" && value.trim() !== "") return value;
  }
  return null;
}

/** rowNumber is 1-based and only used when the row carries no id. */
export function normalizeConversationInput(raw: ConversationInput, rowNumber: number): ConversationRecord {
  return {
    id: firstPresent(raw.conversation_id, raw.id) ?? `conv_${rowNumber}`,
    title: firstPresent(raw.conversation_title, raw.title) ?? DEFAULT_CONVERSATION_TITLE,
    text: firstPresent(raw.conversation, raw.conversation_text, raw.text) ?? ""
  };
}
