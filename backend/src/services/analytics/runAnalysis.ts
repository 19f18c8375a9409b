/**
 * Analytics run: signals per conversation → stored analytics records → metrics + insights snapshot.
 */

import { randomBytes } from "node:crypto";
import type { AnalysisResultRecord, BatchFailure } from "../../../../packages/shared/src/types";
import type { ResultStore } from "../../store/resultStore";
import type { ConversationRecord } from "../evaluation/types";
import type { SignalOptions } from "../signals/extractors";
import { DEFAULT_SIGNAL_OPTIONS } from "../signals/extractors";
import { analyzeConversation, computeAnalyticsMetrics } from "./conversationAnalytics";
import { generateInsights } from "./insights";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** analysis_YYYYMMDD_HHMMSS_<hex>; the suffix keeps runs within the same second distinct. */
export function createAnalysisId(now: Date, suffix: string = randomBytes(3).toString("hex")): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `analysis_${date}_${time}_${suffix}`;
}

export type AnalysisOptions = {
  signalOptions?: SignalOptions;
  now?: () => Date;
};

export type AnalysisRun = {
  analysis: AnalysisResultRecord;
  /** Per-conversation analytics writes that were rejected; the snapshot still covers them. */
  failures: BatchFailure[];
};

export async function runAnalysis(
  conversations: ConversationRecord[],
  store: ResultStore,
  options: AnalysisOptions = {}
): Promise<AnalysisRun> {
  const now = (options.now ?? (() => new Date()))();
  const timestamp = now.toISOString();
  const signalOptions = options.signalOptions ?? DEFAULT_SIGNAL_OPTIONS;

  const analyzable = conversations.filter((c) => c.text.trim() !== "");
  if (analyzable.length < conversations.length) {
    console.warn(`[analytics] Skipping ${conversations.length - analyzable.length} conversation(s) with empty text`);
  }

  const records = analyzable.map((c) => analyzeConversation(c, timestamp, signalOptions));
  const failures: BatchFailure[] = [];
  for (const record of records) {
    try {
      await store.putConversationAnalytics(record);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      console.error(`[analytics] Skipping ${record.conversation_id}: ${reason}`);
      failures.push({ conversation_id: record.conversation_id, reason });
    }
  }

  const metrics = computeAnalyticsMetrics(records);
  const analysis: AnalysisResultRecord = {
    analysis_id: createAnalysisId(now),
    timestamp,
    metrics,
    insights: generateInsights(metrics),
    total_conversations_analyzed: records.length
  };
  await store.putAnalysis(analysis);
  console.log(
    `[analytics] Stored ${analysis.analysis_id}: ${records.length} conversation(s), ${analysis.insights.length} insight(s), ${failures.length} write failure(s)`
  );
  return { analysis, failures };
}
