import type { ScoringStrategy, ScoringStrategyKind } from "./types";
import { DelegatedScorerUnavailableError } from "./errors";

/** The delegated entry is null when no external text generator is configured. */
export type StrategyRegistry = {
  heuristic: ScoringStrategy;
  delegated: ScoringStrategy | null;
};

export function resolveStrategy(registry: StrategyRegistry, kind: ScoringStrategyKind): ScoringStrategy {
  if (kind === "heuristic") return registry.heuristic;
  if (!registry.delegated) throw new DelegatedScorerUnavailableError();
  return registry.delegated;
}
