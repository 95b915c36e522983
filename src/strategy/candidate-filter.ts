// ============================================================
// Candidate Filter — per-strategy predicates over the shared pool
// ============================================================

import type { Candidate, Strategy } from "../types/index.js";
import { resolveZone } from "./zones.js";

export type FilterReason =
  | "volume"
  | "deadline"
  | "series"
  | "cluster"
  | "dead_zone"
  | "price";

/**
 * First predicate a candidate fails for this strategy, or null when it is
 * eligible. Reads only immutable data.
 */
export function ineligibilityReason(candidate: Candidate, strategy: Strategy): FilterReason | null {
  if (candidate.volume < strategy.minVolume || candidate.volume > strategy.maxVolume) return "volume";

  if (candidate.daysToClose < strategy.deadlineMinDays) return "deadline";
  if (strategy.deadlineMaxDays !== null && candidate.daysToClose > strategy.deadlineMaxDays) {
    return "deadline";
  }

  if (strategy.excludeSeries && candidate.structure === "series") return "series";

  if (strategy.clusterFilter !== null && !strategy.clusterFilter.includes(candidate.cluster)) {
    return "cluster";
  }

  const zone = resolveZone(strategy.zone, candidate.volume);
  if (zone === null) return "dead_zone";
  if (candidate.priceYes < zone.min || candidate.priceYes > zone.max) return "price";

  return null;
}

/** Eligible subset for one strategy, in input order */
export function filterCandidates(pool: readonly Candidate[], strategy: Strategy): Candidate[] {
  return pool.filter((c) => ineligibilityReason(c, strategy) === null);
}

/** Count of pool candidates failing each predicate (for scan diagnostics) */
export function filterBreakdown(
  pool: readonly Candidate[],
  strategy: Strategy
): Partial<Record<FilterReason, number>> {
  const counts: Partial<Record<FilterReason, number>> = {};
  for (const c of pool) {
    const reason = ineligibilityReason(c, strategy);
    if (reason) counts[reason] = (counts[reason] ?? 0) + 1;
  }
  return counts;
}
