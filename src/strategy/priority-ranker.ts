import type { Candidate, KnownPriority } from "../types/index.js";

const KNOWN_PRIORITIES: readonly KnownPriority[] = ["price_high", "volume_low", "rotation"];

export function isKnownPriority(policy: string): policy is KnownPriority {
  return KNOWN_PRIORITIES.some((p) => p === policy);
}

/**
 * Composite rotation score, lower is better. Rewards low volume, short
 * time to resolution and high YES price; each term is capped at 100.
 */
export function rotationScore(candidate: Candidate): number {
  const volumeTerm = Math.min(candidate.volume / 5000, 100);
  const deadlineTerm = Math.min(candidate.daysToClose, 100);
  const priceTerm = (1 - candidate.priceYes) * 100;
  return volumeTerm + deadlineTerm + priceTerm;
}

const COMPARATORS: Record<KnownPriority, (a: Candidate, b: Candidate) => number> = {
  price_high: (a, b) => b.priceYes - a.priceYes,
  volume_low: (a, b) => a.volume - b.volume,
  rotation: (a, b) => rotationScore(a) - rotationScore(b),
};

/**
 * Order candidates by priority policy. Array.prototype.sort is stable, so
 * ties keep their input order. Unknown policies return the input order.
 */
export function rankCandidates(candidates: readonly Candidate[], policy: string): Candidate[] {
  if (!isKnownPriority(policy)) return [...candidates];
  return [...candidates].sort(COMPARATORS[policy]);
}
