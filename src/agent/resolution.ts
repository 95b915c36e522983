import type { Outcome, RawMarket } from "../types/index.js";
import { parseJsonList, toNumber } from "../utils/market-parse.js";

function isTruthyFlag(value: boolean | string | null | undefined): boolean {
  return value === true || value === "true";
}

// One side trading at >= 0.99 against <= 0.01 on the other
function settledByPrice(raw: RawMarket): Outcome | null {
  const prices = parseJsonList(raw.outcomePrices);
  const outcomes = parseJsonList(raw.outcomes);
  if (prices.length < 2) return null;

  const p0 = toNumber(prices[0]);
  const p1 = toNumber(prices[1]);
  if (p0 === null || p1 === null) return null;

  const label = (i: number) => String(outcomes[i] ?? "").toLowerCase();

  if (p0 >= 0.99 && p1 <= 0.01) {
    if (outcomes.length > 0) return label(0) === "yes" ? "yes" : "no";
    return "yes";
  }
  if (p1 >= 0.99 && p0 <= 0.01) {
    if (outcomes.length > 1) return label(1) === "no" ? "no" : "yes";
    return "no";
  }
  return null;
}

/**
 * Which side a market resolved to, or null while it is still open or when
 * a closed market carries no usable outcome (e.g. cancelled).
 *
 * An explicit outcome field wins, then settled prices. Resolution text is
 * only consulted when neither is conclusive, and only as a whole word.
 */
export function resolveOutcome(raw: RawMarket): Outcome | null {
  if (!isTruthyFlag(raw.closed) && !isTruthyFlag(raw.resolved)) return null;

  if (raw.outcome !== null && raw.outcome !== undefined) {
    const text = String(raw.outcome).toLowerCase();
    if (text === "yes" || text === "1" || text === "true") return "yes";
    if (text === "no" || text === "0" || text === "false") return "no";
  }

  const byPrice = settledByPrice(raw);
  if (byPrice !== null) return byPrice;

  const resolutionText = (raw.resolutionSource || raw.resolution || "").toLowerCase();
  if (/\byes\b/.test(resolutionText)) return "yes";
  if (/\bno\b/.test(resolutionText)) return "no";
  return null;
}
