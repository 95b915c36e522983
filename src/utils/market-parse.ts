// ============================================================
// Field parsing for raw Gamma market records
// ============================================================

import type { RawMarket, TokenIds } from "../types/index.js";

/**
 * Gamma returns list fields either as real arrays or as JSON-encoded
 * strings (`"[\"Yes\", \"No\"]"`). Anything unparseable is an empty list.
 */
export function parseJsonList(value: string | unknown[] | undefined): unknown[] {
  if (Array.isArray(value)) return value;
  if (typeof value !== "string" || value.trim() === "") return [];
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : [];
  } catch {
    return [];
  }
}

/** Strict numeric parse: finite numbers or numeric strings only */
export function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Parse an ISO date or epoch-seconds value into epoch seconds */
export function parseTimestamp(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;

  const trimmed = value.trim();
  if (trimmed === "") return null;
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);

  const ms = Date.parse(trimmed);
  return Number.isNaN(ms) ? null : ms / 1000;
}

export function parseMarketTimestamps(raw: RawMarket): { startTs: number | null; endTs: number | null } {
  return {
    startTs: parseTimestamp(raw.startDate) ?? parseTimestamp(raw.createdAt),
    endTs: parseTimestamp(raw.endDate),
  };
}

function yesIndex(outcomes: unknown[]): number {
  const idx = outcomes.findIndex((o) => typeof o === "string" && o.toLowerCase() === "yes");
  return idx >= 0 ? idx : 0;
}

/**
 * YES price of a market: the price at the "Yes" outcome when outcomes are
 * labelled, otherwise the first price. Returns null unless the value is a
 * single number strictly inside (0, 1).
 */
export function parseYesPrice(raw: RawMarket): number | null {
  const prices = parseJsonList(raw.outcomePrices);
  if (prices.length === 0) return null;

  const price = toNumber(prices[yesIndex(parseJsonList(raw.outcomes))]);
  if (price === null || price <= 0 || price >= 1) return null;
  return price;
}

export function parseVolume(raw: RawMarket): number {
  const volume = toNumber(raw.volume);
  return volume !== null && volume > 0 ? volume : 0;
}

/** Extract YES / NO instrument ids; missing sides come back as "" */
export function resolveTokenIds(raw: RawMarket): TokenIds {
  const ids = parseJsonList(raw.clobTokenIds).map((id) => String(id));
  const outcomes = parseJsonList(raw.outcomes);
  const tokens: TokenIds = { yes: "", no: "" };

  outcomes.forEach((outcome, i) => {
    if (i >= ids.length || typeof outcome !== "string") return;
    const label = outcome.toLowerCase();
    if (label === "yes") tokens.yes = ids[i];
    else if (label === "no") tokens.no = ids[i];
  });

  // Binary markets without Yes/No labels
  if (!tokens.yes && !tokens.no && ids.length === 2) {
    tokens.yes = ids[0];
    tokens.no = ids[1];
  }

  return tokens;
}

/** Event grouping key and structure tag derived from the record */
export function parseGrouping(raw: RawMarket): { eventKey: string; structure: "series" | "" } {
  const groupTitle = typeof raw.groupItemTitle === "string" ? raw.groupItemTitle : "";
  const slug = typeof raw.slug === "string" ? raw.slug : "";
  return {
    eventKey: groupTitle || slug || "",
    structure: groupTitle ? "series" : "",
  };
}
