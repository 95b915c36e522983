import type { Candidate, RawMarket, Strategy } from "../src/types/index.js";

export const NOW = new Date("2026-03-01T12:00:00Z");
export const NOW_TS = NOW.getTime() / 1000;
export const DAY = 86_400;

export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  const marketId = overrides.marketId ?? "m1";
  return {
    marketId,
    question: `Will Russia capture town ${marketId}?`,
    priceYes: 0.5,
    volume: 10_000,
    cluster: "ukraine",
    daysToClose: 10,
    startTs: NOW_TS - 30 * DAY,
    endTs: NOW_TS + 10 * DAY,
    yesTokenId: `${marketId}-yes`,
    noTokenId: `${marketId}-no`,
    eventKey: `event-${marketId}`,
    structure: "",
    raw: { id: marketId, question: `Will Russia capture town ${marketId}?` },
    ...overrides,
  };
}

export function makeStrategy(overrides: Partial<Strategy> = {}): Strategy {
  return {
    id: "test",
    name: "Test",
    description: "",
    betSide: "NO",
    zone: { kind: "range", min: 0.4, max: 0.8 },
    minVolume: 0,
    maxVolume: Infinity,
    sizing: { kind: "fixed", betSize: 25 },
    priority: "price_high",
    deadlineMinDays: 3,
    deadlineMaxDays: null,
    eventCap: 3,
    excludeSeries: false,
    clusterFilter: null,
    bankroll: 1000,
    maxTotalExposurePct: 0.9,
    maxClusterExposurePct: 0.3,
    entryCostRate: 0.005,
    portfolioKey: "portfolio_test.json",
    ...overrides,
  };
}

export function makeRawMarket(overrides: Partial<RawMarket> = {}): RawMarket {
  return {
    id: "501",
    question: "Will Russia capture Kupiansk by June 30?",
    outcomes: '["Yes", "No"]',
    outcomePrices: '["0.55", "0.45"]',
    clobTokenIds: '["tok-yes", "tok-no"]',
    volume: "20000",
    startDate: "2026-02-01T00:00:00Z",
    endDate: "2026-03-21T12:00:00Z",
    slug: "russia-kupiansk",
    ...overrides,
  };
}
