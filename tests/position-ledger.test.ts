import { describe, expect, it } from "vitest";
import { PositionLedger, newPortfolio, sidePrice } from "../src/agent/position-ledger.js";
import { TradeSelector } from "../src/risk/trade-selector.js";
import { createSilentLogger } from "../src/utils/logger.js";
import { NOW, makeCandidate, makeStrategy } from "./helpers.js";

const logger = createSilentLogger();

function freshLedger(overrides: Parameters<typeof makeStrategy>[0] = {}) {
  const strategy = makeStrategy(overrides);
  return { strategy, ledger: new PositionLedger(newPortfolio(strategy, NOW), logger) };
}

describe("newPortfolio", () => {
  it("starts with the full bankroll and no history", () => {
    const portfolio = newPortfolio(makeStrategy({ id: "alpha", bankroll: 750 }), NOW);
    expect(portfolio).toEqual({
      strategyId: "alpha",
      bankrollInitial: 750,
      bankrollCurrent: 750,
      entryCostRate: 0.005,
      totalTrades: 0,
      wins: 0,
      losses: 0,
      totalPnl: 0,
      positions: [],
      createdAt: "2026-03-01T12:00:00.000Z",
      lastUpdated: "2026-03-01T12:00:00.000Z",
    });
  });
});

describe("sidePrice", () => {
  it("mirrors the YES price for NO bets", () => {
    expect(sidePrice("YES", 0.25)).toBe(0.25);
    expect(sidePrice("NO", 0.25)).toBe(0.75);
  });
});

describe("PositionLedger.open", () => {
  it("records a NO position net of the entry cost", () => {
    const { strategy, ledger } = freshLedger();
    const position = ledger.open(makeCandidate({ marketId: "a" }), strategy, 25, NOW);

    expect(position).not.toBeNull();
    expect(position?.tokenId).toBe("a-no");
    expect(position?.entryPrice).toBe(0.5);
    expect(position?.shares).toBeCloseTo(49.75, 10);
    expect(position?.expectedClose).toBe("2026-03-11");
    expect(position?.status).toBe("open");
    expect(ledger.portfolio.totalTrades).toBe(1);
    expect(ledger.cashAvailable()).toBe(975);
  });

  it("uses the YES token and price for YES strategies", () => {
    const { strategy, ledger } = freshLedger({ betSide: "YES" });
    const position = ledger.open(makeCandidate({ marketId: "a", priceYes: 0.6 }), strategy, 25, NOW);
    expect(position?.tokenId).toBe("a-yes");
    expect(position?.entryPrice).toBe(0.6);
  });

  it("refuses a stake larger than the available cash", () => {
    const { strategy, ledger } = freshLedger({ bankroll: 20 });
    expect(ledger.open(makeCandidate(), strategy, 25, NOW)).toBeNull();
    expect(ledger.portfolio.positions).toEqual([]);
  });
});

describe("PositionLedger settlement", () => {
  it("pays out a winning NO position", () => {
    const { strategy, ledger } = freshLedger();
    ledger.open(makeCandidate({ marketId: "a" }), strategy, 25, NOW);

    const pnl = ledger.settle("a", "no", NOW);
    expect(pnl).toBeCloseTo(24.75, 10);
    expect(ledger.portfolio.wins).toBe(1);
    expect(ledger.portfolio.bankrollCurrent).toBeCloseTo(1024.75, 10);
    expect(ledger.portfolio.positions[0].status).toBe("resolved-win");
    expect(ledger.openPositions()).toEqual([]);
  });

  it("forfeits the stake on a loss", () => {
    const { strategy, ledger } = freshLedger();
    ledger.open(makeCandidate({ marketId: "a" }), strategy, 25, NOW);

    expect(ledger.settle("a", "yes", NOW)).toBe(-25);
    expect(ledger.portfolio.losses).toBe(1);
    expect(ledger.portfolio.bankrollCurrent).toBe(975);
    expect(ledger.portfolio.totalPnl).toBe(-25);
    expect(ledger.portfolio.positions[0].closeDate).toBe(NOW.toISOString());
  });

  it("returns null for markets without an open position", () => {
    const { ledger } = freshLedger();
    expect(ledger.settle("missing", "no", NOW)).toBeNull();
  });

  it("closes manually at the side price minus the exit cost", () => {
    const { strategy, ledger } = freshLedger();
    ledger.open(makeCandidate({ marketId: "a" }), strategy, 25, NOW);

    // 49.75 shares x 0.70 x 0.995 - 25
    expect(ledger.closeManually("a", 0.3, NOW)).toBeCloseTo(9.650875, 6);
    expect(ledger.portfolio.positions[0].status).toBe("manually-closed");
    expect(ledger.portfolio.positions[0].currentPrice).toBeCloseTo(0.7, 10);
    expect(ledger.portfolio.wins + ledger.portfolio.losses).toBe(0);
  });
});

describe("PositionLedger views", () => {
  it("marks open positions to the latest price", () => {
    const { strategy, ledger } = freshLedger();
    ledger.open(makeCandidate({ marketId: "a" }), strategy, 25, NOW);
    ledger.open(makeCandidate({ marketId: "b" }), strategy, 25, NOW);

    expect(ledger.markPrices(new Map([["a", 0.25]]))).toBe(1);
    expect(ledger.portfolio.positions[0].priceYesCurrent).toBe(0.25);
    expect(ledger.portfolio.positions[0].currentPrice).toBe(0.75);
    expect(ledger.portfolio.positions[1].currentPrice).toBe(0.5);
  });

  it("finds open positions by id or question text", () => {
    const { strategy, ledger } = freshLedger();
    ledger.open(makeCandidate({ marketId: "a", question: "Will Iran strike Israel?" }), strategy, 25, NOW);
    ledger.open(makeCandidate({ marketId: "b", question: "Will China blockade Taiwan?" }), strategy, 25, NOW);

    expect(ledger.findOpen("b").map((p) => p.marketId)).toEqual(["b"]);
    expect(ledger.findOpen("TAIWAN").map((p) => p.marketId)).toEqual(["b"]);
    expect(ledger.findOpen("will").map((p) => p.marketId)).toEqual(["a", "b"]);
  });

  it("summarizes results", () => {
    const { strategy, ledger } = freshLedger();
    for (const id of ["a", "b", "c"]) {
      ledger.open(makeCandidate({ marketId: id, cluster: id === "c" ? "mideast" : "ukraine" }), strategy, 25, NOW);
    }
    ledger.settle("a", "yes", NOW);
    ledger.settle("b", "no", NOW);

    const summary = ledger.summary();
    expect(summary.winRate).toBe(0.5);
    expect(summary.closedTrades).toBe(2);
    expect(summary.openPositions).toBe(1);
    expect(summary.exposure).toEqual({ total: 25, byCluster: { mideast: 25 } });
  });
});

describe("PositionLedger and selector agree", () => {
  it("ends in the state the selector simulated", () => {
    const strategy = makeStrategy({ eventCap: 1 });
    const ledger = new PositionLedger(newPortfolio(strategy, NOW), logger);
    ledger.open(makeCandidate({ marketId: "held", eventKey: "shared" }), strategy, 25, NOW);

    const ranked = [
      makeCandidate({ marketId: "held", eventKey: "shared" }),
      makeCandidate({ marketId: "x", eventKey: "shared" }),
      makeCandidate({ marketId: "y", cluster: "mideast" }),
      makeCandidate({ marketId: "z", cluster: "china" }),
    ];
    const result = new TradeSelector(logger).select(ranked, strategy, ledger.selectionState());
    for (const { candidate, betSize } of result.accepted) {
      expect(ledger.open(candidate, strategy, betSize, NOW)).not.toBeNull();
    }

    expect(result.accepted.map((t) => t.candidate.marketId)).toEqual(["y", "z"]);
    expect(ledger.selectionState()).toEqual(result.state);
  });
});
