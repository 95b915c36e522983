// ============================================================
// Position Ledger — paper positions, exposure and settlement
// ============================================================

import type {
  BetSide,
  Candidate,
  ExposureSummary,
  Outcome,
  Portfolio,
  PortfolioSummary,
  Position,
  SelectionState,
  Strategy,
} from "../types/index.js";
import type { Logger } from "../utils/logger.js";

export function newPortfolio(strategy: Strategy, now: Date = new Date()): Portfolio {
  const ts = now.toISOString();
  return {
    strategyId: strategy.id,
    bankrollInitial: strategy.bankroll,
    bankrollCurrent: strategy.bankroll,
    entryCostRate: strategy.entryCostRate,
    totalTrades: 0,
    wins: 0,
    losses: 0,
    totalPnl: 0,
    positions: [],
    createdAt: ts,
    lastUpdated: ts,
  };
}

/** Price of the bet side given the YES price */
export function sidePrice(side: BetSide, priceYes: number): number {
  return side === "NO" ? 1 - priceYes : priceYes;
}

export class PositionLedger {
  private state: Portfolio;
  private logger: Logger;

  constructor(portfolio: Portfolio, logger: Logger) {
    this.state = portfolio;
    this.logger = logger;
  }

  get portfolio(): Portfolio {
    return this.state;
  }

  openPositions(): Position[] {
    return this.state.positions.filter((p) => p.status === "open");
  }

  /** Open positions whose market id equals the search or whose question contains it */
  findOpen(search: string): Position[] {
    const needle = search.toLowerCase();
    return this.openPositions().filter(
      (p) => p.marketId === search || p.question.toLowerCase().includes(needle)
    );
  }

  exposure(): ExposureSummary {
    const byCluster: Record<string, number> = {};
    let total = 0;
    for (const p of this.openPositions()) {
      total += p.stake;
      byCluster[p.cluster] = (byCluster[p.cluster] ?? 0) + p.stake;
    }
    return { total, byCluster };
  }

  cashAvailable(): number {
    return this.state.bankrollCurrent - this.exposure().total;
  }

  heldMarketIds(): Set<string> {
    return new Set(this.openPositions().map((p) => p.marketId));
  }

  openCountByEvent(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const p of this.openPositions()) {
      counts[p.eventKey] = (counts[p.eventKey] ?? 0) + 1;
    }
    return counts;
  }

  /** Starting point for the selector's simulation */
  selectionState(): SelectionState {
    const { total, byCluster } = this.exposure();
    return {
      cashAvailable: this.state.bankrollCurrent - total,
      totalExposure: total,
      exposureByCluster: byCluster,
      heldMarketIds: this.heldMarketIds(),
      openByEvent: this.openCountByEvent(),
    };
  }

  /** Materialize an accepted selection as an open position */
  open(candidate: Candidate, strategy: Strategy, stake: number, now: Date = new Date()): Position | null {
    const cash = this.cashAvailable();
    if (stake > cash) {
      this.logger.warn(
        `[${strategy.id}] Insufficient cash for ${candidate.marketId}: need $${stake.toFixed(2)}, have $${cash.toFixed(2)}`
      );
      return null;
    }

    const entryPrice = sidePrice(strategy.betSide, candidate.priceYes);
    const position: Position = {
      marketId: candidate.marketId,
      question: candidate.question,
      tokenId: strategy.betSide === "NO" ? candidate.noTokenId : candidate.yesTokenId,
      betSide: strategy.betSide,
      entryPrice,
      currentPrice: entryPrice,
      priceYesCurrent: candidate.priceYes,
      stake,
      shares: (stake * (1 - strategy.entryCostRate)) / entryPrice,
      status: "open",
      entryCostRate: strategy.entryCostRate,
      eventKey: candidate.eventKey,
      cluster: candidate.cluster,
      expectedClose: new Date(candidate.endTs * 1000).toISOString().slice(0, 10),
      entryDate: now.toISOString(),
      closeDate: null,
      pnl: null,
    };

    this.state.positions.push(position);
    this.state.totalTrades++;

    this.logger.info(
      `[PAPER] [${strategy.id}] BUY ${position.betSide} @ ${(entryPrice * 100).toFixed(1)}¢ ` +
        `$${stake.toFixed(2)} [${position.cluster}] ${candidate.question.slice(0, 60)}`
    );
    return position;
  }

  /** Refresh mark prices of open positions; returns how many were updated */
  markPrices(priceYesById: ReadonlyMap<string, number>): number {
    let updated = 0;
    for (const p of this.openPositions()) {
      const priceYes = priceYesById.get(p.marketId);
      if (priceYes === undefined) continue;
      p.priceYesCurrent = priceYes;
      p.currentPrice = sidePrice(p.betSide, priceYes);
      updated++;
    }
    return updated;
  }

  /**
   * Settle an open position on a resolved market. A win pays $1 per share;
   * a loss forfeits the stake. Returns the realized P&L, or null when no
   * open position exists for the market.
   */
  settle(marketId: string, outcome: Outcome, now: Date = new Date()): number | null {
    const position = this.openPositions().find((p) => p.marketId === marketId);
    if (!position) return null;

    const won = (position.betSide === "NO") === (outcome === "no");
    const pnl = won ? position.shares - position.stake : -position.stake;

    position.status = won ? "resolved-win" : "resolved-loss";
    if (won) this.state.wins++;
    else this.state.losses++;
    this.realize(position, pnl, now);

    this.logger.info(
      `[PAPER] [${this.state.strategyId}] Settled ${marketId}: ${outcome.toUpperCase()} → ` +
        `P&L: ${pnl >= 0 ? "+" : ""}$${pnl.toFixed(2)}`
    );
    return pnl;
  }

  /** Sell an open position at the given YES price, paying the exit cost */
  closeManually(marketId: string, priceYes: number, now: Date = new Date()): number | null {
    const position = this.openPositions().find((p) => p.marketId === marketId);
    if (!position) return null;

    const proceeds = position.shares * sidePrice(position.betSide, priceYes) * (1 - position.entryCostRate);
    const pnl = proceeds - position.stake;

    position.status = "manually-closed";
    position.priceYesCurrent = priceYes;
    position.currentPrice = sidePrice(position.betSide, priceYes);
    this.realize(position, pnl, now);

    this.logger.info(
      `[PAPER] [${this.state.strategyId}] Closed ${marketId} manually → P&L: ${pnl >= 0 ? "+" : ""}$${pnl.toFixed(2)}`
    );
    return pnl;
  }

  private realize(position: Position, pnl: number, now: Date): void {
    position.pnl = pnl;
    position.closeDate = now.toISOString();
    this.state.totalPnl += pnl;
    this.state.bankrollCurrent += pnl;
    this.state.lastUpdated = now.toISOString();
  }

  summary(): PortfolioSummary {
    const p = this.state;
    const open = this.openPositions().length;
    const settled = p.wins + p.losses;
    return {
      strategyId: p.strategyId,
      bankrollInitial: p.bankrollInitial,
      bankrollCurrent: p.bankrollCurrent,
      totalPnl: p.totalPnl,
      pnlPct: p.bankrollInitial > 0 ? (p.totalPnl / p.bankrollInitial) * 100 : 0,
      totalTrades: p.totalTrades,
      closedTrades: p.positions.length - open,
      wins: p.wins,
      losses: p.losses,
      winRate: settled > 0 ? p.wins / settled : null,
      openPositions: open,
      exposure: this.exposure(),
    };
  }

  /** Print a summary report */
  printSummary(): void {
    const s = this.summary();

    console.log("\n" + "=".repeat(60));
    console.log(`  PAPER PORTFOLIO: ${s.strategyId}`);
    console.log("=".repeat(60));
    console.log(`  Initial Bankroll:  $${s.bankrollInitial.toFixed(2)}`);
    console.log(`  Current Bankroll:  $${s.bankrollCurrent.toFixed(2)}`);
    console.log(`  Total P&L:         ${s.totalPnl >= 0 ? "+" : ""}$${s.totalPnl.toFixed(2)} (${s.pnlPct.toFixed(1)}%)`);
    console.log(`  Trades:            ${s.totalTrades} (${s.closedTrades} closed, W:${s.wins} / L:${s.losses})`);
    console.log(`  Win Rate:          ${s.winRate !== null ? (s.winRate * 100).toFixed(1) + "%" : "N/A"}`);
    console.log(`  Open Positions:    ${s.openPositions}`);
    console.log(`  Exposure:          $${s.exposure.total.toFixed(2)}`);

    const clusters = Object.entries(s.exposure.byCluster).sort((a, b) => b[1] - a[1]);
    for (const [cluster, amount] of clusters) {
      console.log(`    ${cluster.padEnd(16)} $${amount.toFixed(2)}`);
    }
    console.log("=".repeat(60));
  }
}
