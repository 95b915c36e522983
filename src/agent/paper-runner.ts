// ============================================================
// Paper Runner — one pass over all selected strategies
// ============================================================

import type { RawMarket, RunReport, Strategy, StrategyRunResult } from "../types/index.js";
import type { MarketSource } from "../api/gamma-client.js";
import type { PortfolioStore } from "../store/portfolio-store.js";
import type { Notifier } from "../notify/telegram-notifier.js";
import type { Logger } from "../utils/logger.js";
import type { CandidatePool, MarketEnricher } from "./market-enricher.js";
import { PositionLedger } from "./position-ledger.js";
import { resolveOutcome } from "./resolution.js";
import type { TradeSelector } from "../risk/trade-selector.js";
import { filterCandidates } from "../strategy/candidate-filter.js";
import { isKnownPriority, rankCandidates } from "../strategy/priority-ranker.js";
import { parseYesPrice } from "../utils/market-parse.js";

export interface PaperRunnerDeps {
  source: MarketSource;
  enricher: MarketEnricher;
  store: PortfolioStore;
  notifier: Notifier;
  selector: TradeSelector;
  logger: Logger;
}

/** Snapshot of the open-market listing, shared read-only by every strategy */
interface MarketFeed {
  byId: ReadonlyMap<string, RawMarket>;
  priceYesById: ReadonlyMap<string, number>;
}

function buildFeed(markets: readonly RawMarket[]): MarketFeed {
  const byId = new Map<string, RawMarket>();
  const priceYesById = new Map<string, number>();
  for (const raw of markets) {
    byId.set(raw.id, raw);
    const price = parseYesPrice(raw);
    if (price !== null) priceYesById.set(raw.id, price);
  }
  return { byId, priceYesById };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** HTML message for the notifier */
export function formatRunSummary(report: RunReport): string {
  const lines = [
    `<b>Paper run</b> ${report.startedAt.toISOString().slice(0, 16).replace("T", " ")} UTC`,
    `Markets: ${report.marketsFetched} | Candidates: ${report.candidates}`,
    "",
  ];
  for (const r of report.results) {
    if (r.status === "error") {
      lines.push(`❌ <b>${escapeHtml(r.strategyId)}</b>: ${escapeHtml(r.error ?? "unknown error")}`);
      continue;
    }
    lines.push(
      `<b>${escapeHtml(r.strategyId)}</b>: +${r.newTrades} new, ${r.resolved} resolved, ` +
        `$${r.bankroll.toFixed(2)}, ${r.openPositions} open`
    );
  }
  return lines.join("\n");
}

export class PaperRunner {
  private source: MarketSource;
  private enricher: MarketEnricher;
  private store: PortfolioStore;
  private notifier: Notifier;
  private selector: TradeSelector;
  private logger: Logger;
  private running = false;
  private wake: (() => void) | null = null;

  constructor(deps: PaperRunnerDeps) {
    this.source = deps.source;
    this.enricher = deps.enricher;
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.selector = deps.selector;
    this.logger = deps.logger;
  }

  /**
   * Fetch and enrich markets once, then settle, select and open positions
   * for each strategy in turn. A failing strategy is reported and skipped;
   * a failing market fetch fails the whole run.
   */
  async run(strategies: readonly Strategy[], now: Date = new Date()): Promise<RunReport> {
    this.logger.info(`--- Paper run: ${strategies.length} strategies ---`);

    const markets = await this.source.fetchOpenMarkets();
    this.logger.info(`Fetched ${markets.length} open markets`);

    const pool = this.enricher.buildPool(markets, now.getTime() / 1000);
    const feed = buildFeed(markets);

    const results: StrategyRunResult[] = [];
    for (const strategy of strategies) {
      results.push(await this.runStrategy(strategy, pool, feed, now));
    }

    const report: RunReport = {
      startedAt: now,
      marketsFetched: markets.length,
      candidates: pool.candidates.length,
      results,
    };

    await this.notifier.send(formatRunSummary(report));

    const failed = results.filter((r) => r.status === "error").length;
    this.logger.info(
      `--- Run complete: ${results.reduce((n, r) => n + r.newTrades, 0)} new trades` +
        (failed > 0 ? `, ${failed} strategies failed` : "") +
        " ---"
    );
    return report;
  }

  /** Run repeatedly until stop() is called */
  async start(strategies: readonly Strategy[], intervalSeconds: number): Promise<void> {
    this.running = true;
    this.logger.info(`Runner starting — every ${intervalSeconds}s`);

    while (this.running) {
      try {
        await this.run(strategies);
      } catch (err) {
        this.logger.error(`Run failed: ${describeError(err)}`);
      }
      if (!this.running) break;

      this.logger.info(`Sleeping ${intervalSeconds}s until next run...`);
      await this.sleep(intervalSeconds * 1000);
    }
  }

  stop(): void {
    this.running = false;
    this.logger.info("Runner stopping...");
    this.wake?.();
    this.wake = null;
  }

  // --- Private ---

  private async runStrategy(
    strategy: Strategy,
    pool: CandidatePool,
    feed: MarketFeed,
    now: Date
  ): Promise<StrategyRunResult> {
    const failure = (err: unknown): StrategyRunResult => {
      this.logger.error(`[${strategy.id}] ${describeError(err)}`);
      return {
        strategyId: strategy.id,
        status: "error",
        newTrades: 0,
        resolved: 0,
        bankroll: 0,
        openPositions: 0,
        error: describeError(err),
      };
    };

    let ledger: PositionLedger;
    try {
      ledger = new PositionLedger(await this.store.load(strategy), this.logger);
    } catch (err) {
      return failure(err);
    }

    try {
      ledger.markPrices(feed.priceYesById);
      const resolved = await this.settleResolved(ledger, feed, now);

      const eligible = filterCandidates(pool.candidates, strategy);
      if (!isKnownPriority(strategy.priority)) {
        this.logger.warn(`[${strategy.id}] Unknown priority '${strategy.priority}', keeping pool order`);
      }
      const ranked = rankCandidates(eligible, strategy.priority);
      const selection = this.selector.select(ranked, strategy, ledger.selectionState());

      let newTrades = 0;
      for (const { candidate, betSize } of selection.accepted) {
        if (ledger.open(candidate, strategy, betSize, now)) newTrades++;
      }

      ledger.portfolio.lastUpdated = now.toISOString();
      await this.store.save(strategy, ledger.portfolio);

      return {
        strategyId: strategy.id,
        status: "ok",
        newTrades,
        resolved,
        bankroll: ledger.portfolio.bankrollCurrent,
        openPositions: ledger.openPositions().length,
      };
    } catch (err) {
      return failure(err);
    }
  }

  /**
   * Settle open positions whose market has resolved. Markets still in the
   * open listing are looked up there; the rest are fetched one by one.
   */
  private async settleResolved(ledger: PositionLedger, feed: MarketFeed, now: Date): Promise<number> {
    let resolved = 0;

    for (const position of ledger.openPositions()) {
      let raw = feed.byId.get(position.marketId);
      if (!raw) {
        try {
          raw = await this.source.fetchMarket(position.marketId);
        } catch (err) {
          this.logger.warn(`Could not check ${position.marketId}: ${describeError(err)}`);
          continue;
        }
        const price = parseYesPrice(raw);
        if (price !== null) ledger.markPrices(new Map([[raw.id, price]]));
      }

      const outcome = resolveOutcome(raw);
      if (outcome === null) continue;
      if (ledger.settle(position.marketId, outcome, now) !== null) resolved++;
    }

    return resolved;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(resolve, ms);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }
}
