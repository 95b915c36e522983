#!/usr/bin/env tsx
// ============================================================
// CLI: Manually close matching paper positions
// Usage: sell <market id or question text> [--confirm]
// ============================================================

import { bootstrap, createSource, createStore, positionalArgs, runMain } from "./bootstrap.js";
import { PositionLedger, sidePrice } from "../agent/position-ledger.js";
import { parseYesPrice } from "../utils/market-parse.js";

async function main() {
  const ctx = bootstrap();
  const { logger, catalog } = ctx;

  const search = positionalArgs().join(" ").trim();
  if (!search) {
    throw new Error("Usage: sell <market id or question text> [--confirm]");
  }
  const confirm = process.argv.includes("--confirm");
  const source = createSource(ctx);
  const store = createStore(ctx);

  const priceCache = new Map<string, number | null>();
  const currentPrice = async (marketId: string): Promise<number | null> => {
    const cached = priceCache.get(marketId);
    if (cached !== undefined) return cached;
    const price = parseYesPrice(await source.fetchMarket(marketId));
    priceCache.set(marketId, price);
    return price;
  };

  let matched = 0;
  for (const strategy of catalog.strategies.values()) {
    let ledger: PositionLedger;
    try {
      ledger = new PositionLedger(await store.load(strategy), logger);
    } catch (err) {
      logger.warn(`[${strategy.id}] ${err instanceof Error ? err.message : err}`);
      continue;
    }

    const positions = ledger.findOpen(search);
    if (positions.length === 0) continue;

    for (const p of positions) {
      matched++;
      let priceYes: number | null;
      try {
        priceYes = await currentPrice(p.marketId);
      } catch (err) {
        logger.warn(`[${strategy.id}] Could not fetch ${p.marketId}: ${err instanceof Error ? err.message : err}`);
        continue;
      }
      if (priceYes === null) {
        logger.warn(`[${strategy.id}] No current price for ${p.marketId}, leaving open`);
        continue;
      }

      const exit = sidePrice(p.betSide, priceYes);
      console.log(
        `  ${strategy.id.padEnd(28)} ${p.betSide} ${p.shares.toFixed(2)} sh ` +
          `@ ${(p.entryPrice * 100).toFixed(1)}¢ → ${(exit * 100).toFixed(1)}¢  ${p.question.slice(0, 50)}`
      );
      if (confirm) ledger.closeManually(p.marketId, priceYes);
    }

    if (confirm) await store.save(strategy, ledger.portfolio);
  }

  if (matched === 0) {
    console.log(`No open positions match '${search}'`);
  } else if (!confirm) {
    console.log(`\n${matched} matching positions. Re-run with --confirm to close them.`);
  }
}

runMain(main);
