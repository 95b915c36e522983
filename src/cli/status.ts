#!/usr/bin/env tsx
// ============================================================
// CLI: Print paper portfolio summaries
// ============================================================

import { bootstrap, createStore, positionalArgs, runMain } from "./bootstrap.js";
import { DEFAULT_GROUP, resolveSelection } from "../strategy/catalog.js";
import { PositionLedger } from "../agent/position-ledger.js";

async function main() {
  const ctx = bootstrap();
  const { logger, catalog } = ctx;
  const strategies = resolveSelection(catalog, positionalArgs()[0] ?? DEFAULT_GROUP);
  const store = createStore(ctx);

  for (const strategy of strategies) {
    try {
      const ledger = new PositionLedger(await store.load(strategy), logger);
      ledger.printSummary();
    } catch (err) {
      logger.error(`[${strategy.id}] ${err instanceof Error ? err.message : err}`);
    }
  }
}

runMain(main);
