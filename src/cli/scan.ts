#!/usr/bin/env tsx
// ============================================================
// CLI: Scan markets per strategy (one-shot, no trading)
// ============================================================

import { bootstrap, createServices, positionalArgs, runMain } from "./bootstrap.js";
import { DEFAULT_GROUP, resolveSelection } from "../strategy/catalog.js";
import { filterBreakdown, filterCandidates } from "../strategy/candidate-filter.js";
import { rankCandidates } from "../strategy/priority-ranker.js";
import { resolveBetSize } from "../strategy/zones.js";

const TOP_N = 5;

async function main() {
  const ctx = bootstrap();
  const { logger, catalog } = ctx;
  const strategies = resolveSelection(catalog, positionalArgs()[0] ?? DEFAULT_GROUP);
  const { source, enricher } = createServices(ctx);

  logger.info("Fetching open markets...");
  const markets = await source.fetchOpenMarkets();
  const pool = enricher.buildPool(markets, Date.now() / 1000);

  const byCluster = new Map<string, number>();
  for (const c of pool.candidates) {
    byCluster.set(c.cluster, (byCluster.get(c.cluster) ?? 0) + 1);
  }

  console.log("\n" + "=".repeat(70));
  console.log("  MARKET SCAN RESULTS");
  console.log("=".repeat(70));
  console.log(`  Open markets:  ${markets.length}`);
  console.log(`  Candidates:    ${pool.candidates.length}`);
  for (const [reason, count] of Object.entries(pool.rejections)) {
    console.log(`    rejected ${reason.padEnd(22)} ${count}`);
  }
  const clusters = [...byCluster.entries()].sort((a, b) => b[1] - a[1]);
  console.log(`  Clusters:      ${clusters.map(([k, v]) => `${k}:${v}`).join(", ")}`);

  for (const strategy of strategies) {
    const eligible = filterCandidates(pool.candidates, strategy);
    const ranked = rankCandidates(eligible, strategy.priority);
    const breakdown = Object.entries(filterBreakdown(pool.candidates, strategy))
      .map(([reason, count]) => `${reason}:${count}`)
      .join(", ");

    console.log(`\n  ${strategy.id} — ${eligible.length} eligible (${strategy.priority})`);
    if (breakdown) console.log(`    filtered out: ${breakdown}`);
    for (const c of ranked.slice(0, TOP_N)) {
      console.log(
        `    YES ${(c.priceYes * 100).toFixed(1).padStart(5)}¢ ` +
          `vol $${Math.round(c.volume).toString().padEnd(9)} ` +
          `${c.daysToClose.toFixed(0).padStart(4)}d ` +
          `$${resolveBetSize(strategy.sizing, c.volume).toString().padEnd(3)} ` +
          `[${c.cluster}] ${c.question.slice(0, 50)}`
      );
    }
    if (ranked.length > TOP_N) console.log(`    ... and ${ranked.length - TOP_N} more`);
  }

  console.log("\n" + "=".repeat(70) + "\n");
}

runMain(main);
