#!/usr/bin/env tsx
// ============================================================
// CLI: Paper trade a strategy or group (once, or --loop)
// ============================================================

import { bootstrap, createServices, positionalArgs, runMain } from "./bootstrap.js";
import { DEFAULT_GROUP, resolveSelection } from "../strategy/catalog.js";

async function main() {
  const ctx = bootstrap();
  const { config, logger, catalog } = ctx;

  const selection = positionalArgs()[0] ?? DEFAULT_GROUP;
  const strategies = resolveSelection(catalog, selection);
  const loop = process.argv.includes("--loop");
  const { runner, notifier } = createServices(ctx);

  console.log(`
╔══════════════════════════════════════════════════════════════╗
║            Geopolitical Markets — Paper Trading             ║
╠══════════════════════════════════════════════════════════════╣
║  Selection:    ${selection.padEnd(46)}║
║  Strategies:   ${String(strategies.length).padEnd(46)}║
║  Buffer:       ${`${config.trading.bufferHours}h`.padEnd(46)}║
║  Mode:         ${(loop ? `loop every ${config.trading.scanIntervalSeconds}s` : "single run").padEnd(46)}║
║  Telegram:     ${(notifier.enabled ? "on" : "off").padEnd(46)}║
╚══════════════════════════════════════════════════════════════╝
  `);

  if (!loop) {
    const report = await runner.run(strategies);
    for (const r of report.results) {
      const line =
        r.status === "ok"
          ? `+${r.newTrades} new, ${r.resolved} resolved, $${r.bankroll.toFixed(2)}, ${r.openPositions} open`
          : `ERROR ${r.error ?? ""}`;
      console.log(`  ${r.strategyId.padEnd(28)} ${line}`);
    }
    return;
  }

  // Graceful shutdown
  process.on("SIGINT", () => {
    logger.info("Received SIGINT, shutting down...");
    runner.stop();
  });
  process.on("SIGTERM", () => {
    logger.info("Received SIGTERM, shutting down...");
    runner.stop();
  });

  await runner.start(strategies, config.trading.scanIntervalSeconds);
}

runMain(main);
