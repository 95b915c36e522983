// ============================================================
// CLI bootstrap — config, logger and service wiring
// ============================================================

import type { BotConfig, StrategyCatalog } from "../types/index.js";
import { loadConfig } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import { loadCatalog } from "../strategy/catalog.js";
import { GammaClient } from "../api/gamma-client.js";
import { KeywordClassifier, loadKeywordLists } from "../classifier/keyword-classifier.js";
import { MarketEnricher } from "../agent/market-enricher.js";
import { JsonPortfolioStore } from "../store/portfolio-store.js";
import { TelegramNotifier } from "../notify/telegram-notifier.js";
import { TradeSelector } from "../risk/trade-selector.js";
import { PaperRunner } from "../agent/paper-runner.js";

export interface CliContext {
  config: BotConfig;
  logger: Logger;
  catalog: StrategyCatalog;
}

export function bootstrap(): CliContext {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const catalog = loadCatalog(config.paths.catalog, logger);
  return { config, logger, catalog };
}

// status and sell only need these two; neither touches the keyword lists
export function createStore({ config, logger }: CliContext): JsonPortfolioStore {
  return new JsonPortfolioStore(config.paths.portfolioDir, logger);
}

export function createSource({ config, logger }: CliContext): GammaClient {
  return new GammaClient(config, logger);
}

export function createServices(ctx: CliContext) {
  const { config, logger } = ctx;
  const source = createSource(ctx);
  const classifier = new KeywordClassifier(loadKeywordLists(config.paths.classifierKeywords));
  const enricher = new MarketEnricher(classifier, config.trading.bufferHours, logger);
  const store = createStore(ctx);
  const notifier = new TelegramNotifier(config, logger);
  const runner = new PaperRunner({
    source,
    enricher,
    store,
    notifier,
    selector: new TradeSelector(logger),
    logger,
  });
  return { source, enricher, store, notifier, runner };
}

/** Positional arguments, flags removed */
export function positionalArgs(argv: string[] = process.argv.slice(2)): string[] {
  return argv.filter((a) => !a.startsWith("--"));
}

export function runMain(main: () => Promise<void>): void {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
