// ============================================================
// Geopolitical Markets Paper Bot — Main Entry Point
// ============================================================

export { PaperRunner, formatRunSummary } from "./agent/paper-runner.js";
export { MarketEnricher, enrichMarket } from "./agent/market-enricher.js";
export { PositionLedger, newPortfolio, sidePrice } from "./agent/position-ledger.js";
export { resolveOutcome } from "./agent/resolution.js";
export { GammaClient, GammaApiError } from "./api/gamma-client.js";
export { KeywordClassifier, loadKeywordLists } from "./classifier/keyword-classifier.js";
export { TelegramNotifier } from "./notify/telegram-notifier.js";
export { TradeSelector, selectTrades, applyTrade, emptySelectionState } from "./risk/trade-selector.js";
export { JsonPortfolioStore, PortfolioLoadError } from "./store/portfolio-store.js";
export { loadCatalog, parseCatalog, resolveSelection, CatalogError, UnknownSelectionError } from "./strategy/catalog.js";
export { filterCandidates, ineligibilityReason } from "./strategy/candidate-filter.js";
export { rankCandidates } from "./strategy/priority-ranker.js";
export { resolveZone, resolveBetSize } from "./strategy/zones.js";
export { loadConfig } from "./utils/config.js";
export { createLogger } from "./utils/logger.js";
export type * from "./types/index.js";
