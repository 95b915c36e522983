// ============================================================
// Core types for the multi-strategy paper trading bot
// ============================================================

export type BetSide = "YES" | "NO";

/** Which side a resolved market settled on */
export type Outcome = "yes" | "no";

/** A raw Gamma API market record, after schema validation */
export interface RawMarket {
  id: string;
  question: string;
  outcomes?: string | unknown[];
  outcomePrices?: string | unknown[];
  clobTokenIds?: string | unknown[];
  volume?: string | number | null;
  startDate?: string | number | null;
  createdAt?: string | number | null;
  endDate?: string | number | null;
  groupItemTitle?: string | null;
  slug?: string | null;
  closed?: boolean | string | null;
  resolved?: boolean | string | null;
  outcome?: string | number | boolean | null;
  resolution?: string | null;
  resolutionSource?: string | null;
}

/** Output of the topical classifier for one question */
export interface Classification {
  isGeopolitical: boolean;
  cluster: string;
}

/** Instrument ids for each side of a binary market */
export interface TokenIds {
  yes: string;
  no: string;
}

/** A market that passed topical, temporal and price screening */
export interface Candidate {
  marketId: string;
  question: string;
  priceYes: number;       // strictly inside (0, 1)
  volume: number;
  cluster: string;
  daysToClose: number;
  startTs: number;        // epoch seconds
  endTs: number;          // epoch seconds
  yesTokenId: string;
  noTokenId: string;
  eventKey: string;
  structure: "series" | "";
  raw: RawMarket;
}

// --- Strategy configuration ---

export interface PriceRange {
  min: number;
  max: number;
}

/** Half-open volume bucket [volMin, volMax) with its own price range */
export interface VolumeBucket {
  volMin: number;
  volMax: number;
  priceMin: number;
  priceMax: number;
}

export type ZoneSpec =
  | { kind: "range"; min: number; max: number }
  | { kind: "buckets"; buckets: VolumeBucket[] };

export type SizingMode =
  | { kind: "fixed"; betSize: number }
  | { kind: "adaptive" };

export type KnownPriority = "price_high" | "volume_low" | "rotation";

export interface Strategy {
  id: string;
  name: string;
  description: string;
  betSide: BetSide;
  zone: ZoneSpec;
  minVolume: number;
  maxVolume: number;        // Infinity when unbounded
  sizing: SizingMode;
  priority: string;         // unknown values rank in input order
  deadlineMinDays: number;
  deadlineMaxDays: number | null;
  eventCap: number;
  excludeSeries: boolean;
  clusterFilter: string[] | null;
  bankroll: number;
  maxTotalExposurePct: number;
  maxClusterExposurePct: number;
  entryCostRate: number;
  portfolioKey: string;
}

export interface StrategyCatalog {
  strategies: ReadonlyMap<string, Strategy>;
  groups: ReadonlyMap<string, readonly string[]>;
}

// --- Selection ---

/** Simulated running totals threaded through the selector */
export interface SelectionState {
  cashAvailable: number;
  totalExposure: number;
  exposureByCluster: Readonly<Record<string, number>>;
  heldMarketIds: ReadonlySet<string>;
  openByEvent: Readonly<Record<string, number>>;
}

export type SkipReason = "already_held" | "event_cap" | "total_exposure" | "cluster_exposure";

export interface AcceptedTrade {
  candidate: Candidate;
  betSize: number;
}

export interface SelectionResult {
  accepted: AcceptedTrade[];
  skipped: Array<{ marketId: string; reason: SkipReason }>;
  haltedOnCash: boolean;
  state: SelectionState;
}

// --- Ledger ---

export type PositionStatus = "open" | "resolved-win" | "resolved-loss" | "manually-closed";

export interface Position {
  marketId: string;
  question: string;
  tokenId: string;
  betSide: BetSide;
  entryPrice: number;       // price of the bet side at entry
  currentPrice: number;     // latest mark of the bet side
  priceYesCurrent: number;
  stake: number;
  shares: number;
  status: PositionStatus;
  entryCostRate: number;
  eventKey: string;
  cluster: string;
  expectedClose: string;    // YYYY-MM-DD
  entryDate: string;        // ISO
  closeDate: string | null;
  pnl: number | null;
}

export interface Portfolio {
  strategyId: string;
  bankrollInitial: number;
  bankrollCurrent: number;
  entryCostRate: number;
  totalTrades: number;
  wins: number;
  losses: number;
  totalPnl: number;
  positions: Position[];
  createdAt: string;
  lastUpdated: string;
}

export interface ExposureSummary {
  total: number;
  byCluster: Record<string, number>;
}

export interface PortfolioSummary {
  strategyId: string;
  bankrollInitial: number;
  bankrollCurrent: number;
  totalPnl: number;
  pnlPct: number;
  totalTrades: number;
  closedTrades: number;
  wins: number;
  losses: number;
  /** Fraction of settled positions won; null before the first settlement */
  winRate: number | null;
  openPositions: number;
  exposure: ExposureSummary;
}

// --- Runner ---

export interface StrategyRunResult {
  strategyId: string;
  status: "ok" | "error";
  newTrades: number;
  resolved: number;
  bankroll: number;
  openPositions: number;
  error?: string;
}

export interface RunReport {
  startedAt: Date;
  marketsFetched: number;
  candidates: number;
  results: StrategyRunResult[];
}

/** Bot configuration (loaded from env) */
export interface BotConfig {
  gamma: {
    baseUrl: string;
    pageSize: number;
    maxMarkets: number;
  };
  telegram: {
    botToken: string;
    chatId: string;
  };
  trading: {
    bufferHours: number;
    scanIntervalSeconds: number;
  };
  paths: {
    catalog: string;
    classifierKeywords: string;
    portfolioDir: string;
  };
  logLevel: string;
}
