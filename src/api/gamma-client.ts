// ============================================================
// Gamma API Client
// Read-only market data: open listings and single-market lookup
// ============================================================

import { z } from "zod";
import type { BotConfig, RawMarket } from "../types/index.js";
import type { Logger } from "../utils/logger.js";

export interface MarketSource {
  fetchOpenMarkets(): Promise<RawMarket[]>;
  fetchMarket(marketId: string): Promise<RawMarket>;
}

export class GammaApiError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "GammaApiError";
  }
}

const listField = z.union([z.string(), z.array(z.unknown())]).optional();
const scalarField = z.union([z.string(), z.number()]).nullable().optional();
const flagField = z.union([z.boolean(), z.string()]).nullable().optional();

export const rawMarketSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  question: z.string().default(""),
  outcomes: listField,
  outcomePrices: listField,
  clobTokenIds: listField,
  volume: scalarField,
  startDate: scalarField,
  createdAt: scalarField,
  endDate: scalarField,
  groupItemTitle: z.string().nullable().optional(),
  slug: z.string().nullable().optional(),
  closed: flagField,
  resolved: flagField,
  outcome: z.union([z.string(), z.number(), z.boolean()]).nullable().optional(),
  resolution: z.string().nullable().optional(),
  resolutionSource: z.string().nullable().optional(),
});

/** Validate a page of API records; records without a usable id are dropped */
export function parseMarkets(records: unknown[]): { markets: RawMarket[]; dropped: number } {
  const markets: RawMarket[] = [];
  let dropped = 0;
  for (const record of records) {
    const parsed = rawMarketSchema.safeParse(record);
    if (parsed.success) markets.push(parsed.data);
    else dropped++;
  }
  return { markets, dropped };
}

export class GammaClient implements MarketSource {
  private baseUrl: string;
  private pageSize: number;
  private maxMarkets: number;
  private logger: Logger;

  constructor(config: BotConfig, logger: Logger) {
    this.baseUrl = config.gamma.baseUrl;
    this.pageSize = config.gamma.pageSize;
    this.maxMarkets = config.gamma.maxMarkets;
    this.logger = logger;
  }

  private async request(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug(`API GET ${path}`);

    const response = await fetch(url, { signal: AbortSignal.timeout(30_000) });
    if (!response.ok) {
      const errorText = await response.text();
      throw new GammaApiError(response.status, `Gamma API error ${response.status}: ${errorText}`);
    }
    return response.json();
  }

  /** Fetch all open markets by paging through offsets */
  async fetchOpenMarkets(): Promise<RawMarket[]> {
    const all: RawMarket[] = [];
    let offset = 0;
    let dropped = 0;

    while (all.length < this.maxMarkets) {
      const data = await this.request(`/markets?closed=false&limit=${this.pageSize}&offset=${offset}`);
      if (!Array.isArray(data) || data.length === 0) break;

      const page = parseMarkets(data);
      all.push(...page.markets);
      dropped += page.dropped;
      offset += data.length;
      this.logger.debug(`Fetched ${data.length} markets (total: ${all.length})`);

      if (data.length < this.pageSize) break;
      await sleep(100);
    }

    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} malformed market records`);
    }
    return all.slice(0, this.maxMarkets);
  }

  /** Get a single market by id, including closed ones */
  async fetchMarket(marketId: string): Promise<RawMarket> {
    const data = await this.request(`/markets/${encodeURIComponent(marketId)}`);
    return rawMarketSchema.parse(data);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
