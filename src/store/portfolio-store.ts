// ============================================================
// Portfolio Store — one JSON document per strategy
// ============================================================

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Portfolio, Strategy } from "../types/index.js";
import type { Logger } from "../utils/logger.js";
import { newPortfolio } from "../agent/position-ledger.js";

export interface PortfolioStore {
  /** Load a strategy's portfolio; a missing document yields a fresh one */
  load(strategy: Strategy): Promise<Portfolio>;
  save(strategy: Strategy, portfolio: Portfolio): Promise<void>;
}

export class PortfolioLoadError extends Error {
  constructor(key: string, cause: unknown) {
    super(`Could not load portfolio ${key}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "PortfolioLoadError";
  }
}

const positionSchema = z.object({
  marketId: z.string(),
  question: z.string(),
  tokenId: z.string(),
  betSide: z.enum(["YES", "NO"]),
  entryPrice: z.number(),
  currentPrice: z.number(),
  priceYesCurrent: z.number(),
  stake: z.number(),
  shares: z.number(),
  status: z.enum(["open", "resolved-win", "resolved-loss", "manually-closed"]),
  entryCostRate: z.number(),
  eventKey: z.string(),
  cluster: z.string(),
  expectedClose: z.string(),
  entryDate: z.string(),
  closeDate: z.string().nullable(),
  pnl: z.number().nullable(),
});

export const portfolioSchema = z.object({
  strategyId: z.string(),
  bankrollInitial: z.number(),
  bankrollCurrent: z.number(),
  entryCostRate: z.number(),
  totalTrades: z.number().int().nonnegative(),
  wins: z.number().int().nonnegative(),
  losses: z.number().int().nonnegative(),
  totalPnl: z.number(),
  positions: z.array(positionSchema),
  createdAt: z.string(),
  lastUpdated: z.string(),
});

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class JsonPortfolioStore implements PortfolioStore {
  private dir: string;
  private logger: Logger;

  constructor(dir: string, logger: Logger) {
    this.dir = dir;
    this.logger = logger;
  }

  private pathFor(strategy: Strategy): string {
    return path.join(this.dir, strategy.portfolioKey);
  }

  async load(strategy: Strategy): Promise<Portfolio> {
    const file = this.pathFor(strategy);

    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.info(`[${strategy.id}] No portfolio at ${file}, starting fresh with $${strategy.bankroll}`);
        return newPortfolio(strategy);
      }
      throw new PortfolioLoadError(strategy.portfolioKey, err);
    }

    try {
      return portfolioSchema.parse(JSON.parse(text));
    } catch (err) {
      throw new PortfolioLoadError(strategy.portfolioKey, err);
    }
  }

  async save(strategy: Strategy, portfolio: Portfolio): Promise<void> {
    const file = this.pathFor(strategy);
    await fs.mkdir(this.dir, { recursive: true });

    const tmp = `${file}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(portfolio, null, 2), "utf8");
    await fs.rename(tmp, file);
    this.logger.debug(`[${strategy.id}] Portfolio saved to ${file}`);
  }
}
