import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PositionLedger, newPortfolio } from "../src/agent/position-ledger.js";
import { JsonPortfolioStore, PortfolioLoadError } from "../src/store/portfolio-store.js";
import { createSilentLogger } from "../src/utils/logger.js";
import { NOW, makeCandidate, makeStrategy } from "./helpers.js";

const logger = createSilentLogger();

describe("JsonPortfolioStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "portfolio-store-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("starts a fresh portfolio when none is stored", async () => {
    const strategy = makeStrategy({ id: "fresh", bankroll: 500 });
    const portfolio = await new JsonPortfolioStore(dir, logger).load(strategy);

    expect(portfolio.strategyId).toBe("fresh");
    expect(portfolio.bankrollCurrent).toBe(500);
    expect(portfolio.positions).toEqual([]);
  });

  it("round-trips a portfolio with positions", async () => {
    const strategy = makeStrategy();
    const ledger = new PositionLedger(newPortfolio(strategy, NOW), logger);
    ledger.open(makeCandidate({ marketId: "a" }), strategy, 25, NOW);
    ledger.open(makeCandidate({ marketId: "b" }), strategy, 25, NOW);
    ledger.settle("a", "yes", NOW);

    const nested = path.join(dir, "nested");
    const store = new JsonPortfolioStore(nested, logger);
    await store.save(strategy, ledger.portfolio);

    expect(await store.load(strategy)).toEqual(ledger.portfolio);
    expect(await fs.readdir(nested)).toEqual(["portfolio_test.json"]);
  });

  it("fails on unparseable JSON", async () => {
    await fs.writeFile(path.join(dir, "portfolio_test.json"), "{ not json", "utf8");
    await expect(new JsonPortfolioStore(dir, logger).load(makeStrategy())).rejects.toBeInstanceOf(PortfolioLoadError);
  });

  it("fails on documents that do not match the schema", async () => {
    await fs.writeFile(path.join(dir, "portfolio_test.json"), JSON.stringify({ strategyId: "test" }), "utf8");
    await expect(new JsonPortfolioStore(dir, logger).load(makeStrategy())).rejects.toThrow(
      /Could not load portfolio portfolio_test\.json/
    );
  });
});
