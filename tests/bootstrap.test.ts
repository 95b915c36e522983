import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { GammaClient } from "../src/api/gamma-client.js";
import { createServices, createSource, createStore, positionalArgs } from "../src/cli/bootstrap.js";
import type { CliContext } from "../src/cli/bootstrap.js";
import { JsonPortfolioStore } from "../src/store/portfolio-store.js";
import { parseCatalog } from "../src/strategy/catalog.js";
import { loadConfig } from "../src/utils/config.js";
import { createSilentLogger } from "../src/utils/logger.js";
import { makeStrategy } from "./helpers.js";

describe("CLI service wiring", () => {
  let dir: string;
  let ctx: CliContext;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "cli-bootstrap-"));
    const logger = createSilentLogger();
    ctx = {
      config: loadConfig({
        PORTFOLIO_DIR: dir,
        CLASSIFIER_KEYWORDS_PATH: path.join(dir, "missing-keywords.json"),
      }),
      logger,
      catalog: parseCatalog({ strategies: { flat: { bankroll: 1000, priceYesMin: 0.4, priceYesMax: 0.8 } } }, logger),
    };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("builds the portfolio store without reading the keyword lists", async () => {
    const store = createStore(ctx);
    expect(store).toBeInstanceOf(JsonPortfolioStore);

    const portfolio = await store.load(makeStrategy({ id: "flat", bankroll: 1000 }));
    expect(portfolio.bankrollCurrent).toBe(1000);
    expect(portfolio.positions).toEqual([]);
  });

  it("builds the market source without reading the keyword lists", () => {
    expect(createSource(ctx)).toBeInstanceOf(GammaClient);
  });

  it("needs the keyword lists for the full service set", () => {
    expect(() => createServices(ctx)).toThrow(/missing-keywords\.json/);
  });
});

describe("positionalArgs", () => {
  it("drops flags", () => {
    expect(positionalArgs(["balanced", "--loop", "extra"])).toEqual(["balanced", "extra"]);
  });
});
