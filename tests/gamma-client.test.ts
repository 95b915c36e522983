import { afterEach, describe, expect, it, vi } from "vitest";
import { GammaApiError, GammaClient, parseMarkets } from "../src/api/gamma-client.js";
import { loadConfig } from "../src/utils/config.js";
import { createSilentLogger } from "../src/utils/logger.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function clientWith(env: Record<string, string>) {
  return new GammaClient(loadConfig({ GAMMA_API_URL: "https://gamma.test", ...env }), createSilentLogger());
}

describe("parseMarkets", () => {
  it("normalizes ids and drops records without one", () => {
    const { markets, dropped } = parseMarkets([
      { id: 12, question: "Q1", volume: "100" },
      { question: "no id" },
      { id: "13" },
      "garbage",
    ]);
    expect(markets).toEqual([
      { id: "12", question: "Q1", volume: "100" },
      { id: "13", question: "" },
    ]);
    expect(dropped).toBe(2);
  });
});

describe("GammaClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("pages through open markets until a short page", async () => {
    const pages: Record<string, unknown[]> = {
      "0": [{ id: "1" }, { id: "2" }],
      "2": [{ id: "3" }, { question: "broken" }],
      "4": [],
    };
    const fetchMock = vi.fn(async (url: string) => {
      const offset = new URL(url).searchParams.get("offset") ?? "";
      return jsonResponse(pages[offset] ?? []);
    });
    vi.stubGlobal("fetch", fetchMock);

    const markets = await clientWith({ GAMMA_PAGE_SIZE: "2" }).fetchOpenMarkets();

    expect(markets.map((m) => m.id)).toEqual(["1", "2", "3"]);
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      "https://gamma.test/markets?closed=false&limit=2&offset=0",
      "https://gamma.test/markets?closed=false&limit=2&offset=2",
      "https://gamma.test/markets?closed=false&limit=2&offset=4",
    ]);
  });

  it("stops at the configured market cap", async () => {
    let next = 0;
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse([{ id: String(next++) }, { id: String(next++) }]))
    );

    const markets = await clientWith({ GAMMA_PAGE_SIZE: "2", MAX_MARKETS: "3" }).fetchOpenMarkets();
    expect(markets.map((m) => m.id)).toEqual(["0", "1", "2"]);
  });

  it("raises GammaApiError on HTTP errors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("overloaded", { status: 503 })));

    const error = await clientWith({}).fetchOpenMarkets().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(GammaApiError);
    expect(error instanceof GammaApiError && error.status).toBe(503);
  });

  it("fetches a single market by id", async () => {
    const fetchMock = vi.fn(async (_url: string) => jsonResponse({ id: 77, question: "Q", closed: true }));
    vi.stubGlobal("fetch", fetchMock);

    const market = await clientWith({}).fetchMarket("77");
    expect(market).toEqual({ id: "77", question: "Q", closed: true });
    expect(fetchMock.mock.calls[0][0]).toBe("https://gamma.test/markets/77");
  });
});
