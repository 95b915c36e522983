import "dotenv/config";
import type { BotConfig } from "../types/index.js";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  return {
    gamma: {
      baseUrl: env.GAMMA_API_URL ?? "https://gamma-api.polymarket.com",
      pageSize: readNumber(env, "GAMMA_PAGE_SIZE", 100),
      maxMarkets: readNumber(env, "MAX_MARKETS", 5000),
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN ?? "",
      chatId: env.TELEGRAM_CHAT_ID ?? "",
    },
    trading: {
      bufferHours: readNumber(env, "BUFFER_HOURS", 48),
      scanIntervalSeconds: readNumber(env, "SCAN_INTERVAL_SECONDS", 21600),
    },
    paths: {
      catalog: env.STRATEGY_CATALOG_PATH ?? "config/strategies.json",
      classifierKeywords: env.CLASSIFIER_KEYWORDS_PATH ?? "data/classifier-keywords.json",
      portfolioDir: env.PORTFOLIO_DIR ?? "portfolios",
    },
    logLevel: env.LOG_LEVEL ?? "info",
  };
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const val = Number(raw);
  if (!Number.isFinite(val) || val < 0) {
    throw new Error(`Invalid numeric environment variable ${name}: ${raw}`);
  }
  return val;
}
