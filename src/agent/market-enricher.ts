// ============================================================
// Market Enricher — raw market records → shared candidate pool
// ============================================================

import type { Candidate, Classification, RawMarket, TokenIds } from "../types/index.js";
import type { MarketClassifier } from "../classifier/keyword-classifier.js";
import type { Logger } from "../utils/logger.js";
import {
  parseGrouping,
  parseMarketTimestamps,
  parseVolume,
  parseYesPrice,
  resolveTokenIds,
} from "../utils/market-parse.js";

export type RejectionReason =
  | "not_geopolitical"
  | "missing_timestamps"
  | "too_soon_after_open"
  | "too_close_to_end"
  | "invalid_price";

export type EnrichResult =
  | { ok: true; candidate: Candidate }
  | { ok: false; reason: RejectionReason };

const SECONDS_PER_DAY = 86_400;

/**
 * Turn one raw market into a candidate, or say why it was rejected.
 * Checks run in a fixed order and the first failure wins.
 */
export function enrichMarket(
  raw: RawMarket,
  nowTs: number,
  classification: Classification,
  tokens: TokenIds,
  bufferHours: number
): EnrichResult {
  if (!classification.isGeopolitical) return { ok: false, reason: "not_geopolitical" };

  const { startTs, endTs } = parseMarketTimestamps(raw);
  if (startTs === null || endTs === null) return { ok: false, reason: "missing_timestamps" };

  if ((nowTs - startTs) / 3600 < bufferHours) return { ok: false, reason: "too_soon_after_open" };
  if ((endTs - nowTs) / 3600 < bufferHours) return { ok: false, reason: "too_close_to_end" };

  const priceYes = parseYesPrice(raw);
  if (priceYes === null) return { ok: false, reason: "invalid_price" };

  const { eventKey, structure } = parseGrouping(raw);

  return {
    ok: true,
    candidate: {
      marketId: raw.id,
      question: raw.question,
      priceYes,
      volume: parseVolume(raw),
      cluster: classification.cluster,
      daysToClose: (endTs - nowTs) / SECONDS_PER_DAY,
      startTs,
      endTs,
      yesTokenId: tokens.yes,
      noTokenId: tokens.no,
      eventKey,
      structure,
      raw,
    },
  };
}

export interface CandidatePool {
  candidates: Candidate[];
  rejections: Partial<Record<RejectionReason, number>>;
}

export class MarketEnricher {
  private classifier: MarketClassifier;
  private tokenResolver: (raw: RawMarket) => TokenIds;
  private bufferHours: number;
  private logger: Logger;

  constructor(
    classifier: MarketClassifier,
    bufferHours: number,
    logger: Logger,
    tokenResolver: (raw: RawMarket) => TokenIds = resolveTokenIds
  ) {
    this.classifier = classifier;
    this.tokenResolver = tokenResolver;
    this.bufferHours = bufferHours;
    this.logger = logger;
  }

  /** Enrich every raw market exactly once; the pool is shared by all strategies */
  buildPool(markets: RawMarket[], nowTs: number): CandidatePool {
    const candidates: Candidate[] = [];
    const rejections: Partial<Record<RejectionReason, number>> = {};

    for (const raw of markets) {
      const result = enrichMarket(
        raw,
        nowTs,
        this.classifier.classify(raw.question),
        this.tokenResolver(raw),
        this.bufferHours
      );
      if (result.ok) {
        candidates.push(result.candidate);
      } else {
        rejections[result.reason] = (rejections[result.reason] ?? 0) + 1;
      }
    }

    const breakdown = Object.entries(rejections)
      .map(([reason, count]) => `${reason}:${count}`)
      .join(", ");
    this.logger.info(
      `Candidate pool: ${candidates.length}/${markets.length} markets` +
        (breakdown ? ` (rejected ${breakdown})` : "")
    );

    return { candidates, rejections };
  }
}
