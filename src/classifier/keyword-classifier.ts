// ============================================================
// Keyword Classifier — is this market geopolitical, and where?
// ============================================================

import fs from "node:fs";
import { z } from "zod";
import type { Classification } from "../types/index.js";

export interface MarketClassifier {
  classify(question: string): Classification;
}

const keywordListsSchema = z.object({
  garbageKeywords: z.array(z.string().min(1)),
  garbagePatterns: z.array(z.string().min(1)),
  entitiesWordBoundary: z.array(z.string().min(1)),
  entitiesSafe: z.array(z.string().min(1)),
  actions: z.array(z.string().min(1)),
  clusters: z.record(z.array(z.string().min(1))),
});

export type KeywordLists = z.infer<typeof keywordListsSchema>;

export function loadKeywordLists(path: string): KeywordLists {
  const json: unknown = JSON.parse(fs.readFileSync(path, "utf8"));
  return keywordListsSchema.parse(json);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function wordPattern(keyword: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(keyword)}\\b`, "i");
}

/**
 * Strict geopolitical filter: a question must name an entity (country,
 * leader, organisation) AND an action, and must not look like sports,
 * crypto-price or entertainment noise. Cluster is the first cluster in
 * file order with a matching keyword.
 */
export class KeywordClassifier implements MarketClassifier {
  private garbage: RegExp[];
  private entityPatterns: RegExp[];
  private entitiesSafe: string[];
  private actions: string[];
  private clusters: Array<[string, string[]]>;

  constructor(lists: KeywordLists) {
    this.garbage = [
      ...lists.garbageKeywords.map(wordPattern),
      ...lists.garbagePatterns.map((p) => new RegExp(p, "i")),
    ];
    this.entityPatterns = lists.entitiesWordBoundary.map(wordPattern);
    this.entitiesSafe = lists.entitiesSafe.map((k) => k.toLowerCase());
    this.actions = lists.actions.map((k) => k.toLowerCase());
    this.clusters = Object.entries(lists.clusters).map(([name, kws]) => [
      name,
      kws.map((k) => k.toLowerCase()),
    ]);
  }

  isGarbage(question: string): boolean {
    return this.garbage.some((rx) => rx.test(question));
  }

  isGeopolitical(question: string): boolean {
    if (!question.trim() || this.isGarbage(question)) return false;
    const q = question.toLowerCase();
    const hasEntity =
      this.entityPatterns.some((rx) => rx.test(q)) || this.entitiesSafe.some((kw) => q.includes(kw));
    return hasEntity && this.actions.some((kw) => q.includes(kw));
  }

  clusterOf(question: string): string {
    const q = question.toLowerCase();
    for (const [name, keywords] of this.clusters) {
      if (keywords.some((kw) => q.includes(kw))) return name;
    }
    return "other";
  }

  classify(question: string): Classification {
    const isGeopolitical = this.isGeopolitical(question);
    return {
      isGeopolitical,
      cluster: isGeopolitical ? this.clusterOf(question) : "other",
    };
  }
}
