// ============================================================
// Strategy Catalog — load, validate and select strategies
// ============================================================

import fs from "node:fs";
import { z } from "zod";
import type { Strategy, StrategyCatalog, VolumeBucket, ZoneSpec } from "../types/index.js";
import type { Logger } from "../utils/logger.js";

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

export class UnknownSelectionError extends Error {
  constructor(
    readonly selection: string,
    catalog: StrategyCatalog
  ) {
    super(
      `Unknown strategy or group '${selection}'. ` +
        `Strategies: ${[...catalog.strategies.keys()].join(", ")}. ` +
        `Groups: ${[...catalog.groups.keys()].join(", ")}`
    );
    this.name = "UnknownSelectionError";
  }
}

export const DEFAULT_GROUP = "standard";

const fraction = z.number().min(0).max(1);

const bucketSchema = z
  .object({
    volMin: z.number().nonnegative().default(0),
    volMax: z.number().positive().nullable().default(null), // null = unbounded
    priceYesMin: fraction,
    priceYesMax: fraction,
  })
  .refine((b) => b.volMax === null || b.volMin < b.volMax, "volMin must be below volMax")
  .refine((b) => b.priceYesMin <= b.priceYesMax, "priceYesMin must not exceed priceYesMax");

// Defaults applied once here; nothing downstream re-defaults.
const strategyInputSchema = z.object({
  name: z.string().optional(),
  description: z.string().default(""),
  betSide: z.enum(["YES", "NO"]).default("NO"),
  bankroll: z.number().positive(),
  priceYesMin: fraction.optional(),
  priceYesMax: fraction.optional(),
  zones: z.array(bucketSchema).min(1).optional(),
  minVolume: z.number().nonnegative().default(0),
  maxVolume: z.number().nonnegative().nullable().default(null),
  sizing: z.enum(["fixed", "adaptive"]).default("fixed"),
  betSize: z.number().positive().default(25),
  priority: z.string().default("price_high"),
  deadlineMin: z.number().nonnegative().default(3),
  deadlineMax: z.number().nonnegative().nullable().default(null),
  eventCap: z.number().int().positive().default(3),
  excludeSeries: z.boolean().default(false),
  clusterFilter: z.array(z.string()).nullable().default(null),
  maxTotalExposurePct: fraction.default(0.9),
  maxClusterExposurePct: fraction.default(0.3),
  entryCostRate: fraction.default(0.005),
  portfolioFile: z.string().optional(),
});

const catalogSchema = z.object({
  strategies: z.record(strategyInputSchema),
  groups: z.record(z.array(z.string())).default({}),
});

type StrategyInput = z.infer<typeof strategyInputSchema>;

function buildZone(id: string, input: StrategyInput): ZoneSpec {
  if (input.zones) {
    const buckets: VolumeBucket[] = input.zones.map((b) => ({
      volMin: b.volMin,
      volMax: b.volMax ?? Infinity,
      priceMin: b.priceYesMin,
      priceMax: b.priceYesMax,
    }));
    return { kind: "buckets", buckets };
  }
  if (input.priceYesMin === undefined || input.priceYesMax === undefined) {
    throw new CatalogError(`Strategy '${id}' needs either zones or priceYesMin/priceYesMax`);
  }
  if (input.priceYesMin > input.priceYesMax) {
    throw new CatalogError(`Strategy '${id}': priceYesMin exceeds priceYesMax`);
  }
  return { kind: "range", min: input.priceYesMin, max: input.priceYesMax };
}

function checkBounds(id: string, input: StrategyInput): void {
  if (input.maxVolume !== null && input.minVolume > input.maxVolume) {
    throw new CatalogError(`Strategy '${id}': minVolume exceeds maxVolume`);
  }
  if (input.deadlineMax !== null && input.deadlineMin > input.deadlineMax) {
    throw new CatalogError(`Strategy '${id}': deadlineMin exceeds deadlineMax`);
  }
}

function toStrategy(id: string, input: StrategyInput): Strategy {
  checkBounds(id, input);
  return {
    id,
    name: input.name ?? id,
    description: input.description,
    betSide: input.betSide,
    zone: buildZone(id, input),
    minVolume: input.minVolume,
    maxVolume: input.maxVolume ?? Infinity,
    sizing: input.sizing === "adaptive" ? { kind: "adaptive" } : { kind: "fixed", betSize: input.betSize },
    priority: input.priority,
    deadlineMinDays: input.deadlineMin,
    deadlineMaxDays: input.deadlineMax,
    eventCap: input.eventCap,
    excludeSeries: input.excludeSeries,
    clusterFilter: input.clusterFilter,
    bankroll: input.bankroll,
    maxTotalExposurePct: input.maxTotalExposurePct,
    maxClusterExposurePct: input.maxClusterExposurePct,
    entryCostRate: input.entryCostRate,
    portfolioKey: input.portfolioFile ?? `portfolio_${id}.json`,
  };
}

/** Pairs of bucket indexes whose volume intervals overlap */
export function overlappingBuckets(buckets: readonly VolumeBucket[]): Array<[number, number]> {
  const pairs: Array<[number, number]> = [];
  for (let i = 0; i < buckets.length; i++) {
    for (let j = i + 1; j < buckets.length; j++) {
      const a = buckets[i];
      const b = buckets[j];
      if (a.volMin < b.volMax && b.volMin < a.volMax) pairs.push([i, j]);
    }
  }
  return pairs;
}

export function parseCatalog(json: unknown, logger: Logger): StrategyCatalog {
  const parsed = catalogSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new CatalogError(`Invalid strategy catalog: ${issues}`);
  }

  const strategies = new Map<string, Strategy>();
  for (const [id, input] of Object.entries(parsed.data.strategies)) {
    const strategy = toStrategy(id, input);
    if (strategy.zone.kind === "buckets") {
      for (const [i, j] of overlappingBuckets(strategy.zone.buckets)) {
        logger.warn(`Strategy '${id}': volume buckets ${i} and ${j} overlap, bucket ${i} wins`);
      }
    }
    strategies.set(id, strategy);
  }

  const groups = new Map<string, readonly string[]>();
  for (const [group, members] of Object.entries(parsed.data.groups)) {
    const missing = members.filter((m) => !strategies.has(m));
    if (missing.length > 0) {
      throw new CatalogError(`Group '${group}' references unknown strategies: ${missing.join(", ")}`);
    }
    groups.set(group, members);
  }

  return { strategies, groups };
}

export function loadCatalog(path: string, logger: Logger): StrategyCatalog {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(path, "utf8"));
  } catch (err) {
    throw new CatalogError(`Could not read strategy catalog ${path}: ${err}`);
  }
  const catalog = parseCatalog(json, logger);
  logger.debug(`Loaded ${catalog.strategies.size} strategies, ${catalog.groups.size} groups from ${path}`);
  return catalog;
}

/**
 * Strategies to run for a selection: a group name, a single strategy id,
 * or the default group when no selection is given.
 */
export function resolveSelection(catalog: StrategyCatalog, selection: string = DEFAULT_GROUP): Strategy[] {
  const group = catalog.groups.get(selection);
  if (group) {
    return group.flatMap((id) => {
      const strategy = catalog.strategies.get(id);
      return strategy ? [strategy] : [];
    });
  }

  const strategy = catalog.strategies.get(selection);
  if (strategy) return [strategy];

  throw new UnknownSelectionError(selection, catalog);
}
