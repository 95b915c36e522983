import type { PriceRange, SizingMode, ZoneSpec } from "../types/index.js";

/**
 * Price range that applies to a market of the given volume.
 * Bucket lists are scanned in order; the first bucket whose half-open
 * interval [volMin, volMax) holds the volume wins. No match is a dead zone.
 */
export function resolveZone(zone: ZoneSpec, volume: number): PriceRange | null {
  if (zone.kind === "range") return { min: zone.min, max: zone.max };

  const bucket = zone.buckets.find((b) => b.volMin <= volume && volume < b.volMax);
  return bucket ? { min: bucket.priceMin, max: bucket.priceMax } : null;
}

// Adaptive sizing schedule, shared by every adaptive strategy
export const ADAPTIVE_SIZE_TIERS = {
  lowVolume: 5_000,
  midVolume: 50_000,
  small: 5,
  medium: 10,
  large: 25,
} as const;

export function resolveBetSize(sizing: SizingMode, volume: number): number {
  if (sizing.kind === "fixed") return sizing.betSize;

  if (volume < ADAPTIVE_SIZE_TIERS.lowVolume) return ADAPTIVE_SIZE_TIERS.small;
  if (volume < ADAPTIVE_SIZE_TIERS.midVolume) return ADAPTIVE_SIZE_TIERS.medium;
  return ADAPTIVE_SIZE_TIERS.large;
}
