#!/usr/bin/env tsx
// ============================================================
// CLI: List the strategy catalog and its groups
// ============================================================

import type { Strategy } from "../types/index.js";
import { bootstrap, runMain } from "./bootstrap.js";

function describeZone(strategy: Strategy): string {
  const pct = (p: number) => `${Math.round(p * 100)}%`;
  if (strategy.zone.kind === "range") {
    return `YES ${pct(strategy.zone.min)}-${pct(strategy.zone.max)}`;
  }
  return strategy.zone.buckets
    .map((b) => `${b.volMax === Infinity ? `>$${b.volMin}` : `$${b.volMin}-${b.volMax}`}: ${pct(b.priceMin)}-${pct(b.priceMax)}`)
    .join(" | ");
}

async function main() {
  const { catalog } = bootstrap();

  console.log("\n" + "=".repeat(70));
  console.log(`  STRATEGIES (${catalog.strategies.size})`);
  console.log("=".repeat(70));

  for (const s of catalog.strategies.values()) {
    const sizing = s.sizing.kind === "adaptive" ? "adaptive" : `$${s.sizing.betSize}`;
    const deadline = `${s.deadlineMinDays}-${s.deadlineMaxDays ?? "∞"}d`;
    console.log(`\n  ${s.id}  (${s.name})`);
    if (s.description) console.log(`    ${s.description}`);
    console.log(
      `    ${s.betSide} | ${describeZone(s)} | ${sizing} | ${s.priority} | ${deadline} | bankroll $${s.bankroll}`
    );
  }

  console.log("\n" + "=".repeat(70));
  console.log("  GROUPS");
  console.log("=".repeat(70));
  for (const [name, members] of catalog.groups) {
    console.log(`  ${name.padEnd(12)} ${members.join(", ")}`);
  }
  console.log();
}

runMain(main);
