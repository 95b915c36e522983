// ============================================================
// Trade Selector — greedy constrained selection per strategy
// ============================================================

import type {
  AcceptedTrade,
  Candidate,
  SelectionResult,
  SelectionState,
  SkipReason,
  Strategy,
} from "../types/index.js";
import type { Logger } from "../utils/logger.js";
import { resolveBetSize } from "../strategy/zones.js";

export function emptySelectionState(cashAvailable: number): SelectionState {
  return {
    cashAvailable,
    totalExposure: 0,
    exposureByCluster: {},
    heldMarketIds: new Set(),
    openByEvent: {},
  };
}

/** New state value with one accepted trade folded in */
export function applyTrade(state: SelectionState, candidate: Candidate, betSize: number): SelectionState {
  return {
    cashAvailable: state.cashAvailable - betSize,
    totalExposure: state.totalExposure + betSize,
    exposureByCluster: {
      ...state.exposureByCluster,
      [candidate.cluster]: (state.exposureByCluster[candidate.cluster] ?? 0) + betSize,
    },
    heldMarketIds: new Set([...state.heldMarketIds, candidate.marketId]),
    openByEvent: {
      ...state.openByEvent,
      [candidate.eventKey]: (state.openByEvent[candidate.eventKey] ?? 0) + 1,
    },
  };
}

/**
 * Walk the ranked list once, accepting greedily. Earlier candidates always
 * win scarce budget; there is no backtracking. Running out of cash for the
 * current candidate ends the scan.
 */
export function selectTrades(
  ranked: readonly Candidate[],
  strategy: Strategy,
  initial: SelectionState
): SelectionResult {
  const maxTotal = strategy.bankroll * strategy.maxTotalExposurePct;
  const maxCluster = strategy.bankroll * strategy.maxClusterExposurePct;

  const accepted: AcceptedTrade[] = [];
  const skipped: Array<{ marketId: string; reason: SkipReason }> = [];
  let state = initial;
  let haltedOnCash = false;

  for (const candidate of ranked) {
    const skip = (reason: SkipReason) => skipped.push({ marketId: candidate.marketId, reason });

    if (state.heldMarketIds.has(candidate.marketId)) {
      skip("already_held");
      continue;
    }
    if ((state.openByEvent[candidate.eventKey] ?? 0) >= strategy.eventCap) {
      skip("event_cap");
      continue;
    }

    const betSize = resolveBetSize(strategy.sizing, candidate.volume);

    if (state.cashAvailable < betSize) {
      haltedOnCash = true;
      break;
    }
    if (state.totalExposure + betSize > maxTotal) {
      skip("total_exposure");
      continue;
    }
    if ((state.exposureByCluster[candidate.cluster] ?? 0) + betSize > maxCluster) {
      skip("cluster_exposure");
      continue;
    }

    accepted.push({ candidate, betSize });
    state = applyTrade(state, candidate, betSize);
  }

  return { accepted, skipped, haltedOnCash, state };
}

export class TradeSelector {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  select(ranked: readonly Candidate[], strategy: Strategy, state: SelectionState): SelectionResult {
    const result = selectTrades(ranked, strategy, state);

    for (const { marketId, reason } of result.skipped) {
      this.logger.debug(`[${strategy.id}] Skipping ${marketId}: ${reason}`);
    }
    if (result.haltedOnCash) {
      this.logger.warn(
        `[${strategy.id}] Cash exhausted ($${result.state.cashAvailable.toFixed(2)} left), stopping selection`
      );
    }

    this.logger.info(
      `[${strategy.id}] Selected ${result.accepted.length} of ${ranked.length} ranked candidates ` +
        `(exposure $${result.state.totalExposure.toFixed(2)} / $${(strategy.bankroll * strategy.maxTotalExposurePct).toFixed(2)})`
    );
    return result;
  }
}
