// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Prometheus metrics registry and reward settlement metric definitions.
 * Scope: Shared observability singleton. Owns the process registry and provides metric handles. Does not implement a scrape endpoint.
 * Invariants: Single registry per process via globalThis; labels always low-cardinality (never participant ids).
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: Uses getOrCreate pattern to prevent duplicate registration errors across test reloads.
 * Links: Consumed by RewardDistributor.
 * @public
 */

import { Counter, collectDefaultMetrics, Histogram, Registry } from "prom-client";

// Singleton via globalThis to survive test reloads
const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
  metricsInitialized?: boolean;
};

const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new Registry();

if (!globalForMetrics.metricsInitialized) {
  globalForMetrics.metricsRegistry = metricsRegistry;
  globalForMetrics.metricsInitialized = true;

  metricsRegistry.setDefaultLabels({
    app: "round-rewards",
    // biome-ignore lint/style/noProcessEnv: Module-level init runs before serverEnv() available
    env: process.env.DEPLOY_ENVIRONMENT ?? "local",
  });
  collectDefaultMetrics({ register: metricsRegistry });
}

// =============================================================================
// Metric Factory Helpers (prevent duplicate registration)
// =============================================================================

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new Counter({
    name,
    help,
    labelNames,
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[],
  buckets: number[]
): Histogram<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram<T>;
  return new Histogram({
    name,
    help,
    labelNames,
    buckets,
    registers: [metricsRegistry],
  });
}

// =============================================================================
// Claim Settlement Metrics
// =============================================================================

/**
 * Counter increment for a bigint amount. prom-client stores doubles, so
 * amounts above Number.MAX_SAFE_INTEGER are clamped to it.
 */
export function toMetricValue(amount: bigint): number {
  return amount > BigInt(Number.MAX_SAFE_INTEGER)
    ? Number.MAX_SAFE_INTEGER
    : Number(amount);
}

export type ClaimOutcome = "paid" | "nothing_to_claim" | "transfer_failed";

export const rewardsClaimsTotal = getOrCreateCounter(
  "rewards_claims_total",
  "Claim attempts by outcome",
  ["outcome"] as const
);

export const rewardsPaidUnitsTotal = getOrCreateCounter(
  "rewards_paid_units_total",
  "Reward units paid out by successful claims"
);

export const rewardsClaimRoundsSettled = getOrCreateHistogram(
  "rewards_claim_rounds_settled",
  "Rounds settled by a single successful claim",
  [] as const,
  [1, 2, 5, 10, 25, 50, 100]
);
