// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@rewards/settlement-core/model`
 * Purpose: Domain types and enums for the round reward ledger.
 * Scope: Pure types. Does not contain business logic or perform I/O.
 * Invariants: All score and amount fields are bigint (ALL_MATH_BIGINT). Round ids start at 1.
 * Side-effects: none
 * Links: Used by RoundLedger and RewardDistributor
 * @public
 */

/** Round phases, in lifecycle order */
const ROUND_PHASES = ["registration", "active", "distribution"] as const;
export type RoundPhase = (typeof ROUND_PHASES)[number];

/** How a round's reward pool is determined */
export const POOL_MODES = ["direct", "carry-over"] as const;
export type PoolMode = (typeof POOL_MODES)[number];

/** First round id; round ids increase by one per startNewRound */
export const GENESIS_ROUND_ID = 1;

/** One (participant, score) pair as delivered by the scoring oracle */
export interface ScoreEntry {
  readonly participant: string;
  readonly score: bigint;
}

/** Aggregate read model for one round */
export interface RoundStats {
  readonly roundId: number;
  readonly participantCount: number;
  readonly totalScore: bigint;
  readonly rewardPool: bigint;
  readonly claimedAmount: bigint;
  /** True once scores were loaded and the pool fixed */
  readonly sealed: boolean;
}

/** Amount settled from a single round during a claim */
export interface RoundPayout {
  readonly roundId: number;
  readonly amount: bigint;
}

/** Result of a successful claim */
export interface ClaimReceipt {
  readonly participant: string;
  readonly payouts: readonly RoundPayout[];
  readonly total: bigint;
  /** True when the scan stopped at its round limit with rounds left to check */
  readonly truncated: boolean;
}

/** Pool/claimed pair used by carry-over accounting */
export interface RoundBalance {
  readonly rewardPool: bigint;
  readonly claimedAmount: bigint;
}
