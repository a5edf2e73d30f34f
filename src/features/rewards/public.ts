// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/rewards/public`
 * Purpose: Public API surface for the rewards feature - barrel export for stable feature boundaries.
 * Scope: Re-exports the distributor, pool accounting strategies and their types; does not implement logic.
 * Invariants: Feature consumers import from this file, never from internal modules. RoundLedger stays internal.
 * Side-effects: none
 * @public
 */

export {
  CarryOverPoolAccounting,
  createPoolAccounting,
  DirectPoolAccounting,
  type PoolAccounting,
  type PoolResolver,
} from "./services/poolAccounting";
export {
  type ClaimOptions,
  RewardDistributor,
  type RewardDistributorDeps,
} from "./services/rewardDistributor";
