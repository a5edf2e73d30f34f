// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/fund-custody`
 * Purpose: Custody port for the funds backing every round's reward pool.
 * Scope: Interface for reading the held balance and moving funds in and out. Does not know about rounds or scores.
 * Invariants:
 * - Amounts are bigint base units.
 * - disburse debits the held balance before control reaches the recipient; a rejected call leaves balances unchanged.
 * - Until a disburse promise settles, balance() may or may not reflect its debit. Callers count unsettled disbursements as still held.
 * Side-effects: none (interface definition only)
 * Notes: Recipients may run arbitrary logic while a disbursement is in flight, including calls back into the distributor.
 * Links: Implemented by InMemoryVault, used by RewardDistributor
 * @public
 */

export interface FundCustody {
  /**
   * Total funds currently held on behalf of the distributor.
   */
  balance(): Promise<bigint>;

  /**
   * Pulls `amount` from `from` into custody.
   * Rejects when the transfer cannot be completed.
   */
  collect(from: string, amount: bigint): Promise<void>;

  /**
   * Sends `amount` from custody to `to`.
   * Rejects when the held balance is short or the recipient refuses the funds.
   */
  disburse(to: string, amount: bigint): Promise<void>;
}
